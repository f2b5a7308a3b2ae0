/**
 * Dotr Constants
 */

// Repository configuration document
export const CONFIG_FILE = 'config.toml';

// Answers to prompts, kept out of version control
export const USER_VARIABLES_FILE = '.uservariables.toml';

// Directory inside the repository holding package sources
export const DOTFILES_DIR = 'dotfiles';

// Extension appended to a destination file before it is overwritten
export const BACKUP_EXT = 'dotrbak';

// Suffix of the sibling file a destination is written to before the rename
export const TEMP_EXT = 'dotrtmp';

// Selects a profile when --profile is not given
export const PROFILE_ENV_VAR = 'DOTR_PROFILE';

// Lines of unchanged context kept around each diff hunk
export const DIFF_CONTEXT_LINES = 3;

// Version
export const VERSION = '0.4.0';

// CLI styling
export const BRAND = {
  name: 'dotr',
  tagline: 'Dotfiles, deployed granularly.',
  prefix: '◆',
};

export const BANNER = [
  '     _       _',
  '  __| | ___ | |_ _ __',
  " / _` |/ _ \\| __| '__|",
  '| (_| | (_) | |_| |',
  ' \\__,_|\\___/ \\__|_|',
].join('\n');
