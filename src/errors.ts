/**
 * Dotr Error Hierarchy
 *
 *   DotrError (base)
 *   ├── ConfigError
 *   │   ├── ConfigNotFoundError
 *   │   └── InvalidConfigError
 *   ├── ResolutionError
 *   │   ├── UnknownPackageError
 *   │   └── UnknownProfileError
 *   ├── RenderError
 *   ├── IoError
 *   ├── PromptAbortedError
 *   └── ActionError
 *
 * Config, resolution and prompt errors abort a command before any file is touched.
 * Render, I/O and action errors are recorded against a single unit.
 */

interface ErrorOptions {
  suggestion?: string;
  context?: Record<string, unknown>;
  cause?: unknown;
}

export class DotrError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Suggestion for how to fix the error */
  readonly suggestion?: string;

  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, options: ErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'DotrError';
    this.code = code;
    this.suggestion = options.suggestion;
    this.context = options.context;
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const lines = [`Error: ${this.message}`];
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`);
    }
    return lines.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends DotrError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when config.toml is missing from the repository root
 */
export class ConfigNotFoundError extends ConfigError {
  constructor(searchedPath: string) {
    super(`Config file not found: ${searchedPath}`, 'CONFIG_NOT_FOUND', {
      suggestion: 'Run "dotr init" to create a new repository',
      context: { searchedPath },
    });
    this.name = 'ConfigNotFoundError';
  }
}

/**
 * Thrown when config.toml or .uservariables.toml has invalid content
 */
export class InvalidConfigError extends ConfigError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'INVALID_CONFIG', options);
    this.name = 'InvalidConfigError';
  }
}

// =============================================================================
// Resolution Errors
// =============================================================================

export class ResolutionError extends DotrError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options);
    this.name = 'ResolutionError';
  }
}

export class UnknownPackageError extends ResolutionError {
  readonly packageName: string;

  constructor(packageName: string, requiredBy?: string) {
    super(
      requiredBy
        ? `Package '${packageName}' (required by '${requiredBy}') is not defined`
        : `Package '${packageName}' is not defined`,
      'UNKNOWN_PACKAGE',
      {
        suggestion: 'Check the [packages] section of config.toml',
        context: { packageName, requiredBy },
      }
    );
    this.name = 'UnknownPackageError';
    this.packageName = packageName;
  }
}

export class UnknownProfileError extends ResolutionError {
  readonly profileName: string;

  constructor(profileName: string, available: string[] = []) {
    super(`Profile '${profileName}' is not defined`, 'UNKNOWN_PROFILE', {
      suggestion: available.length > 0
        ? `Available profiles: ${available.join(', ')}`
        : 'No profiles are defined in config.toml',
      context: { profileName },
    });
    this.name = 'UnknownProfileError';
    this.profileName = profileName;
  }
}

// =============================================================================
// Per-unit Errors
// =============================================================================

export class RenderError extends DotrError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'RENDER_ERROR', options);
    this.name = 'RenderError';
  }
}

export class IoError extends DotrError {
  readonly path: string;

  constructor(message: string, filePath: string, cause?: unknown) {
    super(message, 'IO_ERROR', { cause, context: { path: filePath } });
    this.name = 'IoError';
    this.path = filePath;
  }
}

export class PromptAbortedError extends DotrError {
  constructor(key: string, reason: string) {
    super(`Prompt for '${key}' aborted: ${reason}`, 'PROMPT_ABORTED', {
      suggestion: `Run interactively, or set ${key} in .uservariables.toml`,
      context: { key },
    });
    this.name = 'PromptAbortedError';
  }
}

export class ActionError extends DotrError {
  readonly exitCode: number | null;

  constructor(action: string, exitCode: number | null, output?: string) {
    super(
      `Action '${action}' failed with exit code ${exitCode ?? 'unknown'}`,
      'ACTION_FAILED',
      { context: { action, exitCode, output } }
    );
    this.name = 'ActionError';
    this.exitCode = exitCode;
  }
}

/**
 * Wrap anything thrown by fs into an IoError tied to a path
 */
export function toIoError(err: unknown, filePath: string, verb: string): DotrError {
  if (err instanceof DotrError) {
    return err;
  }
  const reason = err instanceof Error ? err.message : String(err);
  return new IoError(`Failed to ${verb} ${filePath}: ${reason}`, filePath, err);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
