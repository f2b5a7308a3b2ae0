/**
 * Prompt Utilities
 * Interactive prompts for CLI
 */

import inquirer from 'inquirer';
import { PromptAbortedError, errorMessage } from '../errors.js';
import type { LineReader } from '../services/uservariables.js';

/**
 * Ask for a prompt variable on the terminal. Fails instead of blocking
 * when stdin is not interactive.
 */
export const promptLine: LineReader = async (key, message) => {
  if (!process.stdin.isTTY) {
    throw new PromptAbortedError(key, 'stdin is not a terminal');
  }

  try {
    const { answer } = await inquirer.prompt<{ answer: string }>([
      {
        type: 'input',
        name: 'answer',
        message: message || `Value for ${key}:`,
      },
    ]);
    return answer;
  } catch (err) {
    throw new PromptAbortedError(key, errorMessage(err));
  }
};

