import { CliIO } from './console.io';

/** Raised when the user ends input (Ctrl-D / Ctrl-C) in the middle of a prompt. */
export class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
  }
}

export interface NumberPromptOptions {
  integer?: boolean;
  /** Value returned for an empty answer; without it an answer is required. */
  defaultValue?: number;
}

/**
 * Prompt helpers for the menus.
 * Input errors are handled here by re-prompting; they never reach the services.
 */
export class Prompter {
  constructor(private readonly io: CliIO) {}

  /** Trimmed answer, possibly empty. */
  async text(question: string): Promise<string> {
    const answer = await this.io.ask(question);
    if (answer === null) {
      throw new InputClosedError();
    }
    return answer.trim();
  }

  async required(question: string, label: string): Promise<string> {
    for (;;) {
      const answer = await this.text(question);
      if (answer !== '') {
        return answer;
      }
      this.io.print(`ERROR: ${label} cannot be empty.`);
    }
  }

  /** Re-prompts until the answer parses as a non-negative number (an integer when asked). */
  async number(question: string, label: string, options: NumberPromptOptions = {}): Promise<number> {
    for (;;) {
      const answer = await this.text(question);

      if (answer === '' && options.defaultValue !== undefined) {
        return options.defaultValue;
      }

      const normalized = answer.replace(/[$,]/g, '');
      const value = normalized === '' ? Number.NaN : Number(normalized);

      if (!Number.isFinite(value) || value < 0) {
        this.io.print(`ERROR: ${label} must be a non-negative number.`);
      } else if (options.integer && !Number.isInteger(value)) {
        this.io.print(`ERROR: ${label} must be a whole number.`);
      } else {
        return value;
      }
    }
  }

  async choice<T extends string>(question: string, choices: readonly T[]): Promise<T> {
    for (;;) {
      const answer = await this.text(question);
      const selected = choices.find((choice) => choice === answer);
      if (selected !== undefined) {
        return selected;
      }
      this.io.print(`ERROR: Invalid choice. Please enter ${choices.join(', ')}.`);
    }
  }

  async confirm(question: string): Promise<boolean> {
    for (;;) {
      const answer = (await this.text(`${question} (y/n): `)).toLowerCase();
      if (answer === 'y' || answer === 'yes') {
        return true;
      }
      if (answer === 'n' || answer === 'no') {
        return false;
      }
      this.io.print("Please enter 'y' or 'n'.");
    }
  }
}
