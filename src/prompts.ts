/**
 * Interactive questions asked during a run, and parsing of the answers
 */

import { createInterface, Interface } from 'readline';
import { KeepIndexPrompt } from './types.js';

export interface DirectorySelection {
  selected: string[];
  /** Tokens that were not a valid 1-based index */
  invalid: string[];
}

/**
 * Parse a comma separated list of 1-based indices, e.g. "1,3,4"
 */
export function parseDirectorySelection(input: string, directories: readonly string[]): DirectorySelection {
  const selected: string[] = [];
  const invalid: string[] = [];

  for (const raw of input.split(',')) {
    const token = raw.trim();
    if (!token) continue;

    const index = /^\d+$/.test(token) ? Number.parseInt(token, 10) : NaN;
    if (!Number.isInteger(index) || index < 1 || index > directories.length) {
      invalid.push(token);
      continue;
    }

    const directory = directories[index - 1];
    if (!selected.includes(directory)) {
      selected.push(directory);
    }
  }

  return { selected, invalid };
}

export function parseYesNo(input: string, defaultAnswer: boolean): boolean {
  const answer = input.trim().toLowerCase();
  if (answer === 'y' || answer === 'yes') return true;
  if (answer === 'n' || answer === 'no') return false;
  return defaultAnswer;
}

/**
 * Anything that is not an integer counts as 0, i.e. skip
 */
export function parseKeepIndex(input: string): number {
  const answer = input.trim();
  return /^-?\d+$/.test(answer) ? Number.parseInt(answer, 10) : 0;
}

/**
 * Line-based question/answer over a readable stream. Lines that arrive
 * before a question is asked are buffered, so piped answers work too.
 */
export class Prompter {
  private rl: Interface;
  private lines: AsyncIterator<string>;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = createInterface({ input, terminal: false });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  say(text: string): void {
    this.output.write(`${text}\n`);
  }

  /**
   * Resolves with the trimmed answer, or '' once input has ended
   */
  async ask(question: string): Promise<string> {
    this.output.write(question);
    const next = await this.lines.next();
    return next.done ? '' : String(next.value).trim();
  }

  async confirm(question: string, defaultAnswer: boolean): Promise<boolean> {
    const hint = defaultAnswer ? '[Y/n]' : '[y/N]';
    return parseYesNo(await this.ask(`${question} ${hint}: `), defaultAnswer);
  }

  close(): void {
    this.rl.close();
  }
}

export function createKeepIndexPrompt(prompter: Prompter): KeepIndexPrompt {
  return async (candidates, fingerprint) => {
    prompter.say(`\nFound duplicates with hash ${fingerprint} in selected directories:`);
    candidates.forEach((path, i) => prompter.say(`${i + 1}) ${path}`));
    const answer = await prompter.ask(
      'Please select the file number to KEEP (others will be deleted), or 0 to skip deletion: '
    );
    return parseKeepIndex(answer);
  };
}
