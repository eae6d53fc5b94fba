/**
 * Interactive prompts for release and rollback
 *
 * One `PromptSession` serves every question a command asks. Input lines are
 * read through a single readline interface and queued, so answers piped in
 * ahead of their questions are not lost. The interface is opened on the
 * first question and must be closed when the command finishes.
 *
 * @module cli/lib/prompt
 */

import { createInterface, type Interface } from 'node:readline';
import type { BackupEntry } from '../../release/backups.js';
import type { ChooseFn, ConfirmFn } from '../../release/release-controller.js';

export interface PromptStreams {
  readonly input: NodeJS.ReadableStream;
  readonly output: NodeJS.WritableStream;
}

const defaultStreams = (): PromptStreams => ({ input: process.stdin, output: process.stdout });

/**
 * `y` or `yes`, any case, surrounding whitespace ignored
 */
export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}

export class PromptSession {
  private readonly streams: PromptStreams;
  private rl: Interface | null = null;
  private lines: AsyncIterableIterator<string> | null = null;

  constructor(streams?: PromptStreams) {
    this.streams = streams ?? defaultStreams();
  }

  /**
   * Write the question and wait for the next input line; null once input has ended
   */
  async ask(question: string): Promise<string | null> {
    if (!this.lines) {
      this.rl = createInterface({ input: this.streams.input, terminal: false });
      this.lines = this.rl[Symbol.asyncIterator]();
    }

    this.streams.output.write(question);
    const next = await this.lines.next();
    return next.done ? null : next.value;
  }

  readonly confirm: ConfirmFn = async (message) => {
    const answer = await this.ask(`${message} (yes/no): `);
    return answer !== null && isAffirmative(answer);
  };

  /** Numbered backup list followed by a selection question */
  readonly choose: ChooseFn = async (backups: readonly BackupEntry[]) => {
    this.streams.output.write('Available backups:\n');
    backups.forEach((backup, index) => {
      this.streams.output.write(`  ${index + 1}. ${backup.fileName}\n`);
    });
    return this.ask(`\nSelect backup to restore (1-${backups.length}, or 'cancel'): `);
  };

  close(): void {
    this.rl?.close();
    this.rl = null;
    this.lines = null;
  }
}
