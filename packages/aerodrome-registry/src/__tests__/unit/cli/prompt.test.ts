import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { PromptSession, isAffirmative } from '../../../cli/lib/prompt.js';
import { parseBackupName, type BackupEntry } from '../../../release/backups.js';

function streams(input: string) {
  const stdin = new PassThrough();
  const stdout = new PassThrough();
  let written = '';
  stdout.on('data', (chunk: Buffer) => {
    written += chunk.toString();
  });
  stdin.end(input);
  return { input: stdin, output: stdout, written: () => written };
}

const BACKUPS = ['aerodromes_backup_20261019_100000.json', 'aerodromes_backup_20261018_100000.json']
  .map((name) => parseBackupName('/backups', name))
  .filter((entry): entry is BackupEntry => entry !== null);

describe('prompts', () => {
  it.each([
    ['y', true],
    [' YES ', true],
    ['yes please', false],
    ['n', false],
    ['', false],
  ])('isAffirmative(%j) is %s', (answer, expected) => {
    expect(isAffirmative(answer)).toBe(expected);
  });

  it('asks a yes/no question', async () => {
    const io = streams('yes\n');
    const session = new PromptSession(io);

    await expect(session.confirm('Promote?')).resolves.toBe(true);
    expect(io.written()).toBe('Promote? (yes/no): ');
    session.close();
  });

  it('lists backups before asking for a selection', async () => {
    const io = streams('2\n');
    const session = new PromptSession(io);

    await expect(session.choose(BACKUPS)).resolves.toBe('2');
    expect(io.written()).toBe(
      'Available backups:\n' +
        '  1. aerodromes_backup_20261019_100000.json\n' +
        '  2. aerodromes_backup_20261018_100000.json\n' +
        "\nSelect backup to restore (1-2, or 'cancel'): "
    );
    session.close();
  });

  it('answers consecutive questions from one piped stream', async () => {
    const session = new PromptSession(streams('1\nyes\n'));

    await expect(session.choose(BACKUPS)).resolves.toBe('1');
    await expect(session.confirm('Restore production?')).resolves.toBe(true);
    session.close();
  });

  it('treats exhausted input as no answer', async () => {
    const session = new PromptSession(streams('1\n'));

    await expect(session.ask('first? ')).resolves.toBe('1');
    await expect(session.ask('second? ')).resolves.toBeNull();
    await expect(session.confirm('third?')).resolves.toBe(false);
    session.close();
  });
});
