/**
 * Single-shot yes/no confirmation for destructive operations.
 *
 * Reads one line and never re-prompts: a malformed answer fails the
 * operation, so a non-interactive input stream cannot loop forever.
 * @internal
 */
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { UserInputError } from '../errors.js';

const YES = 'y';
const NO = 'n';

/**
 * Streams used by confirm(); default to the process's stdin and stdout.
 */
export interface ConfirmIO {
  input?: Readable;
  output?: Writable;
}

/**
 * Signature of a confirmation gate, injectable for tests and non-TTY hosts.
 */
export type ConfirmFn = (prompt: string) => Promise<boolean>;

/**
 * Interprets a raw answer.
 *
 * Whitespace anywhere is dropped and the rest lowercased; only the first
 * character counts, so "Yes", " y " and "yup" all confirm.
 * @param raw - Line as typed, newline included or not
 * @throws {UserInputError} When the first character is neither "y" nor "n"
 */
export function parseConfirmation(raw: string): boolean {
  const answer = raw.replace(/\s+/g, '').toLowerCase().slice(0, 1);
  switch (answer) {
    case YES:
      return true;
    case NO:
      return false;
    default:
      throw new UserInputError(
        'Response must either be "y" for yes or "n" for no',
      );
  }
}

/**
 * Prints `<prompt> [y/n]`, reads one line and interprets it.
 *
 * End of input before any line counts as an empty answer.
 * @param prompt - Question to show
 * @param io - Streams to use instead of stdin/stdout
 * @throws {UserInputError} For anything but a yes or no answer
 */
export async function confirm(
  prompt: string,
  { input = process.stdin, output = process.stdout }: ConfirmIO = {},
): Promise<boolean> {
  output.write(`${prompt} [y/n]\n`);

  const rl = createInterface({ input, terminal: false });
  const answer = await new Promise<string>((resolve) => {
    rl.once('line', resolve);
    rl.once('close', () => resolve(''));
  });
  rl.close();

  return parseConfirmation(answer);
}
