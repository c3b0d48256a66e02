import { describe, it, expect } from 'vitest';
import { Readable, Writable } from 'node:stream';
import { confirm, parseConfirmation } from '../../util/confirm.js';
import { UserInputError } from '../../errors.js';

function captureOutput(): { output: Writable; written: () => string } {
  const chunks: string[] = [];
  const output = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { output, written: () => chunks.join('') };
}

describe('parseConfirmation', () => {
  it.each(['y', 'Y', 'yes', ' YES \n', 'y e s', 'yup'])('should accept %j', (raw) => {
    expect(parseConfirmation(raw)).toBe(true);
  });

  it.each(['n', 'NO', '  no\r\n', 'nope'])('should decline %j', (raw) => {
    expect(parseConfirmation(raw)).toBe(false);
  });

  it.each(['', '   ', 'maybe', 'ok', '1'])('should reject %j', (raw) => {
    expect(() => parseConfirmation(raw)).toThrow(
      new UserInputError('Response must either be "y" for yes or "n" for no'),
    );
  });
});

describe('confirm', () => {
  it('should print the prompt with the answer choices', async () => {
    const { output, written } = captureOutput();

    await confirm('Delete it?', { input: Readable.from(['y\n']), output });

    expect(written()).toBe('Delete it? [y/n]\n');
  });

  it('should read only the first line', async () => {
    const { output } = captureOutput();

    const result = await confirm('Delete it?', {
      input: Readable.from(['no\nyes\n']),
      output,
    });

    expect(result).toBe(false);
  });

  it('should accept a final line without a newline', async () => {
    const { output } = captureOutput();

    const result = await confirm('Delete it?', { input: Readable.from(['Yes']), output });

    expect(result).toBe(true);
  });

  it('should fail without re-prompting on a malformed answer', async () => {
    const { output, written } = captureOutput();

    await expect(
      confirm('Delete it?', { input: Readable.from(['maybe\ny\n']), output }),
    ).rejects.toThrow(UserInputError);
    expect(written()).toBe('Delete it? [y/n]\n');
  });

  it('should treat end of input as an empty answer', async () => {
    const { output } = captureOutput();

    await expect(
      confirm('Delete it?', { input: Readable.from([]), output }),
    ).rejects.toThrow(UserInputError);
  });
});
