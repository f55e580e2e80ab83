import { createInterface } from 'readline/promises';
import { Writable } from 'stream';
import { InterruptedError } from '../errors';

export interface Prompter {
  ask(question: string): Promise<string>;
  /** Ask without echoing the answer (passwords). */
  askHidden(question: string): Promise<string>;
  close(): void;
}

/**
 * readline-backed prompter. Aborting `signal` (or Ctrl-C while a question is open) rejects the
 * pending question with `InterruptedError`.
 */
export function createPrompter(
  signal: AbortSignal,
  onInterrupt: () => void,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompter {
  let muted = false;
  // readline echoes typed characters through its output; drop them while muted.
  const sink = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      if (!muted) output.write(chunk);
      callback();
    },
  });
  const rl = createInterface({ input, output: sink, terminal: Boolean(process.stdin.isTTY) });
  rl.on('SIGINT', onInterrupt);

  async function question(text: string): Promise<string> {
    try {
      const answer = await rl.question(text, { signal });
      return answer.trim();
    } catch (err) {
      if (signal.aborted) throw new InterruptedError();
      throw err;
    }
  }

  return {
    ask: question,
    async askHidden(text: string): Promise<string> {
      output.write(text);
      muted = true;
      try {
        return await question('');
      } finally {
        muted = false;
        output.write('\n');
      }
    },
    close: () => rl.close(),
  };
}
