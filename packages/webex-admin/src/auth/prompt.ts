import { createInterface } from 'readline/promises';
import { Readable, Writable } from 'stream';
import type { ProxyCredentials } from '../api/types';

export type Ask = (question: string) => Promise<string>;

export interface PromptOptions {
  input?: Readable;
  output?: Writable;
  /** Suppresses the echo of what is typed after the question. */
  hidden?: boolean;
}

export function createPrompt(options: PromptOptions = {}): Ask {
  return async question => {
    const input = options.input ?? process.stdin;
    const output = options.output ?? process.stdout;

    let muted = false;
    const sink = new Writable({
      write(chunk: Buffer | string, _encoding, callback) {
        if (!muted) output.write(chunk);
        callback();
      },
    });

    const rl = createInterface({ input, output: sink, terminal: true });
    const answer = rl.question(question);
    muted = options.hidden ?? false;
    try {
      return await answer;
    } finally {
      rl.close();
      if (muted) output.write('\n');
    }
  };
}

export const askQuestion: Ask = createPrompt();

export const askSecret: Ask = createPrompt({ hidden: true });

export async function promptProxyCredentials(
  ask: Ask = askQuestion,
  secret: Ask = askSecret,
): Promise<ProxyCredentials> {
  const username = (await ask('Proxy username: ')).trim();
  const password = await secret('Proxy password: ');
  return { username, password };
}
