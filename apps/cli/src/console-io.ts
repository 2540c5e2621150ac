import { stdin, stdout } from 'node:process';
import { createInterface } from 'node:readline/promises';
import type { MenuIO } from './menu.js';

export interface ConsoleIO extends MenuIO {
  close(): void;
}

export function createConsoleIO(): ConsoleIO {
  const rl = createInterface({ input: stdin, output: stdout });
  let closed = false;
  const whenClosed = new Promise<null>((resolve) => {
    rl.once('close', () => {
      closed = true;
      resolve(null);
    });
  });

  return {
    ask: async (question) => {
      if (closed) return null;

      const answer = rl.question(question).catch((error: unknown) => {
        if (closed) return null;
        throw error;
      });
      return Promise.race([answer, whenClosed]);
    },
    print: (line) => {
      stdout.write(`${line}\n`);
    },
    close: () => rl.close(),
  };
}
