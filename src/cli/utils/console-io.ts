/**
 * Console input/output for interactive commands.
 *
 * Commands talk to the user through {@link ConsoleIO} only, so tests can
 * drive them with scripted answers instead of a terminal.
 */

import * as readline from 'readline';

/**
 * Output half of {@link ConsoleIO}; enough for non-interactive commands.
 */
export interface Printer {
  /** Prints one line (or several, separated by newlines). */
  print(text: string): void;
}

/** {@link Printer} writing to stdout via console.log. */
export const consolePrinter: Printer = {
  print(text) {
    console.log(text);
  },
};

export interface ConsoleIO extends Printer {
  /**
   * Asks a question and resolves with the answer, or null once input has
   * ended (Ctrl+D or a closed pipe).
   */
  prompt(question: string): Promise<string | null>;
  /** Releases the underlying input stream. */
  close(): void;
}

/**
 * {@link ConsoleIO} on top of Node's readline and stdout.
 */
export function createReadlineIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): ConsoleIO {
  const rl = readline.createInterface({ input, output, terminal: false });
  // Lines that arrive before anyone asks are kept for the next prompt.
  const buffered: string[] = [];
  const waiting: ((answer: string | null) => void)[] = [];
  let closed = false;

  rl.on('line', (line: string) => {
    const resolve = waiting.shift();
    if (resolve) {
      resolve(line);
    } else {
      buffered.push(line);
    }
  });

  rl.on('close', () => {
    closed = true;
    for (const resolve of waiting.splice(0)) {
      resolve(null);
    }
  });

  return {
    print(text) {
      output.write(`${text}\n`);
    },
    prompt(question) {
      output.write(question);
      const next = buffered.shift();
      if (next !== undefined) {
        return Promise.resolve(next);
      }
      if (closed) {
        return Promise.resolve(null);
      }
      return new Promise((resolve) => {
        waiting.push(resolve);
      });
    },
    close() {
      rl.close();
    },
  };
}
