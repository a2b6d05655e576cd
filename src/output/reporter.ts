import type { ChalkInstance } from 'chalk';
import { FormatError, QueryJsonError, errorMessage } from '../errors.js';

export interface TextSink {
  write(text: string): Promise<void>;
}

export function streamSink(stream: NodeJS.WritableStream): TextSink {
  return {
    write: (text) => new Promise<void>((resolve, reject) => {
      stream.write(text, (err) => (err ? reject(err) : resolve()));
    }),
  };
}

// Collects everything written; used by tests and for buffering help output.
export class MemorySink implements TextSink {
  text = '';

  async write(text: string): Promise<void> {
    this.text += text;
  }
}

/**
 * Owns the two output streams. stdout only ever receives the result (or the
 * version banner / help), stderr one diagnostic line or the usage text.
 */
export class Reporter {
  constructor(private io: { stdout: TextSink; stderr: TextSink; chalk: ChalkInstance }) {}

  async result(text: string): Promise<void> {
    try {
      await this.io.stdout.write(text);
    } catch (err) {
      throw new FormatError(errorMessage(err));
    }
  }

  async error(err: unknown): Promise<void> {
    const { chalk } = this.io;
    const line = err instanceof QueryJsonError
      ? `${chalk.red(err.prefix)}: ${err.message}`
      : `${chalk.red('Error')}: ${errorMessage(err)}`;
    await this.io.stderr.write(line + '\n');
  }

  async usage(text: string): Promise<void> {
    await this.io.stderr.write(text);
  }
}
