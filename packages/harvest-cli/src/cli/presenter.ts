import type { Presenter } from './types';

/**
 * Anything text can be written to; `process.stdout` and `process.stderr` qualify
 */
export interface TextSink {
  write(text: string): unknown;
}

/**
 * Presenter over two sinks, by default the process' own streams
 */
export function createConsolePresenter(
  stdout: TextSink = process.stdout,
  stderr: TextSink = process.stderr
): Presenter {
  return {
    write: text => {
      stdout.write(`${text}\n`);
    },
    error: text => {
      stderr.write(`${text}\n`);
    },
    json: data => {
      stdout.write(`${JSON.stringify(data, null, 2)}\n`);
    },
  };
}
