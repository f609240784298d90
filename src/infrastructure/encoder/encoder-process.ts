import { spawn } from 'node:child_process';

import { splitLines } from './ffmpeg-progress.js';

export type EncoderExit =
  | { readonly kind: 'exited'; readonly code: number | null; readonly signal: NodeJS.Signals | null }
  | { readonly kind: 'spawn-failed'; readonly error: NodeJS.ErrnoException };

export interface EncoderProcess {
  /** Diagnostic output, one status line at a time. Ends when the pipe closes. */
  readonly diagnostics: AsyncIterable<string>;
  /** Never rejects; spawn failures are reported as a value. */
  readonly exit: Promise<EncoderExit>;
}

export type EncoderProcessRunner = (binary: string, args: readonly string[]) => EncoderProcess;

export const spawnEncoderProcess: EncoderProcessRunner = (binary, args) => {
  const child = spawn(binary, [...args], { stdio: ['ignore', 'ignore', 'pipe'] });

  const exit = new Promise<EncoderExit>((resolve) => {
    child.once('error', (error: NodeJS.ErrnoException) => {
      resolve({ kind: 'spawn-failed', error });
    });
    child.once('close', (code, signal) => {
      resolve({ kind: 'exited', code, signal });
    });
  });

  child.stderr.setEncoding('utf8');

  return {
    diagnostics: splitLines(readText(child.stderr)),
    exit,
  };
};

async function* readText(stream: NodeJS.ReadableStream): AsyncGenerator<string> {
  for await (const chunk of stream) {
    yield typeof chunk === 'string' ? chunk : chunk.toString('utf8');
  }
}
