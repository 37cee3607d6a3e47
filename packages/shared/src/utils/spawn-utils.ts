import type { SpawnOptions } from 'node:child_process';

import { spawn } from 'node:child_process';

/**
 * Result of a spawn operation
 */
export interface SpawnResult {
  stdout: string;
  stderr: string;
  code: number;
}

/**
 * Extended spawn options with output capture control
 */
export interface SpawnAsyncOptions extends SpawnOptions {
  /**
   * Whether to capture stdout (default: true)
   */
  captureStdout?: boolean;

  /**
   * Whether to capture stderr (default: true)
   */
  captureStderr?: boolean;

  /**
   * Kill the process and reject once this many milliseconds have passed
   */
  timeoutMs?: number;
}

/**
 * SpawnTimeoutError
 *
 * Thrown when a spawned command exceeds its `timeoutMs`.
 */
export class SpawnTimeoutError extends Error {
  constructor(
    readonly command: string,
    readonly timeoutMs: number,
  ) {
    super(`Command "${command}" timed out after ${timeoutMs}ms`);
    this.name = 'SpawnTimeoutError';
  }
}

/**
 * Execute a command asynchronously and return the result
 *
 * Output is buffered as raw bytes and decoded as UTF-8 once the process
 * closes, so multi-byte characters split across chunks stay intact.
 *
 * @example
 * ```typescript
 * const result = await spawnAsync('pdfinfo', ['book.pdf'], { timeoutMs: 30000 });
 * console.log(result.stdout);
 * ```
 */
export function spawnAsync(
  command: string,
  args: string[],
  options: SpawnAsyncOptions = {},
): Promise<SpawnResult> {
  const {
    captureStdout = true,
    captureStderr = true,
    timeoutMs,
    ...spawnOptions
  } = options;

  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, spawnOptions);

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let settled = false;

    const toBuffer = (data: Buffer | string): Buffer =>
      Buffer.isBuffer(data) ? data : Buffer.from(data);

    if (captureStdout && proc.stdout) {
      proc.stdout.on('data', (data: Buffer | string) => {
        stdoutChunks.push(toBuffer(data));
      });
    }

    if (captureStderr && proc.stderr) {
      proc.stderr.on('data', (data: Buffer | string) => {
        stderrChunks.push(toBuffer(data));
      });
    }

    const timer =
      timeoutMs !== undefined
        ? setTimeout(() => {
            settled = true;
            proc.kill();
            reject(new SpawnTimeoutError(command, timeoutMs));
          }, timeoutMs)
        : undefined;

    proc.on('close', (code: number | null) => {
      clearTimeout(timer);
      if (settled) return;
      settled = true;
      resolve({
        stdout: Buffer.concat(stdoutChunks).toString('utf8'),
        stderr: Buffer.concat(stderrChunks).toString('utf8'),
        code: code ?? 0,
      });
    });

    proc.on('error', (error: Error) => {
      clearTimeout(timer);
      if (settled) return;
      settled = true;
      reject(error);
    });
  });
}
