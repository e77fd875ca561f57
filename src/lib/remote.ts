import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';

export interface ExecOptions {
  signal?: AbortSignal;
}

export interface ExecOutput {
  exitCode: number;
  stdout: string;
  stderr: string;
}

// An already-established remote shell. Connecting and authenticating happen elsewhere.
export interface RemoteSession {
  readonly host: string;
  readonly isConnected: boolean;
  exec(command: string, options: ExecOptions): Promise<ExecOutput>;
}

export interface CommandResult {
  readonly exitCode: number;
  readonly output: string;
  readonly error: string;
  readonly elapsedSeconds: number;
}

export interface RunOptions {
  signal?: AbortSignal;
  logger?: Logger;
}

export const FAILED_EXIT_CODE = -1;

export class CommandCancelledError extends Error {
  constructor() {
    super('Command cancelled');
    this.name = 'CommandCancelledError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Reject as soon as the signal fires instead of waiting for the remote side
function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CommandCancelledError());
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

// Run one command on the session. Never throws: every failure comes back
// as exit code -1 with the reason in `error`.
export async function runRemoteCommand(
  session: RemoteSession | null | undefined,
  command: string,
  options: RunOptions = {}
): Promise<CommandResult> {
  const logger = options.logger ?? silentLogger;
  const { signal } = options;

  logger.debug(`Executing remote command: ${command}`);
  const startedAt = performance.now();
  const elapsed = () => (performance.now() - startedAt) / 1000;

  try {
    if (!session || !session.isConnected) {
      throw new Error('Remote session is not connected');
    }
    if (signal?.aborted) {
      throw new CommandCancelledError();
    }

    const result = await abortable(session.exec(command, { signal }), signal);
    const elapsedSeconds = elapsed();

    logger.debug(
      `Remote command completed in ${elapsedSeconds.toFixed(1)}s, exit code: ${result.exitCode}`
    );
    if (result.exitCode !== 0) {
      logger.debug(`Remote command stderr: ${result.stderr}`);
    }

    return {
      exitCode: result.exitCode,
      output: result.stdout,
      error: result.stderr,
      elapsedSeconds,
    };
  } catch (error) {
    const elapsedSeconds = elapsed();
    const message = errorMessage(error);
    logger.debug(`Remote command failed in ${elapsedSeconds.toFixed(1)}s: ${message}`);

    return { exitCode: FAILED_EXIT_CODE, output: '', error: message, elapsedSeconds };
  }
}
