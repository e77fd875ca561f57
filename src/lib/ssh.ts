import { execa } from 'execa';
import type { ExecOptions, ExecOutput, RemoteSession } from './remote.js';
import { CommandCancelledError, FAILED_EXIT_CODE } from './remote.js';

export interface SshTarget {
  host: string;
  user?: string;
  port?: number;
  identityFile?: string;
  connectTimeoutSeconds?: number;
}

export interface SshRunResult {
  exitCode?: number;
  stdout: string;
  stderr: string;
  isCanceled: boolean;
}

// Runs the local ssh client with the given arguments
export type SshRunner = (
  args: string[],
  options: { signal?: AbortSignal; reject: boolean }
) => Promise<SshRunResult>;

export const execaSshRunner: SshRunner = async (args, options) => {
  const result = await execa('ssh', args, {
    reject: options.reject,
    signal: options.signal,
  });
  return {
    exitCode: result.exitCode,
    stdout: result.stdout,
    stderr: result.stderr,
    isCanceled: result.isCanceled,
  };
};

// RemoteSession backed by the local OpenSSH client
export class SshSession implements RemoteSession {
  private connected = false;

  constructor(
    private readonly target: SshTarget,
    private readonly run: SshRunner = execaSshRunner
  ) {}

  get host(): string {
    return this.target.host;
  }

  get isConnected(): boolean {
    return this.connected;
  }

  sshArgs(): string[] {
    const { host, user, port = 22, identityFile, connectTimeoutSeconds = 10 } = this.target;
    const args = [
      '-o',
      'BatchMode=yes',
      '-o',
      `ConnectTimeout=${connectTimeoutSeconds}`,
      '-p',
      String(port),
    ];
    if (identityFile) {
      args.push('-i', identityFile);
    }
    args.push(user ? `${user}@${host}` : host);
    return args;
  }

  // Throws if the host cannot be reached or rejects our credentials
  async connect(signal?: AbortSignal): Promise<void> {
    await this.run([...this.sshArgs(), 'true'], { signal, reject: true });
    this.connected = true;
  }

  close(): void {
    this.connected = false;
  }

  async exec(command: string, options: ExecOptions): Promise<ExecOutput> {
    const result = await this.run([...this.sshArgs(), command], {
      signal: options.signal,
      reject: false,
    });

    if (result.isCanceled) {
      throw new CommandCancelledError();
    }

    // exitCode is missing when ssh itself could not be spawned
    return {
      exitCode: result.exitCode ?? FAILED_EXIT_CODE,
      stdout: result.stdout,
      stderr: result.stderr,
    };
  }
}
