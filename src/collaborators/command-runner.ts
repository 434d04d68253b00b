import { spawn } from 'node:child_process';

export const COMMAND_RUNNER = 'COMMAND_RUNNER';

const MAX_CAPTURE_CHARS = 256 * 1024;
const KILL_GRACE_MS = 5000;

export interface CommandResult {
  status: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  allowFailure?: boolean;
  timeout?: number;
  env?: NodeJS.ProcessEnv;
}

export type CommandRunner = (binary: string, args: string[], options?: CommandOptions) => Promise<CommandResult>;

export class CommandFailedError extends Error {
  constructor(
    readonly binary: string,
    readonly args: string[],
    readonly result: CommandResult,
  ) {
    const reason = result.timedOut ? 'timed out' : `failed (${result.status})`;
    super(`${binary} ${args.join(' ')} ${reason}: ${result.stderr || result.stdout}`.trim());
    this.name = 'CommandFailedError';
  }
}

function appendTail(current: string, chunk: string): string {
  const next = current + chunk;
  return next.length > MAX_CAPTURE_CHARS ? next.slice(next.length - MAX_CAPTURE_CHARS) : next;
}

function isErrno(error: unknown, code: string): boolean {
  return error instanceof Error && (error as NodeJS.ErrnoException).code === code;
}

/**
 * Runs a binary without a shell and collects its output.
 *
 * The child leads its own process group. A timeout sends SIGTERM to the whole
 * group, then SIGKILL after a short grace period, and marks the result
 * `timedOut`; the run settles once the child exits even if a background
 * process still holds its output pipes. Unless `allowFailure` is set, a
 * non-zero exit or a timeout rejects with {@link CommandFailedError}.
 */
export const runCommand: CommandRunner = (binary, args, options = {}) =>
  new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(binary, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: true,
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let exitCode: number | null | undefined;
    let settled = false;
    
    const killGroup = (signal: NodeJS.Signals) => {
      if (child.pid === undefined) {
        return;
      }
      try {
        process.kill(-child.pid, signal);
      } catch (error) {
        if (!isErrno(error, 'ESRCH')) {
          child.kill(signal);
        }
      }
    };

    const finish = (code: number | null) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);

      const result: CommandResult = { status: code ?? 1, stdout, stderr, timedOut };
      if (!options.allowFailure && (timedOut || result.status !== 0)) {
        reject(new CommandFailedError(binary, args, result));
        return;
      }
      resolve(result);
    };

    const abandonPipes = () => {
      child.stdout.destroy();
      child.stderr.destroy();
      finish(exitCode ?? null);
    };

    const timer =
      options.timeout && options.timeout > 0
        ? setTimeout(() => {
            timedOut = true;
            killGroup('SIGTERM');
            setTimeout(() => killGroup('SIGKILL'), KILL_GRACE_MS).unref();
            if (exitCode !== undefined) {
              abandonPipes();
            }
          }, options.timeout)
        : undefined;

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout = appendTail(stdout, chunk);
    });
    child.stderr.on('data', (chunk: string) => {
      stderr = appendTail(stderr, chunk);
    });

    child.on('error', (error) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      reject(error);
    });

    child.on('exit', (code) => {
      exitCode = code;
      if (timedOut) {
        abandonPipes();
      }
    });

    child.on('close', (code) => {
      finish(code);
    });
  });
