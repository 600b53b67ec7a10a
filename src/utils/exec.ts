import { spawn } from 'node:child_process';

import { CommandFailedError } from '../errors';
import { type Logger } from '../logger';

export type ExecOptions = {
  /** Working directory of the child process. */
  cwd?: string;

  /** Extra environment variables, merged over the current process environment. */
  env?: Record<string, string | undefined>;

  /** Kill the child process when it runs for longer than this. */
  timeoutMs?: number;

  /** Logger that receives each line of output at debug level. */
  logger?: Logger;
};

export type ExecResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

/** Runs a command; injected wherever a subprocess is needed so that tests can replace it. */
export type CommandRunner = (command: string, args: string[], options?: ExecOptions) => Promise<ExecResult>;

/**
 * Run a command without a shell and capture its output.
 * Resolves with the exit code, whatever it is; rejects when the command cannot be started,
 * is killed by a signal, or exceeds the timeout.
 */
export const exec: CommandRunner = (command, args, options = {}) => {
  const { cwd, env, timeoutMs, logger } = options;

  return new Promise<ExecResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd,
      env: { ...process.env, ...env },
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;

    const timer =
      timeoutMs && timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            child.kill('SIGKILL');
          }, timeoutMs)
        : undefined;

    // decoded by the stream so that characters split across chunks stay intact
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (text: string) => {
      stdout += text;
      logLines(logger, command, text);
    });
    child.stderr.on('data', (text: string) => {
      stderr += text;
      logLines(logger, command, text);
    });

    child.on('error', (e) => {
      clearTimeout(timer);
      reject(new CommandFailedError(`Failed to start '${command}': ${e.message}`, command, null));
    });

    child.on('close', (code, signal) => {
      clearTimeout(timer);
      if (timedOut) {
        reject(new CommandFailedError(`'${command}' timed out after ${timeoutMs}ms`, command, null, stderr));
      } else if (code === null) {
        reject(new CommandFailedError(`'${command}' was killed by signal ${signal}`, command, null, stderr));
      } else {
        resolve({ exitCode: code, stdout, stderr });
      }
    });
  });
};

function logLines(logger: Logger | undefined, command: string, text: string): void {
  if (!logger) return;
  text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line)
    .forEach((line) => logger.debug({ command }, line));
}
