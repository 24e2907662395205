/**
 * Command Executor - runs the helm CLI and host probes (lscpu, free)
 *
 * A binary missing from PATH surfaces as DependencyMissingError. Output past
 * OUTPUT_LIMIT_BYTES aborts the command with an InternalError.
 */

import { spawn } from 'node:child_process';
import type { Logger } from 'pino';
import { DEFAULT_TIMEOUTS } from '../config/defaults';
import { DependencyMissingError, InternalError } from '../errors';

export interface CommandOptions {
  /** Milliseconds before the command is terminated; 0 disables the limit */
  timeout?: number;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut?: boolean;
}

/**
 * Seam used by the helm client and host detection; tests substitute a fake.
 */
export interface CommandRunner {
  execute(command: string, args?: string[], options?: CommandOptions): Promise<CommandResult>;
  isAvailable(command: string): Promise<boolean>;
}

export const OUTPUT_LIMIT_BYTES = 10 * 1024 * 1024;
const KILL_GRACE_MS = 5000;

/**
 * Classify an error emitted by `spawn` itself (the command never ran)
 */
export function toSpawnError(command: string, error: Error): Error {
  const code = 'code' in error ? error.code : undefined;
  if (code === 'ENOENT') {
    return new DependencyMissingError(`${command} not found on PATH`, command);
  }
  if (code === 'EACCES') {
    return new DependencyMissingError(`${command} is not executable`, command);
  }
  return new InternalError(`Could not run ${command}: ${error.message}`, error);
}

export class CommandExecutor implements CommandRunner {
  constructor(private readonly logger: Logger) {}

  async execute(
    command: string,
    args: string[] = [],
    options: CommandOptions = {},
  ): Promise<CommandResult> {
    const timeout = options.timeout ?? DEFAULT_TIMEOUTS.command;
    this.logger.debug({ command, args, timeout }, 'Executing command');

    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let received = 0;
      let timedOut = false;
      let settled = false;

      const child = spawn(command, args, { shell: false });

      const timer =
        timeout > 0
          ? setTimeout(() => {
              timedOut = true;
              child.kill('SIGTERM');
              setTimeout(() => {
                if (child.exitCode === null && child.signalCode === null) {
                  child.kill('SIGKILL');
                }
              }, KILL_GRACE_MS).unref();
            }, timeout)
          : undefined;

      const fail = (error: Error): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        reject(error);
      };

      const accept = (data: Buffer): string | undefined => {
        received += data.length;
        if (received > OUTPUT_LIMIT_BYTES) {
          child.kill('SIGTERM');
          fail(new InternalError(`${command} wrote more than ${OUTPUT_LIMIT_BYTES} bytes`));
          return undefined;
        }
        return data.toString();
      };

      child.stdout.on('data', (data: Buffer) => {
        stdout += accept(data) ?? '';
      });
      child.stderr.on('data', (data: Buffer) => {
        stderr += accept(data) ?? '';
      });

      child.on('close', (code: number | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        const exitCode = code ?? -1;
        this.logger.debug({ command, exitCode, timedOut }, 'Command completed');
        resolve({ stdout: stdout.trim(), stderr: stderr.trim(), exitCode, timedOut });
      });

      child.on('error', (error: Error) => {
        this.logger.debug({ command, error: error.message }, 'Command could not start');
        fail(toSpawnError(command, error));
      });
    });
  }

  /**
   * Whether `command` resolves on PATH
   */
  async isAvailable(command: string): Promise<boolean> {
    try {
      const result = await this.execute('which', [command], {
        timeout: DEFAULT_TIMEOUTS.commandProbe,
      });
      return result.exitCode === 0 && result.stdout.length > 0;
    } catch (error) {
      this.logger.debug({ command, error }, 'Command availability probe failed');
      return false;
    }
  }
}
