/**
 * Command Executor - runs external CLIs (compose, minikube) with a mandatory
 * timeout and captured output
 */

import { spawn, type SpawnOptions } from 'node:child_process';
import type { Logger } from 'pino';
import { DEFAULT_TIMEOUTS } from '../config/defaults';

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number;
  maxBuffer?: number;
  signal?: AbortSignal;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
}

/**
 * Process runner seam; the gateway depends on this rather than on spawn
 */
export interface CommandRunner {
  execute: (command: string, args?: string[], options?: CommandOptions) => Promise<CommandResult>;
}

const KILL_GRACE_MS = 5000;

export class CommandExecutor implements CommandRunner {
  constructor(private readonly logger: Logger) {}

  /**
   * Execute a command with arguments. Rejects only when the process cannot
   * be started or its output overflows; a non-zero exit resolves normally.
   */
  async execute(
    command: string,
    args: string[] = [],
    options: CommandOptions = {},
  ): Promise<CommandResult> {
    const {
      cwd = process.cwd(),
      env = process.env,
      timeout = DEFAULT_TIMEOUTS.command,
      maxBuffer = 10 * 1024 * 1024, // 10MB
      signal,
    } = options;

    this.logger.debug({ command, args, cwd, timeout }, 'Executing command');

    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let settled = false;
      let killHandle: NodeJS.Timeout | undefined;

      const spawnOptions: SpawnOptions = {
        cwd,
        env,
        shell: false,
        ...(signal !== undefined && { signal }),
      };

      const child = spawn(command, args, spawnOptions);

      const terminate = (): void => {
        child.kill('SIGTERM');
        killHandle = setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) {
            child.kill('SIGKILL');
          }
        }, KILL_GRACE_MS);
        killHandle.unref();
      };

      const timeoutHandle = setTimeout(() => {
        timedOut = true;
        terminate();
      }, timeout);

      const finish = (): void => {
        settled = true;
        clearTimeout(timeoutHandle);
        if (killHandle) clearTimeout(killHandle);
      };

      child.stdout?.on('data', (data: Buffer) => {
        const chunk = data.toString();
        if (stdout.length + chunk.length <= maxBuffer) {
          stdout += chunk;
        } else if (!settled) {
          finish();
          terminate();
          reject(new Error(`Command output exceeded maximum buffer size of ${maxBuffer} bytes`));
        }
      });

      child.stderr?.on('data', (data: Buffer) => {
        const chunk = data.toString();
        if (stderr.length + chunk.length <= maxBuffer) {
          stderr += chunk;
        }
      });

      child.on('close', (code: number | null) => {
        if (settled) return;
        finish();

        const exitCode = code ?? -1;
        this.logger.debug({ command, exitCode, timedOut }, 'Command completed');

        resolve({
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          exitCode,
          timedOut,
        });
      });

      child.on('error', (error: Error) => {
        if (settled) return;
        finish();

        this.logger.error({ command, error: error.message }, 'Command execution failed');
        reject(error);
      });
    });
  }
}
