/**
 * @readycheck/ssh - Local Execution (SSH-free)
 *
 * Same contract as SSHExecutor, for runs on the Docker host itself.
 */

import { exec as cpExec } from 'node:child_process';
import type { CommandExecutor, ExecOptions, ExecResult } from '@readycheck/shared';
import { CommandTimeoutError } from '@readycheck/shared';

export class LocalExecutor implements CommandExecutor {
  exec(command: string, options: ExecOptions = {}): Promise<ExecResult> {
    const { timeout = 60000, signal } = options;
    const startTime = Date.now();

    return new Promise((resolve, reject) => {
      cpExec(command, {
        encoding: 'utf8',
        timeout,
        signal,
        maxBuffer: 10 * 1024 * 1024, // 10MB
        shell: '/bin/bash',
      }, (error, stdout, stderr) => {
        if (error && signal?.aborted) {
          reject(signal.reason ?? error);
          return;
        }

        if (error && error.killed) {
          reject(new CommandTimeoutError(timeout, { command }));
          return;
        }

        resolve({
          stdout: stdout || '',
          stderr: stderr || '',
          code: error ? (typeof error.code === 'number' ? error.code : 1) : 0,
          duration: Date.now() - startTime,
        });
      });
    });
  }
}
