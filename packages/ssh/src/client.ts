/**
 * @readycheck/ssh - SSH Command Executor
 * Runs runtime queries on the deployment host.
 *
 * One pooled connection per executor, acquired on first use. A connection
 * that closes or refuses a command is discarded and the next exec opens
 * a fresh one.
 */

import type { Client, ClientChannel } from 'ssh2';
import type { CommandExecutor, ExecOptions, ExecResult } from '@readycheck/shared';
import { CommandTimeoutError, errorMessage } from '@readycheck/shared';
import type { SSHConnectionPool } from './pool.js';

export class SSHExecutor implements CommandExecutor {
  private client: Client | null = null;
  private connecting: Promise<Client> | null = null;
  private onClose: (() => void) | null = null;

  constructor(
    private readonly pool: SSHConnectionPool,
    private readonly host: string,
  ) {}

  async connect(): Promise<Client> {
    if (this.client) return this.client;

    // Concurrent first execs share one handshake
    if (!this.connecting) {
      this.connecting = this.pool.acquire(this.host).then(
        (client) => {
          this.connecting = null;
          this.attach(client);
          return client;
        },
        (error: unknown) => {
          this.connecting = null;
          throw error;
        },
      );
    }
    return this.connecting;
  }

  disconnect(): void {
    const client = this.detach();
    if (client) this.pool.release(this.host, client);
  }

  async exec(command: string, options: ExecOptions = {}): Promise<ExecResult> {
    const { timeout = 60000, signal } = options;
    const startTime = Date.now();

    signal?.throwIfAborted();
    const client = await this.connect();

    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let channel: ClientChannel | null = null;
      let settled = false;
      let timeoutId: ReturnType<typeof setTimeout> | undefined;

      const settle = (fn: () => void) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutId);
        signal?.removeEventListener('abort', onAbort);
        fn();
      };

      const fail = (error: unknown) => {
        if (errorMessage(error) === 'Not connected') this.discard(client);
        settle(() => reject(error));
      };

      const onAbort = () => {
        settle(() => reject(signal?.reason ?? new Error('Command aborted')));
        channel?.close();
      };

      if (timeout > 0) {
        timeoutId = setTimeout(() => {
          settle(() => reject(new CommandTimeoutError(timeout, { host: this.host })));
          channel?.close();
        }, timeout);
      }

      signal?.addEventListener('abort', onAbort, { once: true });

      try {
        client.exec(command, (err, stream) => {
          if (err) {
            fail(err);
            return;
          }

          channel = stream;
          let exitCode: number | null = null;
          stream
            .on('exit', (code: number | null) => {
              exitCode = code;
            })
            .on('close', () => {
              settle(() =>
                resolve({
                  stdout,
                  stderr,
                  code: exitCode ?? 1,
                  duration: Date.now() - startTime,
                }),
              );
            })
            .on('data', (data: Buffer) => {
              stdout += data.toString();
            })
            .stderr.on('data', (data: Buffer) => {
              stderr += data.toString();
            });
        });
      } catch (error) {
        // ssh2 throws synchronously once the socket is gone
        fail(error);
      }
    });
  }

  private attach(client: Client): void {
    const onClose = () => this.discard(client);
    client.once('close', onClose);
    this.client = client;
    this.onClose = onClose;
  }

  private detach(): Client | null {
    const client = this.client;
    if (client && this.onClose) {
      client.removeListener('close', this.onClose);
    }
    this.client = null;
    this.onClose = null;
    return client;
  }

  private discard(client: Client): void {
    if (this.client !== client) return;
    this.detach();
    this.pool.discard(this.host, client);
  }
}
