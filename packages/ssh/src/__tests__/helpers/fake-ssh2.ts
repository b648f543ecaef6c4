/**
 * In-process stand-in for the ssh2 Client
 */

import { EventEmitter } from 'node:events';

export interface ExecScript {
  stdout?: string;
  stderr?: string;
  code?: number | null;
  /** Never finish; the channel stays open until closed */
  hang?: boolean;
}

export class FakeChannel extends EventEmitter {
  readonly stderr = new EventEmitter();
  closed = false;

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.emit('close');
  }
}

export class Client extends EventEmitter {
  static instances: Client[] = [];
  static script: ExecScript = {};

  connected = false;
  ended = false;
  readonly commands: string[] = [];

  constructor() {
    super();
    Client.instances.push(this);
  }

  static reset(): void {
    Client.instances = [];
    Client.script = {};
  }

  connect(): this {
    setImmediate(() => {
      this.connected = true;
      this.emit('ready');
    });
    return this;
  }

  exec(command: string, callback: (err: Error | undefined, channel: FakeChannel) => void): this {
    if (!this.connected) throw new Error('Not connected');

    this.commands.push(command);
    const channel = new FakeChannel();
    const { stdout = '', stderr = '', code = 0, hang = false } = Client.script;

    setImmediate(() => {
      callback(undefined, channel);
      if (hang) return;
      if (stdout) channel.emit('data', Buffer.from(stdout));
      if (stderr) channel.stderr.emit('data', Buffer.from(stderr));
      channel.emit('exit', code);
      channel.close();
    });
    return this;
  }

  /** Socket gone, no close event seen yet */
  sever(): void {
    this.connected = false;
  }

  /** Remote end hung up */
  drop(): void {
    this.connected = false;
    this.emit('close');
  }

  end(): this {
    if (this.ended) return this;
    this.ended = true;
    this.drop();
    return this;
  }
}
