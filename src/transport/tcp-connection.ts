/**
 * TCP connection for devices behind a serial-to-ethernet bridge.
 */

import net from 'node:net';
import { ConnectionError } from '../exceptions';
import type { Logger } from '../logger';
import type { ConnectionParameters } from '../models/connection';
import { TCP_CONNECT_TIMEOUT } from '../protocol/constants';
import type { Connection } from './connection';
import { ChunkDecoder, ReplyBuffer } from './reply-buffer';

export interface TcpConnectionOptions {
  logger?: Logger;
  connectTimeoutMs?: number;
}

export class TcpConnection implements Connection {
  private socket: net.Socket | null = null;
  private replies = new ReplyBuffer();
  private readonly logger: Logger | undefined;
  private readonly connectTimeoutMs: number;

  constructor(
    private readonly params: ConnectionParameters,
    options: TcpConnectionOptions = {}
  ) {
    this.logger = options.logger;
    this.connectTimeoutMs = options.connectTimeoutMs ?? TCP_CONNECT_TIMEOUT;
  }

  get isOpen(): boolean {
    return this.socket !== null && !this.socket.destroyed;
  }

  /**
   * Remote endpoint as host:port.
   */
  get endpoint(): string {
    return `${this.params.address ?? ''}:${this.params.port}`;
  }

  /**
   * Connect to the bridge.
   *
   * @throws {ConnectionError} If the address is missing or unreachable
   */
  async open(): Promise<void> {
    if (this.isOpen) {
      return;
    }

    const host = this.params.address;
    const port = Number(this.params.port);
    if (!host || !Number.isInteger(port)) {
      throw new ConnectionError(`Invalid TCP endpoint ${this.endpoint}`);
    }

    const socket = net.createConnection({ host, port });

    try {
      await new Promise<void>((resolve, reject) => {
        const timer = setTimeout(() => {
          reject(new Error(`timed out after ${this.connectTimeoutMs}ms`));
        }, this.connectTimeoutMs);
        socket.once('connect', () => {
          clearTimeout(timer);
          resolve();
        });
        socket.once('error', (err) => {
          clearTimeout(timer);
          reject(err);
        });
      });
    } catch (error) {
      socket.removeAllListeners();
      socket.destroy();
      throw new ConnectionError(
        `Failed to connect to ${this.endpoint}: ` +
          (error instanceof Error ? error.message : String(error))
      );
    }

    socket.removeAllListeners('error');
    const decoder = new ChunkDecoder(
      this.params.encoding,
      this.params.strict7bit
    );
    socket.on('data', (chunk: Buffer) => {
      this.replies.push(decoder.write(chunk));
    });
    socket.on('error', (err) => {
      this.logger?.error(`Socket ${this.endpoint} error: ${err.message}`);
      this.replies.clear(`Socket error: ${err.message}`);
    });
    socket.on('close', () => {
      this.replies.clear();
    });

    this.socket = socket;
    this.logger?.info(`Connected to ${this.endpoint}`);
  }

  async close(): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return;
    }

    this.socket = null;
    socket.removeAllListeners();
    socket.on('error', (err) => {
      this.logger?.warn(`Error closing ${this.endpoint}: ${err.message}`);
    });
    this.replies.clear();
    socket.destroy();
    this.logger?.info(`Disconnected from ${this.endpoint}`);
  }

  /**
   * @throws {ConnectionError} If not connected or the write fails
   */
  async write(data: string): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.destroyed) {
      throw new ConnectionError('Not connected to device');
    }

    await new Promise<void>((resolve, reject) => {
      socket.write(Buffer.from(data, this.params.encoding), (err) => {
        if (err) {
          reject(new ConnectionError(`Failed to write command: ${err.message}`));
          return;
        }
        resolve();
      });
    });
  }

  async readUntil(terminator: string, timeoutMs: number): Promise<string> {
    if (!this.isOpen) {
      throw new ConnectionError('Not connected to device');
    }
    return this.replies.readUntil(terminator, timeoutMs);
  }

  clearInput(): void {
    this.replies.discard();
  }
}
