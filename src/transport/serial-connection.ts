/**
 * Serial port connection for lab devices.
 */

import { SerialPort } from 'serialport';
import { ConnectionError } from '../exceptions';
import type { Logger } from '../logger';
import type { ConnectionParameters } from '../models/connection';
import type { Connection } from './connection';
import { ChunkDecoder, ReplyBuffer } from './reply-buffer';

type ErrorCallback = (err: Error | null | undefined) => void;

/**
 * The part of a serialport stream the connection uses.
 */
export interface SerialPortLike {
  readonly isOpen: boolean;
  open(callback: ErrorCallback): void;
  close(callback: ErrorCallback): void;
  write(data: Buffer, callback: ErrorCallback): boolean;
  drain(callback: ErrorCallback): void;
  on(event: 'data', listener: (chunk: Buffer) => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
  on(event: 'close', listener: () => void): this;
  removeAllListeners(): this;
}

export type SerialPortFactory = (params: ConnectionParameters) => SerialPortLike;

export interface SerialConnectionOptions {
  logger?: Logger;

  /** Override port creation (e.g. with a mock binding) */
  createPort?: SerialPortFactory;
}

function createSerialPort(params: ConnectionParameters): SerialPort {
  return new SerialPort({
    path: String(params.port),
    baudRate: params.baudRate,
    dataBits: params.byteSize,
    parity: params.parity,
    stopBits: params.stopBits,
    autoOpen: false,
  });
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Serial connection manager.
 *
 * Received bytes are decoded (and masked to 7 bits in strict mode) as they
 * arrive and buffered until a reply line is requested.
 */
export class SerialConnection implements Connection {
  private port: SerialPortLike | null = null;
  private replies = new ReplyBuffer();
  private readonly logger: Logger | undefined;
  private readonly createPort: SerialPortFactory;

  constructor(
    private readonly params: ConnectionParameters,
    options: SerialConnectionOptions = {}
  ) {
    this.logger = options.logger;
    this.createPort = options.createPort ?? createSerialPort;
  }

  get isOpen(): boolean {
    return this.port?.isOpen ?? false;
  }

  /**
   * Serial device path.
   */
  get path(): string {
    return String(this.params.port);
  }

  /**
   * Open the serial port with the configured line settings.
   *
   * @throws {ConnectionError} If the port cannot be opened
   */
  async open(): Promise<void> {
    if (this.isOpen) {
      return;
    }

    const port = this.createPort(this.params);

    const decoder = new ChunkDecoder(
      this.params.encoding,
      this.params.strict7bit
    );
    port.on('data', (chunk) => {
      this.replies.push(decoder.write(chunk));
    });
    port.on('error', (err) => {
      this.logger?.error(`Serial port ${this.path} error: ${err.message}`);
      this.replies.clear(`Serial port error: ${err.message}`);
    });
    port.on('close', () => {
      this.replies.clear();
    });

    try {
      await new Promise<void>((resolve, reject) => {
        port.open((err) => (err ? reject(err) : resolve()));
      });
    } catch (error) {
      port.removeAllListeners();
      throw new ConnectionError(
        `Failed to open ${this.path}: ${describe(error)}`
      );
    }

    this.port = port;
    this.logger?.info(
      `Opened ${this.path} (${this.params.baudRate} baud, ` +
        `${this.params.byteSize}${this.params.parity[0].toUpperCase()}${this.params.stopBits})`
    );
  }

  /**
   * Close the serial port. Pending reads are rejected.
   */
  async close(): Promise<void> {
    const port = this.port;
    if (!port) {
      return;
    }

    this.port = null;
    port.removeAllListeners();
    this.replies.clear();

    if (!port.isOpen) {
      return;
    }

    await new Promise<void>((resolve) => {
      port.close((err) => {
        if (err) {
          this.logger?.warn(`Error closing ${this.path}: ${err.message}`);
        }
        resolve();
      });
    });
    this.logger?.info(`Closed ${this.path}`);
  }

  /**
   * Write a frame and wait until it has been transmitted.
   *
   * @throws {ConnectionError} If not open or the write fails
   */
  async write(data: string): Promise<void> {
    const port = this.port;
    if (!port || !port.isOpen) {
      throw new ConnectionError('Not connected to device');
    }

    try {
      await new Promise<void>((resolve, reject) => {
        port.write(Buffer.from(data, this.params.encoding), (err) => {
          if (err) {
            reject(err);
            return;
          }
          port.drain((drainErr) => (drainErr ? reject(drainErr) : resolve()));
        });
      });
    } catch (error) {
      throw new ConnectionError(`Failed to write command: ${describe(error)}`);
    }
  }

  async readUntil(terminator: string, timeoutMs: number): Promise<string> {
    if (!this.isOpen) {
      throw new ConnectionError('Not connected to device');
    }
    return this.replies.readUntil(terminator, timeoutMs);
  }

  clearInput(): void {
    if (this.replies.size > 0) {
      this.logger?.debug(`Discarding ${this.replies.size} stale characters`);
    }
    this.replies.discard();
  }
}
