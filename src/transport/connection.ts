/**
 * Connection abstraction for line-oriented lab devices.
 *
 * The dispatcher is the only caller. Implementations:
 * - SerialConnection: RS-232/USB serial via serialport
 * - TcpConnection: serial-over-ethernet bridges via node:net
 * - SimulatedConnection: in-process stand-in
 */

import type { Logger } from '../logger';
import type { ConnectionParameters } from '../models/connection';
import { SerialConnection } from './serial-connection';
import { TcpConnection } from './tcp-connection';

/**
 * Exclusively owned, unlocked command/reply channel to one device.
 */
export interface Connection {
  /**
   * Check if the connection is currently open.
   */
  readonly isOpen: boolean;

  /**
   * @throws {ConnectionError} If the device cannot be reached
   */
  open(): Promise<void>;

  close(): Promise<void>;

  /**
   * @throws {ConnectionError} If not open or the write fails
   */
  write(data: string): Promise<void>;

  /**
   * Read the next reply line, terminator stripped.
   *
   * @throws {ConnectionTimeoutError} If no complete line arrives in time
   * @throws {ConnectionError} If not open or the connection drops
   */
  readUntil(terminator: string, timeoutMs: number): Promise<string>;

  /**
   * Discard received text not yet read.
   */
  clearInput(): void;
}

/**
 * Create the connection matching `params.connectionMode`. Nothing is opened.
 */
export function createConnection(
  params: ConnectionParameters,
  logger?: Logger
): Connection {
  switch (params.connectionMode) {
    case 'serial':
      return new SerialConnection(params, { logger });
    case 'tcpip':
      return new TcpConnection(params, { logger });
  }
}
