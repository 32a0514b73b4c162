/**
 * Base class for line-oriented lab devices.
 */

import { UnsupportedOperationError } from './exceptions';
import { createLogger, type Logger } from './logger';
import type {
  CommandDescriptor,
  Framing,
  QueryDescriptor,
} from './models/command';
import {
  parseConnectionParameters,
  type ConnectionParameters,
  type ConnectionParametersInput,
} from './models/connection';
import { encodeCommand } from './protocol/commands';
import { DEFAULT_FRAMING } from './protocol/constants';
import { decodeReply } from './protocol/responses';
import type { SimulationAware } from './simulation';
import { createConnection, type Connection } from './transport/connection';

export interface LabDeviceOptions {
  /** Name used in log messages (default: the device's declared name) */
  deviceName?: string;

  /** Connection parameters, validated on construction */
  connectionParameters: ConnectionParametersInput;

  /** Skip I/O in wrapped operations and substitute canned results */
  simulation?: boolean;

  /** Log sink (default: console) */
  logger?: Logger;

  /** Use this connection instead of one created from the parameters */
  connection?: Connection;
}

/**
 * Lab device speaking a command/reply ASCII protocol.
 *
 * Every device operation funnels through {@link LabDevice.send}, which
 * validates, encodes, transmits, reads one reply line and decodes it.
 * Devices hold no cached readings and no internal lock: one command may be
 * in flight at a time, and callers serialize access.
 *
 * @example
 * ```typescript
 * class Stirrer extends LabDevice {
 *   async getSpeed(): Promise<number> {
 *     return this.send(StirrerCommands.GET_SPEED);
 *   }
 * }
 * ```
 */
export abstract class LabDevice implements SimulationAware {
  readonly deviceName: string;
  readonly simulation: boolean;
  readonly logger: Logger;
  readonly connectionParameters: ConnectionParameters;

  protected readonly connection: Connection;
  protected readonly framing: Framing;

  /**
   * @param defaultName - Declared name of the instrument model
   * @param options - Device options
   * @param framing - Protocol framing strings
   * @throws {ZodError} If the connection parameters are invalid
   */
  constructor(
    defaultName: string,
    options: LabDeviceOptions,
    framing: Framing = DEFAULT_FRAMING
  ) {
    this.deviceName = options.deviceName ?? defaultName;
    this.simulation = options.simulation ?? false;
    this.logger = createLogger(this.deviceName, options.logger);
    this.connectionParameters = parseConnectionParameters(
      options.connectionParameters
    );
    this.connection =
      options.connection ??
      createConnection(this.connectionParameters, this.logger);
    this.framing = framing;
  }

  /**
   * Open the underlying connection.
   *
   * @throws {ConnectionError} If the device cannot be reached
   */
  protected async openConnection(): Promise<void> {
    await this.connection.open();
  }

  /**
   * Close the underlying connection.
   */
  protected async closeConnection(): Promise<void> {
    await this.connection.close();
  }

  /**
   * Inspect the device error register.
   *
   * @throws {UnsupportedOperationError} Unless the device overrides it
   */
  async checkErrors(): Promise<void> {
    throw new UnsupportedOperationError(
      `${this.deviceName} does not report errors`
    );
  }

  /**
   * Clear the device error register.
   *
   * @throws {UnsupportedOperationError} Unless the device overrides it
   */
  async clearErrors(): Promise<void> {
    throw new UnsupportedOperationError(
      `${this.deviceName} does not report errors`
    );
  }

  /**
   * Send a command and decode its reply.
   *
   * 1. Validate the argument (nothing is written if it fails)
   * 2. Discard stale input, encode and write the frame
   * 3. Read one reply line within the connection timeout
   * 4. Decode it per the command's reply spec, if it has one
   *
   * @param command - Command descriptor
   * @param argument - Optional argument
   * @returns Decoded reply, or undefined for commands without a reply spec
   * @throws {InvalidArgumentError} If the argument fails validation
   * @throws {ConnectionError} If the write fails or no reply arrives in time
   * @throws {MalformedReplyError} If the reply cannot be decoded
   */
  send(command: QueryDescriptor<'string'>, argument?: number): Promise<string>;
  send(
    command: QueryDescriptor<'integer' | 'real'>,
    argument?: number
  ): Promise<number>;
  send(command: CommandDescriptor, argument?: number): Promise<void>;
  async send(
    command: CommandDescriptor,
    argument?: number
  ): Promise<string | number | void> {
    const frame = encodeCommand(command, this.framing, argument);

    this.connection.clearInput();
    this.logger.debug(`>> ${JSON.stringify(frame)}`);
    await this.connection.write(frame);

    const raw = await this.connection.readUntil(
      this.framing.replyTerminator,
      this.connectionParameters.timeoutMs
    );
    this.logger.debug(`<< ${JSON.stringify(raw)}`);

    if (!command.reply) {
      return;
    }
    return decodeReply(raw, command.reply);
  }
}
