/**
 * Connection parameters for line-oriented lab devices.
 */

import { z } from 'zod';
import {
  DEFAULT_BAUD_RATE,
  DEFAULT_BYTE_SIZE,
  DEFAULT_REPLY_TIMEOUT,
} from '../protocol/constants';

export const connectionModeSchema = z.enum(['serial', 'tcpip']);

export const connectionParametersSchema = z
  .object({
    connectionMode: connectionModeSchema.default('serial'),
    /** Serial device path, or TCP port number in tcpip mode */
    port: z.union([z.string().min(1), z.number().int().min(1).max(65535)]),
    /** Host name in tcpip mode */
    address: z.string().min(1).optional(),
    baudRate: z.number().int().positive().default(DEFAULT_BAUD_RATE),
    byteSize: z
      .union([z.literal(5), z.literal(6), z.literal(7), z.literal(8)])
      .default(DEFAULT_BYTE_SIZE),
    parity: z.enum(['none', 'even', 'odd', 'mark', 'space']).default('none'),
    stopBits: z.union([z.literal(1), z.literal(1.5), z.literal(2)]).default(1),
    encoding: z.enum(['utf-8', 'utf8', 'ascii', 'latin1']).default('utf-8'),
    /** Mask the high bit of every received byte */
    strict7bit: z.boolean().default(true),
    /** Bounded wait for one reply line */
    timeoutMs: z.number().int().positive().default(DEFAULT_REPLY_TIMEOUT),
  })
  .refine((params) => params.connectionMode !== 'tcpip' || params.address, {
    message: 'address is required in tcpip connection mode',
    path: ['address'],
  });

/**
 * Parameters as accepted from callers, defaults not yet applied.
 */
export type ConnectionParametersInput = z.input<typeof connectionParametersSchema>;

/**
 * Fully resolved connection parameters.
 */
export type ConnectionParameters = z.output<typeof connectionParametersSchema>;

export type ConnectionMode = z.infer<typeof connectionModeSchema>;

/**
 * Validate connection parameters and fill in protocol defaults.
 *
 * @throws {ZodError} If a parameter is missing or out of range
 */
export function parseConnectionParameters(
  input: ConnectionParametersInput
): ConnectionParameters {
  return connectionParametersSchema.parse(input);
}

const envSchema = z.object({
  HOTPLATE_CONNECTION_MODE: connectionModeSchema.optional(),
  HOTPLATE_PORT: z.string().min(1),
  HOTPLATE_ADDRESS: z.string().min(1).optional(),
  HOTPLATE_BAUD_RATE: z.string().regex(/^\d+$/).transform(Number).optional(),
  HOTPLATE_TIMEOUT_MS: z.string().regex(/^\d+$/).transform(Number).optional(),
});

/**
 * Build connection parameters from environment variables.
 *
 * In tcpip mode HOTPLATE_PORT is read as a TCP port number.
 */
export function loadConnectionParameters(
  env: Record<string, string | undefined> = process.env
): ConnectionParameters {
  const vars = envSchema.parse(env);
  const mode = vars.HOTPLATE_CONNECTION_MODE ?? 'serial';

  return parseConnectionParameters({
    connectionMode: mode,
    port: mode === 'tcpip' ? Number(vars.HOTPLATE_PORT) : vars.HOTPLATE_PORT,
    address: vars.HOTPLATE_ADDRESS,
    baudRate: vars.HOTPLATE_BAUD_RATE,
    timeoutMs: vars.HOTPLATE_TIMEOUT_MS,
  });
}
