/**
 * Protocol constants for line-oriented ASCII lab devices.
 */

import type { Framing } from '../models/command';

export const CRLF = '\r\n';

/**
 * Framing used by devices speaking the "new" (PA_NEW) NAMUR-style protocol.
 */
export const DEFAULT_FRAMING: Framing = Object.freeze({
  commandTerminator: CRLF,
  replyTerminator: CRLF,
  argumentDelimiter: ' ',
});

// Serial defaults
export const DEFAULT_BAUD_RATE = 9600;
export const DEFAULT_BYTE_SIZE = 8;

// Reply timeouts (milliseconds)
export const DEFAULT_REPLY_TIMEOUT = 1000;
export const TCP_CONNECT_TIMEOUT = 5000;

/**
 * Mask applied to received bytes in strict 7-bit mode.
 */
export const SEVEN_BIT_MASK = 0x7f;
