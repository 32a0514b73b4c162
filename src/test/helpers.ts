import { vi, type Mock } from 'vitest';
import type { Logger } from '../logger';
import type { SimulatedReplyHandler } from '../transport/simulated-connection';

/**
 * Logger that records instead of printing.
 */
export function createSilentLogger(): Record<keyof Logger, Mock> {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/**
 * Reply to frames by command text (terminator stripped); unknown frames get
 * no reply.
 */
export function replyTable(replies: Record<string, string>): SimulatedReplyHandler {
  return (frame) => {
    const command = frame.trim();
    return Object.prototype.hasOwnProperty.call(replies, command)
      ? replies[command]
      : null;
  };
}
