/**
 * Simulated connection.
 *
 * Routes frames to a handler and buffers its replies, so device logic can be
 * exercised with no hardware attached.
 */

import { ConnectionError } from '../exceptions';
import { CRLF } from '../protocol/constants';
import type { Connection } from './connection';
import { ReplyBuffer } from './reply-buffer';

/**
 * Produce the reply line for a frame (terminator excluded), or null to stay
 * silent.
 */
export type SimulatedReplyHandler = (frame: string) => string | null;

export interface SimulatedConnectionOptions {
  /** Appended to each handler reply (default: CRLF) */
  replyTerminator?: string;

  /** Make open() fail with this message */
  openError?: string;
}

export class SimulatedConnection implements Connection {
  /** Every frame written, in order */
  readonly written: string[] = [];

  private opened = false;
  private replies = new ReplyBuffer();
  private readonly replyTerminator: string;
  private readonly openError: string | undefined;

  constructor(
    private readonly handler: SimulatedReplyHandler,
    options: SimulatedConnectionOptions = {}
  ) {
    this.replyTerminator = options.replyTerminator ?? CRLF;
    this.openError = options.openError;
  }

  get isOpen(): boolean {
    return this.opened;
  }

  async open(): Promise<void> {
    if (this.openError) {
      throw new ConnectionError(this.openError);
    }
    this.opened = true;
  }

  async close(): Promise<void> {
    this.opened = false;
    this.replies.clear();
  }

  async write(data: string): Promise<void> {
    if (!this.opened) {
      throw new ConnectionError('Not connected to device');
    }

    this.written.push(data);
    const reply = this.handler(data);
    if (reply !== null) {
      this.replies.push(`${reply}${this.replyTerminator}`);
    }
  }

  async readUntil(terminator: string, timeoutMs: number): Promise<string> {
    if (!this.opened) {
      throw new ConnectionError('Not connected to device');
    }
    return this.replies.readUntil(terminator, timeoutMs);
  }

  clearInput(): void {
    this.replies.discard();
  }

  /**
   * Inject unsolicited text, as a device sending without being asked.
   */
  inject(text: string): void {
    this.replies.push(text);
  }
}
