/**
 * Reply buffer for line-oriented device replies.
 *
 * Serial and socket streams deliver text in arbitrary chunks. This buffer
 * accumulates received text and provides a Promise-based interface for
 * consuming it one terminator-delimited line at a time, with timeout support.
 */

import { StringDecoder } from 'node:string_decoder';
import { ConnectionError, ConnectionTimeoutError } from '../exceptions';
import { SEVEN_BIT_MASK } from '../protocol/constants';

interface PendingReader {
  terminator: string;
  resolve: (line: string) => void;
  reject: (error: Error) => void;
  timeoutId: NodeJS.Timeout;
}

/**
 * Buffer for managing device reply lines.
 *
 * Handles the asynchronous nature of stream reads by:
 * - Buffering text that arrives before being requested
 * - Queuing readers that wait for a terminator not yet received
 * - Providing timeout support for every read
 */
export class ReplyBuffer {
  private buffer = '';
  private pendingReaders: PendingReader[] = [];

  /**
   * Append received text and hand complete lines to waiting readers,
   * oldest first.
   *
   * @param text - Decoded text received from the device
   */
  push(text: string): void {
    this.buffer += text;

    while (this.pendingReaders.length > 0) {
      const pending = this.pendingReaders[0];
      const line = this.takeLine(pending.terminator);
      if (line === null) {
        break;
      }
      this.pendingReaders.shift();
      clearTimeout(pending.timeoutId);
      pending.resolve(line);
    }
  }

  /**
   * Get the next line ending with `terminator`, terminator stripped.
   *
   * If a complete line is already buffered, return it immediately.
   * Otherwise, wait for more text or timeout.
   *
   * @param terminator - Line terminator
   * @param timeoutMs - Maximum time to wait in milliseconds
   * @throws {ConnectionTimeoutError} If no complete line arrives in time
   */
  async readUntil(terminator: string, timeoutMs: number): Promise<string> {
    if (this.pendingReaders.length === 0) {
      const line = this.takeLine(terminator);
      if (line !== null) {
        return line;
      }
    }

    return new Promise<string>((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        const index = this.pendingReaders.findIndex(
          (p) => p.resolve === resolve
        );
        if (index !== -1) {
          this.pendingReaders.splice(index, 1);
          reject(
            new ConnectionTimeoutError(
              `No reply received within ${timeoutMs}ms timeout`
            )
          );
        }
      }, timeoutMs);

      this.pendingReaders.push({ terminator, resolve, reject, timeoutId });
    });
  }

  /**
   * Drop buffered text. Pending readers keep waiting.
   */
  discard(): void {
    this.buffer = '';
  }

  /**
   * Drop buffered text and reject all pending readers.
   *
   * Called when the connection is closed or lost.
   *
   * @param reason - Reason for clearing (default: "Connection closed")
   */
  clear(reason: string = 'Connection closed'): void {
    this.buffer = '';

    for (const pending of this.pendingReaders) {
      clearTimeout(pending.timeoutId);
      pending.reject(new ConnectionError(reason));
    }

    this.pendingReaders = [];
  }

  /**
   * Number of buffered characters not yet consumed.
   */
  get size(): number {
    return this.buffer.length;
  }

  /**
   * Number of readers waiting for a line.
   */
  get pendingCount(): number {
    return this.pendingReaders.length;
  }

  private takeLine(terminator: string): string | null {
    const index = this.buffer.indexOf(terminator);
    if (index === -1) {
      return null;
    }
    const line = this.buffer.slice(0, index);
    this.buffer = this.buffer.slice(index + terminator.length);
    return line;
  }
}

/**
 * Stateful decoder for received chunks.
 *
 * Multi-byte characters split across chunks are held back until complete.
 * In strict 7-bit mode the high bit of every byte is masked before decoding.
 */
export class ChunkDecoder {
  private readonly decoder: StringDecoder;

  constructor(
    encoding: BufferEncoding,
    private readonly strict7bit: boolean
  ) {
    this.decoder = new StringDecoder(encoding);
  }

  /**
   * Decode the next chunk of the stream.
   *
   * @param chunk - Raw bytes from the stream
   */
  write(chunk: Buffer): string {
    const bytes = this.strict7bit
      ? Buffer.from(chunk.map((byte) => byte & SEVEN_BIT_MASK))
      : chunk;
    return this.decoder.write(bytes);
  }
}
