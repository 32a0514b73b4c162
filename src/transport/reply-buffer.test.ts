import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConnectionError, ConnectionTimeoutError } from '../exceptions';
import { ChunkDecoder, ReplyBuffer } from './reply-buffer';

describe('ReplyBuffer', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('assembles a line from several chunks', async () => {
    const buffer = new ReplyBuffer();
    const line = buffer.readUntil('\r\n', 100);

    buffer.push('STAT');
    buffer.push('US 1\r');
    buffer.push('\nIN_PV');

    await expect(line).resolves.toBe('STATUS 1');
    expect(buffer.size).toBe(5);
  });

  it('returns buffered lines immediately, in order', async () => {
    const buffer = new ReplyBuffer();
    buffer.push('PA_NEW\r\nSTATUS 0\r\n');

    await expect(buffer.readUntil('\r\n', 100)).resolves.toBe('PA_NEW');
    await expect(buffer.readUntil('\r\n', 100)).resolves.toBe('STATUS 0');
    expect(buffer.size).toBe(0);
  });

  it('serves waiting readers oldest first', async () => {
    const buffer = new ReplyBuffer();
    const first = buffer.readUntil('\r\n', 100);
    const second = buffer.readUntil('\r\n', 100);

    buffer.push('A\r\nB\r\n');

    await expect(first).resolves.toBe('A');
    await expect(second).resolves.toBe('B');
  });

  it('times out when no terminator arrives', async () => {
    vi.useFakeTimers();
    const buffer = new ReplyBuffer();
    const line = buffer.readUntil('\r\n', 1000);
    const assertion = expect(line).rejects.toThrow(
      'No reply received within 1000ms timeout'
    );

    buffer.push('IN_PV_3 25');
    await vi.advanceTimersByTimeAsync(1000);

    await assertion;
    await expect(line).rejects.toBeInstanceOf(ConnectionTimeoutError);
    expect(buffer.pendingCount).toBe(0);
    expect(buffer.size).toBe(10);
  });

  it('rejects waiting readers when cleared', async () => {
    const buffer = new ReplyBuffer();
    const line = buffer.readUntil('\r\n', 1000);
    const assertion = expect(line).rejects.toBeInstanceOf(ConnectionError);

    buffer.push('partial');
    buffer.clear();

    await assertion;
    await expect(line).rejects.toThrow('Connection closed');
    expect(buffer.size).toBe(0);
    expect(buffer.pendingCount).toBe(0);
  });

  it('drops stale text on discard but keeps readers waiting', async () => {
    const buffer = new ReplyBuffer();
    const line = buffer.readUntil('\r\n', 100);

    buffer.push('stale');
    buffer.discard();
    buffer.push('OK\r\n');

    await expect(line).resolves.toBe('OK');
  });
});

describe('ChunkDecoder', () => {
  const chunk = Buffer.from([0xd3, 0x54, 0x41]);

  it('masks the high bit in strict 7-bit mode', () => {
    expect(new ChunkDecoder('latin1', true).write(chunk)).toBe('STA');
  });

  it('keeps bytes as received otherwise', () => {
    expect(new ChunkDecoder('latin1', false).write(chunk)).toBe('ÓTA');
  });

  it('joins a UTF-8 character split across chunks', () => {
    const decoder = new ChunkDecoder('utf-8', false);
    const bytes = Buffer.from('°C');

    expect(decoder.write(bytes.subarray(0, 1))).toBe('');
    expect(decoder.write(bytes.subarray(1))).toBe('°C');
  });
});
