import { describe, expect, it } from 'vitest';
import { ConnectionError } from '../exceptions';
import { SimulatedConnection } from './simulated-connection';

describe('SimulatedConnection', () => {
  it('answers frames through the handler', async () => {
    const connection = new SimulatedConnection((frame) =>
      frame === 'STATUS\r\n' ? 'STATUS 0' : null
    );
    await connection.open();

    await connection.write('STATUS\r\n');

    await expect(connection.readUntil('\r\n', 50)).resolves.toBe('STATUS 0');
    expect(connection.written).toEqual(['STATUS\r\n']);
  });

  it('uses the configured reply terminator', async () => {
    const connection = new SimulatedConnection(() => 'OK', { replyTerminator: '\r' });
    await connection.open();

    await connection.write('PING\r');

    await expect(connection.readUntil('\r', 50)).resolves.toBe('OK');
  });

  it('can be made unreachable', async () => {
    const connection = new SimulatedConnection(() => null, { openError: 'Port busy' });

    await expect(connection.open()).rejects.toThrow(new ConnectionError('Port busy'));
    expect(connection.isOpen).toBe(false);
  });

  it('refuses I/O once closed', async () => {
    const connection = new SimulatedConnection(() => 'OK');
    await connection.open();
    await connection.close();

    await expect(connection.write('PING\r\n')).rejects.toBeInstanceOf(ConnectionError);
    await expect(connection.readUntil('\r\n', 50)).rejects.toBeInstanceOf(ConnectionError);
  });
});
