import { describe, expect, it } from 'vitest';
import { parseConnectionParameters } from '../models/connection';
import { createConnection } from './connection';
import { SerialConnection } from './serial-connection';
import { TcpConnection } from './tcp-connection';

describe('createConnection', () => {
  it('creates a closed serial connection by default', () => {
    const connection = createConnection(parseConnectionParameters({ port: '/dev/ttyUSB0' }));

    expect(connection).toBeInstanceOf(SerialConnection);
    expect(connection.isOpen).toBe(false);
  });

  it('creates a TCP connection in tcpip mode', () => {
    const connection = createConnection(
      parseConnectionParameters({ connectionMode: 'tcpip', address: 'localhost', port: 4001 })
    );

    expect(connection).toBeInstanceOf(TcpConnection);
    expect(connection.isOpen).toBe(false);
  });
});
