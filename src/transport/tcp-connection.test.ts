import net from 'node:net';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CarouselConnect } from '../devices/carousel-connect';
import { ConnectionError } from '../exceptions';
import { parseConnectionParameters } from '../models/connection';
import { createSilentLogger } from '../test/helpers';
import { TcpConnection } from './tcp-connection';

const REPLIES: Record<string, string> = {
  PA_NEW: 'PA_NEW',
  STATUS: 'STATUS 1',
  IN_PV_1: 'IN_PV_1 42.5',
};

function listen(server: net.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Server has no TCP port'));
        return;
      }
      resolve(address.port);
    });
  });
}

function shutdown(server: net.Server): Promise<void> {
  return new Promise((resolve) => {
    server.close(() => resolve());
  });
}

describe('TcpConnection', () => {
  let server: net.Server;
  let port: number;
  let received: string[];

  beforeEach(async () => {
    received = [];
    server = net.createServer((socket) => {
      let pending = '';
      socket.on('data', (data) => {
        pending += data.toString('utf-8');
        let index = pending.indexOf('\r\n');
        while (index !== -1) {
          const line = pending.slice(0, index);
          pending = pending.slice(index + 2);
          received.push(line);
          const reply = REPLIES[line];
          if (reply !== undefined) {
            socket.write(`${reply}\r\n`);
          }
          index = pending.indexOf('\r\n');
        }
      });
    });
    port = await listen(server);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await shutdown(server);
  });

  it('exchanges frames with a bridge', async () => {
    const connection = new TcpConnection(
      parseConnectionParameters({ connectionMode: 'tcpip', address: '127.0.0.1', port })
    );

    await connection.open();
    expect(connection.isOpen).toBe(true);

    await connection.write('STATUS\r\n');
    await expect(connection.readUntil('\r\n', 1000)).resolves.toBe('STATUS 1');

    await connection.close();
    expect(connection.isOpen).toBe(false);
    expect(received).toEqual(['STATUS']);
  });

  it('logs socket errors raised while closing', async () => {
    const createConnection = vi.spyOn(net, 'createConnection');
    const logger = createSilentLogger();
    const connection = new TcpConnection(
      parseConnectionParameters({ connectionMode: 'tcpip', address: '127.0.0.1', port }),
      { logger }
    );
    await connection.open();
    const socket = createConnection.mock.results[0]?.value;
    if (!(socket instanceof net.Socket)) {
      throw new Error('No socket was created');
    }

    await connection.close();

    expect(socket.destroyed).toBe(true);
    expect(() => socket.emit('error', new Error('read ECONNRESET'))).not.toThrow();
    expect(logger.warn).toHaveBeenCalledWith(
      `Error closing 127.0.0.1:${port}: read ECONNRESET`
    );
  });

  it('fails with ConnectionError when nothing listens', async () => {
    const closed = net.createServer();
    const unusedPort = await listen(closed);
    await shutdown(closed);

    const connection = new TcpConnection(
      parseConnectionParameters({
        connectionMode: 'tcpip',
        address: '127.0.0.1',
        port: unusedPort,
      })
    );

    await expect(connection.open()).rejects.toBeInstanceOf(ConnectionError);
    expect(connection.isOpen).toBe(false);
  });

  it('drives a hotplate in tcpip mode', async () => {
    const plate = new CarouselConnect({
      connectionParameters: { connectionMode: 'tcpip', address: '127.0.0.1', port },
      logger: createSilentLogger(),
    });

    await plate.initialize();
    await expect(plate.getStatus()).resolves.toBe('REMOTE START');
    await expect(plate.getTemperature(1)).resolves.toBe(42.5);
    await plate.disconnect();

    expect(received).toEqual(['PA_NEW', 'STATUS', 'IN_PV_1']);
  });
});
