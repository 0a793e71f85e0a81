import dgram from 'node:dgram';
import { createLogger, describeError } from '../logging/logger.js';

const log = createLogger('keepalive');

export interface KeepaliveSocket {
  send(payload: Uint8Array, port: number, address: string): Promise<void>;
  close(): Promise<void>;
}

export type KeepaliveSocketFactory = () => Promise<KeepaliveSocket>;

/**
 * Binds an ephemeral IPv4 datagram socket. The socket is unref'd so an idle
 * keepalive never holds the process open by itself.
 */
export const openUdpSocket: KeepaliveSocketFactory = () => new Promise((resolve, reject) => {
  const socket = dgram.createSocket('udp4');
  let closed = false;

  const onBindError = (error: Error) => {
    closed = true;
    socket.close();
    reject(error);
  };
  socket.once('error', onBindError);

  socket.bind(0, () => {
    socket.off('error', onBindError);
    socket.on('error', (error) => log.debug(`socket error: ${describeError(error)}`));
    socket.unref();
    resolve({
      send: (payload, port, address) => new Promise<void>((done, fail) => {
        socket.send(payload, port, address, (error) => (error ? fail(error) : done()));
      }),
      close: () => new Promise<void>((done) => {
        if (closed) return done();
        closed = true;
        socket.close(() => done());
      })
    });
  });
});
