/**
 * UDP transport. Receivers talk to sockets only through SocketOpener, so tests
 * can hand in an in-process fake instead of binding real ports.
 */

import { createSocket } from 'node:dgram';

export interface DatagramHandlers {
  /** receivedAt is process.hrtime.bigint() taken as soon as the datagram is delivered. */
  onMessage: (msg: Buffer, receivedAt: bigint) => void;
  /** Socket error after bind; the socket should be considered dead. */
  onError: (err: Error) => void;
}

export interface BoundSocket {
  readonly port: number;
  close(): Promise<void>;
}

export type SocketOpener = (
  host: string,
  port: number,
  handlers: DatagramHandlers
) => Promise<BoundSocket>;

/** Binds a udp4 socket on host:port; rejects when the bind fails. */
export const openUdpSocket: SocketOpener = (host, port, handlers) =>
  new Promise((resolve, reject) => {
    const socket = createSocket({ type: 'udp4', reuseAddr: false });
    let closed = false;

    const onBindError = (err: Error): void => {
      closed = true;
      socket.close();
      reject(err);
    };
    socket.once('error', onBindError);

    socket.on('message', (msg) => {
      const receivedAt = process.hrtime.bigint();
      handlers.onMessage(msg, receivedAt);
    });

    socket.bind(port, host, () => {
      socket.off('error', onBindError);
      socket.on('error', (err) => handlers.onError(err));
      resolve({
        port: socket.address().port,
        close: () =>
          new Promise<void>((done) => {
            if (closed) {
              done();
              return;
            }
            closed = true;
            socket.close(() => done());
          }),
      });
    });
  });
