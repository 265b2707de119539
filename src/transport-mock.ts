/**
 * In-process transport for tests: stands in for UDP sockets so receivers and the
 * monitor can be driven without binding real ports.
 */

import type { DatagramHandlers, SocketOpener } from './transport.js';

export interface MockTransport {
  openSocket: SocketOpener;
  /** Hands a datagram to whatever is bound on `port`, stamped with `receivedAt`. */
  deliver(port: number, msg: Buffer, receivedAt: bigint): void;
  /** Raises a socket error on `port`. */
  fail(port: number, err: Error): void;
  /** Makes the next bind on `port` reject with `err`. */
  rejectBind(port: number, err: Error): void;
  boundPorts(): number[];
}

export function createMockTransport(): MockTransport {
  const bound = new Map<number, DatagramHandlers>();
  const bindFailures = new Map<number, Error>();

  return {
    async openSocket(_host, port, handlers) {
      const failure = bindFailures.get(port);
      if (failure !== undefined) {
        bindFailures.delete(port);
        throw failure;
      }
      if (bound.has(port)) {
        throw new Error(`bind EADDRINUSE ${port}`);
      }
      bound.set(port, handlers);
      return {
        port,
        async close(): Promise<void> {
          bound.delete(port);
        },
      };
    },

    deliver(port, msg, receivedAt) {
      const handlers = bound.get(port);
      if (handlers === undefined) {
        throw new Error(`nothing bound on port ${port}`);
      }
      handlers.onMessage(msg, receivedAt);
    },

    fail(port, err) {
      bound.get(port)?.onError(err);
    },

    rejectBind(port, err) {
      bindFailures.set(port, err);
    },

    boundPorts() {
      return [...bound.keys()].sort((a, b) => a - b);
    },
  };
}
