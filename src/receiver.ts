/**
 * Packet receiver: one per stream. Binds the stream's port, parses each datagram's
 * shred header and hands an ArrivalRecord to the sink.
 * Malformed packets are dropped and logged; a socket error ends this receiver only.
 */

import { BindError, MalformedPacketError, ReceiveError } from './errors.js';
import { logDebug, logError, logInfo, logWarn } from './logger.js';
import { parseShredHeader } from './shred.js';
import { openUdpSocket } from './transport.js';
import type { BoundSocket, SocketOpener } from './transport.js';
import type { ArrivalRecord, ShredHeader, StreamConfig } from './types.js';

export interface ReceiverCounters {
  received: number;
  malformed: number;
}

export interface ReceiverOptions {
  host: string;
  openSocket?: SocketOpener;
  /** Called after a malformed packet has been logged and dropped. */
  onMalformed?: (err: MalformedPacketError) => void;
  /** Called once when a socket error has stopped this receiver. */
  onFatal?: (err: ReceiveError) => void;
}

export interface Receiver {
  readonly stream: string;
  start(): Promise<void>;
  stop(): Promise<void>;
  isRunning(): boolean;
  counters(): ReceiverCounters;
}

export type ArrivalSink = (record: ArrivalRecord) => void;

export function createReceiver(
  config: StreamConfig,
  sink: ArrivalSink,
  options: ReceiverOptions
): Receiver {
  const openSocket = options.openSocket ?? openUdpSocket;
  const stream = config.name;
  const counters: ReceiverCounters = { received: 0, malformed: 0 };
  let socket: BoundSocket | null = null;

  function handleMessage(msg: Buffer, receivedAt: bigint): void {
    if (socket === null) return;
    counters.received += 1;
    let header: ShredHeader;
    try {
      header = parseShredHeader(msg);
    } catch (err) {
      if (!(err instanceof MalformedPacketError)) throw err;
      counters.malformed += 1;
      logWarn(`[${stream}] dropped malformed packet`, { stream, size: err.size, reason: err.message });
      options.onMalformed?.(err);
      return;
    }
    sink({
      stream,
      identity: header.identity,
      kind: header.kind,
      timestamp: receivedAt,
      rawSize: msg.byteLength,
    });
  }

  function handleError(cause: Error): void {
    const current = socket;
    if (current === null) return;
    socket = null;
    const err = new ReceiveError(stream, cause);
    logError(err.message, { stream, port: config.port });
    current.close().then(
      () => logDebug(`[${stream}] socket closed after receive error`, { stream }),
      (closeErr: unknown) => logWarn(`[${stream}] socket close failed`, { stream, error: String(closeErr) })
    );
    options.onFatal?.(err);
  }

  return {
    stream,

    async start(): Promise<void> {
      if (socket !== null) {
        throw new Error(`Receiver ${stream} already running`);
      }
      try {
        socket = await openSocket(options.host, config.port, {
          onMessage: handleMessage,
          onError: handleError,
        });
      } catch (cause) {
        const err = new BindError(stream, config.port, cause);
        logError(err.message, { stream, port: config.port });
        throw err;
      }
      logInfo(`[${stream}] listening on ${options.host}:${socket.port}`, { stream, port: socket.port });
    },

    async stop(): Promise<void> {
      const current = socket;
      if (current === null) return;
      socket = null;
      await current.close();
      logInfo(`[${stream}] stopped`, { stream, ...counters });
    },

    isRunning(): boolean {
      return socket !== null;
    },

    counters(): ReceiverCounters {
      return { ...counters };
    },
  };
}
