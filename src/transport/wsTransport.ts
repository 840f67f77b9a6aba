import { WebSocket } from 'ws';
import type { RawData } from 'ws';
import { TransportError, toError } from '../errors.js';
import { logger, REALTIME_DEBUG } from '../logger.js';
import type { TransportFrame, TransportRequest, TransportSocket } from '../types.js';

const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '[::1]']);

export function getRealtimeWsUrl(endpoint: string, model: string): string {
  const url = new URL(endpoint);
  url.searchParams.set('model', model);

  const loopback = LOOPBACK_HOSTS.has(url.hostname);
  if (url.protocol !== 'wss:' && !(url.protocol === 'ws:' && loopback)) {
    throw new Error('realtime URL must use wss');
  }
  if (url.username || url.password) {
    throw new Error('realtime URL must not include credentials');
  }
  return url.toString();
}

function rawDataToFrame(raw: RawData, isBinary: boolean): TransportFrame {
  const buffer = Buffer.isBuffer(raw)
    ? raw
    : raw instanceof ArrayBuffer
      ? Buffer.from(raw)
      : Buffer.concat(raw);
  return isBinary ? buffer : buffer.toString('utf8');
}

type Waiter = {
  resolve: (frame: TransportFrame) => void;
  reject: (err: Error) => void;
};

/**
 * Transport over the `ws` package: bearer header, `?model=` selection, keepalive pings and bounded
 * open/close. Inbound frames are queued until `receive()` asks for them.
 */
export function createWsTransport(request: TransportRequest): TransportSocket {
  const url = getRealtimeWsUrl(request.endpoint, request.model);

  let ws: WebSocket | null = null;
  let pingTimer: NodeJS.Timeout | null = null;
  let failure: TransportError | null = null;
  let closeRequested = false;
  const inbox: TransportFrame[] = [];
  const waiters: Waiter[] = [];

  const fail = (err: TransportError) => {
    const reason = failure ?? err;
    failure = reason;
    if (pingTimer) {
      clearInterval(pingTimer);
      pingTimer = null;
    }
    while (waiters.length > 0) {
      waiters.shift()?.reject(reason);
    }
  };

  const attach = (socket: WebSocket) => {
    socket.on('message', (raw, isBinary) => {
      const frame = rawDataToFrame(raw, isBinary);
      const waiter = waiters.shift();
      if (waiter) {
        waiter.resolve(frame);
        return;
      }
      inbox.push(frame);
    });

    socket.on('error', (err) => {
      if (REALTIME_DEBUG) {
        logger.debug({ event: 'realtime_ws_error', message: err.message });
      }
      fail(new TransportError('Connection lost', { cause: err }));
    });

    socket.on('close', (code, reason) => {
      if (REALTIME_DEBUG) {
        logger.debug({ event: 'realtime_ws_close', code, reason: reason.toString() });
      }
      fail(new TransportError('Connection lost', { cause: new Error(`socket closed (${code})`) }));
    });

    pingTimer = setInterval(() => {
      if (socket.readyState !== WebSocket.OPEN) return;
      try {
        socket.ping();
      } catch (err) {
        if (REALTIME_DEBUG) {
          logger.debug({ event: 'realtime_ws_ping_error', err: String(err) });
        }
      }
    }, request.pingIntervalMs);
    pingTimer.unref?.();
  };

  const open = () =>
    new Promise<void>((resolve, reject) => {
      if (ws) {
        reject(new TransportError('transport already opened'));
        return;
      }
      const socket = new WebSocket(url, {
        headers: {
          Authorization: `Bearer ${request.apiKey}`,
        },
      });
      ws = socket;

      let settled = false;
      const settle = (err?: TransportError) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (err) {
          fail(err);
          reject(err);
          return;
        }
        resolve();
      };

      const timer = setTimeout(() => {
        settle(new TransportError('realtime connection timeout'));
        try {
          socket.terminate();
        } catch (err) {
          logger.debug({ event: 'realtime_ws_terminate_error', err: String(err) });
        }
      }, request.openTimeoutMs);

      socket.once('open', () => settle());
      socket.once('error', (err) => settle(new TransportError(`realtime connection failed: ${err.message}`, { cause: err })));
      socket.once('close', () => settle(new TransportError('realtime socket closed before open')));

      attach(socket);
    });

  const send = (text: string) =>
    new Promise<void>((resolve, reject) => {
      const socket = ws;
      if (!socket || socket.readyState !== WebSocket.OPEN) {
        reject(failure ?? new TransportError('realtime socket is not open'));
        return;
      }
      socket.send(text, (err) => {
        if (err) {
          reject(new TransportError('Connection lost', { cause: err }));
          return;
        }
        resolve();
      });
    });

  const receive = () =>
    new Promise<TransportFrame>((resolve, reject) => {
      const queued = inbox.shift();
      if (queued !== undefined) {
        resolve(queued);
        return;
      }
      if (failure || closeRequested) {
        reject(failure ?? new TransportError('Connection lost'));
        return;
      }
      waiters.push({ resolve, reject });
    });

  const close = async () => {
    if (closeRequested) return;
    closeRequested = true;
    if (pingTimer) {
      clearInterval(pingTimer);
      pingTimer = null;
    }
    const socket = ws;
    if (!socket || socket.readyState === WebSocket.CLOSED) {
      fail(new TransportError('transport closed'));
      return;
    }

    const waitForClose = new Promise<void>((resolve) => {
      socket.once('close', () => resolve());
    });

    try {
      socket.close();
    } catch (err) {
      logger.debug({ event: 'realtime_ws_close_error', err: toError(err).message });
    }

    const timers: NodeJS.Timeout[] = [];
    await Promise.race([
      waitForClose,
      new Promise<void>((resolve) => {
        timers.push(
          setTimeout(() => {
            try {
              socket.terminate();
            } catch (err) {
              logger.debug({ event: 'realtime_ws_terminate_error', err: String(err) });
            }
            resolve();
          }, request.closeTimeoutMs)
        );
      }),
    ]);
    timers.forEach((t) => clearTimeout(t));
    fail(new TransportError('transport closed'));
  };

  return { open, send, receive, close };
}
