import { toError } from '../errors.js';
import { logger } from '../logger.js';
import type { ServerEvent, TransportSocket } from '../types.js';
import { decodeServerEvent } from './serverEvents.js';

export type InboundHandlers = {
  onEvent: (event: ServerEvent) => void;
  onFailure: (err: Error) => void;
  /** True once the owner asked the channel to close; the loop then ends without reporting. */
  isClosing: () => boolean;
};

/**
 * Pulls frames one at a time and hands each decoded event to `onEvent` before asking for the
 * next one. Wire order is therefore preserved even when a handler is slow.
 */
export async function runReceiveLoop(transport: TransportSocket, handlers: InboundHandlers): Promise<void> {
  for (;;) {
    let frame: Awaited<ReturnType<TransportSocket['receive']>>;
    try {
      frame = await transport.receive();
    } catch (err) {
      if (handlers.isClosing()) return;
      handlers.onFailure(toError(err, 'receive failed'));
      return;
    }

    if (handlers.isClosing()) return;

    const event = decodeServerEvent(frame);
    if (!event) continue;

    try {
      handlers.onEvent(event);
    } catch (err) {
      logger.error({
        event: 'realtime_inbound_handler_failed',
        type: event.type,
        message: toError(err).message,
      });
    }
  }
}
