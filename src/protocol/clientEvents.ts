import { randomUUID } from 'node:crypto';
import { logger } from '../logger.js';
import type { ClientEvent, SessionUpdateConfig } from '../types.js';
import { toServerVadPayload } from '../utils/vad.js';

/**
 * Hands out `event_<n>_<suffix>` identifiers. One generator should outlive reconnects so that
 * identifiers are never reused for the lifetime of the client.
 */
export class EventIdGenerator {
  private counter = 0;

  next(): string {
    this.counter += 1;
    return `event_${this.counter}_${randomUUID().replace(/-/g, '').slice(0, 8)}`;
  }
}

type WirePayload = Record<string, unknown>;

function toWirePayload(event: ClientEvent): WirePayload {
  switch (event.type) {
    case 'session.update': {
      const { session } = event;
      return {
        session: {
          modalities: [...session.modalities],
          voice: session.voice,
          input_audio_format: session.inputAudioFormat,
          output_audio_format: session.outputAudioFormat,
          smooth_output: session.smoothOutput,
          instructions: session.instructions,
          turn_detection: toServerVadPayload(session.turnDetection),
        },
      };
    }
    case 'input_audio_buffer.append':
      return { audio: event.audio.toString('base64') };
    case 'input_image_buffer.append':
      return { image: event.image.toString('base64') };
    case 'input_audio_buffer.commit':
    case 'response.create':
      return {};
  }
}

export type EncodedClientEvent = {
  eventId: string;
  type: ClientEvent['type'];
  text: string;
};

export class ClientEventEncoder {
  private readonly ids: EventIdGenerator;

  constructor(ids: EventIdGenerator = new EventIdGenerator()) {
    this.ids = ids;
  }

  /**
   * Serializes the event as `{ event_id, type, ...payload }`.
   * Returns null when the payload cannot be represented; the event is dropped.
   */
  encode(event: ClientEvent): EncodedClientEvent | null {
    const eventId = this.ids.next();
    try {
      const text = JSON.stringify({ event_id: eventId, type: event.type, ...toWirePayload(event) });
      return { eventId, type: event.type, text };
    } catch (err) {
      logger.warn({
        event: 'realtime_client_event_dropped',
        type: event.type,
        eventId,
        message: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }
}

export function buildSessionUpdate(session: SessionUpdateConfig): ClientEvent {
  return { type: 'session.update', session };
}
