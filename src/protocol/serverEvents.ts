import { logger, REALTIME_DEBUG } from '../logger.js';
import { SERVER_EVENT_TYPES } from '../types.js';
import type { ServerEvent, ServerEventType } from '../types.js';

export type RawServerFrame = string | Buffer | ArrayBuffer | Buffer[];

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const KNOWN_TYPES: ReadonlySet<string> = new Set(SERVER_EVENT_TYPES);

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function isServerEventType(value: string): value is ServerEventType {
  return KNOWN_TYPES.has(value);
}

function rawFrameToUtf8(raw: RawServerFrame): string {
  if (typeof raw === 'string') return raw;
  if (Buffer.isBuffer(raw)) return raw.toString('utf8');
  if (raw instanceof ArrayBuffer) return Buffer.from(raw).toString('utf8');
  return Buffer.concat(raw).toString('utf8');
}

function decodeBase64Audio(value: string): Buffer | null {
  if (value.length === 0 || value.length % 4 !== 0 || !BASE64_PATTERN.test(value)) {
    return null;
  }
  const bytes = Buffer.from(value, 'base64');
  return bytes.length > 0 ? bytes : null;
}

function readErrorMessage(message: Record<string, unknown>): { message: string; code?: string } {
  const nested = isRecord(message.error) ? message.error : null;
  const text =
    nested && typeof nested.message === 'string'
      ? nested.message
      : typeof message.message === 'string'
        ? message.message
        : 'server reported an error';
  const code = nested && typeof nested.code === 'string' ? nested.code : undefined;
  return code ? { message: text, code } : { message: text };
}

/** Undecodable frames are not errors for the caller; they are logged and skipped. */
function drop(reason: string, text: string): null {
  if (REALTIME_DEBUG) {
    logger.debug({ event: 'realtime_server_frame_dropped', reason, bytes: Buffer.byteLength(text) });
  }
  return null;
}

/**
 * Maps one server frame onto a typed event. Malformed frames, frames without a type and unknown
 * types all yield null so that new server event types never break the client.
 */
export function decodeServerEvent(raw: RawServerFrame): ServerEvent | null {
  const text = rawFrameToUtf8(raw);

  let message: unknown;
  try {
    message = JSON.parse(text) as unknown;
  } catch {
    return drop('malformed json', text);
  }

  if (!isRecord(message)) return drop('frame is not an object', text);
  const type = typeof message.type === 'string' ? message.type : '';
  if (!type) return drop('missing type', text);
  if (!isServerEventType(type)) return drop(`unknown type ${type}`, text);

  switch (type) {
    case 'response.audio_transcript.delta': {
      if (typeof message.delta !== 'string') return drop('transcript delta without text', text);
      return { type, delta: message.delta };
    }
    case 'response.audio_transcript.done':
      return { type, text: typeof message.text === 'string' ? message.text : '' };
    case 'response.audio.delta': {
      const audio = typeof message.delta === 'string' ? decodeBase64Audio(message.delta) : null;
      if (!audio) return drop('audio delta without decodable audio', text);
      return { type, audio };
    }
    case 'conversation.item.input_audio_transcription.completed': {
      if (typeof message.transcript !== 'string') return drop('user transcript without text', text);
      return { type, transcript: message.transcript };
    }
    case 'error':
      return { type, ...readErrorMessage(message) };
    case 'session.created':
    case 'session.updated':
    case 'input_audio_buffer.speech_started':
    case 'input_audio_buffer.speech_stopped':
    case 'input_audio_buffer.committed':
    case 'response.created':
    case 'response.audio.done':
    case 'response.done':
    case 'conversation.item.created':
      return { type };
  }
}
