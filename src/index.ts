export { createRealtimeSession } from './client.js';
export type { CreateRealtimeSessionOptions } from './client.js';
export { RealtimeSession } from './session/realtimeSession.js';
export type { RealtimeSessionEvents, RealtimeSessionOptions } from './session/realtimeSession.js';
export { EventChannel } from './session/eventChannel.js';
export {
  createPcmResampler,
  expectedOutputFrames,
  floatToInt16,
  readPcm16,
  MIN_NATIVE_SAMPLE_RATE,
} from './audio/pcmResampler.js';
export type { PcmResampler } from './audio/pcmResampler.js';
export { ClientEventEncoder, EventIdGenerator, buildSessionUpdate } from './protocol/clientEvents.js';
export type { EncodedClientEvent } from './protocol/clientEvents.js';
export { decodeServerEvent } from './protocol/serverEvents.js';
export type { RawServerFrame } from './protocol/serverEvents.js';
export { runReceiveLoop } from './protocol/inboundDispatcher.js';
export type { InboundHandlers } from './protocol/inboundDispatcher.js';
export { PlaybackReassembler, DEFAULT_PREBUFFER_CHUNKS } from './playback/playbackReassembler.js';
export type { PlaybackSink, PlaybackReassemblerOptions } from './playback/playbackReassembler.js';
export { createWsTransport, getRealtimeWsUrl } from './transport/wsTransport.js';
export {
  AudioDeviceError,
  AudioFormatFault,
  ServerReportedError,
  TransportError,
  toError,
} from './errors.js';
export { loadConfig, parseConfig, reloadConfig, applyEnvironmentOverrides } from './config.js';
export { loadEnvironment, requireApiKey } from './utils/env.js';
export { resolveTurnDetection } from './utils/vad.js';
export { logger } from './logger.js';
export { CLIENT_EVENT_TYPES, SERVER_EVENT_TYPES } from './types.js';
export type * from './types.js';
