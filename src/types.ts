export const CLIENT_EVENT_TYPES = [
  'session.update',
  'input_audio_buffer.append',
  'input_audio_buffer.commit',
  'input_image_buffer.append',
  'response.create',
] as const;

export type ClientEventType = (typeof CLIENT_EVENT_TYPES)[number];

export const SERVER_EVENT_TYPES = [
  'session.created',
  'session.updated',
  'input_audio_buffer.speech_started',
  'input_audio_buffer.speech_stopped',
  'input_audio_buffer.committed',
  'response.created',
  'response.audio_transcript.delta',
  'response.audio_transcript.done',
  'response.audio.delta',
  'response.audio.done',
  'response.done',
  'conversation.item.created',
  'conversation.item.input_audio_transcription.completed',
  'error',
] as const;

export type ServerEventType = (typeof SERVER_EVENT_TYPES)[number];

export type SampleFormat = 'float32' | 'int16';

export interface NativeAudioFormat {
  sampleRate: number;
  channels: number;
  format: SampleFormat;
}

/**
 * One block of captured audio as the hardware delivered it.
 * Multi-channel data is interleaved.
 */
export interface AudioFrame extends NativeAudioFormat {
  data: Float32Array | Int16Array;
  /** Monotonic capture time (ms). */
  timestamp: number;
}

export interface WireAudioFormat {
  sampleRate: number;
  channels: 1;
  format: 'pcm16le';
}

/** Mono pcm16le at the wire rate. Owned by whichever stage currently holds it. */
export type WireAudioChunk = Buffer;

export interface TurnDetectionConfig {
  threshold: number;
  silenceDurationMs: number;
}

export interface SessionUpdateConfig {
  modalities: readonly string[];
  voice: string;
  inputAudioFormat: string;
  outputAudioFormat: string;
  smoothOutput: boolean;
  instructions: string;
  turnDetection: TurnDetectionConfig;
}

export type ClientEvent =
  | { type: 'session.update'; session: SessionUpdateConfig }
  | { type: 'input_audio_buffer.append'; audio: WireAudioChunk }
  | { type: 'input_audio_buffer.commit' }
  | { type: 'input_image_buffer.append'; image: Buffer }
  | { type: 'response.create' };

export type ServerEvent =
  | { type: 'session.created' }
  | { type: 'session.updated' }
  | { type: 'input_audio_buffer.speech_started' }
  | { type: 'input_audio_buffer.speech_stopped' }
  | { type: 'input_audio_buffer.committed' }
  | { type: 'response.created' }
  | { type: 'response.audio_transcript.delta'; delta: string }
  | { type: 'response.audio_transcript.done'; text: string }
  | { type: 'response.audio.delta'; audio: WireAudioChunk }
  | { type: 'response.audio.done' }
  | { type: 'response.done' }
  | { type: 'conversation.item.created' }
  | { type: 'conversation.item.input_audio_transcription.completed'; transcript: string }
  | { type: 'error'; message: string; code?: string };

export type ConnectionState = 'disconnected' | 'connecting' | 'awaiting_negotiation' | 'active' | 'closing';

export type PlaybackState = 'idle' | 'prebuffering' | 'streaming';

export type AudioFaultPolicy = 'report' | 'log';

export interface AudioRouteOptions {
  mode: string;
  allowBluetooth?: boolean;
  defaultToSpeaker?: boolean;
}

export interface AudioInputPort {
  /** Format the hardware currently delivers; queried before each recording run. */
  readonly nativeFormat: NativeAudioFormat;
  installTap(bufferFrames: number, onFrame: (frame: AudioFrame) => void): void;
  removeTap(): void;
}

export interface AudioOutputPort {
  readonly isPlaying: boolean;
  play(): void;
  /** Enqueue one pcm16le block; blocks play back-to-back in enqueue order. */
  schedule(block: Buffer): void;
  stop(): void;
}

export interface AudioIoDevice {
  readonly input: AudioInputPort;
  readonly output: AudioOutputPort;
  readonly isRunning: boolean;
  /** Attach the playback node for the given output format. Called once per acquisition. */
  prepare(outputFormat: WireAudioFormat): void;
  start(): void;
  stop(): void;
  release(): void;
}

export interface AudioRoute {
  activate(options: AudioRouteOptions): void;
  deactivate(): void;
}

export interface ImageFrame {
  width: number;
  height: number;
  /** RGBA, row-major. */
  data: Uint8Array;
}

export interface ImageEncoder {
  encodeJpeg(frame: ImageFrame, quality: number): Buffer | Promise<Buffer>;
}

export type TransportFrame = string | Buffer;

export interface TransportSocket {
  open(): Promise<void>;
  send(text: string): Promise<void>;
  /** Resolves with the next inbound frame; rejects once the channel is gone. */
  receive(): Promise<TransportFrame>;
  close(): Promise<void>;
}

export interface TransportRequest {
  endpoint: string;
  model: string;
  apiKey: string;
  openTimeoutMs: number;
  closeTimeoutMs: number;
  pingIntervalMs: number;
}

export type TransportFactory = (request: TransportRequest) => TransportSocket;

export interface RealtimeClientConfig {
  endpoint: string;
  model: string;
  session: SessionUpdateConfig;
  audio: {
    sampleRate: number;
    minNativeSampleRate: number;
    prebufferChunks: number;
    inputBufferFrames: number;
  };
  image: {
    jpegQuality: number;
  };
  timing: {
    negotiationDelayMs: number;
    openTimeoutMs: number;
    closeTimeoutMs: number;
    pingIntervalMs: number;
  };
  faults: {
    audioFaultPolicy: AudioFaultPolicy;
  };
  route: AudioRouteOptions;
}
