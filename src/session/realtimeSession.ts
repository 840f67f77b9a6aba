import { createPcmResampler, sameFormat } from '../audio/pcmResampler.js';
import type { PcmResampler } from '../audio/pcmResampler.js';
import { applyEnvironmentOverrides } from '../config.js';
import {
  AudioDeviceError,
  AudioFormatFault,
  ServerReportedError,
  TransportError,
  describeError,
  toError,
} from '../errors.js';
import { logger, REALTIME_DEBUG } from '../logger.js';
import { PlaybackReassembler } from '../playback/playbackReassembler.js';
import type { PlaybackSink } from '../playback/playbackReassembler.js';
import { ClientEventEncoder, EventIdGenerator, buildSessionUpdate } from '../protocol/clientEvents.js';
import { runReceiveLoop } from '../protocol/inboundDispatcher.js';
import { createWsTransport } from '../transport/wsTransport.js';
import type {
  AudioFrame,
  AudioIoDevice,
  AudioRoute,
  ClientEvent,
  ConnectionState,
  ImageEncoder,
  ImageFrame,
  PlaybackState,
  RealtimeClientConfig,
  ServerEvent,
  SessionUpdateConfig,
  TransportFactory,
  TransportSocket,
  WireAudioChunk,
  WireAudioFormat,
} from '../types.js';
import { EventChannel } from './eventChannel.js';

export type RealtimeSessionEvents = {
  state_change: [next: ConnectionState, previous: ConnectionState];
  connected: [];
  session_updated: [];
  speech_started: [];
  speech_stopped: [];
  audio_committed: [];
  response_created: [];
  response_done: [];
  transcript_delta: [delta: string];
  transcript_done: [text: string];
  audio_delta: [chunk: WireAudioChunk];
  audio_done: [];
  user_transcript: [text: string];
  first_audio_sent: [];
  error: [err: Error];
};

export type RealtimeSessionOptions = {
  apiKey: string;
  config: RealtimeClientConfig;
  /** Called on the first connect (and again after a disconnect released the device), never at construction. */
  deviceFactory: () => AudioIoDevice;
  transportFactory?: TransportFactory;
  audioRoute?: AudioRoute;
  imageEncoder?: ImageEncoder;
};

function startEngine(device: AudioIoDevice): void {
  if (device.isRunning) return;
  try {
    device.start();
  } catch (err) {
    throw new AudioDeviceError(`Engine start failed: ${describeError(err)}`, { cause: err });
  }
  logger.info({ event: 'realtime_audio_engine_started' });
}

function toPlaybackSink(device: AudioIoDevice): PlaybackSink {
  return {
    get isPlaying() {
      return device.output.isPlaying;
    },
    ensureRunning: () => startEngine(device),
    play: () => device.output.play(),
    schedule: (block) => device.output.schedule(block),
    stop: () => device.output.stop(),
  };
}

/**
 * One realtime conversation over a single socket.
 *
 * disconnected -> connecting -> awaiting_negotiation -> active, and from any state through closing
 * back to disconnected. Recording runs independently inside `active`; a transport failure drops the
 * session to disconnected and is reported once, with reconnection left to the caller.
 */
export class RealtimeSession {
  readonly events = new EventChannel<RealtimeSessionEvents>();

  private readonly apiKey: string;
  private readonly config: RealtimeClientConfig;
  private readonly deviceFactory: () => AudioIoDevice;
  private readonly transportFactory: TransportFactory;
  private readonly audioRoute?: AudioRoute;
  private readonly imageEncoder?: ImageEncoder;
  private readonly wireFormat: WireAudioFormat;
  // Outlives individual connections so event ids are never reused.
  private readonly encoder = new ClientEventEncoder(new EventIdGenerator());

  private connectionState: ConnectionState = 'disconnected';
  private connectionSeq = 0;
  private transport: TransportSocket | null = null;
  private negotiationTimer: NodeJS.Timeout | null = null;
  private closing: Promise<void> | null = null;
  private failureReported = false;

  private device: AudioIoDevice | null = null;
  private reassembler: PlaybackReassembler | null = null;
  private routeActive = false;

  private recording = false;
  private resampler: PcmResampler | null = null;
  private hasSentFirstAudio = false;
  private frameFaultLogged = false;

  constructor(options: RealtimeSessionOptions) {
    this.apiKey = options.apiKey;
    this.config = options.config;
    this.deviceFactory = options.deviceFactory;
    this.transportFactory = options.transportFactory ?? createWsTransport;
    this.audioRoute = options.audioRoute;
    this.imageEncoder = options.imageEncoder;
    this.wireFormat = { sampleRate: options.config.audio.sampleRate, channels: 1, format: 'pcm16le' };
  }

  get state(): ConnectionState {
    return this.connectionState;
  }

  get isConnected(): boolean {
    return this.connectionState === 'active';
  }

  get isRecording(): boolean {
    return this.recording;
  }

  get playbackState(): PlaybackState {
    return this.reassembler?.state ?? 'idle';
  }

  on<K extends keyof RealtimeSessionEvents>(
    event: K,
    listener: (...args: RealtimeSessionEvents[K]) => void
  ): () => void {
    return this.events.on(event, listener);
  }

  async connect(): Promise<void> {
    if (this.connectionState !== 'disconnected') {
      logger.warn({ event: 'realtime_connect_ignored', state: this.connectionState });
      return;
    }

    const config = applyEnvironmentOverrides(this.config);
    this.connectionSeq += 1;
    const seq = this.connectionSeq;
    this.failureReported = false;

    try {
      this.acquireDevice();
    } catch (err) {
      this.emitError(err instanceof AudioDeviceError ? err : new AudioDeviceError(describeError(err), { cause: err }));
      return;
    }

    let transport: TransportSocket;
    try {
      transport = this.transportFactory({
        endpoint: config.endpoint,
        model: config.model,
        apiKey: this.apiKey,
        openTimeoutMs: config.timing.openTimeoutMs,
        closeTimeoutMs: config.timing.closeTimeoutMs,
        pingIntervalMs: config.timing.pingIntervalMs,
      });
    } catch (err) {
      this.emitError(new TransportError(describeError(err), { cause: err }));
      this.releaseDevice();
      return;
    }

    logger.info({ event: 'realtime_session_connect', endpoint: config.endpoint, model: config.model });
    this.transport = transport;
    this.setState('connecting');

    const opened = transport.open();
    this.scheduleNegotiation(seq, opened, config.session, config.timing.negotiationDelayMs);

    try {
      await opened;
    } catch (err) {
      if (seq !== this.connectionSeq) return;
      this.handleTransportFailure(err instanceof TransportError ? err : new TransportError(describeError(err), { cause: err }));
      return;
    }

    if (!this.isCurrent(seq, 'connecting')) return;
    this.setState('awaiting_negotiation');

    runReceiveLoop(transport, {
      onEvent: (event) => this.handleServerEvent(event),
      onFailure: (err) => this.handleTransportFailure(new TransportError('Connection lost', { cause: err })),
      isClosing: () => seq !== this.connectionSeq || this.connectionState === 'closing',
    }).catch((err) => {
      logger.error({ event: 'realtime_receive_loop_crashed', message: toError(err).message });
    });
  }

  disconnect(): Promise<void> {
    if (this.closing) return this.closing;
    if (this.connectionState === 'disconnected' && !this.transport && !this.device) {
      return Promise.resolve();
    }
    logger.info({ event: 'realtime_session_disconnect', state: this.connectionState });
    const closing = this.teardown().finally(() => {
      this.closing = null;
    });
    this.closing = closing;
    return closing;
  }

  /** Returns true when capture is running after the call. */
  startRecording(): boolean {
    if (this.recording) return true;

    const device = this.device;
    if (this.connectionState !== 'active' || !device) {
      logger.warn({ event: 'realtime_start_recording_rejected', state: this.connectionState });
      return false;
    }

    try {
      this.activateRoute();
    } catch (err) {
      this.emitError(new AudioDeviceError(`Failed to start recording: ${describeError(err)}`, { cause: err }));
      return false;
    }

    const nativeFormat = device.input.nativeFormat;
    let resampler: PcmResampler;
    try {
      resampler = createPcmResampler(nativeFormat, this.wireFormat, {
        minSampleRate: this.config.audio.minNativeSampleRate,
      });
    } catch (err) {
      this.handleAudioFault(err);
      return false;
    }

    this.resampler = resampler;
    this.hasSentFirstAudio = false;
    this.frameFaultLogged = false;
    device.input.removeTap();
    device.input.installTap(this.config.audio.inputBufferFrames, (frame) => this.handleCaptureFrame(frame));

    try {
      startEngine(device);
    } catch (err) {
      this.emitError(toError(err));
    }

    this.recording = true;
    logger.info({
      event: 'realtime_recording_started',
      sampleRate: nativeFormat.sampleRate,
      channels: nativeFormat.channels,
      format: nativeFormat.format,
    });
    return true;
  }

  stopRecording(): void {
    if (!this.recording) return;
    this.recording = false;
    this.hasSentFirstAudio = false;
    this.resampler = null;
    this.device?.input.removeTap();
    logger.info({ event: 'realtime_recording_stopped' });
  }

  commitAudioBuffer(): boolean {
    return this.sendWhenActive({ type: 'input_audio_buffer.commit' });
  }

  createResponse(): boolean {
    return this.sendWhenActive({ type: 'response.create' });
  }

  /** Sends already-compressed JPEG bytes. */
  sendImage(jpeg: Buffer): boolean {
    if (jpeg.length === 0) {
      logger.warn({ event: 'realtime_image_dropped', reason: 'empty' });
      return false;
    }
    return this.sendWhenActive({ type: 'input_image_buffer.append', image: jpeg });
  }

  /** Compresses a raw frame through the configured encoder, then sends it. */
  async sendImageFrame(frame: ImageFrame): Promise<boolean> {
    const encoder = this.imageEncoder;
    if (!encoder) {
      logger.warn({ event: 'realtime_image_dropped', reason: 'no image encoder configured' });
      return false;
    }
    let jpeg: Buffer;
    try {
      jpeg = await encoder.encodeJpeg(frame, this.config.image.jpegQuality);
    } catch (err) {
      logger.warn({ event: 'realtime_image_dropped', reason: 'encode failed', message: describeError(err) });
      return false;
    }
    return this.sendImage(jpeg);
  }

  private scheduleNegotiation(
    seq: number,
    opened: Promise<void>,
    session: SessionUpdateConfig,
    delayMs: number
  ): void {
    this.negotiationTimer = setTimeout(() => {
      this.negotiationTimer = null;
      opened.then(
        () => {
          // session.created may already have arrived; the update is still owed in that case.
          if (!this.isCurrent(seq, 'awaiting_negotiation') && !this.isCurrent(seq, 'active')) return;
          logger.info({ event: 'realtime_session_update', voice: session.voice });
          this.sendEvent(buildSessionUpdate(session));
        },
        // Open failures are reported by connect().
        () => undefined
      );
    }, delayMs);
  }

  private handleServerEvent(event: ServerEvent): void {
    if (REALTIME_DEBUG) {
      logger.debug({ event: 'realtime_server_event', type: event.type });
    }

    switch (event.type) {
      case 'session.created':
      case 'session.updated':
        if (this.connectionState === 'awaiting_negotiation') {
          this.setState('active');
          logger.info({ event: 'realtime_session_ready', via: event.type });
          this.events.emit('connected');
        } else if (this.connectionState === 'active') {
          this.events.emit('session_updated');
        }
        return;
      case 'input_audio_buffer.speech_started':
        this.events.emit('speech_started');
        return;
      case 'input_audio_buffer.speech_stopped':
        this.events.emit('speech_stopped');
        return;
      case 'input_audio_buffer.committed':
        this.events.emit('audio_committed');
        return;
      case 'response.created':
        this.events.emit('response_created');
        return;
      case 'response.done':
        this.events.emit('response_done');
        return;
      case 'response.audio_transcript.delta':
        this.events.emit('transcript_delta', event.delta);
        return;
      case 'response.audio_transcript.done':
        this.events.emit('transcript_done', event.text);
        return;
      case 'response.audio.delta':
        this.events.emit('audio_delta', event.audio);
        this.reassembler?.push(event.audio);
        return;
      case 'response.audio.done':
        this.reassembler?.finish();
        this.events.emit('audio_done');
        return;
      case 'conversation.item.input_audio_transcription.completed':
        this.events.emit('user_transcript', event.transcript);
        return;
      case 'conversation.item.created':
        logger.debug({ event: 'realtime_conversation_item_created' });
        return;
      case 'error':
        logger.warn({ event: 'realtime_server_error', message: event.message, code: event.code });
        this.events.emit('error', new ServerReportedError(event.message, event.code));
        return;
    }
  }

  private handleCaptureFrame(frame: AudioFrame): void {
    if (!this.recording) return;

    let resampler = this.resampler;
    if (!resampler || !sameFormat(frame, resampler.native)) {
      try {
        resampler = createPcmResampler(
          { sampleRate: frame.sampleRate, channels: frame.channels, format: frame.format },
          this.wireFormat,
          { minSampleRate: this.config.audio.minNativeSampleRate }
        );
      } catch (err) {
        if (!this.frameFaultLogged) {
          this.frameFaultLogged = true;
          logger.warn({ event: 'realtime_capture_frame_dropped', message: describeError(err) });
        }
        return;
      }
      logger.info({ event: 'realtime_capture_format_changed', sampleRate: frame.sampleRate, channels: frame.channels });
      this.resampler = resampler;
    }

    const chunk = resampler.convert(frame);
    if (chunk.length === 0) return;
    if (!this.sendEvent({ type: 'input_audio_buffer.append', audio: chunk })) return;

    if (!this.hasSentFirstAudio) {
      this.hasSentFirstAudio = true;
      logger.info({ event: 'realtime_first_audio_sent' });
      this.events.emit('first_audio_sent');
    }
  }

  private handleAudioFault(err: unknown): void {
    if (!(err instanceof AudioFormatFault)) {
      this.emitError(new AudioDeviceError(`Failed to start recording: ${describeError(err)}`, { cause: err }));
      return;
    }
    logger.warn({ event: 'realtime_audio_format_fault', sampleRate: err.sampleRate, message: err.message });
    if (this.config.faults.audioFaultPolicy === 'report') {
      this.events.emit('error', err);
    }
  }

  private sendWhenActive(event: ClientEvent): boolean {
    if (this.connectionState !== 'active') {
      logger.warn({ event: 'realtime_send_rejected', type: event.type, state: this.connectionState });
      return false;
    }
    return this.sendEvent(event);
  }

  /**
   * Encodes and hands the event to the transport without waiting for the write. Called from the
   * capture callback too, so it must never block.
   */
  private sendEvent(event: ClientEvent): boolean {
    const transport = this.transport;
    if (!transport) return false;
    const encoded = this.encoder.encode(event);
    if (!encoded) return false;

    const seq = this.connectionSeq;
    transport.send(encoded.text).catch((err) => {
      if (seq !== this.connectionSeq) return;
      this.handleTransportFailure(new TransportError('Connection lost', { cause: err }));
    });
    return true;
  }

  private handleTransportFailure(err: TransportError): void {
    if (this.failureReported || this.connectionState === 'closing' || this.connectionState === 'disconnected') {
      return;
    }
    this.failureReported = true;
    logger.warn({
      event: 'realtime_transport_failure',
      state: this.connectionState,
      message: err.message,
      cause: err.cause instanceof Error ? err.cause.message : undefined,
    });
    this.events.emit('error', err);
    this.disconnect().catch((closeErr) => {
      logger.error({ event: 'realtime_teardown_failed', message: toError(closeErr).message });
    });
  }

  private async teardown(): Promise<void> {
    const transport = this.transport;
    this.transport = null;
    this.connectionSeq += 1;
    this.setState('closing');

    if (this.negotiationTimer) {
      clearTimeout(this.negotiationTimer);
      this.negotiationTimer = null;
    }
    this.stopRecording();
    this.reassembler?.reset();
    this.releaseDevice();

    if (transport) {
      try {
        await transport.close();
      } catch (err) {
        logger.warn({ event: 'realtime_transport_close_failed', message: describeError(err) });
      }
    }
    this.setState('disconnected');
  }

  private acquireDevice(): void {
    if (this.device) return;
    const device = this.deviceFactory();
    device.prepare(this.wireFormat);
    this.device = device;
    this.reassembler = new PlaybackReassembler(toPlaybackSink(device), {
      prebufferChunks: this.config.audio.prebufferChunks,
      onError: (err) => this.emitError(err),
    });
    logger.info({ event: 'realtime_audio_graph_ready', sampleRate: this.wireFormat.sampleRate });
  }

  private releaseDevice(): void {
    const device = this.device;
    this.device = null;
    this.reassembler = null;
    if (device) {
      try {
        device.output.stop();
        if (device.isRunning) device.stop();
        device.release();
      } catch (err) {
        logger.warn({ event: 'realtime_audio_release_failed', message: describeError(err) });
      }
    }
    if (this.routeActive && this.audioRoute) {
      this.routeActive = false;
      try {
        this.audioRoute.deactivate();
      } catch (err) {
        logger.warn({ event: 'realtime_audio_route_deactivate_failed', message: describeError(err) });
      }
    }
  }

  private activateRoute(): void {
    if (!this.audioRoute || this.routeActive) return;
    this.audioRoute.activate(this.config.route);
    this.routeActive = true;
  }

  private emitError(err: Error): void {
    logger.warn({ event: 'realtime_session_error', name: err.name, message: err.message });
    this.events.emit('error', err);
  }

  private isCurrent(seq: number, state: ConnectionState): boolean {
    return seq === this.connectionSeq && this.connectionState === state;
  }

  private setState(next: ConnectionState): void {
    const previous = this.connectionState;
    if (previous === next) return;
    this.connectionState = next;
    if (REALTIME_DEBUG) {
      logger.debug({ event: 'realtime_state_change', from: previous, to: next });
    }
    this.events.emit('state_change', next, previous);
  }
}
