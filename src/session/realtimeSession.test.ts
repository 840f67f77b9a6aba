import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { parseConfig } from '../config.js';
import { AudioFormatFault, ServerReportedError, TransportError } from '../errors.js';
import type {
  AudioFrame,
  AudioInputPort,
  AudioIoDevice,
  AudioOutputPort,
  AudioRoute,
  AudioRouteOptions,
  ConnectionState,
  NativeAudioFormat,
  TransportFrame,
  TransportRequest,
  TransportSocket,
  WireAudioFormat,
} from '../types.js';
import { RealtimeSession } from './realtimeSession.js';

type SentEvent = {
  type: string;
  event_id: string;
  audio?: string;
  image?: string;
  session?: { instructions?: string; voice?: string };
};

class FakeTransport implements TransportSocket {
  sent: string[] = [];
  closed = false;
  openError: Error | null = null;
  private inbox: TransportFrame[] = [];
  private waiters: Array<{ resolve: (frame: TransportFrame) => void; reject: (err: Error) => void }> = [];
  private failure: Error | null = null;

  async open(): Promise<void> {
    if (this.openError) throw this.openError;
  }

  async send(text: string): Promise<void> {
    this.sent.push(text);
  }

  receive(): Promise<TransportFrame> {
    return new Promise((resolve, reject) => {
      const queued = this.inbox.shift();
      if (queued !== undefined) {
        resolve(queued);
        return;
      }
      if (this.failure) {
        reject(this.failure);
        return;
      }
      this.waiters.push({ resolve, reject });
    });
  }

  async close(): Promise<void> {
    this.closed = true;
    this.fail(new Error('transport closed'));
  }

  push(body: Record<string, unknown>): void {
    const frame = JSON.stringify(body);
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(frame);
      return;
    }
    this.inbox.push(frame);
  }

  fail(err: Error): void {
    this.failure = this.failure ?? err;
    while (this.waiters.length > 0) {
      this.waiters.shift()?.reject(err);
    }
  }

  sentEvents(): SentEvent[] {
    return this.sent.map((text) => {
      const body: SentEvent = JSON.parse(text);
      return body;
    });
  }

  sentTypes(): string[] {
    return this.sentEvents().map((e) => e.type);
  }
}

class FakeInput implements AudioInputPort {
  nativeFormat: NativeAudioFormat;
  tap: ((frame: AudioFrame) => void) | null = null;
  bufferFrames = 0;
  installs = 0;
  removals = 0;

  constructor(nativeFormat: NativeAudioFormat) {
    this.nativeFormat = nativeFormat;
  }

  installTap(bufferFrames: number, onFrame: (frame: AudioFrame) => void): void {
    this.installs += 1;
    this.bufferFrames = bufferFrames;
    this.tap = onFrame;
  }

  removeTap(): void {
    this.removals += 1;
    this.tap = null;
  }
}

class FakeOutput implements AudioOutputPort {
  isPlaying = false;
  blocks: Buffer[] = [];
  stops = 0;

  play(): void {
    this.isPlaying = true;
  }

  schedule(block: Buffer): void {
    this.blocks.push(block);
  }

  stop(): void {
    this.stops += 1;
    this.isPlaying = false;
  }
}

class FakeAudioDevice implements AudioIoDevice {
  readonly input: FakeInput;
  readonly output = new FakeOutput();
  isRunning = false;
  prepared: WireAudioFormat[] = [];
  releases = 0;

  constructor(nativeFormat: NativeAudioFormat) {
    this.input = new FakeInput(nativeFormat);
  }

  prepare(outputFormat: WireAudioFormat): void {
    this.prepared.push(outputFormat);
  }

  start(): void {
    this.isRunning = true;
  }

  stop(): void {
    this.isRunning = false;
  }

  release(): void {
    this.releases += 1;
  }
}

class FakeRoute implements AudioRoute {
  activations: AudioRouteOptions[] = [];
  deactivations = 0;

  activate(options: AudioRouteOptions): void {
    this.activations.push(options);
  }

  deactivate(): void {
    this.deactivations += 1;
  }
}

const MIC_48K: NativeAudioFormat = { sampleRate: 48_000, channels: 1, format: 'float32' };

const micFrame = (frames = 4096): AudioFrame => ({
  ...MIC_48K,
  data: new Float32Array(frames).fill(0.1),
  timestamp: 0,
});

const settle = async () => {
  for (let i = 0; i < 20; i += 1) {
    await Promise.resolve();
  }
};

type Harness = {
  session: RealtimeSession;
  /** The transport of the latest connect, or the one the next connect will get. */
  readonly transport: FakeTransport;
  device: FakeAudioDevice;
  route: FakeRoute;
  requests: TransportRequest[];
  factoryCalls: () => number;
};

const createHarness = (raw: unknown = { session: { instructions: 'test' } }, nativeFormat = MIC_48K): Harness => {
  const transports: FakeTransport[] = [];
  let pending = new FakeTransport();
  const device = new FakeAudioDevice(nativeFormat);
  const route = new FakeRoute();
  const requests: TransportRequest[] = [];
  let calls = 0;
  const session = new RealtimeSession({
    apiKey: 'test-secret',
    config: parseConfig(raw),
    deviceFactory: () => {
      calls += 1;
      return device;
    },
    transportFactory: (request) => {
      requests.push(request);
      const transport = pending;
      transports.push(transport);
      pending = new FakeTransport();
      return transport;
    },
    audioRoute: route,
  });
  return {
    session,
    get transport() {
      return transports.at(-1) ?? pending;
    },
    device,
    route,
    requests,
    factoryCalls: () => calls,
  };
};

const connectActive = async (harness: Pick<Harness, 'session' | 'transport'>) => {
  await harness.session.connect();
  await vi.advanceTimersByTimeAsync(500);
  harness.transport.push({ type: 'session.created' });
  await settle();
};

const OVERRIDE_KEYS = ['REALTIME_ENDPOINT', 'REALTIME_MODEL', 'REALTIME_VOICE'] as const;
const envSnapshot = Object.fromEntries(OVERRIDE_KEYS.map((key) => [key, process.env[key]]));

beforeEach(() => {
  vi.useFakeTimers();
  for (const key of OVERRIDE_KEYS) delete process.env[key];
});

afterEach(() => {
  vi.useRealTimers();
  for (const key of OVERRIDE_KEYS) {
    const value = envSnapshot[key];
    if (value === undefined) delete process.env[key];
    else process.env[key] = value;
  }
});

describe('RealtimeSession connection lifecycle', () => {
  it('sends session.update after the negotiation delay and fires connected exactly once', async () => {
    const harness = createHarness();
    const { session, transport } = harness;
    const connected = vi.fn();
    session.on('connected', connected);

    await session.connect();
    expect(session.state).toBe('awaiting_negotiation');
    expect(transport.sent).toHaveLength(0);

    await vi.advanceTimersByTimeAsync(499);
    expect(transport.sent).toHaveLength(0);
    await vi.advanceTimersByTimeAsync(1);
    await settle();

    const [update] = transport.sentEvents();
    expect(update?.type).toBe('session.update');
    expect(update?.session?.instructions).toBe('test');
    expect(update?.event_id).toMatch(/^event_1_[0-9a-f]{8}$/);

    transport.push({ type: 'session.created' });
    await settle();
    transport.push({ type: 'session.updated' });
    await settle();

    expect(connected).toHaveBeenCalledTimes(1);
    expect(session.state).toBe('active');
    expect(session.isConnected).toBe(true);
  });

  it('still sends session.update when session.created arrives before the delay', async () => {
    const { session, transport } = createHarness();
    const connected = vi.fn();
    session.on('connected', connected);

    await session.connect();
    transport.push({ type: 'session.created' });
    await settle();
    expect(connected).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(500);
    await settle();
    expect(transport.sentTypes()).toEqual(['session.update']);
  });

  it('publishes every state transition in order', async () => {
    const harness = createHarness();
    const states: ConnectionState[] = [];
    harness.session.on('state_change', (next) => states.push(next));

    await connectActive(harness);
    await harness.session.disconnect();
    await settle();

    expect(states).toEqual(['connecting', 'awaiting_negotiation', 'active', 'closing', 'disconnected']);
  });

  it('builds the transport request from config, key and environment overrides', async () => {
    process.env.REALTIME_MODEL = 'omni-test-model';
    const { session, requests } = createHarness();
    await session.connect();
    expect(requests).toEqual([
      {
        endpoint: 'wss://dashscope.aliyuncs.com/api-ws/v1/realtime',
        model: 'omni-test-model',
        apiKey: 'test-secret',
        openTimeoutMs: 10_000,
        closeTimeoutMs: 2_000,
        pingIntervalMs: 15_000,
      },
    ]);
  });

  it('acquires the audio device on connect, not at construction', async () => {
    const harness = createHarness();
    expect(harness.factoryCalls()).toBe(0);
    await harness.session.connect();
    expect(harness.factoryCalls()).toBe(1);
    expect(harness.device.prepared).toEqual([{ sampleRate: 24_000, channels: 1, format: 'pcm16le' }]);
  });

  it('ignores connect while already connecting or connected', async () => {
    const harness = createHarness();
    await connectActive(harness);
    await harness.session.connect();
    expect(harness.requests).toHaveLength(1);
    expect(harness.factoryCalls()).toBe(1);
  });

  it('reports an open failure and returns to disconnected', async () => {
    const harness = createHarness();
    harness.transport.openError = new Error('realtime connection failed: ECONNREFUSED');
    const errors: Error[] = [];
    harness.session.on('error', (err) => errors.push(err));

    await harness.session.connect();
    await settle();

    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(TransportError);
    expect(errors[0]?.message).toBe('realtime connection failed: ECONNREFUSED');
    expect(harness.session.state).toBe('disconnected');

    await vi.advanceTimersByTimeAsync(500);
    expect(harness.transport.sent).toHaveLength(0);
  });

  it('reports a dropped connection once and ends disconnected', async () => {
    const harness = createHarness();
    await connectActive(harness);
    expect(harness.session.startRecording()).toBe(true);
    const errors: Error[] = [];
    harness.session.on('error', (err) => errors.push(err));

    harness.transport.fail(new Error('socket reset'));
    await settle();

    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(TransportError);
    expect(errors[0]?.message).toBe('Connection lost');
    expect(harness.session.state).toBe('disconnected');
    expect(harness.session.isRecording).toBe(false);
    expect(harness.transport.closed).toBe(true);
  });

  it('tears down recording, playback, route and device on disconnect', async () => {
    const harness = createHarness();
    const { session, device, route, transport } = harness;
    await connectActive(harness);
    session.startRecording();

    await session.disconnect();

    expect(session.state).toBe('disconnected');
    expect(session.isRecording).toBe(false);
    expect(device.input.tap).toBeNull();
    expect(device.output.stops).toBe(1);
    expect(device.isRunning).toBe(false);
    expect(device.releases).toBe(1);
    expect(route.deactivations).toBe(1);
    expect(transport.closed).toBe(true);
  });

  it('treats repeated disconnects as one', async () => {
    const harness = createHarness();
    await connectActive(harness);
    await Promise.all([harness.session.disconnect(), harness.session.disconnect()]);
    await harness.session.disconnect();
    expect(harness.device.releases).toBe(1);
  });

  it('acquires the device again on the next connect and keeps event ids increasing', async () => {
    const harness = createHarness();
    await connectActive(harness);
    const first = harness.transport;
    await harness.session.disconnect();

    await connectActive(harness);
    const second = harness.transport;
    expect(second).not.toBe(first);
    expect(harness.factoryCalls()).toBe(2);
    expect(harness.session.state).toBe('active');
    expect(first.sentEvents()[0]?.event_id).toMatch(/^event_1_/);
    expect(second.sentEvents()[0]?.event_id).toMatch(/^event_2_/);
  });
});

describe('RealtimeSession inbound events', () => {
  it('plays a single audio delta when the response finishes', async () => {
    const harness = createHarness();
    await connectActive(harness);
    const chunks: Buffer[] = [];
    const audioDone = vi.fn();
    harness.session.on('audio_delta', (chunk) => chunks.push(chunk));
    harness.session.on('audio_done', audioDone);

    harness.transport.push({ type: 'response.audio.delta', delta: 'AAA=' });
    await settle();
    expect(harness.session.playbackState).toBe('prebuffering');

    harness.transport.push({ type: 'response.audio.done' });
    await settle();

    expect(chunks).toHaveLength(1);
    expect(chunks[0]?.length).toBe(2);
    expect(audioDone).toHaveBeenCalledTimes(1);
    expect(harness.device.output.blocks.map((b) => b.length)).toEqual([2]);
    expect(harness.session.playbackState).toBe('idle');
  });

  it('forwards transcripts in wire order', async () => {
    const harness = createHarness();
    await connectActive(harness);
    const seen: string[] = [];
    harness.session.on('transcript_delta', (delta) => seen.push(`delta:${delta}`));
    harness.session.on('transcript_done', (text) => seen.push(`done:${text}`));
    harness.session.on('user_transcript', (text) => seen.push(`user:${text}`));

    harness.transport.push({ type: 'conversation.item.input_audio_transcription.completed', transcript: 'hi' });
    harness.transport.push({ type: 'response.audio_transcript.delta', delta: 'Hel' });
    harness.transport.push({ type: 'response.audio_transcript.delta', delta: 'lo' });
    harness.transport.push({ type: 'response.audio_transcript.done', text: 'Hello' });
    await settle();

    expect(seen).toEqual(['user:hi', 'delta:Hel', 'delta:lo', 'done:Hello']);
  });

  it('surfaces server errors without leaving the active state', async () => {
    const harness = createHarness();
    await connectActive(harness);
    const errors: Error[] = [];
    harness.session.on('error', (err) => errors.push(err));

    harness.transport.push({ type: 'error', error: { message: 'invalid audio', code: 'invalid_value' } });
    await settle();

    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(ServerReportedError);
    expect(errors[0]).toMatchObject({ message: 'invalid audio', code: 'invalid_value' });
    expect(harness.session.state).toBe('active');
  });
});

describe('RealtimeSession recording', () => {
  it('refuses to record before the session is active', async () => {
    const harness = createHarness();
    expect(harness.session.startRecording()).toBe(false);
    await harness.session.connect();
    expect(harness.session.startRecording()).toBe(false);
    expect(harness.device.input.installs).toBe(0);
  });

  it.each([0, 4000])('does not start recording from a %i Hz input', async (sampleRate) => {
    const harness = createHarness(undefined, { sampleRate, channels: 1, format: 'float32' });
    await connectActive(harness);
    const errors: Error[] = [];
    harness.session.on('error', (err) => errors.push(err));

    expect(harness.session.startRecording()).toBe(false);
    await settle();

    expect(harness.session.isRecording).toBe(false);
    expect(harness.device.input.installs).toBe(0);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(AudioFormatFault);
  });

  it('only logs a format fault under the log policy', async () => {
    const harness = createHarness({ faults: { audioFaultPolicy: 'log' } }, { sampleRate: 0, channels: 1, format: 'float32' });
    await connectActive(harness);
    const errors: Error[] = [];
    harness.session.on('error', (err) => errors.push(err));

    expect(harness.session.startRecording()).toBe(false);
    await settle();
    expect(errors).toHaveLength(0);
  });

  it('installs a tap, starts the engine and activates the route', async () => {
    const harness = createHarness();
    await connectActive(harness);

    expect(harness.session.startRecording()).toBe(true);
    expect(harness.session.startRecording()).toBe(true);

    expect(harness.device.input.installs).toBe(1);
    expect(harness.device.input.bufferFrames).toBe(4096);
    expect(harness.device.isRunning).toBe(true);
    expect(harness.route.activations).toEqual([{ mode: 'voice_chat', allowBluetooth: true, defaultToSpeaker: true }]);
  });

  it('streams resampled capture frames and reports the first one once', async () => {
    const harness = createHarness();
    await connectActive(harness);
    const firstAudio = vi.fn();
    harness.session.on('first_audio_sent', firstAudio);
    harness.session.startRecording();

    harness.device.input.tap?.(micFrame());
    harness.device.input.tap?.(micFrame());
    await settle();

    const appends = harness.transport.sentEvents().filter((e) => e.type === 'input_audio_buffer.append');
    expect(appends).toHaveLength(2);
    expect(Buffer.from(appends[0]?.audio ?? '', 'base64').length).toBe(4096);
    expect(firstAudio).toHaveBeenCalledTimes(1);
  });

  it('rebuilds the converter when the capture format changes', async () => {
    const harness = createHarness();
    await connectActive(harness);
    harness.session.startRecording();

    harness.device.input.tap?.({ sampleRate: 24_000, channels: 2, format: 'float32', data: new Float32Array(8), timestamp: 0 });
    await settle();

    const appends = harness.transport.sentEvents().filter((e) => e.type === 'input_audio_buffer.append');
    expect(appends).toHaveLength(1);
    expect(Buffer.from(appends[0]?.audio ?? '', 'base64').length).toBe(8);
  });

  it('stops recording idempotently without touching the connection', async () => {
    const harness = createHarness();
    await connectActive(harness);
    harness.session.startRecording();

    harness.session.stopRecording();
    harness.session.stopRecording();

    expect(harness.session.isRecording).toBe(false);
    expect(harness.device.input.removals).toBe(2);
    expect(harness.session.state).toBe('active');

    harness.device.input.tap?.(micFrame());
    expect(harness.transport.sentTypes()).toEqual(['session.update']);
  });
});

describe('RealtimeSession one-shot sends', () => {
  it('rejects sends while not active', () => {
    const { session, transport } = createHarness();
    expect(session.commitAudioBuffer()).toBe(false);
    expect(session.createResponse()).toBe(false);
    expect(session.sendImage(Buffer.from('jpeg'))).toBe(false);
    expect(transport.sent).toHaveLength(0);
  });

  it('sends commit, response.create and images once active', async () => {
    const harness = createHarness();
    await connectActive(harness);

    expect(harness.session.commitAudioBuffer()).toBe(true);
    expect(harness.session.createResponse()).toBe(true);
    expect(harness.session.sendImage(Buffer.alloc(0))).toBe(false);
    expect(harness.session.sendImage(Buffer.from('jpeg'))).toBe(true);
    await settle();

    expect(harness.transport.sentTypes()).toEqual([
      'session.update',
      'input_audio_buffer.commit',
      'response.create',
      'input_image_buffer.append',
    ]);
    expect(harness.transport.sentEvents()[3]?.image).toBe('anBlZw==');
  });

  it('compresses raw frames through the image encoder', async () => {
    const transport = new FakeTransport();
    const encodeJpeg = vi.fn(async () => Buffer.from('jpeg'));
    const session = new RealtimeSession({
      apiKey: 'test-secret',
      config: parseConfig({}),
      deviceFactory: () => new FakeAudioDevice(MIC_48K),
      transportFactory: () => transport,
      imageEncoder: { encodeJpeg },
    });
    await connectActive({ session, transport });

    const frame = { width: 2, height: 1, data: new Uint8Array(8) };
    await expect(session.sendImageFrame(frame)).resolves.toBe(true);
    expect(encodeJpeg).toHaveBeenCalledWith(frame, 0.5);
    expect(transport.sentTypes()).toContain('input_image_buffer.append');
  });

  it('drops a frame when no image encoder is configured', async () => {
    const harness = createHarness();
    await connectActive(harness);
    await expect(harness.session.sendImageFrame({ width: 1, height: 1, data: new Uint8Array(4) })).resolves.toBe(false);
  });
});
