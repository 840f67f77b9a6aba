import { toError } from '../errors.js';
import { logger, REALTIME_DEBUG } from '../logger.js';
import type { PlaybackState, WireAudioChunk } from '../types.js';

export const DEFAULT_PREBUFFER_CHUNKS = 2;

export interface PlaybackSink {
  readonly isPlaying: boolean;
  /** Starts the output engine if it is not running. May throw. */
  ensureRunning(): void;
  play(): void;
  schedule(block: Buffer): void;
  stop(): void;
}

export type PlaybackReassemblerOptions = {
  prebufferChunks?: number;
  onError?: (err: Error) => void;
};

/**
 * Turns one response's audio deltas into back-to-back playback blocks.
 *
 * The first `prebufferChunks` deltas of a turn are held and scheduled as a single block, which
 * absorbs arrival jitter before playback starts; later deltas are scheduled one by one. `finish()`
 * flushes whatever is still held when a turn ends before the threshold.
 *
 * All mutation happens inside synchronous methods on the one JavaScript thread, so concurrent
 * deliveries cannot interleave within a push.
 */
export class PlaybackReassembler {
  private readonly sink: PlaybackSink;
  private readonly prebufferChunks: number;
  private readonly onError?: (err: Error) => void;
  private pending: Buffer[] = [];
  private pendingBytes = 0;
  private chunks = 0;
  private current: PlaybackState = 'idle';

  constructor(sink: PlaybackSink, options?: PlaybackReassemblerOptions) {
    this.sink = sink;
    const threshold = options?.prebufferChunks ?? DEFAULT_PREBUFFER_CHUNKS;
    this.prebufferChunks = Number.isInteger(threshold) && threshold >= 1 ? threshold : DEFAULT_PREBUFFER_CHUNKS;
    this.onError = options?.onError;
  }

  get state(): PlaybackState {
    return this.current;
  }

  get chunkCount(): number {
    return this.chunks;
  }

  get bufferedBytes(): number {
    return this.pendingBytes;
  }

  push(chunk: WireAudioChunk): void {
    if (chunk.length === 0) return;

    if (this.current === 'idle') {
      this.beginTurn();
    }

    this.chunks += 1;

    if (this.current === 'prebuffering') {
      this.pending.push(chunk);
      this.pendingBytes += chunk.length;
      if (this.chunks >= this.prebufferChunks) {
        this.flush();
        this.current = 'streaming';
      }
      return;
    }

    this.scheduleBlock(chunk);
  }

  /** End of turn: schedule any held audio, then return to idle. */
  finish(): void {
    this.flush();
    this.resetTurn();
  }

  /** Drops held audio without scheduling it. */
  reset(): void {
    this.pending = [];
    this.pendingBytes = 0;
    this.resetTurn();
  }

  private beginTurn(): void {
    this.pending = [];
    this.pendingBytes = 0;
    this.chunks = 0;
    this.current = 'prebuffering';
    try {
      this.sink.ensureRunning();
      if (!this.sink.isPlaying) this.sink.play();
    } catch (err) {
      this.report(err);
    }
  }

  private flush(): void {
    if (this.pending.length === 0) return;
    const block = this.pending.length === 1 ? this.pending[0] : Buffer.concat(this.pending, this.pendingBytes);
    this.pending = [];
    this.pendingBytes = 0;
    this.scheduleBlock(block);
  }

  private scheduleBlock(block: Buffer): void {
    if (REALTIME_DEBUG) {
      logger.debug({ event: 'realtime_playback_schedule', bytes: block.length, state: this.current });
    }
    try {
      this.sink.schedule(block);
    } catch (err) {
      this.report(err);
    }
  }

  private resetTurn(): void {
    this.chunks = 0;
    this.current = 'idle';
  }

  private report(err: unknown): void {
    const e = toError(err, 'playback failed');
    logger.warn({ event: 'realtime_playback_error', message: e.message });
    this.onError?.(e);
  }
}
