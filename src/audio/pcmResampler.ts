import { AudioFormatFault } from '../errors.js';
import type { AudioFrame, NativeAudioFormat, SampleFormat, WireAudioChunk, WireAudioFormat } from '../types.js';

const BYTES_PER_SAMPLE = 2; // 16-bit PCM
export const MIN_NATIVE_SAMPLE_RATE = 8_000;

export type PcmResampler = {
  readonly native: NativeAudioFormat;
  readonly target: WireAudioFormat;
  convert(frame: AudioFrame): WireAudioChunk;
};

export function floatToInt16(sample: number): number {
  const clamped = Math.max(-1, Math.min(1, sample));
  return Math.trunc(clamped * 32767);
}

/** Reads pcm16le; a trailing odd byte is ignored. */
export function readPcm16(buffer: Buffer): Int16Array {
  const frames = Math.floor(buffer.length / BYTES_PER_SAMPLE);
  const out = new Int16Array(frames);
  for (let i = 0; i < frames; i += 1) {
    out[i] = buffer.readInt16LE(i * BYTES_PER_SAMPLE);
  }
  return out;
}

export function expectedOutputFrames(inputFrames: number, nativeRate: number, targetRate: number): number {
  if (inputFrames <= 0) return 0;
  return Math.round((inputFrames * targetRate) / nativeRate);
}

export function validateNativeFormat(native: NativeAudioFormat, minSampleRate = MIN_NATIVE_SAMPLE_RATE): void {
  const rate = native.sampleRate;
  if (!Number.isFinite(rate) || rate <= 0) {
    throw new AudioFormatFault(`native sample rate is unusable: ${rate}`, rate);
  }
  if (rate < minSampleRate) {
    throw new AudioFormatFault(`native sample rate ${rate} Hz is below the ${minSampleRate} Hz floor`, rate);
  }
  if (!Number.isInteger(native.channels) || native.channels < 1) {
    throw new AudioFormatFault(`native channel count is unusable: ${native.channels}`, rate);
  }
}

export function sameFormat(a: NativeAudioFormat, b: NativeAudioFormat): boolean {
  return a.sampleRate === b.sampleRate && a.channels === b.channels && a.format === b.format;
}

/** Averages interleaved channels; samples stay on the frame's own scale. */
function mixToMono(frame: AudioFrame): Float32Array {
  const { channels, data } = frame;
  const frames = Math.floor(data.length / channels);
  const mono = new Float32Array(frames);
  for (let i = 0; i < frames; i += 1) {
    let sum = 0;
    for (let c = 0; c < channels; c += 1) {
      sum += data[i * channels + c];
    }
    mono[i] = sum / channels;
  }
  return mono;
}

function interpolate(source: Float32Array, outFrames: number): Float32Array {
  const out = new Float32Array(outFrames);
  if (source.length === 0) return out;
  const step = source.length / outFrames;
  for (let i = 0; i < outFrames; i += 1) {
    const pos = i * step;
    const left = Math.floor(pos);
    const right = Math.min(left + 1, source.length - 1);
    const t = pos - left;
    out[i] = source[left] * (1 - t) + source[right] * t;
  }
  return out;
}

/** Box-filters each output sample's source window; doubles as the anti-alias low-pass. */
function areaAverage(source: Float32Array, outFrames: number): Float32Array {
  const out = new Float32Array(outFrames);
  const step = source.length / outFrames;
  for (let i = 0; i < outFrames; i += 1) {
    const start = i * step;
    const end = Math.min(source.length, start + step);
    let acc = 0;
    let weight = 0;
    let pos = start;
    while (pos < end) {
      const idx = Math.floor(pos);
      const next = Math.min(end, idx + 1);
      const w = next - pos;
      acc += source[idx] * w;
      weight += w;
      pos = next;
    }
    out[i] = weight > 0 ? acc / weight : 0;
  }
  return out;
}

function roundInt16(sample: number): number {
  return Math.max(-32768, Math.min(32767, Math.round(sample)));
}

function encodePcm16(samples: ArrayLike<number>, format: SampleFormat): WireAudioChunk {
  const toWire = format === 'int16' ? roundInt16 : floatToInt16;
  const out = Buffer.alloc(samples.length * BYTES_PER_SAMPLE);
  for (let i = 0; i < samples.length; i += 1) {
    out.writeInt16LE(toWire(samples[i]), i * BYTES_PER_SAMPLE);
  }
  return out;
}

/**
 * Builds a converter from one native capture format to the wire format.
 * A device or format switch requires a new converter; it does not adapt mid-stream.
 */
export function createPcmResampler(
  native: NativeAudioFormat,
  target: WireAudioFormat,
  options?: { minSampleRate?: number }
): PcmResampler {
  validateNativeFormat(native, options?.minSampleRate);
  const frozenNative: NativeAudioFormat = { ...native };

  const convert = (frame: AudioFrame): WireAudioChunk => {
    if (!sameFormat(frame, frozenNative)) {
      throw new AudioFormatFault(
        `frame format ${frame.sampleRate} Hz/${frame.channels}ch/${frame.format} does not match converter`,
        frame.sampleRate
      );
    }

    // Mono at the target rate only needs copying out of the device's buffer.
    if (frame.channels === 1 && frame.sampleRate === target.sampleRate) {
      return encodePcm16(frame.data, frame.format);
    }

    const mono = mixToMono(frame);
    if (frame.sampleRate === target.sampleRate) {
      return encodePcm16(mono, frame.format);
    }

    const outFrames = expectedOutputFrames(mono.length, frame.sampleRate, target.sampleRate);
    if (outFrames === 0) return Buffer.alloc(0);
    const resampled =
      frame.sampleRate > target.sampleRate ? areaAverage(mono, outFrames) : interpolate(mono, outFrames);
    return encodePcm16(resampled, frame.format);
  };

  return { native: frozenNative, target, convert };
}
