import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { RealtimeClientConfig } from './types.js';
import { resolveTurnDetection } from './utils/vad.js';

const DEFAULT_ENDPOINT = 'wss://dashscope.aliyuncs.com/api-ws/v1/realtime';
const DEFAULT_MODEL = 'qwen3-omni-flash-realtime';
const DEFAULT_VOICE = 'Cherry';

const turnDetectionSchema = z
  .object({
    threshold: z.number().optional(),
    silenceDurationMs: z.number().optional(),
  })
  .default({})
  // Out-of-range VAD values are clamped rather than rejected so that server-side tuning can be copied as-is.
  .transform((vad) => resolveTurnDetection(vad));

const sessionSchema = z
  .object({
    voice: z.string().min(1).default(DEFAULT_VOICE),
    instructions: z.string().default(''),
    modalities: z.array(z.enum(['text', 'audio'])).min(1).default(['text', 'audio']),
    inputAudioFormat: z.string().min(1).default('pcm16'),
    outputAudioFormat: z.string().min(1).default('pcm24'),
    smoothOutput: z.boolean().default(true),
    turnDetection: turnDetectionSchema,
  })
  .default({});

const configSchema = z.object({
  endpoint: z.string().url().default(DEFAULT_ENDPOINT),
  model: z.string().min(1).default(DEFAULT_MODEL),
  session: sessionSchema,
  audio: z
    .object({
      sampleRate: z.number().int().min(8_000).max(96_000).default(24_000),
      minNativeSampleRate: z.number().int().min(1).default(8_000),
      prebufferChunks: z.number().int().min(1).max(16).default(2),
      inputBufferFrames: z.number().int().min(128).max(65_536).default(4096),
    })
    .default({}),
  image: z
    .object({
      jpegQuality: z.number().min(0.1).max(1).default(0.5),
    })
    .default({}),
  timing: z
    .object({
      negotiationDelayMs: z.number().int().min(0).max(10_000).default(500),
      openTimeoutMs: z.number().int().min(100).default(10_000),
      closeTimeoutMs: z.number().int().min(0).default(2_000),
      pingIntervalMs: z.number().int().min(1_000).default(15_000),
    })
    .default({}),
  faults: z
    .object({
      audioFaultPolicy: z.enum(['report', 'log']).default('report'),
    })
    .default({}),
  route: z
    .object({
      mode: z.string().min(1).default('voice_chat'),
      allowBluetooth: z.boolean().optional(),
      defaultToSpeaker: z.boolean().optional(),
    })
    .default({ mode: 'voice_chat', allowBluetooth: true, defaultToSpeaker: true }),
});

let cachedConfig: RealtimeClientConfig | null = null;

export function parseConfig(raw: unknown): RealtimeClientConfig {
  return configSchema.parse(raw ?? {});
}

export async function loadConfig(configPath = path.resolve('config.json')): Promise<RealtimeClientConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  let raw: unknown = {};
  try {
    raw = JSON.parse(await readFile(configPath, 'utf-8'));
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    if (code !== 'ENOENT') throw err;
  }
  cachedConfig = parseConfig(raw);
  return cachedConfig;
}

export function reloadConfig(): void {
  cachedConfig = null;
}

/**
 * Environment overrides are read at call time so a reloaded .env takes effect on the next connect.
 */
export function applyEnvironmentOverrides(config: RealtimeClientConfig): RealtimeClientConfig {
  const endpoint = process.env.REALTIME_ENDPOINT?.trim();
  const model = process.env.REALTIME_MODEL?.trim();
  const voice = process.env.REALTIME_VOICE?.trim();
  return {
    ...config,
    endpoint: endpoint || config.endpoint,
    model: model || config.model,
    session: {
      ...config.session,
      voice: voice || config.session.voice,
    },
  };
}
