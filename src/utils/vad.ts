import type { TurnDetectionConfig } from '../types.js';

export type ServerVadPayload = {
  type: 'server_vad';
  threshold: number;
  silence_duration_ms: number;
};

const DEFAULT_TURN_DETECTION: TurnDetectionConfig = {
  threshold: 0.5,
  silenceDurationMs: 800,
};

const clampNumber = (value: number | undefined, min: number, max: number, fallback: number): number => {
  const safe = typeof value === 'number' && Number.isFinite(value) ? value : fallback;
  return Math.min(max, Math.max(min, safe));
};

export function resolveTurnDetection(vad?: Partial<TurnDetectionConfig>): TurnDetectionConfig {
  const threshold = clampNumber(vad?.threshold, 0, 1, DEFAULT_TURN_DETECTION.threshold);
  const silenceDurationMs = clampNumber(vad?.silenceDurationMs, 50, 5000, DEFAULT_TURN_DETECTION.silenceDurationMs);
  return {
    threshold,
    silenceDurationMs: Math.round(silenceDurationMs),
  };
}

export function toServerVadPayload(vad?: Partial<TurnDetectionConfig>): ServerVadPayload {
  const resolved = resolveTurnDetection(vad);
  return {
    type: 'server_vad',
    threshold: resolved.threshold,
    silence_duration_ms: resolved.silenceDurationMs,
  };
}
