import { loadConfig } from './config.js';
import { RealtimeSession } from './session/realtimeSession.js';
import type { RealtimeSessionOptions } from './session/realtimeSession.js';
import { loadEnvironment, requireApiKey } from './utils/env.js';

export type CreateRealtimeSessionOptions = Omit<RealtimeSessionOptions, 'apiKey' | 'config'> & {
  apiKey?: string;
  configPath?: string;
  envPath?: string;
};

/**
 * Loads `.env` and `config.json`, then builds a session. Nothing touches the audio device or the
 * network until `connect()`.
 */
export async function createRealtimeSession(options: CreateRealtimeSessionOptions): Promise<RealtimeSession> {
  const { apiKey, configPath, envPath, ...collaborators } = options;
  loadEnvironment(envPath);
  const config = await loadConfig(configPath);
  return new RealtimeSession({
    ...collaborators,
    apiKey: apiKey ?? requireApiKey(),
    config,
  });
}
