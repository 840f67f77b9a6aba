import path from 'node:path';
import dotenv from 'dotenv';

const DEFAULT_ENV_PATH = path.resolve('.env');

export function loadEnvironment(envPath?: string) {
  const resolved = path.resolve(envPath ?? DEFAULT_ENV_PATH);
  const result = dotenv.config({ path: resolved, override: true });
  const code = result.error && 'code' in result.error ? result.error.code : undefined;
  if (result.error && code !== 'ENOENT') {
    throw result.error;
  }
}

export function requireApiKey(): string {
  const key = process.env.REALTIME_API_KEY?.trim();
  if (!key) {
    throw new Error('Realtime API key is required. Set REALTIME_API_KEY in .env');
  }
  return key;
}
