import path from 'node:path';
import dotenv from 'dotenv';

const DEFAULT_ENV_PATH = path.resolve('.env');

function load(envPath: string) {
  const resolved = path.resolve(envPath);
  const result = dotenv.config({ path: resolved, override: true });
  const code = result.error && 'code' in result.error ? result.error.code : undefined;
  if (result.error && code !== 'ENOENT') {
    throw result.error;
  }
}

export function loadEnvironment(envPath?: string) {
  load(envPath ?? DEFAULT_ENV_PATH);
}

export function getApiBaseUrl(): string | undefined {
  const raw = process.env.VOICE_API_BASE_URL?.trim();
  return raw ? raw : undefined;
}

export function getApiToken(): string | undefined {
  const raw = process.env.VOICE_API_TOKEN?.trim();
  return raw ? raw : undefined;
}
