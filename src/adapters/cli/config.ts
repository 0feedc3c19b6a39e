import { TRANSCRIPTION_BACKENDS, type PipelineConfig, type TranscriptionBackend } from '../../types/index.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface GeminiSettings {
  apiKey?: string;
  projectId?: string;
  location: string;
  model: string;
}

export interface AppConfig {
  pipeline: PipelineConfig;
  youtubeApiKey: string;
  gemini: GeminiSettings;
  deepgramApiKey?: string;
  cacheDir: string;
}

/** Command line values, which take precedence over the environment. */
export interface ConfigOverrides {
  language?: string;
  chunkLimit?: string;
  backend?: string;
  model?: string;
  cacheDir?: string;
}

export const DEFAULT_CACHE_DIR = './.cache/tube-digest';
export const DEFAULT_CHUNK_LIMIT = 4000;
export const DEFAULT_SUMMARY_TTL_SECONDS = 30 * 24 * 60 * 60;

type Env = Record<string, string | undefined>;

function parseInteger(name: string, raw: string | undefined, fallback: number, min: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function parseBoolean(name: string, raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') return fallback;

  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigError(`${name} must be true or false, got "${raw}"`);
}

function parseBackend(raw: string | undefined): TranscriptionBackend {
  const value = (raw || 'gemini').trim().toLowerCase();
  const backend = TRANSCRIPTION_BACKENDS.find((candidate) => candidate === value);
  if (!backend) {
    throw new ConfigError(`TRANSCRIPTION_BACKEND must be one of ${TRANSCRIPTION_BACKENDS.join(', ')}, got "${raw}"`);
  }
  return backend;
}

export function resolveCacheDir(env: Env, override?: string): string {
  return override || env.CACHE_DIR || DEFAULT_CACHE_DIR;
}

/**
 * Builds the static configuration once at start-up from the environment
 * (already populated by dotenv) and command line overrides.
 */
export function loadConfig(env: Env, overrides: ConfigOverrides = {}): AppConfig {
  const youtubeApiKey = env.YOUTUBE_API_KEY;
  if (!youtubeApiKey) {
    throw new ConfigError('YOUTUBE_API_KEY is not set');
  }

  const geminiApiKey = env.GEMINI_API_KEY || undefined;
  const projectId = env.GOOGLE_CLOUD_PROJECT || undefined;
  if (!geminiApiKey && !projectId) {
    throw new ConfigError('Set GEMINI_API_KEY, or GOOGLE_CLOUD_PROJECT to use Vertex AI');
  }

  const transcriptionBackend = parseBackend(overrides.backend ?? env.TRANSCRIPTION_BACKEND);
  const deepgramApiKey = env.DEEPGRAM_API_KEY || undefined;
  if (transcriptionBackend === 'deepgram' && !deepgramApiKey) {
    throw new ConfigError('DEEPGRAM_API_KEY is required for the deepgram transcription backend');
  }

  return {
    pipeline: {
      chunkLimit: parseInteger('CHUNK_LIMIT', overrides.chunkLimit ?? env.CHUNK_LIMIT, DEFAULT_CHUNK_LIMIT, 200),
      transcriptTtlSeconds: parseInteger('TRANSCRIPT_CACHE_TTL', env.TRANSCRIPT_CACHE_TTL, 0, 0),
      summaryTtlSeconds: parseInteger('SUMMARY_CACHE_TTL', env.SUMMARY_CACHE_TTL, DEFAULT_SUMMARY_TTL_SECONDS, 0),
      transcriptionBackend,
      language: overrides.language || env.SUMMARY_LANGUAGE || 'en',
      dedupeInFlight: parseBoolean('DEDUPE_IN_FLIGHT', env.DEDUPE_IN_FLIGHT, true),
    },
    youtubeApiKey,
    gemini: {
      apiKey: geminiApiKey,
      projectId,
      location: env.GOOGLE_CLOUD_LOCATION || 'us-central1',
      model: overrides.model || env.GEMINI_MODEL || 'gemini-2.5-flash',
    },
    deepgramApiKey,
    cacheDir: resolveCacheDir(env, overrides.cacheDir),
  };
}
