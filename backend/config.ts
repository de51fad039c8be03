import path from 'path';

/**
 * Central config from environment. Validates required vars in production.
 */
const NODE_ENV = process.env.NODE_ENV || 'development';
const isProd = NODE_ENV === 'production';

function env(name: string, defaultValue?: string): string {
  const value = process.env[name] ?? defaultValue;
  if (isProd && (value === undefined || value === '')) {
    throw new Error(`Missing required env: ${name}`);
  }
  return value ?? '';
}

function intEnv(name: string, defaultValue: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return defaultValue;
  const n = parseInt(raw, 10);
  return Number.isFinite(n) && n > 0 ? n : defaultValue;
}

function flagEnv(name: string): boolean {
  const raw = (process.env[name] ?? '').trim().toLowerCase();
  return raw === '1' || raw === 'true' || raw === 'yes';
}

export type TtsProvider = 'openai' | 'elevenlabs';

function ttsProviderEnv(): TtsProvider {
  return process.env.TTS_PROVIDER?.trim().toLowerCase() === 'elevenlabs' ? 'elevenlabs' : 'openai';
}

const workspaceRoot = process.cwd();

export const config = {
  env: NODE_ENV,
  isProd,

  port: parseInt(process.env.PORT || '4000', 10),
  host: process.env.HOST || '127.0.0.1',

  openai: {
    apiKey: env('OPENAI_API_KEY', ''),
    chatModel: process.env.OPENAI_CHAT_MODEL || 'gpt-4.1-mini',
    imageModel: process.env.OPENAI_IMAGE_MODEL || 'gpt-image-1'
  },

  newsdata: {
    apiKey: process.env.NEWSDATA_API_KEY?.trim() ?? '',
    baseUrl: 'https://newsdata.io/api/1/latest'
  },

  tts: {
    provider: ttsProviderEnv(),
    voice: process.env.TTS_VOICE?.trim() || 'nova',
    elevenApiKey: process.env.ELEVEN_API_KEY?.trim() ?? '',
    elevenVoiceId: process.env.ELEVEN_VOICE_ID?.trim() || 'PlmstgXEUNQWiPyS27i2'
  },

  /** Persisted selection state (used sets, breaking counters, locks) */
  dataDir: path.resolve(workspaceRoot, process.env.DATA_DIR || 'data'),
  outputDir: path.resolve(workspaceRoot, process.env.OUTPUT_DIR || 'output'),
  assetsDir: path.resolve(workspaceRoot, process.env.ASSETS_DIR || 'assets'),

  selection: {
    usedSetMax: intEnv('USED_SET_MAX', 500),
    feedConcurrency: intEnv('FEED_CONCURRENCY', 6),
    itemsPerFeed: 10
  },

  breaking: {
    minSources: intEnv('BREAKING_MIN_SOURCES', 5),
    maxPerDay: intEnv('BREAKING_MAX_PER_DAY', 3),
    verify: flagEnv('BREAKING_VERIFY')
  },

  /** Calendar used for the breaking-news daily quota and output timestamps */
  timezone: process.env.TIMEZONE || 'UTC',

  /** Language code to burn into the rendered video; empty = sidecar .srt files only */
  burnSubtitles: process.env.BURN_SUBTITLES?.trim() ?? '',

  /** TTF for thumbnail captions; empty = fontconfig's default */
  thumbnailFont: process.env.THUMBNAIL_FONT?.trim() ?? '',

  mongodb: {
    uri: process.env.MONGODB_URI?.trim() ?? '',
    dbName: process.env.MONGODB_DB_NAME || 'news_pipeline'
  },

  r2: {
    accountId: process.env.R2_ACCOUNT_ID,
    accessKeyId: process.env.R2_ACCESS_KEY_ID,
    secretAccessKey: process.env.R2_SECRET_ACCESS_KEY,
    bucketName: process.env.R2_BUCKET_NAME
  },

  workspaceRoot
} as const;

export type Config = typeof config;
