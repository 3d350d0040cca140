import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { parseLanguageList, parseQuality } from './tasks.js';
import { Quality } from './types.js';

export const DEFAULT_EMBED_BASE_URL = 'https://vixsrc.to';
export const DEFAULT_EXTENSION = 'mp4';

/** Longest delay a Node timer accepts; larger values fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;
const MAX_PROCESS_TIMEOUT_MINUTES = Math.floor(MAX_TIMER_DELAY_MS / 60_000);

export interface AppConfig {
  readonly embedBaseUrl: string;
  readonly defaultLanguages: readonly string[];
  readonly defaultQuality: Quality;
  readonly concurrency: number;
  readonly fragmentConcurrency: number;
  readonly requestTimeoutMs: number;
  readonly processTimeoutMs: number;
  readonly tmdbApiKey?: string;
  readonly ytDlpPath: string;
  readonly ffmpegPath?: string;
  readonly logLevel: string;
  readonly errorLogFile: string;
  readonly downloadsLedger: string;
}

const envSchema = z.object({
  EMBED_BASE_URL: z.string().url().default(DEFAULT_EMBED_BASE_URL),
  DEFAULT_LANG: z.string().default('en'),
  DEFAULT_QUALITY: z.string().default('best'),
  DOWNLOAD_CONCURRENCY: z.coerce.number().int().positive().default(1),
  YTDLP_CONCURRENCY: z.coerce.number().int().positive().default(5),
  REQUEST_TIMEOUT_SECONDS: z.coerce.number().positive().default(30),
  PROCESS_TIMEOUT_MINUTES: z.coerce.number().positive().max(MAX_PROCESS_TIMEOUT_MINUTES).default(240),
  TMDB_API_KEY: z.string().optional(),
  YTDLP_PATH: z.string().default('yt-dlp'),
  FFMPEG_PATH: z.string().optional(),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'verbose', 'debug', 'silly']).default('info'),
  LOG_FILE: z.string().default('errors.log'),
  DOWNLOADED_LOG: z.string().default('downloaded.log'),
});

/**
 * Builds the runtime configuration from environment variables. Blank values count as unset.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const present = Object.fromEntries(
    Object.entries(env).filter(
      (entry): entry is [string, string] => typeof entry[1] === 'string' && entry[1].trim().length > 0,
    ),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  const defaultLanguages = parseLanguageList(values.DEFAULT_LANG);
  if (defaultLanguages.length === 0) {
    throw new ConfigError(`Invalid configuration: DEFAULT_LANG "${values.DEFAULT_LANG}" has no usable language code`);
  }
  const defaultQuality = parseQuality(values.DEFAULT_QUALITY);
  if (defaultQuality === null) {
    throw new ConfigError(`Invalid configuration: DEFAULT_QUALITY must be "best" or a height, got "${values.DEFAULT_QUALITY}"`);
  }

  return {
    embedBaseUrl: values.EMBED_BASE_URL.replace(/\/+$/u, ''),
    defaultLanguages,
    defaultQuality,
    concurrency: values.DOWNLOAD_CONCURRENCY,
    fragmentConcurrency: values.YTDLP_CONCURRENCY,
    requestTimeoutMs: Math.round(values.REQUEST_TIMEOUT_SECONDS * 1000),
    processTimeoutMs: Math.round(values.PROCESS_TIMEOUT_MINUTES * 60_000),
    tmdbApiKey: values.TMDB_API_KEY,
    ytDlpPath: values.YTDLP_PATH,
    ffmpegPath: values.FFMPEG_PATH,
    logLevel: values.LOG_LEVEL,
    errorLogFile: values.LOG_FILE,
    downloadsLedger: values.DOWNLOADED_LOG,
  };
};

/**
 * Loads `.env` from the working directory, then reads the process environment.
 */
export const initializeConfig = (): AppConfig => {
  dotenv.config();
  return loadConfig(process.env);
};
