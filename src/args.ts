import path from 'node:path';
import type { AppConfig } from './config.js';
import { ArgumentError } from './errors.js';
import { parseLanguageList, parseQuality } from './tasks.js';
import { Quality } from './types.js';

export type CliMode = 'movie' | 'tv' | 'batch';

export interface CliOptions {
  readonly mode: CliMode;
  /** Catalog id for movie and tv modes. */
  readonly id?: number;
  readonly batchFile?: string;
  readonly season?: number;
  readonly episode?: number;
  readonly outputFile?: string;
  readonly outputDir?: string;
  readonly quality: Quality;
  readonly languages: readonly string[];
  readonly parallel: number;
  readonly fragmentConcurrency: number;
  readonly requestTimeoutMs: number;
  readonly urlOnly: boolean;
  readonly tmdbApiKey?: string;
  readonly useMetadata: boolean;
}

export type ParsedArgs = { readonly help: true } | { readonly help: false; readonly options: CliOptions };

const parseCount = (flag: string, value: string, allowZero = false): number => {
  if (!/^\d+$/u.test(value)) {
    throw new ArgumentError(`${flag} expects a whole number, got "${value}"`);
  }
  const parsed = Number.parseInt(value, 10);
  if (!allowZero && parsed === 0) {
    throw new ArgumentError(`${flag} must be greater than zero`);
  }
  return parsed;
};

const selectMode = (current: CliMode | undefined, next: CliMode): CliMode => {
  if (current && current !== next) {
    throw new ArgumentError(`--${current} and --${next} cannot be combined`);
  }
  return next;
};

/** Splits `--flag=value` into its parts; anything else has no inline value. */
const splitInlineValue = (arg: string): [string, string | undefined] => {
  const equals = arg.indexOf('=');
  return arg.startsWith('--') && equals > 0 ? [arg.slice(0, equals), arg.slice(equals + 1)] : [arg, undefined];
};

/**
 * Parses incoming CLI arguments and resolves the effective execution configuration.
 * Defaults come from the loaded configuration; flags override them.
 */
export const parseArgs = (argv: readonly string[], config: AppConfig): ParsedArgs => {
  let mode: CliMode | undefined;
  let id: number | undefined;
  let batchFile: string | undefined;
  let season: number | undefined;
  let episode: number | undefined;
  let outputFile: string | undefined;
  let outputDir: string | undefined;
  let quality = config.defaultQuality;
  let languages = config.defaultLanguages;
  let parallel = config.concurrency;
  let fragmentConcurrency = config.fragmentConcurrency;
  let requestTimeoutMs = config.requestTimeoutMs;
  let urlOnly = false;
  let tmdbApiKey = config.tmdbApiKey;
  let useMetadata = true;

  const args = [...argv];
  let cursor = 0;
  while (cursor < args.length) {
    const arg = args[cursor];
    cursor += 1;
    const [flag, inlineValue] = splitInlineValue(arg);

    const takeValue = (): string => {
      if (inlineValue !== undefined) {
        return inlineValue;
      }
      const next = args[cursor];
      if (next === undefined || (next.startsWith('-') && next.length > 1)) {
        throw new ArgumentError(`${flag} requires a value`);
      }
      cursor += 1;
      return next;
    };

    switch (flag) {
      case '--help':
      case '-h':
        return { help: true };
      case '--movie':
        mode = selectMode(mode, 'movie');
        id = parseCount(flag, takeValue());
        break;
      case '--tv':
        mode = selectMode(mode, 'tv');
        id = parseCount(flag, takeValue());
        break;
      case '--batch':
      case '-b':
        mode = selectMode(mode, 'batch');
        batchFile = path.resolve(process.cwd(), takeValue());
        break;
      case '--season':
      case '-s':
        season = parseCount(flag, takeValue(), true);
        break;
      case '--episode':
      case '-e':
        episode = parseCount(flag, takeValue());
        break;
      case '--output':
      case '-o':
        outputFile = takeValue();
        break;
      case '--output-dir':
      case '-d':
        outputDir = takeValue();
        break;
      case '--quality':
      case '-q': {
        const value = takeValue();
        const parsed = parseQuality(value);
        if (parsed === null) {
          throw new ArgumentError(`--quality expects "best" or a height such as 720, got "${value}"`);
        }
        quality = parsed;
        break;
      }
      case '--lang':
      case '-l': {
        const value = takeValue();
        const parsed = parseLanguageList(value);
        if (parsed.length === 0) {
          throw new ArgumentError(`--lang expects one or more comma-separated codes, got "${value}"`);
        }
        languages = parsed;
        break;
      }
      case '--parallel':
      case '-p':
        parallel = parseCount(flag, takeValue());
        break;
      case '--ytdlp-concurrency':
        fragmentConcurrency = parseCount(flag, takeValue());
        break;
      case '--timeout':
        requestTimeoutMs = parseCount(flag, takeValue()) * 1000;
        break;
      case '--url-only':
        urlOnly = true;
        break;
      case '--tmdb-api-key':
        tmdbApiKey = takeValue();
        break;
      case '--no-metadata':
        useMetadata = false;
        break;
      default:
        throw new ArgumentError(`Unknown option "${arg}"`);
    }
  }

  if (!mode) {
    throw new ArgumentError('One of --movie, --tv or --batch is required');
  }
  if (episode !== undefined && season === undefined) {
    throw new ArgumentError('--episode requires --season');
  }
  if ((season !== undefined || episode !== undefined) && mode !== 'tv') {
    throw new ArgumentError('--season and --episode only apply to --tv');
  }
  if (mode === 'batch' && urlOnly) {
    throw new ArgumentError('--url-only cannot be used with --batch');
  }
  if (outputFile && !(mode === 'movie' || (mode === 'tv' && episode !== undefined))) {
    throw new ArgumentError('--output only applies to a single movie or episode');
  }

  return {
    help: false,
    options: {
      mode,
      id,
      batchFile,
      season,
      episode,
      outputFile,
      outputDir,
      quality,
      languages,
      parallel,
      fragmentConcurrency,
      requestTimeoutMs,
      urlOnly,
      tmdbApiKey,
      useMetadata,
    },
  };
};

/**
 * Displays a concise help menu describing supported CLI options.
 */
export const printHelp = (): void => {
  console.log('\nHLS embed downloader\n');
  console.log('Usage:');
  console.log('  hls-embed-dl --movie 550                        # Download a movie');
  console.log('  hls-embed-dl --tv 1396 --season 1 --episode 1   # Download one episode');
  console.log('  hls-embed-dl --tv 1396 --season 1               # Download a whole season');
  console.log('  hls-embed-dl --tv 1396                          # Download every season');
  console.log('  hls-embed-dl --batch downloads.txt -p 3         # Download a list');
  console.log('  hls-embed-dl --movie 550 --url-only             # Print the playlist URL');
  console.log('\nOptions:');
  console.log('  -s, --season <n>             Season number (tv)');
  console.log('  -e, --episode <n>            Episode number (tv, requires --season)');
  console.log('  -o, --output <file>          Output file for a single movie or episode');
  console.log('  -d, --output-dir <dir>       Directory for generated file names');
  console.log('  -q, --quality <best|height>  Video height ceiling, e.g. 720 (default best)');
  console.log('  -l, --lang <codes>           Comma-separated languages, first is primary (e.g. en,it)');
  console.log('  -p, --parallel <n>           Concurrent downloads (default DOWNLOAD_CONCURRENCY or 1)');
  console.log('      --ytdlp-concurrency <n>  Fragments fetched in parallel by yt-dlp (default 5)');
  console.log('      --timeout <seconds>      HTTP request timeout (default 30)');
  console.log('      --url-only               Print playlist URLs without downloading');
  console.log('      --tmdb-api-key <key>     TMDB key for titles and show listings');
  console.log('      --no-metadata            Skip TMDB lookups and use basic file names');
  console.log('  -h, --help                   Show this help message');
  console.log('\nBatch file lines:');
  console.log('  tv <id> <season> <episode> [output] [lang] [quality]');
  console.log('  movie <id> [output] [lang] [quality]');
  console.log(`  Use "-" for any optional field to keep the default.`);
};
