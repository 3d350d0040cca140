import path from 'node:path';
import readline from 'node:readline';
import type { SpawnOptionsWithoutStdio } from 'node:child_process';
import type { Readable } from 'node:stream';
import fs from 'fs-extra';
import ffmpeg from 'fluent-ffmpeg';
import YTDlpWrap from 'yt-dlp-wrap';
import type { Logger } from 'winston';
import { DEFAULT_EXTENSION, MAX_TIMER_DELAY_MS } from './config.js';
import { getErrorMessage } from './errors.js';
import { logger } from './logger.js';
import { createFfmpegLineParser, createYtDlpLineParser, ProgressReporter } from './progress.js';
import { Quality } from './types.js';

/**
 * The slice of yt-dlp-wrap's event emitter the executor listens to.
 */
export interface YtDlpEmitter {
  readonly ytDlpProcess?: { readonly stdout: Readable };
  on(event: string, listener: (...args: unknown[]) => void): unknown;
  once(event: string, listener: (...args: unknown[]) => void): unknown;
}

export interface YtDlpRunner {
  exec(args: string[], options?: SpawnOptionsWithoutStdio, abortSignal?: AbortSignal | null): YtDlpEmitter;
  getVersion(): Promise<string>;
}

export interface FfmpegInput {
  readonly source: string;
  readonly options?: readonly string[];
}

export interface FfmpegJob {
  readonly inputs: readonly FfmpegInput[];
  readonly outputOptions: readonly string[];
  readonly output: string;
}

export interface FfmpegRunner {
  isAvailable(): Promise<boolean>;
  /** Resolves false on a nonzero exit, spawn failure or timeout kill. */
  run(job: FfmpegJob, onLine: (line: string) => void): Promise<boolean>;
}

/**
 * Wraps the yt-dlp binary found on PATH (or at the configured location). Nothing is downloaded.
 */
export const createYtDlpRunner = (binaryPath: string): YtDlpRunner => {
  const wrap = new YTDlpWrap(binaryPath);
  return {
    exec: (args, options, abortSignal) => wrap.exec(args, options, abortSignal),
    getVersion: () => wrap.getVersion(),
  };
};

/**
 * Caps a child-process timeout at the largest delay a timer can hold.
 */
export const boundedTimeout = (timeoutMs: number): number => Math.min(timeoutMs, MAX_TIMER_DELAY_MS);

export interface FfmpegRunnerOptions {
  readonly ffmpegPath?: string;
  readonly timeoutMs: number;
  readonly log?: Logger;
}

/**
 * fluent-ffmpeg backed runner; stderr lines are forwarded for progress parsing.
 */
export const createFfmpegRunner = ({ ffmpegPath, timeoutMs, log = logger }: FfmpegRunnerOptions): FfmpegRunner => {
  if (ffmpegPath) {
    ffmpeg.setFfmpegPath(ffmpegPath);
  }

  return {
    isAvailable: () =>
      new Promise<boolean>((resolve) => {
        ffmpeg.getAvailableFormats((error) => resolve(!error));
      }),
    run: (job, onLine) =>
      new Promise<boolean>((resolve) => {
        const command = ffmpeg({ timeout: Math.max(1, Math.floor(boundedTimeout(timeoutMs) / 1000)) });
        for (const input of job.inputs) {
          command.input(input.source);
          if (input.options && input.options.length > 0) {
            command.inputOptions([...input.options]);
          }
        }
        command
          .outputOptions([...job.outputOptions])
          .on('stderr', (line: string) => onLine(line))
          .on('error', (error: Error) => {
            log.warn(`ffmpeg failed for ${job.output}: ${error.message}`);
            resolve(false);
          })
          .on('end', () => resolve(true))
          .save(job.output);
      }),
  };
};

export type DownloadBackend = 'yt-dlp' | 'ffmpeg' | 'none';

export interface DownloadRequest {
  readonly url: string;
  readonly outputPath: string;
  readonly quality: Quality;
  readonly language: string;
  /** Overlay tracks for multi-language merges only need the audio stream. */
  readonly audioOnly?: boolean;
}

/**
 * Ordered preference list: capped video with the requested audio language, then any audio,
 * then a single best-effort stream.
 */
export const buildFormatSelector = (quality: Quality, language: string, audioOnly = false): string => {
  if (audioOnly) {
    return 'bestaudio';
  }
  if (quality === 'best') {
    return `bestvideo+bestaudio[language=${language}]/bestvideo+bestaudio/best`;
  }
  return (
    `bestvideo[height<=${quality}]+bestaudio[language=${language}]/` +
    `bestvideo[height<=${quality}]+bestaudio/best[height<=${quality}]`
  );
};

export interface YtDlpArgsOptions {
  readonly referer: string;
  readonly fragmentConcurrency: number;
}

export const buildYtDlpArgs = (request: DownloadRequest, { referer, fragmentConcurrency }: YtDlpArgsOptions): string[] => [
  '-N',
  String(fragmentConcurrency),
  '-f',
  buildFormatSelector(request.quality, request.language, request.audioOnly),
  '--merge-output-format',
  DEFAULT_EXTENSION,
  '--referer',
  referer,
  '--add-header',
  'Accept: */*',
  '-o',
  request.outputPath,
  '--newline',
  '--no-warnings',
  '--progress-template',
  'download:PROGRESS:%(progress._percent_str)s',
  request.url,
];

/**
 * Transcoder fallback: stream copy straight from the playlist.
 */
export const buildFfmpegDownloadJob = (request: DownloadRequest, referer: string): FfmpegJob => ({
  inputs: [{ source: request.url, options: ['-headers', `Referer: ${referer}\r\n`] }],
  outputOptions: request.audioOnly
    ? ['-map', '0:a:0', '-vn', '-c', 'copy']
    : ['-c', 'copy', '-bsf:a', 'aac_adtstoasc'],
  output: request.outputPath,
});

export interface DownloadExecutorOptions {
  readonly ytDlp: YtDlpRunner;
  readonly ffmpeg: FfmpegRunner;
  readonly referer: string;
  readonly fragmentConcurrency: number;
  readonly processTimeoutMs: number;
  readonly log?: Logger;
}

export interface DownloadExecutor {
  /** Which external tool handles downloads; probed once and memoised. */
  backend(): Promise<DownloadBackend>;
  run(request: DownloadRequest, progress: ProgressReporter): Promise<boolean>;
}

/**
 * Runs yt-dlp and streams its stdout through the progress parser. Resolves true only on exit code 0.
 */
const runYtDlp = (
  runner: YtDlpRunner,
  args: string[],
  progress: ProgressReporter,
  timeoutMs: number,
  log: Logger,
): Promise<boolean> =>
  new Promise<boolean>((resolve) => {
    const controller = new AbortController();
    const parser = createYtDlpLineParser();
    let lines: readline.Interface | undefined;
    let settled = false;

    const delay = boundedTimeout(timeoutMs);
    const timer = setTimeout(() => {
      log.warn(`yt-dlp exceeded ${Math.round(delay / 1000)}s; terminating`);
      controller.abort();
    }, delay);

    const settle = (success: boolean): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      lines?.close();
      resolve(success);
    };

    let emitter: YtDlpEmitter;
    try {
      emitter = runner.exec(args, { env: { ...process.env, PYTHONUNBUFFERED: '1' } }, controller.signal);
    } catch (error) {
      log.error(`Could not start yt-dlp: ${getErrorMessage(error)}`);
      settle(false);
      return;
    }

    const stdout = emitter.ytDlpProcess?.stdout;
    if (stdout) {
      lines = readline.createInterface({ input: stdout, crlfDelay: Infinity });
      lines.on('line', (line: string) => {
        const trimmed = line.trim();
        if (trimmed.length > 0) {
          progress.feed(parser, trimmed);
        }
      });
    }

    emitter.once('error', (error: unknown) => {
      log.warn(`yt-dlp failed: ${getErrorMessage(error)}`);
      settle(false);
    });
    emitter.once('close', (code: unknown) => {
      settle(code === 0);
    });
  });

/**
 * Creates the download executor. yt-dlp is preferred; ffmpeg is only used when yt-dlp is missing.
 */
export const createDownloadExecutor = ({
  ytDlp,
  ffmpeg: transcoder,
  referer,
  fragmentConcurrency,
  processTimeoutMs,
  log = logger,
}: DownloadExecutorOptions): DownloadExecutor => {
  let backendPromise: Promise<DownloadBackend> | null = null;

  const detectBackend = async (): Promise<DownloadBackend> => {
    try {
      const version = await ytDlp.getVersion();
      log.debug(`Using yt-dlp ${version.trim()}`);
      return 'yt-dlp';
    } catch {
      log.debug('yt-dlp not found, checking ffmpeg');
    }
    if (await transcoder.isAvailable()) {
      log.warn('yt-dlp not found; falling back to ffmpeg (quality selection is ignored)');
      return 'ffmpeg';
    }
    log.error('Neither yt-dlp nor ffmpeg was found. Install yt-dlp (recommended) or ffmpeg and make sure it is on PATH.');
    return 'none';
  };

  const backend = (): Promise<DownloadBackend> => {
    if (!backendPromise) {
      backendPromise = detectBackend();
    }
    return backendPromise;
  };

  const run = async (request: DownloadRequest, progress: ProgressReporter): Promise<boolean> => {
    const selected = await backend();
    if (selected === 'none') {
      return false;
    }

    await fs.ensureDir(path.dirname(path.resolve(request.outputPath)));

    let success: boolean;
    if (selected === 'yt-dlp') {
      const args = buildYtDlpArgs(request, { referer, fragmentConcurrency });
      success = await runYtDlp(ytDlp, args, progress, processTimeoutMs, log);
    } else {
      const parser = createFfmpegLineParser();
      success = await transcoder.run(buildFfmpegDownloadJob(request, referer), (line) => {
        progress.feed(parser, line);
      });
    }

    if (success) {
      progress.update({ percent: 100 });
    } else {
      log.warn(`Download failed: ${request.outputPath}`);
    }
    return success;
  };

  return { backend, run };
};
