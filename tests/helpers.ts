/**
 * Shared fakes for tests: no network, no child processes.
 */

import { EventEmitter } from 'node:events';
import os from 'node:os';
import path from 'node:path';
import { PassThrough } from 'node:stream';
import fs from 'fs-extra';
import winston from 'winston';
import type { Logger } from 'winston';
import {
  DownloadBackend,
  DownloadExecutor,
  DownloadRequest,
  FfmpegJob,
  FfmpegRunner,
  YtDlpEmitter,
  YtDlpRunner,
} from '../src/download.js';
import { HttpClient, HttpRequestOptions, HttpResponse } from '../src/http.js';
import { ProgressSink } from '../src/progress.js';

export const createSilentLogger = (): Logger =>
  winston.createLogger({ silent: true, transports: [new winston.transports.Console({ silent: true })] });

export const createTempDir = (): Promise<string> => fs.mkdtemp(path.join(os.tmpdir(), 'hls-embed-dl-test-'));

export type FakeRoute = Partial<HttpResponse> | Error;

export interface FakeHttpClient extends HttpClient {
  readonly requests: { url: string; options?: HttpRequestOptions }[];
}

/**
 * Unknown URLs answer 404 with an empty body.
 */
export const createFakeHttp = (routes: Record<string, FakeRoute>): FakeHttpClient => {
  const requests: { url: string; options?: HttpRequestOptions }[] = [];
  return {
    requests,
    get: async (url, options) => {
      requests.push({ url, options });
      const route = routes[url];
      if (route === undefined) {
        return { status: 404, url, headers: {}, body: '' };
      }
      if (route instanceof Error) {
        throw route;
      }
      return { status: route.status ?? 200, url: route.url ?? url, headers: route.headers ?? {}, body: route.body ?? '' };
    },
  };
};

export interface RecordingSink extends ProgressSink {
  readonly updates: number[];
  readonly bitrates: (string | undefined)[];
  readonly descriptions: string[];
  readonly finished: { success: boolean; text: string }[];
}

export const createRecordingSink = (): RecordingSink => {
  const updates: number[] = [];
  const bitrates: (string | undefined)[] = [];
  const descriptions: string[] = [];
  const finished: { success: boolean; text: string }[] = [];
  return {
    updates,
    bitrates,
    descriptions,
    finished,
    update: (percent, bitrate) => {
      updates.push(percent);
      bitrates.push(bitrate);
    },
    describe: (text) => {
      descriptions.push(text);
    },
    finish: (success, text) => {
      finished.push({ success, text });
    },
  };
};

export interface YtDlpScript {
  readonly lines?: readonly string[];
  readonly exitCode?: number;
  /** Never exits on its own; only an abort ends it. */
  readonly hang?: boolean;
  /** Runs this long before writing output and exiting. */
  readonly delayMs?: number;
}

export interface FakeYtDlp extends YtDlpRunner {
  readonly calls: string[][];
  readonly versionChecks: number;
}

/**
 * Mimics yt-dlp-wrap: stdout lines first, then `close` on exit code 0 or `error` otherwise.
 */
export const createFakeYtDlp = (
  script: (args: string[]) => YtDlpScript = () => ({}),
  available = true,
): FakeYtDlp => {
  const calls: string[][] = [];
  let versionChecks = 0;
  return {
    calls,
    get versionChecks() {
      return versionChecks;
    },
    getVersion: async () => {
      versionChecks += 1;
      if (!available) {
        throw new Error('spawn yt-dlp ENOENT');
      }
      return '2024.08.06\n';
    },
    exec: (args, _options, abortSignal): YtDlpEmitter => {
      calls.push(args);
      const { lines = [], exitCode = 0, hang = false, delayMs } = script(args);
      const stdout = new PassThrough();
      const emitter = Object.assign(new EventEmitter(), { ytDlpProcess: { stdout } });

      abortSignal?.addEventListener('abort', () => {
        emitter.emit('close', null);
      });

      if (!hang) {
        stdout.on('end', () => {
          if (exitCode === 0) {
            emitter.emit('close', 0);
          } else {
            emitter.emit('error', new Error(`yt-dlp exited with code ${exitCode}`));
          }
        });
        const finish = (): void => {
          stdout.end(lines.map((line) => `${line}\n`).join(''));
        };
        if (delayMs === undefined) {
          setImmediate(finish);
        } else {
          setTimeout(finish, delayMs);
        }
      }
      return emitter;
    },
  };
};

export interface FakeFfmpeg extends FfmpegRunner {
  readonly jobs: FfmpegJob[];
}

/**
 * Writes a placeholder output file when the job succeeds.
 */
export const createFakeFfmpeg = ({
  available = true,
  succeed = true,
  lines = [],
}: { available?: boolean; succeed?: boolean; lines?: readonly string[] } = {}): FakeFfmpeg => {
  const jobs: FfmpegJob[] = [];
  return {
    jobs,
    isAvailable: async () => available,
    run: async (job, onLine) => {
      jobs.push(job);
      lines.forEach((line) => onLine(line));
      if (succeed) {
        await fs.outputFile(job.output, 'merged');
      }
      return succeed;
    },
  };
};

export interface FakeExecutor extends DownloadExecutor {
  readonly requests: DownloadRequest[];
}

/**
 * Writes the request's language into the output file on success.
 */
export const createFakeExecutor = (
  succeeds: (request: DownloadRequest) => boolean = () => true,
  selected: DownloadBackend = 'yt-dlp',
): FakeExecutor => {
  const requests: DownloadRequest[] = [];
  return {
    requests,
    backend: async () => selected,
    run: async (request, progress) => {
      requests.push(request);
      if (!succeeds(request)) {
        return false;
      }
      await fs.outputFile(request.outputPath, request.language);
      progress.update({ percent: 100 });
      return true;
    },
  };
};
