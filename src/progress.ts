import cliProgress from 'cli-progress';
import { muteConsole, unmuteConsole } from './logger.js';
import { ProgressUpdate } from './types.js';
import { truncateTitle } from './utils.js';

export const STATUS_ICON_SUCCESS = '✓';
export const STATUS_ICON_FAILURE = '✗';

const YTDLP_PROGRESS_PATTERN = /PROGRESS:\s*(\d+(?:\.\d+)?)%/u;
const DURATION_PATTERN = /Duration:\s*(\d{2,}):(\d{2}):(\d{2}(?:\.\d+)?)/u;
const TIME_PATTERN = /time=\s*(\d{2,}):(\d{2}):(\d{2}(?:\.\d+)?)/u;
const BITRATE_PATTERN = /bitrate=\s*(\d+(?:\.\d+)?)\s*([kmgt]?bits\/s)/iu;

/**
 * Turns one line of subprocess output into a progress update, or null when the line carries none.
 */
export interface LineParser {
  parse(line: string): ProgressUpdate | null;
}

const clampPercent = (value: number): number => Math.min(100, Math.max(0, value));

const toSeconds = (hours: string, minutes: string, seconds: string): number =>
  Number.parseInt(hours, 10) * 3600 + Number.parseInt(minutes, 10) * 60 + Number.parseFloat(seconds);

/**
 * Reads the `PROGRESS:<percent>%` marker emitted by the downloader's progress template.
 */
export const createYtDlpLineParser = (): LineParser => ({
  parse: (line) => {
    const match = YTDLP_PROGRESS_PATTERN.exec(line);
    if (!match) {
      return null;
    }
    const percent = Number.parseFloat(match[1]);
    return Number.isNaN(percent) ? null : { percent: clampPercent(percent) };
  },
});

/**
 * Reads transcoder output: a `Duration:` header once, then `time=` lines with an optional bitrate.
 * Time lines are ignored until a duration has been seen.
 */
export const createFfmpegLineParser = (): LineParser => {
  let totalSeconds: number | null = null;

  return {
    parse: (line) => {
      if (totalSeconds === null) {
        const duration = DURATION_PATTERN.exec(line);
        if (duration) {
          const seconds = toSeconds(duration[1], duration[2], duration[3]);
          totalSeconds = seconds > 0 ? seconds : null;
          return null;
        }
      }

      const time = TIME_PATTERN.exec(line);
      if (!time || totalSeconds === null) {
        return null;
      }

      const percent = Math.min(100, (toSeconds(time[1], time[2], time[3]) / totalSeconds) * 100);
      const bitrate = BITRATE_PATTERN.exec(line);
      return bitrate ? { percent, bitrate: `${bitrate[1]}${bitrate[2]}` } : { percent };
    },
  };
};

/**
 * Where a task's progress is displayed.
 */
export interface ProgressSink {
  update(percent: number, bitrate?: string): void;
  describe(text: string): void;
  finish(success: boolean, text: string): void;
}

/**
 * What download steps report into; either a whole task or a slice of one.
 */
export interface ProgressReporter {
  update(update: ProgressUpdate): boolean;
  feed(parser: LineParser, line: string): boolean;
  describe(text: string): void;
  slice(from: number, to: number): ProgressReporter;
}

const createSlice = (parent: ProgressReporter, from: number, to: number): ProgressReporter => {
  const reporter: ProgressReporter = {
    update: ({ percent, bitrate }) =>
      parent.update({ percent: from + ((to - from) * clampPercent(percent)) / 100, bitrate }),
    feed: (parser, line) => {
      const update = parser.parse(line);
      return update ? reporter.update(update) : false;
    },
    describe: (text) => parent.describe(text),
    slice: (start, end) => createSlice(reporter, start, end),
  };
  return reporter;
};

/**
 * Per-task progress state. The percentage only moves forward: updates at or below the last
 * reported value are dropped before they reach the sink.
 */
export class TaskProgress implements ProgressReporter {
  private lastPercent = 0;
  private bitrate: string | undefined;

  constructor(private readonly sink: ProgressSink) {}

  get percent(): number {
    return this.lastPercent;
  }

  update({ percent, bitrate }: ProgressUpdate): boolean {
    const next = clampPercent(percent);
    if (next <= this.lastPercent) {
      return false;
    }
    this.lastPercent = next;
    if (bitrate) {
      this.bitrate = bitrate;
    }
    this.sink.update(next, this.bitrate);
    return true;
  }

  feed(parser: LineParser, line: string): boolean {
    const update = parser.parse(line);
    return update ? this.update(update) : false;
  }

  describe(text: string): void {
    this.sink.describe(text);
  }

  /**
   * Maps 0–100 of a sub-step onto `[from, to]` of this task, sharing the same forward-only gate.
   */
  slice(from: number, to: number): ProgressReporter {
    return createSlice(this, from, to);
  }

  complete(success: boolean, text: string): void {
    if (success) {
      this.update({ percent: 100 });
    }
    this.sink.finish(success, text);
  }
}

export const createSilentSink = (): ProgressSink => ({
  update: () => undefined,
  describe: () => undefined,
  finish: () => undefined,
});

const BAR_FORMAT = '{bar} {percentage}% | {bitrate} | {title}';

const statusTitle = (success: boolean, text: string): string =>
  `${success ? STATUS_ICON_SUCCESS : STATUS_ICON_FAILURE} ${truncateTitle(text, 60)}`;

/**
 * One inline bar for a single download.
 */
export const createSingleBarSink = (title: string): ProgressSink => {
  const bar = new cliProgress.SingleBar(
    { format: BAR_FORMAT, hideCursor: true, clearOnComplete: false },
    cliProgress.Presets.shades_grey,
  );
  muteConsole();
  bar.start(100, 0, { title: truncateTitle(title), bitrate: '' });

  return {
    update: (percent, bitrate) => bar.update(Math.round(percent * 10) / 10, { bitrate: bitrate ?? '' }),
    describe: (text) => bar.update({ title: truncateTitle(text) }),
    finish: (success, text) => {
      bar.update({ title: statusTitle(success, text) });
      bar.stop();
      unmuteConsole();
    },
  };
};

/**
 * Owns the shared multi-row display. Every task gets its own row; all writes go through here.
 */
export class ProgressBoard {
  private readonly multiBar: cliProgress.MultiBar;
  private stopped = false;

  constructor() {
    this.multiBar = new cliProgress.MultiBar(
      { format: BAR_FORMAT, hideCursor: true, clearOnComplete: false },
      cliProgress.Presets.shades_grey,
    );
    muteConsole();
  }

  createRow(title: string): ProgressSink {
    const bar = this.multiBar.create(100, 0, { title: truncateTitle(title), bitrate: '' });
    return {
      update: (percent, bitrate) => bar.update(Math.round(percent * 10) / 10, { bitrate: bitrate ?? '' }),
      describe: (text) => bar.update({ title: truncateTitle(text) }),
      finish: (success, text) => bar.update({ title: statusTitle(success, text) }),
    };
  }

  stop(): void {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    this.multiBar.stop();
    unmuteConsole();
  }
}
