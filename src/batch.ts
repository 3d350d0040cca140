import fs from 'fs-extra';
import pLimit from 'p-limit';
import type { Logger } from 'winston';
import { DownloadExecutor, FfmpegRunner } from './download.js';
import { getErrorMessage } from './errors.js';
import type { PlaylistResolver } from './extractor.js';
import { logger } from './logger.js';
import { downloadMultiLanguage } from './merge.js';
import type { MetadataProvider } from './metadata.js';
import { ProgressSink, STATUS_ICON_FAILURE, STATUS_ICON_SUCCESS, TaskProgress } from './progress.js';
import { describeTask, formatEpisodeCode } from './tasks.js';
import { BatchResult, DownloadTask, TaskOutcome } from './types.js';
import { isEpisodeInfo, logSuccess, resolveOutputPath, TaskMetadata } from './utils.js';

export interface TaskContext {
  readonly outputDir?: string;
  /** Resolve and report playlist URLs without downloading anything. */
  readonly urlOnly: boolean;
  readonly metadata: MetadataProvider | null;
  readonly resolvePlaylist: PlaylistResolver;
  readonly executor: DownloadExecutor;
  readonly ffmpeg: FfmpegRunner;
  /** Append-only record of finished downloads; omitted in tests. */
  readonly ledgerFile?: string;
  readonly tempRoot?: string;
  readonly log?: Logger;
}

const fetchTaskMetadata = async (
  task: DownloadTask,
  provider: MetadataProvider | null,
  log: Logger,
): Promise<TaskMetadata> => {
  if (!provider) {
    return null;
  }
  try {
    if (task.contentKind === 'episode' && task.season !== undefined && task.episode !== undefined) {
      return await provider.getEpisodeInfo(task.remoteId, task.season, task.episode);
    }
    return await provider.getMovieInfo(task.remoteId);
  } catch (error) {
    log.warn(`Metadata lookup failed for ${describeTask(task)}: ${getErrorMessage(error)}`);
    return null;
  }
};

/**
 * "Show S01E02 - Episode" or "Title (Year)", falling back to the bare task label.
 */
export const labelFor = (task: DownloadTask, info: TaskMetadata): string => {
  if (!info) {
    return describeTask(task);
  }
  if (isEpisodeInfo(info)) {
    const base = `${info.showName} ${formatEpisodeCode(info.season, info.episode)}`;
    return info.episodeName ? `${base} - ${info.episodeName}` : base;
  }
  return info.year ? `${info.title} (${info.year})` : info.title;
};

/**
 * Runs one task from metadata lookup to final file. Never throws: every path ends in an outcome
 * and a finished progress row.
 */
export const processTask = async (
  task: DownloadTask,
  progress: TaskProgress,
  context: TaskContext,
): Promise<TaskOutcome> => {
  const log = context.log ?? logger;
  let label = describeTask(task);

  const fail = (reason: string, playlistUrls?: readonly string[]): TaskOutcome => {
    log.warn(`${label}: ${reason}`);
    progress.complete(false, `${label} - ${reason}`);
    return { task, label, status: 'failed', reason, playlistUrls };
  };

  try {
    const info = await fetchTaskMetadata(task, context.metadata, log);
    label = labelFor(task, info);
    progress.describe(label);

    const [primary] = task.languages;
    const resolve = (language: string) => context.resolvePlaylist(task, language);

    if (context.urlOnly) {
      const playlistUrls: string[] = [];
      for (const language of task.languages) {
        const result = await resolve(language);
        if (result) {
          playlistUrls.push(result.playlistUrl);
        } else if (language === primary) {
          return fail(`no playlist found for primary language "${language}"`);
        } else {
          log.warn(`${label}: no playlist found for language "${language}"`);
        }
      }
      progress.complete(true, label);
      return { task, label, status: 'completed', playlistUrls };
    }

    const outputPath = resolveOutputPath(task, context.outputDir, info);

    let playlistUrls: readonly string[];
    if (task.languages.length > 1) {
      const merged = await downloadMultiLanguage(
        { languages: task.languages, quality: task.quality, outputPath, resolve },
        progress,
        { executor: context.executor, ffmpeg: context.ffmpeg, tempRoot: context.tempRoot, log },
      );
      if (!merged.success) {
        return fail(merged.reason ?? 'download failed', merged.playlistUrls);
      }
      playlistUrls = merged.playlistUrls;
    } else {
      const result = await resolve(primary);
      if (!result) {
        return fail('no playlist found');
      }
      if (!result.verified) {
        log.warn(`${label}: playlist could not be verified, trying it anyway`);
      }
      playlistUrls = [result.playlistUrl];
      progress.slice(0, 5).update({ percent: 100 });
      const ok = await context.executor.run(
        { url: result.playlistUrl, outputPath, quality: task.quality, language: primary },
        progress.slice(5, 100),
      );
      if (!ok) {
        return fail('download failed', playlistUrls);
      }
    }

    if (context.ledgerFile) {
      try {
        await logSuccess(context.ledgerFile, outputPath, label);
      } catch (error) {
        log.warn(`Could not update ${context.ledgerFile}: ${getErrorMessage(error)}`);
      }
    }

    progress.complete(true, label);
    return { task, label, status: 'completed', filePath: outputPath, playlistUrls };
  } catch (error) {
    return fail(getErrorMessage(error));
  }
};

export interface BatchOptions {
  /** Maximum number of tasks running at once. */
  readonly concurrency: number;
  /** Created before any task starts, when given. */
  readonly outputDir?: string;
}

export interface BatchDependencies {
  readonly runTask: (task: DownloadTask, progress: TaskProgress) => Promise<TaskOutcome>;
  readonly createSink: (task: DownloadTask) => ProgressSink;
  readonly log?: Logger;
}

/**
 * Runs tasks through a bounded pool. A task that throws counts as a failure; it never stops its
 * siblings, and the counts always add up to the number of tasks submitted.
 */
export const runBatch = async (
  tasks: readonly DownloadTask[],
  { concurrency, outputDir }: BatchOptions,
  { runTask, createSink, log = logger }: BatchDependencies,
): Promise<BatchResult> => {
  if (outputDir) {
    await fs.ensureDir(outputDir);
  }

  const limit = pLimit(Math.max(1, concurrency));

  const outcomes = await Promise.all(
    tasks.map((task) =>
      limit(async (): Promise<TaskOutcome> => {
        const label = describeTask(task);
        let progress: TaskProgress | undefined;
        try {
          progress = new TaskProgress(createSink(task));
          return await runTask(task, progress);
        } catch (error) {
          const reason = getErrorMessage(error);
          log.error(`${label} failed unexpectedly: ${reason}`);
          progress?.complete(false, `${label} - ${reason}`);
          return { task, label, status: 'failed', reason };
        }
      }),
    ),
  );

  const successCount = outcomes.filter((outcome) => outcome.status === 'completed').length;
  return { successCount, failureCount: outcomes.length - successCount, outcomes };
};

/**
 * Summarizes overall processing results at the end of the execution.
 */
export const printSummary = (result: BatchResult): void => {
  console.log('\nDownload summary');
  console.table(
    result.outcomes.map((outcome) => ({
      Task: outcome.label,
      Status: `${outcome.status === 'completed' ? STATUS_ICON_SUCCESS : STATUS_ICON_FAILURE} ${outcome.status}`,
      Reason: outcome.reason ?? '',
      File: outcome.filePath ?? '',
    })),
  );
  console.log(`Totals => processed: ${result.outcomes.length}, completed: ${result.successCount}, failed: ${result.failureCount}`);
};

/**
 * 0 only when at least one task ran and none failed.
 */
export const exitCodeFor = (result: BatchResult): number =>
  result.failureCount === 0 && result.successCount > 0 ? 0 : 1;
