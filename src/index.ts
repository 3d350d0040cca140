#!/usr/bin/env node
import process from 'node:process';
import { CliOptions, parseArgs, printHelp } from './args.js';
import { exitCodeFor, printSummary, processTask, runBatch } from './batch.js';
import { AppConfig, initializeConfig } from './config.js';
import { createDownloadExecutor, createFfmpegRunner, createYtDlpRunner } from './download.js';
import { ArgumentError, ConfigError, getErrorMessage } from './errors.js';
import { createPlaylistResolver } from './extractor.js';
import { createHttpClient } from './http.js';
import { initializeLogger, logger } from './logger.js';
import { createMetadataProvider, MetadataProvider } from './metadata.js';
import { createSilentSink, createSingleBarSink, ProgressBoard, ProgressSink } from './progress.js';
import { createDownloadTask, describeTask, expandShowTasks, readBatchFile } from './tasks.js';
import { BatchResult, DownloadTask, TaskDefaults } from './types.js';

const EXIT_USAGE = 2;

/**
 * Turns the parsed command line into a flat task list.
 */
const buildTasks = async (
  options: CliOptions,
  defaults: TaskDefaults,
  metadata: MetadataProvider | null,
): Promise<DownloadTask[]> => {
  if (options.mode === 'batch') {
    if (!options.batchFile) {
      throw new ArgumentError('--batch requires a file');
    }
    const { tasks } = await readBatchFile(options.batchFile, defaults);
    if (tasks.length === 0) {
      logger.error(`No valid tasks found in ${options.batchFile}`);
    }
    return tasks;
  }

  if (options.id === undefined) {
    throw new ArgumentError(`--${options.mode} requires an id`);
  }

  if (options.mode === 'movie') {
    return [
      createDownloadTask({
        contentKind: 'movie',
        remoteId: options.id,
        languages: [...defaults.languages],
        quality: defaults.quality,
        outputFile: options.outputFile,
      }),
    ];
  }

  if (options.season !== undefined && options.episode !== undefined) {
    return [
      createDownloadTask({
        contentKind: 'episode',
        remoteId: options.id,
        season: options.season,
        episode: options.episode,
        languages: [...defaults.languages],
        quality: defaults.quality,
        outputFile: options.outputFile,
      }),
    ];
  }

  const showName = (await metadata?.getShowName(options.id)) ?? `TV ${options.id}`;
  logger.info(
    options.season !== undefined
      ? `Preparing to download ${showName} - Season ${options.season}`
      : `Preparing to download all seasons of ${showName}`,
  );
  const tasks = await expandShowTasks(metadata, options.id, { season: options.season }, defaults);
  if (tasks.length > 0) {
    logger.info(`Found ${tasks.length} episode(s) to download, ${options.parallel} at a time`);
  }
  return tasks;
};

const printPlaylistUrls = (result: BatchResult): void => {
  for (const outcome of result.outcomes) {
    if (outcome.status !== 'completed' || !outcome.playlistUrls) {
      console.error(`${outcome.label}: ${outcome.reason ?? 'no playlist found'}`);
      continue;
    }
    console.log(`\n${outcome.label}`);
    for (const url of outcome.playlistUrls) {
      console.log(`  ${url}`);
    }
  }
};

/**
 * Wires configuration, external tools and the scheduler together for one run.
 */
const runDownloadSession = async (config: AppConfig, options: CliOptions): Promise<number> => {
  const metadata = options.useMetadata
    ? createMetadataProvider(options.tmdbApiKey, { timeoutMs: options.requestTimeoutMs })
    : null;
  if (options.useMetadata && !metadata) {
    logger.warn('TMDB API key not found; using basic file names. Set TMDB_API_KEY or pass --tmdb-api-key.');
  }

  const defaults: TaskDefaults = { languages: options.languages, quality: options.quality };
  const tasks = await buildTasks(options, defaults, metadata);
  if (tasks.length === 0) {
    return 1;
  }

  const referer = `${config.embedBaseUrl}/`;
  const http = createHttpClient({ referer, timeoutMs: options.requestTimeoutMs });
  const resolvePlaylist = createPlaylistResolver({
    http,
    baseUrl: config.embedBaseUrl,
    timeoutMs: options.requestTimeoutMs,
  });
  const ffmpeg = createFfmpegRunner({ ffmpegPath: config.ffmpegPath, timeoutMs: config.processTimeoutMs });
  const executor = createDownloadExecutor({
    ytDlp: createYtDlpRunner(config.ytDlpPath),
    ffmpeg,
    referer,
    fragmentConcurrency: options.fragmentConcurrency,
    processTimeoutMs: config.processTimeoutMs,
  });

  if (!options.urlOnly && (await executor.backend()) === 'none') {
    return 1;
  }

  const board = !options.urlOnly && tasks.length > 1 ? new ProgressBoard() : null;
  const createSink = (task: DownloadTask): ProgressSink => {
    if (options.urlOnly) {
      return createSilentSink();
    }
    return board ? board.createRow(describeTask(task)) : createSingleBarSink(describeTask(task));
  };

  let result: BatchResult;
  try {
    result = await runBatch(
      tasks,
      { concurrency: options.parallel, outputDir: options.outputDir },
      {
        createSink,
        runTask: (task, progress) =>
          processTask(task, progress, {
            outputDir: options.outputDir,
            urlOnly: options.urlOnly,
            metadata,
            resolvePlaylist,
            executor,
            ffmpeg,
            ledgerFile: config.downloadsLedger,
          }),
      },
    );
  } finally {
    board?.stop();
  }

  if (options.urlOnly) {
    printPlaylistUrls(result);
  } else {
    printSummary(result);
  }
  return exitCodeFor(result);
};

/**
 * Entry point that orchestrates configuration, argument parsing and the download session.
 */
const main = async (): Promise<number> => {
  let config: AppConfig;
  try {
    config = initializeConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      return EXIT_USAGE;
    }
    throw error;
  }
  initializeLogger({ level: config.logLevel, errorLogFile: config.errorLogFile });

  let options: CliOptions;
  try {
    const parsed = parseArgs(process.argv.slice(2), config);
    if (parsed.help) {
      printHelp();
      return 0;
    }
    options = parsed.options;
  } catch (error) {
    if (error instanceof ArgumentError) {
      console.error(`Error: ${error.message}`);
      printHelp();
      return EXIT_USAGE;
    }
    throw error;
  }

  return runDownloadSession(config, options);
};

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error(`Fatal error: ${getErrorMessage(error)}`);
    process.exitCode = 1;
  });
