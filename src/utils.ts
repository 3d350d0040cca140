import path from 'node:path';
import fs from 'fs-extra';
import { DEFAULT_EXTENSION } from './config.js';
import type { EpisodeInfo, MovieInfo } from './metadata.js';
import { formatEpisodeCode } from './tasks.js';
import { DownloadTask } from './types.js';

/**
 * Sanitizes possible file names so they are safe to write to the filesystem.
 */
export const sanitizeFileName = (value: string): string =>
  value.replace(/[<>:"/\\|?*]/gu, '').replace(/\s+/gu, ' ').trim().replace(/^[.\s]+|[.\s]+$/gu, '');

/**
 * Truncates long titles so progress bars remain readable in narrower terminals.
 */
export const truncateTitle = (value: string, maxLength = 42): string =>
  value.length <= maxLength ? value : `${value.slice(0, maxLength - 3)}...`;

/** Title words joined with dots, e.g. "Fight Club" -> "Fight.Club". */
const dotted = (value: string): string => sanitizeFileName(value.replace(/\s+/gu, '.'));

/**
 * `Title.Year.mp4`, or `movie_<id>.mp4` without metadata.
 */
export const buildMovieFilename = (movieId: number, info: MovieInfo | null): string => {
  const title = info ? dotted(info.title) : '';
  if (!title) {
    return `movie_${movieId}.${DEFAULT_EXTENSION}`;
  }
  return info?.year ? `${title}.${info.year}.${DEFAULT_EXTENSION}` : `${title}.${DEFAULT_EXTENSION}`;
};

/**
 * `Show.S01E02.Episode.Name.mp4`, or `tv_<id>_s01e02.mp4` without metadata.
 */
export const buildEpisodeFilename = (
  showId: number,
  season: number,
  episode: number,
  info: EpisodeInfo | null,
): string => {
  const code = formatEpisodeCode(season, episode);
  const show = info ? dotted(info.showName) : '';
  if (!show) {
    return `tv_${showId}_${code.toLowerCase()}.${DEFAULT_EXTENSION}`;
  }
  const episodeName = info?.episodeName ? dotted(info.episodeName) : '';
  return episodeName
    ? `${show}.${code}.${episodeName}.${DEFAULT_EXTENSION}`
    : `${show}.${code}.${DEFAULT_EXTENSION}`;
};

export type TaskMetadata = MovieInfo | EpisodeInfo | null;

export const isEpisodeInfo = (info: TaskMetadata): info is EpisodeInfo => info !== null && 'showName' in info;

/**
 * Resolves where a task's file goes. Explicit relative paths land in the output dir; generated
 * episode names are placed under `<Show>[.<Year>]/Season NN/` when show metadata is known.
 */
export const resolveOutputPath = (task: DownloadTask, outputDir: string | undefined, info: TaskMetadata): string => {
  if (task.outputFile) {
    return outputDir && !path.isAbsolute(task.outputFile)
      ? path.join(outputDir, task.outputFile)
      : task.outputFile;
  }

  if (task.contentKind === 'movie' || task.season === undefined || task.episode === undefined) {
    const filename = buildMovieFilename(task.remoteId, isEpisodeInfo(info) ? null : info);
    return outputDir ? path.join(outputDir, filename) : filename;
  }

  const episodeInfo = isEpisodeInfo(info) ? info : null;
  const filename = buildEpisodeFilename(task.remoteId, task.season, task.episode, episodeInfo);
  if (!episodeInfo) {
    return outputDir ? path.join(outputDir, filename) : filename;
  }

  const showName = dotted(episodeInfo.showName);
  const showDir = !outputDir && episodeInfo.showYear ? `${showName}.${episodeInfo.showYear}` : showName;
  const seasonDir = `Season ${String(task.season).padStart(2, '0')}`;
  return outputDir ? path.join(outputDir, showDir, seasonDir, filename) : path.join(showDir, seasonDir, filename);
};

/**
 * Appends successfully downloaded file names to a persistent log for tracking.
 */
export const logSuccess = async (ledgerFile: string, filePath: string, label: string): Promise<void> => {
  const timestamp = new Date().toISOString();
  await fs.appendFile(path.resolve(process.cwd(), ledgerFile), `[${timestamp}] ${label} :: ${filePath}\n`);
};
