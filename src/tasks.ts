import fs from 'fs-extra';
import type { Logger } from 'winston';
import { z } from 'zod';
import { TaskValidationError } from './errors.js';
import { logger } from './logger.js';
import type { MetadataProvider } from './metadata.js';
import { DownloadTask, Quality, TaskDefaults } from './types.js';

/** Batch file token meaning "use the default for this field". */
export const DEFAULT_PLACEHOLDER = '-';

const LANGUAGE_CODE = /^[a-z]{2,3}(?:-[a-z0-9]{2,8})?$/u;

const taskSchema = z
  .object({
    contentKind: z.enum(['movie', 'episode']),
    remoteId: z.number().int().positive(),
    season: z.number().int().nonnegative().optional(),
    episode: z.number().int().positive().optional(),
    languages: z.array(z.string().regex(LANGUAGE_CODE, 'invalid language code')).min(1, 'at least one language is required'),
    quality: z.union([z.literal('best'), z.number().int().positive()]),
    outputFile: z.string().min(1).optional(),
    line: z.number().int().positive().optional(),
  })
  .superRefine((task, ctx) => {
    if (task.episode !== undefined && task.season === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'episode requires season', path: ['season'] });
    }
    if (task.contentKind === 'episode' && (task.season === undefined || task.episode === undefined)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'episode tasks need a season and an episode' });
    }
    if (task.contentKind === 'movie' && (task.season !== undefined || task.episode !== undefined)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'movie tasks carry no season or episode' });
    }
  });

export type DownloadTaskInput = z.input<typeof taskSchema>;

/**
 * Validates and freezes a task. Invalid descriptors never reach the scheduler.
 */
export const createDownloadTask = (input: DownloadTaskInput): DownloadTask => {
  const parsed = taskSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => issue.message).join('; ');
    throw new TaskValidationError(`Invalid download task: ${details}`);
  }
  return Object.freeze({ ...parsed.data, languages: Object.freeze([...parsed.data.languages]) });
};

/**
 * Accepts "best" or a positive height such as "1080" (an optional trailing "p" is tolerated).
 */
export const parseQuality = (value: string): Quality | null => {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'best') {
    return 'best';
  }
  const match = /^(\d+)p?$/u.exec(normalized);
  if (!match) {
    return null;
  }
  const height = Number.parseInt(match[1], 10);
  return height > 0 ? height : null;
};

/**
 * Splits a comma-separated language list, dropping blanks and duplicates while keeping order.
 */
export const parseLanguageList = (value: string): string[] => {
  const codes = value
    .split(',')
    .map((code) => code.trim().toLowerCase())
    .filter((code) => code.length > 0);
  return [...new Set(codes)];
};

export const formatEpisodeCode = (season: number, episode: number): string =>
  `S${String(season).padStart(2, '0')}E${String(episode).padStart(2, '0')}`;

/**
 * Short label used in progress rows and logs until metadata provides a better one.
 */
export const describeTask = (task: DownloadTask): string =>
  task.contentKind === 'episode' && task.season !== undefined && task.episode !== undefined
    ? `TV ${task.remoteId} ${formatEpisodeCode(task.season, task.episode)}`
    : `Movie ${task.remoteId}`;

export interface BatchWarning {
  readonly line: number;
  readonly text: string;
  readonly reason: string;
}

export interface BatchParseResult {
  readonly tasks: DownloadTask[];
  readonly warnings: BatchWarning[];
}

const parseId = (token: string | undefined): number | null =>
  token !== undefined && /^\d+$/u.test(token) ? Number.parseInt(token, 10) : null;

const overridable = (token: string | undefined): string | undefined =>
  token === undefined || token === DEFAULT_PLACEHOLDER ? undefined : token;

/**
 * Parses one batch record into a task, or returns the reason it was rejected.
 */
const parseBatchLine = (tokens: string[], lineNumber: number, defaults: TaskDefaults): DownloadTask | string => {
  const kind = tokens[0].toLowerCase();
  let base: DownloadTaskInput;
  let trailing: string[];

  if (kind === 'tv') {
    const remoteId = parseId(tokens[1]);
    const season = parseId(tokens[2]);
    const episode = parseId(tokens[3]);
    if (remoteId === null || season === null || episode === null) {
      return 'tv records need an id, a season and an episode';
    }
    base = { contentKind: 'episode', remoteId, season, episode, languages: [], quality: 'best' };
    trailing = tokens.slice(4);
  } else if (kind === 'movie') {
    const remoteId = parseId(tokens[1]);
    if (remoteId === null) {
      return 'movie records need an id';
    }
    base = { contentKind: 'movie', remoteId, languages: [], quality: 'best' };
    trailing = tokens.slice(2);
  } else {
    return `unknown content type "${tokens[0]}"`;
  }

  if (trailing.length > 3) {
    return `too many fields (expected at most output, language and quality)`;
  }

  const [outputToken, languageToken, qualityToken] = trailing.map(overridable);

  let languages = [...defaults.languages];
  if (languageToken !== undefined) {
    languages = parseLanguageList(languageToken);
    if (languages.length === 0) {
      return `invalid language "${languageToken}"`;
    }
  }

  let quality = defaults.quality;
  if (qualityToken !== undefined) {
    const parsedQuality = parseQuality(qualityToken);
    if (parsedQuality === null) {
      return `invalid quality "${qualityToken}"`;
    }
    quality = parsedQuality;
  }

  try {
    return createDownloadTask({
      ...base,
      languages,
      quality,
      outputFile: outputToken,
      line: lineNumber,
    });
  } catch (error) {
    if (error instanceof TaskValidationError) {
      return error.message;
    }
    throw error;
  }
};

/**
 * Parses batch file content: `tv ID SEASON EPISODE [OUT] [LANG] [QUALITY]` or `movie ID [OUT] [LANG] [QUALITY]`.
 * Blank and `#` lines are ignored; malformed records become warnings.
 */
export const parseBatchFile = (content: string, defaults: TaskDefaults): BatchParseResult => {
  const tasks: DownloadTask[] = [];
  const warnings: BatchWarning[] = [];

  content.split(/\r?\n/u).forEach((rawLine, index) => {
    const text = rawLine.trim();
    if (text.length === 0 || text.startsWith('#')) {
      return;
    }
    const lineNumber = index + 1;
    const parsed = parseBatchLine(text.split(/\s+/u), lineNumber, defaults);
    if (typeof parsed === 'string') {
      warnings.push({ line: lineNumber, text, reason: parsed });
    } else {
      tasks.push(parsed);
    }
  });

  return { tasks, warnings };
};

/**
 * Reads and parses a batch file, logging every skipped line.
 */
export const readBatchFile = async (
  filePath: string,
  defaults: TaskDefaults,
  log: Logger = logger,
): Promise<BatchParseResult> => {
  const content = await fs.readFile(filePath, 'utf-8');
  const result = parseBatchFile(content, defaults);
  for (const warning of result.warnings) {
    log.warn(`Skipping batch line ${warning.line} (${warning.reason}): ${warning.text}`);
  }
  return result;
};

export interface ShowSelection {
  readonly season?: number;
  readonly episode?: number;
}

/**
 * Expands a show request into episode tasks, skipping season 0.
 * A missing season or episode listing abandons the whole expansion and yields no tasks.
 */
export const expandShowTasks = async (
  provider: MetadataProvider | null,
  showId: number,
  selection: ShowSelection,
  defaults: TaskDefaults,
  log: Logger = logger,
): Promise<DownloadTask[]> => {
  const episodeTask = (season: number, episode: number): DownloadTask =>
    createDownloadTask({
      contentKind: 'episode',
      remoteId: showId,
      season,
      episode,
      languages: [...defaults.languages],
      quality: defaults.quality,
    });

  if (selection.episode !== undefined && selection.season === undefined) {
    throw new TaskValidationError('Invalid download task: episode requires season');
  }

  if (selection.season !== undefined && selection.episode !== undefined) {
    return [episodeTask(selection.season, selection.episode)];
  }

  if (!provider) {
    log.error('Listing seasons and episodes requires a TMDB API key');
    return [];
  }

  const seasons =
    selection.season !== undefined
      ? [selection.season]
      : (await provider.getSeasons(showId))?.filter((season) => season !== 0) ?? [];

  if (seasons.length === 0) {
    log.warn(`No seasons found for TV ${showId}`);
    return [];
  }

  const tasks: DownloadTask[] = [];
  for (const season of seasons) {
    const episodes = await provider.getSeasonEpisodes(showId, season);
    if (!episodes || episodes.length === 0) {
      log.warn(`No episodes found for TV ${showId} season ${season}; nothing will be downloaded`);
      return [];
    }
    tasks.push(...episodes.map((episode) => episodeTask(season, episode)));
  }
  return tasks;
};
