/**
 * Playlist extraction from embed pages.
 *
 * The embed page format is undocumented and changes without notice, so extraction is an ordered
 * list of independent strategies. The first strategy that yields a candidate wins; results are
 * never combined. Each strategy works on the already-fetched HTML and can be exercised against a
 * saved page without network access (sub-requests go through the injected HttpClient).
 */

import type { Logger } from 'winston';
import { getErrorMessage } from './errors.js';
import { HttpClient, isSuccessStatus } from './http.js';
import { logger } from './logger.js';
import { DownloadTask, ExtractionResult } from './types.js';

export const MANIFEST_HEADER = '#EXTM3U';

const MASTER_PLAYLIST_PATTERN = /window\.masterPlaylist\s*=\s*\{[^}]*\{[^}]*\}[^}]*\}/u;
const API_ENDPOINT_PATTERN = /["'](\/api\/[^"']+)["']/gu;
const VIDEO_ID_PATTERN = /video[_-]?id["']?\s*[:=]\s*["']?(\d+)/iu;

/** Query keys the assembled playlist URL owns; copies already present on the base URL are dropped. */
const ASSEMBLED_PARAMS = new Set(['token', 'expires', 'asn', 'h', 'lang']);

export interface ExtractionContext {
  readonly embedUrl: string;
  readonly baseUrl: string;
  readonly language: string;
  readonly timeoutMs: number;
  readonly http: HttpClient;
  readonly log: Logger;
}

export interface ExtractionStrategy {
  readonly name: string;
  /** Cheap check on the raw HTML; strategies that do not match are skipped. */
  matches(html: string): boolean;
  extract(html: string, context: ExtractionContext): Promise<ExtractionResult | null>;
}

export const decodeHtmlEntities = (value: string): string => value.replace(/&amp;/gu, '&');

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/gu, '\\$&');

/**
 * Reads a single `key: 'value'` field out of an object literal, quoted key or not, in any position.
 */
export const readObjectField = (source: string, field: string): string | null => {
  const pattern = new RegExp(`(?:^|[\\s{,])['"]?${escapeRegExp(field)}['"]?\\s*:\\s*['"]([^'"]*)['"]`, 'u');
  const match = pattern.exec(source);
  return match ? match[1] : null;
};

export interface PlaylistUrlParts {
  readonly base: string;
  readonly token: string;
  readonly expires: string;
  readonly asn?: string;
  readonly language: string;
}

/**
 * Assembles `base?...&token=T&expires=E[&asn=A]&h=1&lang=L`.
 * Existing token/expires/asn/h/lang parameters on the base are replaced, so the result always has
 * exactly one `h=1` and one `lang=`; assembling again from the output yields the same string.
 */
export const buildPlaylistUrl = ({ base, token, expires, asn, language }: PlaylistUrlParts): string => {
  const decoded = decodeHtmlEntities(base);
  const queryStart = decoded.indexOf('?');
  const path = queryStart === -1 ? decoded : decoded.slice(0, queryStart);
  const query = queryStart === -1 ? '' : decoded.slice(queryStart + 1);

  const kept = query
    .split('&')
    .filter((pair) => pair.length > 0 && !ASSEMBLED_PARAMS.has(pair.split('=')[0]));

  const params = [
    ...kept,
    `token=${decodeHtmlEntities(token)}`,
    `expires=${decodeHtmlEntities(expires)}`,
    ...(asn ? [`asn=${decodeHtmlEntities(asn)}`] : []),
    'h=1',
    `lang=${language}`,
  ];

  return `${path}?${params.join('&')}`;
};

/**
 * A live GET must return a body that starts with the manifest header.
 */
export const verifyPlaylist = async (playlistUrl: string, context: ExtractionContext): Promise<boolean> => {
  try {
    context.log.debug(`Verifying playlist URL ${playlistUrl}`);
    const response = await context.http.get(playlistUrl, {
      headers: { Referer: context.embedUrl, Accept: '*/*' },
      timeoutMs: context.timeoutMs,
    });
    if (isSuccessStatus(response.status) && response.body.startsWith(MANIFEST_HEADER)) {
      return true;
    }
    context.log.warn(`Playlist verification failed (HTTP ${response.status})`);
    return false;
  } catch (error) {
    context.log.warn(`Playlist verification error: ${getErrorMessage(error)}`);
    return false;
  }
};

export const masterPlaylistStrategy: ExtractionStrategy = {
  name: 'master-playlist',
  matches: (html) => MASTER_PLAYLIST_PATTERN.test(html),
  extract: async (html, context) => {
    const section = MASTER_PLAYLIST_PATTERN.exec(html)?.[0];
    if (!section) {
      return null;
    }

    const base = readObjectField(section, 'url');
    const token = readObjectField(section, 'token');
    const expires = readObjectField(section, 'expires');
    if (!base || !token || !expires) {
      context.log.debug('masterPlaylist object is missing url, token or expires');
      return null;
    }

    const playlistUrl = buildPlaylistUrl({
      base,
      token,
      expires,
      asn: readObjectField(section, 'asn') ?? undefined,
      language: context.language,
    });

    // An unverified URL is still handed to the downloader; the shape check has false negatives.
    const verified = await verifyPlaylist(playlistUrl, context);
    return { playlistUrl, verified, strategy: 'master-playlist' };
  },
};

/**
 * Builds the literal playlist link pattern for the configured embed host.
 */
const directLinkPattern = (baseUrl: string): RegExp =>
  new RegExp(`${escapeRegExp(baseUrl)}/playlist/\\d+\\?[^"'\\s<>]*`, 'u');

export const directLinkStrategy: ExtractionStrategy = {
  name: 'direct-link',
  // The host is only known at extraction time, so any playlist path is a candidate here.
  matches: (html) => html.includes('/playlist/'),
  extract: async (html, context) => {
    const match = directLinkPattern(context.baseUrl).exec(html);
    if (!match) {
      return null;
    }
    const playlistUrl = decodeHtmlEntities(match[0]);
    context.log.info(`Found playlist URL in page: ${playlistUrl}`);
    return { playlistUrl, verified: false, strategy: 'direct-link' };
  },
};

const looksLikeManifest = (value: string): boolean => value.includes('m3u8') || value.includes('playlist');

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Searches string values breadth-first: top-level values before anything nested.
 */
export const findManifestString = (data: unknown): string | null => {
  if (typeof data === 'string') {
    return looksLikeManifest(data) ? data : null;
  }
  const queue: unknown[] = [data];
  while (queue.length > 0) {
    const current = queue.shift();
    const values = Array.isArray(current) ? current : isRecord(current) ? Object.values(current) : [];
    for (const value of values) {
      if (typeof value === 'string' && looksLikeManifest(value)) {
        return value;
      }
      if (typeof value === 'object' && value !== null) {
        queue.push(value);
      }
    }
  }
  return null;
};

export const apiSidecarStrategy: ExtractionStrategy = {
  name: 'api-sidecar',
  matches: (html) => new RegExp(API_ENDPOINT_PATTERN.source, 'u').test(html),
  extract: async (html, context) => {
    const endpoints = [...new Set([...html.matchAll(API_ENDPOINT_PATTERN)].map((match) => match[1]))];
    context.log.debug(`Found API endpoints: ${endpoints.join(', ')}`);

    for (const endpoint of endpoints) {
      const apiUrl = new URL(endpoint, `${context.baseUrl}/`).toString();
      try {
        const response = await context.http.get(apiUrl, { timeoutMs: context.timeoutMs });
        if (!isSuccessStatus(response.status)) {
          continue;
        }
        const playlistUrl = findManifestString(JSON.parse(response.body));
        if (playlistUrl) {
          context.log.info(`Found playlist URL from API: ${playlistUrl}`);
          return { playlistUrl, verified: false, strategy: 'api-sidecar' };
        }
      } catch (error) {
        context.log.debug(`API call failed for ${apiUrl}: ${getErrorMessage(error)}`);
      }
    }
    return null;
  },
};

export const videoIdStrategy: ExtractionStrategy = {
  name: 'video-id',
  matches: (html) => VIDEO_ID_PATTERN.test(html),
  extract: async (html, context) => {
    const videoId = VIDEO_ID_PATTERN.exec(html)?.[1];
    if (!videoId) {
      return null;
    }

    const probes = [`${context.baseUrl}/playlist/${videoId}`, `${context.baseUrl}/api/playlist/${videoId}`];
    for (const probe of probes) {
      try {
        const response = await context.http.get(probe, { timeoutMs: context.timeoutMs });
        const contentType = response.headers['content-type'] ?? '';
        if (isSuccessStatus(response.status) && (response.body.includes('m3u8') || contentType.startsWith('application/'))) {
          context.log.info(`Found playlist URL by video id: ${response.url}`);
          return { playlistUrl: response.url, verified: false, strategy: 'video-id' };
        }
      } catch (error) {
        context.log.debug(`Probe failed for ${probe}: ${getErrorMessage(error)}`);
      }
    }
    return null;
  },
};

export const DEFAULT_STRATEGIES: readonly ExtractionStrategy[] = [
  masterPlaylistStrategy,
  directLinkStrategy,
  apiSidecarStrategy,
  videoIdStrategy,
];

export interface ExtractorOptions {
  readonly http: HttpClient;
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly strategies?: readonly ExtractionStrategy[];
  readonly log?: Logger;
}

/**
 * Runs the strategy chain over already-fetched HTML.
 */
export const runStrategies = async (
  html: string,
  context: ExtractionContext,
  strategies: readonly ExtractionStrategy[] = DEFAULT_STRATEGIES,
): Promise<ExtractionResult | null> => {
  for (const strategy of strategies) {
    if (!strategy.matches(html)) {
      continue;
    }
    try {
      const result = await strategy.extract(html, context);
      if (result && result.playlistUrl.length > 0) {
        return result;
      }
    } catch (error) {
      context.log.warn(`Extraction strategy ${strategy.name} failed: ${getErrorMessage(error)}`);
    }
  }
  return null;
};

/**
 * Fetches the embed page once and returns the first playlist candidate, or null when none is found.
 * A missing playlist is an expected outcome and never throws.
 */
export const extractPlaylist = async (
  embedUrl: string,
  language: string,
  { http, baseUrl, timeoutMs, strategies = DEFAULT_STRATEGIES, log = logger }: ExtractorOptions,
): Promise<ExtractionResult | null> => {
  log.debug(`Fetching embed page: ${embedUrl}`);
  const context: ExtractionContext = { embedUrl, baseUrl, language, timeoutMs, http, log };

  let html: string;
  try {
    const response = await http.get(embedUrl, { timeoutMs });
    if (!isSuccessStatus(response.status)) {
      log.warn(`Embed page returned HTTP ${response.status}: ${embedUrl}`);
      return null;
    }
    html = response.body;
  } catch (error) {
    log.warn(`Error fetching embed page ${embedUrl}: ${getErrorMessage(error)}`);
    return null;
  }

  const result = await runStrategies(html, context, strategies);
  if (!result) {
    log.warn(`Could not extract a playlist URL from ${embedUrl}; the page format may have changed`);
  }
  return result;
};

/**
 * Embed page for a task in the requested language.
 */
export const getEmbedUrl = (baseUrl: string, task: DownloadTask, language: string): string => {
  const lang = encodeURIComponent(language);
  if (task.contentKind === 'episode' && task.season !== undefined && task.episode !== undefined) {
    return `${baseUrl}/tv/${task.remoteId}/${task.season}/${task.episode}?lang=${lang}`;
  }
  return `${baseUrl}/movie/${task.remoteId}?lang=${lang}`;
};

export type PlaylistResolver = (task: DownloadTask, language: string) => Promise<ExtractionResult | null>;

/**
 * Binds the extractor to one embed host so callers only supply a task and a language.
 */
export const createPlaylistResolver = (options: ExtractorOptions): PlaylistResolver => (task, language) =>
  extractPlaylist(getEmbedUrl(options.baseUrl, task, language), language, options);
