/**
 * TMDB metadata lookups used for labels, filenames and show expansion.
 * Every lookup degrades to null; metadata never blocks a download.
 */

import axios, { AxiosInstance } from 'axios';
import type { Logger } from 'winston';
import { z } from 'zod';
import { getErrorMessage } from './errors.js';
import { logger } from './logger.js';

export const TMDB_BASE_URL = 'https://api.themoviedb.org/3';

export interface MovieInfo {
  readonly title: string;
  readonly year?: string;
}

export interface EpisodeInfo {
  readonly showName: string;
  readonly showYear?: string;
  readonly episodeName?: string;
  readonly season: number;
  readonly episode: number;
}

export interface MetadataProvider {
  getMovieInfo(movieId: number): Promise<MovieInfo | null>;
  getEpisodeInfo(showId: number, season: number, episode: number): Promise<EpisodeInfo | null>;
  getShowName(showId: number): Promise<string | null>;
  /** Season numbers as listed by the provider, specials included. */
  getSeasons(showId: number): Promise<number[] | null>;
  getSeasonEpisodes(showId: number, season: number): Promise<number[] | null>;
}

const movieSchema = z.object({
  title: z.string(),
  release_date: z.string().optional().nullable(),
});

const showSchema = z.object({
  name: z.string(),
  first_air_date: z.string().optional().nullable(),
  seasons: z.array(z.object({ season_number: z.number().int() })).default([]),
});

const seasonSchema = z.object({
  episodes: z.array(z.object({ episode_number: z.number().int() })).default([]),
});

const episodeSchema = z.object({
  name: z.string().optional().nullable(),
});

type ShowDetails = z.infer<typeof showSchema>;

const yearOf = (date: string | null | undefined): string | undefined => {
  const year = date?.split('-')[0];
  return year && /^\d{4}$/u.test(year) ? year : undefined;
};

export interface TmdbMetadataOptions {
  readonly apiKey: string;
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
  readonly client?: AxiosInstance;
  readonly log?: Logger;
}

export class TmdbMetadataProvider implements MetadataProvider {
  private readonly client: AxiosInstance;
  private readonly log: Logger;
  private readonly shows = new Map<number, Promise<ShowDetails | null>>();

  constructor(options: TmdbMetadataOptions) {
    this.log = options.log ?? logger;
    this.client =
      options.client ??
      axios.create({
        baseURL: options.baseUrl ?? TMDB_BASE_URL,
        params: { api_key: options.apiKey },
        timeout: options.timeoutMs ?? 10_000,
      });
  }

  async getMovieInfo(movieId: number): Promise<MovieInfo | null> {
    const movie = await this.request(`/movie/${movieId}`, movieSchema);
    if (!movie || movie.title.length === 0) {
      return null;
    }
    return { title: movie.title, year: yearOf(movie.release_date) };
  }

  async getEpisodeInfo(showId: number, season: number, episode: number): Promise<EpisodeInfo | null> {
    const show = await this.getShow(showId);
    if (!show || show.name.length === 0) {
      return null;
    }
    const details = await this.request(`/tv/${showId}/season/${season}/episode/${episode}`, episodeSchema);
    return {
      showName: show.name,
      showYear: yearOf(show.first_air_date),
      episodeName: details?.name ? details.name : undefined,
      season,
      episode,
    };
  }

  async getShowName(showId: number): Promise<string | null> {
    const show = await this.getShow(showId);
    return show?.name ? show.name : null;
  }

  async getSeasons(showId: number): Promise<number[] | null> {
    const show = await this.getShow(showId);
    if (!show) {
      return null;
    }
    return show.seasons.map((season) => season.season_number).sort((a, b) => a - b);
  }

  async getSeasonEpisodes(showId: number, season: number): Promise<number[] | null> {
    const details = await this.request(`/tv/${showId}/season/${season}`, seasonSchema);
    if (!details) {
      return null;
    }
    return details.episodes.map((episode) => episode.episode_number).sort((a, b) => a - b);
  }

  /**
   * Show details are requested by every episode of a batch, so they are cached per show.
   */
  private getShow(showId: number): Promise<ShowDetails | null> {
    let pending = this.shows.get(showId);
    if (!pending) {
      pending = this.request(`/tv/${showId}`, showSchema);
      this.shows.set(showId, pending);
    }
    return pending;
  }

  private async request<T>(endpoint: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    try {
      const response = await this.client.get<unknown>(endpoint);
      const parsed = schema.safeParse(response.data);
      if (!parsed.success) {
        this.log.warn(`Unexpected TMDB response for ${endpoint}`);
        return null;
      }
      return parsed.data;
    } catch (error) {
      this.log.warn(`TMDB request failed for ${endpoint}: ${getErrorMessage(error)}`);
      return null;
    }
  }
}

/**
 * Returns a TMDB-backed provider, or null when metadata is disabled or no key is configured.
 */
export const createMetadataProvider = (
  apiKey: string | undefined,
  options: Omit<TmdbMetadataOptions, 'apiKey'> = {},
): MetadataProvider | null => (apiKey ? new TmdbMetadataProvider({ ...options, apiKey }) : null);
