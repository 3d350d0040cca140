/**
 * TMDB Metadata Provider Tests
 */

import axios, { AxiosError, AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import { createMetadataProvider, TmdbMetadataProvider } from '../src/metadata.js';
import { createSilentLogger } from './helpers.js';

const routes: Record<string, unknown> = {
  '/movie/550': { title: 'Fight Club', release_date: '1999-10-15' },
  '/movie/551': { title: 'Untitled Project', release_date: '' },
  '/movie/552': { release_date: '2001-01-01' },
  '/tv/1396': {
    name: 'Breaking Bad',
    first_air_date: '2008-01-20',
    seasons: [{ season_number: 2 }, { season_number: 0 }, { season_number: 1 }],
  },
  '/tv/1396/season/1': { episodes: [{ episode_number: 3 }, { episode_number: 1 }, { episode_number: 2 }] },
  '/tv/1396/season/1/episode/2': { name: 'Cat in the Bag...' },
};

const createStubClient = (): { client: AxiosInstance; requested: string[] } => {
  const requested: string[] = [];
  const client = axios.create({
    adapter: async (config: InternalAxiosRequestConfig) => {
      const url = config.url ?? '';
      requested.push(url);
      if (!(url in routes)) {
        throw new AxiosError('Request failed with status code 404', AxiosError.ERR_BAD_REQUEST, config);
      }
      return { data: routes[url], status: 200, statusText: 'OK', headers: {}, config };
    },
  });
  return { client, requested };
};

describe('TmdbMetadataProvider', () => {
  const log = createSilentLogger();

  it('should return the title and release year of a movie', async () => {
    const { client } = createStubClient();
    const provider = new TmdbMetadataProvider({ apiKey: 'test-secret', client, log });

    await expect(provider.getMovieInfo(550)).resolves.toEqual({ title: 'Fight Club', year: '1999' });
    await expect(provider.getMovieInfo(551)).resolves.toEqual({ title: 'Untitled Project', year: undefined });
  });

  it('should return null for missing or malformed responses', async () => {
    const { client } = createStubClient();
    const provider = new TmdbMetadataProvider({ apiKey: 'test-secret', client, log });

    await expect(provider.getMovieInfo(552)).resolves.toBeNull();
    await expect(provider.getMovieInfo(404)).resolves.toBeNull();
    await expect(provider.getShowName(404)).resolves.toBeNull();
    await expect(provider.getEpisodeInfo(404, 1, 1)).resolves.toBeNull();
  });

  it('should combine show and episode details', async () => {
    const { client } = createStubClient();
    const provider = new TmdbMetadataProvider({ apiKey: 'test-secret', client, log });

    await expect(provider.getEpisodeInfo(1396, 1, 2)).resolves.toEqual({
      showName: 'Breaking Bad',
      showYear: '2008',
      episodeName: 'Cat in the Bag...',
      season: 1,
      episode: 2,
    });
    await expect(provider.getEpisodeInfo(1396, 1, 9)).resolves.toEqual({
      showName: 'Breaking Bad',
      showYear: '2008',
      episodeName: undefined,
      season: 1,
      episode: 9,
    });
  });

  it('should list seasons in order and request show details once', async () => {
    const { client, requested } = createStubClient();
    const provider = new TmdbMetadataProvider({ apiKey: 'test-secret', client, log });

    await expect(provider.getSeasons(1396)).resolves.toEqual([0, 1, 2]);
    await expect(provider.getShowName(1396)).resolves.toBe('Breaking Bad');
    expect(requested.filter((url) => url === '/tv/1396')).toHaveLength(1);
  });

  it('should list the episodes of a season in order', async () => {
    const { client } = createStubClient();
    const provider = new TmdbMetadataProvider({ apiKey: 'test-secret', client, log });

    await expect(provider.getSeasonEpisodes(1396, 1)).resolves.toEqual([1, 2, 3]);
    await expect(provider.getSeasonEpisodes(1396, 5)).resolves.toBeNull();
  });
});

describe('createMetadataProvider', () => {
  it('should only create a provider when a key is configured', () => {
    expect(createMetadataProvider(undefined)).toBeNull();
    expect(createMetadataProvider('')).toBeNull();
    expect(createMetadataProvider('test-secret')).toBeInstanceOf(TmdbMetadataProvider);
  });
});
