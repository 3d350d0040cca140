/**
 * Configuration Tests
 */

import { loadConfig } from '../src/config.js';
import { ConfigError, ErrorCode, getErrorMessage } from '../src/errors.js';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      embedBaseUrl: 'https://vixsrc.to',
      defaultLanguages: ['en'],
      defaultQuality: 'best',
      concurrency: 1,
      fragmentConcurrency: 5,
      requestTimeoutMs: 30_000,
      processTimeoutMs: 14_400_000,
      tmdbApiKey: undefined,
      ytDlpPath: 'yt-dlp',
      ffmpegPath: undefined,
      logLevel: 'info',
      errorLogFile: 'errors.log',
      downloadsLedger: 'downloaded.log',
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      EMBED_BASE_URL: 'https://embed.example.test/',
      DEFAULT_LANG: 'it,en',
      DEFAULT_QUALITY: '1080p',
      DOWNLOAD_CONCURRENCY: '4',
      YTDLP_CONCURRENCY: '16',
      REQUEST_TIMEOUT_SECONDS: '2.5',
      PROCESS_TIMEOUT_MINUTES: '90',
      TMDB_API_KEY: 'test-secret',
      LOG_LEVEL: 'debug',
    });

    expect(config.embedBaseUrl).toBe('https://embed.example.test');
    expect(config.defaultLanguages).toEqual(['it', 'en']);
    expect(config.defaultQuality).toBe(1080);
    expect(config.concurrency).toBe(4);
    expect(config.fragmentConcurrency).toBe(16);
    expect(config.requestTimeoutMs).toBe(2500);
    expect(config.processTimeoutMs).toBe(5_400_000);
    expect(config.tmdbApiKey).toBe('test-secret');
    expect(config.logLevel).toBe('debug');
  });

  it('should treat blank values as unset', () => {
    const config = loadConfig({ TMDB_API_KEY: '   ', DOWNLOAD_CONCURRENCY: '' });

    expect(config.tmdbApiKey).toBeUndefined();
    expect(config.concurrency).toBe(1);
  });

  it.each([
    ['DOWNLOAD_CONCURRENCY', 'zero'],
    ['DOWNLOAD_CONCURRENCY', '0'],
    ['DEFAULT_QUALITY', 'hd'],
    ['DEFAULT_LANG', ','],
    ['LOG_LEVEL', 'loud'],
    ['EMBED_BASE_URL', 'not a url'],
    ['PROCESS_TIMEOUT_MINUTES', '40000'],
  ])('should reject %s=%s', (name, value) => {
    expect(() => loadConfig({ [name]: value })).toThrow(ConfigError);
  });
});

describe('process timeout bound', () => {
  it('should accept the longest timeout a timer can hold', () => {
    expect(loadConfig({ PROCESS_TIMEOUT_MINUTES: '35791' }).processTimeoutMs).toBe(2_147_460_000);
  });

  it('should reject timeouts beyond the timer range', () => {
    expect(() => loadConfig({ PROCESS_TIMEOUT_MINUTES: '35792' })).toThrow(/PROCESS_TIMEOUT_MINUTES/u);
  });
});

describe('errors', () => {
  it('should carry a code and the subclass name', () => {
    const error = new ConfigError('Invalid configuration: LOG_LEVEL');

    expect(error.name).toBe('ConfigError');
    expect(error.code).toBe(ErrorCode.CONFIG_INVALID);
    expect(error).toBeInstanceOf(Error);
  });

  it('should read messages from any thrown value', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('plain')).toBe('plain');
    expect(getErrorMessage(42)).toBe('42');
  });
});
