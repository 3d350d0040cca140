import os from 'node:os';
import path from 'node:path';
import fs from 'fs-extra';
import type { Logger } from 'winston';
import { DEFAULT_EXTENSION } from './config.js';
import { DownloadExecutor, FfmpegRunner } from './download.js';
import { getErrorMessage } from './errors.js';
import { getLanguageInfo } from './languages.js';
import { logger } from './logger.js';
import { createFfmpegLineParser, ProgressReporter } from './progress.js';
import { ExtractionResult, Quality } from './types.js';

export interface MultiLanguageRequest {
  /** First entry is the primary language. */
  readonly languages: readonly string[];
  readonly quality: Quality;
  readonly outputPath: string;
  readonly resolve: (language: string) => Promise<ExtractionResult | null>;
}

export interface MergeDependencies {
  readonly executor: DownloadExecutor;
  readonly ffmpeg: FfmpegRunner;
  /** Parent directory for the per-task working directory. */
  readonly tempRoot?: string;
  readonly log?: Logger;
}

export interface MergeOutcome {
  readonly success: boolean;
  readonly reason?: string;
  /** Languages that made it into the output, primary first. */
  readonly languages: readonly string[];
  readonly playlistUrls: readonly string[];
}

interface ResolvedTrack {
  readonly language: string;
  readonly playlistUrl: string;
}

interface DownloadedTrack {
  readonly language: string;
  readonly file: string;
}

/**
 * Output options for one video input followed by one audio-only input per secondary language.
 * The primary audio track is the only one flagged default.
 */
export const buildMergeOptions = (languages: readonly string[]): string[] => {
  const options = ['-map', '0:v:0', '-map', '0:a:0'];
  for (let index = 1; index < languages.length; index += 1) {
    options.push('-map', `${index}:a:0`);
  }
  options.push('-c', 'copy');

  languages.forEach((language, index) => {
    const info = getLanguageInfo(language);
    options.push(
      `-disposition:a:${index}`,
      index === 0 ? 'default' : '0',
      `-metadata:s:a:${index}`,
      `language=${info.iso639_2}`,
      `-metadata:s:a:${index}`,
      `title=${info.name}`,
    );
  });
  return options;
};

const failed = (reason: string, languages: readonly string[] = [], playlistUrls: readonly string[] = []): MergeOutcome => ({
  success: false,
  reason,
  languages,
  playlistUrls,
});

/**
 * Downloads the primary language as video+audio and every other language as audio only, then muxes
 * them into one file. Secondary languages that cannot be resolved or downloaded are dropped.
 *
 * Progress is split as: resolve 0-5, primary 5-60, audio overlays 60-90, merge 90-100. When no
 * secondary language resolves the primary download covers 5-100.
 */
export const downloadMultiLanguage = async (
  request: MultiLanguageRequest,
  progress: ProgressReporter,
  { executor, ffmpeg, tempRoot = os.tmpdir(), log = logger }: MergeDependencies,
): Promise<MergeOutcome> => {
  const [primary, ...secondaries] = request.languages;
  if (!primary) {
    return failed('no language requested');
  }

  const resolveTrack = async (language: string): Promise<ExtractionResult | null> => {
    const result = await request.resolve(language);
    if (result && !result.verified) {
      log.warn(`Playlist for language "${language}" could not be verified, trying it anyway`);
    }
    return result;
  };

  const primaryResult = await resolveTrack(primary);
  if (!primaryResult) {
    return failed(`no playlist found for primary language "${primary}"`);
  }

  const tracks: ResolvedTrack[] = [{ language: primary, playlistUrl: primaryResult.playlistUrl }];
  for (const language of secondaries) {
    const result = await resolveTrack(language);
    if (result) {
      tracks.push({ language, playlistUrl: result.playlistUrl });
    } else {
      log.warn(`No playlist found for language "${language}"; it will be left out`);
    }
  }
  const playlistUrls = tracks.map((track) => track.playlistUrl);
  progress.slice(0, 5).update({ percent: 100 });

  const overlays = tracks.slice(1);
  const workDir = await fs.mkdtemp(path.join(tempRoot, 'hls-embed-dl-'));

  try {
    const videoFile = path.join(workDir, `video_${primary}.${DEFAULT_EXTENSION}`);
    progress.describe(`Downloading ${primary} video`);
    const primaryOk = await executor.run(
      { url: primaryResult.playlistUrl, outputPath: videoFile, quality: request.quality, language: primary },
      progress.slice(5, overlays.length > 0 ? 60 : 100),
    );
    if (!primaryOk) {
      return failed(`download failed for primary language "${primary}"`, [], playlistUrls);
    }

    const audioTracks: DownloadedTrack[] = [];
    const audioSpan = overlays.length > 0 ? 30 / overlays.length : 0;
    for (const [index, track] of overlays.entries()) {
      const audioFile = path.join(workDir, `audio_${track.language}.m4a`);
      progress.describe(`Downloading ${track.language} audio`);
      const from = 60 + index * audioSpan;
      const ok = await executor.run(
        {
          url: track.playlistUrl,
          outputPath: audioFile,
          quality: request.quality,
          language: track.language,
          audioOnly: true,
        },
        progress.slice(from, from + audioSpan),
      );
      if (ok) {
        audioTracks.push({ language: track.language, file: audioFile });
      } else {
        log.warn(`Audio download failed for language "${track.language}"; it will be left out`);
      }
    }

    await fs.ensureDir(path.dirname(path.resolve(request.outputPath)));

    if (audioTracks.length === 0) {
      await fs.move(videoFile, request.outputPath, { overwrite: true });
      return { success: true, languages: [primary], playlistUrls };
    }

    const languages = [primary, ...audioTracks.map((track) => track.language)];
    progress.describe(`Merging ${languages.join(', ')}`);
    const mergeProgress = progress.slice(90, 100);
    const parser = createFfmpegLineParser();
    const merged = await ffmpeg.run(
      {
        inputs: [{ source: videoFile }, ...audioTracks.map((track) => ({ source: track.file }))],
        outputOptions: buildMergeOptions(languages),
        output: request.outputPath,
      },
      (line) => {
        mergeProgress.feed(parser, line);
      },
    );
    if (!merged) {
      return failed('merging audio tracks failed', languages, playlistUrls);
    }
    mergeProgress.update({ percent: 100 });
    return { success: true, languages, playlistUrls };
  } finally {
    try {
      await fs.remove(workDir);
    } catch (error) {
      log.warn(`Could not remove temporary directory ${workDir}: ${getErrorMessage(error)}`);
    }
  }
};
