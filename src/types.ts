export type ContentKind = 'movie' | 'episode';

/**
 * Either the literal "best" or a vertical resolution ceiling such as 720.
 */
export type Quality = 'best' | number;

export interface DownloadTask {
  readonly contentKind: ContentKind;
  readonly remoteId: number;
  readonly season?: number;
  readonly episode?: number;
  /** First entry is the primary language; the rest are audio-only overlays. */
  readonly languages: readonly string[];
  readonly quality: Quality;
  readonly outputFile?: string;
  /** Batch file line the task was read from. */
  readonly line?: number;
}

export interface TaskDefaults {
  readonly languages: readonly string[];
  readonly quality: Quality;
}

export interface ExtractionResult {
  readonly playlistUrl: string;
  /** True only when a live fetch returned a body starting with the manifest header. */
  readonly verified: boolean;
  readonly strategy: string;
}

export interface ProgressUpdate {
  readonly percent: number;
  readonly bitrate?: string;
}

export type TaskStatus = 'completed' | 'failed';

export interface TaskOutcome {
  readonly task: DownloadTask;
  readonly label: string;
  readonly status: TaskStatus;
  readonly reason?: string;
  readonly filePath?: string;
  readonly playlistUrls?: readonly string[];
}

export interface BatchResult {
  readonly successCount: number;
  readonly failureCount: number;
  readonly outcomes: readonly TaskOutcome[];
}
