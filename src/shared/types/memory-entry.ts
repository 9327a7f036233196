export type MediaKind = 'image' | 'video' | 'unknown';

export type TransferMode = 'direct' | 'indirect';

export type KeySource = 'sid' | 'fingerprint';

export type TransferOutcome = 'skipped-known' | 'skipped-on-disk' | 'succeeded' | 'failed' | 'cancelled';

export interface MemoryDescriptor {
  readonly index: number;
  readonly locator: string;
  readonly timestamp: string;
  readonly mediaKind: MediaKind;
  readonly transferMode: TransferMode;
}

export interface LocalTarget {
  key: string;
  keySource: KeySource;
  filename: string;
  directory: string;
  path: string;
}

export interface TransferResult {
  outcome: TransferOutcome;
  target: LocalTarget;
  attempts: number;
  error?: string;
}

export interface PipelineOptions {
  concurrency: number;
  maxRetries: number;
  /** Pause after each successful transfer, per worker. */
  delayMs: number;
  backoffBaseMs: number;
  attemptTimeoutMs: number;
}

export interface PipelineRunRequest {
  exportPath: string;
  outputDir: string;
  options: PipelineOptions;
}

export interface PipelineRunSummary {
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  total: number;
  successful: number;
  skipped: number;
  failed: number;
  previouslyRecorded: number;
  interrupted: boolean;
  outputDir: string;
  failureLogPath: string;
}
