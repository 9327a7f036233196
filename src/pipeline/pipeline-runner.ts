import PQueue from 'p-queue';
import { ensureOutputLayout, resolveOutputLayout } from '../config/app-paths.js';
import { getEnv } from '../config/env.js';
import { IndexParser } from '../services/index-parser.js';
import { StateStore } from '../services/state-store.js';
import { FailureLog } from '../services/failure-log.js';
import { HttpClient, type FetchLike } from '../services/http-client.js';
import { DownloadService } from '../services/download-service.js';
import { PipelineControl } from './pipeline-control.js';
import { RunStatistics } from './run-statistics.js';
import { delay, type Sleeper } from '../utils/delay.js';
import { deriveTarget } from '../utils/naming.js';
import { describeError } from '../shared/errors.js';
import log from '../logger.js';
import type {
  MemoryDescriptor,
  PipelineOptions,
  PipelineRunRequest,
  PipelineRunSummary,
  TransferResult
} from '../shared/types/memory-entry.js';
import type { ProgressCallback } from '../types.js';

export interface PipelineDependencies {
  fetchImpl?: FetchLike;
  /** Used for both backoff and pacing waits. */
  wait?: Sleeper;
  userAgent?: string;
}

export class PipelineRunner {
  private readonly parser = new IndexParser();
  private readonly control = new PipelineControl();
  private readonly wait: Sleeper;
  private isRunning = false;

  constructor(private readonly dependencies: PipelineDependencies = {}) {
    this.wait = dependencies.wait ?? delay;
  }

  async run(request: PipelineRunRequest, progress: ProgressCallback): Promise<PipelineRunSummary> {
    if (this.isRunning) {
      throw new Error('Pipeline is already running.');
    }
    this.isRunning = true;
    this.control.reset();
    const startedAt = new Date();
    const layout = resolveOutputLayout(request.outputDir);

    try {
      progress({ type: 'phase', phase: 'parse-index' });
      const entries = await this.parser.parse(request.exportPath);

      await ensureOutputLayout(layout);
      const stateStore = new StateStore(layout.statePath);
      await stateStore.load();
      const previouslyRecorded = stateStore.size;
      const stats = new RunStatistics(entries.length);

      if (!entries.length) {
        progress({ type: 'log', message: 'No memories found in export.' });
        return this.buildSummary(request, stats, startedAt, previouslyRecorded, layout.failureLogPath);
      }

      const failures = new FailureLog(layout.failureLogPath);
      const http = new HttpClient({
        userAgent: this.dependencies.userAgent ?? getEnv().USER_AGENT,
        timeoutMs: request.options.attemptTimeoutMs,
        fetchImpl: this.dependencies.fetchImpl
      });
      const downloadService = new DownloadService(
        {
          layout,
          maxRetries: request.options.maxRetries,
          backoffBaseMs: request.options.backoffBaseMs,
          wait: this.wait
        },
        stateStore,
        http,
        failures,
        this.control
      );

      log.info(
        'Starting %d downloads into %s (%d already recorded, %d workers)',
        entries.length,
        layout.root,
        previouslyRecorded,
        request.options.concurrency
      );
      progress({ type: 'phase', phase: 'download' });
      const execute = (entry: MemoryDescriptor) => this.execute(entry, downloadService, stats, progress);
      if (request.options.concurrency === 1) {
        await this.runSequential(entries, execute, request.options);
      } else {
        await this.runPooled(entries, execute, request.options);
      }
      await stateStore.flushed();

      const summary = this.buildSummary(request, stats, startedAt, previouslyRecorded, layout.failureLogPath);
      progress({ type: 'phase', phase: this.control.cancelled ? 'interrupted' : 'complete' });
      return summary;
    } finally {
      this.isRunning = false;
    }
  }

  cancel(): void {
    if (!this.isRunning) {
      return;
    }
    this.control.cancel('interrupted');
  }

  private async execute(
    entry: MemoryDescriptor,
    downloadService: DownloadService,
    stats: RunStatistics,
    progress: ProgressCallback
  ): Promise<TransferResult> {
    let result: TransferResult;
    try {
      result = await downloadService.process(entry);
    } catch (error) {
      const target = deriveTarget(entry, downloadService.layout);
      log.error('Unexpected error while processing %s: %s', target.filename, describeError(error));
      result = { outcome: 'failed', target, attempts: 0, error: describeError(error) };
    }
    stats.record(result.outcome);
    if (result.outcome !== 'cancelled') {
      progress({ type: 'entry', entry, result });
      progress({ type: 'stats', stats: stats.snapshot() });
    }
    return result;
  }

  private async runSequential(
    entries: MemoryDescriptor[],
    execute: (entry: MemoryDescriptor) => Promise<TransferResult>,
    options: PipelineOptions
  ): Promise<void> {
    for (const [i, entry] of entries.entries()) {
      if (this.control.cancelled) {
        return;
      }
      const { outcome } = await execute(entry);
      if (outcome === 'succeeded' && i < entries.length - 1) {
        await this.wait(options.delayMs, this.control.signal);
      }
    }
  }

  // Each worker holds its slot through its own pause, so the pool as a whole
  // issues roughly concurrency / delay transfers per second.
  private async runPooled(
    entries: MemoryDescriptor[],
    execute: (entry: MemoryDescriptor) => Promise<TransferResult>,
    options: PipelineOptions
  ): Promise<void> {
    const queue = new PQueue({ concurrency: options.concurrency });
    const unsubscribe = this.control.onCancel(() => queue.clear());
    try {
      for (const entry of entries) {
        // execute never rejects; cleared jobs simply never run
        void queue.add(async () => {
          if (this.control.cancelled) {
            return;
          }
          const { outcome } = await execute(entry);
          if (outcome === 'succeeded') {
            await this.wait(options.delayMs, this.control.signal);
          }
        });
      }
      await queue.onIdle();
    } finally {
      unsubscribe();
    }
  }

  private buildSummary(
    request: PipelineRunRequest,
    stats: RunStatistics,
    startedAt: Date,
    previouslyRecorded: number,
    failureLogPath: string
  ): PipelineRunSummary {
    const finishedAt = new Date();
    const counters = stats.snapshot();
    return {
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      ...counters,
      previouslyRecorded,
      interrupted: this.control.cancelled,
      outputDir: request.outputDir,
      failureLogPath
    };
  }
}
