import type { TransferOutcome } from '../shared/types/memory-entry.js';
import type { PipelineStatsPayload } from '../shared/types/pipeline-stats.js';

/**
 * Counters for one run. Workers report through `record` only; each finished
 * descriptor bumps exactly one bucket, cancelled ones none.
 */
export class RunStatistics {
  private readonly counters: PipelineStatsPayload;

  constructor(total: number) {
    this.counters = { total, successful: 0, skipped: 0, failed: 0 };
  }

  record(outcome: TransferOutcome): void {
    switch (outcome) {
      case 'succeeded':
        this.counters.successful += 1;
        break;
      case 'skipped-known':
      case 'skipped-on-disk':
        this.counters.skipped += 1;
        break;
      case 'failed':
        this.counters.failed += 1;
        break;
      case 'cancelled':
        break;
    }
  }

  snapshot(): PipelineStatsPayload {
    return { ...this.counters };
  }
}
