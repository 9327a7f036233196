import type { MemoryDescriptor, TransferResult } from './shared/types/memory-entry.js';
import type { PipelineStatsPayload } from './shared/types/pipeline-stats.js';

export type ProgressCallback = (event: {
  type: 'phase' | 'entry' | 'log' | 'stats';
  phase?: string;
  entry?: MemoryDescriptor;
  result?: TransferResult;
  message?: string;
  stats?: PipelineStatsPayload;
}) => void;
