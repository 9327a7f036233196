export interface PipelineStatsPayload {
  total: number;
  successful: number;
  skipped: number;
  failed: number;
}

export interface StampStats {
  total: number;
  processed: number;
  skipped: number;
  failed: number;
}
