import { z } from 'zod';
import { ConfigError } from '../shared/errors.js';
import type { PipelineOptions } from '../shared/types/memory-entry.js';

export const CONFIRM_WORKERS_ABOVE = 10;

const runOptionsSchema = z.object({
  delay: z.number().finite().min(0, 'delay must not be negative'),
  maxRetries: z.number().int('max retries must be a whole number').min(1, 'max retries must be at least 1'),
  workers: z.number().int('workers must be a whole number').min(1, 'workers must be at least 1')
});

export type RawRunOptions = z.input<typeof runOptionsSchema>;

export interface RunDefaults {
  backoffBaseMs: number;
  attemptTimeoutMs: number;
}

export const parseRunOptions = (raw: RawRunOptions, defaults: RunDefaults): PipelineOptions => {
  const result = runOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => issue.message).join('; '));
  }
  return {
    concurrency: result.data.workers,
    maxRetries: result.data.maxRetries,
    delayMs: Math.round(result.data.delay * 1000),
    backoffBaseMs: defaults.backoffBaseMs,
    attemptTimeoutMs: defaults.attemptTimeoutMs
  };
};

export const needsConfirmation = (options: PipelineOptions): boolean => options.concurrency > CONFIRM_WORKERS_ABOVE;
