import fs from 'fs-extra';
import path from 'node:path';
import PQueue from 'p-queue';
import { z } from 'zod';
import { writeJsonAtomic } from '../utils/files.js';
import { describeError } from '../shared/errors.js';
import log from '../logger.js';

const persistedStateSchema = z.record(z.string());

export type PersistedState = z.infer<typeof persistedStateSchema>;

/**
 * Durable dedup-key to path mapping. Every `record` rewrites the whole file;
 * writes go through a single-slot queue and land via rename, so the file on
 * disk is always a complete JSON object.
 */
export class StateStore {
  private entries = new Map<string, string>();
  private readonly writes = new PQueue({ concurrency: 1 });

  constructor(private readonly statePath: string) {}

  async load(): Promise<PersistedState> {
    await fs.ensureDir(path.dirname(this.statePath));
    this.entries = new Map();
    if (!(await fs.pathExists(this.statePath))) {
      return {};
    }

    try {
      const raw: unknown = await fs.readJson(this.statePath);
      const parsed = persistedStateSchema.safeParse(raw);
      if (!parsed.success) {
        log.warn('State file %s is not a key to path mapping; starting empty', this.statePath);
        return {};
      }
      this.entries = new Map(Object.entries(parsed.data));
      return parsed.data;
    } catch (error) {
      log.warn('Could not load state file %s: %s', this.statePath, describeError(error));
      return {};
    }
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get(key: string): string | undefined {
    return this.entries.get(key);
  }

  get size(): number {
    return this.entries.size;
  }

  snapshot(): PersistedState {
    return Object.fromEntries(this.entries);
  }

  async record(key: string, filePath: string): Promise<void> {
    this.entries.set(key, filePath);
    await this.writes.add(() => writeJsonAtomic(this.statePath, this.snapshot()));
  }

  /** Resolves once every queued flush has landed. */
  async flushed(): Promise<void> {
    await this.writes.onIdle();
  }
}
