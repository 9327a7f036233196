import { Readable, Transform } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import fs from 'fs-extra';
import type { OutputLayout } from '../config/app-paths.js';
import type { LocalTarget, MemoryDescriptor, TransferResult } from '../shared/types/memory-entry.js';
import { TransferError, describeError } from '../shared/errors.js';
import { deriveTarget } from '../utils/naming.js';
import { isNonEmptyFile, tempPath } from '../utils/files.js';
import { delay, type Sleeper } from '../utils/delay.js';
import { expectOk, type HttpClient, type TransferContext } from './http-client.js';
import { ArchiveService } from './archive-service.js';
import type { StateStore } from './state-store.js';
import type { FailureLog } from './failure-log.js';
import type { CancelSignal } from '../pipeline/pipeline-control.js';
import log from '../logger.js';

export const ROUTE_HEADER = 'X-Snap-Route-Tag';
export const ROUTE_TAG = 'mem-dmd';

export interface DownloadServiceOptions {
  layout: OutputLayout;
  maxRetries: number;
  backoffBaseMs: number;
  wait?: Sleeper;
}

export const backoffDelay = (attempt: number, baseMs: number): number => 2 ** attempt * baseMs;

export const splitLocator = (locator: string): { base: string; payload: string } => {
  const cut = locator.indexOf('?');
  if (cut === -1) {
    return { base: locator, payload: '' };
  }
  return { base: locator.slice(0, cut), payload: locator.slice(cut + 1) };
};

/**
 * Runs one descriptor through skip checks, bounded retries and archive
 * normalization. Keys are claimed for the whole run, so a duplicate row never
 * starts a second attempt sequence.
 */
export class DownloadService {
  private readonly claimed = new Set<string>();
  private readonly archive = new ArchiveService();
  private readonly wait: Sleeper;

  constructor(
    private readonly options: DownloadServiceOptions,
    private readonly state: StateStore,
    private readonly http: HttpClient,
    private readonly failures: FailureLog,
    private readonly control?: CancelSignal
  ) {
    this.wait = options.wait ?? delay;
  }

  get layout(): OutputLayout {
    return this.options.layout;
  }

  async process(entry: MemoryDescriptor): Promise<TransferResult> {
    const target = deriveTarget(entry, this.options.layout);
    if (this.state.has(target.key) || this.claimed.has(target.key)) {
      return { outcome: 'skipped-known', target, attempts: 0 };
    }
    this.claimed.add(target.key);
    if (target.keySource === 'fingerprint') {
      log.debug('No sid in locator of item %d; keyed by locator fingerprint %s', entry.index, target.key);
    }

    if (await isNonEmptyFile(target.path)) {
      await this.recordState(target);
      return { outcome: 'skipped-on-disk', target, attempts: 0 };
    }

    let lastError: unknown;
    for (let attempt = 0; attempt < this.options.maxRetries; attempt += 1) {
      if (this.control?.cancelled) {
        return this.cancelled(target, attempt);
      }
      try {
        await this.fetchAndWrite(entry, target);
        await this.recordState(target);
        return { outcome: 'succeeded', target, attempts: attempt + 1 };
      } catch (error) {
        if (this.control?.cancelled) {
          return this.cancelled(target, attempt + 1);
        }
        lastError = error;
        log.debug('Attempt %d/%d failed for %s: %s', attempt + 1, this.options.maxRetries, target.filename, describeError(error));
        if (attempt < this.options.maxRetries - 1) {
          const waited = await this.wait(backoffDelay(attempt, this.options.backoffBaseMs), this.control?.signal);
          if (!waited) {
            return this.cancelled(target, attempt + 1);
          }
        }
      }
    }

    const description = `Failed after ${this.options.maxRetries} attempts: ${describeError(lastError)}`;
    log.error('Download failed for %s: %s', target.filename, description);
    await this.failures.append(entry.locator, description);
    return { outcome: 'failed', target, attempts: this.options.maxRetries, error: description };
  }

  // The .part file is unwrapped and checked before it takes the final name.
  private async fetchAndWrite(entry: MemoryDescriptor, target: LocalTarget): Promise<void> {
    const partFile = tempPath(target.path);
    const signal = this.control?.signal;
    try {
      if (entry.transferMode === 'direct') {
        await this.http.get(
          entry.locator,
          (response, transfer) => this.writeBody(response, transfer, entry.locator, partFile),
          { headers: { [ROUTE_HEADER]: ROUTE_TAG }, signal }
        );
      } else {
        const downloadUrl = await this.resolveIndirect(entry.locator, signal);
        await this.http.get(downloadUrl, (response, transfer) => this.writeBody(response, transfer, downloadUrl, partFile), {
          signal
        });
      }

      await this.archive.unwrapIfArchive(partFile);
      if (!(await isNonEmptyFile(partFile))) {
        throw new TransferError('Downloaded file is empty', entry.locator);
      }
      await fs.move(partFile, target.path, { overwrite: true });
    } finally {
      await fs.remove(partFile);
    }
  }

  private async resolveIndirect(locator: string, signal?: AbortSignal): Promise<string> {
    const { base, payload } = splitLocator(locator);
    const downloadUrl = await this.http.postForm(
      base,
      payload,
      async (response) => {
        expectOk(response, base);
        return (await response.text()).trim();
      },
      { signal }
    );
    if (!downloadUrl) {
      throw new TransferError('Proxy response did not contain a download URL', base);
    }
    return downloadUrl;
  }

  private async writeBody(response: Response, transfer: TransferContext, url: string, destination: string): Promise<void> {
    expectOk(response, url);
    if (!response.body) {
      throw new TransferError('Downloaded file is empty', url);
    }
    const activity = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        transfer.keepAlive();
        callback(null, chunk);
      }
    });
    await pipeline(Readable.fromWeb(response.body), activity, fs.createWriteStream(destination), { signal: transfer.signal });
  }

  private async recordState(target: LocalTarget): Promise<void> {
    try {
      await this.state.record(target.key, target.path);
    } catch (error) {
      log.error('Could not save state for %s: %s', target.filename, describeError(error));
    }
  }

  private cancelled(target: LocalTarget, attempts: number): TransferResult {
    this.claimed.delete(target.key);
    return { outcome: 'cancelled', target, attempts };
  }
}
