import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import fs from 'fs-extra';
import { DownloadService, backoffDelay, splitLocator } from './download-service.js';
import { StateStore } from './state-store.js';
import { FailureLog } from './failure-log.js';
import { HttpClient } from './http-client.js';
import { ArchiveService } from './archive-service.js';
import { ensureOutputLayout, resolveOutputLayout, type OutputLayout } from '../config/app-paths.js';
import { PipelineControl } from '../pipeline/pipeline-control.js';
import type { MemoryDescriptor } from '../shared/types/memory-entry.js';
import type { Sleeper } from '../utils/delay.js';
import { FakeFetch } from '../test-utils/fake-fetch.js';
import { buildZip } from '../test-utils/zip.js';
import { makeTempDir, removeTempDir } from '../test-utils/temp-dir.js';

const MEDIA_URL = 'https://app.example.com/dmd/mm';
const CDN_URL = 'https://cdn.example.com/media/clip.mp4';

const descriptor = (overrides: Partial<MemoryDescriptor> = {}): MemoryDescriptor => ({
  index: 0,
  locator: `${MEDIA_URL}?uid=u-1&sid=S-1`,
  timestamp: '2021-03-04 05:06:07 UTC',
  mediaKind: 'image',
  transferMode: 'direct',
  ...overrides
});

describe('backoffDelay', () => {
  it('doubles per attempt', () => {
    expect([0, 1, 2].map((attempt) => backoffDelay(attempt, 1000))).toEqual([1000, 2000, 4000]);
  });
});

describe('splitLocator', () => {
  it('splits at the first question mark', () => {
    expect(splitLocator('https://a.example.com/p?x=1&y=?')).toEqual({ base: 'https://a.example.com/p', payload: 'x=1&y=?' });
  });

  it('sends an empty payload when there is no query', () => {
    expect(splitLocator('https://a.example.com/p')).toEqual({ base: 'https://a.example.com/p', payload: '' });
  });
});

describe('DownloadService', () => {
  let dir: string;
  let layout: OutputLayout;
  let fake: FakeFetch;
  let state: StateStore;
  let failures: FailureLog;
  let waits: number[];
  let control: PipelineControl;

  const recordWait: Sleeper = async (ms) => {
    waits.push(ms);
    return true;
  };

  const createService = (maxRetries = 3, wait: Sleeper = recordWait, timeoutMs = 5000): DownloadService =>
    new DownloadService(
      { layout, maxRetries, backoffBaseMs: 1000, wait },
      state,
      new HttpClient({ userAgent: 'test-agent', timeoutMs, fetchImpl: fake.fetch }),
      failures,
      control
    );

  beforeEach(async () => {
    dir = await makeTempDir();
    layout = resolveOutputLayout(path.join(dir, 'out'));
    await ensureOutputLayout(layout);
    fake = new FakeFetch();
    state = new StateStore(layout.statePath);
    await state.load();
    failures = new FailureLog(layout.failureLogPath);
    waits = [];
    control = new PipelineControl();
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await removeTempDir(dir);
  });

  it('fetches direct items with the route header and records them', async () => {
    fake.on('GET', MEDIA_URL, () => ({ body: 'image-bytes' }));

    const result = await createService().process(descriptor());

    const expectedPath = path.join(layout.imagesDir, '2021-03-04_05-06-07_S-1.jpg');
    expect(result).toEqual({
      outcome: 'succeeded',
      attempts: 1,
      target: {
        key: 'S-1',
        keySource: 'sid',
        filename: '2021-03-04_05-06-07_S-1.jpg',
        directory: layout.imagesDir,
        path: expectedPath
      }
    });
    expect(await fs.readFile(expectedPath, 'utf8')).toBe('image-bytes');
    expect(fake.requests).toHaveLength(1);
    expect(fake.requests[0].url).toBe(`${MEDIA_URL}?uid=u-1&sid=S-1`);
    expect(fake.requests[0].headers['x-snap-route-tag']).toBe('mem-dmd');
    expect(fake.requests[0].headers['user-agent']).toBe('test-agent');
    await state.flushed();
    expect(await fs.readJson(layout.statePath)).toEqual({ 'S-1': expectedPath });
    expect(await fs.pathExists(`${expectedPath}.part`)).toBe(false);
  });

  it('resolves indirect items through the proxy before fetching', async () => {
    fake
      .on('POST', MEDIA_URL, () => ({ body: `  ${CDN_URL}\n` }))
      .on('GET', CDN_URL, () => ({ body: 'video-bytes' }));

    const result = await createService().process(
      descriptor({ locator: `${MEDIA_URL}?uid=u-1&sid=S-2`, mediaKind: 'video', transferMode: 'indirect' })
    );

    expect(result.outcome).toBe('succeeded');
    expect(result.target.path).toBe(path.join(layout.videosDir, '2021-03-04_05-06-07_S-2.mp4'));
    expect(await fs.readFile(result.target.path, 'utf8')).toBe('video-bytes');

    const [post, get] = fake.requests;
    expect(post.method).toBe('POST');
    expect(post.url).toBe(MEDIA_URL);
    expect(post.body).toBe('uid=u-1&sid=S-2');
    expect(post.headers['content-type']).toBe('application/x-www-form-urlencoded');
    expect(get.method).toBe('GET');
    expect(get.url).toBe(CDN_URL);
    expect(get.headers['x-snap-route-tag']).toBeUndefined();
  });

  it('treats an empty proxy answer as a failed attempt', async () => {
    fake.on('POST', MEDIA_URL, () => ({ body: '   ' }));

    const result = await createService(1).process(descriptor({ transferMode: 'indirect' }));

    expect(result.outcome).toBe('failed');
    expect(result.error).toBe('Failed after 1 attempts: Proxy response did not contain a download URL');
  });

  it('gives up after maxRetries attempts with exponential backoff', async () => {
    fake.on('GET', MEDIA_URL, () => ({ status: 500, body: 'server error' }));
    const entry = descriptor();

    const result = await createService(3).process(entry);

    expect(result.outcome).toBe('failed');
    expect(result.attempts).toBe(3);
    expect(result.error).toBe('Failed after 3 attempts: Unexpected response status 500');
    expect(fake.callsTo('GET', MEDIA_URL)).toHaveLength(3);
    expect(waits).toEqual([1000, 2000]);

    const logged = await fs.readFile(layout.failureLogPath, 'utf8');
    expect(logged.match(/^\[/gm)).toHaveLength(1);
    expect(logged).toContain(`] ${entry.locator}\nError: Failed after 3 attempts: Unexpected response status 500\n\n`);
    expect(state.has('S-1')).toBe(false);
    expect(await fs.pathExists(result.target.path)).toBe(false);
  });

  it('retries a zero-byte body and keeps the second answer', async () => {
    let calls = 0;
    fake.on('GET', MEDIA_URL, () => {
      calls += 1;
      return calls === 1 ? { body: '' } : { body: 'second-try' };
    });

    const result = await createService().process(descriptor());

    expect(result.outcome).toBe('succeeded');
    expect(result.attempts).toBe(2);
    expect(waits).toEqual([1000]);
    expect(await fs.readFile(result.target.path, 'utf8')).toBe('second-try');
    expect(await fs.readdir(layout.imagesDir)).toEqual(['2021-03-04_05-06-07_S-1.jpg']);
  });

  it('skips keys already in the state without any request', async () => {
    await state.record('S-1', '/elsewhere/file.jpg');

    const result = await createService().process(descriptor());

    expect(result.outcome).toBe('skipped-known');
    expect(result.attempts).toBe(0);
    expect(fake.requests).toHaveLength(0);
  });

  it('adopts a non-empty file already at the target path', async () => {
    const target = path.join(layout.imagesDir, '2021-03-04_05-06-07_S-1.jpg');
    await fs.writeFile(target, 'from an earlier run');

    const result = await createService().process(descriptor());

    expect(result.outcome).toBe('skipped-on-disk');
    expect(fake.requests).toHaveLength(0);
    expect(state.get('S-1')).toBe(target);
    expect(await fs.readFile(target, 'utf8')).toBe('from an earlier run');
  });

  it('downloads again over an empty leftover file', async () => {
    const target = path.join(layout.imagesDir, '2021-03-04_05-06-07_S-1.jpg');
    await fs.writeFile(target, '');
    fake.on('GET', MEDIA_URL, () => ({ body: 'fresh' }));

    const result = await createService().process(descriptor());

    expect(result.outcome).toBe('succeeded');
    expect(await fs.readFile(target, 'utf8')).toBe('fresh');
  });

  it('starts only one attempt sequence for duplicate keys', async () => {
    fake.on('GET', MEDIA_URL, () => ({ body: 'once' }));
    const service = createService();

    const results = await Promise.all([
      service.process(descriptor({ index: 0 })),
      service.process(descriptor({ index: 1, locator: `${MEDIA_URL}?sid=S-1&uid=u-2` }))
    ]);

    expect(results.map((result) => result.outcome)).toEqual(['succeeded', 'skipped-known']);
    expect(fake.requests).toHaveLength(1);
  });

  it('unwraps archive payloads to the -main entry', async () => {
    const zip = await buildZip({ 'S-1-overlay.png': 'overlay', 'S-1-main.jpg': 'main-image' });
    fake.on('GET', MEDIA_URL, () => ({ body: zip }));

    const result = await createService().process(descriptor());

    expect(result.outcome).toBe('succeeded');
    expect(await fs.readFile(result.target.path, 'utf8')).toBe('main-image');
    expect(await fs.readdir(layout.imagesDir)).toEqual(['2021-03-04_05-06-07_S-1.jpg']);
  });

  it('keeps an archive without a -main entry and still counts it as success', async () => {
    const zip = await buildZip({ 'S-1-overlay.png': 'overlay' });
    fake.on('GET', MEDIA_URL, () => ({ body: zip }));

    const result = await createService().process(descriptor());

    expect(result.outcome).toBe('succeeded');
    expect(await fs.readFile(result.target.path)).toEqual(zip);
    expect(state.has('S-1')).toBe(true);
  });

  it('keeps the archive when its -main entry is empty, so the recorded file is never empty', async () => {
    const zip = await buildZip({ 'S-1-overlay.png': 'overlay', 'S-1-main.jpg': '' });
    fake.on('GET', MEDIA_URL, () => ({ body: zip }));

    const result = await createService().process(descriptor());

    expect(result.outcome).toBe('succeeded');
    expect(state.get('S-1')).toBe(result.target.path);
    const { size } = await fs.stat(result.target.path);
    expect(size).toBeGreaterThan(0);
    expect(await fs.readFile(result.target.path)).toEqual(zip);
  });

  it('unwraps the .part file before it takes the final name', async () => {
    const unwrap = jest.spyOn(ArchiveService.prototype, 'unwrapIfArchive');
    fake.on('GET', MEDIA_URL, () => ({ body: 'image-bytes' }));

    const result = await createService().process(descriptor());

    expect(unwrap).toHaveBeenCalledTimes(1);
    expect(unwrap).toHaveBeenCalledWith(`${result.target.path}.part`);
  });

  it('lets a slow body finish as long as data keeps arriving', async () => {
    async function* trickle() {
      for (let i = 0; i < 8; i += 1) {
        await sleep(100);
        yield Buffer.from('abc');
      }
    }
    fake.on('GET', MEDIA_URL, () => ({ body: trickle() }));

    const result = await createService(2, recordWait, 300).process(descriptor({ mediaKind: 'video' }));

    expect(result.outcome).toBe('succeeded');
    expect(result.attempts).toBe(1);
    expect(await fs.readFile(result.target.path, 'utf8')).toBe('abc'.repeat(8));
  });

  it('fails an attempt whose body stalls longer than the timeout', async () => {
    async function* stall() {
      yield Buffer.from('abc');
      await sleep(1000);
      yield Buffer.from('def');
    }
    fake.on('GET', MEDIA_URL, () => ({ body: stall() }));

    const result = await createService(1, recordWait, 300).process(descriptor());

    expect(result.outcome).toBe('failed');
    expect(result.error).toBe('Failed after 1 attempts: Request timed out after 300 ms of inactivity');
    expect(await fs.readdir(layout.imagesDir)).toEqual([]);
  });

  it('stops retrying once cancelled and leaves no trace', async () => {
    fake.on('GET', MEDIA_URL, () => {
      control.cancel('interrupted');
      return { status: 503 };
    });

    const service = createService();
    const result = await service.process(descriptor());

    expect(result.outcome).toBe('cancelled');
    expect(fake.requests).toHaveLength(1);
    expect(waits).toEqual([]);
    expect(state.has('S-1')).toBe(false);
    expect(await fs.pathExists(layout.failureLogPath)).toBe(false);
  });

  it('treats an aborted backoff as cancellation', async () => {
    fake.on('GET', MEDIA_URL, () => ({ status: 500 }));
    const abortingWait: Sleeper = async () => {
      control.cancel('interrupted');
      return false;
    };

    const result = await createService(3, abortingWait).process(descriptor());

    expect(result).toMatchObject({ outcome: 'cancelled', attempts: 1 });
    expect(await fs.pathExists(layout.failureLogPath)).toBe(false);
  });
});
