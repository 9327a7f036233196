import path from 'node:path';
import crypto from 'node:crypto';
import type { OutputLayout } from '../config/app-paths.js';
import type { KeySource, LocalTarget, MediaKind, MemoryDescriptor } from '../shared/types/memory-entry.js';
import { UNKNOWN_DATE, toFilenameStamp } from './date.js';

const UNIQUE_PART_LENGTH = 16;

const EXTENSIONS: Record<MediaKind, string> = {
  video: 'mp4',
  image: 'jpg',
  unknown: 'bin'
};

export const extractKey = (locator: string): string | undefined => {
  let url: URL;
  try {
    url = new URL(locator);
  } catch {
    return undefined;
  }
  const sid = url.searchParams.get('sid');
  return sid ? sid : undefined;
};

export const fingerprint = (locator: string): string =>
  crypto.createHash('sha256').update(locator, 'utf8').digest('hex').slice(0, UNIQUE_PART_LENGTH);

export const resolveKey = (locator: string): { key: string; source: KeySource } => {
  const sid = extractKey(locator);
  if (sid) {
    return { key: sid, source: 'sid' };
  }
  return { key: fingerprint(locator), source: 'fingerprint' };
};

export const buildOutputName = (timestamp: string, key: string, mediaKind: MediaKind): string => {
  const stamp = toFilenameStamp(timestamp) ?? UNKNOWN_DATE;
  return `${stamp}_${key.slice(0, UNIQUE_PART_LENGTH)}.${EXTENSIONS[mediaKind]}`;
};

export const deriveTarget = (descriptor: MemoryDescriptor, layout: OutputLayout): LocalTarget => {
  const { key, source } = resolveKey(descriptor.locator);
  const filename = buildOutputName(descriptor.timestamp, key, descriptor.mediaKind);
  const directory = descriptor.mediaKind === 'video' ? layout.videosDir : layout.imagesDir;
  return {
    key,
    keySource: source,
    filename,
    directory,
    path: path.join(directory, filename)
  };
};
