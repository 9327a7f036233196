import path from 'node:path';
import fs from 'fs-extra';
import { ExifTool, type WriteTags } from 'exiftool-vendored';
import type { DateTime } from 'luxon';
import type { StampStats } from '../shared/types/pipeline-stats.js';
import { describeError } from '../shared/errors.js';
import { parseFilenameStamp, toExifTimestamp } from '../utils/date.js';
import log from '../logger.js';

const IMAGE_EXTS = ['.jpg', '.jpeg'];
const VIDEO_EXTS = ['.mp4', '.mov'];

export type StampKind = 'image' | 'video';

export type StampOutcome = 'processed' | 'skipped' | 'failed';

export interface TimestampWriter {
  hasCaptureDate(filePath: string): Promise<boolean>;
  write(filePath: string, kind: StampKind, exifTimestamp: string): Promise<void>;
  end(): Promise<void>;
}

export class ExifToolWriter implements TimestampWriter {
  private readonly exif = new ExifTool();

  async hasCaptureDate(filePath: string): Promise<boolean> {
    const tags = await this.exif.read(filePath);
    return tags.DateTimeOriginal !== undefined;
  }

  async write(filePath: string, kind: StampKind, exifTimestamp: string): Promise<void> {
    const tags: WriteTags =
      kind === 'video'
        ? {
            CreateDate: exifTimestamp,
            ModifyDate: exifTimestamp,
            MediaCreateDate: exifTimestamp,
            MediaModifyDate: exifTimestamp,
            TrackCreateDate: exifTimestamp,
            TrackModifyDate: exifTimestamp
          }
        : {
            DateTimeOriginal: exifTimestamp,
            CreateDate: exifTimestamp,
            ModifyDate: exifTimestamp
          };
    // exiftool-vendored passes -overwrite_original by default
    await this.exif.write(filePath, tags);
  }

  async end(): Promise<void> {
    await this.exif.end();
  }
}

export interface StampOptions {
  force: boolean;
}

export type StampProgress = (event: { filePath: string; outcome: StampOutcome; reason?: string }) => void;

export const stampKindFor = (filePath: string): StampKind | undefined => {
  const ext = path.extname(filePath).toLowerCase();
  if (IMAGE_EXTS.includes(ext)) {
    return 'image';
  }
  if (VIDEO_EXTS.includes(ext)) {
    return 'video';
  }
  return undefined;
};

/**
 * Writes the capture date encoded in each filename into the file's tags and
 * aligns its modification time with it.
 */
export class MetadataService {
  constructor(private readonly writer: TimestampWriter = new ExifToolWriter()) {}

  async run(directory: string, options: StampOptions, progress?: StampProgress): Promise<StampStats> {
    const files = await this.findMediaFiles(directory);
    const stats: StampStats = { total: files.length, processed: 0, skipped: 0, failed: 0 };
    try {
      for (const filePath of files) {
        const { outcome, reason } = await this.processFile(filePath, options);
        stats[outcome] += 1;
        progress?.({ filePath, outcome, reason });
      }
    } finally {
      await this.writer.end();
    }
    return stats;
  }

  async findMediaFiles(directory: string): Promise<string[]> {
    const found = [
      ...(await this.listByExtension(path.join(directory, 'images'), IMAGE_EXTS)),
      ...(await this.listByExtension(path.join(directory, 'videos'), VIDEO_EXTS))
    ];
    if (!found.length) {
      found.push(...(await this.listByExtension(directory, [...IMAGE_EXTS, ...VIDEO_EXTS])));
    }
    return found.sort();
  }

  private async processFile(filePath: string, options: StampOptions): Promise<{ outcome: StampOutcome; reason?: string }> {
    const name = path.basename(filePath);
    const capturedAt = parseFilenameStamp(name);
    if (!capturedAt) {
      return { outcome: 'skipped', reason: `Could not parse date from filename: ${name}` };
    }
    const kind = stampKindFor(filePath);
    if (!kind) {
      return { outcome: 'skipped', reason: `Unsupported file type: ${path.extname(name)}` };
    }

    try {
      if (kind === 'image' && !options.force && (await this.writer.hasCaptureDate(filePath))) {
        return { outcome: 'skipped', reason: 'Capture date already present' };
      }
      await this.writer.write(filePath, kind, toExifTimestamp(capturedAt));
      await this.alignFileTimestamp(filePath, capturedAt);
      return { outcome: 'processed' };
    } catch (error) {
      const reason = describeError(error);
      log.error('Metadata write failed for %s: %s', name, reason);
      return { outcome: 'failed', reason };
    }
  }

  private async alignFileTimestamp(filePath: string, capturedAt: DateTime): Promise<void> {
    const mtime = capturedAt.toJSDate();
    await fs.utimes(filePath, mtime, mtime);
  }

  private async listByExtension(directory: string, extensions: string[]): Promise<string[]> {
    if (!(await fs.pathExists(directory))) {
      return [];
    }
    const entries = await fs.readdir(directory, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && extensions.includes(path.extname(entry.name).toLowerCase()))
      .map((entry) => path.join(directory, entry.name));
  }
}
