import path from 'node:path';
import fs from 'fs-extra';
import StreamZip from 'node-stream-zip';
import { siblingTempPath } from '../utils/files.js';
import { describeError } from '../shared/errors.js';
import log from '../logger.js';

const ZIP_MAGIC = Buffer.from([0x50, 0x4b, 0x03, 0x04]);
const MAIN_ENTRY_RE = /-main\.(jpe?g|png|mp4|mov)$/i;

export type UnwrapResult =
  | { status: 'not-archive' }
  | { status: 'extracted'; entryName: string }
  | { status: 'kept'; reason: string };

/** Checks the local-file header signature, not the extension. */
export const isZipArchive = async (filePath: string): Promise<boolean> => {
  const fd = await fs.promises.open(filePath, 'r');
  try {
    const header = Buffer.alloc(ZIP_MAGIC.length);
    const { bytesRead } = await fd.read(header, 0, header.length, 0);
    return bytesRead === ZIP_MAGIC.length && header.equals(ZIP_MAGIC);
  } finally {
    await fd.close();
  }
};

/**
 * Some payloads arrive as a ZIP holding the media plus caption overlays.
 * Only the `-main` entry is kept; it replaces the archive in place.
 */
export class ArchiveService {
  async unwrapIfArchive(filePath: string): Promise<UnwrapResult> {
    const staging = siblingTempPath(filePath);
    try {
      if (!(await isZipArchive(filePath))) {
        return { status: 'not-archive' };
      }
      const entryName = await this.extractMainEntry(filePath, staging);
      await fs.move(staging, filePath, { overwrite: true });
      return { status: 'extracted', entryName };
    } catch (error) {
      const reason = describeError(error);
      log.warn('Could not extract archive %s, keeping it as downloaded: %s', path.basename(filePath), reason);
      return { status: 'kept', reason };
    } finally {
      await fs.remove(staging);
    }
  }

  private async extractMainEntry(archivePath: string, destination: string): Promise<string> {
    const zip = new StreamZip.async({ file: archivePath });
    try {
      const entries = Object.values(await zip.entries());
      const main = entries.find((entry) => !entry.isDirectory && MAIN_ENTRY_RE.test(entry.name));
      if (!main) {
        throw new Error(`no -main entry among ${entries.length} archive entries`);
      }
      if (main.size === 0) {
        throw new Error(`archive entry ${main.name} is empty`);
      }
      await zip.extract(main.name, destination);
      return main.name;
    } finally {
      await zip.close();
    }
  }
}
