import fs from 'fs-extra';
import * as cheerio from 'cheerio';
import type { MediaKind, MemoryDescriptor } from '../shared/types/memory-entry.js';
import { ExportReadError, describeError } from '../shared/errors.js';

const DOWNLOAD_RE = /downloadMemories\('(.+?)',\s*this,\s*(true|false)\)/;
const MIN_CELLS = 4;

export const toMediaKind = (label: string): MediaKind => {
  const normalized = label.trim().toLowerCase();
  if (normalized === 'video') {
    return 'video';
  }
  if (normalized === 'image') {
    return 'image';
  }
  return 'unknown';
};

export class IndexParser {
  async parse(filePath: string): Promise<MemoryDescriptor[]> {
    let html: string;
    try {
      html = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      throw new ExportReadError(filePath, describeError(error));
    }
    return this.parseHtml(html);
  }

  parseHtml(html: string): MemoryDescriptor[] {
    const $ = cheerio.load(html);
    const entries: MemoryDescriptor[] = [];

    $('tr').each((_rowIdx, row) => {
      const cells = $(row).find('td');
      if (cells.length < MIN_CELLS) {
        return;
      }
      const onclick = $(cells[3]).find('[onclick]').first().attr('onclick') ?? '';
      const match = onclick.match(DOWNLOAD_RE);
      if (!match) {
        return;
      }

      entries.push({
        index: entries.length,
        locator: match[1],
        timestamp: $(cells[0]).text().trim(),
        mediaKind: toMediaKind($(cells[1]).text()),
        // true marks a plain GET; false routes through the POST proxy
        transferMode: match[2] === 'true' ? 'direct' : 'indirect'
      });
    });

    return entries;
  }
}
