import { DateTime } from 'luxon';

const EXPORT_FORMAT = 'yyyy-MM-dd HH:mm:ss';
const FILENAME_FORMAT = 'yyyy-MM-dd_HH-mm-ss';
const FILENAME_PREFIX_RE = /^(\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2})/;

export const UNKNOWN_DATE = 'unknown_date';

export const parseExportTimestamp = (raw: string): DateTime | undefined => {
  const normalized = raw.trim().replace(/\s*UTC$/, '');
  const parsed = DateTime.fromFormat(normalized, EXPORT_FORMAT, { zone: 'utc' });
  return parsed.isValid ? parsed : undefined;
};

/** `2021-03-04 05:06:07 UTC` becomes `2021-03-04_05-06-07`. */
export const toFilenameStamp = (raw: string): string | undefined => parseExportTimestamp(raw)?.toFormat(FILENAME_FORMAT);

export const parseFilenameStamp = (filename: string): DateTime | undefined => {
  const match = filename.match(FILENAME_PREFIX_RE);
  if (!match) {
    return undefined;
  }
  const parsed = DateTime.fromFormat(match[1], FILENAME_FORMAT, { zone: 'utc' });
  return parsed.isValid ? parsed : undefined;
};

export const toExifTimestamp = (value: DateTime): string => value.toUTC().toFormat('yyyy:MM:dd HH:mm:ss');
