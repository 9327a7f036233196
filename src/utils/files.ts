import fs from 'fs-extra';
import path from 'node:path';

export const tempPath = (filePath: string): string => `${filePath}.part`;

export const siblingTempPath = (filePath: string): string =>
  path.join(path.dirname(filePath), `temp_${path.basename(filePath)}`);

export const isNonEmptyFile = async (filePath: string): Promise<boolean> => {
  if (!(await fs.pathExists(filePath))) {
    return false;
  }
  const stats = await fs.stat(filePath);
  return stats.isFile() && stats.size > 0;
};

/** Writes JSON next to the destination, then renames it into place. */
export const writeJsonAtomic = async (filePath: string, data: unknown): Promise<void> => {
  const staging = `${filePath}.tmp`;
  await fs.writeJson(staging, data, { spaces: 2 });
  await fs.move(staging, filePath, { overwrite: true });
};
