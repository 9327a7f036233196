import archiver from 'archiver';

/** Builds a ZIP archive in memory. */
export const buildZip = async (files: Record<string, string | Buffer>): Promise<Buffer> => {
  const archive = archiver('zip');
  const chunks: Buffer[] = [];
  const done = new Promise<void>((resolve, reject) => {
    archive.on('end', () => resolve());
    archive.on('error', (error) => reject(error));
  });
  archive.on('data', (chunk: Buffer) => chunks.push(chunk));
  for (const [name, content] of Object.entries(files)) {
    archive.append(content, { name });
  }
  await archive.finalize();
  await done;
  return Buffer.concat(chunks);
};
