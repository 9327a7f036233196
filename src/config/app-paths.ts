import path from 'node:path';
import fs from 'fs-extra';

export interface OutputLayout {
  root: string;
  imagesDir: string;
  videosDir: string;
  statePath: string;
  failureLogPath: string;
}

export const resolveOutputLayout = (outputDir: string): OutputLayout => ({
  root: outputDir,
  imagesDir: path.join(outputDir, 'images'),
  videosDir: path.join(outputDir, 'videos'),
  statePath: path.join(outputDir, 'download_state.json'),
  failureLogPath: path.join(outputDir, 'failed_downloads.log')
});

export const ensureOutputLayout = async (layout: OutputLayout): Promise<void> => {
  await fs.ensureDir(layout.root);
  await fs.ensureDir(layout.imagesDir);
  await fs.ensureDir(layout.videosDir);
};
