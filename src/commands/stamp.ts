import fs from 'fs-extra';
import path from 'node:path';
import ora from 'ora';
import { MetadataService } from '../services/metadata-service.js';
import { printError, printHeader, printKeyValue, printRule, printWarning } from '../lib/output.js';

export interface StampCommandOptions {
  force?: boolean;
  verbose?: boolean;
}

/** Returns the process exit code. */
export async function stampCommand(directory: string, options: StampCommandOptions): Promise<number> {
  if (!(await fs.pathExists(directory))) {
    printError(`Directory not found: ${directory}`);
    return 1;
  }
  if (!(await fs.stat(directory)).isDirectory()) {
    printError(`Not a directory: ${directory}`);
    return 1;
  }

  const service = new MetadataService();
  const spinner = ora(`Scanning ${path.resolve(directory)}`).start();
  let seen = 0;
  const stats = await service.run(directory, { force: Boolean(options.force) }, ({ filePath, outcome, reason }) => {
    seen += 1;
    spinner.text = `Setting metadata ${seen} (${path.basename(filePath)})`;
    if (outcome === 'failed') {
      spinner.clear();
      printError(`Failed: ${path.basename(filePath)} - ${reason ?? 'unknown error'}`);
    } else if (outcome === 'skipped' && options.verbose && reason) {
      spinner.clear();
      printWarning(`Skipped: ${reason}`);
    }
  });
  spinner.stop();

  if (stats.total === 0) {
    printWarning('No media files found!');
    return 0;
  }

  printHeader('METADATA SETTING COMPLETE');
  printKeyValue('Total files', stats.total);
  printKeyValue('Successfully processed', stats.processed);
  printKeyValue('Skipped', stats.skipped);
  printKeyValue('Failed', stats.failed);
  printRule();
  return 0;
}
