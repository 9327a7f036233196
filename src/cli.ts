#!/usr/bin/env node
import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { downloadCommand, type DownloadCommandOptions } from './commands/download.js';
import { stampCommand, type StampCommandOptions } from './commands/stamp.js';
import { printError } from './lib/output.js';
import { ConfigError, describeError } from './shared/errors.js';
import log from './logger.js';

const toFloat = (value: string): number => {
  const parsed = Number.parseFloat(value);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
};

const toInt = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
};

const program = new Command();

program
  .name('memories-fetch')
  .description('Download every memory listed in a memories_history.html export, resumably')
  .version('1.0.0');

program
  .command('download', { isDefault: true })
  .description('Download all memories referenced by the export')
  .argument('<export>', 'path to the memories_history.html file')
  .option('-o, --output <dir>', 'output directory for downloaded files', 'downloads')
  .option('-d, --delay <seconds>', 'delay between downloads in seconds', toFloat, 1.0)
  .option('-r, --max-retries <n>', 'maximum attempts per file', toInt, 3)
  .option('-w, --workers <n>', 'number of concurrent download workers', toInt, 1)
  .option('-y, --yes', 'skip the confirmation asked above 10 workers')
  .action(async (exportPath: string, options: DownloadCommandOptions) => {
    process.exitCode = await downloadCommand(exportPath, options);
  });

program
  .command('stamp')
  .description('Write capture dates from filenames into downloaded files')
  .argument('<directory>', 'directory holding the downloaded memories')
  .option('-f, --force', 'overwrite capture dates that are already present')
  .option('-v, --verbose', 'report skipped files')
  .action(async (directory: string, options: StampCommandOptions) => {
    process.exitCode = await stampCommand(directory, options);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof ConfigError) {
    printError(error.message);
  } else {
    log.error(error instanceof Error ? error : { error }, 'Unexpected failure');
    printError(describeError(error));
  }
  process.exitCode = 1;
});
