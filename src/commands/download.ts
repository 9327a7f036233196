import path from 'node:path';
import readline from 'node:readline/promises';
import ora from 'ora';
import { getEnv } from '../config/env.js';
import { parseRunOptions, needsConfirmation, CONFIRM_WORKERS_ABOVE } from '../config/run-options.js';
import { PipelineRunner } from '../pipeline/pipeline-runner.js';
import { ConfigError, ExportReadError } from '../shared/errors.js';
import type { PipelineOptions, PipelineRunSummary } from '../shared/types/memory-entry.js';
import { printError, printHeader, printInfo, printKeyValue, printRule, printSuccess, printWarning } from '../lib/output.js';

export interface DownloadCommandOptions {
  output: string;
  delay: number;
  maxRetries: number;
  workers: number;
  yes?: boolean;
}

const confirm = async (question: string): Promise<boolean> => {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(question);
    return answer.trim().toLowerCase() === 'y';
  } finally {
    rl.close();
  }
};

const printPlan = (exportPath: string, outputDir: string, options: PipelineOptions): void => {
  printHeader('Memories download');
  printKeyValue('Export', exportPath);
  printKeyValue('Output directory', path.resolve(outputDir));
  printKeyValue('Workers', `${options.concurrency} ${options.concurrency > 1 ? '(parallel)' : '(sequential)'}`);
  printKeyValue('Delay between downloads', `${options.delayMs / 1000}s`);
  printKeyValue('Max retries per file', options.maxRetries);
  console.log();
};

const printSummary = (summary: PipelineRunSummary, options: PipelineOptions): void => {
  const seconds = summary.durationMs / 1000;
  printHeader(summary.interrupted ? 'DOWNLOAD INTERRUPTED' : 'DOWNLOAD COMPLETE');
  printKeyValue('Total memories', summary.total);
  printKeyValue('Successfully downloaded', summary.successful);
  printKeyValue('Already existed (skipped)', summary.skipped);
  printKeyValue('Failed', summary.failed);
  printKeyValue('Duration', `${seconds.toFixed(1)} seconds`);
  if (options.concurrency > 1) {
    const rate = seconds > 0 ? summary.total / seconds : 0;
    printKeyValue('Average rate', `${rate.toFixed(1)} files/second`);
  }
  printKeyValue('Files saved to', path.resolve(summary.outputDir));
  if (summary.failed > 0) {
    printKeyValue('Failed downloads logged to', summary.failureLogPath);
  }
  printRule();
};

/** Returns the process exit code. */
export async function downloadCommand(exportPath: string, raw: DownloadCommandOptions): Promise<number> {
  let options: PipelineOptions;
  try {
    const env = getEnv();
    options = parseRunOptions(
      { delay: raw.delay, maxRetries: raw.maxRetries, workers: raw.workers },
      { backoffBaseMs: env.BACKOFF_BASE_MS, attemptTimeoutMs: env.REQUEST_TIMEOUT_MS }
    );
  } catch (error) {
    if (error instanceof ConfigError) {
      printError(error.message);
      return 1;
    }
    throw error;
  }

  if (needsConfirmation(options) && !raw.yes) {
    printWarning(`Using more than ${CONFIRM_WORKERS_ABOVE} workers may cause rate limiting or connection issues`);
    if (!(await confirm('Continue anyway? (y/n): '))) {
      return 0;
    }
  }

  printPlan(exportPath, raw.output, options);

  const runner = new PipelineRunner();
  const spinner = ora('Parsing export...').start();
  const interrupt = () => {
    spinner.text = 'Stopping after in-flight downloads...';
    runner.cancel();
  };
  process.once('SIGINT', interrupt);
  process.once('SIGTERM', interrupt);

  let current = '';
  try {
    const summary = await runner.run({ exportPath, outputDir: raw.output, options }, (event) => {
      if (event.type === 'phase' && event.phase === 'download') {
        spinner.text = 'Downloading...';
      }
      if (event.type === 'log' && event.message) {
        spinner.info(event.message).start();
      }
      if (event.type === 'entry' && event.entry) {
        current = `${event.entry.mediaKind} - ${event.entry.timestamp.slice(0, 10)}`;
      }
      if (event.type === 'stats' && event.stats) {
        const done = event.stats.successful + event.stats.skipped + event.stats.failed;
        spinner.text = `Downloading ${done}/${event.stats.total} (${current})`;
      }
    });
    spinner.stop();
    printSummary(summary, options);
    if (!summary.interrupted && summary.failed === 0) {
      printSuccess('Every memory in the export is on disk.');
    }
    if (summary.interrupted) {
      printInfo('Download interrupted by user. Progress has been saved. Run the command again to resume.');
    }
    return 0;
  } catch (error) {
    if (error instanceof ExportReadError) {
      spinner.fail(error.message);
      return 1;
    }
    spinner.fail('Download run failed');
    throw error;
  } finally {
    process.removeListener('SIGINT', interrupt);
    process.removeListener('SIGTERM', interrupt);
  }
}
