import fs from 'fs-extra';
import PQueue from 'p-queue';

export const formatFailureRecord = (locator: string, description: string, at: Date): string =>
  `[${at.toISOString()}] ${locator}\nError: ${description}\n\n`;

/** Append-only log of items that exhausted their retries. */
export class FailureLog {
  private readonly writes = new PQueue({ concurrency: 1 });

  constructor(readonly logPath: string) {}

  async append(locator: string, description: string, at: Date = new Date()): Promise<void> {
    await this.writes.add(() => fs.appendFile(this.logPath, formatFailureRecord(locator, description, at), 'utf8'));
  }
}
