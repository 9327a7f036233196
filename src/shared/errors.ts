/**
 * The export file is missing or cannot be read. Fatal: nothing is downloaded.
 */
export class ExportReadError extends Error {
  constructor(
    public readonly filePath: string,
    reason: string
  ) {
    super(`Cannot read export ${filePath}: ${reason}`);
    this.name = 'ExportReadError';
  }
}

/**
 * An option or environment value is out of range. Fatal.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * One transfer attempt failed; the executor retries these.
 */
export class TransferError extends Error {
  constructor(
    message: string,
    public readonly url?: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'TransferError';
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  // errors raised by node internals may come from another realm
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
};
