export class SnowwatchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SnowwatchError';
  }
}

/**
 * The geobase could not be downloaded or parsed and no usable copy exists.
 */
export class DataUnavailableError extends SnowwatchError {
  readonly statusCode?: number;
  readonly isTimeout: boolean;

  constructor(message: string, statusCode?: number, isTimeout = false, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DataUnavailableError';
    this.statusCode = statusCode;
    this.isTimeout = isTimeout;
  }
}

/**
 * The scheduling API was unreachable, timed out or answered with an error status.
 */
export class UpstreamUnavailableError extends SnowwatchError {
  readonly statusCode?: number;
  readonly isTimeout: boolean;

  constructor(message: string, statusCode?: number, isTimeout = false, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UpstreamUnavailableError';
    this.statusCode = statusCode;
    this.isTimeout = isTimeout;
  }
}

export class InvalidConfigError extends SnowwatchError {
  readonly key: string;

  constructor(message: string, key: string) {
    super(message);
    this.name = 'InvalidConfigError';
    this.key = key;
  }
}

export function isTimeoutError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
