export * from './types.js';
export { STATUS_CODES, STATE_LABELS, mapStatusCode } from './status-codes.js';
export type { StatusCodeInfo } from './status-codes.js';
export { BOROUGHS, resolveBorough } from './boroughs.js';
export {
  SnowwatchError,
  DataUnavailableError,
  UpstreamUnavailableError,
  InvalidConfigError,
  isTimeoutError,
  errorMessage,
} from './errors.js';
export { createLogger } from './logger.js';
export type { Logger } from './logger.js';
