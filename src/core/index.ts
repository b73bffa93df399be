/**
 * doxygen-md - Core Module Exports
 */

export { resolveConfig, configSchema } from './config';
export { createLogger, silentLogger } from './logger';
export type { LogSink } from './logger';
export {
  DoxygenMdError,
  MalformedInputError,
  ERROR_HINTS,
  createDoxygenMdError,
  isDoxygenMdError,
  getExitCode,
} from './errors';
export type { ErrorCode } from './errors';
