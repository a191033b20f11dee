/**
 * services/index.ts
 * Barrel export for the utility services.
 */

export { MetadataValidator, ValidationError, templateVariables } from './metadata-validator.js';
export { MetadataExporter } from './metadata-exporter.js';
export {
  ConsoleLogger,
  DEFAULT_LOG_PREFIX,
  FileLogger,
  SilentLogger,
  TeeLogger,
  formatLogLine,
  isLogLevel,
} from './logger.js';
export type { Logger, LogLevel } from './logger.js';
