/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  withSourceFile,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, loadConfig, parseCorsOrigins, type Config, type CloudinaryConfig } from './config';

// Types
export * from './types';

export { deepFreeze } from './freeze';

// Metrics
export {
  register,
  reportsProcessedCounter,
  extractionDurationHistogram,
  mapImageCounter,
  uploadDurationHistogram,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export {
  validateReportRecord,
  parseExtractRequest,
  type ValidationResult,
  type ParseResult,
} from './schemas';

// Analysis type bundles (registered on import)
export * from './analysis-types';

// Extraction engine
export * from './extraction';
