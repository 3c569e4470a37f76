/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  setContextStage,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config, type StateBackend, type RecordBackend } from './config';

// Types
export * from './types';

// Errors
export {
  PipelineError,
  TransientFetchError,
  PermanentFetchError,
  ExtractionError,
  TransientExtractionError,
  ValidationError,
  StorageError,
  InFlightError,
  StateConflictError,
  CancelledError,
  isRetryable,
  isFatal,
  toErrorInfo,
  throwIfAborted,
  type PipelineErrorCode,
  type ErrorInfo,
} from './errors';

// Retry
export {
  createRetryPolicy,
  computeBackoffDelay,
  withRetry,
  sleep,
  type RetryPolicy,
  type RetryOptions,
} from './retry';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type DecisionAvailableJob,
  decisionJobId,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  checkBackpressure,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  queueDepthGauge,
  queueMetricsGauge,
  identifiersProcessedCounter,
  stageDurationHistogram,
  fetchAttemptsCounter,
  extractionMethodCounter,
  ocrRequestDurationHistogram,
  recordCompletenessCounter,
  contentStoreWritesCounter,
  backpressureRejectionsCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  dbQueryDurationHistogram,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export {
  validateStructuredRecord,
  validateMetadataEnvelope,
  type ValidationResult,
} from './schemas';
