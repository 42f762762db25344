/**
 * Utility exports
 */

// Record utilities
export { toMediaRecord, recordKey, recordLabel } from "./records";
export { deriveFilename, urlBasename } from "./derive-filename";

// Error utilities
export { isAbortError, describeError } from "./errors";

// Upload payloads
export {
  buildUploadRequest,
  readPayload,
  DEFAULT_TENANT_ID,
} from "./build-upload-request";
export type { UploadFile } from "./build-upload-request";

// Timing
export { sleep } from "./sleep";
export type { Sleep } from "./sleep";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
  mergeConfig,
  applyEnvironment,
} from "./load-config";

// Classes
export { ImageFetcher } from "./image-fetcher";
export type { ImageFetcherOptions } from "./image-fetcher";
export {
  RetryingUploader,
  backoffDelay,
  DEFAULT_MAX_ATTEMPTS,
} from "./retrying-uploader";
export type { RetryingUploaderOptions } from "./retrying-uploader";
export { BatchCoordinator } from "./batch-coordinator";
export type {
  BatchCoordinatorOptions,
  BatchResult,
  MediaFetcher,
  MediaUploader,
  ProgressCallback,
} from "./batch-coordinator";
export { JsonRecordSource, SqlRecordSource } from "./record-source";
export type { RecordSource } from "./record-source";
export { ReportWriter, buildCsv } from "./report-writer";
export { Logger, consoleSink } from "./logger";
export type { LogSink } from "./logger";
export { Tracker } from "./tracker";
