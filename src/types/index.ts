/**
 * Central type exports
 */

// Configuration
export type {
  MigrationConfig,
  PartialMigrationConfig,
  SourceConfig,
  ImagesConfig,
  UploadConfig,
  BatchConfig,
  ReportConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export {
  MigrationConfigSchema,
  PartialMigrationConfigSchema,
} from "./config";

// Records
export type {
  SourceRow,
  SourceColumn,
  RecordId,
  RecordKey,
  MediaRecord,
} from "./records";
export {
  SourceRowSchema,
  SourceRowsSchema,
  SOURCE_COLUMNS,
} from "./records";

// Pipeline payloads and outcomes
export type {
  PayloadSource,
  FetchedPayload,
  FetchFailure,
  FetchResult,
  UploadRequest,
  UploadRequestFactory,
  UploadAttemptFailure,
  UploadResult,
  FailureStage,
  SuccessOutcome,
  FailureOutcome,
  Outcome,
  RecordOutcome,
} from "./outcome";

// Tracker
export type {
  Issue,
  IssueType,
  FetchIssue,
  UploadIssue,
  ResourceIssue,
  FetchIssueReason,
  UploadIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "./tracker";

// Context
export type { MigrationContext } from "./context";
export type { Tracker } from "../utils/tracker";
