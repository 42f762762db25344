/**
 * Tracker types - stats and issues collected during a migration run
 */

// Type-safe reasons for each issue type
export type FetchIssueReason = "bad-status" | "timeout" | "download-failed";
export type UploadIssueReason = "max-retries";
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";

// Discriminated union - each type has its own subset of reasons
export interface FetchIssue {
  type: "fetch";
  path: string;
  reason: FetchIssueReason;
  details?: string;
}

export interface UploadIssue {
  type: "upload";
  path: string;
  reason: UploadIssueReason;
  details?: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export type Issue = FetchIssue | UploadIssue | ResourceIssue;
export type IssueType = Issue["type"];

export interface ProcessingStats {
  // Record counts
  totalRecords: number;
  uploadedRecords: number;
  fetchFailures: number;
  uploadFailures: number;

  // Upload attempts across all records, retries included
  uploadAttempts: number;

  // All issues
  issues: Issue[];

  // Timing
  duration: number;
}
