/**
 * Migration Tracker
 * Unified tracking for stats and issues
 */

import { ZodError } from "zod";
import type {
  FailureOutcome,
  Issue,
  IssueType,
  FetchIssueReason,
  Outcome,
  ResourceIssueReason,
  ProcessingStats,
} from "../types";

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues
        .map((e) => (e.path.length ? `${e.path.join(".")}: ${e.message}` : e.message))
        .join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  if (error instanceof Error) {
    return {
      reason: "read-error",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: String(error),
  };
}

function mapFetchFailure(outcome: FailureOutcome): IssueInfo<FetchIssueReason> {
  const cause = outcome.cause;
  if (cause?.reason === "bad status") {
    return { reason: "bad-status", details: outcome.message };
  }
  if (cause?.reason === "exception" && cause.timedOut) {
    return { reason: "timeout", details: outcome.message };
  }
  return { reason: "download-failed", details: outcome.message };
}

function describeUploadFailure(outcome: FailureOutcome): string {
  const cause = outcome.cause;
  switch (cause?.reason) {
    case "bad status":
      return `${outcome.message} (last: HTTP ${cause.status})`;
    case "timeout":
      return `${outcome.message} (last: timeout)`;
    case "exception":
      return `${outcome.message} (last: ${cause.detail})`;
    default:
      return outcome.message;
  }
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalRecords = 0;
  private uploadedRecords = 0;
  private fetchFailures = 0;
  private uploadFailures = 0;
  private uploadAttempts = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalRecords(count: number): void {
    this.totalRecords = count;
  }

  /**
   * Count a record's terminal outcome, tracking an issue for failures
   */
  recordOutcome(path: string, outcome: Outcome): void {
    this.uploadAttempts += outcome.attempts;

    if (outcome.status === "success") {
      this.uploadedRecords++;
      return;
    }

    if (outcome.stage === "fetch") {
      this.fetchFailures++;
      this.issues.push({ type: "fetch", path, ...mapFetchFailure(outcome) });
      return;
    }

    this.uploadFailures++;
    this.issues.push({
      type: "upload",
      path,
      reason: "max-retries",
      details: describeUploadFailure(outcome),
    });
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  /**
   * Track a resource issue (config or record file), detecting the reason
   * from the error type
   */
  trackError(path: string, error: unknown): void {
    const { reason, details } = mapResourceError(error);
    this.issues.push({ type: "resource", path, reason, details });
  }

  getIssues(): Issue[] {
    return this.issues;
  }

  getIssuesOfType<T extends IssueType>(type: T): Extract<Issue, { type: T }>[] {
    return this.issues.filter(
      (i): i is Extract<Issue, { type: T }> => i.type === type,
    );
  }

  // ============================================================================
  // Results
  // ============================================================================

  /**
   * Get final processing statistics
   */
  getStats(): ProcessingStats {
    const endTime = new Date();
    const duration = endTime.getTime() - this.startTime.getTime();

    return {
      totalRecords: this.totalRecords,
      uploadedRecords: this.uploadedRecords,
      fetchFailures: this.fetchFailures,
      uploadFailures: this.uploadFailures,
      uploadAttempts: this.uploadAttempts,
      issues: this.issues,
      duration,
    };
  }
}
