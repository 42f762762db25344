/**
 * Pipeline payloads, failures and per-record outcomes
 */

import type { MediaRecord } from "./records";

// ============================================================================
// Fetch stage
// ============================================================================

export type PayloadSource =
  | { kind: "file"; path: string }
  | { kind: "memory"; bytes: Buffer };

export interface FetchedPayload {
  filename: string;
  contentType: string;
  source: PayloadSource;
}

export type FetchFailure =
  | { reason: "bad status"; code: number }
  | { reason: "exception"; detail: string; timedOut?: true };

export type FetchResult =
  | { ok: true; payload: FetchedPayload }
  | { ok: false; failure: FetchFailure };

// ============================================================================
// Upload stage
// ============================================================================

export interface UploadRequest {
  form: FormData;
  // Text fields as sent, in form order (FormFile excluded)
  fields: Record<string, string>;
  filename: string;
  contentType: string;
}

export type UploadRequestFactory = (
  attemptTimestamp: Date,
) => Promise<UploadRequest>;

export type UploadAttemptFailure =
  | { reason: "bad status"; status: number; body: string }
  | { reason: "timeout" }
  | { reason: "exception"; detail: string };

export type UploadResult =
  | { ok: true; status: number; body: string; attempts: number }
  | {
      ok: false;
      reason: "max retries reached";
      attempts: number;
      lastFailure?: UploadAttemptFailure;
    };

// ============================================================================
// Outcomes
// ============================================================================

export type FailureStage = "fetch" | "upload";

export interface SuccessOutcome {
  status: "success";
  message: "Uploaded successfully";
  response: string;
  attempts: number;
}

export interface FailureOutcome {
  status: "error";
  stage: FailureStage;
  message: string;
  attempts: number;
  // Fetch failure, or the last upload attempt's failure
  cause?: FetchFailure | UploadAttemptFailure;
}

export type Outcome = SuccessOutcome | FailureOutcome;

export interface RecordOutcome {
  record: MediaRecord;
  outcome: Outcome;
}
