/**
 * Batch Coordinator
 * Runs the fetch → build → upload pipeline for every record on a bounded
 * queue and joins on all of them. One record's failure never reaches its
 * siblings; results come back in input order, not completion order.
 */

import PQueue from "p-queue";
import { buildUploadRequest, readPayload } from "./build-upload-request";
import { describeError } from "./errors";
import { recordKey, recordLabel } from "./records";
import type { Logger } from "./logger";
import type {
  FetchFailure,
  FetchResult,
  MediaRecord,
  Outcome,
  RecordId,
  RecordKey,
  RecordOutcome,
  UploadRequestFactory,
  UploadResult,
} from "../types";

export interface MediaFetcher {
  fetch(url: string, productId: RecordId, mediaId: RecordId): Promise<FetchResult>;
}

export interface MediaUploader {
  upload(
    factory: UploadRequestFactory,
    maxAttempts?: number,
    label?: string,
  ): Promise<UploadResult>;
}

export interface BatchCoordinatorOptions {
  fetcher: MediaFetcher;
  uploader: MediaUploader;
  logger: Logger;
  concurrency: number;
  maxAttempts: number;
  tenantId: string;
}

export interface BatchResult {
  outcomes: Map<RecordKey, Outcome>;
  entries: RecordOutcome[]; // Input order
}

export type ProgressCallback = (
  entry: RecordOutcome,
  completed: number,
  total: number,
) => void;

function fetchFailureMessage(failure: FetchFailure): string {
  return failure.reason === "bad status"
    ? `bad status: ${failure.code}`
    : `exception: ${failure.detail}`;
}

export class BatchCoordinator {
  constructor(private readonly options: BatchCoordinatorOptions) {}

  async run(
    records: readonly MediaRecord[],
    onProgress?: ProgressCallback,
  ): Promise<BatchResult> {
    const queue = new PQueue({ concurrency: this.options.concurrency });
    const outcomes = new Map<RecordKey, Outcome>();
    const slots: Array<RecordOutcome | undefined> = records.map(() => undefined);
    let completed = 0;

    await Promise.all(
      records.map((record, index) =>
        queue.add(async () => {
          const outcome = await this.process(record);
          const entry = { record, outcome };
          slots[index] = entry;
          outcomes.set(recordKey(record), outcome);
          completed++;
          try {
            onProgress?.(entry, completed, records.length);
          } catch (error) {
            this.options.logger.error("Progress callback failed", error);
          }
        }),
      ),
    );

    const entries = slots.filter(
      (entry): entry is RecordOutcome => entry !== undefined,
    );
    return { outcomes, entries };
  }

  /**
   * Pipeline for a single record. Never throws.
   */
  async process(record: MediaRecord): Promise<Outcome> {
    const { fetcher, uploader, logger, maxAttempts, tenantId } = this.options;
    const label = recordLabel(record);

    logger.info(`Downloading image from URL: ${record.url} for ${label}`);

    let fetched: FetchResult;
    try {
      fetched = await fetcher.fetch(record.url, record.productId, record.mediaId);
    } catch (error) {
      fetched = {
        ok: false,
        failure: { reason: "exception", detail: describeError(error) },
      };
    }

    if (!fetched.ok) {
      return {
        status: "error",
        stage: "fetch",
        message: fetchFailureMessage(fetched.failure),
        attempts: 0,
        cause: fetched.failure,
      };
    }

    const { payload } = fetched;
    const factory: UploadRequestFactory = async (attemptTimestamp) =>
      buildUploadRequest(
        record,
        { filename: payload.filename, bytes: await readPayload(payload) },
        attemptTimestamp,
        tenantId,
      );

    let result: UploadResult;
    try {
      result = await uploader.upload(factory, maxAttempts, label);
    } catch (error) {
      logger.error(`Upload aborted for ${label}`, error);
      return {
        status: "error",
        stage: "upload",
        message: `exception: ${describeError(error)}`,
        attempts: 0,
        cause: { reason: "exception", detail: describeError(error) },
      };
    }

    if (result.ok) {
      return {
        status: "success",
        message: "Uploaded successfully",
        response: result.body,
        attempts: result.attempts,
      };
    }

    return {
      status: "error",
      stage: "upload",
      message: result.reason,
      attempts: result.attempts,
      cause: result.lastFailure,
    };
  }
}
