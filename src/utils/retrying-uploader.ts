/**
 * Retrying Uploader
 * POSTs multipart uploads with a per-attempt timeout and exponential backoff
 */

import { describeError, isAbortError } from "./errors";
import { sleep as defaultSleep, type Sleep } from "./sleep";
import type { Logger } from "./logger";
import type {
  UploadAttemptFailure,
  UploadRequestFactory,
  UploadResult,
} from "../types";

export const DEFAULT_MAX_ATTEMPTS = 3;

export interface RetryingUploaderOptions {
  url: string;
  apiKey: string;
  timeout: number; // Per attempt, in milliseconds
  backoffBase: number; // In milliseconds
  logger: Logger;
  fetch?: typeof fetch;
  sleep?: Sleep;
  now?: () => Date;
}

type AttemptResult =
  | { ok: true; status: number; body: string }
  | { ok: false; failure: UploadAttemptFailure };

/**
 * Delay before the attempt following `attempt` (zero-based): base * 2^attempt
 */
export function backoffDelay(attempt: number, base: number): number {
  return base * Math.pow(2, attempt);
}

function describeAttemptFailure(failure: UploadAttemptFailure): string {
  switch (failure.reason) {
    case "bad status":
      return `HTTP ${failure.status}. Response: ${failure.body}`;
    case "timeout":
      return "TimeoutError";
    case "exception":
      return `Exception: ${failure.detail}`;
  }
}

export class RetryingUploader {
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: Sleep;
  private readonly now: () => Date;

  constructor(private readonly options: RetryingUploaderOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Upload with retries. The factory runs once per attempt so every attempt
   * carries its own timestamp and freshly read bytes. Every non-200 outcome
   * is retried the same way, 4xx included.
   *
   * @param label - identifies the record in log lines
   */
  async upload(
    factory: UploadRequestFactory,
    maxAttempts: number = DEFAULT_MAX_ATTEMPTS,
    label: string = "upload",
  ): Promise<UploadResult> {
    const { logger, backoffBase } = this.options;
    let lastFailure: UploadAttemptFailure | undefined;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      const result = await this.attempt(factory);

      if (result.ok) {
        logger.info(`Upload successful for ${label}`);
        return { ...result, attempts: attempt + 1 };
      }

      lastFailure = result.failure;
      logger.error(
        `Upload failed (Attempt ${attempt + 1}/${maxAttempts}) for ${label}. ${describeAttemptFailure(result.failure)}`,
      );

      if (attempt < maxAttempts - 1) {
        await this.sleep(backoffDelay(attempt, backoffBase));
      }
    }

    return {
      ok: false,
      reason: "max retries reached",
      attempts: maxAttempts,
      lastFailure,
    };
  }

  private async attempt(factory: UploadRequestFactory): Promise<AttemptResult> {
    const { url, apiKey, timeout } = this.options;
    let timeoutId: NodeJS.Timeout | null = null;

    try {
      const request = await factory(this.now());

      const controller = new AbortController();
      timeoutId = setTimeout(() => controller.abort(), timeout);

      const response = await this.fetchImpl(url, {
        method: "POST",
        headers: {
          Accept: "application/json",
          "api-key": apiKey,
        },
        body: request.form,
        signal: controller.signal,
      });
      const body = await response.text();

      if (response.status === 200) {
        return { ok: true, status: response.status, body };
      }
      return {
        ok: false,
        failure: { reason: "bad status", status: response.status, body },
      };
    } catch (error) {
      if (isAbortError(error)) {
        return { ok: false, failure: { reason: "timeout" } };
      }
      return {
        ok: false,
        failure: { reason: "exception", detail: describeError(error) },
      };
    } finally {
      if (timeoutId) clearTimeout(timeoutId);
    }
  }
}
