/**
 * Migrator Module
 * Fetches and uploads every loaded record, collecting one outcome per record
 */

import {
  BatchCoordinator,
  ImageFetcher,
  RetryingUploader,
} from "../utils";
import type { ProgressCallback, Sleep } from "../utils";
import type { MigrationContext } from "../types";

export interface MigrateDependencies {
  fetch?: typeof fetch;
  sleep?: Sleep;
  onProgress?: ProgressCallback;
}

/**
 * Writes to context:
 * - results: one outcome per record, in source order
 */
export async function migrate(
  ctx: MigrationContext,
  deps: MigrateDependencies = {},
): Promise<void> {
  if (!ctx.records) {
    throw new Error("Loader must run before migrator");
  }

  const { config, logger, tracker, records } = ctx;

  if (!config.upload.url) {
    throw new Error("Upload URL is not configured (set UPLOAD_URL)");
  }
  if (!config.upload.apiKey) {
    throw new Error("API key is not configured (set API_KEY)");
  }

  const fetcher = new ImageFetcher({
    ...config.images,
    logger,
    fetch: deps.fetch,
  });
  // Failing to create the images directory is fatal for the whole run
  await fetcher.prepare();

  const uploader = new RetryingUploader({
    url: config.upload.url,
    apiKey: config.upload.apiKey,
    timeout: config.upload.timeout,
    backoffBase: config.upload.backoffBase,
    logger,
    fetch: deps.fetch,
    sleep: deps.sleep,
  });

  const coordinator = new BatchCoordinator({
    fetcher,
    uploader,
    logger,
    concurrency: config.batch.concurrency,
    maxAttempts: config.upload.maxAttempts,
    tenantId: config.upload.tenantId,
  });

  logger.info(
    `Starting migration of ${records.length} records (concurrency ${config.batch.concurrency})`,
  );
  const { entries } = await coordinator.run(records, deps.onProgress);

  for (const { record, outcome } of entries) {
    tracker.recordOutcome(record.url, outcome);
  }

  ctx.results = entries;
  logger.info(`Total records processed: ${entries.length}`);
}
