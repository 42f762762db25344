/**
 * Loader Module
 * Reads the record set from the configured source
 */

import { toMediaRecord } from "../utils";
import type { MigrationContext } from "../types";

/**
 * Writes to context:
 * - records: media records in source order
 */
export async function load(ctx: MigrationContext): Promise<void> {
  const { source, tracker, logger } = ctx;

  logger.info(`Fetching data from ${source.description}...`);
  const rows = await source.load().finally(() => source.close());

  const records = rows.map((row) => toMediaRecord(row));
  ctx.records = records;
  tracker.setTotalRecords(records.length);
  logger.info(`Loaded ${records.length} records`);
}
