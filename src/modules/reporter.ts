/**
 * Reporter Module
 * Hands every record and its outcome, in source order, to the report writer
 */

import { ReportWriter } from "../utils";
import type { MigrationContext } from "../types";

export async function report(ctx: MigrationContext): Promise<void> {
  if (!ctx.results) {
    throw new Error("Migrator must run before reporter");
  }

  const { config, tracker, logger } = ctx;
  const { issues: _issues, ...summary } = tracker.getStats();

  const writer = new ReportWriter(config.report.directory);
  const files = await writer.write(ctx.results, summary);

  ctx.reportPath = files.json;
  logger.info(`Results saved in ${files.csv} and ${files.json}`);
}
