/**
 * Migration context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { MigrationConfig } from "./config";
import type { MediaRecord } from "./records";
import type { RecordOutcome } from "./outcome";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";
import type { RecordSource } from "../utils/record-source";

export interface MigrationContext {
  // Input - provided at initialization
  config: MigrationConfig;
  source: RecordSource;
  logger: Logger;

  // Unified tracking for stats and issues
  tracker: Tracker;

  verbose?: boolean;

  records?: MediaRecord[]; // Loaded from the source, in source order
  results?: RecordOutcome[]; // One per record, in source order
  reportPath?: string; // JSON report written by the report module
}
