/**
 * Migrate command - Loads config and runs the migration pipeline
 */

import ora from "ora";
import { z } from "zod";
import {
  loadConfig,
  Tracker,
  Logger,
  JsonRecordSource,
  SqlRecordSource,
} from "../../utils";
import * as modules from "../../modules";
import type { LoggingConfig, MigrationContext } from "../../types";

const MigrateOptionsSchema = z.object({
  config: z.string().optional(),
  input: z.string().optional(),
  images: z.string().optional(),
  report: z.string().optional(),
  concurrency: z.coerce.number().int().positive().optional(),
  memory: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.input<typeof MigrateOptionsSchema>;

/**
 * Run log: always appended to the log file, echoed to the console with --verbose
 */
export function openRunLog(logging: LoggingConfig, verbose = false): Logger {
  return Logger.toFile(logging.level, logging.file, verbose);
}

export async function migrateCommand(opts: Options): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();
  let logger: Logger | undefined;

  try {
    // Validate CLI options
    const options = MigrateOptionsSchema.parse(opts);

    // Load configuration (default → user → custom → environment)
    const { config, errors } = await loadConfig(options.config);

    // Override with CLI options
    if (options.images) {
      config.images.directory = options.images;
    }
    if (options.report) {
      config.report.directory = options.report;
    }
    if (options.concurrency) {
      config.batch.concurrency = options.concurrency;
    }
    if (options.memory) {
      config.images.saveToDisk = false;
    }

    const tracker = new Tracker();
    for (const err of errors) {
      tracker.trackError(err.path, err.error);
    }

    logger = openRunLog(config.logging, options.verbose);
    logger.info("Starting process...");

    const source = options.input
      ? new JsonRecordSource(options.input)
      : new SqlRecordSource(config.source);

    const ctx: MigrationContext = {
      config,
      source,
      logger,
      tracker,
      verbose: options.verbose,
    };

    spinner.text = "Loading records...";
    await modules.load(ctx);

    spinner.text = "Migrating records...";
    await modules.migrate(ctx, {
      onProgress: (_entry, completed, total) => {
        spinner.text = `Migrating records... ${completed}/${total}`;
      },
    });

    spinner.text = "Writing report...";
    await modules.report(ctx);

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();

    await modules.stats(ctx);

    logger.info("Process completed");
    await logger.close();
  } catch (error) {
    spinner.fail("Migration failed");
    logger?.error("Migration failed", error);
    await logger?.close();
    console.error(error);
    process.exit(1);
  }
}
