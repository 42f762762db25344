/**
 * Logger Utility
 * Leveled, timestamped output to console and an append-only log file
 */

import { createWriteStream, type WriteStream } from "node:fs";
import { describeError } from "./errors";
import type { LogLevel } from "../types";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogSink = (level: LogLevel, line: string) => void;

export const consoleSink: LogSink = (level, line) => {
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
};

export class Logger {
  private streams: WriteStream[] = [];

  constructor(
    private level: LogLevel = "info",
    private sinks: LogSink[] = [consoleSink],
  ) {}

  /**
   * Logger that appends to `file` and, when `echo` is set, also to the console.
   * If the file cannot be opened or written, logging continues on the console.
   */
  static toFile(level: LogLevel, file: string, echo = false): Logger {
    const stream = createWriteStream(file, { flags: "a" });
    const fileSink: LogSink = (_level, line) => {
      stream.write(`${line}\n`);
    };
    const logger = new Logger(level, echo ? [fileSink, consoleSink] : [fileSink]);
    logger.streams.push(stream);

    stream.on("error", (error) => {
      if (!logger.sinks.includes(fileSink)) return;
      logger.sinks = logger.sinks.filter((sink) => sink !== fileSink);
      if (!logger.sinks.includes(consoleSink)) {
        logger.sinks.push(consoleSink);
      }
      logger.warn(
        `Cannot write log file ${file}: ${describeError(error)}; logging to console`,
      );
    });
    return logger;
  }

  debug(message: string): void {
    this.write("debug", message);
  }

  info(message: string): void {
    this.write("info", message);
  }

  warn(message: string): void {
    this.write("warn", message);
  }

  error(message: string, error?: unknown): void {
    if (error === undefined) {
      this.write("error", message);
      return;
    }
    const detail =
      error instanceof Error ? (error.stack ?? error.message) : String(error);
    this.write("error", `${message}\n${detail}`);
  }

  /**
   * Flush and close any log files
   */
  async close(): Promise<void> {
    const streams = this.streams;
    this.streams = [];
    await Promise.all(
      streams.map(
        (stream) =>
          new Promise<void>((resolve) => {
            if (stream.closed) {
              resolve();
              return;
            }
            stream.once("close", () => resolve());
            stream.end();
          }),
      ),
    );
  }

  private write(level: LogLevel, message: string): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;
    const line = `${new Date().toISOString()} - ${level.toUpperCase()} - ${message}`;
    for (const sink of this.sinks) {
      sink(level, line);
    }
  }
}
