/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const SourceConfigSchema = z.object({
  // Path to a .sql file; empty means the bundled records.sql
  queryFile: z.string(),
  limit: z.number().int().positive(),
  mediaResourceId: z.string(),
  server: z.string(),
  database: z.string(),
  username: z.string(),
  password: z.string(),
  encrypt: z.boolean(),
  trustServerCertificate: z.boolean(),
});

export const ImagesConfigSchema = z.object({
  directory: z.string(),
  // false keeps fetched bytes in memory and writes nothing
  saveToDisk: z.boolean(),
  timeout: z.number().int().nonnegative(), // In milliseconds, 0 disables
});

export const UploadConfigSchema = z.object({
  url: z.string(),
  apiKey: z.string(),
  tenantId: z.string(),
  maxAttempts: z.number().int().positive(),
  timeout: z.number().int().positive(), // In milliseconds, per attempt
  backoffBase: z.number().int().nonnegative(), // In milliseconds
});

export const BatchConfigSchema = z.object({
  concurrency: z.number().int().positive(),
});

export const ReportConfigSchema = z.object({
  directory: z.string(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
  file: z.string(),
});

export const MigrationConfigSchema = z.object({
  source: SourceConfigSchema,
  images: ImagesConfigSchema,
  upload: UploadConfigSchema,
  batch: BatchConfigSchema,
  report: ReportConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialMigrationConfigSchema = z.object({
  source: SourceConfigSchema.partial().optional(),
  images: ImagesConfigSchema.partial().optional(),
  upload: UploadConfigSchema.partial().optional(),
  batch: BatchConfigSchema.partial().optional(),
  report: ReportConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type SourceConfig = z.infer<typeof SourceConfigSchema>;
export type ImagesConfig = z.infer<typeof ImagesConfigSchema>;
export type UploadConfig = z.infer<typeof UploadConfigSchema>;
export type BatchConfig = z.infer<typeof BatchConfigSchema>;
export type ReportConfig = z.infer<typeof ReportConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type MigrationConfig = z.infer<typeof MigrationConfigSchema>;
export type PartialMigrationConfig = z.infer<
  typeof PartialMigrationConfigSchema
>;

export interface ConfigError {
  path: string;
  error: unknown;
}
