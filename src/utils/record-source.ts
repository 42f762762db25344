/**
 * Record Sources
 * Where the batch comes from: the product/media query on SQL Server, or a
 * JSON file holding the same rows
 */

import { readFile } from "fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "url";
import sql, { type ConnectionPool } from "mssql";
import { SourceRowsSchema } from "../types";
import type { SourceConfig, SourceRow } from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_QUERY_FILE = join(__dirname, "..", "config", "records.sql");

export interface RecordSource {
  /** Human-readable origin, used in logs and issues */
  readonly description: string;
  load(): Promise<SourceRow[]>;
  close(): Promise<void>;
}

export class SqlRecordSource implements RecordSource {
  private pool: ConnectionPool | null = null;

  constructor(private readonly config: SourceConfig) {}

  get description(): string {
    return `${this.config.server}/${this.config.database}`;
  }

  async load(): Promise<SourceRow[]> {
    const { config } = this;
    const query = await readFile(config.queryFile || DEFAULT_QUERY_FILE, "utf-8");

    this.pool ??= await new sql.ConnectionPool({
      server: config.server,
      database: config.database,
      user: config.username,
      password: config.password,
      options: {
        encrypt: config.encrypt,
        trustServerCertificate: config.trustServerCertificate,
      },
    }).connect();

    const result = await this.pool
      .request()
      .input("limit", sql.Int, config.limit)
      .input("mediaResourceId", sql.NVarChar, config.mediaResourceId)
      .query(query);

    return SourceRowsSchema.parse(result.recordset);
  }

  async close(): Promise<void> {
    const pool = this.pool;
    this.pool = null;
    await pool?.close();
  }
}

export class JsonRecordSource implements RecordSource {
  constructor(private readonly path: string) {}

  get description(): string {
    return this.path;
  }

  async load(): Promise<SourceRow[]> {
    const content = await readFile(this.path, "utf-8");
    return SourceRowsSchema.parse(JSON.parse(content));
  }

  async close(): Promise<void> {}
}
