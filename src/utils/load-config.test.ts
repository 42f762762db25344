import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ZodError } from "zod";
import {
  applyEnvironment,
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
} from "./load-config";

describe("loadDefaultConfig", () => {
  it("ships the upload protocol defaults", async () => {
    const config = await loadDefaultConfig();

    expect(config.upload).toMatchObject({
      tenantId: "2",
      maxAttempts: 3,
      timeout: 10000,
      backoffBase: 1000,
    });
    expect(config.images.saveToDisk).toBe(true);
    expect(config.batch.concurrency).toBeGreaterThan(0);
  });
});

describe("mergeConfig", () => {
  it("overrides section by section", async () => {
    const base = await loadDefaultConfig();

    const merged = mergeConfig(base, {
      upload: { maxAttempts: 5 },
      batch: { concurrency: 2 },
    });

    expect(merged.upload.maxAttempts).toBe(5);
    expect(merged.upload.timeout).toBe(base.upload.timeout);
    expect(merged.batch.concurrency).toBe(2);
    expect(merged.images).toEqual(base.images);
  });
});

describe("applyEnvironment", () => {
  it("takes secrets and locations from the environment", async () => {
    const base = await loadDefaultConfig();

    const config = applyEnvironment(base, {
      UPLOAD_URL: "http://upload.test/media",
      API_KEY: "test-key",
      DB_SERVER: "db.test",
      DB_DATABASE: "catalog",
      DB_USERNAME: "reader",
      DB_PASSWORD: "test-password",
      IMAGE_DOWNLOAD_PATH: "/tmp/images",
    });

    expect(config.upload.url).toBe("http://upload.test/media");
    expect(config.upload.apiKey).toBe("test-key");
    expect(config.source).toMatchObject({
      server: "db.test",
      database: "catalog",
      username: "reader",
      password: "test-password",
    });
    expect(config.images.directory).toBe("/tmp/images");
  });

  it("ignores unset and empty variables", async () => {
    const base = await loadDefaultConfig();

    const config = applyEnvironment(base, { UPLOAD_URL: "" });

    expect(config).toEqual(base);
  });

  it("rejects an environment that breaks the schema", async () => {
    const base = await loadDefaultConfig();
    const broken = mergeConfig(base, { batch: { concurrency: -1 } });

    expect(() => applyEnvironment(broken, {})).toThrow(ZodError);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "media-migrator-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("merges a custom config file", async () => {
    const custom = join(dir, "custom.json");
    await writeFile(
      custom,
      JSON.stringify({ upload: { maxAttempts: 4 }, report: { directory: "out" } }),
    );

    const { config, errors } = await loadConfig(custom, {});

    expect(errors).toEqual([]);
    expect(config.upload.maxAttempts).toBe(4);
    expect(config.report.directory).toBe("out");
  });

  it("collects errors from an invalid custom config", async () => {
    const custom = join(dir, "custom.json");
    await writeFile(custom, JSON.stringify({ batch: { concurrency: 0 } }));

    const { config, errors } = await loadConfig(custom, {});

    expect(errors).toHaveLength(1);
    expect(errors[0].path).toBe(custom);
    expect(errors[0].error).toBeInstanceOf(ZodError);
    expect(config.batch.concurrency).toBe(
      (await loadDefaultConfig()).batch.concurrency,
    );
  });
});
