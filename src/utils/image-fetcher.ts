/**
 * Image Fetcher
 * Single-attempt image download, stored under the images directory or kept
 * in memory. Fetch failures are terminal for the record.
 */

import { createWriteStream } from "node:fs";
import { mkdir, rm } from "fs/promises";
import { join } from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { deriveFilename } from "./derive-filename";
import { describeError, isAbortError } from "./errors";
import type { Logger } from "./logger";
import type {
  FetchResult,
  PayloadSource,
  RecordId,
} from "../types";

export interface ImageFetcherOptions {
  directory: string;
  saveToDisk: boolean;
  timeout: number; // In milliseconds, 0 disables
  logger: Logger;
  fetch?: typeof fetch;
}

export class ImageFetcher {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: ImageFetcherOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * Create the images directory when payloads are written to disk
   */
  async prepare(): Promise<void> {
    if (this.options.saveToDisk) {
      await mkdir(this.options.directory, { recursive: true });
    }
  }

  async fetch(
    url: string,
    productId: RecordId,
    mediaId: RecordId,
  ): Promise<FetchResult> {
    const { logger, timeout } = this.options;
    const filename = deriveFilename(url, productId, mediaId);

    const controller = new AbortController();
    const timeoutId =
      timeout > 0 ? setTimeout(() => controller.abort(), timeout) : null;

    try {
      const response = await this.fetchImpl(url, { signal: controller.signal });

      if (response.status !== 200) {
        await response.body?.cancel();
        logger.error(
          `Failed to download image: ${url}, Status Code: ${response.status}`,
        );
        return {
          ok: false,
          failure: { reason: "bad status", code: response.status },
        };
      }

      const source = await this.store(response, filename);
      const contentType =
        response.headers.get("content-type") ?? "application/octet-stream";

      logger.info(
        source.kind === "file"
          ? `Image downloaded and saved as: ${source.path}`
          : `Image downloaded as: ${filename} (${source.bytes.length} bytes)`,
      );
      return { ok: true, payload: { filename, contentType, source } };
    } catch (error) {
      const timedOut = isAbortError(error);
      const detail = timedOut
        ? `timeout after ${timeout}ms`
        : describeError(error);
      logger.error(`Exception while downloading image ${url}: ${detail}`);
      return {
        ok: false,
        failure: timedOut
          ? { reason: "exception", detail, timedOut: true }
          : { reason: "exception", detail },
      };
    } finally {
      if (timeoutId) clearTimeout(timeoutId);
    }
  }

  private async store(
    response: Response,
    filename: string,
  ): Promise<PayloadSource> {
    if (!this.options.saveToDisk) {
      return { kind: "memory", bytes: Buffer.from(await response.arrayBuffer()) };
    }

    if (!response.body) {
      throw new Error("Response has no body");
    }

    await mkdir(this.options.directory, { recursive: true });
    const path = join(this.options.directory, filename);
    try {
      await pipeline(Readable.fromWeb(response.body), createWriteStream(path));
    } catch (error) {
      // Only complete downloads stay in the images directory
      await rm(path, { force: true });
      throw error;
    }
    return { kind: "file", path };
  }
}
