import { readFile } from "fs/promises";
import type { FetchedPayload, MediaRecord, UploadRequest } from "../types";

export const DEFAULT_TENANT_ID = "2";

export interface UploadFile {
  filename: string;
  bytes: Buffer;
}

/**
 * Read a fetched payload's bytes. File payloads are read fresh on every call.
 */
export async function readPayload(payload: FetchedPayload): Promise<Buffer> {
  const { source } = payload;
  return source.kind === "file" ? readFile(source.path) : source.bytes;
}

/**
 * Assemble the multipart upload for one record
 *
 * The file part's content type is the record's declared ContentType, never
 * sniffed from the bytes. `attemptTimestamp` becomes the Date field.
 */
export function buildUploadRequest(
  record: MediaRecord,
  file: UploadFile,
  attemptTimestamp: Date,
  tenantId: string = DEFAULT_TENANT_ID,
): UploadRequest {
  const fields: Record<string, string> = {
    TenantId: String(tenantId),
    EntityType: "product",
    EntityId: String(record.productId),
    MediaResourceId: String(record.mediaResourceId),
    Order: String(record.order),
    InternalCode: String(record.productId),
    MediaType: "image",
    Date: attemptTimestamp.toISOString(),
  };

  const form = new FormData();
  form.append(
    "FormFile",
    new Blob([file.bytes], { type: record.contentType }),
    file.filename,
  );
  for (const [key, value] of Object.entries(fields)) {
    form.append(key, value);
  }

  return {
    form,
    fields,
    filename: file.filename,
    contentType: record.contentType,
  };
}
