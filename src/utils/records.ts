import type { MediaRecord, RecordKey, SourceRow } from "../types";

export function toMediaRecord(row: SourceRow): MediaRecord {
  return {
    productId: row.ProductId,
    mediaId: row.MediaId,
    mediaResourceId: row.MediaResourceId,
    order: row.Order,
    url: row.URL,
    contentType: row.ContentType,
    row,
  };
}

export function recordKey(record: MediaRecord): RecordKey {
  return `${record.productId}:${record.mediaId}:${record.mediaResourceId}`;
}

export function recordLabel(record: MediaRecord): string {
  return `Product ID: ${record.productId}, Media ID: ${record.mediaId}`;
}
