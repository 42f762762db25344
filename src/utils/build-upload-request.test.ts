import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { buildUploadRequest, readPayload } from "./build-upload-request";
import { toMediaRecord } from "./records";

const record = toMediaRecord({
  ProductId: 1,
  MediaId: 9,
  URL: "http://x/a.png",
  Order: 0,
  MediaResourceId: "r1",
  ContentType: "image/png",
});

const bytes = Buffer.from([0x89, 0x50, 0x4e, 0x47]);
const timestamp = new Date("2024-05-01T12:00:00.000Z");

describe("buildUploadRequest", () => {
  it("builds the metadata fields as text", () => {
    const request = buildUploadRequest(
      record,
      { filename: "1_9_a.png", bytes },
      timestamp,
    );

    expect(request.fields).toEqual({
      TenantId: "2",
      EntityType: "product",
      EntityId: "1",
      MediaResourceId: "r1",
      Order: "0",
      InternalCode: "1",
      MediaType: "image",
      Date: "2024-05-01T12:00:00.000Z",
    });
    expect(request.filename).toBe("1_9_a.png");
    expect(request.contentType).toBe("image/png");
  });

  it("puts the file part first, then the fields in order", () => {
    const request = buildUploadRequest(
      record,
      { filename: "1_9_a.png", bytes },
      timestamp,
    );

    expect([...request.form.keys()]).toEqual([
      "FormFile",
      "TenantId",
      "EntityType",
      "EntityId",
      "MediaResourceId",
      "Order",
      "InternalCode",
      "MediaType",
      "Date",
    ]);
    expect(request.form.get("Date")).toBe("2024-05-01T12:00:00.000Z");
  });

  it("attaches the bytes under the derived filename", async () => {
    const request = buildUploadRequest(
      record,
      { filename: "1_9_a.png", bytes },
      timestamp,
    );

    const file = request.form.get("FormFile");
    if (file === null || typeof file === "string") {
      throw new Error("FormFile is not a file part");
    }
    expect(file.name).toBe("1_9_a.png");
    expect(file.type).toBe("image/png");
    expect(Buffer.from(await file.arrayBuffer())).toEqual(bytes);
  });

  it("uses the record's content type, not the bytes' actual type", () => {
    const jpegBytes = Buffer.from([0xff, 0xd8, 0xff, 0xe0]);
    const request = buildUploadRequest(
      record,
      { filename: "1_9_a.png", bytes: jpegBytes },
      timestamp,
    );

    const file = request.form.get("FormFile");
    if (file === null || typeof file === "string") {
      throw new Error("FormFile is not a file part");
    }
    expect(file.type).toBe("image/png");
  });

  it("changes only the Date field when re-stamped", () => {
    const first = buildUploadRequest(record, { filename: "f", bytes }, timestamp);
    const second = buildUploadRequest(
      record,
      { filename: "f", bytes },
      new Date("2024-05-01T12:00:01.000Z"),
    );

    expect(second.fields.Date).toBe("2024-05-01T12:00:01.000Z");
    expect({ ...second.fields, Date: first.fields.Date }).toEqual(first.fields);
  });

  it("accepts a tenant id override", () => {
    const request = buildUploadRequest(
      record,
      { filename: "f", bytes },
      timestamp,
      "7",
    );
    expect(request.fields.TenantId).toBe("7");
  });
});

describe("readPayload", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "media-migrator-payload-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("returns in-memory bytes as they are", async () => {
    const result = await readPayload({
      filename: "f",
      contentType: "image/png",
      source: { kind: "memory", bytes },
    });
    expect(result).toBe(bytes);
  });

  it("reads file payloads fresh on every call", async () => {
    const path = join(dir, "1_9_a.png");
    await writeFile(path, "first");
    const payload = {
      filename: "1_9_a.png",
      contentType: "image/png",
      source: { kind: "file" as const, path },
    };

    expect((await readPayload(payload)).toString()).toBe("first");
    await writeFile(path, "second");
    expect((await readPayload(payload)).toString()).toBe("second");
  });
});
