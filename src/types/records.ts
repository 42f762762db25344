/**
 * Source rows and the media records built from them
 */

import { z } from "zod";

const IdSchema = z.union([z.number().int(), z.string().min(1)]);
const CellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
// Integers, or integer text from JSON exports; NULL is not an order
const OrderSchema = z.union([
  z.number().int(),
  z.string().regex(/^-?\d+$/).transform(Number),
]);

/**
 * One row of the product/media query. Only the identity, ordering, URL and
 * content type columns are required; the rest are carried into the report.
 */
export const SourceRowSchema = z.object({
  ProductId: IdSchema,
  sku: CellSchema.optional(),
  SystemCode: CellSchema.optional(),
  LinkId: CellSchema.optional(),
  Order: OrderSchema,
  MediaId: IdSchema,
  URL: z.string(),
  ParentId: CellSchema.optional(),
  ImageType: CellSchema.optional(),
  MediaResourceId: z.string(),
  CompanyId: CellSchema.optional(),
  FileUrlBase64: CellSchema.optional(),
  ContentType: z.string(),
  productstatus: CellSchema.optional(),
  linkproductmediastatus: CellSchema.optional(),
  mediastatus: CellSchema.optional(),
});

export const SourceRowsSchema = z.array(SourceRowSchema);

export type SourceRow = z.infer<typeof SourceRowSchema>;
export type SourceColumn = keyof SourceRow;
export type RecordId = z.infer<typeof IdSchema>;

export const SOURCE_COLUMNS = [
  "ProductId",
  "sku",
  "SystemCode",
  "LinkId",
  "Order",
  "MediaId",
  "URL",
  "ParentId",
  "ImageType",
  "MediaResourceId",
  "CompanyId",
  "FileUrlBase64",
  "ContentType",
  "productstatus",
  "linkproductmediastatus",
  "mediastatus",
] as const satisfies readonly SourceColumn[];

export interface MediaRecord {
  readonly productId: RecordId;
  readonly mediaId: RecordId;
  readonly mediaResourceId: string;
  readonly order: number;
  readonly url: string;
  readonly contentType: string;
  readonly row: Readonly<SourceRow>;
}

/**
 * Identity used to key outcomes: `{ProductId}:{MediaId}:{MediaResourceId}`
 */
export type RecordKey = `${RecordId}:${RecordId}:${string}`;
