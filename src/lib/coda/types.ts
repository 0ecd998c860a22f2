/**
 * Coda API v1 entity records.
 *
 * Each schema names the fields the exporter reads and passes every other
 * remote field through untouched, so exported JSON keeps the full response.
 * A missing or mistyped named field fails validation instead of silently
 * producing `undefined` further down.
 */

import { z } from "zod";

const reference = z
  .object({
    id: z.string(),
    type: z.string().optional(),
    name: z.string().optional(),
    href: z.string().optional(),
    browserLink: z.string().optional()
  })
  .passthrough();

export const userSchema = z
  .object({
    name: z.string(),
    loginId: z.string().optional(),
    type: z.string().optional(),
    scoped: z.boolean().optional(),
    tokenName: z.string().optional()
  })
  .passthrough();

export const docSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    type: z.literal("doc").optional(),
    owner: z.string().optional(),
    ownerName: z.string().optional(),
    createdAt: z.string().optional(),
    updatedAt: z.string().optional(),
    href: z.string().optional(),
    browserLink: z.string().optional()
  })
  .passthrough();

export const pageSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    type: z.literal("page").optional(),
    subtitle: z.string().optional(),
    iconName: z.string().optional(),
    contentType: z.string().optional(),
    parent: reference.optional(),
    createdAt: z.string().optional(),
    updatedAt: z.string().optional(),
    href: z.string().optional(),
    browserLink: z.string().optional()
  })
  .passthrough();

export const tableTypeSchema = z.enum(["table", "view"]);

export const tableSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    type: z.literal("table").optional(),
    tableType: tableTypeSchema.optional(),
    parentTable: reference.optional(),
    parent: reference.optional(),
    displayColumn: reference.optional(),
    rowCount: z.number().optional(),
    layout: z.string().optional(),
    filter: z.unknown().optional(),
    sorts: z.array(z.unknown()).optional(),
    viewId: z.string().optional(),
    createdAt: z.string().optional(),
    updatedAt: z.string().optional(),
    href: z.string().optional(),
    browserLink: z.string().optional()
  })
  .passthrough();

export const columnSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    type: z.literal("column").optional(),
    display: z.boolean().optional(),
    calculated: z.boolean().optional(),
    formula: z.string().optional(),
    defaultValue: z.string().optional(),
    format: z.object({ type: z.string() }).passthrough().optional(),
    href: z.string().optional()
  })
  .passthrough();

/**
 * Cell values stay exactly as the server sent them. Reference cells are
 * structured objects carrying the referenced row id and are never resolved.
 */
export const rowSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    index: z.number().optional(),
    values: z.record(z.unknown()),
    createdAt: z.string().optional(),
    updatedAt: z.string().optional(),
    href: z.string().optional(),
    browserLink: z.string().optional()
  })
  .passthrough();

export const pageExportFormatSchema = z.enum(["markdown", "html"]);

export const beginPageExportSchema = z
  .object({
    id: z.string(),
    status: z.string(),
    href: z.string().optional()
  })
  .passthrough();

export const pageExportStatusSchema = z
  .object({
    id: z.string(),
    status: z.string(),
    downloadLink: z.string().optional(),
    error: z.string().optional(),
    href: z.string().optional()
  })
  .passthrough();

/**
 * Envelope of every cursor-paginated listing endpoint.
 */
export const listResponseSchema = z
  .object({
    items: z.array(z.unknown()),
    nextPageToken: z.string().optional(),
    nextPageLink: z.string().optional(),
    href: z.string().optional()
  })
  .passthrough();

export type CodaUser = z.infer<typeof userSchema>;
export type CodaDoc = z.infer<typeof docSchema>;
export type CodaPage = z.infer<typeof pageSchema>;
export type CodaTable = z.infer<typeof tableSchema>;
export type CodaColumn = z.infer<typeof columnSchema>;
export type CodaRow = z.infer<typeof rowSchema>;
export type TableType = z.infer<typeof tableTypeSchema>;
export type PageExportFormat = z.infer<typeof pageExportFormatSchema>;
export type BeginPageExportResponse = z.infer<typeof beginPageExportSchema>;
export type PageExportStatusResponse = z.infer<typeof pageExportStatusSchema>;

/**
 * One page of a listing, after its items have been validated.
 */
export type Page<T> = {
  items: T[];
  nextPageToken?: string;
};

export type QueryParams = Record<string, string | number | boolean | undefined>;

export type HttpMethod = "GET" | "POST";

/**
 * File extension written for each page export format.
 */
export const pageExportExtensions: Record<PageExportFormat, string> = {
  markdown: "md",
  html: "html"
};
