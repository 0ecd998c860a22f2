/**
 * Export Domain Model
 *
 * Records written to the export tree and the run summary.
 */

import { CodaDoc, CodaPage, CodaTable, PageExportFormat } from "../coda/types";

/**
 * Unit of work a failure is scoped to.
 */
export type FailureScope = "workspace" | "doc" | "tables" | "table" | "views" | "view" | "pages" | "page" | "archive";

export type FailureRecord = {
  scope: FailureScope;
  /**
   * Id of the failed entity (the doc id for doc-level listings).
   */
  id: string;
  docId?: string;
  format?: PageExportFormat;
  code: string;
  message: string;
};

/**
 * One entry of `docs.json`.
 */
export type DocSummary = {
  id: string;
  name: string;
  owner?: string;
  ownerName?: string;
  createdAt?: string;
  updatedAt?: string;
  href?: string;
  browserLink?: string;
};

/**
 * Configuration of a view. Never carries row data.
 */
export type ViewConfig = {
  id: string;
  name: string;
  type?: string;
  tableType?: string;
  parentTable?: CodaTable["parentTable"];
  layout?: string;
  filter?: unknown;
  sorts: unknown[];
  displayColumn?: CodaTable["displayColumn"];
  viewId?: string;
  createdAt?: string;
  updatedAt?: string;
  href?: string;
  browserLink?: string;
};

/**
 * One entry of `pages_metadata.json`, linking a page id to its file name.
 */
export type PageIndexEntry = {
  id: string;
  name: string;
  fileName: string;
  files: Partial<Record<PageExportFormat, string>>;
  skipped?: string;
  errors?: Partial<Record<PageExportFormat, string>>;
  page: CodaPage;
};

export type ExportCounts = {
  docs: number;
  tables: number;
  rows: number;
  views: number;
  pages: number;
  pageFiles: number;
  skippedPages: number;
  failures: number;
};

/**
 * Contents of `export_summary.json`. Holds nothing that changes between two
 * runs against the same remote state.
 */
export type ExportReport = {
  user: string;
  cancelled: boolean;
  counts: ExportCounts;
  failures: FailureRecord[];
};

export type RunSummary = ExportReport & {
  outputDir: string;
  archivePath?: string;
  durationMs: number;
};

export const emptyCounts = (): ExportCounts => ({
  docs: 0,
  tables: 0,
  rows: 0,
  views: 0,
  pages: 0,
  pageFiles: 0,
  skippedPages: 0,
  failures: 0
});

export const addCounts = (target: ExportCounts, source: ExportCounts): void => {
  target.docs += source.docs;
  target.tables += source.tables;
  target.rows += source.rows;
  target.views += source.views;
  target.pages += source.pages;
  target.pageFiles += source.pageFiles;
  target.skippedPages += source.skippedPages;
  target.failures += source.failures;
};

export const toDocSummary = (doc: CodaDoc): DocSummary => ({
  id: doc.id,
  name: doc.name,
  owner: doc.owner,
  ownerName: doc.ownerName,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
  href: doc.href,
  browserLink: doc.browserLink
});

export const toViewConfig = (view: CodaTable): ViewConfig => ({
  id: view.id,
  name: view.name,
  type: view.type,
  tableType: view.tableType,
  parentTable: view.parentTable,
  layout: view.layout,
  filter: view.filter,
  sorts: view.sorts ?? [],
  displayColumn: view.displayColumn,
  viewId: view.viewId,
  createdAt: view.createdAt,
  updatedAt: view.updatedAt,
  href: view.href,
  browserLink: view.browserLink
});

const compare = (a = "", b = "") => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Orders failures by doc, then scope, id and format, so summaries are stable
 * regardless of completion order.
 */
export const sortFailures = (failures: FailureRecord[]): FailureRecord[] =>
  [...failures].sort(
    (a, b) =>
      compare(a.docId, b.docId) || compare(a.scope, b.scope) || compare(a.id, b.id) || compare(a.format, b.format)
  );
