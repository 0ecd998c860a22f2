/**
 * File System Types
 */

import { CodaColumn, CodaDoc, CodaRow, CodaTable, PageExportFormat } from "../../lib/coda/types";
import { DocSummary, ExportReport, PageIndexEntry, ViewConfig } from "../../lib/export/domain";

/**
 * Everything the exporter persists, one variant per file kind.
 */
export type WriteRequest =
  | { kind: "docs"; docs: DocSummary[] }
  | { kind: "doc"; doc: CodaDoc }
  | { kind: "table"; docId: string; table: CodaTable }
  | { kind: "columns"; docId: string; tableId: string; columns: CodaColumn[] }
  | { kind: "rows"; docId: string; tableId: string; rows: CodaRow[] }
  | { kind: "view"; docId: string; view: ViewConfig }
  | { kind: "page"; docId: string; fileName: string; format: PageExportFormat; content: string }
  | { kind: "pages-index"; docId: string; entries: PageIndexEntry[] }
  | { kind: "summary"; report: ExportReport };

/**
 * Names what a directory should contain after a successful listing; anything
 * else in it is stale.
 */
export type PruneRequest =
  | { scope: "root"; docIds: string[] }
  | { scope: "tables"; docId: string; tableIds: string[] }
  | { scope: "views"; docId: string; viewIds: string[] }
  | { scope: "pages"; docId: string; fileNames: string[]; formats: PageExportFormat[] };
