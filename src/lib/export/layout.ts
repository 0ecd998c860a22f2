import path from "path";
import { PageExportFormat, pageExportExtensions } from "../coda/types";
import { normalization } from "../util/normalization";

export const EXPORT_DIRECTORY = "coda-export";
export const DOCS_FILE = "docs.json";
export const SUMMARY_FILE = "export_summary.json";
export const DOC_META_FILE = "doc_meta.json";
export const PAGES_INDEX_FILE = "pages_metadata.json";

// Ids are used verbatim as path segments; only characters no file system
// accepts are replaced.
const idSegment = (id: string) => normalization.sanitize(id, 255);

/**
 * Derives every output path from entity ids, so the same entity always lands
 * at the same place.
 *
 * ```
 * <output>/coda-export/docs.json
 * <output>/coda-export/{doc}/doc_meta.json
 * <output>/coda-export/{doc}/tables/{table}.json | {table}_columns.json | {table}_meta.json
 * <output>/coda-export/{doc}/views/{view}_meta.json
 * <output>/coda-export/{doc}/pages/{name}.md | {name}.html | pages_metadata.json
 * <output>/coda-export.zip
 * ```
 */
export class ExportLayout {
  readonly root: string;
  readonly archive: string;

  constructor(readonly outputDir: string) {
    this.root = path.join(outputDir, EXPORT_DIRECTORY);
    this.archive = path.join(outputDir, `${EXPORT_DIRECTORY}.zip`);
  }

  docs(): string {
    return path.join(this.root, DOCS_FILE);
  }

  summary(): string {
    return path.join(this.root, SUMMARY_FILE);
  }

  docDirectoryName(docId: string): string {
    return idSegment(docId);
  }

  docDir(docId: string): string {
    return path.join(this.root, this.docDirectoryName(docId));
  }

  docMeta(docId: string): string {
    return path.join(this.docDir(docId), DOC_META_FILE);
  }

  tablesDir(docId: string): string {
    return path.join(this.docDir(docId), "tables");
  }

  tableFileNames(tableId: string): { rows: string; columns: string; meta: string } {
    const id = idSegment(tableId);
    return { rows: `${id}.json`, columns: `${id}_columns.json`, meta: `${id}_meta.json` };
  }

  rows(docId: string, tableId: string): string {
    return path.join(this.tablesDir(docId), this.tableFileNames(tableId).rows);
  }

  columns(docId: string, tableId: string): string {
    return path.join(this.tablesDir(docId), this.tableFileNames(tableId).columns);
  }

  tableMeta(docId: string, tableId: string): string {
    return path.join(this.tablesDir(docId), this.tableFileNames(tableId).meta);
  }

  viewsDir(docId: string): string {
    return path.join(this.docDir(docId), "views");
  }

  viewFileName(viewId: string): string {
    return `${idSegment(viewId)}_meta.json`;
  }

  view(docId: string, viewId: string): string {
    return path.join(this.viewsDir(docId), this.viewFileName(viewId));
  }

  pagesDir(docId: string): string {
    return path.join(this.docDir(docId), "pages");
  }

  pageFileName(fileName: string, format: PageExportFormat): string {
    return `${fileName}.${pageExportExtensions[format]}`;
  }

  page(docId: string, fileName: string, format: PageExportFormat): string {
    return path.join(this.pagesDir(docId), this.pageFileName(fileName, format));
  }

  pagesIndex(docId: string): string {
    return path.join(this.pagesDir(docId), PAGES_INDEX_FILE);
  }
}
