import { DOCS_FILE, ExportLayout, PAGES_INDEX_FILE, SUMMARY_FILE } from "../../lib/export/layout";
import { log } from "../../lib/log";
import { pruneDirectory, writeFileAtomic } from "./atomic-operations";
import { PruneRequest, WriteRequest } from "./types";

/**
 * Serializes JSON the same way every time: two-space indent, trailing newline.
 */
export const formatJson = (value: unknown): string => `${JSON.stringify(value, null, 2)}\n`;

/**
 * Persists exported entities at the paths the layout derives for them.
 *
 * Each write replaces the previous file for the same entity atomically.
 */
export class ExportWriter {
  constructor(readonly layout: ExportLayout) {}

  /**
   * @returns The paths written.
   */
  async write(request: WriteRequest): Promise<string[]> {
    switch (request.kind) {
      case "docs":
        return [await this.json(this.layout.docs(), request.docs)];
      case "doc":
        return [await this.json(this.layout.docMeta(request.doc.id), request.doc)];
      case "table":
        return [await this.json(this.layout.tableMeta(request.docId, request.table.id), request.table)];
      case "columns":
        return [await this.json(this.layout.columns(request.docId, request.tableId), request.columns)];
      case "rows":
        return [await this.json(this.layout.rows(request.docId, request.tableId), request.rows)];
      case "view":
        return [await this.json(this.layout.view(request.docId, request.view.id), request.view)];
      case "page":
        return [await this.text(this.layout.page(request.docId, request.fileName, request.format), request.content)];
      case "pages-index":
        return [await this.json(this.layout.pagesIndex(request.docId), request.entries)];
      case "summary":
        return [await this.json(this.layout.summary(), request.report)];
    }
  }

  /**
   * Deletes files in a listed directory that no listed entity owns.
   *
   * @returns The removed paths.
   */
  async prune(request: PruneRequest): Promise<string[]> {
    const { directory, keep } = this.retained(request);
    const removed = await pruneDirectory(directory, keep);

    if (removed.length > 0) {
      log.debug(`Pruned ${removed.length} stale entries`, { directory, removed });
    }

    return removed;
  }

  private retained(request: PruneRequest): { directory: string; keep: Set<string> } {
    switch (request.scope) {
      case "root":
        return {
          directory: this.layout.root,
          keep: new Set([DOCS_FILE, SUMMARY_FILE, ...request.docIds.map((id) => this.layout.docDirectoryName(id))])
        };
      case "tables":
        return {
          directory: this.layout.tablesDir(request.docId),
          keep: new Set(
            request.tableIds.flatMap((id) => {
              const names = this.layout.tableFileNames(id);
              return [names.rows, names.columns, names.meta];
            })
          )
        };
      case "views":
        return {
          directory: this.layout.viewsDir(request.docId),
          keep: new Set(request.viewIds.map((id) => this.layout.viewFileName(id)))
        };
      case "pages":
        return {
          directory: this.layout.pagesDir(request.docId),
          keep: new Set([
            PAGES_INDEX_FILE,
            ...request.fileNames.flatMap((name) =>
              request.formats.map((format) => this.layout.pageFileName(name, format))
            )
          ])
        };
    }
  }

  private async json(filePath: string, value: unknown): Promise<string> {
    return this.text(filePath, formatJson(value));
  }

  private async text(filePath: string, content: string): Promise<string> {
    await writeFileAtomic(filePath, content);
    log.trace(`Wrote ${filePath}`);
    return filePath;
  }
}
