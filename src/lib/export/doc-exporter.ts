import { firstValueFrom } from "rxjs";
import { ExportWriter } from "../../infrastructure/filesystem";
import { AuthError, CancelledError, describeError } from "../../shared/errors";
import { CodaClient } from "../coda/client";
import { collectAll } from "../coda/paginator";
import { CodaColumn, CodaDoc, CodaPage, CodaTable, PageExportFormat } from "../coda/types";
import { log } from "../log";
import { normalization } from "../util/normalization";
import { ExportCounts, FailureRecord, PageIndexEntry, emptyCounts, toViewConfig } from "./domain";
import { PageExportPoller } from "./page-export-poller";

/**
 * Only canvas pages have content the export endpoint can render.
 */
export const EXPORTABLE_CONTENT_TYPE = "canvas";

export type DocExportResult = {
  docId: string;
  counts: ExportCounts;
  failures: FailureRecord[];
};

type FailureTarget = Omit<FailureRecord, "code" | "message">;

/**
 * Errors no entity-level handler may swallow: a rejected credential ends the
 * run, a cancellation ends the doc.
 */
const isRunScoped = (error: unknown): boolean => error instanceof AuthError || error instanceof CancelledError;

/**
 * Exports one doc: metadata, then tables (detail, columns, rows), then views
 * (configuration only), then pages in every configured format.
 *
 * Every table, view and page is its own failure unit, and so is every
 * listing. Files in a listed directory that no listed entity owns are pruned
 * once the listing succeeded.
 */
export class DocExporter {
  constructor(
    private readonly client: CodaClient,
    private readonly poller: PageExportPoller,
    private readonly writer: ExportWriter,
    private readonly formats: PageExportFormat[]
  ) {}

  async export(doc: CodaDoc): Promise<DocExportResult> {
    const result: DocExportResult = { docId: doc.id, counts: emptyCounts(), failures: [] };

    await this.isolate(result, { scope: "doc", id: doc.id, docId: doc.id }, async () => {
      const detail = await firstValueFrom(this.client.docs.get(doc.id));
      await this.writer.write({ kind: "doc", doc: detail });
    });

    await this.exportTables(doc.id, result);
    await this.exportViews(doc.id, result);
    await this.exportPages(doc.id, result);

    result.counts.docs = 1;
    result.counts.failures = result.failures.length;
    return result;
  }

  private async exportTables(docId: string, result: DocExportResult): Promise<void> {
    const tables = await this.isolate(result, { scope: "tables", id: docId, docId }, () =>
      collectAll(this.client.tables.list(docId, "table"))
    );
    if (!tables) {
      return;
    }

    for (const table of tables) {
      await this.isolate(result, { scope: "table", id: table.id, docId }, async () => {
        const rows = await this.exportTable(docId, table);
        result.counts.tables++;
        result.counts.rows += rows;
      });
    }

    await this.writer.prune({ scope: "tables", docId, tableIds: tables.map((table) => table.id) });
  }

  /**
   * @returns The number of rows written.
   */
  private async exportTable(docId: string, listed: CodaTable): Promise<number> {
    log.debug(`Exporting table ${listed.name}`, { docId, tableId: listed.id });

    const detail = await this.optional(
      () => firstValueFrom(this.client.tables.get(docId, listed.id)),
      `Could not get table detail for ${listed.id}, keeping the listing record`,
      { docId, tableId: listed.id }
    );
    await this.writer.write({ kind: "table", docId, table: detail ?? listed });

    const columns = await collectAll(this.client.columns.list(docId, listed.id));
    const enriched: CodaColumn[] = [];
    for (const column of columns) {
      const columnDetail = await this.optional(
        () => firstValueFrom(this.client.columns.get(docId, listed.id, column.id)),
        `Could not get column detail for ${column.id}, keeping the listing record`,
        { docId, tableId: listed.id, columnId: column.id }
      );
      enriched.push(columnDetail ? { ...column, ...columnDetail } : column);
    }
    await this.writer.write({ kind: "columns", docId, tableId: listed.id, columns: enriched });

    const rows = await collectAll(this.client.rows.list(docId, listed.id));
    await this.writer.write({ kind: "rows", docId, tableId: listed.id, rows });

    log.info(`Table ${listed.name}: ${enriched.length} columns, ${rows.length} rows`, { docId, tableId: listed.id });
    return rows.length;
  }

  private async exportViews(docId: string, result: DocExportResult): Promise<void> {
    const views = await this.isolate(result, { scope: "views", id: docId, docId }, () =>
      collectAll(this.client.tables.list(docId, "view"))
    );
    if (!views) {
      return;
    }

    for (const view of views) {
      await this.isolate(result, { scope: "view", id: view.id, docId }, async () => {
        const detail = await firstValueFrom(this.client.tables.get(docId, view.id));
        await this.writer.write({ kind: "view", docId, view: toViewConfig(detail) });
        result.counts.views++;
      });
    }

    await this.writer.prune({ scope: "views", docId, viewIds: views.map((view) => view.id) });
  }

  private async exportPages(docId: string, result: DocExportResult): Promise<void> {
    const pages = await this.isolate(result, { scope: "pages", id: docId, docId }, () =>
      collectAll(this.client.pages.list(docId))
    );
    if (!pages) {
      return;
    }

    const registry = new normalization.FilenameRegistry();
    const entries: PageIndexEntry[] = [];

    for (const page of pages) {
      entries.push(await this.exportPage(docId, page, registry.claim(page.id, page.name), result));
    }

    await this.writer.write({ kind: "pages-index", docId, entries });
    await this.writer.prune({
      scope: "pages",
      docId,
      fileNames: entries.filter((entry) => entry.skipped === undefined).map((entry) => entry.fileName),
      formats: this.formats
    });
  }

  private async exportPage(
    docId: string,
    page: CodaPage,
    fileName: string,
    result: DocExportResult
  ): Promise<PageIndexEntry> {
    const entry: PageIndexEntry = { id: page.id, name: page.name, fileName, files: {}, page };
    result.counts.pages++;

    const contentType = page.contentType ?? "unknown";
    if (contentType !== EXPORTABLE_CONTENT_TYPE) {
      entry.skipped = `content type ${contentType} is not exportable`;
      result.counts.skippedPages++;
      log.debug(`Skipping page ${page.name}: ${entry.skipped}`, { docId, pageId: page.id });
      return entry;
    }

    const outcomes = await this.poller.exportFormats(docId, page.id, this.formats);

    for (const { format, result: outcome } of outcomes) {
      if (outcome.status === "rejected") {
        if (isRunScoped(outcome.reason)) {
          throw outcome.reason;
        }
        this.recordPageError(result, entry, format, outcome.reason);
        continue;
      }

      try {
        await this.writer.write({ kind: "page", docId, fileName, format, content: outcome.value });
        entry.files[format] = this.writer.layout.pageFileName(fileName, format);
        result.counts.pageFiles++;
      } catch (error) {
        this.recordPageError(result, entry, format, error);
      }
    }

    return entry;
  }

  private recordPageError(
    result: DocExportResult,
    entry: PageIndexEntry,
    format: PageExportFormat,
    error: unknown
  ): void {
    const { message } = this.record(result, { scope: "page", id: entry.id, docId: result.docId, format }, error);
    const errors = entry.errors ?? {};
    errors[format] = message;
    entry.errors = errors;
  }

  /**
   * Runs one failure unit. Entity-scoped errors are recorded and yield
   * `undefined`; run-scoped errors propagate.
   */
  private async isolate<T>(
    result: DocExportResult,
    target: FailureTarget,
    work: () => Promise<T>
  ): Promise<T | undefined> {
    try {
      return await work();
    } catch (error) {
      if (isRunScoped(error)) {
        throw error;
      }
      this.record(result, target, error);
      return undefined;
    }
  }

  private record(result: DocExportResult, target: FailureTarget, error: unknown): FailureRecord {
    const failure: FailureRecord = { ...target, ...describeError(error) };
    result.failures.push(failure);
    log.error(`Failed to export ${target.scope} ${target.id}`, failure);
    return failure;
  }

  /**
   * Best-effort enrichment: an entity-scoped failure is logged and yields
   * `undefined`.
   */
  private async optional<T>(work: () => Promise<T>, warning: string, context: object): Promise<T | undefined> {
    try {
      return await work();
    } catch (error) {
      if (isRunScoped(error)) {
        throw error;
      }
      log.warning(warning, { ...context, ...describeError(error) });
      return undefined;
    }
  }
}
