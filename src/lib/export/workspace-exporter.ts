/**
 * WorkspaceExporter - Runs a complete workspace export.
 *
 * Validates the credential, lists docs, exports every doc in its own failure
 * domain with bounded parallelism, writes the run summary and finally packs
 * the export tree into one archive.
 */

import { AxiosAdapter } from "axios";
import { EventEmitter } from "events";
import { firstValueFrom } from "rxjs";
import { ArchiveResult, ExportWriter, createArchive } from "../../infrastructure/filesystem";
import { AuthError, CancelledError, describeError } from "../../shared/errors";
import { CodaClient } from "../coda/client";
import { collectAll } from "../coda/paginator";
import { RateLimiter } from "../coda/rate-limiter";
import { CodaDoc, CodaUser, PageExportFormat } from "../coda/types";
import { log } from "../log";
import { ConcurrencyLimiter } from "../util/concurrency";
import { DocExporter, DocExportResult } from "./doc-exporter";
import {
  DocSummary,
  ExportCounts,
  ExportReport,
  FailureRecord,
  RunSummary,
  addCounts,
  emptyCounts,
  sortFailures,
  toDocSummary
} from "./domain";
import { ExportLayout } from "./layout";
import { PageExportPoller } from "./page-export-poller";

export type WorkspaceExporterConfig = {
  token: string;
  baseUrl?: string;
  /**
   * Directory that receives `coda-export/` and `coda-export.zip`.
   */
  outputDir: string;
  /**
   * Ids or names of the docs to export; all docs when empty.
   */
  docs?: string[];
  formats: PageExportFormat[];
  concurrency: number;
  retries: number;
  /**
   * First transient-retry backoff in milliseconds.
   */
  retryBaseDelay?: number;
  rateLimitDelay: number;
  pollInterval: number;
  pollTimeout: number;
  requestTimeout: number;
  archive: boolean;
  adapter?: AxiosAdapter;
};

/**
 * Events emitted while a run progresses.
 */
export type WorkspaceExporterEvents = {
  "doc:start": [doc: DocSummary];
  "doc:complete": [result: DocExportResult];
  failure: [failure: FailureRecord];
  archive: [result: ArchiveResult];
};

type RunContext = {
  client: CodaClient;
  writer: ExportWriter;
  docExporter: DocExporter;
  counts: ExportCounts;
  failures: FailureRecord[];
  signal?: AbortSignal;
};

export class WorkspaceExporter extends EventEmitter {
  constructor(private readonly config: WorkspaceExporterConfig) {
    super();
  }

  /**
   * Execute the export.
   *
   * Arguments:
   * - signal: Run-scoped stop signal. Once it fires no new doc starts; the
   *   summary and archive are still written.
   *
   * Returns:
   * - The run summary.
   *
   * Throws:
   * - AuthError when the credential is rejected, before or during the run.
   */
  async run(signal?: AbortSignal): Promise<RunSummary> {
    const started = Date.now();
    const layout = new ExportLayout(this.config.outputDir);
    const client = new CodaClient({
      token: this.config.token,
      baseUrl: this.config.baseUrl,
      timeout: this.config.requestTimeout,
      adapter: this.config.adapter,
      limiter: new RateLimiter({ minInterval: this.config.rateLimitDelay }),
      retry: { retries: this.config.retries, baseDelay: this.config.retryBaseDelay },
      signal
    });
    const writer = new ExportWriter(layout);
    const poller = new PageExportPoller(
      client,
      { pollInterval: this.config.pollInterval, pollTimeout: this.config.pollTimeout },
      signal
    );

    const context: RunContext = {
      client,
      writer,
      docExporter: new DocExporter(client, poller, writer, this.config.formats),
      counts: emptyCounts(),
      failures: [],
      signal
    };

    const user = await this.verify(client);
    log.info(`Connected to Coda as ${user.name}`, { outputDir: layout.root });

    const docs = await this.listDocs(context);
    if (docs) {
      await context.writer.write({ kind: "docs", docs: docs.map(toDocSummary) });
      await this.exportDocs(docs, context);
      if ((this.config.docs ?? []).length === 0) {
        await context.writer.prune({ scope: "root", docIds: docs.map((doc) => doc.id) });
      }
    }

    const report: ExportReport = {
      user: user.name,
      cancelled: signal?.aborted ?? false,
      counts: { ...context.counts, failures: context.failures.length },
      failures: sortFailures(context.failures)
    };
    await context.writer.write({ kind: "summary", report });

    const archivePath = this.config.archive ? await this.archive(layout, context) : undefined;

    const summary: RunSummary = {
      ...report,
      counts: { ...report.counts, failures: context.failures.length },
      failures: sortFailures(context.failures),
      outputDir: layout.root,
      archivePath,
      durationMs: Date.now() - started
    };

    log.debugging.inspect("rate limiter", client.getRateLimiterStats());

    if (summary.failures.length > 0) {
      log.warning(`Export finished with ${summary.failures.length} failures`, summary.counts);
    } else {
      log.success("Export finished", summary.counts);
    }

    return summary;
  }

  /**
   * One identity call; any failure here ends the run before export work.
   */
  private async verify(client: CodaClient): Promise<CodaUser> {
    try {
      return await firstValueFrom(client.whoami());
    } catch (error) {
      if (error instanceof AuthError || error instanceof CancelledError) {
        throw error;
      }
      throw new AuthError(`Credential could not be validated: ${describeError(error).message}`);
    }
  }

  private async listDocs(context: RunContext): Promise<CodaDoc[] | undefined> {
    let docs: CodaDoc[];
    try {
      docs = await collectAll(context.client.docs.list());
    } catch (error) {
      if (error instanceof AuthError) {
        throw error;
      }
      this.fail(context, { scope: "workspace", id: "docs", ...describeError(error) });
      return undefined;
    }

    const wanted = this.config.docs ?? [];
    if (wanted.length === 0) {
      return docs;
    }

    const selected = docs.filter((doc) => wanted.includes(doc.id) || wanted.includes(doc.name));
    log.info(`Selected ${selected.length} of ${docs.length} docs`, { wanted });
    return selected;
  }

  /**
   * Exports docs with bounded parallelism.
   *
   * Arguments:
   * - docs: Docs in listing order.
   * - context: The run's shared collaborators and accumulators.
   *
   * Returns:
   * - Promise that resolves once every started doc has finished.
   */
  private async exportDocs(docs: CodaDoc[], context: RunContext): Promise<void> {
    const limiter = new ConcurrencyLimiter(this.config.concurrency);
    const stop: { fatal?: AuthError } = {};

    await Promise.all(
      docs.map((doc) =>
        limiter.run(async () => {
          if (stop.fatal) {
            return;
          }

          if (context.signal?.aborted) {
            this.fail(context, {
              scope: "doc",
              id: doc.id,
              docId: doc.id,
              code: "CANCELLED",
              message: "Run was cancelled before this doc started"
            });
            return;
          }

          this.publish("doc:start", toDocSummary(doc));
          log.info(`Exporting doc ${doc.name}`, { docId: doc.id });

          try {
            const result = await context.docExporter.export(doc);
            addCounts(context.counts, result.counts);
            for (const failure of result.failures) {
              this.fail(context, failure);
            }
            this.publish("doc:complete", result);
          } catch (error) {
            if (error instanceof AuthError) {
              stop.fatal = stop.fatal ?? error;
              return;
            }
            this.fail(context, { scope: "doc", id: doc.id, docId: doc.id, ...describeError(error) });
          }
        })
      )
    );

    if (stop.fatal) {
      log.error("Credential was rejected during the run; stopping", { error: stop.fatal.message });
      throw stop.fatal;
    }
  }

  private async archive(layout: ExportLayout, context: RunContext): Promise<string | undefined> {
    try {
      const result = await createArchive(layout.root, layout.archive);
      log.success(`Created archive ${result.path}`, { entries: result.entries.length, bytes: result.bytes });
      this.publish("archive", result);
      return result.path;
    } catch (error) {
      this.fail(context, { scope: "archive", id: layout.archive, ...describeError(error) });
      return undefined;
    }
  }

  private fail(context: RunContext, failure: FailureRecord): void {
    context.failures.push(failure);
    this.publish("failure", failure);
  }

  private publish<K extends keyof WorkspaceExporterEvents>(event: K, ...args: WorkspaceExporterEvents[K]): void {
    this.emit(event, ...args);
  }
}
