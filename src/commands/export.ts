/**
 * Export Command
 *
 * CLI command for exporting a Coda workspace.
 */
import path from "path";
import { BaseCommand } from "../lib/commands/base-command";
import { RunSummary } from "../lib/export/domain";
import { WorkspaceExporter } from "../lib/export/workspace-exporter";
import { log } from "../lib/log";

/**
 * Exit code for a run that finished with isolated failures or was cancelled.
 */
export const EXIT_INCOMPLETE = 2;

export default class Export extends BaseCommand {
  static override description = "Export every doc of a Coda workspace to a local file tree and a zip archive.";
  static override examples = [
    "<%= config.bin %> <%= command.id %> --output ./exports",
    "<%= config.bin %> <%= command.id %> --docs doc-a,Roadmap --formats markdown",
    "<%= config.bin %> <%= command.id %> --token-file ./token.txt --no-archive",
    "<%= config.bin %> <%= command.id %> --concurrency 4 --timeout 3600"
  ];

  public async run(): Promise<RunSummary> {
    const settings = this.settings.rendered;
    const token = this.settings.token;
    const controller = new AbortController();

    const stop = (reason: string) => () => {
      if (!controller.signal.aborted) {
        log.warning(`${reason}; no new doc will start`);
        controller.abort();
      }
    };
    const onSigint = stop("Received SIGINT");
    const onSigterm = stop("Received SIGTERM");
    process.once("SIGINT", onSigint);
    process.once("SIGTERM", onSigterm);
    const timer =
      settings.timeout > 0
        ? setTimeout(stop(`Run time limit of ${settings.timeout}s reached`), settings.timeout * 1000)
        : undefined;

    const exporter = new WorkspaceExporter({
      token,
      baseUrl: settings["base-url"],
      outputDir: path.resolve(settings.output),
      docs: settings.docs,
      formats: settings.formats,
      concurrency: settings.concurrency,
      retries: settings.retries,
      rateLimitDelay: settings["rate-limit-delay"],
      pollInterval: settings["poll-interval"],
      pollTimeout: settings["poll-timeout"],
      requestTimeout: settings["request-timeout"],
      archive: settings.archive
    });

    let summary: RunSummary;
    try {
      summary = await exporter.run(controller.signal);
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
      process.off("SIGINT", onSigint);
      process.off("SIGTERM", onSigterm);
    }

    this.report(summary);

    if (summary.failures.length > 0 || summary.cancelled) {
      this.exit(EXIT_INCOMPLETE);
    }

    return summary;
  }

  private report(summary: RunSummary): void {
    const { counts } = summary;
    this.log(
      `Exported ${counts.docs} docs, ${counts.tables} tables (${counts.rows} rows), ${counts.views} views and ` +
        `${counts.pages} pages (${counts.pageFiles} files, ${counts.skippedPages} skipped) to ${summary.outputDir} ` +
        `in ${(summary.durationMs / 1000).toFixed(1)}s`
    );

    if (summary.archivePath) {
      this.log(`Archive: ${summary.archivePath}`);
    }

    if (summary.cancelled) {
      this.log("The run was cancelled before every doc was exported.");
    }

    for (const failure of summary.failures) {
      const where = [failure.docId, failure.scope, failure.id, failure.format].filter(Boolean).join(" / ");
      this.log(`  ✗ ${where}: [${failure.code}] ${failure.message}`);
    }
  }
}
