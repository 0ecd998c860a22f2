import { firstValueFrom } from "rxjs";
import {
  AuthError,
  CancelledError,
  ConcurrencyError,
  DomainError,
  ExportJobFailedError,
  ExportTimeoutError,
  InternalError,
  ProtocolError,
  RequestError
} from "../../shared/errors";
import { CodaClient } from "../coda/client";
import { PageExportFormat, PageExportStatusResponse } from "../coda/types";
import { log } from "../log";
import { delay } from "../util/concurrency";

export type PageExportState =
  | { status: "pending" }
  | { status: "in-progress"; requestId: string; polls: number }
  | { status: "complete"; requestId: string; polls: number; downloadLink: string }
  | { status: "failed"; requestId?: string; error: DomainError };

export type PageExportStatus = PageExportState["status"];

const transitions: Record<PageExportStatus, PageExportStatus[]> = {
  pending: ["in-progress", "failed"],
  "in-progress": ["in-progress", "complete", "failed"],
  complete: [],
  failed: []
};

/**
 * State machine of one page export request for one format.
 *
 * `pending -> in-progress -> { complete | failed }`; a poll that finds the
 * job still running moves `in-progress` to itself and counts the poll.
 */
export class PageExportJob {
  private current: PageExportState = { status: "pending" };
  readonly history: PageExportStatus[] = ["pending"];

  constructor(
    readonly docId: string,
    readonly pageId: string,
    readonly format: PageExportFormat
  ) {}

  get state(): PageExportState {
    return this.current;
  }

  get key(): string {
    return `${this.docId}/${this.pageId}/${this.format}`;
  }

  get polls(): number {
    return this.current.status === "in-progress" || this.current.status === "complete" ? this.current.polls : 0;
  }

  start(requestId: string): void {
    this.transition({ status: "in-progress", requestId, polls: 0 });
  }

  /**
   * Records a poll that found the job not yet finished.
   */
  progress(): void {
    this.transition({ status: "in-progress", requestId: this.requestId(), polls: this.polls + 1 });
  }

  complete(downloadLink: string): void {
    this.transition({ status: "complete", requestId: this.requestId(), polls: this.polls + 1, downloadLink });
  }

  fail(error: DomainError): void {
    const requestId = this.current.status === "in-progress" ? this.current.requestId : undefined;
    this.transition({ status: "failed", requestId, error });
  }

  private requestId(): string {
    if (this.current.status !== "in-progress") {
      throw new InternalError(`Export ${this.key} has no request in progress`, { status: this.current.status });
    }
    return this.current.requestId;
  }

  private transition(next: PageExportState): void {
    if (!transitions[this.current.status].includes(next.status)) {
      throw new InternalError(`Export ${this.key} cannot move from ${this.current.status} to ${next.status}`);
    }

    this.current = next;
    if (this.history[this.history.length - 1] !== next.status) {
      this.history.push(next.status);
    }
  }
}

export type PageExportPollerConfig = {
  /**
   * Milliseconds between two status polls.
   */
  pollInterval: number;
  /**
   * Total wait before a job is declared timed out.
   */
  pollTimeout: number;
  /**
   * Polls during which a 404 means the job is not visible yet.
   */
  notFoundGrace?: number;
  /**
   * Consecutive failed polls tolerated before the job fails.
   */
  maxConsecutiveFailures?: number;
};

/**
 * Drives page exports through submit, poll and download.
 *
 * Each page and format is its own job; at most one job per page and format
 * is in flight at a time.
 */
export class PageExportPoller {
  private readonly inFlight = new Set<string>();
  private readonly maxPolls: number;
  private readonly notFoundGrace: number;
  private readonly maxConsecutiveFailures: number;

  constructor(
    private readonly client: CodaClient,
    private readonly config: PageExportPollerConfig,
    private readonly signal?: AbortSignal
  ) {
    this.maxPolls = Math.max(1, Math.ceil(config.pollTimeout / Math.max(1, config.pollInterval)));
    this.notFoundGrace = config.notFoundGrace ?? 5;
    this.maxConsecutiveFailures = config.maxConsecutiveFailures ?? 3;
  }

  /**
   * Exports one page in one format and returns the downloaded content.
   */
  async export(docId: string, pageId: string, format: PageExportFormat): Promise<string> {
    const job = new PageExportJob(docId, pageId, format);

    if (this.inFlight.has(job.key)) {
      throw new ConcurrencyError(`Export of ${job.key} is already in flight`, { docId, pageId, format });
    }

    this.inFlight.add(job.key);
    try {
      return await this.run(job);
    } finally {
      this.inFlight.delete(job.key);
    }
  }

  /**
   * Exports a page in several formats concurrently; one format failing does
   * not affect the others.
   */
  async exportFormats(
    docId: string,
    pageId: string,
    formats: PageExportFormat[]
  ): Promise<Array<{ format: PageExportFormat; result: PromiseSettledResult<string> }>> {
    const results = await Promise.allSettled(formats.map((format) => this.export(docId, pageId, format)));
    return formats.map((format, index) => ({ format, result: results[index] }));
  }

  private async run(job: PageExportJob): Promise<string> {
    try {
      const begin = await firstValueFrom(this.client.pages.export.begin(job.docId, job.pageId, job.format));
      job.start(begin.id);
      log.debug(`Started page export ${job.key}`, { requestId: begin.id });

      const downloadLink = await this.poll(job, begin.id);
      return await firstValueFrom(this.client.download(downloadLink));
    } catch (error) {
      if (job.state.status !== "failed" && job.state.status !== "complete") {
        job.fail(error instanceof DomainError ? error : new InternalError(String(error)));
      }
      throw error;
    }
  }

  private async poll(job: PageExportJob, requestId: string): Promise<string> {
    let consecutiveFailures = 0;

    for (let poll = 1; poll <= this.maxPolls; poll++) {
      if (poll > 1) {
        await delay(this.config.pollInterval, this.signal);
      }

      let remote: PageExportStatusResponse;
      try {
        remote = await firstValueFrom(this.client.pages.export.status(job.docId, job.pageId, requestId));
        consecutiveFailures = 0;
      } catch (error) {
        if (error instanceof RequestError && error.status === 404 && poll <= this.notFoundGrace) {
          log.debug(`Export ${job.key} is not visible yet`, { poll });
          job.progress();
          continue;
        }

        consecutiveFailures++;
        if (!this.isTolerable(error) || consecutiveFailures >= this.maxConsecutiveFailures) {
          throw error;
        }

        log.warning(`Polling export ${job.key} failed (${consecutiveFailures}/${this.maxConsecutiveFailures})`, {
          error: error instanceof Error ? error.message : String(error)
        });
        job.progress();
        continue;
      }

      if (remote.status === "complete") {
        if (!remote.downloadLink) {
          throw new ProtocolError(`Export ${job.key} completed without a download link`, { requestId });
        }
        job.complete(remote.downloadLink);
        return remote.downloadLink;
      }

      if (remote.status === "failed") {
        throw new ExportJobFailedError(`Export ${job.key} failed: ${remote.error ?? "Unknown error"}`, {
          requestId,
          remoteError: remote.error
        });
      }

      job.progress();
    }

    throw new ExportTimeoutError(`Export ${job.key} did not complete within ${this.config.pollTimeout}ms`, {
      requestId,
      polls: this.maxPolls
    });
  }

  private isTolerable(error: unknown): boolean {
    return error instanceof DomainError && !(error instanceof AuthError) && !(error instanceof CancelledError);
  }
}
