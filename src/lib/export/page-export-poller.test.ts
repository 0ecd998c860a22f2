import { describe, expect, it } from "vitest";
import {
  AuthError,
  ConcurrencyError,
  ExportJobFailedError,
  ExportTimeoutError,
  InternalError,
  TransientError
} from "../../shared/errors";
import { FakeCoda, TEST_TOKEN, sampleWorkspace } from "../../test/fake-coda";
import { CodaClient } from "../coda/client";
import { RateLimiter } from "../coda/rate-limiter";
import { PageExportJob, PageExportPoller, PageExportPollerConfig } from "./page-export-poller";

const createPoller = (fake: FakeCoda, config: Partial<PageExportPollerConfig> = {}) =>
  new PageExportPoller(
    new CodaClient({
      token: TEST_TOKEN,
      adapter: fake.adapter,
      limiter: new RateLimiter({ minInterval: 0 }),
      retry: { retries: 0, baseDelay: 1 }
    }),
    { pollInterval: 1, pollTimeout: 10, ...config }
  );

const statusPolls = (fake: FakeCoda) => fake.requestsTo("GET", /\/export\/[^/]+$/);

describe("PageExportJob", () => {
  it("should walk pending, in-progress and complete", () => {
    const job = new PageExportJob("doc-a", "canvas-1", "markdown");

    job.start("export-1");
    job.progress();
    job.progress();
    job.complete("https://downloads.test/export-1");

    expect(job.history).toEqual(["pending", "in-progress", "complete"]);
    expect(job.state).toEqual({
      status: "complete",
      requestId: "export-1",
      polls: 3,
      downloadLink: "https://downloads.test/export-1"
    });
  });

  it("should reject leaving a terminal state", () => {
    const job = new PageExportJob("doc-a", "canvas-1", "html");
    job.start("export-1");
    job.fail(new ExportTimeoutError("too slow"));

    expect(() => job.progress()).toThrow(InternalError);
    expect(job.history).toEqual(["pending", "in-progress", "failed"]);
  });

  it("should not complete a job that never started", () => {
    const job = new PageExportJob("doc-a", "canvas-1", "html");

    expect(() => job.complete("https://downloads.test/x")).toThrow(InternalError);
  });
});

describe("PageExportPoller", () => {
  it("should poll until complete and download the content once", async () => {
    const fake = new FakeCoda(sampleWorkspace(), { pollsUntilComplete: 2 });

    const content = await createPoller(fake).export("doc-a", "canvas-1", "markdown");

    expect(content).toBe("# Overview\n");
    expect(statusPolls(fake)).toHaveLength(3);
    expect(fake.requests.filter((request) => request.url.startsWith("https://downloads.test"))).toHaveLength(1);
  });

  it("should surface a failed job with the remote error", async () => {
    const workspace = sampleWorkspace();
    const pages = workspace[0].pages ?? [];
    pages[0].failFormats = ["html"];
    const fake = new FakeCoda(workspace, { pollsUntilComplete: 0 });

    const failure = createPoller(fake).export("doc-a", "canvas-1", "html");

    await expect(failure).rejects.toBeInstanceOf(ExportJobFailedError);
    await expect(failure).rejects.toThrow("Export doc-a/canvas-1/html failed: Could not render html");
  });

  it("should stop after the bounded wait when the job never finishes", async () => {
    const fake = new FakeCoda(sampleWorkspace(), { pollsUntilComplete: 1_000 });

    await expect(
      createPoller(fake, { pollInterval: 1, pollTimeout: 3 }).export("doc-a", "canvas-1", "markdown")
    ).rejects.toBeInstanceOf(ExportTimeoutError);
    expect(statusPolls(fake)).toHaveLength(3);
  });

  it("should treat an early 404 as not yet visible", async () => {
    const notFound = { status: 404, body: { message: "Not Found" } };
    const fake = new FakeCoda(sampleWorkspace(), { pollsUntilComplete: 0 }).intercept(
      "GET",
      /\/export\/[^/]+$/,
      notFound,
      notFound
    );

    await expect(createPoller(fake).export("doc-a", "canvas-1", "markdown")).resolves.toBe("# Overview\n");
    expect(statusPolls(fake)).toHaveLength(3);
  });

  it("should give up after consecutive poll failures", async () => {
    const unavailable = { status: 503 };
    const fake = new FakeCoda(sampleWorkspace(), { pollsUntilComplete: 0 }).intercept(
      "GET",
      /\/export\/[^/]+$/,
      unavailable,
      unavailable,
      unavailable
    );

    await expect(createPoller(fake).export("doc-a", "canvas-1", "markdown")).rejects.toBeInstanceOf(TransientError);
    expect(statusPolls(fake)).toHaveLength(3);
  });

  it("should tolerate fewer poll failures than the limit", async () => {
    const fake = new FakeCoda(sampleWorkspace(), { pollsUntilComplete: 0 }).intercept(
      "GET",
      /\/export\/[^/]+$/,
      { status: 500 },
      { status: 500 }
    );

    await expect(createPoller(fake).export("doc-a", "canvas-1", "html")).resolves.toBe("<h1>Overview</h1>");
  });

  it("should never tolerate a rejected credential while polling", async () => {
    const fake = new FakeCoda(sampleWorkspace()).intercept("GET", /\/export\/[^/]+$/, { status: 401 });

    await expect(createPoller(fake).export("doc-a", "canvas-1", "html")).rejects.toBeInstanceOf(AuthError);
    expect(statusPolls(fake)).toHaveLength(1);
  });

  it("should refuse a second in-flight export of the same page and format", async () => {
    const fake = new FakeCoda(sampleWorkspace(), { pollsUntilComplete: 1 });
    const poller = createPoller(fake);

    const first = poller.export("doc-a", "canvas-1", "markdown");
    const second = poller.export("doc-a", "canvas-1", "markdown");

    await expect(second).rejects.toBeInstanceOf(ConcurrencyError);
    await expect(first).resolves.toBe("# Overview\n");
    await expect(poller.export("doc-a", "canvas-1", "markdown")).resolves.toBe("# Overview\n");
  });

  it("should export both formats independently", async () => {
    const workspace = sampleWorkspace();
    const pages = workspace[0].pages ?? [];
    pages[0].failFormats = ["markdown"];
    const fake = new FakeCoda(workspace, { pollsUntilComplete: 1 });

    const results = await createPoller(fake).exportFormats("doc-a", "canvas-1", ["markdown", "html"]);

    expect(results.map(({ format, result }) => [format, result.status])).toEqual([
      ["markdown", "rejected"],
      ["html", "fulfilled"]
    ]);
    expect(fake.requestsTo("POST", /\/export$/)).toHaveLength(2);
  });
});
