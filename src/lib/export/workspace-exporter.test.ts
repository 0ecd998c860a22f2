import { strFromU8, unzipSync } from "fflate";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { listFiles } from "../../infrastructure/filesystem";
import { AuthError } from "../../shared/errors";
import { FakeCoda, FakeDoc, TEST_TOKEN, sampleWorkspace } from "../../test/fake-coda";
import { FailureRecord } from "./domain";
import { WorkspaceExporter, WorkspaceExporterConfig } from "./workspace-exporter";

/**
 * Two docs: the first with one table (three rows, one formula column) and one
 * page, the second with no tables and one view of the first doc's table.
 */
const scenario = (): FakeDoc[] => {
  const [first, second] = sampleWorkspace();
  return [{ ...first, pages: (first.pages ?? []).slice(0, 1) }, second];
};

describe("WorkspaceExporter", () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), "coda-export-run-"));
  });

  afterEach(async () => {
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  const createExporter = (fake: FakeCoda, overrides: Partial<WorkspaceExporterConfig> = {}) =>
    new WorkspaceExporter({
      token: TEST_TOKEN,
      outputDir,
      formats: ["markdown", "html"],
      concurrency: 2,
      retries: 0,
      retryBaseDelay: 1,
      rateLimitDelay: 0,
      pollInterval: 1,
      pollTimeout: 50,
      requestTimeout: 5_000,
      archive: true,
      adapter: fake.adapter,
      ...overrides
    });

  const root = () => path.join(outputDir, "coda-export");
  const readText = (relative: string) => fs.readFile(path.join(root(), ...relative.split("/")), "utf8");
  const readJson = async (relative: string): Promise<unknown> => JSON.parse(await readText(relative));

  const snapshotTree = async (): Promise<Record<string, string>> => {
    const tree: Record<string, string> = {};
    for (const file of await listFiles(root())) {
      tree[file] = await readText(file);
    }
    return tree;
  };

  it("should export the two-doc workspace", async () => {
    const summary = await createExporter(new FakeCoda(scenario())).run();

    expect(await listFiles(root())).toEqual([
      "doc-a/doc_meta.json",
      "doc-a/pages/Overview.html",
      "doc-a/pages/Overview.md",
      "doc-a/pages/pages_metadata.json",
      "doc-a/tables/grid-1.json",
      "doc-a/tables/grid-1_columns.json",
      "doc-a/tables/grid-1_meta.json",
      "doc-b/doc_meta.json",
      "doc-b/pages/Welcome.html",
      "doc-b/pages/Welcome.md",
      "doc-b/pages/pages_metadata.json",
      "doc-b/views/table-view-1_meta.json",
      "docs.json",
      "export_summary.json"
    ]);

    expect(await readJson("docs.json")).toEqual([
      {
        id: "doc-a",
        name: "Roadmap",
        owner: "owner@example.com",
        ownerName: "Owner",
        createdAt: "2024-01-01T00:00:00.000Z",
        updatedAt: "2024-02-01T00:00:00.000Z",
        href: "https://coda.test/apis/v1/docs/doc-a",
        browserLink: "https://coda.test/d/doc-a"
      },
      {
        id: "doc-b",
        name: "Team",
        owner: "owner@example.com",
        ownerName: "Owner",
        createdAt: "2024-03-01T00:00:00.000Z",
        updatedAt: "2024-03-02T00:00:00.000Z"
      }
    ]);

    expect(summary.counts).toEqual({
      docs: 2,
      tables: 1,
      rows: 3,
      views: 1,
      pages: 2,
      pageFiles: 4,
      skippedPages: 0,
      failures: 0
    });
    expect(summary.failures).toEqual([]);
    expect(summary.archivePath).toBe(path.join(outputDir, "coda-export.zip"));
  });

  it("should keep rows complete and reference cells unresolved", async () => {
    await createExporter(new FakeCoda(scenario(), { pageSize: 1 })).run();

    const rows = await readJson("doc-a/tables/grid-1.json");
    expect(rows).toHaveLength(3);
    expect(rows).toMatchObject([
      { id: "i-1" },
      { id: "i-2", values: { "c-owner": { "@type": "StructuredValue", rowId: "i-9", tableId: "grid-2" } } },
      { id: "i-3" }
    ]);
  });

  it("should keep formula strings and merge column detail", async () => {
    await createExporter(new FakeCoda(scenario())).run();

    const columns = await readJson("doc-a/tables/grid-1_columns.json");
    expect(columns).toMatchObject([
      { id: "c-title", detail: true },
      { id: "c-points", calculated: true, formula: "thisRow.Estimate * 2", detail: true },
      { id: "c-owner", detail: true }
    ]);
  });

  it("should write view configuration only, keeping the cross-doc parent table", async () => {
    await createExporter(new FakeCoda(scenario())).run();

    expect(await readJson("doc-b/views/table-view-1_meta.json")).toEqual({
      id: "table-view-1",
      name: "Open tasks",
      type: "table",
      tableType: "view",
      parentTable: { id: "grid-1", type: "table", name: "Tasks" },
      layout: "default",
      filter: { formula: "Done = false" },
      sorts: [{ column: { id: "c-points" }, direction: "descending" }]
    });
  });

  it("should map page ids to file names in the page index", async () => {
    await createExporter(new FakeCoda(scenario())).run();

    expect(await readText("doc-a/pages/Overview.md")).toBe("# Overview\n");
    expect(await readText("doc-a/pages/Overview.html")).toBe("<h1>Overview</h1>");
    expect(await readJson("doc-a/pages/pages_metadata.json")).toEqual([
      {
        id: "canvas-1",
        name: "Overview",
        fileName: "Overview",
        files: { markdown: "Overview.md", html: "Overview.html" },
        page: { id: "canvas-1", type: "page", name: "Overview", contentType: "canvas" }
      }
    ]);
  });

  it("should disambiguate colliding page names and skip pages that cannot be exported", async () => {
    const summary = await createExporter(new FakeCoda(sampleWorkspace())).run();

    const index = await readJson("doc-a/pages/pages_metadata.json");
    expect(index).toMatchObject([
      { id: "canvas-1", fileName: "Overview" },
      { id: "canvas-2", fileName: "A_B", files: { markdown: "A_B.md", html: "A_B.html" } },
      { id: "canvas-3", fileName: "A_B_canvas-3", files: { markdown: "A_B_canvas-3.md", html: "A_B_canvas-3.html" } },
      { id: "canvas-4", fileName: "Embed", files: {}, skipped: "content type embed is not exportable" }
    ]);
    expect(await readText("doc-a/pages/A_B.md")).toBe("markdown of canvas-2");
    expect(await readText("doc-a/pages/A_B_canvas-3.md")).toBe("markdown of canvas-3");
    expect(summary.counts.skippedPages).toBe(1);
    expect(summary.counts.pageFiles).toBe(8);
  });

  it("should archive the whole export tree", async () => {
    await createExporter(new FakeCoda(scenario())).run();

    const entries = unzipSync(new Uint8Array(await fs.readFile(path.join(outputDir, "coda-export.zip"))));

    expect(Object.keys(entries).sort()).toEqual(await listFiles(root()));
    expect(strFromU8(entries["doc-a/pages/Overview.md"])).toBe("# Overview\n");
  });

  it("should produce identical output when run twice against the same workspace", async () => {
    const fake = new FakeCoda(sampleWorkspace());

    await createExporter(fake).run();
    const first = await snapshotTree();
    const firstArchive = await fs.readFile(path.join(outputDir, "coda-export.zip"));

    await createExporter(fake).run();
    const second = await snapshotTree();
    const secondArchive = await fs.readFile(path.join(outputDir, "coda-export.zip"));

    expect(second).toEqual(first);
    expect(secondArchive.equals(firstArchive)).toBe(true);
  });

  it("should remove files of entities deleted or renamed remotely", async () => {
    const workspace = scenario();
    const fake = new FakeCoda(workspace);
    await createExporter(fake).run();

    workspace[0].tables = [];
    const pages = workspace[0].pages ?? [];
    pages[0].page = { ...pages[0].page, name: "Intro" };
    await createExporter(fake).run();

    const files = await listFiles(root());
    expect(files.filter((file) => file.startsWith("doc-a/"))).toEqual([
      "doc-a/doc_meta.json",
      "doc-a/pages/Intro.html",
      "doc-a/pages/Intro.md",
      "doc-a/pages/pages_metadata.json"
    ]);
  });

  it("should remove the files of a page that can no longer be exported", async () => {
    const workspace = scenario();
    const fake = new FakeCoda(workspace);
    await createExporter(fake).run();

    const pages = workspace[0].pages ?? [];
    pages[0].page = { ...pages[0].page, contentType: "embed" };
    await createExporter(fake).run();

    const files = await listFiles(root());
    expect(files.filter((file) => file.startsWith("doc-a/pages/"))).toEqual(["doc-a/pages/pages_metadata.json"]);
    expect(await readJson("doc-a/pages/pages_metadata.json")).toMatchObject([
      { id: "canvas-1", fileName: "Overview", files: {}, skipped: "content type embed is not exportable" }
    ]);
  });

  it("should write pages whose names are long in multi-byte characters", async () => {
    const workspace = scenario();
    const pages = workspace[0].pages ?? [];
    pages[0].page = { ...pages[0].page, name: "計画".repeat(60) };

    const summary = await createExporter(new FakeCoda(workspace)).run();

    const stem = "計画".repeat(33);
    expect(summary.failures).toEqual([]);
    expect(await readText(`doc-a/pages/${stem}.md`)).toBe("# Overview\n");
    expect(await readText(`doc-a/pages/${stem}.html`)).toBe("<h1>Overview</h1>");
  });

  it("should isolate a failing table and still archive", async () => {
    const fake = new FakeCoda(scenario()).intercept("GET", /\/tables\/grid-1\/rows$/, {
      status: 400,
      body: { message: "Bad Request" }
    });
    const failures: FailureRecord[] = [];
    const exporter = createExporter(fake);
    exporter.on("failure", (failure: FailureRecord) => failures.push(failure));

    const summary = await exporter.run();

    expect(summary.failures).toEqual([
      {
        scope: "table",
        id: "grid-1",
        docId: "doc-a",
        code: "REQUEST_ERROR",
        message: "GET /docs/doc-a/tables/grid-1/rows failed with 400: Bad Request"
      }
    ]);
    expect(failures).toEqual(summary.failures);
    expect(summary.counts.views).toBe(1);
    expect(await readText("doc-a/pages/Overview.md")).toBe("# Overview\n");
    expect(await readJson("export_summary.json")).toMatchObject({ counts: { failures: 1 }, failures: summary.failures });
    await expect(fs.stat(path.join(outputDir, "coda-export.zip"))).resolves.toBeDefined();
  });

  it("should record a failed page format without losing the other format", async () => {
    const workspace = scenario();
    const pages = workspace[0].pages ?? [];
    pages[0].failFormats = ["html"];

    const summary = await createExporter(new FakeCoda(workspace)).run();

    expect(summary.failures).toMatchObject([
      { scope: "page", id: "canvas-1", docId: "doc-a", format: "html", code: "EXPORT_JOB_FAILED" }
    ]);
    expect(await readJson("doc-a/pages/pages_metadata.json")).toMatchObject([
      {
        files: { markdown: "Overview.md" },
        errors: { html: "Export doc-a/canvas-1/html failed: Could not render html" }
      }
    ]);
  });

  it("should continue with the next doc when one doc fails", async () => {
    const fake = new FakeCoda(scenario()).intercept("GET", /^\/docs\/doc-a\/tables$/, { status: 500 });

    const summary = await createExporter(fake).run();

    expect(summary.failures).toMatchObject([{ scope: "tables", id: "doc-a", docId: "doc-a", code: "TRANSIENT_ERROR" }]);
    expect(await readJson("doc-b/views/table-view-1_meta.json")).toMatchObject({ id: "table-view-1" });
  });

  it("should export only the selected docs", async () => {
    const summary = await createExporter(new FakeCoda(scenario()), { docs: ["Team"], archive: false }).run();

    expect(await readJson("docs.json")).toMatchObject([{ id: "doc-b" }]);
    expect(summary.counts.docs).toBe(1);
    expect(summary.archivePath).toBeUndefined();
  });

  it("should keep the directories of docs a filtered run did not select", async () => {
    const fake = new FakeCoda(scenario());
    await createExporter(fake).run();

    await createExporter(fake, { docs: ["doc-b"] }).run();

    expect(await readText("doc-a/pages/Overview.md")).toBe("# Overview\n");
  });

  it("should fail before any export work when the credential is rejected", async () => {
    const fake = new FakeCoda(scenario());

    await expect(createExporter(fake, { token: "wrong-secret" }).run()).rejects.toBeInstanceOf(AuthError);
    expect(fake.requests).toHaveLength(1);
    await expect(fs.stat(root())).rejects.toThrow();
  });

  it("should abort without an archive when the credential is rejected mid-run", async () => {
    const fake = new FakeCoda(scenario()).intercept("GET", /^\/docs\/doc-a\/pages$/, { status: 403 });

    await expect(createExporter(fake, { concurrency: 1 }).run()).rejects.toBeInstanceOf(AuthError);
    await expect(fs.stat(path.join(outputDir, "coda-export.zip"))).rejects.toThrow();
  });

  it("should stop scheduling docs once cancelled and still archive", async () => {
    const controller = new AbortController();
    const exporter = createExporter(new FakeCoda(scenario()), { concurrency: 1 });
    exporter.on("doc:start", () => controller.abort());

    const summary = await exporter.run(controller.signal);

    expect(summary.cancelled).toBe(true);
    expect(summary.failures.map((failure) => [failure.scope, failure.id, failure.code])).toEqual([
      ["doc", "doc-a", "CANCELLED"],
      ["doc", "doc-b", "CANCELLED"]
    ]);
    expect(await readJson("export_summary.json")).toMatchObject({ cancelled: true });
    await expect(fs.stat(path.join(outputDir, "coda-export.zip"))).resolves.toBeDefined();
  });
});
