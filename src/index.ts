export { CodaClient, DEFAULT_RETRY_POLICY } from "./lib/coda/client";
export type { CodaClientConfig, RetryPolicy } from "./lib/coda/client";
export { CodaHttp, DEFAULT_BASE_URL, parseRetryAfter } from "./lib/coda/http";
export { collectAll, paginate } from "./lib/coda/paginator";
export { RateLimiter } from "./lib/coda/rate-limiter";
export * from "./lib/coda/types";
export { Config, defaultConfigYaml, loadCommandConfig } from "./lib/config";
export type { ResolvedConfig } from "./lib/config";
export { DocExporter } from "./lib/export/doc-exporter";
export type { DocExportResult } from "./lib/export/doc-exporter";
export * from "./lib/export/domain";
export { ExportLayout } from "./lib/export/layout";
export { PageExportJob, PageExportPoller } from "./lib/export/page-export-poller";
export { WorkspaceExporter } from "./lib/export/workspace-exporter";
export type { WorkspaceExporterConfig, WorkspaceExporterEvents } from "./lib/export/workspace-exporter";
export { log } from "./lib/log";
export { normalization } from "./lib/util/normalization";
export * from "./infrastructure/filesystem";
export * from "./shared/errors";
