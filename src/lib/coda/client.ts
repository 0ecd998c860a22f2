/**
 * RxJS-based Coda API client.
 *
 * Read-only: every method maps to a GET, except starting a page export, which
 * creates a server-side export job and changes no document.
 */

import { Observable, defer, from, of, throwError } from "rxjs";
import { map, retry } from "rxjs/operators";
import { z } from "zod";
import { ProtocolError, RateLimitError, TransientError } from "../../shared/errors";
import { log } from "../log";
import { delay } from "../util/concurrency";
import { CodaHttp, CodaHttpConfig } from "./http";
import { paginate } from "./paginator";
import { RateLimiter } from "./rate-limiter";
import {
  BeginPageExportResponse,
  CodaColumn,
  CodaDoc,
  CodaPage,
  CodaRow,
  CodaTable,
  CodaUser,
  HttpMethod,
  PageExportFormat,
  PageExportStatusResponse,
  QueryParams,
  TableType,
  beginPageExportSchema,
  columnSchema,
  docSchema,
  pageExportStatusSchema,
  pageSchema,
  rowSchema,
  tableSchema,
  userSchema
} from "./types";

export type RetryPolicy = {
  /**
   * Retries of a transient failure before it escalates.
   */
  retries: number;
  /**
   * First backoff delay in milliseconds; doubles per retry.
   */
  baseDelay: number;
  maxDelay: number;
  /**
   * Retries of a throttled request before the `RateLimitError` surfaces.
   */
  maxRateLimitRetries: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  retries: 3,
  baseDelay: 1000,
  maxDelay: 30_000,
  maxRateLimitRetries: 10
};

export type CodaClientConfig = CodaHttpConfig & {
  /**
   * Shared by every request of the run.
   */
  limiter: RateLimiter;
  retry?: Partial<RetryPolicy>;
  /**
   * Run-scoped stop signal, observed while waiting and in flight.
   */
  signal?: AbortSignal;
};

const parse = <S extends z.ZodTypeAny>(schema: S, operation: string) => {
  return (data: unknown): z.output<S> => {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new ProtocolError(`${operation} returned an unexpected shape`, {
        operation,
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      });
    }
    return parsed.data;
  };
};

const segment = (id: string) => encodeURIComponent(id);

export class CodaClient {
  private readonly http: CodaHttp;
  private readonly limiter: RateLimiter;
  private readonly policy: RetryPolicy;
  private readonly signal?: AbortSignal;

  constructor(config: CodaClientConfig) {
    this.http = new CodaHttp(config);
    this.limiter = config.limiter;
    this.policy = {
      retries: config.retry?.retries ?? DEFAULT_RETRY_POLICY.retries,
      baseDelay: config.retry?.baseDelay ?? DEFAULT_RETRY_POLICY.baseDelay,
      maxDelay: config.retry?.maxDelay ?? DEFAULT_RETRY_POLICY.maxDelay,
      maxRateLimitRetries: config.retry?.maxRateLimitRetries ?? DEFAULT_RETRY_POLICY.maxRateLimitRetries
    };
    this.signal = config.signal;
  }

  /**
   * Identity of the token; the cheapest authenticated call.
   */
  whoami(): Observable<CodaUser> {
    return this.get("whoami", "/whoami", userSchema);
  }

  readonly docs = {
    list: (): Observable<CodaDoc> => this.list("docs.list", "/docs", {}, docSchema),
    get: (docId: string): Observable<CodaDoc> => this.get(`docs.get(${docId})`, `/docs/${segment(docId)}`, docSchema)
  };

  readonly pages = {
    list: (docId: string): Observable<CodaPage> =>
      this.list(`pages.list(${docId})`, `/docs/${segment(docId)}/pages`, {}, pageSchema),
    export: {
      begin: (docId: string, pageId: string, format: PageExportFormat): Observable<BeginPageExportResponse> =>
        this.execute(`pages.export.begin(${docId}, ${pageId}, ${format})`, () =>
          this.request("POST", `/docs/${segment(docId)}/pages/${segment(pageId)}/export`, undefined, {
            outputFormat: format
          })
        ).pipe(map(parse(beginPageExportSchema, `pages.export.begin(${docId}, ${pageId})`))),
      status: (docId: string, pageId: string, requestId: string): Observable<PageExportStatusResponse> =>
        this.get(
          `pages.export.status(${docId}, ${pageId}, ${requestId})`,
          `/docs/${segment(docId)}/pages/${segment(pageId)}/export/${segment(requestId)}`,
          pageExportStatusSchema
        )
    }
  };

  readonly tables = {
    list: (docId: string, tableType: TableType): Observable<CodaTable> =>
      this.list(
        `tables.list(${docId}, ${tableType})`,
        `/docs/${segment(docId)}/tables`,
        { tableTypes: tableType },
        tableSchema
      ),
    get: (docId: string, tableId: string): Observable<CodaTable> =>
      this.get(`tables.get(${docId}, ${tableId})`, `/docs/${segment(docId)}/tables/${segment(tableId)}`, tableSchema)
  };

  readonly columns = {
    list: (docId: string, tableId: string): Observable<CodaColumn> =>
      this.list(
        `columns.list(${docId}, ${tableId})`,
        `/docs/${segment(docId)}/tables/${segment(tableId)}/columns`,
        {},
        columnSchema
      ),
    get: (docId: string, tableId: string, columnId: string): Observable<CodaColumn> =>
      this.get(
        `columns.get(${docId}, ${tableId}, ${columnId})`,
        `/docs/${segment(docId)}/tables/${segment(tableId)}/columns/${segment(columnId)}`,
        columnSchema
      )
  };

  readonly rows = {
    /**
     * Rows in server order with rich cell values; references stay unresolved.
     */
    list: (docId: string, tableId: string): Observable<CodaRow> =>
      this.list(
        `rows.list(${docId}, ${tableId})`,
        `/docs/${segment(docId)}/tables/${segment(tableId)}/rows`,
        { valueFormat: "rich" },
        rowSchema
      )
  };

  /**
   * Fetches a pre-signed export link as text, without the token.
   */
  download(url: string): Observable<string> {
    return this.execute("download", () => this.http.download(url, this.signal));
  }

  getRateLimiterStats() {
    return this.limiter.getStats();
  }

  private request(method: HttpMethod, path: string, params?: QueryParams, body?: unknown): Promise<unknown> {
    return this.http.request(method, path, params, body, this.signal);
  }

  private get<S extends z.ZodTypeAny>(operation: string, path: string, schema: S): Observable<z.output<S>> {
    return this.execute(operation, () => this.request("GET", path)).pipe(map(parse(schema, operation)));
  }

  private list<S extends z.ZodTypeAny>(
    operation: string,
    path: string,
    params: QueryParams,
    schema: S
  ): Observable<z.output<S>> {
    return paginate(
      operation,
      (pageToken) => this.execute(`${operation} page`, () => this.request("GET", path, { ...params, pageToken })),
      parse(schema, operation)
    );
  }

  /**
   * Runs one logical request under the retry policy.
   *
   * Each attempt first takes a slot from the shared rate limiter. A 429
   * pauses the limiter for every request of the run and retries; transient
   * failures back off exponentially; anything else surfaces at once.
   */
  private execute<T>(operation: string, fn: () => Promise<T>): Observable<T> {
    return defer(() => {
      let throttled = 0;
      let transient = 0;

      return defer(async () => {
        await this.limiter.waitForSlot(this.signal);
        return fn();
      }).pipe(
        retry({
          delay: (error: unknown) => {
            if (error instanceof RateLimitError && throttled < this.policy.maxRateLimitRetries) {
              throttled++;
              this.limiter.pause(error.retryAfterMs);
              log.warning(`Rate limited on ${operation}, pausing requests for ${error.retryAfterMs}ms`, {
                attempt: throttled
              });
              return of(null);
            }

            if (error instanceof TransientError && transient < this.policy.retries) {
              transient++;
              const wait = Math.min(this.policy.baseDelay * 2 ** (transient - 1), this.policy.maxDelay);
              log.debug(`Retrying ${operation} after ${wait}ms (attempt ${transient})`, { error: error.message });
              return from(delay(wait, this.signal));
            }

            return throwError(() => error);
          }
        })
      );
    });
  }
}
