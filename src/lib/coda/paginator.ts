import { EMPTY, Observable, ObservableInput, defer, from, lastValueFrom, throwError } from "rxjs";
import { concatMap, expand, map, toArray } from "rxjs/operators";
import { ProtocolError } from "../../shared/errors";
import { Page, listResponseSchema } from "./types";

export const DEFAULT_MAX_PAGES = 10_000;

export type PaginateOptions = {
  /**
   * Upper bound on pages fetched for one listing.
   */
  maxPages?: number;
};

/**
 * Streams every item of a cursor-paginated listing in server order.
 *
 * `fetchPage` receives the cursor of the previous response (undefined for the
 * first page) and resolves to the raw response body. The listing ends when a
 * response has no `nextPageToken`. Retries happen inside `fetchPage`, so each
 * page is emitted exactly once.
 *
 * @example
 * ```ts
 * const rows$ = paginate("rows.list", (pageToken) => http.request("GET", path, { pageToken }), parseRow);
 * ```
 */
export const paginate = <T>(
  operation: string,
  fetchPage: (pageToken?: string) => ObservableInput<unknown>,
  parseItem: (item: unknown) => T,
  options: PaginateOptions = {}
): Observable<T> =>
  defer(() => {
    const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
    const seen = new Set<string>();
    let fetched = 0;

    const fetchNext = (pageToken?: string): Observable<Page<T>> =>
      defer(() => {
        if (fetched >= maxPages) {
          return throwError(
            () => new ProtocolError(`${operation} exceeded ${maxPages} pages`, { operation, maxPages })
          );
        }
        fetched++;

        return from(fetchPage(pageToken)).pipe(map((body) => toPage(operation, body, parseItem, seen)));
      });

    return fetchNext().pipe(
      expand((page) => (page.nextPageToken === undefined ? EMPTY : fetchNext(page.nextPageToken))),
      concatMap((page) => from(page.items))
    );
  });

const toPage = <T>(operation: string, body: unknown, parseItem: (item: unknown) => T, seen: Set<string>): Page<T> => {
  const parsed = listResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new ProtocolError(`${operation} returned a malformed page`, {
      operation,
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    });
  }

  const nextPageToken = parsed.data.nextPageToken ? parsed.data.nextPageToken : undefined;
  if (nextPageToken !== undefined) {
    if (seen.has(nextPageToken)) {
      throw new ProtocolError(`${operation} repeated page token ${nextPageToken}`, { operation, nextPageToken });
    }
    seen.add(nextPageToken);
  }

  return { items: parsed.data.items.map(parseItem), nextPageToken };
};

/**
 * Drains a listing into an array.
 */
export const collectAll = <T>(source: Observable<T>): Promise<T[]> => lastValueFrom(source.pipe(toArray()));
