import axios, { AxiosAdapter, AxiosHeaders, AxiosInstance, AxiosResponse, isCancel } from "axios";
import { z } from "zod";
import {
  AuthError,
  CancelledError,
  ErrorFactory,
  RateLimitError,
  RequestError,
  TransientError
} from "../../shared/errors";
import { log } from "../log";
import { HttpMethod, QueryParams } from "./types";

export const DEFAULT_BASE_URL = "https://coda.io/apis/v1";

/**
 * Wait applied to a 429 that carries no usable `Retry-After`.
 */
export const DEFAULT_RETRY_AFTER_MS = 60_000;

export type CodaHttpConfig = {
  token: string;
  baseUrl?: string;
  /**
   * Per-attempt timeout in milliseconds.
   */
  timeout?: number;
  /**
   * Replaces the network transport (tests install an in-process fake here).
   */
  adapter?: AxiosAdapter;
};

const remoteErrorSchema = z.object({ message: z.string() }).passthrough();

/**
 * Converts a `Retry-After` header (delta seconds or an HTTP date) to
 * milliseconds.
 */
export const parseRetryAfter = (value: unknown, now: number = Date.now()): number => {
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.max(0, value * 1000);
  }

  if (typeof value !== "string" || value.trim() === "") {
    return DEFAULT_RETRY_AFTER_MS;
  }

  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return DEFAULT_RETRY_AFTER_MS;
  }

  return Math.max(0, date - now);
};

const headerValue = (response: AxiosResponse<unknown>, name: string): unknown => {
  const { headers } = response;
  if (headers instanceof AxiosHeaders) {
    return headers.get(name);
  }
  return headers[name];
};

/**
 * Single-attempt transport for the Coda API.
 *
 * Every response is turned into either the parsed body or one of the typed
 * request errors; retrying is the caller's business.
 */
export class CodaHttp {
  private readonly api: AxiosInstance;
  private readonly downloads: AxiosInstance;

  constructor(config: CodaHttpConfig) {
    const timeout = config.timeout ?? 30_000;

    this.api = axios.create({
      baseURL: config.baseUrl ?? DEFAULT_BASE_URL,
      timeout,
      headers: {
        Authorization: `Bearer ${config.token}`,
        Accept: "application/json"
      },
      validateStatus: () => true,
      adapter: config.adapter
    });

    // Download links are pre-signed; they must not receive the token.
    this.downloads = axios.create({
      timeout,
      responseType: "text",
      validateStatus: () => true,
      adapter: config.adapter
    });
  }

  async request(
    method: HttpMethod,
    path: string,
    params?: QueryParams,
    body?: unknown,
    signal?: AbortSignal
  ): Promise<unknown> {
    const operation = `${method} ${path}`;
    log.trace(`Executing Coda API call: ${operation}`, params);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.api.request<unknown>({ method, url: path, params, data: body, signal });
    } catch (error) {
      throw this.convert(error, operation);
    }

    return this.classify(operation, response, true);
  }

  async download(url: string, signal?: AbortSignal): Promise<string> {
    const operation = "GET <download link>";
    log.trace("Downloading page export", { url });

    let response: AxiosResponse<unknown>;
    try {
      response = await this.downloads.get<unknown>(url, { signal });
    } catch (error) {
      throw this.convert(error, operation);
    }

    const body = this.classify(operation, response, false);
    return typeof body === "string" ? body : JSON.stringify(body);
  }

  private convert(error: unknown, operation: string): unknown {
    if (isCancel(error)) {
      return new CancelledError(`Run was cancelled during ${operation}`, { operation });
    }
    return ErrorFactory.fromAxiosError(error, operation);
  }

  /**
   * `authenticated` is false for pre-signed links, where a 401/403 means the
   * link expired rather than the token being rejected.
   */
  private classify(operation: string, response: AxiosResponse<unknown>, authenticated: boolean): unknown {
    const { status } = response;
    if (status >= 200 && status < 300) {
      return response.data;
    }

    const parsed = remoteErrorSchema.safeParse(response.data);
    const detail = parsed.success ? parsed.data.message : `HTTP ${status}`;
    const message = `${operation} failed with ${status}: ${detail}`;

    if (authenticated && (status === 401 || status === 403)) {
      throw new AuthError(message, { operation, status });
    }

    if (status === 429) {
      throw new RateLimitError(message, parseRetryAfter(headerValue(response, "retry-after")), { operation });
    }

    if (status === 408 || status >= 500) {
      throw new TransientError(message, status, { operation });
    }

    throw new RequestError(message, status, { operation });
  }
}
