/**
 * Personio HTTP gateway: the single choke point for outbound API calls.
 *
 * Calls to the API origin carry a bearer token from the TokenProvider. Every
 * call gets a per-attempt timeout and bounded retries with exponential backoff
 * for transient failures (network errors and timeouts, including while the
 * body is read, 5xx, 429). A 401 from the API forces one token refresh and
 * one repeat of the call.
 */

import { z } from "zod";
import type { Logger } from "pino";
import { APIError, errorMessage } from "../errors.js";
import type { TokenSource } from "./auth.js";
import type { PersonioPage } from "./types.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface RequestOptions {
  params?: QueryParams;
  body?: unknown;
  accept?: string;
}

export interface GatewayOptions {
  baseUrl: string;
  tokens: TokenSource;
  timeoutMs: number;
  retryMaxAttempts: number;
  logger: Logger;
  pageSize?: number;
  maxPages?: number;
  /** Backoff wait; injected by tests. */
  sleep?: (ms: number) => Promise<void>;
  /** Jitter source in [0, 1). */
  random?: () => number;
}

const BASE_BACKOFF_MS = 500;
const MAX_BACKOFF_MS = 30_000;
const JITTER_MS = 250;
const DEFAULT_PAGE_SIZE = 100;
/** Safety bound; exceeding it is an error rather than a silent truncation. */
const DEFAULT_MAX_PAGES = 1000;

const metaSchema = z
  .object({
    current_page: z.number().optional(),
    total_pages: z.number().optional(),
    links: z
      .object({
        next: z.object({ href: z.string().optional() }).passthrough().nullable().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const envelopeSchema = z
  .object({
    data: z.unknown().optional(),
    _data: z.unknown().optional(),
    metadata: metaSchema.nullable().optional(),
    _meta: metaSchema.nullable().optional(),
  })
  .passthrough();

interface PageEnvelope {
  items: unknown[];
  /** Non-list payload: one item, no continuation. */
  single: boolean;
  nextHref?: string;
  currentPage?: number;
  totalPages?: number;
}

export class PersonioGateway {
  private readonly baseUrl: string;
  private readonly pageSize: number;
  private readonly maxPages: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(private readonly options: GatewayOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.random = options.random ?? Math.random;
  }

  /** Issue one logical call and return the parsed JSON body. */
  async request(
    method: HttpMethod,
    endpoint: string,
    options: RequestOptions = {}
  ): Promise<unknown> {
    const { status, body } = await this.send(method, endpoint, options, (res) => res.text());
    if (!body) return undefined;
    try {
      return JSON.parse(body);
    } catch (err) {
      throw new APIError(`Personio response for ${endpoint} was not valid JSON`, {
        endpoint,
        status,
        cause: err,
      });
    }
  }

  /** Fetch a binary payload (document download). */
  async download(endpoint: string): Promise<Buffer> {
    const { body } = await this.send("GET", endpoint, { accept: "*/*" }, async (res) =>
      Buffer.from(await res.arrayBuffer())
    );
    return body;
  }

  /**
   * Walk a paginated collection, yielding pages in server order.
   * Any unrecoverable failure aborts the whole sequence; restarting means
   * calling paginate again with the same params.
   */
  async *paginate(endpoint: string, params: QueryParams = {}): AsyncGenerator<PersonioPage> {
    const limit = Number(params.limit ?? this.pageSize);
    let offset = Number(params.offset ?? 0);
    let target: { endpoint: string; params?: QueryParams } = {
      endpoint,
      params: { ...params, limit, offset },
    };

    for (let index = 0; ; index++) {
      const body = await this.request("GET", target.endpoint, { params: target.params });
      const page = readEnvelope(body, endpoint);
      if (page.items.length === 0) return;
      if (index >= this.maxPages) {
        throw new APIError(
          `Pagination for ${endpoint} exceeded ${this.maxPages} pages`,
          { endpoint }
        );
      }

      this.options.logger.debug(
        { endpoint, page: index + 1, items: page.items.length },
        "Fetched page"
      );
      yield { endpoint, index, items: page.items };

      if (page.single) return;
      if (page.nextHref) {
        target = { endpoint: page.nextHref };
        continue;
      }
      if (page.currentPage !== undefined && page.totalPages !== undefined) {
        if (page.currentPage >= page.totalPages) return;
      } else if (page.items.length < limit) {
        return;
      }
      offset += page.items.length;
      target = { endpoint, params: { ...params, limit, offset } };
    }
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  /**
   * One logical call with retries. The body is read by `read` inside the
   * attempt, so a connection drop or timeout mid-body is retried like any
   * other network error.
   */
  private async send<T>(
    method: HttpMethod,
    endpoint: string,
    options: RequestOptions,
    read: (res: Response) => Promise<T>
  ): Promise<{ status: number; body: T }> {
    const { tokens, timeoutMs, retryMaxAttempts, logger } = this.options;
    const url = this.buildUrl(endpoint, options.params);
    // The bearer token only goes to the API's own origin, never to hosts
    // named in response data (presigned download URLs, next links).
    const authorised = new URL(url).origin === new URL(this.baseUrl).origin;
    let attempts = 0;
    let reauthenticated = false;

    const retryNetworkError = async (err: unknown, stage: string): Promise<void> => {
      if (attempts >= retryMaxAttempts) {
        throw new APIError(
          `Network error ${stage} ${endpoint} after ${attempts} attempts: ${errorMessage(err)}`,
          { endpoint, attempts, cause: err }
        );
      }
      const delayMs = this.backoff(attempts);
      logger.warn(
        { endpoint, attempt: attempts, delayMs, err: errorMessage(err) },
        "Network error, retrying"
      );
      await this.sleep(delayMs);
    };

    for (;;) {
      const credential = authorised ? await tokens.getValidToken() : undefined;
      attempts += 1;

      const headers: Record<string, string> = {
        Accept: options.accept ?? "application/json",
      };
      if (credential) headers.Authorization = `Bearer ${credential.accessToken}`;
      if (options.body !== undefined) headers["Content-Type"] = "application/json";

      let res: Response;
      try {
        res = await fetch(url, {
          method,
          headers,
          body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (err) {
        await retryNetworkError(err, "calling");
        continue;
      }

      if (res.ok) {
        try {
          return { status: res.status, body: await read(res) };
        } catch (err) {
          await retryNetworkError(err, "reading response from");
          continue;
        }
      }

      const bodyText = await res.text().catch(() => "");

      if (res.status === 401 && credential) {
        if (reauthenticated) {
          throw new APIError(`Personio rejected a freshly issued token for ${endpoint}`, {
            endpoint,
            status: 401,
            attempts,
          });
        }
        reauthenticated = true;
        // The repeat after a refresh does not consume a transient attempt.
        attempts -= 1;
        logger.info({ endpoint }, "Access token rejected, refreshing");
        await tokens.forceRefresh(credential.accessToken);
        continue;
      }

      if (isRetryableStatus(res.status)) {
        if (attempts >= retryMaxAttempts) {
          throw new APIError(
            `Personio API error for ${endpoint}: ${res.status} after ${attempts} attempts`,
            { endpoint, status: res.status, attempts }
          );
        }
        const hinted =
          res.status === 429 ? parseRetryAfter(res.headers.get("retry-after")) : undefined;
        const delayMs = hinted ?? this.backoff(attempts);
        logger.warn(
          { endpoint, status: res.status, attempt: attempts, delayMs },
          res.status === 429 ? "Rate limited, retrying" : "Server error, retrying"
        );
        await this.sleep(delayMs);
        continue;
      }

      throw new APIError(`Personio API error for ${endpoint}: ${res.status} ${bodyText}`, {
        endpoint,
        status: res.status,
        attempts,
      });
    }
  }

  private buildUrl(endpoint: string, params?: QueryParams): string {
    let url: URL;
    if (/^https?:\/\//i.test(endpoint)) {
      url = new URL(endpoint);
    } else {
      const path = endpoint.replace(/^\/+/, "");
      const versioned = /^v\d+\//.test(path) ? path : `v1/${path}`;
      url = new URL(`${this.baseUrl}/${versioned}`);
    }
    for (const [key, value] of Object.entries(params ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private backoff(attempt: number): number {
    const exponential = Math.min(MAX_BACKOFF_MS, BASE_BACKOFF_MS * 2 ** (attempt - 1));
    return exponential + Math.floor(this.random() * JITTER_MS);
  }
}

export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * Retry-After is either delta-seconds or an HTTP date.
 * Returns milliseconds, or undefined when the header is absent or unparsable.
 */
export function parseRetryAfter(value: string | null, now = Date.now()): number | undefined {
  if (value === null || value.trim() === "") return undefined;
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.ceil(Number(trimmed) * 1000);
  }
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - now);
}

function readEnvelope(body: unknown, endpoint: string): PageEnvelope {
  if (Array.isArray(body)) return { items: body, single: false };

  const parsed = envelopeSchema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new APIError(`Unexpected page shape from ${endpoint}: ${parsed.error.message}`, {
      endpoint,
    });
  }

  const payload = parsed.data.data ?? parsed.data._data;
  const meta = parsed.data.metadata ?? parsed.data._meta ?? undefined;

  if (payload === undefined || payload === null) return { items: [], single: false };
  if (!Array.isArray(payload)) return { items: [payload], single: true };

  return {
    items: payload,
    single: false,
    nextHref: meta?.links?.next?.href || undefined,
    currentPage: meta?.current_page,
    totalPages: meta?.total_pages,
  };
}
