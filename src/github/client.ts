import { Method } from "axios";
import { GITHUB } from "../config.js";
import { ApiError, errorForStatus } from "../errors.js";
import { debug } from "../logger.js";
import { JsonValue } from "../types.js";
import { send } from "../utils/http.js";
import { PageSequence, parseNextLink, Page } from "./pagination.js";
import { parseRateLimit, RateLimitGate } from "./rate-limit.js";

export type HttpMethod = Extract<Method, "GET" | "POST" | "PATCH" | "PUT" | "DELETE">;

export interface RequestOptions {
  /** Explicit credential; wins over the client's ambient token. */
  readonly token?: string;
  readonly method?: HttpMethod;
  readonly body?: JsonValue;
}

export interface GitHubClientOptions {
  readonly token?: string;
  readonly baseUrl?: string;
  readonly gate?: RateLimitGate;
}

interface Exchange {
  readonly data: JsonValue;
  readonly next?: string;
}

/**
 * Pick the credential for one request: explicit first, then ambient, else none.
 */
export function resolveToken(explicit?: string, ambient?: string): string | undefined {
  if (explicit) {
    return explicit;
  }
  return ambient ? ambient : undefined;
}

/**
 * Authenticated, paginated and rate-limit-aware accessor for the REST API.
 *
 * 404 answers read as "nothing there" and come back empty; 401, 403 and every
 * other non-2xx status are thrown as {@link ApiError} subclasses.
 */
export class GitHubClient {
  readonly gate: RateLimitGate;
  private readonly ambientToken?: string;
  private readonly baseUrl: string;

  constructor(options: GitHubClientOptions = {}) {
    this.ambientToken = options.token;
    this.baseUrl = (options.baseUrl ?? GITHUB.API_BASE).replace(/\/+$/, "");
    this.gate = options.gate ?? new RateLimitGate();
  }

  /**
   * Request an endpoint. A list answer is followed through every `rel="next"`
   * page and returned whole; any other answer is returned as is.
   */
  async fetch(endpoint: string, options: RequestOptions = {}): Promise<JsonValue[] | JsonValue> {
    const single: { found: boolean; data: JsonValue } = { found: false, data: null };
    const items = await this.sequence(endpoint, options, data => {
      single.found = true;
      single.data = data;
    }).collect();
    return single.found ? single.data : items;
  }

  /**
   * Fetch every item of a listing endpoint.
   */
  async list(endpoint: string, options: RequestOptions = {}): Promise<JsonValue[]> {
    return this.pages(endpoint, options).collect();
  }

  /**
   * Lazy, single-use sequence over a listing endpoint.
   */
  pages(endpoint: string, options: RequestOptions = {}): PageSequence {
    return this.sequence(endpoint, options);
  }

  /**
   * A 404 on the first page reads as an empty listing; on a later page the
   * listing can no longer be completed and it is an error. A non-list first
   * answer goes to `onRecord` when given, else it is an error.
   */
  private sequence(endpoint: string, options: RequestOptions, onRecord?: (data: JsonValue) => void): PageSequence {
    let first = true;
    const load = async (url: string): Promise<Page> => {
      const isFirst = first;
      first = false;
      const result = await this.exchange(url, options);
      if (result === null) {
        if (isFirst) {
          return { items: [] };
        }
        throw new ApiError(`Page ${url} of a listing was not found`, url, 404);
      }
      if (!Array.isArray(result.data)) {
        if (isFirst && onRecord) {
          onRecord(result.data);
          return { items: [] };
        }
        throw new ApiError(`Expected a list from ${url}`, url, 200);
      }
      return { items: result.data, next: result.next };
    };
    return new PageSequence(endpoint, load, () => this.gate.acquire());
  }

  private resolveUrl(endpoint: string): string {
    if (/^https?:\/\//i.test(endpoint)) {
      return endpoint;
    }
    return `${this.baseUrl}${endpoint.startsWith("/") ? "" : "/"}${endpoint}`;
  }

  /**
   * One request/response round trip. The page sequence acquires the gate first.
   *
   * @returns null for 404.
   */
  private async exchange(endpoint: string, options: RequestOptions): Promise<Exchange | null> {
    const url = this.resolveUrl(endpoint);
    const method = options.method ?? "GET";
    const token = resolveToken(options.token, this.ambientToken);
    const headers: Record<string, string> = {
      Accept: "application/vnd.github+json",
      "X-GitHub-Api-Version": GITHUB.API_VERSION
    };
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }
    const response = await send({ url, method, headers, body: options.body });
    this.gate.observe(response.headers);
    debug(`${method} ${url} -> ${response.status}`);

    if (response.status === 404) {
      return null;
    }
    if (response.status < 200 || response.status >= 300) {
      const quota = parseRateLimit(response.headers);
      throw errorForStatus(url, response.status, quota.remaining, quota.reset);
    }
    return { data: response.data, next: parseNextLink(response.headers.link) };
  }
}
