import axios, { AxiosError, AxiosInstance, AxiosResponse, Method } from "axios";
import { NET } from "../config.js";
import { debug } from "../logger.js";
import { JsonValue } from "../types.js";

const RETRY_ATTEMPTS = 3;
const RETRY_BASE_DELAY_MS = 500;
const RETRYABLE_CODES = new Set(["ECONNRESET", "ETIMEDOUT", "ECONNABORTED", "EAI_AGAIN"]);

const httpClient: AxiosInstance = axios.create({
  timeout: NET.TIMEOUT,
  maxRedirects: 5,
  // Status handling belongs to the callers; only transport failures reject.
  validateStatus: () => true,
  headers: {
    "User-Agent": "repo-activity-digest/1.0",
    Accept: "application/json"
  }
});

export interface HttpRequest {
  readonly url: string;
  readonly method?: Method;
  readonly headers?: Record<string, string>;
  readonly body?: JsonValue;
}

export interface HttpResponse {
  readonly status: number;
  readonly data: JsonValue;
  readonly headers: Record<string, string>;
}

export function sleep(delayMs: number): Promise<void> {
  return new Promise(resolve => {
    setTimeout(resolve, delayMs);
  });
}

function normaliseHeaders(headers: AxiosResponse["headers"]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (Array.isArray(value)) {
      out[key.toLowerCase()] = value.join(", ");
    } else if (typeof value === "string") {
      out[key.toLowerCase()] = value;
    } else if (typeof value === "number") {
      out[key.toLowerCase()] = String(value);
    }
  }
  return out;
}

async function executeWithRetry<T>(operation: () => Promise<AxiosResponse<T>>, attempt: number): Promise<AxiosResponse<T>> {
  try {
    return await operation();
  } catch (rawError) {
    const nextAttempt = attempt + 1;
    if (!(rawError instanceof AxiosError) || nextAttempt >= RETRY_ATTEMPTS) {
      throw rawError;
    }
    // A response means the server answered; statuses are never retried here.
    if (rawError.response || !rawError.code || !RETRYABLE_CODES.has(rawError.code)) {
      throw rawError;
    }
    const backoff = RETRY_BASE_DELAY_MS * 2 ** attempt;
    debug(`HTTP retry (${nextAttempt}/${RETRY_ATTEMPTS}) after ${backoff}ms for ${rawError.config?.url ?? "unknown-url"}`);
    await sleep(backoff);
    return executeWithRetry(operation, nextAttempt);
  }
}

/**
 * Issue one HTTP request and return status, JSON body and lower-cased headers.
 *
 * Never rejects on an HTTP status; rejects only when no response arrived after retries.
 */
export async function send(request: HttpRequest): Promise<HttpResponse> {
  const response = await executeWithRetry(
    () =>
      httpClient.request<JsonValue>({
        url: request.url,
        method: request.method ?? "GET",
        headers: request.headers,
        data: request.body
      }),
    0
  );
  return {
    status: response.status,
    data: response.data === "" ? null : response.data,
    headers: normaliseHeaders(response.headers)
  };
}

export { httpClient };
