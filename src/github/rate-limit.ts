import pLimit from "p-limit";
import { NET } from "../config.js";
import { debug } from "../logger.js";
import { sleep } from "../utils/http.js";

const RESET_GRACE_MS = 1000;

export interface RateLimitInfo {
  readonly limit?: number;
  readonly remaining?: number;
  readonly reset?: number;
}

export interface RateLimitGateOptions {
  readonly threshold?: number;
  readonly sleep?: (delayMs: number) => Promise<void>;
  readonly now?: () => number;
}

function parseHeaderNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}

export function parseRateLimit(headers: Record<string, string>): RateLimitInfo {
  return {
    limit: parseHeaderNumber(headers["x-ratelimit-limit"]),
    remaining: parseHeaderNumber(headers["x-ratelimit-remaining"]),
    reset: parseHeaderNumber(headers["x-ratelimit-reset"])
  };
}

/**
 * Single decision point for quota backpressure shared by every request of a run.
 *
 * Responses feed `observe`; requests wait on `acquire`. Decisions are serialised,
 * so concurrent callers never stack independent pauses.
 */
export class RateLimitGate {
  private remaining?: number;
  private reset?: number;
  private limit?: number;
  private readonly threshold: number;
  private readonly pause: (delayMs: number) => Promise<void>;
  private readonly now: () => number;
  private readonly queue = pLimit(1);

  constructor(options: RateLimitGateOptions = {}) {
    this.threshold = options.threshold ?? NET.RATE_LIMIT_THRESHOLD;
    this.pause = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * Record quota headers from a response. Within one quota window the lowest
   * remaining value wins; a new reset time starts a new window.
   */
  observe(headers: Record<string, string>): void {
    const info = parseRateLimit(headers);
    const newWindow = info.reset !== undefined && info.reset !== this.reset;
    if (info.remaining !== undefined) {
      this.remaining =
        this.remaining === undefined || newWindow ? info.remaining : Math.min(this.remaining, info.remaining);
    }
    if (info.reset !== undefined) {
      this.reset = info.reset;
    }
    if (info.limit !== undefined) {
      this.limit = this.limit ?? info.limit;
    }
  }

  /**
   * Wait until a request may be issued.
   *
   * @returns Milliseconds spent pausing; 0 when no pause was needed.
   */
  acquire(): Promise<number> {
    return this.queue(async () => {
      if (this.remaining === undefined || this.remaining > this.threshold) {
        return 0;
      }
      const resetMs = (this.reset ?? 0) * 1000;
      const waitMs = Math.max(0, resetMs - this.now()) + RESET_GRACE_MS;
      debug(`Rate limit low (remaining ${this.remaining}), pausing ${waitMs}ms until reset.`);
      await this.pause(waitMs);
      this.remaining = undefined;
      this.reset = undefined;
      return waitMs;
    });
  }

  snapshot(): RateLimitInfo {
    return { limit: this.limit, remaining: this.remaining, reset: this.reset };
  }
}
