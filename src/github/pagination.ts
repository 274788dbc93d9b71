import { debug } from "../logger.js";
import { JsonValue } from "../types.js";

/**
 * `exhausted`: every page was consumed. `closed`: the consumer stopped early.
 */
export type PageState = "idle" | "fetching" | "pausing" | "exhausted" | "closed" | "failed";

export interface Page {
  readonly items: readonly JsonValue[];
  readonly next?: string;
}

export type PageLoader = (url: string) => Promise<Page>;

/**
 * Extract the `rel="next"` target from a `Link` response header.
 */
export function parseNextLink(linkHeader: string | undefined): string | undefined {
  if (!linkHeader) {
    return undefined;
  }
  for (const part of linkHeader.split(",")) {
    const match = /<([^>]+)>\s*;(.*)/.exec(part.trim());
    const rel = match ? /\brel="?([^";]+)"?/.exec(match[2]) : null;
    if (match && rel && rel[1].trim().split(/\s+/).includes("next")) {
      return match[1];
    }
  }
  return undefined;
}

/**
 * Pull-based sequence over every item of a paginated listing.
 *
 * Pages are requested only as items are consumed and follow the server's
 * order. The sequence is single-use: iterating it a second time throws.
 */
export class PageSequence implements AsyncIterable<JsonValue> {
  private current: PageState = "idle";
  private failure?: unknown;
  private pages = 0;

  constructor(
    private readonly firstUrl: string,
    private readonly load: PageLoader,
    private readonly pause: () => Promise<number> = async () => 0
  ) {}

  get state(): PageState {
    return this.current;
  }

  get error(): unknown {
    return this.failure;
  }

  get pageCount(): number {
    return this.pages;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<JsonValue, void, undefined> {
    if (this.current !== "idle") {
      throw new Error(`Page sequence for ${this.firstUrl} cannot be restarted (state: ${this.current})`);
    }
    let url: string | undefined = this.firstUrl;
    let drained = false;
    try {
      while (url) {
        let page: Page;
        try {
          this.current = "pausing";
          await this.pause();
          this.current = "fetching";
          page = await this.load(url);
        } catch (cause) {
          this.current = "failed";
          this.failure = cause;
          throw cause;
        }
        this.pages += 1;
        debug(`Fetched page ${this.pages} (${page.items.length} items) from ${url}`);
        url = page.next;
        yield* page.items;
      }
      drained = true;
    } finally {
      if (this.state !== "failed") {
        this.current = drained ? "exhausted" : "closed";
      }
    }
  }

  /**
   * Consume the whole sequence into one ordered array.
   */
  async collect(): Promise<JsonValue[]> {
    const items: JsonValue[] = [];
    for await (const item of this) {
      items.push(item);
    }
    return items;
  }
}
