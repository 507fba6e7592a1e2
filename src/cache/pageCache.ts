import { LRUCache } from "lru-cache";
import type { LoadPageRequest, PageLoader } from "../documents/client.js";
import type { Page } from "../documents/document.js";

/**
 * Short-lived cache for offset pages in front of a loader. Cursor requests
 * always go to the engine.
 */
export class CachingPageLoader implements PageLoader {
  private readonly cache: LRUCache<string, Page> | undefined;

  constructor(
    private readonly loader: PageLoader,
    options: { maxEntries: number; ttlMs: number }
  ) {
    this.cache =
      options.ttlMs > 0 ? new LRUCache<string, Page>({ max: options.maxEntries, ttl: options.ttlMs }) : undefined;
  }

  async loadPage(request: LoadPageRequest): Promise<Page> {
    if (!this.cache || request.cursor !== undefined) {
      return this.loader.loadPage(request);
    }

    const key = JSON.stringify([request.index ?? "", request.offset, request.size]);
    const cached = this.cache.get(key);
    if (cached) return { ...cached, documents: [...cached.documents] };

    const page = await this.loader.loadPage(request);
    this.cache.set(key, { ...page, documents: [...page.documents] });
    return page;
  }
}
