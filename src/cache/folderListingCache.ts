import type { Logger } from "../logger.js";
import type { FileStore } from "../stores/types.js";

/**
 * Folder Listing Cache
 *
 * Per-run cache of the names stored in each file-store folder.
 *
 * - Listings are paginated to completion; a truncated listing would let an
 *   already-stored attachment through as "new".
 * - An entry is dropped when a subfolder is created under that folder, since
 *   the earlier listing predates the creation.
 * - Names recorded during the run are merged into every later listing of the
 *   same folder, so a folder's set only ever grows.
 * - A failed listing is not cached; the caller gets the names recorded so far.
 */

export interface FolderListingCacheStats {
  hits: number;
  misses: number;
  invalidations: number;
  pagesFetched: number;
  folders: number;
}

export class FolderListingCache {
  private cache: Map<string, Set<string>>;
  private recorded: Map<string, Set<string>>;
  private stats: {
    hits: number;
    misses: number;
    invalidations: number;
    pagesFetched: number;
  };

  constructor(
    private readonly store: FileStore,
    private readonly logger: Logger
  ) {
    this.cache = new Map();
    this.recorded = new Map();
    this.stats = {
      hits: 0,
      misses: 0,
      invalidations: 0,
      pagesFetched: 0
    };
  }

  /**
   * All names currently known to exist in the folder.
   */
  async getNames(folderId: string): Promise<ReadonlySet<string>> {
    const cached = this.cache.get(folderId);
    if (cached) {
      this.stats.hits += 1;
      return cached;
    }
    this.stats.misses += 1;

    let names: Set<string>;
    try {
      names = await this.listAll(folderId);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`Failed to list existing files in folder ${folderId}: ${message}`);
      return new Set(this.recorded.get(folderId) ?? []);
    }

    for (const name of this.recorded.get(folderId) ?? []) {
      names.add(name);
    }
    this.cache.set(folderId, names);
    this.logger.info(`Found ${names.size} existing files in folder ${folderId}`);
    return names;
  }

  async has(folderId: string, name: string): Promise<boolean> {
    const names = await this.getNames(folderId);
    return names.has(name);
  }

  /**
   * Remember a name stored during this run.
   */
  record(folderId: string, name: string): void {
    let recorded = this.recorded.get(folderId);
    if (!recorded) {
      recorded = new Set();
      this.recorded.set(folderId, recorded);
    }
    recorded.add(name);
    this.cache.get(folderId)?.add(name);
  }

  invalidate(folderId: string): void {
    if (this.cache.delete(folderId)) {
      this.stats.invalidations += 1;
    }
  }

  getStats(): FolderListingCacheStats {
    return {
      hits: this.stats.hits,
      misses: this.stats.misses,
      invalidations: this.stats.invalidations,
      pagesFetched: this.stats.pagesFetched,
      folders: this.cache.size
    };
  }

  private async listAll(folderId: string): Promise<Set<string>> {
    const names = new Set<string>();
    const seenTokens = new Set<string>();
    let pageToken: string | undefined;

    // eslint-disable-next-line no-constant-condition
    while (true) {
      const page = await this.store.list(folderId, { pageToken, pageSize: 1000 });
      this.stats.pagesFetched += 1;
      for (const item of page.items) {
        names.add(item.name);
      }
      if (!page.nextPageToken) break;
      if (seenTokens.has(page.nextPageToken)) {
        throw new Error(`Listing of folder ${folderId} returned page token "${page.nextPageToken}" twice`);
      }
      seenTokens.add(page.nextPageToken);
      pageToken = page.nextPageToken;
    }

    return names;
  }
}
