/**
 * Existing-State Index
 *
 * In-memory, per-run view of what the three stores already hold:
 * - stored names per file-store folder (delegated to FolderListingCache)
 * - content keys present in the dataset
 * - source file names recorded in the dataset
 *
 * It is seeded from remote snapshots and only grows during a run, so anything
 * admitted earlier in the run is seen as a duplicate later in the same run.
 */

import { FolderListingCache } from "../cache/folderListingCache.js";
import type { Logger } from "../logger.js";
import type { FileStore } from "../stores/types.js";
import type { CellValue, ColumnMatchers } from "../types.js";
import { buildContentKeyIndex, buildProcessedSourceFileIndex } from "./datasetIndexes.js";

export class ExistingStateIndex {
  readonly folders: FolderListingCache;
  private contentKeys: Set<string> = new Set();
  private processedSourceFiles: Set<string> = new Set();

  constructor(files: FileStore, private readonly logger: Logger) {
    this.folders = new FolderListingCache(files, logger);
  }

  /**
   * Load content keys and source file names from a full dataset read.
   * Adds to whatever is already indexed; never removes.
   */
  seedFromDataset(values: CellValue[][], matchers: ColumnMatchers, sourceFileHeader: string): void {
    for (const key of buildContentKeyIndex(values, matchers, this.logger)) {
      this.contentKeys.add(key);
    }
    for (const name of buildProcessedSourceFileIndex(values, sourceFileHeader, this.logger)) {
      this.processedSourceFiles.add(name);
    }
  }

  hasStoredName(folderId: string, name: string): Promise<boolean> {
    return this.folders.has(folderId, name);
  }

  recordStoredName(folderId: string, name: string): void {
    this.folders.record(folderId, name);
  }

  /**
   * A new subfolder shadows the parent's earlier listing.
   */
  noteFolderCreated(parentId: string): void {
    this.folders.invalidate(parentId);
  }

  hasContentKey(key: string): boolean {
    return this.contentKeys.has(key);
  }

  addContentKey(key: string): void {
    this.contentKeys.add(key);
  }

  hasSourceFile(name: string): boolean {
    return this.processedSourceFiles.has(name);
  }

  addSourceFile(name: string): void {
    this.processedSourceFiles.add(name);
  }

  getStats(): { contentKeys: number; sourceFiles: number; folderCache: ReturnType<FolderListingCache["getStats"]> } {
    return {
      contentKeys: this.contentKeys.size,
      sourceFiles: this.processedSourceFiles.size,
      folderCache: this.folders.getStats()
    };
  }
}
