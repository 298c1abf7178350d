// ============================================================================
// Issue Cache
// Read-if-exists / write-after-fetch cache of issue records on disk.
// Entries never expire.
// ============================================================================

import { existsSync } from "fs";
import { mkdir, readFile, writeFile } from "fs/promises";
import { join } from "path";
import { IssueRecordSchema } from "../types/issue-schemas.js";
import type { IssueRecord } from "../types/issues.js";
import { logDebug, logWarn } from "../utils/index.js";
import type { IssueSource } from "./issue-source.js";

/**
 * Issue keys are safe already; anything else is replaced so an id can
 * never escape the cache directory. Files are named after the requested id;
 * the record inside may carry the tracker's canonical key.
 */
export function getCacheFilename(issueId: string): string {
  return `${issueId.replace(/[^A-Za-z0-9._-]/g, "_")}.json`;
}

export class CachedIssueSource implements IssueSource {
  constructor(
    private readonly inner: IssueSource,
    private readonly cacheDir: string
  ) {}

  getCacheFilePath(issueId: string): string {
    return join(this.cacheDir, getCacheFilename(issueId));
  }

  private async readCached(issueId: string): Promise<IssueRecord | null> {
    const filePath = this.getCacheFilePath(issueId);
    if (!existsSync(filePath)) return null;

    try {
      const data: unknown = JSON.parse(await readFile(filePath, "utf-8"));
      const parsed = IssueRecordSchema.safeParse(data);
      if (parsed.success) {
        return parsed.data;
      }
      logWarn("ignoring invalid cache entry", { issueId, filePath });
    } catch (err) {
      logWarn("ignoring unreadable cache entry", {
        issueId,
        filePath,
        message: err instanceof Error ? err.message : String(err),
      });
    }
    return null;
  }

  private async writeCached(record: IssueRecord): Promise<void> {
    const filePath = this.getCacheFilePath(record.id);
    try {
      await mkdir(this.cacheDir, { recursive: true });
      await writeFile(filePath, JSON.stringify(record, null, 2), "utf-8");
    } catch (err) {
      logWarn("failed to write cache entry", {
        issueId: record.id,
        filePath,
        message: err instanceof Error ? err.message : String(err),
      });
    }
  }

  async fetchIssue(issueId: string): Promise<IssueRecord> {
    const cached = await this.readCached(issueId);
    if (cached) {
      logDebug("cache hit", { issueId });
      return cached;
    }

    const record = await this.inner.fetchIssue(issueId);
    await this.writeCached(record);
    return record;
  }
}
