// ============================================================================
// Jira Client
// Issue source backed by the Jira REST API (v2, JSON)
// ============================================================================

import type { JiraSourceConfig } from "../config/graph-config.js";
import { JiraIssueResponseSchema, type JiraIssueResponse } from "../types/issue-schemas.js";
import type { IssueRecord } from "../types/issues.js";
import { FetchError, logDebug, logError, logInfo } from "../utils/index.js";
import type { IssueSource } from "./issue-source.js";

/** Only the fields the graph needs are requested. */
export const ISSUE_FIELDS = ["summary", "status", "priority", "assignee", "subtasks", "issuelinks"];

export function buildIssueUrl(baseUrl: string, issueId: string): string {
  const params = new URLSearchParams({ fields: ISSUE_FIELDS.join(",") });
  return `${baseUrl}/rest/api/2/issue/${encodeURIComponent(issueId)}?${params.toString()}`;
}

export function buildBrowseUrl(baseUrl: string, issueId: string): string {
  return `${baseUrl}/browse/${encodeURIComponent(issueId)}`;
}

/**
 * Maps a validated Jira payload onto an IssueRecord. Missing optional fields
 * become empty strings; only links that carry an outward issue are kept.
 */
export function toIssueRecord(payload: JiraIssueResponse, baseUrl: string): IssueRecord {
  const { fields } = payload;
  const missing: string[] = [];
  const pick = (name: string, value: string | null | undefined): string => {
    if (value === undefined || value === null) {
      missing.push(name);
      return "";
    }
    return value;
  };

  const record: IssueRecord = {
    id: payload.key,
    status: pick("status", fields.status?.name),
    priority: pick("priority", fields.priority?.name),
    assignee: pick("assignee", fields.assignee?.displayName ?? fields.assignee?.name),
    summary: pick("summary", fields.summary),
    subtasks: (fields.subtasks ?? []).map((s) => s.key),
    outwardLinks: (fields.issuelinks ?? []).flatMap((link) =>
      link.outwardIssue ? [link.outwardIssue.key] : []
    ),
    url: buildBrowseUrl(baseUrl, payload.key),
  };

  if (missing.length > 0) {
    logDebug("issue has missing fields", { issueId: payload.key, missing });
  }
  return record;
}

export class JiraIssueSource implements IssueSource {
  private readonly baseUrl: string;

  constructor(private readonly config: JiraSourceConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.config.user && this.config.apiToken) {
      const credentials = Buffer.from(`${this.config.user}:${this.config.apiToken}`).toString("base64");
      headers["Authorization"] = `Basic ${credentials}`;
    }
    return headers;
  }

  async fetchIssue(issueId: string): Promise<IssueRecord> {
    const url = buildIssueUrl(this.baseUrl, issueId);
    const startedAt = Date.now();
    logDebug("jira fetch start", { issueId });

    let response: Response;
    try {
      response = await fetch(url, {
        method: "GET",
        headers: this.buildHeaders(),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logError("jira fetch network error", { issueId, message, durationMs: Date.now() - startedAt });
      throw new FetchError(issueId, message);
    }

    if (!response.ok) {
      logError("jira fetch failed", { issueId, status: response.status, durationMs: Date.now() - startedAt });
      throw new FetchError(issueId, `HTTP ${response.status} ${response.statusText}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new FetchError(issueId, "Failed to parse JSON response");
    }

    const parsed = JiraIssueResponseSchema.safeParse(body);
    if (!parsed.success) {
      const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      throw new FetchError(issueId, "Unexpected issue payload", details);
    }

    logInfo("jira fetch success", { issueId, durationMs: Date.now() - startedAt });
    return toIssueRecord(parsed.data, this.baseUrl);
  }
}
