/**
 * Traversal engine: discovers the open-issue subgraph reachable from a root.
 *
 * A single FIFO worklist is processed iteratively. The visited gate at the top
 * of the loop is the only deduplication point, so every id reaches the issue
 * source at most once per run no matter how many paths lead to it. All state
 * lives on the traversal instance; nothing is shared between runs.
 *
 * Identity is the id the source answers with. A worklist id the source
 * reports under another key is recorded as an alias of that key, so an
 * issue reached through both is fetched and rendered once and links to
 * the alias resolve to the canonical node.
 */

import type { IssueSource } from "../issue-source.js";
import type { IssueRecord } from "../../types/issues.js";
import { isTerminalStatus } from "../../types/issues.js";
import type { LinkTable, SkippedIssue, TraversalResult } from "../../types/graph.js";
import { logDebug, logInfo } from "../../utils/logger.js";
import { formatNode, type NodeFormatOptions } from "./node-formatter.js";

export interface TraversalOptions extends NodeFormatOptions {
  rootId: string;
  /** Ids rendered as leaves: their children are neither recorded nor fetched */
  stopIds?: Iterable<string>;
  /** Node renderer; defaults to formatNode */
  renderNode?: (issue: IssueRecord) => string;
}

export class IssueTraversal {
  private readonly worklist: string[];
  private head = 0;
  private readonly visited = new Set<string>();
  private readonly aliases = new Map<string, string>();
  private readonly stopIds: ReadonlySet<string>;
  private readonly renderNode: (issue: IssueRecord) => string;

  private readonly nodes: string[] = [];
  private readonly retained = new Set<string>();
  private readonly links: LinkTable = new Map();
  private readonly fetched: string[] = [];
  private readonly skipped: SkippedIssue[] = [];
  private readonly stopped: string[] = [];
  private processedCount = 0;

  constructor(
    private readonly source: IssueSource,
    private readonly options: TraversalOptions
  ) {
    this.worklist = [options.rootId];
    this.stopIds = new Set(options.stopIds ?? []);
    this.renderNode =
      options.renderNode ?? ((issue) => formatNode(issue, { wrapWidth: options.wrapWidth }));
  }

  private next(): string | undefined {
    if (this.head >= this.worklist.length) return undefined;
    const id = this.worklist[this.head];
    this.head++;
    return id;
  }

  /** Canonical id for a worklist id, once the source has answered for it. */
  private resolve(id: string): string {
    return this.aliases.get(id) ?? id;
  }

  private visit(requestedId: string, issue: IssueRecord): void {
    const { id } = issue;

    if (isTerminalStatus(issue.status)) {
      this.skipped.push({ id, status: issue.status });
      logDebug("skipping issue", { issueId: id, status: issue.status });
      return;
    }

    this.nodes.push(this.renderNode(issue));
    this.retained.add(id);
    this.processedCount++;

    if (this.stopIds.has(id) || this.stopIds.has(requestedId)) {
      this.stopped.push(id);
      logDebug("stop issue reached, not expanding", { issueId: id });
      return;
    }

    const children = [...issue.subtasks, ...issue.outwardLinks];
    this.links.set(id, children);
    for (const child of children) {
      this.worklist.push(child);
    }
    logDebug("issue processed", { issueId: id, children: children.length });
  }

  /**
   * Runs the walk to completion. A fetch failure rejects immediately and
   * leaves no usable result.
   */
  async run(): Promise<TraversalResult> {
    let id = this.next();
    while (id !== undefined) {
      if (!this.visited.has(this.resolve(id))) {
        this.visited.add(id);
        const issue = await this.source.fetchIssue(id);
        this.fetched.push(id);
        // The source may answer under a canonical key (case, moved issue).
        if (issue.id !== id) {
          this.aliases.set(id, issue.id);
          logDebug("issue answered under another key", { requested: id, issueId: issue.id });
        }
        if (!this.visited.has(issue.id) || issue.id === id) {
          this.visited.add(issue.id);
          this.visit(id, issue);
        }
      }
      id = this.next();
    }

    logInfo("traversal complete", {
      rootId: this.options.rootId,
      processed: this.processedCount,
      fetched: this.fetched.length,
      skipped: this.skipped.length,
    });

    return {
      rootId: this.options.rootId,
      nodes: [...this.nodes],
      retained: new Set(this.retained),
      links: new Map(
        [...this.links].map(([source, targets]): [string, string[]] => [source, targets.map((t) => this.resolve(t))])
      ),
      fetched: [...this.fetched],
      aliases: new Map(this.aliases),
      skipped: [...this.skipped],
      stopped: [...this.stopped],
      processedCount: this.processedCount,
    };
  }
}

export function traverseIssues(source: IssueSource, options: TraversalOptions): Promise<TraversalResult> {
  return new IssueTraversal(source, options).run();
}
