/**
 * Issue records as the graph builder sees them, independent of transport.
 */

// ============================================================================
// Issue Record
// ============================================================================

/**
 * One tracker issue. Textual fields the tracker omitted are empty strings.
 */
export interface IssueRecord {
  readonly id: string;
  /** Workflow status name as reported by the tracker (e.g. "Open", "Resolved") */
  readonly status: string;
  /** Priority name, e.g. "P1 - Critical" or "Not Prioritized" */
  readonly priority: string;
  readonly assignee: string;
  readonly summary: string;
  /** Targets of outward ("depends on"-style) links, in tracker order */
  readonly outwardLinks: readonly string[];
  /** Sub-task keys, in tracker order */
  readonly subtasks: readonly string[];
  /** Browse URL of the issue */
  readonly url: string;
}

/**
 * Statuses whose issues are dropped from the graph entirely.
 */
export const TERMINAL_STATUSES = ["closed", "resolved"] as const;

export function isTerminalStatus(status: string): boolean {
  const normalized = status.trim().toLowerCase();
  return TERMINAL_STATUSES.some((s) => s === normalized);
}
