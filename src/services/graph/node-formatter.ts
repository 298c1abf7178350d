/**
 * Renders one issue as a DOT node statement.
 *
 * Pure: no I/O, never throws. Empty fields render as empty cells.
 */

import he from "he";
import { DEFAULT_WRAP_WIDTH } from "../../config/graph-config.js";
import type { IssueRecord } from "../../types/issues.js";

// ============================================================================
// Priority Classification
// ============================================================================

export type PriorityTier = "p0" | "p1" | "p2" | "p3" | "unprioritized" | "other";

export interface PriorityRule {
  tier: PriorityTier;
  prefix: string;
  color: string;
}

/**
 * Ordered rules; the first case-sensitive prefix match wins.
 */
export const PRIORITY_RULES: readonly PriorityRule[] = [
  { tier: "p0", prefix: "P0", color: "#ff6b6b" },
  { tier: "p1", prefix: "P1", color: "#ffa94d" },
  { tier: "p2", prefix: "P2", color: "#ffe066" },
  { tier: "p3", prefix: "P3", color: "#b2f2bb" },
  { tier: "unprioritized", prefix: "Not", color: "#dee2e6" },
];

export const FALLBACK_PRIORITY: Omit<PriorityRule, "prefix"> = { tier: "other", color: "#ffffff" };

export function classifyPriority(priority: string): Omit<PriorityRule, "prefix"> {
  const rule = PRIORITY_RULES.find((r) => priority.startsWith(r.prefix));
  return rule ? { tier: rule.tier, color: rule.color } : FALLBACK_PRIORITY;
}

// ============================================================================
// Text helpers
// ============================================================================

/**
 * Greedy word wrap. Words longer than the width get a line of their own.
 */
export function wrapText(text: string, width: number = DEFAULT_WRAP_WIDTH): string[] {
  const words = text.split(/\s+/).filter((w) => w.length > 0);
  const lines: string[] = [];
  let current = "";
  for (const word of words) {
    if (current === "") {
      current = word;
    } else if (current.length + 1 + word.length <= width) {
      current = `${current} ${word}`;
    } else {
      lines.push(current);
      current = word;
    }
  }
  if (current !== "") lines.push(current);
  return lines;
}

/** Double-quoted DOT string. */
export function quoteDot(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

function escapeHtml(value: string): string {
  return he.escape(value);
}

// ============================================================================
// Node Rendering
// ============================================================================

export interface NodeFormatOptions {
  wrapWidth?: number;
}

export function formatNodeLabel(issue: IssueRecord, wrapWidth: number): string {
  const summary = wrapText(issue.summary, wrapWidth).map(escapeHtml).join("<br/>");
  return (
    `<table border="0" cellborder="0" cellspacing="2">` +
    `<tr><td align="left"><b>${escapeHtml(issue.id)}</b></td><td align="right">${escapeHtml(issue.priority)}</td></tr>` +
    `<tr><td colspan="2" align="left">${escapeHtml(issue.assignee)}</td></tr>` +
    `<tr><td colspan="2" align="left">${summary}</td></tr>` +
    `</table>`
  );
}

export function formatNode(issue: IssueRecord, options: NodeFormatOptions = {}): string {
  const { color } = classifyPriority(issue.priority);
  const label = formatNodeLabel(issue, options.wrapWidth ?? DEFAULT_WRAP_WIDTH);
  const url = quoteDot(issue.url);
  return `${quoteDot(issue.id)} [fillcolor="${color}", URL=${url}, tooltip=${url}, label=<${label}>];`;
}
