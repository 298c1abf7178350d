/**
 * Terminal output formatting for the issue-depgraph CLI.
 *
 * Status lines go to stderr; stdout is reserved for the DOT document
 * when --stdout is given.
 */

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
} as const;

export type StatStatus = "pass" | "warn" | "info" | "skip";

const STATUS_LABELS: Record<StatStatus, string> = {
  pass: `${COLORS.green}NODE${COLORS.reset}`,
  warn: `${COLORS.yellow}STOP${COLORS.reset}`,
  info: `${COLORS.blue}INFO${COLORS.reset}`,
  skip: `${COLORS.gray}SKIP${COLORS.reset}`,
};

export interface StatLine {
  name: string;
  status: StatStatus;
  message?: string;
}

export function printStat(line: StatLine): void {
  const label = STATUS_LABELS[line.status];
  const msg = line.message ? `  ${COLORS.dim}${line.message}${COLORS.reset}` : "";
  console.error(`  [${label}] ${line.name}${msg}`);
}

export function printHeader(text: string): void {
  console.error(`\n${COLORS.bold}${COLORS.cyan}${text}${COLORS.reset}`);
}

export function printSummary(counts: { nodes: number; edges: number; skipped: number; stopped: number }): void {
  console.error(`\n${COLORS.bold}Summary${COLORS.reset}`);
  const parts = [
    `${COLORS.green}${counts.nodes} nodes${COLORS.reset}`,
    `${COLORS.blue}${counts.edges} edges${COLORS.reset}`,
  ];
  if (counts.stopped) {
    parts.push(`${COLORS.yellow}${counts.stopped} stopped${COLORS.reset}`);
  }
  if (counts.skipped) {
    parts.push(`${COLORS.gray}${counts.skipped} skipped${COLORS.reset}`);
  }
  console.error(`  ${parts.join(", ")}`);
}

export function printSuccess(message: string): void {
  console.error(`${COLORS.green}${message}${COLORS.reset}`);
}

export function printError(message: string): void {
  console.error(`${COLORS.red}${message}${COLORS.reset}`);
}
