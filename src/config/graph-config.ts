// ============================================================================
// Graph Configuration
// Run options and issue-source settings, validated with zod
// ============================================================================

import { z } from "zod";
import { ConfigurationError } from "../utils/errors.js";

export const DEFAULT_CACHE_DIR = ".issue-cache";
export const DEFAULT_WRAP_WIDTH = 32;
export const DEFAULT_TIMEOUT_MS = 30000;

// ============================================================================
// Schemas
// ============================================================================

export const GraphRunConfigSchema = z.object({
  rootId: z.string().trim().min(1, "Root issue is required"),
  stopIds: z.array(z.string().trim().min(1)).default([]),
  annotations: z.map(z.string(), z.string()).default(() => new Map()),
  cache: z.boolean().default(false),
  cacheDir: z.string().min(1).default(DEFAULT_CACHE_DIR),
  outDir: z.string().min(1).default("."),
  stdout: z.boolean().default(false),
  wrapWidth: z.number().int().min(8).default(DEFAULT_WRAP_WIDTH),
  verbose: z.boolean().default(false),
});

export const JiraSourceConfigSchema = z.object({
  baseUrl: z.string({ required_error: "Issue tracker base URL is required" }).url(),
  user: z.string().optional(),
  apiToken: z.string().optional(),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

export type GraphRunConfig = z.infer<typeof GraphRunConfigSchema>;
export type GraphRunConfigInput = z.input<typeof GraphRunConfigSchema>;
export type JiraSourceConfig = z.infer<typeof JiraSourceConfigSchema>;
export type JiraSourceConfigInput = z.input<typeof JiraSourceConfigSchema>;

// ============================================================================
// Parsing
// ============================================================================

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function parseGraphRunConfig(input: GraphRunConfigInput): GraphRunConfig {
  const result = GraphRunConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid run configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function parseJiraSourceConfig(input: JiraSourceConfigInput): JiraSourceConfig {
  const result = JiraSourceConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid issue source configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Splits "ID=ATTRS" at the first "=". The attribute fragment is kept verbatim.
 */
export function parseAnnotation(raw: string): [string, string] {
  const index = raw.indexOf("=");
  if (index <= 0 || index === raw.length - 1) {
    throw new ConfigurationError(`Invalid annotation "${raw}": expected ISSUE=ATTRIBUTES`);
  }
  return [raw.slice(0, index).trim(), raw.slice(index + 1)];
}

/**
 * Later annotations for the same issue win. Kept in a Map so any issue key,
 * "__proto__" included, is stored as data.
 */
export function parseAnnotations(raws: readonly string[]): Map<string, string> {
  const annotations = new Map<string, string>();
  for (const raw of raws) {
    const [issueId, fragment] = parseAnnotation(raw);
    annotations.set(issueId, fragment);
  }
  return annotations;
}

/**
 * Issue-source settings from the environment, with an optional base URL
 * override (e.g. from --base-url).
 */
export function loadJiraSourceConfig(
  env: NodeJS.ProcessEnv = process.env,
  baseUrlOverride?: string
): JiraSourceConfig {
  const timeoutRaw = env["JIRA_TIMEOUT_MS"];
  const timeoutMs = timeoutRaw ? parseInt(timeoutRaw, 10) : undefined;
  if (timeoutMs !== undefined && Number.isNaN(timeoutMs)) {
    throw new ConfigurationError(`Invalid JIRA_TIMEOUT_MS "${timeoutRaw}"`);
  }
  return parseJiraSourceConfig({
    baseUrl: baseUrlOverride ?? env["JIRA_BASE_URL"],
    user: env["JIRA_USER"] || undefined,
    apiToken: env["JIRA_API_TOKEN"] || undefined,
    timeoutMs,
  });
}

export function resolveCacheDir(env: NodeJS.ProcessEnv = process.env): string {
  return env["ISSUE_CACHE_DIR"] || DEFAULT_CACHE_DIR;
}
