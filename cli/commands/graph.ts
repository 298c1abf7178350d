/**
 * `issue-depgraph <ROOT>` — build the dependency graph of ROOT and write it
 * as <ROOT>.dot. Returns exit code 0 on success, 1 on any configuration or
 * fetch failure (no file is written in that case).
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import {
  loadJiraSourceConfig,
  parseAnnotations,
  parseGraphRunConfig,
  resolveCacheDir,
  type GraphRunConfig,
  type JiraSourceConfig,
} from "../../src/config/graph-config.js";
import { buildDependencyGraph } from "../../src/services/graph/index.js";
import { CachedIssueSource } from "../../src/services/issue-cache.js";
import type { IssueSource } from "../../src/services/issue-source.js";
import { JiraIssueSource } from "../../src/services/jira-client.js";
import type { DependencyGraph } from "../../src/types/graph.js";
import { isGraphError } from "../../src/utils/errors.js";
import { getLogLevel, setLogLevel } from "../../src/utils/logger.js";
import { printError, printHeader, printStat, printSuccess, printSummary } from "../lib/output.js";

export interface GraphCommandArgs {
  root?: string | undefined;
  stop?: string[] | undefined;
  annotate?: string[] | undefined;
  cache?: boolean | undefined;
  cacheDir?: string | undefined;
  outDir?: string | undefined;
  stdout?: boolean | undefined;
  wrapWidth?: number | undefined;
  baseUrl?: string | undefined;
  verbose?: boolean | undefined;
}

export interface GraphCommandDeps {
  env?: NodeJS.ProcessEnv;
  /** Builds the uncached issue source; defaults to the Jira client */
  createSource?: (config: JiraSourceConfig) => IssueSource;
  now?: () => Date;
  writeStdout?: (text: string) => void;
}

export function outputFilename(rootId: string): string {
  return `${rootId.replace(/[\\/]/g, "_")}.dot`;
}

function createIssueSource(
  run: GraphRunConfig,
  sourceConfig: JiraSourceConfig,
  factory: (config: JiraSourceConfig) => IssueSource
): IssueSource {
  const source = factory(sourceConfig);
  return run.cache ? new CachedIssueSource(source, run.cacheDir) : source;
}

function reportGraph(graph: DependencyGraph): void {
  const { traversal } = graph;
  const stopped = new Set(traversal.stopped);
  printHeader(`Dependency graph for ${traversal.rootId}`);
  for (const id of traversal.retained) {
    printStat(stopped.has(id) ? { name: id, status: "warn", message: "stop issue" } : { name: id, status: "pass" });
  }
  for (const skipped of traversal.skipped) {
    printStat({ name: skipped.id, status: "skip", message: skipped.status });
  }
  printSummary({
    nodes: traversal.retained.size,
    edges: graph.edges.length,
    skipped: traversal.skipped.length,
    stopped: traversal.stopped.length,
  });
}

export async function runGraph(args: GraphCommandArgs, deps: GraphCommandDeps = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const previousLevel = getLogLevel();

  try {
    const run = parseGraphRunConfig({
      rootId: args.root ?? "",
      stopIds: args.stop ?? [],
      annotations: parseAnnotations(args.annotate ?? []),
      cache: args.cache ?? false,
      cacheDir: args.cacheDir ?? resolveCacheDir(env),
      outDir: args.outDir ?? ".",
      stdout: args.stdout ?? false,
      wrapWidth: args.wrapWidth,
      verbose: args.verbose ?? false,
    });
    if (run.verbose) setLogLevel("debug");

    const sourceConfig = loadJiraSourceConfig(env, args.baseUrl);
    const source = createIssueSource(run, sourceConfig, deps.createSource ?? ((c: JiraSourceConfig) => new JiraIssueSource(c)));

    const graph = await buildDependencyGraph(source, {
      rootId: run.rootId,
      stopIds: run.stopIds,
      annotations: run.annotations,
      wrapWidth: run.wrapWidth,
      generatedAt: (deps.now ?? (() => new Date()))(),
    });

    if (run.stdout) {
      (deps.writeStdout ?? ((text: string) => process.stdout.write(text)))(graph.document);
    } else {
      const outPath = join(run.outDir, outputFilename(run.rootId));
      await mkdir(run.outDir, { recursive: true });
      await writeFile(outPath, graph.document, "utf-8");
      reportGraph(graph);
      printSuccess(`Wrote ${outPath}`);
    }
    return 0;
  } catch (err) {
    if (!isGraphError(err)) throw err;
    printError(err.message);
    if (err.details) printError(`  ${err.details}`);
    return 1;
  } finally {
    setLogLevel(previousLevel);
  }
}
