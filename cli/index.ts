#!/usr/bin/env node

/**
 * issue-depgraph CLI
 *
 * Walks sub-tasks and outward links from a root issue and writes the open
 * part of the dependency graph as a Graphviz DOT document.
 */

import { readFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function getVersion(): string {
  // Source lives in cli/, the build in dist/cli/.
  for (const candidate of [join(__dirname, "..", "package.json"), join(__dirname, "..", "..", "package.json")]) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(candidate, "utf-8"));
      if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
        return pkg.version;
      }
    } catch {
      // Try the next location.
    }
  }
  return "unknown";
}

async function main(): Promise<void> {
  const argv = await yargs(hideBin(process.argv))
    .scriptName("issue-depgraph")
    .usage("$0 <ROOT> [options]")
    .option("stop", { type: "string", array: true, describe: "Issue whose children are not explored (repeatable)" })
    .option("annotate", { type: "string", array: true, describe: "Edge attributes for edges into an issue, ID=ATTRS (repeatable)" })
    .option("cache", { type: "boolean", default: false, describe: "Read and write the on-disk issue cache" })
    .option("cache-dir", { type: "string", describe: "Cache directory (default $ISSUE_CACHE_DIR or .issue-cache)" })
    .option("out-dir", { type: "string", default: ".", describe: "Directory for <ROOT>.dot" })
    .option("stdout", { type: "boolean", default: false, describe: "Print the document instead of writing a file" })
    .option("wrap-width", { type: "number", describe: "Summary wrap width inside node labels" })
    .option("base-url", { type: "string", describe: "Issue tracker base URL (default $JIRA_BASE_URL)" })
    .option("verbose", { alias: "v", type: "boolean", default: false, describe: "Log per-issue progress" })
    .example("$0 PROJ-1", "Write PROJ-1.dot")
    .example('$0 PROJ-1 --stop PROJ-9 --annotate "PROJ-4=[minlen=2]"', "Prune at PROJ-9, stretch edges into PROJ-4")
    .version(getVersion())
    .help()
    .parseAsync();

  const root = argv._[0];
  const { runGraph } = await import("./commands/graph.js");
  const exitCode = await runGraph({
    root: root === undefined ? undefined : String(root),
    stop: argv.stop,
    annotate: argv.annotate,
    cache: argv.cache,
    cacheDir: argv.cacheDir,
    outDir: argv.outDir,
    stdout: argv.stdout,
    wrapWidth: argv.wrapWidth,
    baseUrl: argv.baseUrl,
    verbose: argv.verbose,
  });
  process.exit(exitCode);
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
