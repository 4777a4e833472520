#!/usr/bin/env node
import { Command } from "commander";
import fs from "node:fs/promises";
import { defaultOutputPath, describeEntry, resolveDocument, strictExitCode } from "./commands.js";
import { parsePlacementConfigYaml } from "./placement/config.js";
import { normalizeLayoutResult, parseLayoutDocument } from "./placement/normalize.js";
import { auditLayout } from "./quality/audit.js";
import type { LayoutResult, PlacementConfigPatch } from "./types.js";

const program = new Command();

interface ResolveCliOptions {
  config?: string;
  output?: string;
  fixed?: string;
  strict?: boolean;
}

interface AuditCliOptions {
  padding?: string;
  input?: string;
}

async function readSavedLayout(filePath: string): Promise<LayoutResult> {
  const raw = await fs.readFile(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Layout file is not valid JSON: ${filePath}`, { cause: error });
  }
  return normalizeLayoutResult(parsed);
}

function parsePadding(input: string | undefined): number | undefined {
  if (input === undefined) {
    return undefined;
  }
  const value = Number(input);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`--padding must be a non-negative number: ${input}`);
  }
  return value;
}

async function runResolve(input: string, opts: ResolveCliOptions): Promise<void> {
  const document = parseLayoutDocument(await fs.readFile(input, "utf8"));

  let config: PlacementConfigPatch | undefined;
  if (opts.config) {
    config = parsePlacementConfigYaml(await fs.readFile(opts.config, "utf8"));
  }

  const fixed = opts.fixed ? await readSavedLayout(opts.fixed) : undefined;
  const result = resolveDocument(document, { config, fixed });
  const outputPath = opts.output ?? defaultOutputPath(input);
  await fs.writeFile(outputPath, `${JSON.stringify(result, null, 2)}\n`, "utf8");

  const { diagnostics } = result;
  process.stdout.write(
    `Resolved ${result.entries.length} elements: ${diagnostics.placedCount} placed, ${diagnostics.forcedCount} forced, ${diagnostics.suppressedCount} suppressed\n`,
  );
  for (const entry of result.entries) {
    const line = describeEntry(entry);
    if (line) {
      process.stdout.write(`Warning: ${line}\n`);
    }
  }
  for (const warning of diagnostics.warnings) {
    process.stdout.write(`Warning: ${warning}\n`);
  }
  process.stdout.write(`Layout JSON: ${outputPath}\n`);

  if (opts.strict) {
    process.exitCode = strictExitCode(diagnostics);
  }
}

async function runAudit(layoutPath: string, opts: AuditCliOptions): Promise<void> {
  const layout = await readSavedLayout(layoutPath);
  const elements = opts.input ? parseLayoutDocument(await fs.readFile(opts.input, "utf8")).elements : undefined;
  const audit = auditLayout(layout, { padding: parsePadding(opts.padding), elements });
  const { metrics } = audit;

  process.stdout.write(`Accepted: ${metrics.acceptedCount} (${metrics.forcedCount} forced), suppressed: ${metrics.suppressedCount}\n`);
  process.stdout.write(`Overlapping pairs: ${metrics.overlapPairCount}, total area ${metrics.overlapArea.toFixed(2)}\n`);
  for (const pair of audit.overlaps) {
    process.stdout.write(`  ${pair.a} x ${pair.b}: ${pair.area.toFixed(2)}\n`);
  }
  process.stdout.write(`Candidate rank: mean ${metrics.rankMean.toFixed(2)}, max ${metrics.rankMax}\n`);
  if (metrics.anchorDistanceCount > 0) {
    process.stdout.write(
      `Anchor distance: mean ${metrics.anchorDistanceMean.toFixed(2)}, max ${metrics.anchorDistanceMax.toFixed(2)} over ${metrics.anchorDistanceCount} labels\n`,
    );
  }
  if (audit.bounds) {
    const { minX, minY, maxX, maxY } = audit.bounds;
    process.stdout.write(`Extent: ${(maxX - minX).toFixed(1)} x ${(maxY - minY).toFixed(1)}\n`);
  }
  process.stdout.write(`Score: ${audit.score.toFixed(1)}\n`);
}

program
  .name("cartolabel")
  .description("Place map labels, event markers and arrow endpoints without overlaps")
  .version("0.1.0");

program
  .command("resolve")
  .argument("<input>", "input document (.yaml or .json)")
  .option("-c, --config <path>", "placement config yaml path")
  .option("-o, --output <path>", "output layout .json path")
  .option("--fixed <path>", "previous layout .json whose accepted boxes become obstacles")
  .option("--strict", "exit with code 1 when anything was forced or suppressed")
  .action(async (input: string, opts: ResolveCliOptions) => runResolve(input, opts));

program
  .command("audit")
  .argument("<layout>", "layout .json written by resolve")
  .option("--padding <n>", "margin kept around every box")
  .option("-i, --input <path>", "input document, for anchor distance statistics")
  .action(async (layout: string, opts: AuditCliOptions) => runAudit(layout, opts));

program.parseAsync(process.argv).catch((error) => {
  process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
  process.exit(1);
});
