#!/usr/bin/env node
// src/cli.ts
import { Command, InvalidArgumentError } from "commander";
import { readFile, writeFile } from "node:fs/promises";

import { runConvertTool } from "./otbm/convertTool.js";
import { describeFormat, formatForVersion } from "./otbm/formatVersion.js";
import type { ResourceLimits } from "./otbm/limits.js";
import { limitsFromEnv } from "./otbm/limits.js";
import { detectMapFile } from "./otbm/mapDetection.js";
import { mapFromJsonV1, mapToJsonV1, parseMapJsonV1, stringifyMapJsonV1 } from "./otbm/mapJsonV1.js";
import type { LoadResult } from "./otbm/mapLoader.js";
import { loadMapFile } from "./otbm/mapLoader.js";
import { saveMapFile } from "./otbm/mapSaver.js";
import { formatValidationIssue, validateMap } from "./otbm/mapValidator.js";
import type { GameMap } from "./otbm/model.js";
import { formatIssue } from "./otbm/report.js";
import type { WorkspaceOptions } from "./otbm/workspace.js";
import { openWorkspace } from "./otbm/workspace.js";

type LoadFlags = {
  items?: string;
  workspace?: string;
  clientVersion?: number;
  otbmVersion?: number;
  project: boolean;
  maxFileBytes?: number;
  maxTiles?: number;
  maxItems?: number;
  maxDepth?: number;
};

function parseIntArg(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError("Expected a non-negative integer.");
  return n;
}

function withLoadOptions(cmd: Command): Command {
  return cmd
    .option("--items <path>", "Path to items.otb (default: from project metadata or workspace)")
    .option("--workspace <dir>", "Workspace root holding data/<clientVersion>/items.otb")
    .option("--client-version <n>", "Client version of the map, e.g. 860 or 1310", parseIntArg)
    .option("--otbm-version <n>", "Read the file as this OTBM version, ignoring its header", parseIntArg)
    .option("--no-project", "Ignore <map>.json / map_project.json beside the map")
    .option("--max-file-bytes <n>", "Refuse larger files (env OTBM_MAX_FILE_BYTES)", parseIntArg)
    .option("--max-tiles <n>", "Stop after this many tiles (env OTBM_MAX_TILES)", parseIntArg)
    .option("--max-items <n>", "Stop after this many items (env OTBM_MAX_ITEMS)", parseIntArg)
    .option("--max-depth <n>", "Maximum node nesting (env OTBM_MAX_DEPTH)", parseIntArg);
}

function limitsFromFlags(flags: LoadFlags): Partial<ResourceLimits> {
  const out: { -readonly [K in keyof ResourceLimits]?: number } = { ...limitsFromEnv() };
  if (flags.maxFileBytes !== undefined) out.maxFileBytes = flags.maxFileBytes;
  if (flags.maxTiles !== undefined) out.maxTiles = flags.maxTiles;
  if (flags.maxItems !== undefined) out.maxItems = flags.maxItems;
  if (flags.maxDepth !== undefined) out.maxDepth = flags.maxDepth;
  return out;
}

function workspaceOptions(flags: LoadFlags): WorkspaceOptions {
  const out: { -readonly [K in keyof WorkspaceOptions]: WorkspaceOptions[K] } = {
    ignoreProject: !flags.project,
    limits: limitsFromFlags(flags),
  };
  if (flags.items !== undefined) out.itemsPath = flags.items;
  if (flags.workspace !== undefined) out.workspaceRoot = flags.workspace;
  if (flags.clientVersion !== undefined) out.clientVersion = flags.clientVersion;
  if (flags.otbmVersion !== undefined) out.otbmVersion = flags.otbmVersion;
  return out;
}

async function loadForCli(input: string, flags: LoadFlags): Promise<LoadResult> {
  const detected = await detectMapFile(input);
  if (detected.kind !== "otbm") {
    throw new Error(`${input}: not an OTBM map (${detected.kind}: ${detected.reason})`);
  }
  const ws = await openWorkspace(input, workspaceOptions(flags));
  if (ws.itemsPath) console.log(`Items: ${ws.itemsPath}`);

  const result = await loadMapFile(input, ws.context);
  for (const issue of result.report.warnings) console.warn(formatIssue(issue));
  for (const issue of result.report.recoverableErrors) console.warn(formatIssue(issue));
  for (const [code, n] of Object.entries(result.report.suppressed)) {
    console.warn(`(${n} more ${code} issues suppressed)`);
  }
  return result;
}

function requireMap(result: LoadResult): GameMap {
  if (!result.ok) throw new Error(`${result.error.kind}: ${result.error.message}`);
  return result.map;
}

const program = new Command();

program
  .name("otbm")
  .description("OTBM map tools (inspect, validate, JSON, version conversion)")
  .version("0.1.0");

withLoadOptions(
  program
    .command("info")
    .description("Print the format and contents summary of an .otbm map")
    .argument("<input>", "Path to .otbm file"),
).action(async (input: string, opts: LoadFlags) => {
  const result = await loadForCli(input, opts);
  const map = requireMap(result);
  const { stats, format } = result.report;

  if (format) console.log(`Format: ${describeFormat(format)}`);
  console.log(`Size: ${map.header.width}x${map.header.height}, items ${map.header.itemsMajor}.${map.header.itemsMinor}`);
  if (map.header.description) console.log(`Description: ${map.header.description}`);
  console.log(
    `Tiles: ${stats.tiles}  Items: ${stats.items}  Houses: ${stats.houses}  Towns: ${stats.towns}  ` +
      `Waypoints: ${stats.waypoints}  Spawns: ${stats.spawns}`,
  );
  console.log(
    `Warnings: ${result.report.warnings.length}  Recoverable errors: ${result.report.recoverableErrors.length}`,
  );
});

withLoadOptions(
  program
    .command("validate")
    .description("Load a map and check its houses, towns, waypoints and spawns")
    .argument("<input>", "Path to .otbm file"),
).action(async (input: string, opts: LoadFlags) => {
  const map = requireMap(await loadForCli(input, opts));
  const result = validateMap(map);
  for (const issue of result.issues) console.warn(formatValidationIssue(issue));
  console.log(`Done. errors=${result.errors} warnings=${result.warnings}`);
  if (result.errors > 0) process.exitCode = 1;
});

withLoadOptions(
  program
    .command("to-json")
    .description("Convert an .otbm map to JSON")
    .argument("<input>", "Path to .otbm file")
    .option("-o, --output <path>", "Write JSON to a file (default: stdout)"),
).action(async (input: string, opts: LoadFlags & { output?: string }) => {
  const map = requireMap(await loadForCli(input, opts));
  const text = stringifyMapJsonV1(mapToJsonV1(map));
  if (opts.output) await writeFile(opts.output, text, "utf8");
  else process.stdout.write(text);
});

program
  .command("from-json")
  .description("Convert a JSON map document back to .otbm")
  .argument("<input>", "Path to JSON file")
  .requiredOption("-o, --output <path>", "Write .otbm to this path")
  .option("--otbm-version <n>", "Target OTBM version (default: the document header)", parseIntArg)
  .option("--client-version <n>", "Client version recorded in the format", parseIntArg)
  .option("--items <path>", "Path to items.otb (required for client-id versions)")
  .option("--embed-spawns", "Write spawns inside the map", false)
  .action(
    async (
      input: string,
      opts: { output: string; otbmVersion?: number; clientVersion?: number; items?: string; embedSpawns: boolean },
    ) => {
      const text = await readFile(input, "utf8");
      const parsed: unknown = JSON.parse(text);
      const map = mapFromJsonV1(parseMapJsonV1(parsed));

      const extra: { clientVersion?: number; embedSpawns?: boolean } = { embedSpawns: opts.embedSpawns };
      if (opts.clientVersion !== undefined) extra.clientVersion = opts.clientVersion;
      const format = formatForVersion(opts.otbmVersion ?? map.header.version, extra);

      const ws = await openWorkspace(opts.output, {
        ignoreProject: true,
        ...(opts.items !== undefined ? { itemsPath: opts.items } : {}),
      });
      const saved = await saveMapFile(map, opts.output, format, ws.context);
      if (!saved.ok) throw new Error(`${saved.error.kind}: ${saved.error.message}`);
      for (const issue of saved.report.warnings) console.warn(formatIssue(issue));
      console.log(`${input} -> ${opts.output} (${describeFormat(format)})`);
    },
  );

program
  .command("convert")
  .description(
    "Re-save a map or folder of maps as another OTBM version. Default is to write copies; use --in-place to overwrite.",
  )
  .argument("input", "Path to .otbm/.json OR a directory containing .otbm files")
  .requiredOption("--to-version <n>", "Target OTBM version (0-6)", parseIntArg)
  .option("--to-client-version <n>", "Target client version", parseIntArg)
  .option("--embed-spawns", "Write spawns inside the map", false)
  .option("--items <path>", "Path to items.otb (needed when either side uses client ids)")
  .option("--workspace <dir>", "Workspace root holding data/<clientVersion>/items.otb")
  .option("--client-version <n>", "Client version of the input maps", parseIntArg)
  .option("-o, --out <path>", "Output file (single input) or output dir (directory input)")
  .option("--in-place", "Overwrite inputs in place (use with care)", false)
  .option("--recursive", "Recurse into subdirectories (directory input)", false)
  .option("--include-json", "When input is a directory, include .json files too", false)
  .option("--overwrite", "Allow overwriting existing outputs (non in-place)", false)
  .option("--backup", "When --in-place, write a .bak copy before overwriting", false)
  .option("--dry-run", "Print planned operations but do not write anything", false)
  .action(
    async (
      input: string,
      opts: {
        toVersion: number;
        toClientVersion?: number;
        embedSpawns: boolean;
        items?: string;
        workspace?: string;
        clientVersion?: number;
        out?: string;
        inPlace: boolean;
        recursive: boolean;
        includeJson: boolean;
        overwrite: boolean;
        backup: boolean;
        dryRun: boolean;
      },
    ) => {
      const target: { otbmVersion: number; clientVersion?: number; embedSpawns?: boolean } = {
        otbmVersion: opts.toVersion,
        embedSpawns: opts.embedSpawns,
      };
      if (opts.toClientVersion !== undefined) target.clientVersion = opts.toClientVersion;

      const summary = await runConvertTool(input, {
        target,
        inPlace: opts.inPlace,
        recursive: opts.recursive,
        includeJson: opts.includeJson,
        overwrite: opts.overwrite,
        backup: opts.backup,
        dryRun: opts.dryRun,
        limits: limitsFromEnv(),
        ...(opts.out !== undefined ? { out: opts.out } : {}),
        ...(opts.items !== undefined ? { itemsPath: opts.items } : {}),
        ...(opts.workspace !== undefined ? { workspaceRoot: opts.workspace } : {}),
        ...(opts.clientVersion !== undefined ? { sourceClientVersion: opts.clientVersion } : {}),
      });
      if (summary.failed > 0) process.exitCode = 1;
    },
  );

program.parseAsync(process.argv).catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(msg + "\n");
  process.exitCode = 1;
});
