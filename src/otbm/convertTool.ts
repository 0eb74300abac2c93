// src/otbm/convertTool.ts
import path from "node:path";
import { copyFile, mkdir, readdir, readFile, stat } from "node:fs/promises";

import type { FormatContext } from "./context.js";
import type { MapFormatError } from "./errors.js";
import { ItemDatabaseRequiredError, isMapFormatError } from "./errors.js";
import type { FormatDescriptor } from "./formatVersion.js";
import { describeFormat, formatForVersion } from "./formatVersion.js";
import { IdTranslator } from "./idTranslator.js";
import type { ItemCodecContext } from "./itemCodec.js";
import type { ResourceLimits } from "./limits.js";
import { mapFromJsonV1, parseMapJsonV1 } from "./mapJsonV1.js";
import { loadMapFile } from "./mapLoader.js";
import { assertWritable, saveMapFile } from "./mapSaver.js";
import type { GameMap } from "./model.js";
import { formatIssue } from "./report.js";
import { openWorkspace } from "./workspace.js";

export type ConvertTarget = Readonly<{
  otbmVersion: number;
  clientVersion?: number;
  embedSpawns?: boolean;
}>;

export type ConvertToolOptions = Readonly<{
  target: ConvertTarget;
  out?: string;
  inPlace?: boolean;
  recursive?: boolean;
  overwrite?: boolean;
  dryRun?: boolean;
  includeJson?: boolean;
  backup?: boolean; // only meaningful with inPlace
  // Item database and version hints for reading the input maps.
  itemsPath?: string;
  workspaceRoot?: string;
  sourceClientVersion?: number;
  sourceOtbmVersion?: number;
  limits?: Partial<ResourceLimits>;
}>;

export type ConvertSummary = Readonly<{
  processed: number;
  written: number;
  skipped: number;
  failed: number;
}>;

export type ConversionCheck =
  | { ok: true; format: FormatDescriptor }
  | { ok: false; format: FormatDescriptor; error: MapFormatError };

function isOtbmPath(p: string): boolean {
  return p.toLowerCase().endsWith(".otbm");
}

function isJsonPath(p: string): boolean {
  return p.toLowerCase().endsWith(".json");
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    const st = await stat(p);
    return st.isDirectory();
  } catch {
    return false;
  }
}

async function existsPath(p: string): Promise<boolean> {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

async function listFiles(dir: string, recursive: boolean): Promise<string[]> {
  const out: string[] = [];
  const entries = await readdir(dir, { withFileTypes: true });

  for (const e of entries) {
    const full = path.join(dir, e.name);
    if (e.isDirectory()) {
      if (recursive) out.push(...(await listFiles(full, true)));
    } else if (e.isFile()) {
      out.push(full);
    }
  }

  out.sort();
  return out;
}

function withOtbmExtension(p: string): string {
  return isOtbmPath(p) ? p : p.slice(0, p.length - path.extname(p).length) + ".otbm";
}

function defaultOutFileForFile(inputFile: string, target: ConvertTarget): string {
  const ext = path.extname(inputFile);
  const base = inputFile.slice(0, inputFile.length - ext.length);
  return `${base}.v${target.otbmVersion}.otbm`;
}

function defaultOutDirForDir(inputDir: string, target: ConvertTarget): string {
  return `${inputDir}__v${target.otbmVersion}`;
}

async function ensureParentDir(p: string): Promise<void> {
  await mkdir(path.dirname(p), { recursive: true });
}

function targetFormat(target: ConvertTarget): FormatDescriptor {
  const extra: { clientVersion?: number; embedSpawns?: boolean } = {};
  if (target.clientVersion !== undefined) extra.clientVersion = target.clientVersion;
  if (target.embedSpawns !== undefined) extra.embedSpawns = target.embedSpawns;
  return formatForVersion(target.otbmVersion, extra);
}

/**
 * Checks that every item of `map` can be written for `target` without
 * writing anything.
 */
export function analyzeConversion(map: Readonly<GameMap>, target: ConvertTarget, ctx: FormatContext = {}): ConversionCheck {
  const format = targetFormat(target);
  try {
    const translator =
      ctx.translator ?? (ctx.itemDatabase ? IdTranslator.fromDatabase(ctx.itemDatabase) : undefined);
    if (format.usesClientIds && translator === undefined) {
      throw new ItemDatabaseRequiredError(`OTBM version ${format.version} needs an item database to map ids`);
    }
    const items: ItemCodecContext = {
      version: format.version,
      usesClientIds: format.usesClientIds,
      ...(translator ? { translator } : {}),
    };
    assertWritable(map, items);
    return { ok: true, format };
  } catch (e: unknown) {
    if (!isMapFormatError(e)) throw e;
    return { ok: false, format, error: e };
  }
}

async function readMapInput(
  inputPath: string,
  opts: ConvertToolOptions,
): Promise<{ map: GameMap; ctx: FormatContext }> {
  const ws = await openWorkspace(inputPath, {
    ...(opts.itemsPath !== undefined ? { itemsPath: opts.itemsPath } : {}),
    ...(opts.workspaceRoot !== undefined ? { workspaceRoot: opts.workspaceRoot } : {}),
    ...(opts.sourceClientVersion !== undefined ? { clientVersion: opts.sourceClientVersion } : {}),
    ...(opts.sourceOtbmVersion !== undefined ? { otbmVersion: opts.sourceOtbmVersion } : {}),
    ...(opts.limits !== undefined ? { limits: opts.limits } : {}),
    ignoreProject: isJsonPath(inputPath),
  });

  if (isJsonPath(inputPath)) {
    const text = await readFile(inputPath, "utf8");
    const parsedUnknown: unknown = JSON.parse(text);
    return { map: mapFromJsonV1(parseMapJsonV1(parsedUnknown)), ctx: ws.context };
  }

  const result = await loadMapFile(inputPath, ws.context);
  for (const issue of [...result.report.warnings, ...result.report.recoverableErrors]) {
    console.warn(`${inputPath}: ${formatIssue(issue)}`);
  }
  if (!result.ok) throw result.error;
  return { map: result.map, ctx: ws.context };
}

async function convertOne(inputPath: string, outPath: string, opts: ConvertToolOptions): Promise<void> {
  const { map, ctx } = await readMapInput(inputPath, opts);
  const format = targetFormat(opts.target);
  const saved = await saveMapFile(map, outPath, format, ctx);
  if (!saved.ok) throw saved.error;
  for (const issue of saved.report.warnings) console.warn(`${outPath}: ${formatIssue(issue)}`);
}

function inferInputKind(filePath: string, includeJson: boolean): "otbm" | "json" | null {
  if (isOtbmPath(filePath)) return "otbm";
  if (includeJson && isJsonPath(filePath)) return "json";
  return null;
}

export async function runConvertTool(inputPath: string, opts: ConvertToolOptions): Promise<ConvertSummary> {
  const inIsDir = await isDirectory(inputPath);

  // Normalize options
  const inPlace = opts.inPlace === true;
  const recursive = opts.recursive === true;
  const overwrite = opts.overwrite === true;
  const dryRun = opts.dryRun === true;
  const includeJson = opts.includeJson === true;
  const backup = opts.backup === true;
  const label = describeFormat(targetFormat(opts.target));

  let processed = 0;
  let written = 0;
  let skipped = 0;
  let failed = 0;

  if (!inIsDir) {
    let outPath: string;
    if (inPlace) {
      if (!isOtbmPath(inputPath)) throw new Error(`--in-place needs an .otbm input: ${inputPath}`);
      outPath = inputPath;
    } else if (opts.out) {
      const outIsDir = !path.extname(opts.out);
      outPath = outIsDir ? path.join(opts.out, withOtbmExtension(path.basename(inputPath))) : opts.out;
    } else {
      outPath = defaultOutFileForFile(inputPath, opts.target);
    }

    if (!inPlace && !overwrite && (await existsPath(outPath))) {
      console.warn(`Skip (exists): ${outPath}`);
      return { processed: 1, written: 0, skipped: 1, failed: 0 };
    }

    processed++;

    if (dryRun) {
      console.log(`[dry-run] ${inputPath} -> ${outPath} (${label})`);
      return { processed, written: 0, skipped: 0, failed: 0 };
    }

    if (inPlace && backup) {
      const bak = `${inputPath}.bak`;
      if (!overwrite && (await existsPath(bak))) {
        throw new Error(`Backup exists (use --overwrite or delete): ${bak}`);
      }
      await copyFile(inputPath, bak);
    }

    await ensureParentDir(outPath);
    await convertOne(inputPath, outPath, opts);
    written++;

    console.log(`${inputPath} -> ${outPath} (${label})`);
    return { processed, written, skipped, failed };
  }

  // Directory mode
  const outDir = inPlace ? null : (opts.out ?? defaultOutDirForDir(inputPath, opts.target));
  const outDirAbs = outDir ? path.resolve(outDir) : null;
  const inDirAbs = path.resolve(inputPath);

  if (outDir !== null && !dryRun) await mkdir(outDir, { recursive: true });

  const allFiles = await listFiles(inputPath, recursive);

  for (const f of allFiles) {
    const kind = inferInputKind(f, includeJson);
    if (!kind) continue;
    // JSON documents cannot be converted in place.
    if (inPlace && kind === "json") continue;

    // If output dir is inside input dir (user chose so), avoid reprocessing output files.
    if (outDirAbs && path.resolve(f).startsWith(outDirAbs + path.sep)) continue;

    processed++;

    const rel = path.relative(inDirAbs, path.resolve(f));
    const dest = outDir === null ? f : withOtbmExtension(path.join(outDir, rel));

    if (!inPlace && !overwrite && (await existsPath(dest))) {
      skipped++;
      continue;
    }

    if (dryRun) {
      console.log(`[dry-run] ${f} -> ${dest}`);
      continue;
    }

    if (inPlace && backup) {
      const bak = `${f}.bak`;
      if (!overwrite && (await existsPath(bak))) {
        throw new Error(`Backup exists (use --overwrite or delete): ${bak}`);
      }
      await copyFile(f, bak);
    }

    try {
      await ensureParentDir(dest);
      await convertOne(f, dest, opts);
      written++;
    } catch (e: unknown) {
      if (!isMapFormatError(e)) throw e;
      failed++;
      console.warn(`Failed: ${f}: ${e.message}`);
    }
  }

  console.log(
    `Done. processed=${processed} written=${written} skipped=${skipped} failed=${failed}` +
      (outDir ? ` out=${outDir}` : " (in-place)") +
      ` target=${label}`,
  );

  return { processed, written, skipped, failed };
}
