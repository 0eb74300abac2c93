// src/otbm/project.ts
import path from "node:path";
import { readFile, stat } from "node:fs/promises";

export type EngineName = "canary" | "tfs" | "unknown" | (string & {});

/**
 * Optional JSON next to a map naming the client it targets. Accepted flat or
 * with the map fields nested under "metadata".
 */
export type ProjectMetadata = Readonly<{
  projectName?: string;
  engine: EngineName;
  clientVersion?: number;
  otbmVersion?: number;
  mapFile?: string;
  itemsOtb?: string;
}>;

export type LocatedProject = Readonly<{
  path: string;
  project: ProjectMetadata;
}>;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function normalizeEngine(engine: string): EngineName {
  const e = engine.trim().toLowerCase();
  if (e === "canary" || e === "otservbr" || e === "opentibia-canary") return "canary";
  if (e === "tfs" || e === "forgottenserver" || e === "theforgottenserver" || e === "otx") return "tfs";
  return e === "" ? "unknown" : e;
}

function optionalRecord(v: unknown, name: string): Record<string, unknown> {
  if (v === undefined || v === null) return {};
  if (!isRecord(v)) throw new Error(`Invalid ${name}: expected object`);
  return v;
}

function parseOptionalInt(v: unknown, name: string, max: number): number | undefined {
  if (v === undefined || v === null || v === "" || v === 0) return undefined;
  const n = typeof v === "string" ? Number(v.trim()) : v;
  if (typeof n !== "number" || !Number.isInteger(n) || n < 0 || n > max) {
    throw new Error(`Invalid ${name}: expected integer in [0, ${max}]`);
  }
  return n;
}

function parseOptionalString(v: unknown, name: string): string | undefined {
  if (v === undefined || v === null || v === "") return undefined;
  if (typeof v !== "string") throw new Error(`Invalid ${name}: expected string`);
  return v;
}

export function parseProjectMetadata(input: unknown): ProjectMetadata {
  if (!isRecord(input)) throw new Error("Invalid project JSON: expected object");
  const root: Record<string, unknown> = input;

  const meta = optionalRecord(input.metadata, "metadata");
  const defs = optionalRecord(input.definitions, "definitions");
  const pick = (key: string): unknown => {
    const nested = meta[key];
    return nested !== undefined && nested !== null ? nested : root[key];
  };

  const engineRaw = pick("engine");
  if (engineRaw !== undefined && engineRaw !== null && typeof engineRaw !== "string") {
    throw new Error("Invalid engine: expected string");
  }

  const out: {
    projectName?: string;
    engine: EngineName;
    clientVersion?: number;
    otbmVersion?: number;
    mapFile?: string;
    itemsOtb?: string;
  } = { engine: normalizeEngine(typeof engineRaw === "string" ? engineRaw : "") };

  const projectName = parseOptionalString(input.project_name, "project_name");
  if (projectName !== undefined) out.projectName = projectName;

  const clientVersion = parseOptionalInt(pick("client_version"), "client_version", 99_999);
  if (clientVersion !== undefined) out.clientVersion = clientVersion;

  const otbmVersion = parseOptionalInt(pick("otbm_version"), "otbm_version", 0xffffffff);
  if (otbmVersion !== undefined) out.otbmVersion = otbmVersion;

  const mapFile = parseOptionalString(pick("map_file"), "map_file");
  if (mapFile !== undefined) out.mapFile = mapFile;

  const itemsOtb = parseOptionalString(defs.items_otb, "definitions.items_otb");
  if (itemsOtb !== undefined) out.itemsOtb = itemsOtb;

  return out;
}

async function isFile(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isFile();
  } catch {
    return false;
  }
}

/** `<map>.json` beside the map first, then `map_project.json` in the same directory. */
export async function findProjectFile(mapPath: string): Promise<string | null> {
  const ext = path.extname(mapPath);
  const sidecar = mapPath.slice(0, mapPath.length - ext.length) + ".json";
  if (await isFile(sidecar)) return sidecar;

  const shared = path.join(path.dirname(mapPath), "map_project.json");
  if (await isFile(shared)) return shared;

  return null;
}

export async function readProjectFile(projectPath: string): Promise<ProjectMetadata> {
  const text = await readFile(projectPath, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`Invalid JSON in ${projectPath}: ${msg}`);
  }
  return parseProjectMetadata(parsed);
}

/**
 * Looks for project metadata beside a map. Never fails: problems reading or
 * parsing the file are returned as notes.
 */
export async function locateProject(
  mapPath: string,
): Promise<{ located: LocatedProject | null; notes: string[] }> {
  const found = await findProjectFile(mapPath);
  if (found === null) return { located: null, notes: [] };
  try {
    return { located: { path: found, project: await readProjectFile(found) }, notes: [] };
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    return { located: null, notes: [`Ignoring project metadata ${found}: ${msg}`] };
  }
}

/** Resolves a project-relative path (map file, item database) against the project file. */
export function resolveProjectPath(projectPath: string, relative: string): string {
  return path.resolve(path.dirname(projectPath), relative);
}
