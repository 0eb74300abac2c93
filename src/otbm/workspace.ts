// src/otbm/workspace.ts
import path from "node:path";
import { stat } from "node:fs/promises";

import type { FormatContext } from "./context.js";
import { IdTranslator } from "./idTranslator.js";
import type { ItemDatabase } from "./itemDatabase.js";
import { loadItemDatabaseFile } from "./itemDatabase.js";
import type { ResourceLimits } from "./limits.js";
import type { LocatedProject } from "./project.js";
import { locateProject, resolveProjectPath } from "./project.js";
import type { TextEncoding } from "./text.js";

export type WorkspaceOptions = Readonly<{
  // Directory holding data/<clientVersion>/items.otb.
  workspaceRoot?: string;
  itemsPath?: string;
  clientVersion?: number;
  otbmVersion?: number;
  // Skip the <map>.json / map_project.json lookup.
  ignoreProject?: boolean;
  limits?: Partial<ResourceLimits>;
  encoding?: TextEncoding;
}>;

export type Workspace = Readonly<{
  project: LocatedProject | null;
  itemsPath: string | null;
  itemDatabase: ItemDatabase | null;
  notes: ReadonlyArray<string>;
  context: FormatContext;
}>;

export function workspaceItemsPath(workspaceRoot: string, clientVersion: number): string {
  return path.join(workspaceRoot, "data", String(clientVersion), "items.otb");
}

async function exists(p: string): Promise<boolean> {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * Gathers the hints and item database for one map file. The item database
 * path comes from the caller, then the project definitions, then the
 * workspace data directory for the known client version.
 */
export async function openWorkspace(mapPath: string, opts: WorkspaceOptions = {}): Promise<Workspace> {
  const notes: string[] = [];

  let project: LocatedProject | null = null;
  if (opts.ignoreProject !== true) {
    const found = await locateProject(mapPath);
    project = found.located;
    notes.push(...found.notes);
  }

  const clientVersion = opts.clientVersion ?? project?.project.clientVersion;

  let itemsPath: string | null = null;
  if (opts.itemsPath !== undefined) {
    itemsPath = opts.itemsPath;
  } else if (project?.project.itemsOtb !== undefined) {
    itemsPath = resolveProjectPath(project.path, project.project.itemsOtb);
  } else if (opts.workspaceRoot !== undefined && clientVersion !== undefined) {
    const candidate = workspaceItemsPath(opts.workspaceRoot, clientVersion);
    if (await exists(candidate)) itemsPath = candidate;
    else notes.push(`No item database at ${candidate}`);
  }

  const itemDatabase = itemsPath !== null ? await loadItemDatabaseFile(itemsPath) : null;

  const context: {
    -readonly [K in keyof FormatContext]: FormatContext[K];
  } = { notes };
  if (project) context.project = project.project;
  if (itemDatabase) {
    context.itemDatabase = itemDatabase;
    context.translator = IdTranslator.fromDatabase(itemDatabase);
  }
  if (itemsPath !== null) context.itemsPath = itemsPath;
  if (opts.clientVersion !== undefined) context.clientVersion = opts.clientVersion;
  if (opts.otbmVersion !== undefined) context.explicitVersion = opts.otbmVersion;
  if (opts.limits !== undefined) context.limits = opts.limits;
  if (opts.encoding !== undefined) context.encoding = opts.encoding;

  return { project, itemsPath, itemDatabase, notes, context };
}
