// src/otbm/formatVersion.ts
import { DEFAULT_OTBM_VERSION, FIRST_CLIENT_ID_VERSION, MAX_OTBM_VERSION } from "./constants.js";
import { VersionUnsupportedError } from "./errors.js";
import type { ItemDatabaseHeader } from "./itemDatabase.js";
import { clientVersionFromHeader } from "./itemDatabase.js";
import type { ProjectMetadata } from "./project.js";

export type VersionSource = "explicit" | "project" | "header" | "clientVersion" | "default";
export type ClientVersionSource = "explicit" | "project" | "itemDatabase" | "unknown";

export type FormatDescriptor = Readonly<{
  version: number;
  usesClientIds: boolean;
  // 0 when unknown
  clientVersion: number;
  versionSource: VersionSource;
  clientVersionSource: ClientVersionSource;
  // Item database to load, when one was named or found.
  itemsPath?: string;
  // Write legacy SPAWNS nodes inside the map instead of leaving spawns to side files.
  embedSpawns?: boolean;
  notes: ReadonlyArray<string>;
}>;

// Lowest client version of each structural version, newest first.
const CLIENT_VERSION_TABLE: ReadonlyArray<readonly [number, number]> = [
  [1300, 5],
  [870, 3],
  [840, 2],
  [780, 1],
  [0, 0],
];

export function usesClientIds(version: number): boolean {
  return version >= FIRST_CLIENT_ID_VERSION;
}

export function assertSupportedVersion(version: number): void {
  if (!Number.isInteger(version) || version < 0 || version > MAX_OTBM_VERSION) {
    throw new VersionUnsupportedError(version, MAX_OTBM_VERSION);
  }
}

/** Structural version a client release writes by default, e.g. 860 gives 2. */
export function versionForClient(clientVersion: number): number {
  for (const [min, version] of CLIENT_VERSION_TABLE) {
    if (clientVersion >= min) return version;
  }
  return 0;
}

export type FormatHints = Readonly<{
  explicitVersion?: number;
  explicitClientVersion?: number;
  project?: ProjectMetadata;
  headerVersion?: number;
  itemDatabase?: ItemDatabaseHeader;
  itemsPath?: string;
  embedSpawns?: boolean;
}>;

/**
 * Picks the structural version and id space. Version: explicit, project,
 * file header, then derived from the client version, then the default.
 * Client version: explicit, project, then the item database header.
 */
export function resolveFormat(hints: FormatHints): FormatDescriptor {
  const notes: string[] = [];

  let clientVersion = 0;
  let clientVersionSource: ClientVersionSource = "unknown";
  if (hints.explicitClientVersion !== undefined && hints.explicitClientVersion > 0) {
    clientVersion = hints.explicitClientVersion;
    clientVersionSource = "explicit";
  } else if (hints.project?.clientVersion !== undefined) {
    clientVersion = hints.project.clientVersion;
    clientVersionSource = "project";
  } else if (hints.itemDatabase) {
    clientVersion = clientVersionFromHeader(hints.itemDatabase);
    clientVersionSource = "itemDatabase";
  }

  if (hints.itemDatabase && clientVersionSource !== "itemDatabase") {
    const dbVersion = clientVersionFromHeader(hints.itemDatabase);
    if (dbVersion !== clientVersion) {
      notes.push(`Item database is for client ${dbVersion}, expected ${clientVersion}`);
    }
  }

  let version: number;
  let versionSource: VersionSource;
  if (hints.explicitVersion !== undefined) {
    version = hints.explicitVersion;
    versionSource = "explicit";
  } else if (hints.project?.otbmVersion !== undefined) {
    version = hints.project.otbmVersion;
    versionSource = "project";
  } else if (hints.headerVersion !== undefined) {
    version = hints.headerVersion;
    versionSource = "header";
  } else if (clientVersion > 0) {
    version = versionForClient(clientVersion);
    versionSource = "clientVersion";
  } else {
    version = DEFAULT_OTBM_VERSION;
    versionSource = "default";
    notes.push(`No version hint; assuming OTBM version ${DEFAULT_OTBM_VERSION}`);
  }

  if (
    hints.headerVersion !== undefined &&
    versionSource !== "header" &&
    hints.headerVersion !== version
  ) {
    notes.push(`File header says version ${hints.headerVersion}; using ${version} from ${versionSource}`);
  }

  assertSupportedVersion(version);

  const out: {
    version: number;
    usesClientIds: boolean;
    clientVersion: number;
    versionSource: VersionSource;
    clientVersionSource: ClientVersionSource;
    itemsPath?: string;
    embedSpawns?: boolean;
    notes: string[];
  } = {
    version,
    usesClientIds: usesClientIds(version),
    clientVersion,
    versionSource,
    clientVersionSource,
    notes,
  };
  if (hints.itemsPath !== undefined) out.itemsPath = hints.itemsPath;
  if (hints.embedSpawns !== undefined) out.embedSpawns = hints.embedSpawns;
  return out;
}

/** Descriptor for a save target chosen by the caller. */
export function formatForVersion(
  version: number,
  extra: Readonly<{ clientVersion?: number; embedSpawns?: boolean }> = {},
): FormatDescriptor {
  const hints: {
    explicitVersion: number;
    explicitClientVersion?: number;
    embedSpawns?: boolean;
  } = { explicitVersion: version };
  if (extra.clientVersion !== undefined) hints.explicitClientVersion = extra.clientVersion;
  if (extra.embedSpawns !== undefined) hints.embedSpawns = extra.embedSpawns;
  return resolveFormat(hints);
}

export function describeFormat(f: FormatDescriptor): string {
  const space = f.usesClientIds ? "ClientID" : "ServerID";
  const client = f.clientVersion > 0 ? `, client ${f.clientVersion}` : "";
  return `OTBM v${f.version} (${space}${client}; version from ${f.versionSource})`;
}
