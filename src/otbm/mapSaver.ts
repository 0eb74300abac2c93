// src/otbm/mapSaver.ts
import { BinaryWriter } from "./binary.js";
import { writeFileAtomic } from "./atomicFile.js";
import { MAGIC_OTBM, NodeType } from "./constants.js";
import type { FormatContext } from "./context.js";
import type { IdDirection, MapFormatError, UnmappableOffender } from "./errors.js";
import { InvalidMapDataError, ItemDatabaseRequiredError, UnmappableIdError, isMapFormatError } from "./errors.js";
import type { FormatDescriptor } from "./formatVersion.js";
import { assertSupportedVersion } from "./formatVersion.js";
import { IdTranslator } from "./idTranslator.js";
import type { ItemCodecContext } from "./itemCodec.js";
import { encodeItemPayload } from "./itemCodec.js";
import {
  encodeMapDataPayload,
  encodeRootHeader,
  encodeSpawnArea,
  encodeSpawnCreature,
  encodeTown,
  encodeWaypoint,
} from "./mapDataCodec.js";
import type { GameMap, Item, Position, Tile } from "./model.js";
import { formatPosition, walkTileItems } from "./model.js";
import type { ByteSink } from "./nodeWriter.js";
import { BufferSink, FileSink, NodeWriter } from "./nodeWriter.js";
import type { ReportIssue, SaveReport, SaveStats } from "./report.js";
import {
  areaBaseOf,
  encodeAreaPayload,
  encodeTilePayload,
  encodeZonePayload,
  storesGroundInline,
  tileNodeType,
} from "./tileCodec.js";

export type SaveResult =
  | { ok: true; report: SaveReport }
  | { ok: false; error: MapFormatError; report: SaveReport };

export type SaveOutcome = Readonly<{
  stats: SaveStats;
  warnings: ReadonlyArray<ReportIssue>;
}>;

// Positions kept per offending id in an UnmappableIdError.
const MAX_OFFENDER_POSITIONS = 16;

function itemContextFor(format: FormatDescriptor, ctx: FormatContext): ItemCodecContext {
  assertSupportedVersion(format.version);
  const translator =
    ctx.translator ?? (ctx.itemDatabase ? IdTranslator.fromDatabase(ctx.itemDatabase) : undefined);
  if (format.usesClientIds && translator === undefined) {
    throw new ItemDatabaseRequiredError(
      `OTBM version ${format.version} stores client ids; an item database is required to save it`,
    );
  }
  return {
    version: format.version,
    usesClientIds: format.usesClientIds,
    ...(translator ? { translator } : {}),
    ...(ctx.itemDatabase ? { itemDatabase: ctx.itemDatabase } : {}),
  };
}

function checkPosition(p: Readonly<Position>, what: string): void {
  const ok =
    Number.isInteger(p.x) && p.x >= 0 && p.x <= 0xffff &&
    Number.isInteger(p.y) && p.y >= 0 && p.y <= 0xffff &&
    Number.isInteger(p.z) && p.z >= 0 && p.z <= 15;
  if (!ok) throw new InvalidMapDataError(`${what} has an invalid position ${formatPosition(p)}`);
}

type OffenderBuilder = { id: number; reason: UnmappableOffender["reason"]; positions: Position[] };

/**
 * Throws UnmappableIdError naming every item that cannot be written, or
 * InvalidMapDataError for a tile outside the coordinate range, before any
 * output.
 */
export function assertWritable(map: Readonly<GameMap>, items: ItemCodecContext): void {
  const found = new Map<string, OffenderBuilder>();
  let unmapped = false;

  const note = (id: number, reason: OffenderBuilder["reason"], p: Position): void => {
    const key = `${reason}:${id}`;
    let o = found.get(key);
    if (!o) {
      o = { id, reason, positions: [] };
      found.set(key, o);
    }
    if (o.positions.length < MAX_OFFENDER_POSITIONS) o.positions.push({ ...p });
  };

  for (const tile of map.tiles.values()) {
    checkPosition(tile.position, "Tile");
    for (const item of walkTileItems(tile)) {
      if (item.rawUnknownId !== undefined) {
        note(item.rawUnknownId, "placeholder", tile.position);
      } else if (items.usesClientIds && items.translator?.tryServerToClient(item.id) === undefined) {
        unmapped = true;
        note(item.id, "unmapped", tile.position);
      }
    }
  }

  if (found.size === 0) return;
  const direction: IdDirection = unmapped ? "serverToClient" : "unresolved";
  const offenders = [...found.values()].sort((a, b) => a.id - b.id || a.reason.localeCompare(b.reason));
  throw new UnmappableIdError(direction, offenders);
}

function compareAreas(a: Readonly<Position>, b: Readonly<Position>): number {
  return a.x - b.x || a.y - b.y || a.z - b.z;
}

/** Tiles grouped by 256x256 area, areas and tiles in write order. */
export function groupTilesByArea(map: Readonly<GameMap>): Array<{ base: Position; tiles: Tile[] }> {
  const areas = new Map<string, { base: Position; tiles: Tile[] }>();
  for (const tile of map.tiles.values()) {
    const base = areaBaseOf(tile.position);
    const key = `${base.x},${base.y},${base.z}`;
    let area = areas.get(key);
    if (!area) {
      area = { base, tiles: [] };
      areas.set(key, area);
    }
    area.tiles.push(tile);
  }
  const out = [...areas.values()].sort((a, b) => compareAreas(a.base, b.base));
  for (const area of out) {
    area.tiles.sort((a, b) => a.position.x - b.position.x || a.position.y - b.position.y);
  }
  return out;
}

/**
 * Streams `map` into `sink` as an OTBM file for `format`. Nothing is written
 * when an item id cannot be represented in the target id space.
 */
export function writeMap(
  map: Readonly<GameMap>,
  sink: ByteSink,
  format: FormatDescriptor,
  ctx: FormatContext = {},
): SaveOutcome {
  const items = itemContextFor(format, ctx);
  assertWritable(map, items);

  const warnings: ReportIssue[] = [];
  const stats: SaveStats = { tiles: 0, items: 0, areas: 0, bytes: 0 };
  const buf = new BinaryWriter(ctx.encoding ?? "cp1252");
  const w = new NodeWriter(sink);

  // Encoder range errors become InvalidMapDataError naming the entity.
  const encode = (where: string, fill: (b: BinaryWriter) => void): Uint8Array => {
    buf.reset();
    try {
      fill(buf);
    } catch (e: unknown) {
      if (isMapFormatError(e) || !(e instanceof Error)) throw e;
      throw new InvalidMapDataError(`${where}: ${e.message}`);
    }
    return buf.toBytes();
  };

  const writeItems = (roots: ReadonlyArray<Item>, where: string): void => {
    // null closes the item opened before its children were pushed
    const stack: Array<Item | null> = [];
    for (let i = roots.length - 1; i >= 0; i--) stack.push(roots[i]!);
    for (let next = stack.pop(); next !== undefined; next = stack.pop()) {
      if (next === null) {
        w.close();
        continue;
      }
      const item = next;
      w.open(NodeType.ITEM, encode(`Item ${item.id} on ${where}`, (b) => encodeItemPayload(item, items, b)));
      stats.items++;
      stack.push(null);
      const contents = item.contents ?? [];
      for (let i = contents.length - 1; i >= 0; i--) stack.push(contents[i]!);
    }
  };

  const h = map.header;
  w.writeIdentifier(new TextEncoder().encode(MAGIC_OTBM));
  w.open(
    NodeType.ROOT,
    encode("Map header", (b) =>
      encodeRootHeader(
        { version: format.version, width: h.width, height: h.height, itemsMajor: h.itemsMajor, itemsMinor: h.itemsMinor },
        b,
      ),
    ),
  );
  w.open(NodeType.MAP_DATA, encode("Map data", (b) => encodeMapDataPayload(h, b)));

  for (const area of groupTilesByArea(map)) {
    w.open(NodeType.TILE_AREA, encode("Tile area", (b) => encodeAreaPayload(area.base, b)));
    stats.areas++;
    for (const tile of area.tiles) {
      const where = `tile ${formatPosition(tile.position)}`;
      let children: Item[] = [];
      const payload = encode(`Tile ${formatPosition(tile.position)}`, (b) => {
        children = encodeTilePayload(tile, area.base, items, b);
      });
      w.open(tileNodeType(tile), payload);
      stats.tiles++;
      if (tile.ground && storesGroundInline(tile.ground, items)) stats.items++;
      writeItems(children, where);
      if (tile.zones && tile.zones.some((z) => z !== 0)) {
        const zones = tile.zones;
        w.leaf(NodeType.TILE_ZONE, encode(`Zones of ${where}`, (b) => encodeZonePayload(zones, b)));
      }
      w.close();
    }
    w.close();
  }

  if (map.towns.size > 0) {
    w.open(NodeType.TOWNS);
    for (const town of [...map.towns.values()].sort((a, b) => a.id - b.id)) {
      checkPosition(town.templePosition, `Temple of town ${town.id}`);
      w.leaf(NodeType.TOWN, encode(`Town ${town.id}`, (b) => encodeTown(town, b)));
    }
    w.close();
  }

  if (map.waypoints.size > 0) {
    const byName = [...map.waypoints.values()].sort((a, b) => {
      const la = a.name.toLowerCase();
      const lb = b.name.toLowerCase();
      return la < lb ? -1 : la > lb ? 1 : a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
    });
    w.open(NodeType.WAYPOINTS);
    for (const wp of byName) {
      checkPosition(wp.position, `Waypoint '${wp.name}'`);
      w.leaf(NodeType.WAYPOINT, encode(`Waypoint '${wp.name}'`, (b) => encodeWaypoint(wp, b)));
    }
    w.close();
  }

  if (map.spawns.length > 0) {
    if (format.embedSpawns === true) {
      w.open(NodeType.SPAWNS);
      for (const spawn of map.spawns) {
        const where = `Spawn at ${formatPosition(spawn.center)}`;
        w.open(NodeType.SPAWN_AREA, encode(where, (b) => encodeSpawnArea(spawn, b)));
        for (const c of spawn.creatures) {
          w.leaf(NodeType.MONSTER, encode(`${where}, creature '${c.name}'`, (b) => encodeSpawnCreature(c, b)));
        }
        w.close();
      }
      w.close();
    } else {
      warnings.push({
        code: "legacy_spawns",
        severity: "warning",
        message: `${map.spawns.length} spawn areas were not embedded; they belong in the spawn file`,
      });
    }
  }

  w.close(); // MAP_DATA
  w.close(); // root
  w.finish();
  stats.bytes = sink.bytesWritten;
  return { stats, warnings };
}

function buildReport(format: FormatDescriptor, outcome: SaveOutcome, path?: string): SaveReport {
  return {
    success: true,
    warnings: outcome.warnings,
    stats: outcome.stats,
    format,
    ...(path !== undefined ? { path } : {}),
  };
}

/** Serializes `map` in memory. Throws MapFormatError subclasses. */
export function saveMap(
  map: Readonly<GameMap>,
  format: FormatDescriptor,
  ctx: FormatContext = {},
): { bytes: Uint8Array; report: SaveReport } {
  const sink = new BufferSink();
  const outcome = writeMap(map, sink, format, ctx);
  return { bytes: sink.toBytes(), report: buildReport(format, outcome) };
}

/**
 * Writes `map` to `filePath` through a temp file and a rename. On failure the
 * existing file is left as it was.
 */
export async function saveMapFile(
  map: Readonly<GameMap>,
  filePath: string,
  format: FormatDescriptor,
  ctx: FormatContext = {},
): Promise<SaveResult> {
  try {
    const written = writeFileAtomic(filePath, (fd) => {
      const sink = new FileSink(fd);
      return writeMap(map, sink, format, ctx);
    });
    return { ok: true, report: buildReport(format, written.value, filePath) };
  } catch (e: unknown) {
    if (!isMapFormatError(e)) throw e;
    return {
      ok: false,
      error: e,
      report: { success: false, warnings: [], stats: { tiles: 0, items: 0, areas: 0, bytes: 0 }, format, path: filePath },
    };
  }
}
