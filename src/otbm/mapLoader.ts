// src/otbm/mapLoader.ts
import { stat } from "node:fs/promises";

import type { ByteSource } from "./byteSource.js";
import { BufferByteSource, FileByteSource } from "./byteSource.js";
import { MAX_OTBM_VERSION, NodeType } from "./constants.js";
import type { FormatContext } from "./context.js";
import type { MapFormatError } from "./errors.js";
import {
  ItemDatabaseRequiredError,
  LoadCancelledError,
  StructuralCorruptionError,
  VersionUnsupportedError,
  isMapFormatError,
} from "./errors.js";
import type { FormatDescriptor } from "./formatVersion.js";
import { resolveFormat } from "./formatVersion.js";
import { IdTranslator } from "./idTranslator.js";
import type { ItemCodecContext } from "./itemCodec.js";
import { decodeItemPayload } from "./itemCodec.js";
import type { ResourceLimits } from "./limits.js";
import { ResourceGuard, checkFileSize, resolveLimits } from "./limits.js";
import {
  decodeMapDataPayload,
  decodeRootHeader,
  decodeSpawnArea,
  decodeSpawnCreature,
  decodeTown,
  decodeWaypoint,
} from "./mapDataCodec.js";
import { sniffMapKind } from "./mapDetection.js";
import type { GameMap, House, Item, Position, SpawnArea, Tile } from "./model.js";
import { createGameMap, formatPosition, positionKey } from "./model.js";
import type { NodeOpenEvent } from "./nodeReader.js";
import { NodeReader, readIdentifier } from "./nodeReader.js";
import type { LoadReport } from "./report.js";
import { ReportBuilder } from "./report.js";
import { decodeAreaPayload, decodeTilePayload, decodeZonePayload } from "./tileCodec.js";

export type LoadResult =
  | { ok: true; map: GameMap; report: LoadReport }
  | { ok: false; error: MapFormatError; report: LoadReport };

type Frame =
  | { kind: "root" }
  | { kind: "mapData" }
  | { kind: "area"; base: Position }
  | { kind: "tile"; tile: Tile }
  | { kind: "item"; item: Item; position: Position }
  | { kind: "towns" }
  | { kind: "waypoints" }
  | { kind: "spawns" }
  | { kind: "spawnArea"; spawn: SpawnArea }
  // Nodes with no children of their own (town, waypoint, zone, creature).
  | { kind: "leaf" };

type FrameKind = Frame["kind"];
type FrameOf<K extends FrameKind> = Extract<Frame, { kind: K }>;

function isFrame<K extends FrameKind>(f: Frame, kind: K): f is FrameOf<K> {
  return f.kind === kind;
}

type LoadState = {
  readonly map: GameMap;
  readonly format: FormatDescriptor;
  readonly items: ItemCodecContext;
  readonly report: ReportBuilder;
  readonly guard: ResourceGuard;
  readonly missingHouses: Set<number>;
  readonly signal: AbortSignal | undefined;
};

type NodeDecoder = Readonly<{
  parents: ReadonlyArray<FrameKind>;
  open: (ev: NodeOpenEvent, parent: Frame, st: LoadState) => Frame;
  close?: (frame: Frame, st: LoadState) => void;
}>;

const LEAF: Frame = { kind: "leaf" };

function expectFrame<K extends FrameKind>(f: Frame, kind: K): FrameOf<K> {
  if (!isFrame(f, kind)) throw new Error(`Decoder expected a ${kind} parent, got ${f.kind}`);
  return f;
}

function attachItem(parent: Frame, item: Item, st: LoadState): void {
  if (isFrame(parent, "item")) {
    (parent.item.contents ??= []).push(item);
    return;
  }
  const tile = expectFrame(parent, "tile").tile;
  const db = st.items.itemDatabase;
  if (tile.ground === undefined && tile.items.length === 0 && db?.isGround(item.id) === true) {
    tile.ground = item;
  } else {
    tile.items.push(item);
  }
}

// Area base plus tile offset can pass the u16 range; such positions would alias others.
const MAX_COORDINATE = 0xffff;

function commitTile(tile: Tile, st: LoadState): void {
  const { map, report } = st;
  const p = tile.position;
  if (p.x > MAX_COORDINATE || p.y > MAX_COORDINATE) {
    report.warn("invalid_position", `Tile ${formatPosition(p)} lies past the coordinate range; dropped`, {
      position: p,
    });
    return;
  }
  const key = positionKey(p);

  const previous = map.tiles.get(key);
  if (previous) {
    report.warn("duplicate_tile", `Tile ${formatPosition(p)} appears more than once; keeping the last`, {
      position: p,
    });
    const owner = previous.houseId !== undefined ? map.houses.get(previous.houseId) : undefined;
    if (owner) owner.tiles = owner.tiles.filter((t) => positionKey(t) !== key);
  }
  map.tiles.set(key, tile);

  const { width, height } = map.header;
  if ((width > 0 && p.x >= width) || (height > 0 && p.y >= height) || p.z > 15) {
    report.warn("out_of_bounds", `Tile ${formatPosition(p)} is outside the ${width}x${height} map`, {
      position: p,
    });
  }

  if (tile.houseId !== undefined) {
    const house = map.houses.get(tile.houseId);
    if (house) {
      house.tiles.push({ ...p });
    } else if (!st.missingHouses.has(tile.houseId)) {
      st.missingHouses.add(tile.houseId);
      report.warn("missing_house", `Tile references house ${tile.houseId}, which is not defined`, {
        position: p,
        id: tile.houseId,
      });
    }
  }
}

const DECODERS: ReadonlyMap<number, NodeDecoder> = new Map<number, NodeDecoder>([
  [
    NodeType.MAP_DATA,
    {
      parents: ["root"],
      open: (ev, _parent, st) => {
        decodeMapDataPayload(ev.payload, st.map.header, st.report);
        return { kind: "mapData" };
      },
    },
  ],
  [
    NodeType.TILE_AREA,
    {
      parents: ["mapData"],
      open: (ev) => ({ kind: "area", base: decodeAreaPayload(ev.payload) }),
    },
  ],
  [
    NodeType.TILE,
    {
      parents: ["area"],
      open: (ev, parent, st) => openTile(ev, parent, st),
      close: (frame, st) => commitTile(expectFrame(frame, "tile").tile, st),
    },
  ],
  [
    NodeType.HOUSETILE,
    {
      parents: ["area"],
      open: (ev, parent, st) => openTile(ev, parent, st),
      close: (frame, st) => commitTile(expectFrame(frame, "tile").tile, st),
    },
  ],
  [
    NodeType.ITEM,
    {
      parents: ["tile", "item"],
      open: (ev, parent, st) => {
        const position = isFrame(parent, "item") ? parent.position : expectFrame(parent, "tile").tile.position;
        st.guard.addItem();
        const item = decodeItemPayload(ev.payload, st.items, st.report, position);
        attachItem(parent, item, st);
        return { kind: "item", item, position };
      },
    },
  ],
  [
    NodeType.TILE_ZONE,
    {
      parents: ["tile"],
      open: (ev, parent) => {
        const tile = expectFrame(parent, "tile").tile;
        const zones = decodeZonePayload(ev.payload);
        if (zones.length > 0) {
          tile.zones = [...new Set([...(tile.zones ?? []), ...zones])].sort((a, b) => a - b);
        }
        return LEAF;
      },
    },
  ],
  [
    NodeType.TOWNS,
    {
      parents: ["mapData"],
      open: () => ({ kind: "towns" }),
    },
  ],
  [
    NodeType.TOWN,
    {
      parents: ["towns"],
      open: (ev, _parent, st) => {
        const town = decodeTown(ev.payload);
        st.map.towns.set(town.id, town);
        return LEAF;
      },
    },
  ],
  [
    NodeType.WAYPOINTS,
    {
      parents: ["mapData"],
      open: () => ({ kind: "waypoints" }),
    },
  ],
  [
    NodeType.WAYPOINT,
    {
      parents: ["waypoints"],
      open: (ev, _parent, st) => {
        const wp = decodeWaypoint(ev.payload);
        st.map.waypoints.set(wp.name, wp);
        return LEAF;
      },
    },
  ],
  [
    NodeType.SPAWNS,
    {
      parents: ["mapData"],
      open: (_ev, _parent, st) => {
        st.report.warn("legacy_spawns", "Map embeds spawns; newer servers read them from a side file");
        return { kind: "spawns" };
      },
    },
  ],
  [
    NodeType.SPAWN_AREA,
    {
      parents: ["spawns"],
      open: (ev, _parent, st) => {
        const spawn = decodeSpawnArea(ev.payload);
        st.map.spawns.push(spawn);
        return { kind: "spawnArea", spawn };
      },
    },
  ],
  [
    NodeType.MONSTER,
    {
      parents: ["spawnArea"],
      open: (ev, parent) => {
        expectFrame(parent, "spawnArea").spawn.creatures.push(decodeSpawnCreature(ev.payload));
        return LEAF;
      },
    },
  ],
]);

function openTile(ev: NodeOpenEvent, parent: Frame, st: LoadState): Frame {
  const base = expectFrame(parent, "area").base;
  st.guard.addTile();
  const tile = decodeTilePayload(ev.payload, ev.type, base, st.items, st.report);
  if (tile.ground) st.guard.addItem();
  for (let i = 0; i < tile.items.length; i++) st.guard.addItem();
  return { kind: "tile", tile };
}

function checkIdentifier(id: Uint8Array): void {
  const magic = String.fromCharCode(...id);
  if (magic === "OTBM" || magic === "\0\0\0\0") return;
  const sniffed = sniffMapKind(id);
  const hint = sniffed.kind !== "unknown" ? ` (looks like ${sniffed.kind})` : "";
  throw new StructuralCorruptionError(`Not an OTBM file: identifier ${JSON.stringify(magic)}${hint}`, 0);
}

function installSideChannel(map: GameMap, ctx: FormatContext): void {
  for (const h of ctx.houses ?? []) {
    const house: House = { ...h, tiles: [] };
    if (h.entry) house.entry = { ...h.entry };
    map.houses.set(house.id, house);
  }
  for (const s of ctx.spawns ?? []) {
    map.spawns.push({
      center: { ...s.center },
      radius: s.radius,
      creatures: s.creatures.map((c) => ({ ...c, offset: { ...c.offset } })),
    });
  }
}

function buildItemContext(format: FormatDescriptor, ctx: FormatContext): ItemCodecContext {
  const translator =
    ctx.translator ?? (ctx.itemDatabase ? IdTranslator.fromDatabase(ctx.itemDatabase) : undefined);
  return {
    version: format.version,
    usesClientIds: format.usesClientIds,
    ...(translator ? { translator } : {}),
    ...(ctx.itemDatabase ? { itemDatabase: ctx.itemDatabase } : {}),
  };
}

function decodeMap(source: ByteSource, ctx: FormatContext, limits: ResourceLimits, report: ReportBuilder): GameMap {
  checkIdentifier(readIdentifier(source));

  const reader = new NodeReader(source, {
    maxDepth: limits.maxDepth,
    maxFieldBytes: limits.maxFieldBytes,
    encoding: ctx.encoding ?? "cp1252",
  });

  const root = reader.read();
  if (root === null || root.kind !== "open") {
    throw new StructuralCorruptionError("Missing root node", source.offset);
  }
  if (root.type !== NodeType.ROOT && root.type !== NodeType.ROOT_V1) {
    throw new StructuralCorruptionError(`Unexpected root node type ${root.type}`, root.offset);
  }

  const header = decodeRootHeader(root.payload);
  if (header.version > MAX_OTBM_VERSION) {
    throw new VersionUnsupportedError(header.version, MAX_OTBM_VERSION);
  }

  const format = resolveFormat({
    headerVersion: header.version,
    ...(ctx.explicitVersion !== undefined ? { explicitVersion: ctx.explicitVersion } : {}),
    ...(ctx.clientVersion !== undefined ? { explicitClientVersion: ctx.clientVersion } : {}),
    ...(ctx.project ? { project: ctx.project } : {}),
    ...(ctx.itemDatabase ? { itemDatabase: ctx.itemDatabase.header } : {}),
    ...(ctx.itemsPath !== undefined ? { itemsPath: ctx.itemsPath } : {}),
  });
  const notes = [...(ctx.notes ?? []), ...format.notes];
  report.format = { ...format, notes };
  for (const note of notes) report.warn("project_metadata", note);

  const items = buildItemContext(format, ctx);
  if (format.usesClientIds && items.translator === undefined) {
    throw new ItemDatabaseRequiredError(
      `OTBM version ${format.version} stores client ids; an item database is required to load it`,
    );
  }
  const conflicts = items.translator?.buildReport.conflicts.length ?? 0;
  if (conflicts > 0) {
    report.warn("translator_conflicts", `Item database has ${conflicts} conflicting server/client id pairs; kept the first of each`);
  }

  const map = createGameMap({ ...header, version: format.version });
  installSideChannel(map, ctx);

  const st: LoadState = {
    map,
    format,
    items,
    report,
    guard: new ResourceGuard(limits),
    missingHouses: new Set(),
    signal: ctx.signal,
  };

  const frames: Frame[] = [{ kind: "root" }];

  for (let ev = reader.read(); ev !== null; ev = reader.read()) {
    if (ev.kind === "close") {
      const frame = frames.pop();
      if (frame === undefined) throw new StructuralCorruptionError("Unbalanced node close", reader.offset);
      DECODERS.get(ev.type)?.close?.(frame, st);
      continue;
    }

    const parent = frames[frames.length - 1];
    if (parent === undefined) throw new StructuralCorruptionError("Node outside the root", ev.offset);

    if (isFrame(parent, "mapData") && st.signal?.aborted === true) {
      throw new LoadCancelledError("Load cancelled");
    }

    const decoder = DECODERS.get(ev.type);
    if (!decoder || !decoder.parents.includes(parent.kind)) {
      report.warn("unexpected_node", `Skipping node ${ev.type} inside ${reader.path()}`, { offset: ev.offset });
      reader.skipSubtree();
      continue;
    }
    frames.push(decoder.open(ev, parent, st));
  }

  const s = report.stats;
  s.tiles = st.guard.tileCount;
  s.items = st.guard.itemCount;
  s.houses = map.houses.size;
  s.towns = map.towns.size;
  s.waypoints = map.waypoints.size;
  s.spawns = map.spawns.length;
  s.bytes = source.offset;
  s.peakDepth = reader.peakDepth;
  s.peakFieldBytes = reader.peakFieldBytes;
  return map;
}

/**
 * Decodes a whole map. Structural problems abort with no map; anomalies the
 * engine can work around are listed in the report.
 */
export function loadMap(source: ByteSource | Uint8Array, ctx: FormatContext = {}): LoadResult {
  const report = new ReportBuilder(ctx.issueCap);
  try {
    const limits = resolveLimits(ctx.limits);
    const src = source instanceof Uint8Array ? new BufferByteSource(source) : source;
    if (source instanceof Uint8Array) checkFileSize(source.length, limits);
    const map = decodeMap(src, ctx, limits, report);
    return { ok: true, map, report: report.build(true) };
  } catch (e: unknown) {
    if (isMapFormatError(e)) return { ok: false, error: e, report: report.build(false) };
    throw e;
  }
}

/** Streams a map file through a fixed-size window. */
export async function loadMapFile(filePath: string, ctx: FormatContext = {}): Promise<LoadResult> {
  const report = new ReportBuilder(ctx.issueCap);
  try {
    checkFileSize((await stat(filePath)).size, resolveLimits(ctx.limits));
  } catch (e: unknown) {
    if (isMapFormatError(e)) return { ok: false, error: e, report: report.build(false) };
    throw e;
  }

  const source = new FileByteSource(filePath);
  try {
    return loadMap(source, ctx);
  } finally {
    source.close();
  }
}
