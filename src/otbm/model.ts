// src/otbm/model.ts
import type { AttrMapTypeValue } from "./constants.js";
import { TileFlag } from "./constants.js";

export type Position = { x: number; y: number; z: number };

export type AttributeMapEntry = {
  key: string;
  type: AttrMapTypeValue;
  // Raw value bytes as stored on disk (without the type tag).
  value: Uint8Array;
};

export type Item = {
  id: number; // always ServerID
  count?: number;
  charges?: number;
  actionId?: number;
  uniqueId?: number;
  text?: string;
  description?: string;
  destination?: Position;
  depotId?: number;
  houseDoorId?: number;
  duration?: number;
  decayState?: number;
  writtenDate?: number;
  writtenBy?: string;
  attributeMap?: AttributeMapEntry[];
  contents?: Item[];
  // Set on placeholders: the id read from disk that could not be resolved.
  rawUnknownId?: number;
  // Unrecognized attribute bytes, starting at the first unknown tag.
  opaque?: Uint8Array;
};

export type Tile = {
  position: Position;
  ground?: Item;
  items: Item[];
  flags: number;
  houseId?: number;
  zones?: number[];
  opaque?: Uint8Array;
};

export type House = {
  id: number;
  name: string;
  townId: number;
  rent: number;
  entry?: Position;
  tiles: Position[];
  guildhall: boolean;
};

export type Town = {
  id: number;
  name: string;
  templePosition: Position;
};

export type Waypoint = {
  name: string;
  position: Position;
};

export type SpawnCreature = {
  name: string;
  offset: { dx: number; dy: number };
  interval: number;
};

export type SpawnArea = {
  center: Position;
  radius: number;
  creatures: SpawnCreature[];
};

export type MapHeader = {
  version: number;
  width: number;
  height: number;
  itemsMajor: number;
  itemsMinor: number;
  description?: string;
  spawnFile?: string;
  houseFile?: string;
  npcSpawnFile?: string;
  zoneFile?: string;
  // Map-data attribute bytes from the first unknown tag on.
  opaque?: Uint8Array;
};

export type GameMap = {
  header: MapHeader;
  tiles: Map<number, Tile>;
  houses: Map<number, House>;
  towns: Map<number, Town>;
  waypoints: Map<string, Waypoint>;
  spawns: SpawnArea[];
};

export function positionKey(p: Readonly<Position>): number {
  return (p.z * 0x10000 + p.y) * 0x10000 + p.x;
}

export function positionFromKey(key: number): Position {
  const x = key % 0x10000;
  const rest = Math.floor(key / 0x10000);
  return { x, y: rest % 0x10000, z: Math.floor(rest / 0x10000) };
}

export function formatPosition(p: Readonly<Position>): string {
  return `(${p.x},${p.y},${p.z})`;
}

export function samePosition(a: Readonly<Position>, b: Readonly<Position>): boolean {
  return a.x === b.x && a.y === b.y && a.z === b.z;
}

export function createGameMap(header: Partial<MapHeader> = {}): GameMap {
  return {
    header: {
      version: 2,
      width: 256,
      height: 256,
      itemsMajor: 3,
      itemsMinor: 57,
      ...header,
    },
    tiles: new Map(),
    houses: new Map(),
    towns: new Map(),
    waypoints: new Map(),
    spawns: [],
  };
}

export function createTile(position: Position): Tile {
  return { position: { ...position }, items: [], flags: 0 };
}

export function createItem(id: number, fields: Omit<Partial<Item>, "id"> = {}): Item {
  return { id, ...fields };
}

export function getTile(map: GameMap, p: Readonly<Position>): Tile | undefined {
  return map.tiles.get(positionKey(p));
}

export function setTile(map: GameMap, tile: Tile): void {
  map.tiles.set(positionKey(tile.position), tile);
}

/** Returns the tile at `p`, creating an empty one first when absent. */
export function ensureTile(map: GameMap, p: Readonly<Position>): Tile {
  const key = positionKey(p);
  const existing = map.tiles.get(key);
  if (existing) return existing;
  const tile = createTile(p);
  map.tiles.set(key, tile);
  return tile;
}

export function tileCount(map: Readonly<GameMap>): number {
  return map.tiles.size;
}

export function hasTileFlag(tile: Readonly<Tile>, flag: number): boolean {
  return (tile.flags & flag) !== 0;
}

export function isProtectionZone(tile: Readonly<Tile>): boolean {
  return hasTileFlag(tile, TileFlag.PROTECTION_ZONE);
}

/** Visits every item of a tile, ground first, then the stack depth-first. */
export function* walkTileItems(tile: Readonly<Tile>): Generator<Item> {
  const stack: Item[] = [];
  for (let i = tile.items.length - 1; i >= 0; i--) stack.push(tile.items[i]!);
  if (tile.ground) stack.push(tile.ground);

  for (let item = stack.pop(); item !== undefined; item = stack.pop()) {
    yield item;
    const contents = item.contents;
    if (contents) {
      for (let i = contents.length - 1; i >= 0; i--) stack.push(contents[i]!);
    }
  }
}
