// src/otbm/constants.ts

export const NODE_ESCAPE = 0xfd;
export const NODE_START = 0xfe;
export const NODE_END = 0xff;

export const MAGIC_OTBM = "OTBM";
export const MAGIC_WILDCARD = "\0\0\0\0";

export const NodeType = {
  ROOT: 0,
  ROOT_V1: 1,
  MAP_DATA: 2,
  ITEM_DEF: 3,
  TILE_AREA: 4,
  TILE: 5,
  ITEM: 6,
  TILE_SQUARE: 7,
  TILE_REF: 8,
  SPAWNS: 9,
  SPAWN_AREA: 10,
  MONSTER: 11,
  TOWNS: 12,
  TOWN: 13,
  HOUSETILE: 14,
  WAYPOINTS: 15,
  WAYPOINT: 16,
  TILE_ZONE: 19,
} as const;

export type NodeTypeName = keyof typeof NodeType;

const NODE_TYPE_NAMES = new Map<number, string>(
  Object.entries(NodeType).map(([name, value]) => [value, name]),
);

export function nodeTypeName(type: number): string {
  return NODE_TYPE_NAMES.get(type) ?? `0x${type.toString(16).padStart(2, "0")}`;
}

export const Attr = {
  DESCRIPTION: 1,
  EXT_FILE: 2,
  TILE_FLAGS: 3,
  ACTION_ID: 4,
  UNIQUE_ID: 5,
  TEXT: 6,
  DESC: 7,
  TELE_DEST: 8,
  ITEM: 9,
  DEPOT_ID: 10,
  EXT_SPAWN_FILE: 11,
  RUNE_CHARGES: 12,
  EXT_HOUSE_FILE: 13,
  HOUSEDOORID: 14,
  COUNT: 15,
  DURATION: 16,
  DECAYING_STATE: 17,
  WRITTENDATE: 18,
  WRITTENBY: 19,
  SLEEPERGUID: 20,
  SLEEPSTART: 21,
  CHARGES: 22,
  EXT_SPAWN_NPC_FILE: 23,
  EXT_ZONE_FILE: 24,
  ATTRIBUTE_MAP: 128,
} as const;

// Value type tags inside an ATTRIBUTE_MAP entry.
export const AttrMapType = {
  NONE: 0,
  STRING: 1,
  INTEGER: 2,
  FLOAT: 3,
  BOOLEAN: 4,
  DOUBLE: 5,
} as const;

export type AttrMapTypeValue = (typeof AttrMapType)[keyof typeof AttrMapType];

export const TileFlag = {
  PROTECTION_ZONE: 0x01,
  NO_PVP: 0x04,
  NO_LOGOUT: 0x08,
  PVP_ZONE: 0x10,
  REFRESH: 0x20,
} as const;

/** Highest structural version this engine reads and writes. */
export const MAX_OTBM_VERSION = 6;

/** Versions at or above this store ClientIDs on disk. */
export const FIRST_CLIENT_ID_VERSION = 5;

export const DEFAULT_OTBM_VERSION = 2;

// Area grouping: tiles share a base coordinate with the low byte cleared.
export const AREA_MASK = 0xff00;
