// src/otbm/itemDatabase.ts
import { readFile } from "node:fs/promises";

import { BinaryReader } from "./binary.js";
import { BufferByteSource } from "./byteSource.js";
import { StructuralCorruptionError } from "./errors.js";
import type { NodePayload } from "./nodeReader.js";
import { NodeReader, readIdentifier } from "./nodeReader.js";

export const ItemGroup = {
  NONE: 0,
  GROUND: 1,
  CONTAINER: 2,
  WEAPON: 3,
  AMMUNITION: 4,
  ARMOR: 5,
  CHARGES: 6,
  TELEPORT: 7,
  MAGICFIELD: 8,
  WRITEABLE: 9,
  KEY: 10,
  SPLASH: 11,
  FLUID: 12,
  DOOR: 13,
  DEPRECATED: 14,
} as const;

export const ItemFlag = {
  BLOCK_SOLID: 1 << 0,
  BLOCK_PROJECTILE: 1 << 1,
  BLOCK_PATHFIND: 1 << 2,
  HAS_HEIGHT: 1 << 3,
  USEABLE: 1 << 4,
  PICKUPABLE: 1 << 5,
  MOVEABLE: 1 << 6,
  STACKABLE: 1 << 7,
} as const;

const ROOT_ATTR_VERSION = 0x01;
const VERSION_BLOCK_BYTES = 4 + 4 + 4 + 128;
const ITEM_ATTR_SERVERID = 0x10;
const ITEM_ATTR_CLIENTID = 0x11;

// Old databases without a "-major.minor" suffix in their description.
const LEGACY_CLIENT_VERSIONS = new Map<number, number>([
  [101, 740],
  [102, 750],
]);

export type ItemDatabaseHeader = Readonly<{
  major: number;
  minor: number;
  build: number;
  description: string;
}>;

export type ItemType = Readonly<{
  serverId: number;
  clientId: number;
  group: number;
  flags: number;
}>;

/**
 * Client version named by an items.otb header, e.g. "OTB 3.65.62-13.10"
 * gives 1310.
 */
export function clientVersionFromHeader(h: ItemDatabaseHeader): number {
  const m = /-(\d+)\.(\d+)/.exec(h.description);
  if (m) return Number(m[1]) * 100 + Number(m[2]);
  const otb = h.major * 100 + h.minor;
  return LEGACY_CLIENT_VERSIONS.get(otb) ?? otb;
}

export class ItemDatabase {
  private readonly byServerId = new Map<number, ItemType>();

  public constructor(
    public readonly header: ItemDatabaseHeader,
    types: Iterable<ItemType>,
  ) {
    for (const t of types) {
      if (!this.byServerId.has(t.serverId)) this.byServerId.set(t.serverId, t);
    }
  }

  public get size(): number {
    return this.byServerId.size;
  }

  public get clientVersion(): number {
    return clientVersionFromHeader(this.header);
  }

  public get(serverId: number): ItemType | undefined {
    return this.byServerId.get(serverId);
  }

  public has(serverId: number): boolean {
    return this.byServerId.has(serverId);
  }

  public isGround(serverId: number): boolean {
    return this.byServerId.get(serverId)?.group === ItemGroup.GROUND;
  }

  /** Stackable, fluid and splash items carry a subtype byte in the oldest format. */
  public hasSubtype(serverId: number): boolean {
    const t = this.byServerId.get(serverId);
    if (!t) return false;
    return (
      (t.flags & ItemFlag.STACKABLE) !== 0 ||
      t.group === ItemGroup.FLUID ||
      t.group === ItemGroup.SPLASH
    );
  }

  public types(): IterableIterator<ItemType> {
    return this.byServerId.values();
  }
}

function checkIdentifier(source: BufferByteSource): void {
  const id = readIdentifier(source);
  const text = String.fromCharCode(...id);
  if (text !== "OTBI" && text !== "\0\0\0\0") {
    throw new StructuralCorruptionError(`Invalid items.otb identifier ${JSON.stringify(text)}`, 0);
  }
}

function readRootHeader(payload: NodePayload): ItemDatabaseHeader {
  payload.readU32LE(); // flags, unused
  const attr = payload.readU8();
  if (attr !== ROOT_ATTR_VERSION) {
    throw payload.corrupt(`Expected version attribute in items.otb root, found 0x${attr.toString(16)}`);
  }
  const len = payload.readU16LE();
  if (len !== VERSION_BLOCK_BYTES) {
    throw payload.corrupt(`Invalid items.otb version block size ${len}`);
  }
  const major = payload.readU32LE();
  const minor = payload.readU32LE();
  const build = payload.readU32LE();
  const raw = payload.readBytes(128);
  const nul = raw.indexOf(0);
  const description = String.fromCharCode(...raw.subarray(0, nul < 0 ? raw.length : nul));
  return { major, minor, build, description };
}

function readItemType(group: number, payload: NodePayload): ItemType | null {
  const flags = payload.readU32LE();
  let serverId: number | undefined;
  let clientId: number | undefined;

  while (!payload.atEnd()) {
    const attr = payload.readU8();
    const data = payload.readBytes(payload.readU16LE());
    if (data.length !== 2) continue;
    const r = new BinaryReader(data);
    if (attr === ITEM_ATTR_SERVERID) serverId = r.readU16LE();
    else if (attr === ITEM_ATTR_CLIENTID) clientId = r.readU16LE();
  }

  if (serverId === undefined || clientId === undefined) return null;
  return { serverId, clientId, group, flags };
}

function openDatabase(bytes: Uint8Array): { reader: NodeReader; header: ItemDatabaseHeader } {
  const source = new BufferByteSource(bytes);
  checkIdentifier(source);
  const reader = new NodeReader(source, { maxDepth: 4, typeName: (t) => `node(${t})` });
  const root = reader.read();
  if (root === null || root.kind !== "open") {
    throw new StructuralCorruptionError("items.otb has no root node", source.offset);
  }
  return { reader, header: readRootHeader(root.payload) };
}

/** Reads just the header, without walking the item nodes. */
export function readItemDatabaseHeader(bytes: Uint8Array): ItemDatabaseHeader {
  return openDatabase(bytes).header;
}

export function readItemDatabase(bytes: Uint8Array): ItemDatabase {
  const { reader, header } = openDatabase(bytes);
  const types: ItemType[] = [];

  for (let ev = reader.read(); ev !== null; ev = reader.read()) {
    if (ev.kind !== "open") continue;
    if (ev.depth !== 1 || ev.type === ItemGroup.DEPRECATED) {
      reader.skipSubtree();
      continue;
    }
    const t = readItemType(ev.type, ev.payload);
    if (t) types.push(t);
  }

  return new ItemDatabase(header, types);
}

export async function loadItemDatabaseFile(filePath: string): Promise<ItemDatabase> {
  return readItemDatabase(await readFile(filePath));
}
