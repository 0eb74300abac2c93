// test/helpers.ts
// Hand-assembled wire bytes for building fixtures without the engine's own writer.

const FD = 0xfd;
const FE = 0xfe;
const FF = 0xff;

export function hex(text: string): Uint8Array {
  const clean = text.replace(/\s+/g, "");
  if (clean.length % 2 !== 0) throw new Error(`Odd hex length: ${clean.length}`);
  const out = new Uint8Array(clean.length / 2);
  for (let i = 0; i < out.length; i++) out[i] = parseInt(clean.slice(i * 2, i * 2 + 2), 16);
  return out;
}

export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join(" ");
}

export function u16(n: number): number[] {
  return [n & 0xff, (n >>> 8) & 0xff];
}

export function u32(n: number): number[] {
  return [n & 0xff, (n >>> 8) & 0xff, (n >>> 16) & 0xff, (n >>> 24) & 0xff];
}

export function ascii(text: string): number[] {
  return Array.from(text, (c) => c.charCodeAt(0));
}

export function str(text: string): number[] {
  return [...u16(text.length), ...ascii(text)];
}

export function pos(x: number, y: number, z: number): number[] {
  return [...u16(x), ...u16(y), z];
}

export function esc(payload: ReadonlyArray<number>): number[] {
  const out: number[] = [];
  for (const b of payload) {
    if (b === FD || b === FE || b === FF) out.push(FD);
    out.push(b);
  }
  return out;
}

/** One node: START, type, escaped payload, children as given, END. */
export function node(type: number, payload: ReadonlyArray<number> = [], children: ReadonlyArray<number[]> = []): number[] {
  return [FE, type, ...esc(payload), ...children.flat(), FF];
}

export function bytes(...parts: ReadonlyArray<number[]>): Uint8Array {
  return Uint8Array.from(parts.flat());
}

export type RootHeaderSpec = {
  version: number;
  width: number;
  height: number;
  itemsMajor?: number;
  itemsMinor?: number;
};

export function rootPayload(h: RootHeaderSpec): number[] {
  return [...u32(h.version), ...u16(h.width), ...u16(h.height), ...u32(h.itemsMajor ?? 3), ...u32(h.itemsMinor ?? 57)];
}

/** "OTBM" + root + map data holding the given children. */
export function otbmFile(h: RootHeaderSpec, mapDataPayload: number[], children: ReadonlyArray<number[]>): Uint8Array {
  return bytes(ascii("OTBM"), node(0, rootPayload(h), [node(2, mapDataPayload, children)]));
}

export type ItemSpec = {
  serverId: number;
  clientId: number;
  group?: number;
  flags?: number;
};

export type ItemsOtbHeader = {
  major?: number;
  minor?: number;
  build?: number;
  description?: string;
};

/** items.otb bytes with a wildcard identifier and one node per item. */
export function buildItemsOtb(items: ReadonlyArray<ItemSpec>, header: ItemsOtbHeader = {}): Uint8Array {
  const desc = ascii(header.description ?? "OTB 3.57.1-8.60");
  const csd = [...desc, ...new Array<number>(128 - desc.length).fill(0)];
  const root = [
    ...u32(0),
    0x01,
    ...u16(140),
    ...u32(header.major ?? 3),
    ...u32(header.minor ?? 57),
    ...u32(header.build ?? 1),
    ...csd,
  ];
  const children = items.map((it) =>
    node(it.group ?? 0, [...u32(it.flags ?? 0), 0x10, ...u16(2), ...u16(it.serverId), 0x11, ...u16(2), ...u16(it.clientId)]),
  );
  return bytes([0, 0, 0, 0], node(0, root, children));
}
