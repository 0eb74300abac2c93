// src/otbm/errors.ts
import type { Position } from "./model.js";

export type MapErrorKind =
  | "StructuralCorruption"
  | "UnmappableId"
  | "ResourceLimitExceeded"
  | "VersionUnsupported"
  | "ItemDatabaseRequired"
  | "InvalidMapData"
  | "Cancelled";

/**
 * Base class of every fatal condition the engine raises. Callers switch on
 * `kind` to pick their wording.
 */
export abstract class MapFormatError extends Error {
  public abstract readonly kind: MapErrorKind;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad magic, broken escape sequence, unmatched END, truncated stream. */
export class StructuralCorruptionError extends MapFormatError {
  public readonly kind = "StructuralCorruption";

  public constructor(
    message: string,
    public readonly offset: number,
    public readonly nodePath: string = "",
  ) {
    super(`${message} (offset ${offset}${nodePath ? `, node ${nodePath}` : ""})`);
  }
}

// "unresolved" covers placeholder items whose id was never resolved on load.
export type IdDirection = "serverToClient" | "clientToServer" | "unresolved";

export type UnmappableOffender = Readonly<{
  id: number;
  positions: ReadonlyArray<Position>;
  reason: "unmapped" | "placeholder";
}>;

export class UnmappableIdError extends MapFormatError {
  public readonly kind = "UnmappableId";

  public constructor(
    public readonly direction: IdDirection,
    public readonly offenders: ReadonlyArray<UnmappableOffender>,
  ) {
    super(describeOffenders(direction, offenders));
  }
}

function describeOffenders(
  direction: IdDirection,
  offenders: ReadonlyArray<UnmappableOffender>,
): string {
  const space =
    direction === "serverToClient"
      ? "server id"
      : direction === "clientToServer"
        ? "client id"
        : "item id";
  const shown = offenders.slice(0, 5).map((o) => {
    const where = o.positions
      .slice(0, 3)
      .map((p) => `(${p.x},${p.y},${p.z})`)
      .join(" ");
    const more = o.positions.length > 3 ? ` +${o.positions.length - 3} more` : "";
    const tag = o.reason === "placeholder" ? " (placeholder)" : "";
    return where ? `${o.id}${tag} at ${where}${more}` : `${o.id}${tag}`;
  });
  const rest = offenders.length > 5 ? `; and ${offenders.length - 5} more ids` : "";
  return `Unmappable ${space}: ${shown.join("; ")}${rest}`;
}

export class ResourceLimitExceededError extends MapFormatError {
  public readonly kind = "ResourceLimitExceeded";

  public constructor(
    public readonly limit: string,
    public readonly actual: number,
    public readonly max: number,
  ) {
    super(`Resource limit exceeded: ${limit} ${actual} > ${max}`);
  }
}

export class VersionUnsupportedError extends MapFormatError {
  public readonly kind = "VersionUnsupported";

  public constructor(
    public readonly version: number,
    public readonly maxSupported: number,
  ) {
    super(`Unsupported OTBM version ${version} (this engine supports 0..${maxSupported})`);
  }
}

export class ItemDatabaseRequiredError extends MapFormatError {
  public readonly kind = "ItemDatabaseRequired";

  public constructor(message: string) {
    super(message);
  }
}

/** The in-memory map cannot be written as requested (out-of-range value, bad name). */
export class InvalidMapDataError extends MapFormatError {
  public readonly kind = "InvalidMapData";

  public constructor(message: string) {
    super(message);
  }
}

export class LoadCancelledError extends MapFormatError {
  public readonly kind = "Cancelled";

  public constructor(message = "Operation cancelled") {
    super(message);
  }
}

export function isMapFormatError(e: unknown): e is MapFormatError {
  return e instanceof MapFormatError;
}
