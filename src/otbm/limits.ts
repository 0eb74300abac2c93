// src/otbm/limits.ts
import { ResourceLimitExceededError } from "./errors.js";

export type ResourceLimits = Readonly<{
  maxFileBytes: number;
  maxDepth: number;
  // Largest single length-prefixed field (string, attribute blob).
  maxFieldBytes: number;
  maxTiles: number;
  maxItems: number;
}>;

export const DEFAULT_LIMITS: ResourceLimits = {
  maxFileBytes: 1024 * 1024 * 1024,
  maxDepth: 64,
  maxFieldBytes: 1024 * 1024,
  maxTiles: 4_000_000,
  maxItems: 32_000_000,
};

export function resolveLimits(overrides: Partial<ResourceLimits> = {}): ResourceLimits {
  const out = { ...DEFAULT_LIMITS, ...overrides };
  for (const [key, value] of Object.entries(out)) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new Error(`Invalid limit ${key}: expected positive integer, got ${value}`);
    }
  }
  return out;
}

const ENV_KEYS: ReadonlyArray<readonly [keyof ResourceLimits, string]> = [
  ["maxFileBytes", "OTBM_MAX_FILE_BYTES"],
  ["maxDepth", "OTBM_MAX_DEPTH"],
  ["maxFieldBytes", "OTBM_MAX_FIELD_BYTES"],
  ["maxTiles", "OTBM_MAX_TILES"],
  ["maxItems", "OTBM_MAX_ITEMS"],
];

/** Reads limit overrides from the environment. Unset variables are ignored. */
export function limitsFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ResourceLimits> {
  const out: { -readonly [K in keyof ResourceLimits]?: number } = {};
  for (const [key, name] of ENV_KEYS) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") continue;
    const n = Number(raw);
    if (!Number.isInteger(n) || n <= 0) {
      throw new Error(`Invalid ${name}: expected positive integer, got '${raw}'`);
    }
    out[key] = n;
  }
  return out;
}

export function checkFileSize(size: number, limits: ResourceLimits): void {
  if (size > limits.maxFileBytes) {
    throw new ResourceLimitExceededError("file bytes", size, limits.maxFileBytes);
  }
}

/** Counts decoded entities during a load and fails as soon as a cap is passed. */
export class ResourceGuard {
  private tiles = 0;
  private items = 0;

  public constructor(private readonly limits: ResourceLimits) {}

  public addTile(): void {
    this.tiles++;
    if (this.tiles > this.limits.maxTiles) {
      throw new ResourceLimitExceededError("tiles", this.tiles, this.limits.maxTiles);
    }
  }

  public addItem(): void {
    this.items++;
    if (this.items > this.limits.maxItems) {
      throw new ResourceLimitExceededError("items", this.items, this.limits.maxItems);
    }
  }

  public get tileCount(): number {
    return this.tiles;
  }

  public get itemCount(): number {
    return this.items;
  }
}
