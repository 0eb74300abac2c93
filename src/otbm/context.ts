// src/otbm/context.ts
import type { IdTranslator } from "./idTranslator.js";
import type { ItemDatabase } from "./itemDatabase.js";
import type { ResourceLimits } from "./limits.js";
import type { House, SpawnArea } from "./model.js";
import type { ProjectMetadata } from "./project.js";
import type { TextEncoding } from "./text.js";

/**
 * Everything a load or save call needs besides the bytes and the map.
 * Passed explicitly on every call; the engine keeps no state between calls.
 */
export type FormatContext = Readonly<{
  itemDatabase?: ItemDatabase;
  // Derived from itemDatabase when omitted.
  translator?: IdTranslator;
  project?: ProjectMetadata;
  // Overrides the version in the file header.
  explicitVersion?: number;
  clientVersion?: number;
  itemsPath?: string;
  // House and spawn records read from the side-channel files.
  houses?: ReadonlyArray<House>;
  spawns?: ReadonlyArray<SpawnArea>;
  limits?: Partial<ResourceLimits>;
  signal?: AbortSignal;
  encoding?: TextEncoding;
  issueCap?: number;
  // Extra notes carried into the resolved descriptor (e.g. from workspace lookup).
  notes?: ReadonlyArray<string>;
}>;
