// src/otbm/mapValidator.ts
import type { GameMap, Position } from "./model.js";
import { formatPosition, getTile, positionKey, walkTileItems } from "./model.js";

export type ValidationSeverity = "error" | "warning";

export type ValidationCode =
  | "map_dimensions_invalid"
  | "tile_out_of_bounds"
  | "house_id_missing"
  | "house_id_invalid"
  | "house_unused"
  | "house_town_missing"
  | "house_entry_out_of_bounds"
  | "house_entry_missing_tile"
  | "house_member_mismatch"
  | "town_id_invalid"
  | "town_temple_out_of_bounds"
  | "waypoint_empty_name"
  | "waypoint_out_of_bounds"
  | "spawn_out_of_bounds"
  | "spawn_radius_invalid"
  | "spawn_empty_name"
  | "placeholder_item";

export type ValidationIssue = Readonly<{
  severity: ValidationSeverity;
  code: ValidationCode;
  message: string;
  position?: Position;
  id?: number;
  count?: number;
}>;

export type ValidationResult = Readonly<{
  issues: ReadonlyArray<ValidationIssue>;
  errors: number;
  warnings: number;
}>;

export type ValidatorOptions = Readonly<{
  maxZ?: number;
}>;

const SAMPLE_POSITIONS = 5;

/** Checks the cross references of an assembled map. Never modifies it. */
export function validateMap(map: Readonly<GameMap>, opts: ValidatorOptions = {}): ValidationResult {
  const maxZ = opts.maxZ ?? 15;
  const { width, height } = map.header;
  const issues: ValidationIssue[] = [];
  const add = (issue: ValidationIssue): void => {
    issues.push(issue);
  };

  const inBounds = (p: Readonly<Position>): boolean =>
    p.x >= 0 && p.x < width && p.y >= 0 && p.y < height && p.z >= 0 && p.z <= maxZ;

  if (width <= 0 || height <= 0) {
    add({
      severity: "error",
      code: "map_dimensions_invalid",
      message: `Map dimensions must be positive, got ${width}x${height}`,
    });
  }

  // Tiles
  const outside: Position[] = [];
  const houseTiles = new Map<number, Position[]>();
  const missingHouses = new Map<number, Position>();
  const placeholders = new Map<number, { first: Position; count: number }>();

  for (const tile of map.tiles.values()) {
    const p = tile.position;
    if (!inBounds(p)) outside.push(p);

    if (tile.houseId !== undefined) {
      const list = houseTiles.get(tile.houseId);
      if (list) list.push(p);
      else houseTiles.set(tile.houseId, [p]);
      if (!map.houses.has(tile.houseId) && !missingHouses.has(tile.houseId)) {
        missingHouses.set(tile.houseId, p);
      }
    }

    for (const item of walkTileItems(tile)) {
      if (item.rawUnknownId === undefined) continue;
      const seen = placeholders.get(item.rawUnknownId);
      if (seen) seen.count++;
      else placeholders.set(item.rawUnknownId, { first: p, count: 1 });
    }
  }

  if (outside.length > 0) {
    const sample = outside.slice(0, SAMPLE_POSITIONS).map(formatPosition).join(" ");
    add({
      severity: "error",
      code: "tile_out_of_bounds",
      message: `${outside.length} tile(s) outside the ${width}x${height} map: ${sample}`,
      count: outside.length,
    });
  }

  for (const [id, p] of missingHouses) {
    add({
      severity: "error",
      code: "house_id_missing",
      message: `Tile references house ${id}, which is not defined`,
      position: p,
      id,
    });
  }

  for (const [id, { first, count }] of placeholders) {
    add({
      severity: "error",
      code: "placeholder_item",
      message: `Unresolved item id ${id} on ${count} item(s)`,
      position: first,
      id,
      count,
    });
  }

  // Towns
  for (const town of map.towns.values()) {
    if (town.id <= 0) {
      add({ severity: "error", code: "town_id_invalid", message: "Town id must be positive", id: town.id });
    }
    if (!inBounds(town.templePosition)) {
      add({
        severity: "error",
        code: "town_temple_out_of_bounds",
        message: `Temple of town '${town.name}' is outside the map`,
        position: town.templePosition,
        id: town.id,
      });
    }
  }

  // Houses
  for (const house of map.houses.values()) {
    if (house.id <= 0) {
      add({ severity: "error", code: "house_id_invalid", message: "House id must be positive", id: house.id });
    }
    const own = houseTiles.get(house.id) ?? [];
    if (own.length === 0) {
      add({
        severity: "warning",
        code: "house_unused",
        message: `House '${house.name}' has no tiles`,
        id: house.id,
      });
    }
    if (house.townId !== 0 && !map.towns.has(house.townId)) {
      add({
        severity: "warning",
        code: "house_town_missing",
        message: `House '${house.name}' references town ${house.townId}, which is not defined`,
        id: house.id,
      });
    }
    if (house.entry) {
      if (!inBounds(house.entry)) {
        add({
          severity: "warning",
          code: "house_entry_out_of_bounds",
          message: `Entry of house '${house.name}' is outside the map`,
          position: house.entry,
          id: house.id,
        });
      } else if (!getTile(map, house.entry)) {
        add({
          severity: "warning",
          code: "house_entry_missing_tile",
          message: `Entry of house '${house.name}' has no tile`,
          position: house.entry,
          id: house.id,
        });
      }
    }

    const members = new Set(house.tiles.map(positionKey));
    for (const p of house.tiles) {
      if (getTile(map, p)?.houseId !== house.id) {
        add({
          severity: "warning",
          code: "house_member_mismatch",
          message: `House '${house.name}' lists ${formatPosition(p)}, which is not one of its tiles`,
          position: p,
          id: house.id,
        });
      }
    }
    for (const p of own) {
      if (!members.has(positionKey(p))) {
        add({
          severity: "warning",
          code: "house_member_mismatch",
          message: `Tile ${formatPosition(p)} belongs to house '${house.name}' but is missing from its tile list`,
          position: p,
          id: house.id,
        });
      }
    }
  }

  // Waypoints
  for (const wp of map.waypoints.values()) {
    if (wp.name === "") {
      add({ severity: "warning", code: "waypoint_empty_name", message: "Waypoint name is empty", position: wp.position });
    }
    if (!inBounds(wp.position)) {
      add({
        severity: "warning",
        code: "waypoint_out_of_bounds",
        message: `Waypoint '${wp.name}' is outside the map`,
        position: wp.position,
      });
    }
  }

  // Spawns
  for (const spawn of map.spawns) {
    if (!inBounds(spawn.center)) {
      add({
        severity: "error",
        code: "spawn_out_of_bounds",
        message: "Spawn center is outside the map",
        position: spawn.center,
      });
    }
    if (!Number.isInteger(spawn.radius) || spawn.radius < 0) {
      add({
        severity: "error",
        code: "spawn_radius_invalid",
        message: `Spawn radius must be a non-negative integer, got ${spawn.radius}`,
        position: spawn.center,
      });
    }
    for (const c of spawn.creatures) {
      if (c.name === "") {
        add({
          severity: "warning",
          code: "spawn_empty_name",
          message: "Spawn entry has an empty creature name",
          position: spawn.center,
        });
      }
    }
  }

  let errors = 0;
  for (const i of issues) if (i.severity === "error") errors++;
  return { issues, errors, warnings: issues.length - errors };
}

export function formatValidationIssue(issue: ValidationIssue): string {
  const at = issue.position ? ` at ${formatPosition(issue.position)}` : "";
  return `${issue.severity}: ${issue.code}: ${issue.message}${at}`;
}
