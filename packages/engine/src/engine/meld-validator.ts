// ─── Meld Validator ────────────────────────────────────────────────
// Decides whether an ordered list of tiles forms a legal group or run,
// resolves every joker to a concrete tile, prices the meld and derives
// its canonical id.

import {
  TILE_COLORS,
  isTileNumber,
  type Meld,
  type MeldKind,
  type MeldViolationCode,
  type ResolvedJoker,
  type RuleViolation,
  type TileColor,
  type TileId,
  type TileNumber,
} from "@rummikub/schema";
import { compareTileIds, decodeTile } from "../deck/tile-codec";
import { violation } from "./results";

export type MeldResult =
  | {
      readonly ok: true;
      /** Sum of face values, jokers counted at their resolved number. */
      readonly value: number;
      readonly jokerAssignment: ReadonlyMap<TileId, ResolvedJoker>;
    }
  | { readonly ok: false; readonly violation: RuleViolation };

interface NumberedSlot {
  readonly position: number;
  readonly id: TileId;
  readonly number: TileNumber;
  readonly color: TileColor;
}

interface JokerSlot {
  readonly position: number;
  readonly id: TileId;
}

const GROUP_MIN = 3;
const GROUP_MAX = 4;
const RUN_MIN = 3;

/**
 * Validates and prices a meld. Checks run in a fixed order and the
 * first failure is reported.
 */
export function validateAndPrice(kind: MeldKind, tiles: readonly TileId[]): MeldResult {
  if (tiles.length === 0) {
    return fail("size_error", `A ${kind} cannot be empty`);
  }
  if (kind === "group" && (tiles.length < GROUP_MIN || tiles.length > GROUP_MAX)) {
    return fail("size_error", `A group must have 3-4 tiles, got ${tiles.length}`);
  }
  if (kind === "run" && tiles.length < RUN_MIN) {
    return fail("size_error", `A run must have at least 3 tiles, got ${tiles.length}`);
  }

  const numbered: NumberedSlot[] = [];
  const jokers: JokerSlot[] = [];
  tiles.forEach((id, position) => {
    const tile = decodeTile(id);
    if (tile.kind === "joker") {
      jokers.push({ position, id });
    } else {
      numbered.push({ position, id, number: tile.number, color: tile.color });
    }
  });

  switch (kind) {
    case "group":
      return validateGroup(tiles, numbered, jokers);
    case "run":
      return validateRun(tiles, numbered, jokers);
  }
}

/** Convenience overload for a Meld value. */
export function validateMeld(meld: Meld): MeldResult {
  return validateAndPrice(meld.kind, meld.tiles);
}

// ─── Canonical Id ──────────────────────────────────────────────────

/**
 * Tiles in canonical order. Groups are sorted by colour (black, red,
 * blue, orange) with jokers last; runs keep their order because a
 * tile's position carries its value.
 */
export function canonicalTiles(kind: MeldKind, tiles: readonly TileId[]): readonly TileId[] {
  return kind === "group" ? [...tiles].sort(compareTileIds) : tiles;
}

/**
 * Pure function of composition: `meldId("group", ["10ra", "10ba", "10ka"])`
 * is `"10ka-10ra-10ba"` whatever the submission order.
 */
export function meldId(kind: MeldKind, tiles: readonly TileId[]): string;
export function meldId(meld: Meld): string;
export function meldId(kindOrMeld: MeldKind | Meld, tiles: readonly TileId[] = []): string {
  if (typeof kindOrMeld === "string") {
    return canonicalTiles(kindOrMeld, tiles).join("-");
  }
  return canonicalTiles(kindOrMeld.kind, kindOrMeld.tiles).join("-");
}

// ─── Group ─────────────────────────────────────────────────────────

function validateGroup(
  tiles: readonly TileId[],
  numbered: readonly NumberedSlot[],
  jokers: readonly JokerSlot[]
): MeldResult {
  const numbers = new Set(numbered.map((slot) => slot.number));
  if (numbers.size > 1) {
    return fail("mixed_numbers", `Group tiles must share one number, got ${[...numbers].join(", ")}`);
  }

  const used = new Set(numbered.map((slot) => slot.color));
  if (used.size !== numbered.length) {
    return fail("color_duplication", "Group tiles must all have different colors");
  }

  const [first] = numbered;
  if (first === undefined) {
    return fail("ambiguous_group", "A group needs at least one numbered tile to fix its number");
  }

  const available = TILE_COLORS.filter((color) => !used.has(color));
  if (jokers.length > available.length) {
    return fail(
      "too_many_jokers",
      `Too many jokers: ${jokers.length} for ${available.length} free color(s)`
    );
  }

  const jokerAssignment = new Map<TileId, ResolvedJoker>();
  jokers.forEach((joker, i) => {
    const color = available[i];
    if (color !== undefined) {
      jokerAssignment.set(joker.id, { number: first.number, color });
    }
  });

  return { ok: true, value: first.number * tiles.length, jokerAssignment };
}

// ─── Run ───────────────────────────────────────────────────────────

function validateRun(
  tiles: readonly TileId[],
  numbered: readonly NumberedSlot[],
  jokers: readonly JokerSlot[]
): MeldResult {
  const colors = new Set(numbered.map((slot) => slot.color));
  if (colors.size > 1) {
    return fail("mixed_colors", `Run tiles must share one color, got ${[...colors].join(", ")}`);
  }

  const [first] = numbered;
  if (first === undefined) {
    return fail("ambiguous_run", "A run needs at least one numbered tile to fix its color");
  }

  // Anchoring on the first numbered tile rejects [3, joker, 8]: one
  // joker cannot bridge the gap even though the tiles ascend.
  const start = first.number - first.position;
  for (const slot of numbered) {
    if (slot.number !== start + slot.position) {
      return fail(
        "non_consecutive",
        `Run expects ${start + slot.position} at position ${slot.position}, got ${slot.number}`
      );
    }
  }

  const end = start + tiles.length - 1;
  if (start < 1 || end > 13) {
    return fail("out_of_range", `Run would span ${start}..${end}, outside 1..13`);
  }

  const jokerAssignment = new Map<TileId, ResolvedJoker>();
  for (const joker of jokers) {
    const number = start + joker.position;
    if (isTileNumber(number)) {
      jokerAssignment.set(joker.id, { number, color: first.color });
    }
  }

  // start..end inclusive
  const value = ((start + end) * tiles.length) / 2;
  return { ok: true, value, jokerAssignment };
}

function fail(code: MeldViolationCode, message: string): MeldResult {
  return { ok: false, violation: violation(code, message) };
}
