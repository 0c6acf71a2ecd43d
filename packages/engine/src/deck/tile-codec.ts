// ─── Tile Codec ────────────────────────────────────────────────────
// Conversions between tile identities and their compact ids, plus the
// fixed 106-tile universe. Pure functions over the id encoding.

import {
  COLOR_CODES,
  TILE_COLORS,
  TILE_COPIES,
  isTileId,
  isTileNumber,
  type ColorCode,
  type JokerTileId,
  type NumberedTileId,
  type Tile,
  type TileColor,
  type TileCopy,
  type TileId,
  type TileNumber,
} from "@rummikub/schema";

/** Raised for malformed ids or out-of-range arguments. Always a bug. */
export class TileCodecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TileCodecError";
  }
}

/** Raised when a joker is asked for a face value outside any meld. */
export class AmbiguousValueError extends Error {
  constructor(public readonly tileId: JokerTileId) {
    super(`Joker value is context-dependent: ${tileId}`);
    this.name = "AmbiguousValueError";
  }
}

const CODE_TO_COLOR: Readonly<Record<ColorCode, TileColor>> = {
  k: "black",
  r: "red",
  b: "blue",
  o: "orange",
};

const COLOR_RANK: Readonly<Record<TileColor, number>> = {
  black: 0,
  red: 1,
  blue: 2,
  orange: 3,
};

/** Total number of physical tiles. */
export const TILE_COUNT = 106;

// ─── Encoding ──────────────────────────────────────────────────────

export function encodeTile(number: number, color: TileColor, copy: TileCopy): NumberedTileId {
  if (!isTileNumber(number)) {
    throw new TileCodecError(`Tile number must be 1-13, got ${number}`);
  }
  return `${number}${COLOR_CODES[color]}${copy}`;
}

export function encodeJoker(copy: TileCopy): JokerTileId {
  return `j${copy}`;
}

// ─── Decoding ──────────────────────────────────────────────────────

export function isJoker(id: TileId): id is JokerTileId {
  return id.startsWith("j");
}

/**
 * Decodes an id into its tagged identity.
 * @throws {TileCodecError} if the value is not a grammatical id.
 */
export function decodeTile(id: string): Tile {
  if (!isTileId(id)) {
    throw new TileCodecError(`Invalid tile id: "${id}"`);
  }
  const copy = parseCopy(id.charAt(id.length - 1));
  if (isJoker(id)) {
    return { kind: "joker", copy };
  }
  const number = Number(id.slice(0, -2));
  if (!isTileNumber(number)) {
    throw new TileCodecError(`Invalid tile id: "${id}"`);
  }
  return { kind: "numbered", number, color: parseColor(id.charAt(id.length - 2)), copy };
}

/** @throws {TileCodecError} for jokers. */
export function numberOf(id: TileId): TileNumber {
  const tile = decodeTile(id);
  if (tile.kind === "joker") {
    throw new TileCodecError(`Cannot get number from joker tile: ${id}`);
  }
  return tile.number;
}

/** @throws {TileCodecError} for jokers. */
export function colorOf(id: TileId): TileColor {
  const tile = decodeTile(id);
  if (tile.kind === "joker") {
    throw new TileCodecError(`Cannot get color from joker tile: ${id}`);
  }
  return tile.color;
}

/**
 * Face value of a numbered tile.
 * @throws {AmbiguousValueError} for jokers; only a meld can resolve them.
 */
export function valueOf(id: TileId): TileNumber {
  if (isJoker(id)) {
    throw new AmbiguousValueError(id);
  }
  return numberOf(id);
}

// ─── Universe ──────────────────────────────────────────────────────

/**
 * All 106 ids: colours in canonical order, numbers ascending, copies
 * a then b, the two jokers last.
 */
export function fullUniverse(): readonly TileId[] {
  const ids: TileId[] = [];
  for (const color of TILE_COLORS) {
    for (let number = 1; number <= 13; number++) {
      for (const copy of TILE_COPIES) {
        ids.push(encodeTile(number, color, copy));
      }
    }
  }
  for (const copy of TILE_COPIES) {
    ids.push(encodeJoker(copy));
  }
  return ids;
}

// ─── Ordering & Display ────────────────────────────────────────────

/** Position of a colour in the canonical black, red, blue, orange order. */
export function colorRank(color: TileColor): number {
  return COLOR_RANK[color];
}

/**
 * Canonical total order: numbered tiles by colour, then number, then
 * copy; jokers after every numbered tile, copy a before b.
 */
export function compareTileIds(a: TileId, b: TileId): number {
  const ta = decodeTile(a);
  const tb = decodeTile(b);
  if (ta.kind === "joker" || tb.kind === "joker") {
    if (ta.kind !== tb.kind) return ta.kind === "joker" ? 1 : -1;
    return ta.copy.localeCompare(tb.copy);
  }
  return (
    COLOR_RANK[ta.color] - COLOR_RANK[tb.color] ||
    ta.number - tb.number ||
    ta.copy.localeCompare(tb.copy)
  );
}

/** Human-readable label, e.g. "Red 7" or "Joker". */
export function formatTile(id: TileId): string {
  const tile = decodeTile(id);
  switch (tile.kind) {
    case "joker":
      return "Joker";
    case "numbered":
      return `${tile.color.charAt(0).toUpperCase()}${tile.color.slice(1)} ${tile.number}`;
  }
}

// ─── Internal Helpers ──────────────────────────────────────────────

function parseCopy(char: string): TileCopy {
  if (char === "a" || char === "b") return char;
  throw new TileCodecError(`Invalid copy identifier: "${char}"`);
}

function parseColor(char: string): TileColor {
  switch (char) {
    case "k":
    case "r":
    case "b":
    case "o":
      return CODE_TO_COLOR[char];
    default:
      throw new TileCodecError(`Invalid color code: "${char}"`);
  }
}
