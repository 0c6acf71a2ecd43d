// ─── Tile Primitives ───────────────────────────────────────────────
// The 106 physical Rummikub tiles and their compact textual ids.
// Literal and template-literal types keep malformed ids out of the
// type system; the runtime guard below covers untyped input.

/** The four tile colours, in canonical order. */
export type TileColor = "black" | "red" | "blue" | "orange";

/** One-letter colour codes used inside tile ids. */
export type ColorCode = "k" | "r" | "b" | "o";

/** Face values 1 through 13. */
export type TileNumber = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13;

/** Every face value appears in two physical copies. */
export type TileCopy = "a" | "b";

/** Id of a numbered tile, e.g. `"10ra"` (red 10, copy a). */
export type NumberedTileId = `${TileNumber}${ColorCode}${TileCopy}`;

/** Id of a joker, `"ja"` or `"jb"`. */
export type JokerTileId = `j${TileCopy}`;

/** The wire format shared with clients. */
export type TileId = NumberedTileId | JokerTileId;

/**
 * Decoded tile identity. Discriminated on `kind` so that jokers can
 * never be asked for a colour or number by accident.
 */
export type Tile =
  | {
      readonly kind: "numbered";
      readonly number: TileNumber;
      readonly color: TileColor;
      readonly copy: TileCopy;
    }
  | { readonly kind: "joker"; readonly copy: TileCopy };

export const TILE_COLORS: readonly TileColor[] = ["black", "red", "blue", "orange"];

export const TILE_COPIES: readonly TileCopy[] = ["a", "b"];

export const COLOR_CODES: Readonly<Record<TileColor, ColorCode>> = {
  black: "k",
  red: "r",
  blue: "b",
  orange: "o",
};

export const MIN_TILE_NUMBER = 1;
export const MAX_TILE_NUMBER = 13;

/** Matches the id grammar `<1-13><k|r|b|o><a|b>` or `j<a|b>`. */
export const TILE_ID_PATTERN = /^(?:(?:[1-9]|1[0-3])[krbo][ab]|j[ab])$/;

/** Narrows an arbitrary value to a grammatical tile id. */
export function isTileId(value: unknown): value is TileId {
  return typeof value === "string" && TILE_ID_PATTERN.test(value);
}

/** Narrows a number to a legal face value. */
export function isTileNumber(value: number): value is TileNumber {
  return Number.isInteger(value) && value >= MIN_TILE_NUMBER && value <= MAX_TILE_NUMBER;
}
