// ─── Melds ─────────────────────────────────────────────────────────

import type { TileColor, TileId, TileNumber } from "./tile";

/**
 * - `group`: 3-4 tiles of one number in distinct colours
 * - `run`:   3+ tiles of one colour with consecutive numbers
 */
export type MeldKind = "group" | "run";

/**
 * A combination of tiles on the board. Tile order is load-bearing for
 * runs (a joker's value depends on its position) and irrelevant for
 * groups. A meld carries no stored id; see `meldId` in the engine.
 */
export interface Meld {
  readonly kind: MeldKind;
  readonly tiles: readonly TileId[];
}

/** The concrete tile a joker stands for inside a validated meld. */
export interface ResolvedJoker {
  readonly number: TileNumber;
  readonly color: TileColor;
}
