// ─── Game State & Actions ──────────────────────────────────────────
// The complete snapshot of one game, plus the actions that change it.
// State is always immutable: every transition returns a new value.

import type { Meld } from "./meld";
import type { TileId } from "./tile";

// ─── Player ────────────────────────────────────────────────────────

export type PlayerId = string;

export interface Player {
  readonly id: PlayerId;
  /** `null` until someone joins into this slot. */
  readonly name: string | null;
  /** Private holdings; only the owner ever sees the contents. */
  readonly rack: readonly TileId[];
  readonly initialMeldMet: boolean;
}

// ─── Game Status ───────────────────────────────────────────────────

/**
 * Discriminated union for the game lifecycle.
 * Each status carries only the data relevant to that stage.
 */
export type GameStatus =
  | { readonly kind: "waiting_for_players" }
  | { readonly kind: "in_progress"; readonly startedAt: number }
  | {
      readonly kind: "completed";
      readonly finishedAt: number;
      readonly winnerId: PlayerId | null;
    };

export type GameStatusKind = GameStatus["kind"];

// ─── Game State ────────────────────────────────────────────────────

export type GameId = string;

/**
 * A full, serializable game snapshot. Racks, pool and board together
 * always hold each of the 106 tiles exactly once.
 */
export interface GameState {
  readonly gameId: GameId;
  /** Friendly display name, e.g. "Siege of Ironhold". */
  readonly name: string;
  /** Fixed slate of 2-4 slots, created up front with dealt racks. */
  readonly players: readonly Player[];
  /** Face-down tiles; draws take from the front. */
  readonly pool: readonly TileId[];
  readonly board: readonly Meld[];
  readonly currentPlayerIndex: number;
  readonly status: GameStatus;
  readonly createdAt: number;
  readonly updatedAt: number;
  /** Monotonically increasing version for optimistic concurrency. */
  readonly version: number;
}

// ─── Actions ───────────────────────────────────────────────────────

/**
 * Actions a player can take on their turn.
 * `play_tiles` submits the entire new board, not a delta.
 */
export type TurnAction =
  | { readonly kind: "play_tiles"; readonly melds: readonly Meld[] }
  | { readonly kind: "draw" };

// ─── Player View ───────────────────────────────────────────────────

/** Another player as seen by the viewer: rack size only. */
export interface OpponentView {
  readonly id: PlayerId;
  readonly name: string | null;
  readonly initialMeldMet: boolean;
  readonly rackSize: number;
}

/** A board meld together with its canonical id. */
export interface BoardMeldView extends Meld {
  readonly id: string;
}

/**
 * The projection of a game for one player. Opponent racks are reduced
 * to counts so no hidden tile ever leaves the engine.
 */
export interface PlayerView {
  readonly gameId: GameId;
  readonly name: string;
  readonly status: GameStatus;
  readonly me: Player;
  readonly opponents: readonly OpponentView[];
  readonly board: readonly BoardMeldView[];
  readonly poolSize: number;
  readonly currentPlayerId: PlayerId;
  readonly isMyTurn: boolean;
  readonly version: number;
}
