// ─── Test Fixtures ─────────────────────────────────────────────────
// Builders for hand-made snapshots that still hold all 106 tiles.

import type { GameState, GameStatus, Meld, MeldKind, Player, TileId } from "@rummikub/schema";
import { fullUniverse } from "../deck/tile-codec";

export const PLAYER_IDS = ["p1", "p2", "p3", "p4"] as const;
export const PLAYER_NAMES = ["Alice", "Bob", "Carol", "Dave"] as const;

export const STARTED_AT = 1_000;
export const NOW = 5_000;

export interface GameFixture {
  /** One rack per player; the player count follows from its length. */
  readonly racks: readonly (readonly TileId[])[];
  readonly board?: readonly Meld[];
  /**
   * Explicit pool. Tiles not placed anywhere else then go to the last
   * player's rack instead of the pool.
   */
  readonly pool?: readonly TileId[];
  readonly initialMeldMet?: readonly boolean[];
  readonly currentPlayerIndex?: number;
  readonly status?: GameStatus;
  /** Leave every seat unnamed. */
  readonly unnamed?: boolean;
}

export function meld(kind: MeldKind, ...tiles: TileId[]): Meld {
  return { kind, tiles };
}

/** Builds a conserving snapshot from the given racks, board and pool. */
export function makeGame(fixture: GameFixture): GameState {
  const board = fixture.board ?? [];
  const placed = new Set<TileId>([
    ...fixture.racks.flat(),
    ...board.flatMap((m) => m.tiles),
    ...(fixture.pool ?? []),
  ]);
  const leftovers = fullUniverse().filter((id) => !placed.has(id));
  const lastSlot = fixture.racks.length - 1;

  const players: Player[] = fixture.racks.map((rack, slot) => ({
    id: PLAYER_IDS[slot] ?? `p${slot + 1}`,
    name: fixture.unnamed ? null : (PLAYER_NAMES[slot] ?? `Player ${slot + 1}`),
    rack: fixture.pool !== undefined && slot === lastSlot ? [...rack, ...leftovers] : [...rack],
    initialMeldMet: fixture.initialMeldMet?.[slot] ?? false,
  }));

  return {
    gameId: "game-1",
    name: "Test Game",
    players,
    pool: fixture.pool !== undefined ? [...fixture.pool] : leftovers,
    board: [...board],
    currentPlayerIndex: fixture.currentPlayerIndex ?? 0,
    status: fixture.status ?? { kind: "in_progress", startedAt: STARTED_AT },
    createdAt: 0,
    updatedAt: 0,
    version: 0,
  };
}

/** Recursively freezes a value so any in-place mutation throws. */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
