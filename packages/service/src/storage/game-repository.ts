// ─── Game Repository ───────────────────────────────────────────────
// Storage contract for game snapshots. The service depends only on this
// interface; callers inject the implementation.

import type { GameId, GameState } from "@rummikub/schema";

export interface GameRepository {
  /** Returns `null` for unknown or expired games. */
  load(gameId: GameId): Promise<GameState | null>;
  /**
   * Stores a snapshot. Rejects a snapshot whose version is not newer
   * than the stored one with `ConcurrentModificationError`.
   */
  save(state: GameState): Promise<void>;
  list(): Promise<readonly GameState[]>;
  delete(gameId: GameId): Promise<void>;
}
