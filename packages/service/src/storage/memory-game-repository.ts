// ─── Memory Game Repository ────────────────────────────────────────
// Keeps gzip-compressed JSON snapshots in a Map. Snapshots are
// re-validated on the way out, and completed games expire after a TTL.

import { gzip, ungzip } from "pako";
import { SnapshotParseError, parseGameSnapshot, type GameId, type GameState } from "@rummikub/schema";
import { ConcurrentModificationError } from "../errors";
import type { GameRepository } from "./game-repository";

interface StoredEntry {
  readonly blob: Uint8Array;
  readonly version: number;
  /** `null` while the game is still live. */
  readonly expiresAt: number | null;
}

export interface MemoryGameRepositoryOptions {
  readonly completedTtlMs: number;
  readonly clock?: () => number;
}

// ─── Internal Helpers ──────────────────────────────────────────────

function compressState(state: GameState): Uint8Array {
  return gzip(JSON.stringify(state));
}

function decompressState(blob: Uint8Array): GameState {
  const json = ungzip(blob, { to: "string" });
  return parseGameSnapshot(JSON.parse(json));
}

export class MemoryGameRepository implements GameRepository {
  private readonly entries = new Map<GameId, StoredEntry>();
  private readonly clock: () => number;

  constructor(private readonly options: MemoryGameRepositoryOptions) {
    this.clock = options.clock ?? Date.now;
  }

  async load(gameId: GameId): Promise<GameState | null> {
    const entry = this.liveEntry(gameId);
    return entry ? decompressState(entry.blob) : null;
  }

  async save(state: GameState): Promise<void> {
    const current = this.liveEntry(state.gameId);
    if (current && current.version >= state.version) {
      throw new ConcurrentModificationError(
        state.gameId,
        `Game ${state.gameId} is at version ${current.version}; refusing to write version ${state.version}`
      );
    }

    this.entries.set(state.gameId, {
      blob: compressState(state),
      version: state.version,
      expiresAt:
        state.status.kind === "completed" ? this.clock() + this.options.completedTtlMs : null,
    });
  }

  /** Live games, newest first. Unreadable snapshots are logged and skipped. */
  async list(): Promise<readonly GameState[]> {
    const games: GameState[] = [];
    for (const gameId of [...this.entries.keys()]) {
      const entry = this.liveEntry(gameId);
      if (!entry) continue;
      try {
        games.push(decompressState(entry.blob));
      } catch (err) {
        if (!(err instanceof SnapshotParseError)) throw err;
        console.warn("[MemoryGameRepository] Skipping corrupt snapshot:", gameId, err.issues);
      }
    }
    return games.sort((a, b) => b.createdAt - a.createdAt);
  }

  async delete(gameId: GameId): Promise<void> {
    this.entries.delete(gameId);
  }

  /** Raw stored bytes, for inspection. */
  rawSnapshot(gameId: GameId): Uint8Array | null {
    return this.entries.get(gameId)?.blob ?? null;
  }

  private liveEntry(gameId: GameId): StoredEntry | undefined {
    const entry = this.entries.get(gameId);
    if (entry && entry.expiresAt !== null && entry.expiresAt <= this.clock()) {
      this.entries.delete(gameId);
      return undefined;
    }
    return entry;
  }
}
