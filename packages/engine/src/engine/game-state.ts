// ─── Game State Lifecycle ──────────────────────────────────────────
// Creates fresh games (all slots dealt, none named) and guards the
// tile-conservation invariant that every transition must preserve.

import { randomInt, randomUUID } from "node:crypto";
import type { GameId, GameState, Player, PlayerId, TileId } from "@rummikub/schema";
import { TILE_COUNT, fullUniverse } from "../deck/tile-codec";
import { createRng } from "./prng";

export const MIN_PLAYERS = 2;
export const MAX_PLAYERS = 4;
/** Tiles dealt to each rack when a game is created. */
export const INITIAL_RACK_SIZE = 14;

export interface CreateGameOptions {
  readonly numPlayers: number;
  /**
   * Seed for the shuffle; the same seed always deals the same racks.
   * Drawn from the system CSPRNG when omitted.
   */
  readonly seed?: number;
  readonly gameId?: GameId;
  readonly name?: string;
  /** One id per slot; generated when omitted. */
  readonly playerIds?: readonly PlayerId[];
  readonly now?: number;
}

/**
 * Creates a game waiting for players. Every slot is pre-filled with a
 * dealt rack but no name; the rest of the shuffled tiles form the pool.
 *
 * @throws {RangeError} for player counts outside 2-4 or a mismatched
 *   `playerIds` list.
 */
export function createGame(options: CreateGameOptions): GameState {
  const { numPlayers, seed = randomInt(2 ** 31), now = Date.now() } = options;
  if (!Number.isInteger(numPlayers) || numPlayers < MIN_PLAYERS || numPlayers > MAX_PLAYERS) {
    throw new RangeError(
      `Number of players must be between ${MIN_PLAYERS} and ${MAX_PLAYERS}, got ${numPlayers}`
    );
  }

  const playerIds = options.playerIds ?? Array.from({ length: numPlayers }, () => randomUUID());
  if (playerIds.length !== numPlayers) {
    throw new RangeError(`Expected ${numPlayers} player ids, got ${playerIds.length}`);
  }
  if (new Set(playerIds).size !== playerIds.length) {
    throw new RangeError("Player ids must be unique");
  }

  const shuffled = createRng(seed).shuffle(fullUniverse());
  const players: Player[] = playerIds.map((id, slot) => ({
    id,
    name: null,
    rack: shuffled.slice(slot * INITIAL_RACK_SIZE, (slot + 1) * INITIAL_RACK_SIZE),
    initialMeldMet: false,
  }));

  const gameId = options.gameId ?? randomUUID();
  return {
    gameId,
    name: options.name ?? gameId,
    players,
    pool: shuffled.slice(numPlayers * INITIAL_RACK_SIZE),
    board: [],
    currentPlayerIndex: 0,
    status: { kind: "waiting_for_players" },
    createdAt: now,
    updatedAt: now,
    version: 0,
  };
}

// ─── Tile Conservation ─────────────────────────────────────────────

export interface TileConservationReport {
  readonly ok: boolean;
  readonly total: number;
  /** Universe ids held nowhere. */
  readonly missing: readonly TileId[];
  /** Ids held in more than one place (or twice in one place). */
  readonly duplicated: readonly TileId[];
}

/** Raised when a snapshot no longer holds each tile exactly once. */
export class TileConservationError extends Error {
  constructor(public readonly report: TileConservationReport) {
    super(
      `Tile conservation violated: ${report.total}/${TILE_COUNT} tiles, ` +
        `missing [${report.missing.join(", ")}], duplicated [${report.duplicated.join(", ")}]`
    );
    this.name = "TileConservationError";
  }
}

/** Compares racks + pool + board against the 106-tile universe. */
export function checkTileConservation(state: GameState): TileConservationReport {
  const counts = new Map<TileId, number>();
  let total = 0;
  const count = (ids: readonly TileId[]) => {
    for (const id of ids) {
      counts.set(id, (counts.get(id) ?? 0) + 1);
      total++;
    }
  };

  for (const player of state.players) count(player.rack);
  count(state.pool);
  for (const meld of state.board) count(meld.tiles);

  const missing = fullUniverse().filter((id) => !counts.has(id));
  const duplicated = [...counts.entries()].filter(([, n]) => n > 1).map(([id]) => id);

  return {
    ok: missing.length === 0 && duplicated.length === 0 && total === TILE_COUNT,
    total,
    missing,
    duplicated,
  };
}

/** @throws {TileConservationError} */
export function assertTileConservation(state: GameState): void {
  const report = checkTileConservation(state);
  if (!report.ok) {
    throw new TileConservationError(report);
  }
}
