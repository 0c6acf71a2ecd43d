// ─── Game Rules ────────────────────────────────────────────────────
// Stateless predicates that gate every action. Each is total and
// side-effect free; the turn engine decides the order they run in.

import type { GameState, Meld, Player, PlayerId, TileId } from "@rummikub/schema";
import { formatTile } from "../deck/tile-codec";
import { validateMeld } from "./meld-validator";
import { PASS, reject, violation, type RuleCheck } from "./results";

/** Points a player's first contribution to the board must reach. */
export const INITIAL_MELD_THRESHOLD = 30;

// ─── Turn Ownership ────────────────────────────────────────────────

export function findPlayer(state: GameState, playerId: PlayerId): Player | undefined {
  return state.players.find((p) => p.id === playerId);
}

/** True iff the game is in progress and it is `playerId`'s turn. */
export function turnOwnerOk(state: GameState, playerId: PlayerId): boolean {
  return (
    state.status.kind === "in_progress" &&
    state.players[state.currentPlayerIndex]?.id === playerId
  );
}

/**
 * `turnOwnerOk` with the reason spelled out: status first, then
 * membership, then whose turn it is.
 */
export function checkTurn(state: GameState, playerId: PlayerId): RuleCheck {
  switch (state.status.kind) {
    case "waiting_for_players":
      return reject("game_not_started", "Game has not started yet");
    case "completed":
      return reject("game_finished", "Game is already finished");
    case "in_progress":
      break;
  }
  if (!findPlayer(state, playerId)) {
    return reject("player_not_found", `Player ${playerId} is not in this game`);
  }
  if (!turnOwnerOk(state, playerId)) {
    return reject("not_players_turn", `It is not ${playerId}'s turn`);
  }
  return PASS;
}

// ─── Tiles ─────────────────────────────────────────────────────────

/** Fails with `tile_not_owned` on the first id missing from the rack. */
export function ownsTiles(player: Player, tileIds: Iterable<TileId>): RuleCheck {
  const rack = new Set(player.rack);
  for (const id of tileIds) {
    if (!rack.has(id)) {
      return reject("tile_not_owned", `${formatTile(id)} (${id}) is not in the player's rack`);
    }
  }
  return PASS;
}

function boardTiles(melds: readonly Meld[]): Set<TileId> {
  const tiles = new Set<TileId>();
  for (const meld of melds) {
    for (const id of meld.tiles) tiles.add(id);
  }
  return tiles;
}

/**
 * Tiles on the candidate board that are not on the current board: what
 * the acting player contributes, as opposed to what they rearrange.
 */
export function newlyPlayed(
  candidateMelds: readonly Meld[],
  currentMelds: readonly Meld[]
): ReadonlySet<TileId> {
  const current = boardTiles(currentMelds);
  const added = new Set<TileId>();
  for (const id of boardTiles(candidateMelds)) {
    if (!current.has(id)) added.add(id);
  }
  return added;
}

/**
 * A candidate board may hold each tile once, and must keep every tile
 * already on the board. Tiles never return from the board to a rack.
 */
export function boardIntegrityOk(
  candidateMelds: readonly Meld[],
  currentMelds: readonly Meld[]
): RuleCheck {
  const seen = new Set<TileId>();
  for (const [meldIndex, meld] of candidateMelds.entries()) {
    for (const id of meld.tiles) {
      if (seen.has(id)) {
        return {
          ok: false,
          violation: violation("duplicate_tile", `${id} appears more than once on the board`, meldIndex),
        };
      }
      seen.add(id);
    }
  }
  for (const id of boardTiles(currentMelds)) {
    if (!seen.has(id)) {
      return reject("board_tile_removed", `${id} is on the board and cannot be taken back`);
    }
  }
  return PASS;
}

/** Every meld must be legal; the first failure carries its index. */
export function meldsValid(candidateMelds: readonly Meld[]): RuleCheck {
  for (const [meldIndex, meld] of candidateMelds.entries()) {
    const result = validateMeld(meld);
    if (!result.ok) {
      return {
        ok: false,
        violation: { ...result.violation, meldIndex },
      };
    }
  }
  return PASS;
}

// ─── Initial Meld ──────────────────────────────────────────────────

/**
 * Until a player has opened, the melds they touch with new tiles must
 * be worth at least 30 points between them.
 */
export function initialMeldOk(
  player: Player,
  newly: ReadonlySet<TileId>,
  candidateMelds: readonly Meld[]
): RuleCheck {
  if (player.initialMeldMet) return PASS;

  let total = 0;
  for (const [meldIndex, meld] of candidateMelds.entries()) {
    if (!meld.tiles.some((id) => newly.has(id))) continue;
    const result = validateMeld(meld);
    if (!result.ok) {
      return { ok: false, violation: { ...result.violation, meldIndex } };
    }
    total += result.value;
  }

  if (total < INITIAL_MELD_THRESHOLD) {
    return reject(
      "initial_meld_not_met",
      `Initial meld must total at least ${INITIAL_MELD_THRESHOLD} points, got ${total}`
    );
  }
  return PASS;
}

// ─── Pool & Win ────────────────────────────────────────────────────

export function poolNonEmpty(state: GameState): RuleCheck {
  return state.pool.length > 0 ? PASS : reject("pool_empty", "Cannot draw from an empty pool");
}

/** An emptied rack only wins once the player has opened. */
export function hasWon(player: Player): boolean {
  return player.rack.length === 0 && player.initialMeldMet;
}

export function win(state: GameState, playerId: PlayerId): boolean {
  const player = findPlayer(state, playerId);
  return player !== undefined && hasWon(player);
}
