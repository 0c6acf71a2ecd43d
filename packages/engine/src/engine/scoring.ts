// ─── Scoring ───────────────────────────────────────────────────────
// Rack penalties at the end of a game, and the forced finish used when
// a game can no longer be won by emptying a rack.

import type { GameState, PlayerId, TileId } from "@rummikub/schema";
import { isJoker, valueOf } from "../deck/tile-codec";
import { reject, type TransitionResult } from "./results";

/** A joker left on a rack costs more than any numbered tile. */
export const JOKER_PENALTY = 30;

export function rackPenalty(rack: readonly TileId[]): number {
  return rack.reduce((sum, id) => sum + (isJoker(id) ? JOKER_PENALTY : valueOf(id)), 0);
}

/** Penalty per player id. A winner's empty rack scores 0. */
export function calculatePenalties(state: GameState): Readonly<Record<PlayerId, number>> {
  const penalties: Record<PlayerId, number> = {};
  for (const player of state.players) {
    penalties[player.id] = rackPenalty(player.rack);
  }
  return penalties;
}

/**
 * Ends an in-progress game without a rack-emptying win, e.g. when the
 * pool is exhausted and nobody can move. The lowest penalty wins; a
 * tie for lowest leaves `winnerId` null.
 */
export function finishGame(state: GameState, now: number = Date.now()): TransitionResult {
  switch (state.status.kind) {
    case "waiting_for_players":
      return reject("game_not_started", "Game has not started yet");
    case "completed":
      return reject("game_finished", "Game is already finished");
    case "in_progress":
      break;
  }

  const penalties = state.players.map((p) => ({ id: p.id, penalty: rackPenalty(p.rack) }));
  const lowest = Math.min(...penalties.map((p) => p.penalty));
  const leaders = penalties.filter((p) => p.penalty === lowest);
  const winnerId = leaders.length === 1 && leaders[0] ? leaders[0].id : null;

  return {
    ok: true,
    state: {
      ...state,
      status: { kind: "completed", finishedAt: now, winnerId },
      updatedAt: now,
      version: state.version + 1,
    },
  };
}
