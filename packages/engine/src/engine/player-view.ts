// ─── Player View ───────────────────────────────────────────────────
// Produces per-player projections of a game, hiding every rack but the
// viewer's own. This is the information boundary for multiplayer play.

import type {
  BoardMeldView,
  GameState,
  OpponentView,
  Player,
  PlayerId,
  PlayerView,
} from "@rummikub/schema";
import { meldId } from "./meld-validator";

export class PlayerNotFoundError extends Error {
  constructor(public readonly playerId: PlayerId) {
    super(`Player not found: ${playerId}`);
    this.name = "PlayerNotFoundError";
  }
}

function toOpponentView(player: Player): OpponentView {
  return {
    id: player.id,
    name: player.name,
    initialMeldMet: player.initialMeldMet,
    rackSize: player.rack.length,
  };
}

/**
 * Creates the view of `state` for `playerId`: their own rack in full,
 * opponents reduced to rack sizes, the pool reduced to a count.
 *
 * @throws {PlayerNotFoundError} if the player is not in the game.
 */
export function createPlayerView(state: GameState, playerId: PlayerId): PlayerView {
  const me = state.players.find((p) => p.id === playerId);
  if (!me) {
    throw new PlayerNotFoundError(playerId);
  }

  const board: BoardMeldView[] = state.board.map((meld) => ({
    id: meldId(meld),
    kind: meld.kind,
    tiles: [...meld.tiles],
  }));
  const currentPlayerId = state.players[state.currentPlayerIndex]?.id ?? me.id;

  return {
    gameId: state.gameId,
    name: state.name,
    status: state.status,
    me: { ...me, rack: [...me.rack] },
    opponents: state.players.filter((p) => p.id !== playerId).map(toOpponentView),
    board,
    poolSize: state.pool.length,
    currentPlayerId,
    isMyTurn: state.status.kind === "in_progress" && currentPlayerId === playerId,
    version: state.version,
  };
}
