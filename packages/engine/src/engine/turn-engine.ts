// ─── Turn Engine ───────────────────────────────────────────────────
// The game's state machine: waiting_for_players -> in_progress ->
// completed. Every operation takes an immutable snapshot and returns
// either a complete new snapshot or the first rule it broke.

import {
  MAX_PLAYER_NAME_LENGTH,
  type GameState,
  type GameStatus,
  type Meld,
  type Player,
  type PlayerId,
  type TurnAction,
} from "@rummikub/schema";
import {
  boardIntegrityOk,
  checkTurn,
  findPlayer,
  hasWon,
  initialMeldOk,
  meldsValid,
  newlyPlayed,
  ownsTiles,
  poolNonEmpty,
} from "./game-rules";
import { reject, type TransitionResult } from "./results";

// ─── Internal Helpers ──────────────────────────────────────────────

/** Stamps a successful transition: new version, new update time. */
function commit(state: GameState, changes: Partial<GameState>, now: number): TransitionResult {
  return {
    ok: true,
    state: { ...state, ...changes, updatedAt: now, version: state.version + 1 },
  };
}

function replacePlayer(players: readonly Player[], updated: Player): readonly Player[] {
  return players.map((p) => (p.id === updated.id ? updated : p));
}

function completed(winnerId: PlayerId | null, now: number): GameStatus {
  return { kind: "completed", finishedAt: now, winnerId };
}

// ─── Join ──────────────────────────────────────────────────────────

/**
 * Names the first unnamed slot, keeping its pre-dealt rack. Naming the
 * last slot starts the game with the first slot to move.
 */
export function joinGame(state: GameState, name: string, now: number = Date.now()): TransitionResult {
  const playerName = name.trim();
  if (playerName.length === 0 || playerName.length > MAX_PLAYER_NAME_LENGTH) {
    return reject(
      "invalid_name",
      `Player name must be 1-${MAX_PLAYER_NAME_LENGTH} characters`
    );
  }
  if (state.status.kind === "completed") {
    return reject("game_finished", "Game is already finished");
  }
  if (state.players.some((p) => p.name === playerName)) {
    return reject("name_taken", `Name "${playerName}" is already taken in this game`);
  }

  const slot = state.players.findIndex((p) => p.name === null);
  if (slot === -1) {
    return reject("game_full", "Every seat in this game is taken");
  }

  const players = state.players.map((p, i) => (i === slot ? { ...p, name: playerName } : p));
  const everyoneJoined = players.every((p) => p.name !== null);

  return commit(
    state,
    everyoneJoined
      ? { players, status: { kind: "in_progress", startedAt: now }, currentPlayerIndex: 0 }
      : { players },
    now
  );
}

// ─── Play Tiles ────────────────────────────────────────────────────

/**
 * Replaces the board with `melds` (the entire new board). Checks, in
 * order: turn, something new was placed, ownership of the new tiles,
 * board integrity, every meld, and the opening threshold.
 */
export function playTiles(
  state: GameState,
  playerId: PlayerId,
  melds: readonly Meld[],
  now: number = Date.now()
): TransitionResult {
  const turn = checkTurn(state, playerId);
  if (!turn.ok) return turn;

  const player = findPlayer(state, playerId);
  if (!player) {
    return reject("player_not_found", `Player ${playerId} is not in this game`);
  }

  const newly = newlyPlayed(melds, state.board);
  if (newly.size === 0) {
    return reject("no_op_move", "A play must place at least one new tile");
  }

  const checks = [
    () => ownsTiles(player, newly),
    () => boardIntegrityOk(melds, state.board),
    () => meldsValid(melds),
    () => initialMeldOk(player, newly, melds),
  ];
  for (const check of checks) {
    const result = check();
    if (!result.ok) return result;
  }

  const updated: Player = {
    ...player,
    rack: player.rack.filter((id) => !newly.has(id)),
    initialMeldMet: true,
  };

  return commit(
    state,
    {
      players: replacePlayer(state.players, updated),
      board: melds.map((meld) => ({ kind: meld.kind, tiles: [...meld.tiles] })),
      ...(hasWon(updated) ? { status: completed(updated.id, now) } : {}),
    },
    now
  );
}

// ─── Draw ──────────────────────────────────────────────────────────

/** Moves the tile at the front of the pool to the end of the rack. */
export function drawTile(state: GameState, playerId: PlayerId, now: number = Date.now()): TransitionResult {
  const turn = checkTurn(state, playerId);
  if (!turn.ok) return turn;

  const pool = poolNonEmpty(state);
  if (!pool.ok) return pool;

  const player = findPlayer(state, playerId);
  const [drawn, ...remaining] = state.pool;
  if (!player || drawn === undefined) {
    throw new Error(`Unreachable: draw passed its checks without a player or a tile`);
  }

  return commit(
    state,
    {
      players: replacePlayer(state.players, { ...player, rack: [...player.rack, drawn] }),
      pool: remaining,
    },
    now
  );
}

// ─── Advance Turn ──────────────────────────────────────────────────

/**
 * Hands the turn to the next slot. Any player already holding a win
 * ends the game instead.
 */
export function advanceTurn(state: GameState, now: number = Date.now()): TransitionResult {
  switch (state.status.kind) {
    case "waiting_for_players":
      return reject("game_not_started", "Game has not started yet");
    case "completed":
      return reject("game_finished", "Game is already finished");
    case "in_progress":
      break;
  }

  const winner = state.players.find(hasWon);
  if (winner) {
    return commit(state, { status: completed(winner.id, now) }, now);
  }

  return commit(
    state,
    { currentPlayerIndex: (state.currentPlayerIndex + 1) % state.players.length },
    now
  );
}

// ─── Full Turn ─────────────────────────────────────────────────────

/**
 * One complete turn: the action, then the hand-off to the next player
 * unless the action ended the game.
 */
export function applyTurnAction(
  state: GameState,
  playerId: PlayerId,
  action: TurnAction,
  now: number = Date.now()
): TransitionResult {
  const result =
    action.kind === "play_tiles"
      ? playTiles(state, playerId, action.melds, now)
      : drawTile(state, playerId, now);

  if (!result.ok || result.state.status.kind !== "in_progress") {
    return result;
  }
  return advanceTurn(result.state, now);
}
