// ─── Game Service ──────────────────────────────────────────────────
// Drives the rules engine behind a repository and a per-game lock.
// Every mutation runs load -> engine -> conservation check -> save while
// holding the game's lease; callers only ever see per-player views.

import {
  applyTurnAction,
  assertTileConservation,
  createGame,
  createPlayerView,
  finishGame,
  joinGame,
  type TransitionResult,
} from "@rummikub/engine";
import {
  parseTurnAction,
  type GameId,
  type GameState,
  type GameStatus,
  type PlayerId,
  type PlayerView,
} from "@rummikub/schema";
import { GameNotFoundError, RuleViolationError, ServiceError } from "./errors";
import type { GameLock } from "./lock/game-lock";
import { GameNameGenerator } from "./names/game-name-generator";
import type { GameRepository } from "./storage/game-repository";

/** What the lobby shows for a game: no tiles at all. */
export interface GameSummary {
  readonly gameId: GameId;
  readonly name: string;
  readonly status: GameStatus;
  readonly seats: number;
  /** Names of the players who have joined, in seat order. */
  readonly players: readonly string[];
  readonly createdAt: number;
  readonly updatedAt: number;
}

export interface GameServiceDeps {
  readonly repository: GameRepository;
  readonly lock: GameLock;
  readonly names?: GameNameGenerator;
  readonly clock?: () => number;
  /** Seed source for each new deal; unpredictable deals when omitted. */
  readonly seed?: () => number;
}

export function summarize(state: GameState): GameSummary {
  return {
    gameId: state.gameId,
    name: state.name,
    status: state.status,
    seats: state.players.length,
    players: state.players.flatMap((p) => (p.name === null ? [] : [p.name])),
    createdAt: state.createdAt,
    updatedAt: state.updatedAt,
  };
}

export class GameService {
  private readonly repository: GameRepository;
  private readonly lock: GameLock;
  private readonly names: GameNameGenerator;
  private readonly clock: () => number;
  private readonly seed: (() => number) | undefined;

  constructor(deps: GameServiceDeps) {
    this.repository = deps.repository;
    this.lock = deps.lock;
    this.names = deps.names ?? new GameNameGenerator();
    this.clock = deps.clock ?? Date.now;
    this.seed = deps.seed;
  }

  // ─── Lobby ─────────────────────────────────────────────────────────

  /** @throws {RangeError} for player counts outside 2-4. */
  async createGame(numPlayers: number): Promise<GameSummary> {
    const state = createGame({
      numPlayers,
      seed: this.seed?.(),
      name: this.names.generate(),
      now: this.clock(),
    });
    await this.repository.save(state);
    return summarize(state);
  }

  async listGames(): Promise<readonly GameSummary[]> {
    const games = await this.repository.list();
    return games.map(summarize);
  }

  /**
   * Seats `playerName` in the first free slot. A name already seated
   * rejoins its own slot instead of failing.
   */
  async joinGame(gameId: GameId, playerName: string): Promise<PlayerView> {
    const name = playerName.trim();
    return this.withLock(gameId, async () => {
      const state = await this.loadOrThrow(gameId);
      const seated = state.players.find((p) => p.name === name);
      if (seated) {
        return createPlayerView(state, seated.id);
      }

      const next = this.unwrap(joinGame(state, name, this.clock()));
      await this.persist(next);

      const joined = next.players.find((p) => p.name === name);
      if (!joined) {
        throw new ServiceError(`Player ${name} missing after joining game ${gameId}`);
      }
      return createPlayerView(next, joined.id);
    });
  }

  // ─── Reads ─────────────────────────────────────────────────────────

  /** The game as seen by the player with that name, or `null`. */
  async getGame(gameId: GameId, playerName: string): Promise<PlayerView | null> {
    const state = await this.repository.load(gameId);
    const player = state?.players.find((p) => p.name === playerName.trim());
    return state && player ? createPlayerView(state, player.id) : null;
  }

  /**
   * @throws {GameNotFoundError}
   * @throws {PlayerNotFoundError} if the id has no seat in the game.
   */
  async getPlayerView(gameId: GameId, playerId: PlayerId): Promise<PlayerView> {
    return createPlayerView(await this.loadOrThrow(gameId), playerId);
  }

  // ─── Turns ─────────────────────────────────────────────────────────

  /**
   * Parses and applies one turn for `playerId`, then hands the turn on.
   *
   * @throws {ActionParseError} for a malformed payload, before locking.
   * @throws {RuleViolationError} when the engine rejects the action.
   */
  async executeTurn(gameId: GameId, playerId: PlayerId, rawAction: unknown): Promise<PlayerView> {
    const action = parseTurnAction(rawAction);
    return this.withLock(gameId, async () => {
      const state = await this.loadOrThrow(gameId);
      const next = this.unwrap(applyTurnAction(state, playerId, action, this.clock()));
      await this.persist(next);
      return createPlayerView(next, playerId);
    });
  }

  /** Ends a stuck game on rack penalties. */
  async finishGame(gameId: GameId): Promise<GameSummary> {
    return this.withLock(gameId, async () => {
      const state = await this.loadOrThrow(gameId);
      const next = this.unwrap(finishGame(state, this.clock()));
      await this.persist(next);
      return summarize(next);
    });
  }

  // ─── Internal Helpers ──────────────────────────────────────────────

  private async withLock<T>(gameId: GameId, work: () => Promise<T>): Promise<T> {
    const lease = await this.lock.acquire(gameId);
    try {
      return await work();
    } finally {
      lease.release();
    }
  }

  private async loadOrThrow(gameId: GameId): Promise<GameState> {
    const state = await this.repository.load(gameId);
    if (!state) {
      throw new GameNotFoundError(gameId);
    }
    return state;
  }

  private unwrap(result: TransitionResult): GameState {
    if (!result.ok) {
      throw new RuleViolationError(result.violation);
    }
    return result.state;
  }

  private async persist(state: GameState): Promise<void> {
    assertTileConservation(state);
    await this.repository.save(state);
  }
}
