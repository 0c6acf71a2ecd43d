// ─── @rummikub/engine ──────────────────────────────────────────────
// Pure TypeScript Rummikub rules engine. No I/O, no framework
// dependencies; every operation maps a snapshot to a new snapshot.

export * from "./deck/index";
export * from "./engine/index";
export type {
  GameId,
  GameState,
  GameStatus,
  Meld,
  MeldKind,
  Player,
  PlayerId,
  PlayerView,
  ResolvedJoker,
  RuleViolation,
  RuleViolationCode,
  Tile,
  TileColor,
  TileCopy,
  TileId,
  TileNumber,
  TurnAction,
} from "@rummikub/schema";
