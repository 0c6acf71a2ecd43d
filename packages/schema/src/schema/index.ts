export {
  TileIdSchema,
  MeldSchema,
  TurnActionSchema,
  PlayerSchema,
  GameStatusSchema,
  GameStateSchema,
  JoinRequestSchema,
  CreateGameRequestSchema,
  MAX_PLAYER_NAME_LENGTH,
  parseTurnAction,
  safeParseTurnAction,
  parseGameSnapshot,
  ActionParseError,
  SnapshotParseError,
  type JoinRequest,
  type CreateGameRequest,
} from "./validation";
export { formatZodIssues, type ZodIssueLike } from "./format-issues";
