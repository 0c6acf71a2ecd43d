// ─── @rummikub/service ─────────────────────────────────────────────
// In-process orchestration around the rules engine: storage and lock
// contracts with in-memory implementations, configuration, errors.

export { GameService, summarize, type GameServiceDeps, type GameSummary } from "./game-service";
export { createInMemoryGameService } from "./in-memory";
export {
  ServiceError,
  GameNotFoundError,
  ConcurrentModificationError,
  RuleViolationError,
  ConfigError,
} from "./errors";
export { ServiceConfigSchema, loadServiceConfig, configFromEnv, type ServiceConfig } from "./config";
export type { GameRepository } from "./storage/game-repository";
export { MemoryGameRepository, type MemoryGameRepositoryOptions } from "./storage/memory-game-repository";
export { MemoryGameLock, type GameLock, type GameLease, type MemoryGameLockOptions } from "./lock/game-lock";
export { GameNameGenerator, DEFAULT_GAME_NAME_WORDS, type GameNameWords } from "./names/game-name-generator";
