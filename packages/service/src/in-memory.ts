// ─── In-Memory Wiring ──────────────────────────────────────────────
// Builds a GameService on the in-memory repository and lock from config.

import { loadServiceConfig, type ServiceConfig } from "./config";
import { GameService } from "./game-service";
import { MemoryGameLock } from "./lock/game-lock";
import type { GameNameGenerator } from "./names/game-name-generator";
import { MemoryGameRepository } from "./storage/memory-game-repository";

/** A service wired to the in-memory repository and lock. */
export function createInMemoryGameService(
  config: ServiceConfig = loadServiceConfig(),
  names?: GameNameGenerator
): GameService {
  return new GameService({
    repository: new MemoryGameRepository({ completedTtlMs: config.completedTtlMs }),
    lock: new MemoryGameLock({
      leaseMs: config.lockLeaseMs,
      waitMs: config.lockWaitMs,
      retryMs: config.lockRetryMs,
    }),
    ...(names ? { names } : {}),
  });
}
