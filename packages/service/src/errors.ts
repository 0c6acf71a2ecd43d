// ─── Service Errors ────────────────────────────────────────────────
// Failures raised at the service boundary. Rule violations from the
// engine arrive as values and are rethrown here as RuleViolationError.

import type { GameId, RuleViolation, RuleViolationCode } from "@rummikub/schema";

export class ServiceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ServiceError";
  }
}

export class GameNotFoundError extends ServiceError {
  constructor(public readonly gameId: GameId) {
    super(`Game ${gameId} not found`);
    this.name = "GameNotFoundError";
  }
}

/** Lock contention, or a write based on a stale snapshot. */
export class ConcurrentModificationError extends ServiceError {
  constructor(
    public readonly gameId: GameId,
    message: string = `Could not acquire lock for game ${gameId}`
  ) {
    super(message);
    this.name = "ConcurrentModificationError";
  }
}

export class RuleViolationError extends ServiceError {
  readonly code: RuleViolationCode;

  constructor(public readonly violation: RuleViolation) {
    super(violation.message);
    this.name = "RuleViolationError";
    this.code = violation.code;
  }
}

export class ConfigError extends ServiceError {
  constructor(
    message: string,
    public readonly issues: readonly string[]
  ) {
    super(message);
    this.name = "ConfigError";
  }
}
