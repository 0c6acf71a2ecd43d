// ─── Game Lock ─────────────────────────────────────────────────────
// Per-game mutual exclusion with time-limited leases. A holder that
// never releases blocks others for at most `leaseMs`.

import { randomUUID } from "node:crypto";
import { setTimeout as sleep } from "node:timers/promises";
import type { GameId } from "@rummikub/schema";
import { ConcurrentModificationError } from "../errors";

export interface GameLease {
  readonly gameId: GameId;
  readonly token: string;
  /** Idempotent; does nothing once the lease was taken over. */
  release(): void;
}

export interface GameLock {
  /** @throws {ConcurrentModificationError} when the wait runs out. */
  acquire(gameId: GameId): Promise<GameLease>;
}

export interface MemoryGameLockOptions {
  readonly leaseMs: number;
  readonly waitMs: number;
  readonly retryMs: number;
  readonly clock?: () => number;
}

interface Holder {
  readonly token: string;
  readonly acquiredAt: number;
}

export class MemoryGameLock implements GameLock {
  private readonly holders = new Map<GameId, Holder>();
  private readonly clock: () => number;

  constructor(private readonly options: MemoryGameLockOptions) {
    this.clock = options.clock ?? Date.now;
  }

  async acquire(gameId: GameId): Promise<GameLease> {
    const { leaseMs, waitMs, retryMs } = this.options;
    const deadline = this.clock() + waitMs;
    let announced = false;

    for (;;) {
      const now = this.clock();
      const holder = this.holders.get(gameId);

      if (holder && now - holder.acquiredAt >= leaseMs) {
        console.warn(`[GameLock] Lease on ${gameId} expired after ${leaseMs}ms, taking over`);
        return this.grant(gameId, now);
      }
      if (!holder) {
        return this.grant(gameId, now);
      }
      if (now >= deadline) {
        throw new ConcurrentModificationError(gameId);
      }
      if (!announced) {
        console.info(`[GameLock] ${gameId} is busy, waiting up to ${waitMs}ms`);
        announced = true;
      }
      await sleep(retryMs);
    }
  }

  /** Whether anyone currently holds an unexpired lease on the game. */
  isHeld(gameId: GameId): boolean {
    const holder = this.holders.get(gameId);
    return holder !== undefined && this.clock() - holder.acquiredAt < this.options.leaseMs;
  }

  private grant(gameId: GameId, now: number): GameLease {
    const token = randomUUID();
    this.holders.set(gameId, { token, acquiredAt: now });
    return {
      gameId,
      token,
      release: () => {
        if (this.holders.get(gameId)?.token === token) {
          this.holders.delete(gameId);
        }
      },
    };
  }
}
