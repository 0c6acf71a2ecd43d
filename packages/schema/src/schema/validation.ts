// ─── Schema Validation ─────────────────────────────────────────────
// Zod schemas for runtime validation of actions and stored snapshots.
// This is the "parse boundary": raw JSON enters, typed data exits.

import { z } from "zod";
import type { GameState, TileId, TurnAction } from "../types/index";
import { isTileId } from "../types/tile";
import { formatZodIssues } from "./format-issues";

export const MAX_PLAYER_NAME_LENGTH = 50;

// ─── Primitives ────────────────────────────────────────────────────

export const TileIdSchema = z.custom<TileId>(isTileId, {
  message: "Expected a tile id such as '7ra' or 'jb'",
});

export const MeldSchema = z.object({
  kind: z.enum(["group", "run"]),
  tiles: z.array(TileIdSchema),
});

// ─── Actions ───────────────────────────────────────────────────────

export const TurnActionSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("play_tiles"), melds: z.array(MeldSchema) }),
  z.object({ kind: z.literal("draw") }),
]);

export const JoinRequestSchema = z.object({
  playerName: z.string().trim().min(1).max(MAX_PLAYER_NAME_LENGTH),
});

export type JoinRequest = z.infer<typeof JoinRequestSchema>;

export const CreateGameRequestSchema = z.object({
  numPlayers: z.number().int().min(2).max(4),
});

export type CreateGameRequest = z.infer<typeof CreateGameRequestSchema>;

// ─── Snapshot ──────────────────────────────────────────────────────

export const PlayerSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1).nullable(),
  rack: z.array(TileIdSchema),
  initialMeldMet: z.boolean(),
});

export const GameStatusSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("waiting_for_players") }),
  z.object({ kind: z.literal("in_progress"), startedAt: z.number() }),
  z.object({
    kind: z.literal("completed"),
    finishedAt: z.number(),
    winnerId: z.string().nullable(),
  }),
]);

export const GameStateSchema = z
  .object({
    gameId: z.string().min(1),
    name: z.string(),
    players: z.array(PlayerSchema).min(2).max(4),
    pool: z.array(TileIdSchema),
    board: z.array(MeldSchema),
    currentPlayerIndex: z.number().int().min(0),
    status: GameStatusSchema,
    createdAt: z.number(),
    updatedAt: z.number(),
    version: z.number().int().min(0),
  })
  .refine((s) => s.currentPlayerIndex < s.players.length, {
    message: "currentPlayerIndex must point at an existing player",
    path: ["currentPlayerIndex"],
  });

// ─── Parse Errors ──────────────────────────────────────────────────

/** Thrown when a submitted action payload does not match the schema. */
export class ActionParseError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[]
  ) {
    super(message);
    this.name = "ActionParseError";
  }
}

/** Thrown when a stored snapshot is malformed. */
export class SnapshotParseError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[]
  ) {
    super(message);
    this.name = "SnapshotParseError";
  }
}

// ─── Entry Points ──────────────────────────────────────────────────

/**
 * Parses a raw action payload into a TurnAction.
 * @throws {ActionParseError} with one formatted line per issue.
 */
export function parseTurnAction(raw: unknown): TurnAction {
  const result = TurnActionSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new ActionParseError(`Invalid action: ${issues.length} issue(s)`, issues);
  }
  return result.data;
}

/**
 * Safe parse variant: returns a discriminated result instead of throwing.
 */
export function safeParseTurnAction(
  raw: unknown
): z.SafeParseReturnType<unknown, TurnAction> {
  return TurnActionSchema.safeParse(raw);
}

/**
 * Validates a stored snapshot. Structural only: tile conservation is
 * checked by the engine.
 * @throws {SnapshotParseError}
 */
export function parseGameSnapshot(raw: unknown): GameState {
  const result = GameStateSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new SnapshotParseError(`Invalid game snapshot: ${issues.length} issue(s)`, issues);
  }
  return result.data;
}
