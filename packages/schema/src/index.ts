// ─── @rummikub/schema ──────────────────────────────────────────────
// Canonical type definitions and zod validation for every payload that
// crosses the engine boundary. Re-exported from this single entry point.

export * from "./types/index";
export * from "./schema/index";
