// ─── Result Types ──────────────────────────────────────────────────
// Rule checks return discriminated results, not booleans, so callers
// get the rejection reason without a separate error channel.

import type { GameState, RuleViolation, RuleViolationCode } from "@rummikub/schema";

/** Outcome of a single rule predicate. */
export type RuleCheck =
  | { readonly ok: true }
  | { readonly ok: false; readonly violation: RuleViolation };

/** Outcome of a state transition: a complete new state, or a violation. */
export type TransitionResult =
  | { readonly ok: true; readonly state: GameState }
  | { readonly ok: false; readonly violation: RuleViolation };

export const PASS: RuleCheck = { ok: true };

export function violation(
  code: RuleViolationCode,
  message: string,
  meldIndex?: number
): RuleViolation {
  return meldIndex === undefined ? { code, message } : { code, message, meldIndex };
}

export function reject(
  code: RuleViolationCode,
  message: string
): { readonly ok: false; readonly violation: RuleViolation } {
  return { ok: false, violation: violation(code, message) };
}
