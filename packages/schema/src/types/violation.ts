// ─── Rule Violations ───────────────────────────────────────────────
// Expected, recoverable rejections. Each code is stable so callers can
// render a message without matching on text.

export type MeldViolationCode =
  | "size_error"
  | "mixed_numbers"
  | "color_duplication"
  | "ambiguous_group"
  | "too_many_jokers"
  | "mixed_colors"
  | "ambiguous_run"
  | "non_consecutive"
  | "out_of_range";

export type RuleViolationCode =
  | MeldViolationCode
  | "tile_not_owned"
  | "duplicate_tile"
  | "board_tile_removed"
  | "initial_meld_not_met"
  | "no_op_move"
  | "not_players_turn"
  | "player_not_found"
  | "game_not_started"
  | "game_finished"
  | "pool_empty"
  | "invalid_name"
  | "name_taken"
  | "game_full";

export interface RuleViolation {
  readonly code: RuleViolationCode;
  readonly message: string;
  /** Index of the offending meld in a submitted board, when relevant. */
  readonly meldIndex?: number;
}

/** Every code, in taxonomy order. */
export const RULE_VIOLATION_CODES: readonly RuleViolationCode[] = [
  "size_error",
  "mixed_numbers",
  "color_duplication",
  "ambiguous_group",
  "too_many_jokers",
  "mixed_colors",
  "ambiguous_run",
  "non_consecutive",
  "out_of_range",
  "tile_not_owned",
  "duplicate_tile",
  "board_tile_removed",
  "initial_meld_not_met",
  "no_op_move",
  "not_players_turn",
  "player_not_found",
  "game_not_started",
  "game_finished",
  "pool_empty",
  "invalid_name",
  "name_taken",
  "game_full",
];
