// ─── Game Name Generator ───────────────────────────────────────────
// Friendly names of the form "<Action> <preposition> <Location>",
// e.g. "Siege of Ironhold".

import words from "./game-names.json";

export interface GameNameWords {
  readonly actions: readonly string[];
  readonly prepositions: readonly string[];
  readonly locations: readonly string[];
}

export const DEFAULT_GAME_NAME_WORDS: GameNameWords = words;

export class GameNameGenerator {
  constructor(
    private readonly random: () => number = Math.random,
    private readonly words: GameNameWords = DEFAULT_GAME_NAME_WORDS
  ) {
    if ([words.actions, words.prepositions, words.locations].some((list) => list.length === 0)) {
      throw new RangeError("Game name word lists must not be empty");
    }
  }

  generate(): string {
    const { actions, prepositions, locations } = this.words;
    return `${this.pick(actions)} ${this.pick(prepositions)} ${this.pick(locations)}`;
  }

  private pick(list: readonly string[]): string {
    const index = Math.min(Math.floor(this.random() * list.length), list.length - 1);
    return list[index] ?? "";
  }
}
