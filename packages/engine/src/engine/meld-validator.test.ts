import { describe, it, expect } from "vitest";
import type { MeldKind, TileId } from "@rummikub/schema";
import { encodeTile } from "../deck/tile-codec";
import { canonicalTiles, meldId, validateAndPrice, validateMeld, type MeldResult } from "./meld-validator";

// ─── Test Helpers ──────────────────────────────────────────────────

function expectValid(result: MeldResult): Extract<MeldResult, { ok: true }> {
  if (!result.ok) {
    throw new Error(`Expected a valid meld, got ${result.violation.code}: ${result.violation.message}`);
  }
  return result;
}

function codeOf(kind: MeldKind, tiles: TileId[]): string | null {
  const result = validateAndPrice(kind, tiles);
  return result.ok ? null : result.violation.code;
}

const NUMBERS = Array.from({ length: 13 }, (_, i) => i + 1);

describe("meld-validator", () => {
  // ══════════════════════════════════════════════════════════════════
  // ── Size ─────────────────────────────────────────────────────────
  // ══════════════════════════════════════════════════════════════════

  describe("size", () => {
    it("rejects empty melds of either kind", () => {
      expect(codeOf("group", [])).toBe("size_error");
      expect(codeOf("run", [])).toBe("size_error");
    });

    it("rejects groups outside 3-4 tiles", () => {
      expect(codeOf("group", ["7ka", "7ra"])).toBe("size_error");
      expect(codeOf("group", ["7ka", "7ra", "7ba", "7oa", "ja"])).toBe("size_error");
    });

    it("rejects runs shorter than 3 tiles", () => {
      expect(codeOf("run", ["5ra", "6ra"])).toBe("size_error");
    });
  });

  // ══════════════════════════════════════════════════════════════════
  // ── Groups ───────────────────────────────────────────────────────
  // ══════════════════════════════════════════════════════════════════

  describe("groups", () => {
    it("prices a plain group", () => {
      const result = expectValid(validateAndPrice("group", ["7ka", "7ra", "7ba"]));
      expect(result.value).toBe(21);
      expect(result.jokerAssignment.size).toBe(0);
    });

    it("prices a four-color group", () => {
      expect(expectValid(validateAndPrice("group", ["10ka", "10ra", "10ba", "10oa"])).value).toBe(40);
    });

    it("gives a joker the first free color and the group's number", () => {
      const result = expectValid(validateAndPrice("group", ["9ra", "ja", "9ba"]));
      expect(result.value).toBe(27);
      expect(result.jokerAssignment.get("ja")).toEqual({ number: 9, color: "black" });
    });

    it("resolves a single joker to the shared number for every number and position", () => {
      for (const n of NUMBERS) {
        const base = [encodeTile(n, "black", "a"), encodeTile(n, "red", "b")];
        for (let position = 0; position <= base.length; position++) {
          const tiles: TileId[] = [...base.slice(0, position), "jb", ...base.slice(position)];
          const result = expectValid(validateAndPrice("group", tiles));
          expect(result.jokerAssignment.get("jb")).toEqual({ number: n, color: "blue" });
          expect(result.value).toBe(n * 3);
        }
      }
    });

    it("fills the last missing color in a four-tile group", () => {
      const result = expectValid(validateAndPrice("group", ["4ka", "4ra", "4ba", "ja"]));
      expect(result.jokerAssignment.get("ja")).toEqual({ number: 4, color: "orange" });
      expect(result.value).toBe(16);
    });

    it("assigns free colors to jokers in input order", () => {
      const forward = expectValid(validateAndPrice("group", ["5oa", "ja", "jb"]));
      expect(forward.jokerAssignment.get("ja")).toEqual({ number: 5, color: "black" });
      expect(forward.jokerAssignment.get("jb")).toEqual({ number: 5, color: "red" });
      expect(forward.value).toBe(15);

      const reversed = expectValid(validateAndPrice("group", ["jb", "5oa", "ja"]));
      expect(reversed.jokerAssignment.get("jb")).toEqual({ number: 5, color: "black" });
      expect(reversed.jokerAssignment.get("ja")).toEqual({ number: 5, color: "red" });
    });

    it("rejects mixed numbers", () => {
      expect(codeOf("group", ["7ka", "8ra", "7ba"])).toBe("mixed_numbers");
    });

    it("rejects duplicated colors", () => {
      expect(codeOf("group", ["7ka", "7kb", "7ra"])).toBe("color_duplication");
    });

    it("reports mixed numbers before duplicated colors", () => {
      expect(codeOf("group", ["7ka", "8ka", "7ra"])).toBe("mixed_numbers");
    });

    it("rejects a group with no numbered tile", () => {
      expect(codeOf("group", ["ja", "jb", "ja"])).toBe("ambiguous_group");
    });
  });

  // ══════════════════════════════════════════════════════════════════
  // ── Runs ─────────────────────────────────────────────────────────
  // ══════════════════════════════════════════════════════════════════

  describe("runs", () => {
    it("prices a plain run", () => {
      const result = expectValid(validateAndPrice("run", ["5ra", "6ra", "7ra"]));
      expect(result.value).toBe(18);
      expect(result.jokerAssignment.size).toBe(0);
    });

    it("prices the full 1-13 run", () => {
      const tiles = NUMBERS.map((n) => encodeTile(n, "orange", "a"));
      expect(expectValid(validateAndPrice("run", tiles)).value).toBe(91);
    });

    it("resolves [a, joker, a+2] to a+1", () => {
      for (let a = 1; a <= 11; a++) {
        const tiles: TileId[] = [encodeTile(a, "blue", "a"), "ja", encodeTile(a + 2, "blue", "a")];
        const result = expectValid(validateAndPrice("run", tiles));
        expect(result.jokerAssignment.get("ja")).toEqual({ number: a + 1, color: "blue" });
        expect(result.value).toBe(3 * (a + 1));
      }
    });

    it("rejects [a, joker, b] when one joker cannot bridge the gap", () => {
      for (let a = 1; a <= 10; a++) {
        for (let b = a + 3; b <= 13; b++) {
          const tiles: TileId[] = [encodeTile(a, "red", "a"), "ja", encodeTile(b, "red", "a")];
          expect(codeOf("run", tiles)).toBe("non_consecutive");
        }
      }
    });

    it("rejects [3, joker, 8]", () => {
      expect(codeOf("run", ["3ra", "ja", "8ra"])).toBe("non_consecutive");
    });

    it("resolves a leading joker from the first numbered tile", () => {
      const result = expectValid(validateAndPrice("run", ["ja", "5ra", "6ra"]));
      expect(result.jokerAssignment.get("ja")).toEqual({ number: 4, color: "red" });
      expect(result.value).toBe(15);
    });

    it("resolves two jokers by position", () => {
      const result = expectValid(validateAndPrice("run", ["11ka", "ja", "jb"]));
      expect(result.jokerAssignment.get("ja")).toEqual({ number: 12, color: "black" });
      expect(result.jokerAssignment.get("jb")).toEqual({ number: 13, color: "black" });
      expect(result.value).toBe(36);
    });

    it("rejects descending order", () => {
      expect(codeOf("run", ["7ra", "6ra", "5ra"])).toBe("non_consecutive");
    });

    it("rejects mixed colors", () => {
      expect(codeOf("run", ["5ra", "6ba", "7ra"])).toBe("mixed_colors");
    });

    it("rejects a run with no numbered tile", () => {
      expect(codeOf("run", ["ja", "jb", "ja"])).toBe("ambiguous_run");
    });

    it("rejects runs that would start below 1", () => {
      expect(codeOf("run", ["ja", "1ra", "2ra"])).toBe("out_of_range");
    });

    it("rejects runs that would end above 13", () => {
      expect(codeOf("run", ["12ra", "13ra", "ja"])).toBe("out_of_range");
    });
  });

  // ══════════════════════════════════════════════════════════════════
  // ── Canonical Id ─────────────────────────────────────────────────
  // ══════════════════════════════════════════════════════════════════

  describe("meldId", () => {
    it("orders group tiles black, red, blue, orange", () => {
      expect(meldId("group", ["10ra", "10ba", "10ka"])).toBe("10ka-10ra-10ba");
    });

    it("is invariant under permutation for groups", () => {
      const expected = "7ka-7ra-7ba-7ob";
      const tiles: TileId[] = ["7ob", "7ba", "7ka", "7ra"];
      for (let shift = 0; shift < tiles.length; shift++) {
        const rotated = [...tiles.slice(shift), ...tiles.slice(0, shift)];
        expect(meldId("group", rotated)).toBe(expected);
      }
    });

    it("puts jokers last in groups", () => {
      expect(meldId("group", ["ja", "7ra", "7ka"])).toBe("7ka-7ra-ja");
      expect(meldId("group", ["jb", "7ra", "ja"])).toBe("7ra-ja-jb");
    });

    it("preserves run order", () => {
      expect(meldId("run", ["5ra", "6ra", "7ra"])).toBe("5ra-6ra-7ra");
      expect(meldId("run", ["5ra", "ja", "7ra"])).toBe("5ra-ja-7ra");
      expect(meldId("run", ["7ra", "6ra", "5ra"])).not.toBe(meldId("run", ["5ra", "6ra", "7ra"]));
    });

    it("accepts a meld value", () => {
      expect(meldId({ kind: "group", tiles: ["8ba", "8ka", "8ra"] })).toBe("8ka-8ra-8ba");
    });

    it("does not reorder the caller's array", () => {
      const tiles: TileId[] = ["10ra", "10ba", "10ka"];
      canonicalTiles("group", tiles);
      expect(tiles).toEqual(["10ra", "10ba", "10ka"]);
    });
  });

  describe("validateMeld", () => {
    it("validates a meld value", () => {
      expect(validateMeld({ kind: "run", tiles: ["1oa", "2oa", "3oa"] }).ok).toBe(true);
      expect(validateMeld({ kind: "group", tiles: ["1oa", "2oa", "3oa"] }).ok).toBe(false);
    });
  });
});
