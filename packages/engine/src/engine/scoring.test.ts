import { describe, it, expect } from "vitest";
import { NOW, deepFreeze, makeGame } from "../testing/fixtures";
import { JOKER_PENALTY, calculatePenalties, finishGame, rackPenalty } from "./scoring";

describe("scoring", () => {
  describe("rackPenalty", () => {
    it("sums face values and charges jokers a flat penalty", () => {
      expect(rackPenalty(["7ra", "ja", "13ob"])).toBe(7 + JOKER_PENALTY + 13);
      expect(rackPenalty([])).toBe(0);
    });
  });

  describe("calculatePenalties", () => {
    it("scores every rack by player id", () => {
      const state = makeGame({ racks: [["1ka", "2ka"], ["ja"], []] });
      expect(calculatePenalties(state)).toEqual({ p1: 3, p2: 30, p3: 0 });
    });
  });

  describe("finishGame", () => {
    it("awards the game to the lowest penalty", () => {
      const state = makeGame({ racks: [["1ka", "2ka"], ["ja"]] });
      const result = finishGame(state, NOW);
      expect(result.ok && result.state.status).toEqual({
        kind: "completed",
        finishedAt: NOW,
        winnerId: "p1",
      });
      expect(result.ok && result.state.version).toBe(1);
      expect(result.ok && result.state.updatedAt).toBe(NOW);
    });

    it("leaves a tie without a winner", () => {
      const state = makeGame({ racks: [["5ka"], ["2ra", "3ra"]] });
      const result = finishGame(state, NOW);
      expect(result.ok && result.state.status).toEqual({
        kind: "completed",
        finishedAt: NOW,
        winnerId: null,
      });
    });

    it("never mutates its input", () => {
      const running = makeGame({ racks: [["1ka", "2ka"], ["ja"]] });
      const before = structuredClone(running);
      deepFreeze(running);
      const result = finishGame(running, NOW);
      expect(result.ok && result.state).not.toBe(running);
      expect(result.ok && result.state.status.kind).toBe("completed");

      const done = deepFreeze(
        makeGame({ racks: [["5ka"], ["6ka"]], status: { kind: "completed", finishedAt: 2_000, winnerId: "p1" } })
      );
      expect(finishGame(done, NOW).ok).toBe(false);
      expect(running).toEqual(before);
      expect(done.status).toEqual({ kind: "completed", finishedAt: 2_000, winnerId: "p1" });
    });

    it("only finishes games in progress", () => {
      const waiting = makeGame({ racks: [["5ka"], ["6ka"]], status: { kind: "waiting_for_players" } });
      const done = makeGame({
        racks: [["5ka"], ["6ka"]],
        status: { kind: "completed", finishedAt: 2_000, winnerId: "p1" },
      });
      expect(finishGame(waiting, NOW)).toEqual({
        ok: false,
        violation: { code: "game_not_started", message: "Game has not started yet" },
      });
      expect(finishGame(done, NOW)).toEqual({
        ok: false,
        violation: { code: "game_finished", message: "Game is already finished" },
      });
    });
  });
});
