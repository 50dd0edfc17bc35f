/**
 * KAST Calculator Unit Tests
 *
 * A round counts once however many of kill, assist, survival and trade it
 * satisfies.
 */

import { calculateKAST, detectTradedRounds } from "./kast.calculator";
import { createKill } from "../../../__tests__/factories";

describe("KAST Calculator", () => {
  const steamId = "p1";

  // p1 plays CT against e1..e3
  const matchKills = [
    // Round 1: kill (and survival)
    createKill({ kill_id: 0, round_num: 1, tick: 500, attacker_steamid: steamId, victim_steamid: "e1" }),
    // Round 2: assist, then dies untraded
    createKill({
      kill_id: 1,
      round_num: 2,
      tick: 4000,
      attacker_steamid: "p2",
      victim_steamid: "e1",
      assister_steamid: steamId,
    }),
    createKill({
      kill_id: 2,
      round_num: 2,
      tick: 4100,
      attacker_steamid: "e2",
      attacker_team: "TERRORIST",
      victim_steamid: steamId,
      victim_team: "CT",
    }),
    // Round 3: dies, p2 kills the killer 200 ticks later
    createKill({
      kill_id: 3,
      round_num: 3,
      tick: 8000,
      attacker_steamid: "e2",
      attacker_team: "TERRORIST",
      victim_steamid: steamId,
      victim_team: "CT",
    }),
    createKill({ kill_id: 4, round_num: 3, tick: 8200, attacker_steamid: "p2", victim_steamid: "e2" }),
    // Round 4: dies, revenge comes too late
    createKill({
      kill_id: 5,
      round_num: 4,
      tick: 12000,
      attacker_steamid: "e3",
      attacker_team: "TERRORIST",
      victim_steamid: steamId,
      victim_team: "CT",
    }),
    createKill({ kill_id: 6, round_num: 4, tick: 12321, attacker_steamid: "p2", victim_steamid: "e3" }),
  ];

  describe("calculateKAST", () => {
    it("should count each qualifying round once", () => {
      const result = calculateKAST({
        steamId,
        roundNumbers: [1, 2, 3, 4],
        allKills: matchKills,
        tradeWindowTicks: 320,
      });

      expect(result).toEqual({
        kast: 75,
        kastRounds: 3,
        totalRounds: 4,
        roundsWithKill: 1,
        roundsWithAssist: 1,
        roundsWithSurvival: 1,
        roundsWithTrade: 1,
      });
    });

    it("should count rounds without any event as survived", () => {
      const result = calculateKAST({ steamId: "bench", roundNumbers: [1, 2, 3], allKills: matchKills, tradeWindowTicks: 320 });

      expect(result.kast).toBe(100);
      expect(result.roundsWithSurvival).toBe(3);
    });

    it("should return 0 without rounds", () => {
      const result = calculateKAST({ steamId, roundNumbers: [], allKills: matchKills, tradeWindowTicks: 320 });

      expect(result.kast).toBe(0);
      expect(result.totalRounds).toBe(0);
    });

    it("should round to one decimal", () => {
      const result = calculateKAST({ steamId, roundNumbers: [1, 3, 4], allKills: matchKills, tradeWindowTicks: 100 });

      // Only round 1 qualifies: the round 3 revenge is outside the window
      expect(result.kast).toBe(33.3);
    });
  });

  describe("detectTradedRounds", () => {
    it("should include the window boundary", () => {
      expect(detectTradedRounds(steamId, matchKills, 321)).toEqual(new Set([3, 4]));
      expect(detectTradedRounds(steamId, matchKills, 320)).toEqual(new Set([3]));
    });

    it("should not credit a revenge by the enemy team", () => {
      const kills = [
        createKill({ kill_id: 0, tick: 100, attacker_steamid: "e1", attacker_team: "TERRORIST", victim_steamid: steamId, victim_team: "CT" }),
        createKill({ kill_id: 1, tick: 150, attacker_steamid: "e2", attacker_team: "TERRORIST", victim_steamid: "e1", victim_team: "TERRORIST" }),
      ];

      expect(detectTradedRounds(steamId, kills, 320).size).toBe(0);
    });

    it("should never trade a death to the world", () => {
      const kills = [
        createKill({ kill_id: 0, tick: 100, attacker_steamid: "World", attacker_team: "unknown", victim_steamid: steamId, victim_team: "CT" }),
        createKill({ kill_id: 1, tick: 150, attacker_steamid: "p2", victim_steamid: "World" }),
      ];

      expect(detectTradedRounds(steamId, kills, 320).size).toBe(0);
    });
  });
});
