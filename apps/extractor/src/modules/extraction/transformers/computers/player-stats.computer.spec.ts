/**
 * Player Stats Computer Unit Tests
 */

import { PlayerStatsComputer } from "./player-stats.computer";
import { createContext, createDamage, createKill, createRound } from "../../../../__tests__/factories";

describe("PlayerStatsComputer", () => {
  const computer = new PlayerStatsComputer();

  it("should run last", () => {
    expect(computer.priority).toBe(30);
  });

  it("should resolve rates to 0 when the match has no rounds", () => {
    const ctx = createContext({
      state: {
        kills: [createKill({ headshot: true })],
        damages: [createDamage({ damage_health: 100 })],
      },
    });

    const result = computer.transform(ctx);

    expect(result.success).toBe(true);
    expect(ctx.state.playerStats.map((p) => [p.steamid, p.adr, p.kast])).toEqual([
      ["ct1", 0, 0],
      ["t1", 0, 0],
    ]);
    expect(ctx.state.playerStats[0]).toMatchObject({ kills: 1, kd_ratio: 1, hs_percentage: 100 });
  });

  it("should aggregate every player seen in the match, sorted by ADR", () => {
    const ctx = createContext({
      state: {
        rounds: [createRound({ round_num: 1 }), createRound({ round_num: 2 })],
        players: [
          { steamid: "ct1", name: "CT Player 1", team: "CT" },
          { steamid: "t1", name: "T Player 1", team: "TERRORIST" },
        ],
        kills: [
          createKill({ kill_id: 0, round_num: 1, is_first_kill: true }),
          createKill({
            kill_id: 1,
            round_num: 2,
            is_first_kill: true,
            attacker_steamid: "t1",
            attacker_team: "TERRORIST",
            victim_steamid: "ct1",
            victim_team: "CT",
          }),
        ],
        damages: [
          createDamage({ damage_health: 100 }),
          createDamage({ round_num: 2, attacker_steamid: "t1", victim_steamid: "ct1", damage_health: 120 }),
          createDamage({ round_num: 2, attacker_steamid: "t9", attacker_name: "T Player 9", damage_health: 10 }),
        ],
        clutches: [
          {
            round_num: 2,
            player_steamid: "t1",
            player_name: "T Player 1",
            player_team: "TERRORIST",
            clutch_type: "1v3",
            opponents: 3,
            won: true,
            start_tick: 900,
          },
        ],
      },
    });

    computer.transform(ctx);

    expect(ctx.state.playerStats.map((p) => p.steamid)).toEqual(["t1", "ct1", "t9"]);

    const [t1, ct1, t9] = ctx.state.playerStats;
    expect(t1).toMatchObject({
      kills: 1,
      deaths: 1,
      adr: 60,
      total_damage: 120,
      first_kills: 1,
      first_deaths: 1,
      fk_fd_diff: 0,
      clutch_attempts: 1,
      clutch_wins: 1,
      clutch_rate: 100,
    });
    expect(ct1).toMatchObject({ adr: 50, kast: 50, team: "CT" });
    expect(t9).toMatchObject({ name: "T Player 9", team: "unknown", kills: 0, adr: 5, kast: 100 });
  });
});
