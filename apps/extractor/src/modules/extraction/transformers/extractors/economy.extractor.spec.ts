/**
 * Economy Extractor Unit Tests
 */

import { EconomyExtractor } from "./economy.extractor";
import { EventNormalizer } from "../normalizers";
import { createContext, createRound } from "../../../../__tests__/factories";

describe("EconomyExtractor", () => {
  const extractor = new EconomyExtractor(new EventNormalizer());

  it("should tie snapshots without round number to the round starting at their tick", () => {
    const ctx = createContext({
      tables: {
        player_snapshots: [
          { tick: 3300, steamid: "ct1", name: "CT Player 1", team_num: 3, current_equip_value: 5200 },
          { tick: 200, steamid: "ct1", name: "CT Player 1", team_num: 3, current_equip_value: 800 },
          { tick: 999, steamid: "ct1", name: "CT Player 1", team_num: 3 },
          { tick: 50, steamid: "t1", round_num: 1, team_num: 2 },
        ],
      },
      state: {
        rounds: [
          createRound({ round_num: 1, start_tick: 200, end_tick: 3000 }),
          createRound({ round_num: 2, start_tick: 3300, end_tick: 6200 }),
        ],
      },
    });

    const result = extractor.transform(ctx);

    expect(result.success).toBe(true);
    expect(ctx.state.economy.map((e) => [e.round_num, e.tick, e.steamid, e.equipment_value])).toEqual([
      [1, 50, "t1", null],
      [1, 200, "ct1", 800],
      [2, 3300, "ct1", 5200],
    ]);
    expect(ctx.state.dropped["economy"]).toBe(1);
  });
});
