/**
 * Damage Extractor Unit Tests
 */

import { DamageExtractor } from "./damage.extractor";
import { EventNormalizer } from "../normalizers";
import { createContext } from "../../../../__tests__/factories";

function hurtRow(tick: number, damage: number): Record<string, unknown> {
  return {
    tick,
    round_num: 1,
    attacker_steamid: "ct1",
    attacker_name: "CT Player 1",
    user_steamid: "t1",
    user_name: "T Player 1",
    weapon: "ak47",
    dmg_health: damage,
    hitgroup: "head",
  };
}

describe("DamageExtractor", () => {
  const extractor = new DamageExtractor(new EventNormalizer());

  it("should sort damage by tick and total the health damage", () => {
    const ctx = createContext({ tables: { player_hurt: [hurtRow(200, 73), hurtRow(100, 27)] } });

    const result = extractor.transform(ctx);

    expect(result.success).toBe(true);
    expect(result.recordsCreated).toBe(2);
    expect(result.metrics?.["totalHealthDamage"]).toBe(100);
    expect(ctx.state.damages.map((d) => [d.tick, d.damage_health, d.victim_steamid])).toEqual([
      [100, 27, "t1"],
      [200, 73, "t1"],
    ]);
  });

  it("should count rows without a round as dropped", () => {
    const ctx = createContext({
      tables: { player_hurt: [hurtRow(100, 27), { tick: 150, attacker_steamid: "ct1" }] },
    });

    const result = extractor.transform(ctx);

    expect(ctx.state.damages).toHaveLength(1);
    expect(ctx.state.dropped["damage"]).toBe(1);
    expect(result.warnings).toEqual(["Dropped 1 malformed damage rows (round_num x1)"]);
  });

  it("should leave damages empty when the table is missing", () => {
    const ctx = createContext();

    expect(extractor.transform(ctx).recordsCreated).toBe(0);
    expect(ctx.state.damages).toEqual([]);
  });
});
