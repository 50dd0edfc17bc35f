import {
  readNumber,
  readString,
  readSteamId,
  readBoolean,
  toTeamSide,
  readRoundEndReason,
  readHitgroup,
  readRoundNum,
  readTick,
} from "./field-readers";

describe("field readers", () => {
  describe("readNumber", () => {
    it("should take the first alias that is present", () => {
      expect(readNumber({ user_X: null, user_x: 12.5 }, ["user_X", "user_x"])).toBe(12.5);
    });

    it("should parse numeric strings", () => {
      expect(readNumber({ x: "-40.25" }, ["x"])).toBe(-40.25);
    });

    it("should return null rather than 0 for missing or blank values", () => {
      expect(readNumber({}, ["x"])).toBeNull();
      expect(readNumber({ x: "" }, ["x"])).toBeNull();
      expect(readNumber({ x: "abc" }, ["x"])).toBeNull();
    });
  });

  describe("readString", () => {
    it("should keep an empty name distinct from a missing one", () => {
      expect(readString({ name: "" }, ["name"])).toBe("");
      expect(readString({}, ["name"])).toBe("unknown");
    });
  });

  describe("readSteamId", () => {
    it("should trim ids and stringify numbers", () => {
      expect(readSteamId({ id: " 76561198000000001 " }, ["id"])).toBe("76561198000000001");
      expect(readSteamId({ id: 12345 }, ["id"])).toBe("12345");
    });

    it("should treat empty and zero ids as absent", () => {
      expect(readSteamId({ id: "" }, ["id"])).toBeNull();
      expect(readSteamId({ id: "0" }, ["id"])).toBeNull();
      expect(readSteamId({ id: 0 }, ["id"])).toBeNull();
    });

    it("should reject numeric ids too large to be exact", () => {
      expect(readSteamId({ id: 76561198000000001 }, ["id"])).toBeNull();
      expect(readSteamId({ id: 1.5 }, ["id"])).toBeNull();
      expect(readSteamId({ id: 76561198000000001n }, ["id"])).toBe("76561198000000001");
    });
  });

  describe("readBoolean", () => {
    it("should accept booleans, numbers and strings", () => {
      expect(readBoolean({ f: true }, ["f"])).toBe(true);
      expect(readBoolean({ f: 1 }, ["f"])).toBe(true);
      expect(readBoolean({ f: "True" }, ["f"])).toBe(true);
      expect(readBoolean({ f: "0" }, ["f"])).toBe(false);
      expect(readBoolean({}, ["f"])).toBe(false);
    });
  });

  describe("toTeamSide", () => {
    it("should map team numbers and names", () => {
      expect(toTeamSide(3)).toBe("CT");
      expect(toTeamSide(2)).toBe("TERRORIST");
      expect(toTeamSide("counter_terrorist")).toBe("CT");
      expect(toTeamSide("T")).toBe("TERRORIST");
    });

    it("should return null for spectators and unknown values", () => {
      expect(toTeamSide(1)).toBeNull();
      expect(toTeamSide("Spectator")).toBeNull();
      expect(toTeamSide(undefined)).toBeNull();
    });
  });

  describe("readRoundEndReason", () => {
    it("should map numeric codes and textual reasons", () => {
      expect(readRoundEndReason({ reason: 9 }, ["reason"])).toBe("elimination");
      expect(readRoundEndReason({ reason: 7 }, ["reason"])).toBe("bomb_defused");
      expect(readRoundEndReason({ reason: "Target_Saved" }, ["reason"])).toBe("time_expired");
    });

    it("should fall back to unknown", () => {
      expect(readRoundEndReason({ reason: "surrender" }, ["reason"])).toBe("unknown");
      expect(readRoundEndReason({}, ["reason"])).toBe("unknown");
    });
  });

  describe("readHitgroup", () => {
    it("should name numeric hitgroups and keep textual ones", () => {
      expect(readHitgroup({ hitgroup: 1 }, ["hitgroup"])).toBe("head");
      expect(readHitgroup({ hitgroup: "left_leg" }, ["hitgroup"])).toBe("left_leg");
      expect(readHitgroup({ hitgroup: 42 }, ["hitgroup"])).toBe("unknown");
    });
  });

  describe("readRoundNum", () => {
    it("should prefer an explicit round number", () => {
      expect(readRoundNum({ round_num: 7, total_rounds_played: 2 })).toBe(7);
    });

    it("should derive the round from rounds already played", () => {
      expect(readRoundNum({ total_rounds_played: 0 })).toBe(1);
      expect(readRoundNum({ round_num: 0, total_rounds_played: 3 })).toBe(4);
    });

    it("should return null without any round field", () => {
      expect(readRoundNum({ tick: 10 })).toBeNull();
    });
  });

  describe("readTick", () => {
    it("should reject negative ticks", () => {
      expect(readTick({ tick: -1 })).toBeNull();
      expect(readTick({ tick: 0 })).toBe(0);
      expect(readTick({ tick: "640" })).toBe(640);
    });
  });
});
