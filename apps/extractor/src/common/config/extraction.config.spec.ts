import { ConfigService } from "@nestjs/config";
import { ExtractionConfigService } from "./extraction.config";
import { validateEnvironment } from "./environment";

describe("ExtractionConfigService", () => {
  it("should use the defaults and the header tick rate", () => {
    const service = new ExtractionConfigService(new ConfigService({}));

    expect(service.resolve({}, 128)).toEqual({
      tickRate: 128,
      tradeWindowTicks: 640,
      rosterSize: 5,
      clutchMinOpponents: 2,
    });
  });

  it("should read defaults from the environment", () => {
    const service = new ExtractionConfigService(
      new ConfigService({ DEFAULT_TICK_RATE: "32", TRADE_WINDOW_SECONDS: "3", OUTPUT_DIR: "out" }),
    );

    expect(service.resolve()).toMatchObject({ tickRate: 32, tradeWindowTicks: 96 });
    expect(service.getOutputDir()).toBe("out");
  });

  it("should let run overrides win", () => {
    const service = new ExtractionConfigService(new ConfigService({ TRADE_WINDOW_SECONDS: "3" }));

    expect(service.resolve({ tickRate: 64, tradeWindowSeconds: 2, clutchMinOpponents: 3 }, 128)).toEqual({
      tickRate: 64,
      tradeWindowTicks: 128,
      rosterSize: 5,
      clutchMinOpponents: 3,
    });
    expect(service.resolve({ tradeWindowTicks: 100 }, 64).tradeWindowTicks).toBe(100);
  });

  it("should ignore values that are not numbers", () => {
    const service = new ExtractionConfigService(new ConfigService({ ROSTER_SIZE: "five" }));

    expect(service.resolve().rosterSize).toBe(5);
  });
});

describe("validateEnvironment", () => {
  it("should fill in defaults and coerce numbers", () => {
    const env = validateEnvironment({ TRADE_WINDOW_SECONDS: "4" });

    expect(env.TRADE_WINDOW_SECONDS).toBe(4);
    expect(env.DEFAULT_TICK_RATE).toBe(64);
    expect(env.PARSER_URL).toBe("http://localhost:8001");
  });

  it("should reject invalid values", () => {
    expect(() => validateEnvironment({ ROSTER_SIZE: "0" })).toThrow(
      "Invalid environment configuration: ROSTER_SIZE: Number must be greater than or equal to 1",
    );
  });
});
