import { describe, it, expect } from "vitest";
import { CONFIG_DEFAULTS, DEFAULT_CONFIG, loadConfig } from "../src/config";
import { ExchangeError } from "../src/errors";

function configError(env: NodeJS.ProcessEnv): ExchangeError {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof ExchangeError) return err;
    throw err;
  }
  throw new Error("expected loadConfig to fail");
}

describe("loadConfig", () => {
  it("uses the defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      defaultIndexValue: 100,
      defaultInflationRate: 0.03,
      priceAnchorMin: 40,
      priceAnchorMax: 160,
      logLevel: "info",
    });
    expect(DEFAULT_CONFIG).toEqual(loadConfig({}));
  });

  it("reads overrides and treats blank values as unset", () => {
    const config = loadConfig({
      EXCHANGE_DEFAULT_INDEX_VALUE: " 385.12 ",
      EXCHANGE_DEFAULT_INFLATION: "",
      EXCHANGE_PRICE_ANCHOR_MAX: "150",
      LOG_LEVEL: "DEBUG",
    });

    expect(config).toEqual({
      defaultIndexValue: 385.12,
      defaultInflationRate: 0.03,
      priceAnchorMin: 40,
      priceAnchorMax: 150,
      logLevel: "debug",
    });
  });

  it("does not touch the environment it reads", () => {
    const env: NodeJS.ProcessEnv = { LOG_LEVEL: "warn" };

    loadConfig(env);

    expect(env).toEqual({ LOG_LEVEL: "warn" });
    expect(Object.isFrozen(CONFIG_DEFAULTS)).toBe(true);
  });

  it("rejects values that are not usable", () => {
    expect(configError({ EXCHANGE_DEFAULT_INDEX_VALUE: "abc" }).code).toBe("INVALID_CONFIG");
    expect(configError({ EXCHANGE_DEFAULT_INDEX_VALUE: "0" }).code).toBe("INVALID_CONFIG");
    expect(configError({ EXCHANGE_DEFAULT_INFLATION: "-1" }).code).toBe("INVALID_CONFIG");
    expect(configError({ LOG_LEVEL: "verbose" }).code).toBe("INVALID_CONFIG");
  });

  it("requires the price range to be ordered", () => {
    const err = configError({ EXCHANGE_PRICE_ANCHOR_MIN: "160" });

    expect(err.message).toBe(
      "Invalid engine configuration: priceAnchorMin: Price anchor minimum must be below the maximum"
    );
  });
});
