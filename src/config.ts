import { z } from "zod";
import { ExchangeError } from "./errors";

export const CONFIG_DEFAULTS = Object.freeze({
  EXCHANGE_DEFAULT_INDEX_VALUE: "100",
  EXCHANGE_DEFAULT_INFLATION: "0.03",
  EXCHANGE_PRICE_ANCHOR_MIN: "40",
  EXCHANGE_PRICE_ANCHOR_MAX: "160",
  LOG_LEVEL: "info",
});

export type ConfigKey = keyof typeof CONFIG_DEFAULTS;

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const ConfigSchema = z
  .object({
    defaultIndexValue: z.coerce.number().finite().positive(),
    defaultInflationRate: z.coerce.number().finite().gt(-1),
    priceAnchorMin: z.coerce.number().finite().nonnegative(),
    priceAnchorMax: z.coerce.number().finite().positive(),
    logLevel: z.enum(LOG_LEVELS),
  })
  .refine((cfg) => cfg.priceAnchorMin < cfg.priceAnchorMax, {
    message: "Price anchor minimum must be below the maximum",
    path: ["priceAnchorMin"],
  });

export type EngineConfig = z.infer<typeof ConfigSchema>;

/**
 * Reads engine settings from the environment. Unset or empty keys fall back to
 * CONFIG_DEFAULTS; the passed env is not modified.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const read = (key: ConfigKey): string => {
    const value = env[key];
    return value === undefined || value.trim() === "" ? CONFIG_DEFAULTS[key] : value.trim();
  };

  const parsed = ConfigSchema.safeParse({
    defaultIndexValue: read("EXCHANGE_DEFAULT_INDEX_VALUE"),
    defaultInflationRate: read("EXCHANGE_DEFAULT_INFLATION"),
    priceAnchorMin: read("EXCHANGE_PRICE_ANCHOR_MIN"),
    priceAnchorMax: read("EXCHANGE_PRICE_ANCHOR_MAX"),
    logLevel: read("LOG_LEVEL").toLowerCase(),
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ExchangeError("INVALID_CONFIG", `Invalid engine configuration: ${issues.join("; ")}`, {
      issues,
    });
  }

  return parsed.data;
}

/**
 * Defaults with no environment applied.
 */
export const DEFAULT_CONFIG: EngineConfig = loadConfig({});
