import pino, { type Logger } from "pino";
import { loadConfig } from "./config";

export const logger = pino({
  name: "debt-exchange",
  level: loadConfig().logLevel,
});

export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}
