import { pino, type Logger } from "pino";
import type { AppConfig } from "../config/env.js";

export function createLogger(config: Pick<AppConfig, "appEnv" | "logLevel">): Logger {
  return pino({
    name: "academic-query-assistant",
    level: config.logLevel,
    base: { env: config.appEnv },
  });
}
