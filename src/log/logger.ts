import { pino, type Logger } from "pino";
import { configFromEnv, DEFAULT_CONFIG, type LogLevel } from "../config/config";

export type { Logger };

export function createLogger(opts: { level?: LogLevel; name?: string } = {}): Logger {
  return pino({
    name: opts.name ?? "marshal-ir",
    level: opts.level ?? DEFAULT_CONFIG.logLevel,
  });
}

/** Process-wide logger; level from MARSHAL_LOG_LEVEL. */
export const rootLogger = createLogger({ level: configFromEnv().logLevel });
