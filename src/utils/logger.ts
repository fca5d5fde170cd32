import { pino, type Logger } from "pino";

export type { Logger };

export const logger: Logger = pino({
  name: "subtitle-burner",
  level: process.env.LOG_LEVEL || "info",
});

export function childLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
