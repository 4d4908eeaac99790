import { pino, type BaseLogger } from "pino";

export type EngineLogger = Pick<BaseLogger, "debug" | "info" | "warn" | "error">;

export function silentLogger(): EngineLogger {
  return pino({ level: "silent" });
}
