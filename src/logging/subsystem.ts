import { Logger, type ILogObj } from "tslog";

export type LogLevel = "silly" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const LOG_LEVELS: readonly LogLevel[] = ["silly", "trace", "debug", "info", "warn", "error", "fatal"];

export type SubsystemLogger = {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

/** Maps a level name to tslog's numeric `minLevel`. Unknown names fall back to info. */
export function resolveMinLevel(raw: string | undefined): number {
  const normalized = raw?.trim().toLowerCase();
  const index = LOG_LEVELS.findIndex((level) => level === normalized);
  return index >= 0 ? index : LOG_LEVELS.indexOf("info");
}

let rootLogger: Logger<ILogObj> | null = null;

function getRootLogger(): Logger<ILogObj> {
  if (!rootLogger) {
    rootLogger = new Logger<ILogObj>({
      name: "finsight",
      type: process.env.FINSIGHT_LOG_FORMAT === "json" ? "json" : "pretty",
      minLevel: resolveMinLevel(process.env.FINSIGHT_LOG_LEVEL),
    });
  }
  return rootLogger;
}

export function getChildLogger(bindings: { module: string }): Logger<ILogObj> {
  return getRootLogger().getSubLogger({ name: bindings.module });
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const logger = getChildLogger({ module: subsystem });
  return {
    debug: (msg) => {
      logger.debug(msg);
    },
    info: (msg) => {
      logger.info(msg);
    },
    warn: (msg) => {
      logger.warn(msg);
    },
    error: (msg) => {
      logger.error(msg);
    },
  };
}
