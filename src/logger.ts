import pino from "pino";

export function createLogger(level: string): pino.Logger {
  return pino({
    level,
    base: { app: "ics-calendar-import" },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export function createSilentLogger(): pino.Logger {
  return pino({ level: "silent" });
}
