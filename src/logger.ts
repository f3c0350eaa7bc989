import pino from "pino";

export type Logger = pino.Logger;

export interface LoggingOptions {
  level?: string;
  /** JSON lines go here; stderr when absent */
  file?: string;
}

export function createLogger(options?: LoggingOptions): Logger {
  const level = options?.level ?? "info";
  const loggerOptions: pino.LoggerOptions = {
    level,
    base: { app: "usagedash" },
  };

  if (options?.file) {
    return pino(
      loggerOptions,
      pino.destination({ dest: options.file, mkdir: true, sync: true }),
    );
  }

  return pino(loggerOptions, pino.destination(2));
}
