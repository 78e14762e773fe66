export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Diagnostic sink used by the converter. Messages take printf-style
 * placeholders (`%s`) filled from `args`.
 */
export interface Logger {
  log(level: LogLevel, message: string, ...args: unknown[]): void;
}

export const consoleLogger: Logger = {
  log(level, message, ...args) {
    switch (level) {
      case "debug":
        console.debug(message, ...args);
        break;
      case "info":
        console.info(message, ...args);
        break;
      case "warn":
        console.warn(message, ...args);
        break;
      case "error":
        console.error(message, ...args);
        break;
    }
  },
};

export const silentLogger: Logger = {
  log() {},
};
