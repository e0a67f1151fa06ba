// Audio Violence Analyzer - Logging
//
// Every component takes a Logger by injection; the default writes
// `[LEVEL] [Component] message` lines to the console.

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

export function createConsoleLogger(component: string): Logger {
  const prefix = (level: string) => `[${level}] [${component}]`;
  return {
    info: (msg, ...args) => console.log(`${prefix("INFO")} ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`${prefix("WARN")} ${msg}`, ...args),
    error: (msg, ...args) => console.error(`${prefix("ERROR")} ${msg}`, ...args),
    debug: (msg, ...args) => {
      if (process.env.LOG_LEVEL === "debug") {
        console.debug(`${prefix("DEBUG")} ${msg}`, ...args);
      }
    },
  };
}
