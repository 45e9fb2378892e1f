// Labor Law Assistant - Component loggers
// Console-backed, one prefix per component: "[LEVEL] [Component] message".

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

const debugEnabled = (): boolean => (process.env.LOG_LEVEL ?? "").toLowerCase() === "debug";

export function createLogger(component: string): Logger {
  return {
    info: (msg, ...args) => console.log(`[INFO] [${component}] ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[WARN] [${component}] ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[ERROR] [${component}] ${msg}`, ...args),
    debug: (msg, ...args) => {
      if (debugEnabled()) console.debug(`[DEBUG] [${component}] ${msg}`, ...args);
    },
  };
}

/** Extracts a printable message from anything thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
