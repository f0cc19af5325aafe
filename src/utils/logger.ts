const timestamp = () => new Date().toISOString();

export interface Logger {
  info(message: string, data?: unknown): void;
  error(message: string, error?: unknown): void;
  warn(message: string, data?: unknown): void;
  debug(message: string, data?: unknown): void;
  child(scope: string): Logger;
}

function createLogger(scope?: string): Logger {
  const prefix = (level: string) =>
    scope ? `[${timestamp()}] ${level} [${scope}]:` : `[${timestamp()}] ${level}:`;

  return {
    info(message, data) {
      console.log(`${prefix("INFO")} ${message}`, data ?? "");
    },
    error(message, error) {
      console.error(`${prefix("ERROR")} ${message}`, error ?? "");
    },
    warn(message, data) {
      console.warn(`${prefix("WARN")} ${message}`, data ?? "");
    },
    debug(message, data) {
      if (process.env.DEBUG === "true") {
        console.log(`${prefix("DEBUG")} ${message}`, data ?? "");
      }
    },
    child(childScope) {
      return createLogger(scope ? `${scope}:${childScope}` : childScope);
    },
  };
}

export const logger = createLogger();
