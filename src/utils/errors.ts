export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Raised when a mailbox or store connection cannot be established.
 * Aborts the run before any pipeline stage starts.
 */
export class SetupError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "SetupError";
  }
}

/**
 * Raised after a run whose mailbox stream broke off mid-fetch. Messages that
 * made it through were still reconciled and their failures flushed.
 */
export class PipelineError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "PipelineError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return String(error);
}
