export class ConfigError extends Error {
  readonly configPath: string;

  constructor(configPath: string, message: string, options?: { cause?: unknown }) {
    super(`Invalid ${configPath}: ${message}`, options);
    this.name = "ConfigError";
    this.configPath = configPath;
  }
}

/** Anything that escapes file discovery or processing. The original error is kept as `cause`. */
export class UnexpectedError extends Error {
  constructor(cause: unknown) {
    super("unexpected error occurred", { cause: toError(cause) });
    this.name = "UnexpectedError";
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
