export class SourceUnavailableError extends Error {
  constructor(
    public readonly source: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${source}: ${message}`, options);
    this.name = "SourceUnavailableError";
  }
}

export class DataCorruptError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DataCorruptError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
