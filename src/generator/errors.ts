import { MAX_BATCH_COUNT } from "./generator-constants.js";

export type ConfigErrorCode =
  | "INVALID_LENGTH"
  | "INVALID_MINIMUM"
  | "NO_CHARACTER_CLASS"
  | "EMPTY_CLASS_ALPHABET"
  | "EMPTY_POOL"
  | "MINIMUMS_EXCEED_LENGTH"
  | "INVALID_COUNT"
  | "INVALID_WORD_COUNT";

/**
 * Raised synchronously when generation parameters cannot produce a value.
 */
export class ConfigError extends Error {
  constructor(
    public readonly code: ConfigErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export function isConfigError(err: unknown): err is ConfigError {
  return err instanceof ConfigError;
}

export function assertBatchCount(count: number): void {
  if (!Number.isInteger(count) || count < 0) {
    throw new ConfigError("INVALID_COUNT", `Count must be a non-negative integer (got ${count})`);
  }
  if (count > MAX_BATCH_COUNT) {
    throw new ConfigError("INVALID_COUNT", `Count must be at most ${MAX_BATCH_COUNT} (got ${count})`);
  }
}
