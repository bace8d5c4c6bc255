// src/engine/engineError.ts

export type HogErrorCode =
  | "INVALID_ROLL_COUNT"
  | "GAME_OVER"
  | "INVALID_SCORE"
  | "INVALID_DICE"
  | "INVALID_SAMPLE_COUNT"
  | "INVALID_CONFIG"
  | "UNKNOWN_STRATEGY";

/**
 * Raised on any precondition violation. Callers are expected to never
 * build invalid inputs, so nothing catches these inside the library.
 */
export class HogError extends Error {
  readonly code: HogErrorCode;

  constructor(code: HogErrorCode, message: string) {
    super(message);
    this.name = "HogError";
    this.code = code;
  }
}

export function isHogError(err: unknown): err is HogError {
  return err instanceof HogError;
}
