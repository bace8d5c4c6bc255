// src/engine/validate.ts
//
// Precondition checks shared by the turn and game engines.
// Every check throws immediately; nothing is clamped.

import { HogError, type HogErrorCode } from "./engineError";
import { MAX_ROLLS, MIN_ROLLS } from "./rulesConstants";

export function assert(condition: unknown, code: HogErrorCode, message: string): asserts condition {
  if (!condition) throw new HogError(code, message);
}

export function assertRollCount(numRolls: number, min = MIN_ROLLS, max = MAX_ROLLS): void {
  assert(Number.isInteger(numRolls), "INVALID_ROLL_COUNT", `num_rolls must be an integer, got ${numRolls}`);
  assert(numRolls >= min, "INVALID_ROLL_COUNT", `num_rolls must be at least ${min}, got ${numRolls}`);
  assert(numRolls <= max, "INVALID_ROLL_COUNT", `num_rolls must be at most ${max}, got ${numRolls}`);
}

export function assertScore(score: number, label = "score"): void {
  assert(Number.isInteger(score), "INVALID_SCORE", `${label} must be an integer, got ${score}`);
  assert(score >= 0, "INVALID_SCORE", `${label} must be non-negative, got ${score}`);
}

export function assertSampleCount(numSamples: number): void {
  assert(
    Number.isInteger(numSamples) && numSamples > 0,
    "INVALID_SAMPLE_COUNT",
    `num_samples must be a positive integer, got ${numSamples}`
  );
}
