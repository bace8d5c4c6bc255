// src/strategy/strategies.ts
//
// Built-in strategies. Each maps (score, opponentScore) to a roll count.

import type { Strategy } from "../types";
import { freeBacon } from "../engine/turn";
import { assertRollCount } from "../engine/validate";

/** A strategy that always rolls `n` dice. */
export function alwaysRoll(n: number): Strategy {
  assertRollCount(n);
  return (_score, _opponentScore) => n;
}

/** Roll 0 dice if free bacon gives at least `margin` points, else `numRolls`. */
export function baconStrategy(score: number, opponentScore: number, margin = 8, numRolls = 5): number {
  if (freeBacon(opponentScore) >= margin) return 0;
  return numRolls;
}

/**
 * Roll 0 dice when free bacon would trigger a beneficial swap, and roll
 * `numRolls` when it would trigger a harmful one. Otherwise behave like
 * baconStrategy.
 */
export function swapStrategy(score: number, opponentScore: number, margin = 8, numRolls = 5): number {
  const bacon = freeBacon(opponentScore);

  if ((score + bacon) * 2 === opponentScore) return 0;
  if (score + bacon === opponentScore * 2) return numRolls;
  if (bacon >= margin) return 0;
  return numRolls;
}

/**
 * Near the goal, take free bacon and never risk a pig out.
 *
 * Far behind, look for a swap first: free bacon that lands on exactly half
 * the opponent's score, or a position where rolling 10 dice can. Then
 * roll more dice the further behind we are: 10 past 40 points, 8 past 20,
 * 6 past 10. Dead level rolls 4. Anything else falls back to swapStrategy.
 */
export function finalStrategy(score: number, opponentScore: number): number {
  const bacon = freeBacon(opponentScore);
  const losingBy = opponentScore - score;

  if (score > 90) return 0;

  if (losingBy > 20) {
    if ((score + bacon) * 2 === opponentScore) return 0;
    if ((score + 1) * 2 === opponentScore) return 10;
    if (score * 2 + 1 === opponentScore) return 10;
  }

  if (losingBy > 40) return 10;
  if (losingBy > 20) return 8;
  if (losingBy > 10) return 6;
  if (losingBy === 0) return 4;
  return swapStrategy(score, opponentScore);
}
