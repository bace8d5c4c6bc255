// src/engine/turn.ts
//
// Score delta for a single turn.

import type { Dice } from "../types";
import { sixSided } from "./dice";
import { GOAL_SCORE, PIG_OUT_FACE, PIG_OUT_SCORE } from "./rulesConstants";
import { assert, assertRollCount, assertScore } from "./validate";

/**
 * Roll `dice` exactly `numRolls` times and return the sum of the outcomes,
 * or 1 if any outcome was a 1 (pig out).
 *
 * Calls `dice` exactly `numRolls` times, even after a pig out.
 */
export function rollDice(numRolls: number, dice: Dice = sixSided): number {
  assertRollCount(numRolls, 1, Number.POSITIVE_INFINITY);

  let total = 0;
  let pigOut = false;
  for (let i = 0; i < numRolls; i++) {
    const outcome = dice();
    if (outcome === PIG_OUT_FACE) pigOut = true;
    total += outcome;
  }

  return pigOut ? PIG_OUT_SCORE : total;
}

/** Free bacon: one more than the larger digit of the opponent's score. */
export function freeBacon(opponentScore: number): number {
  assertScore(opponentScore, "opponent_score");
  return 1 + Math.max(Math.floor(opponentScore / 10), opponentScore % 10);
}

/**
 * Score for one turn. Rolling 0 dice takes free bacon and leaves the
 * dice untouched.
 */
export function takeTurn(
  numRolls: number,
  opponentScore: number,
  dice: Dice = sixSided,
  goal: number = GOAL_SCORE
): number {
  assertRollCount(numRolls);
  assert(opponentScore < goal, "GAME_OVER", `the game should be over: opponent_score ${opponentScore} >= goal ${goal}`);

  if (numRolls === 0) return freeBacon(opponentScore);
  return rollDice(numRolls, dice);
}
