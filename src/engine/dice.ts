// src/engine/dice.ts
//
// Dice sources. Fair dice draw from a float PRNG in [0, 1);
// test dice replay a fixed script forever.

import type { Dice, DiceSet } from "../types";
import { MAX_SEED } from "./rulesConstants";
import { assert } from "./validate";

/** Float source in [0, 1), the same contract as Math.random. */
export type Rng = () => number;

/**
 * mulberry32: small seeded 32-bit PRNG.
 * The same seed always yields the same sequence. Seeds are 32-bit
 * unsigned integers; wider values would collide once folded into the state.
 */
export function createRng(seed: number): Rng {
  assert(
    Number.isInteger(seed) && seed >= 0 && seed <= MAX_SEED,
    "INVALID_DICE",
    `seed must be an integer in [0, ${MAX_SEED}], got ${seed}`
  );

  let state = seed | 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** A die with outcomes uniform over 1..sides. */
export function makeFairDice(sides: number, rng: Rng = Math.random): Dice {
  assert(Number.isInteger(sides) && sides >= 2, "INVALID_DICE", `sides must be an integer >= 2, got ${sides}`);
  return () => 1 + Math.floor(rng() * sides);
}

export const fourSided: Dice = makeFairDice(4);
export const sixSided: Dice = makeFairDice(6);

export const STANDARD_DICE: DiceSet = { fourSided, sixSided };

/** Both dice of a set share one PRNG, so a seed fixes a whole run. */
export function makeDiceSet(rng: Rng): DiceSet {
  return {
    fourSided: makeFairDice(4, rng),
    sixSided: makeFairDice(6, rng),
  };
}

/**
 * Deterministic dice for tests: returns `outcomes` in order and wraps
 * back to the first after the last.
 *
 *   const dice = makeTestDice(4, 1, 2);
 *   dice(); dice(); dice(); dice(); // 4, 1, 2, 4
 */
export function makeTestDice(...outcomes: number[]): Dice {
  assert(outcomes.length > 0, "INVALID_DICE", "test dice need at least one outcome");
  for (const o of outcomes) {
    assert(Number.isInteger(o) && o >= 1, "INVALID_DICE", `dice outcome must be a positive integer, got ${o}`);
  }

  const script = [...outcomes];
  let cursor = 0;
  return () => {
    const value = script[cursor];
    cursor = (cursor + 1) % script.length;
    return value;
  };
}
