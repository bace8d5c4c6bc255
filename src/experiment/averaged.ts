// src/experiment/averaged.ts

import { DEFAULT_NUM_SAMPLES } from "../engine/rulesConstants";
import { assertSampleCount } from "../engine/validate";

/**
 * Wrap `fn` so that one call runs it `numSamples` times with the same
 * arguments and returns the mean. Only `fn`'s own randomness (its dice)
 * varies between samples.
 *
 *   const dice = makeTestDice(3, 1, 5, 6);
 *   makeAveraged(dice, 1000)();           // 3.75
 *   makeAveraged(rollDice, 1000)(2, dice); // 6 (pig out on 3,1; 11 on 5,6)
 */
export function makeAveraged<A extends unknown[]>(
  fn: (...args: A) => number,
  numSamples: number = DEFAULT_NUM_SAMPLES
): (...args: A) => number {
  assertSampleCount(numSamples);

  return (...args: A) => {
    let total = 0;
    for (let i = 0; i < numSamples; i++) {
      total += fn(...args);
    }
    return total / numSamples;
  };
}
