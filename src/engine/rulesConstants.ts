// src/engine/rulesConstants.ts

// First player to reach this score wins.
export const GOAL_SCORE = 100;

// Roll counts a strategy may return. 0 takes free bacon.
export const MIN_ROLLS = 0;
export const MAX_ROLLS = 10;

// Any die showing this face pigs out the whole turn.
export const PIG_OUT_FACE = 1;
export const PIG_OUT_SCORE = 1;

// Hog wild: four-sided dice when the score sum is a multiple of this.
export const HOG_WILD_MODULUS = 7;

// Samples per Monte Carlo estimate.
export const DEFAULT_NUM_SAMPLES = 1000;

// Seeds fill the 32-bit PRNG state, so they must fit in it.
export const MAX_SEED = 0xffffffff;
