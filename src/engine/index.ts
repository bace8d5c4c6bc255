// Public engine surface

export type { Dice, DiceSet, GameResult, PlayerIndex, Strategy, TurnRecord } from "../types";

// Dice sources
export type { Rng } from "./dice";
export { createRng, makeFairDice, makeDiceSet, makeTestDice, fourSided, sixSided, STANDARD_DICE } from "./dice";

// Turn engine
export { rollDice, freeBacon, takeTurn } from "./turn";

// Game engine
export type { PlayOptions, ScorePair } from "./game";
export { play, selectDice, other, isHogWild, isSwap, applySwapRule, rotatePerspective } from "./game";

// Errors
export type { HogErrorCode } from "./engineError";
export { HogError, isHogError } from "./engineError";

export { GOAL_SCORE, MIN_ROLLS, MAX_ROLLS, DEFAULT_NUM_SAMPLES } from "./rulesConstants";
