// src/experiment/experiments.ts
//
// Monte Carlo experiments over the game engine.

import type { Dice, DiceSet, PlayerIndex, Strategy } from "../types";
import { STANDARD_DICE, sixSided } from "../engine/dice";
import { play } from "../engine/game";
import { DEFAULT_NUM_SAMPLES, MAX_ROLLS } from "../engine/rulesConstants";
import { rollDice } from "../engine/turn";
import { getStrategy } from "../strategy";
import { alwaysRoll } from "../strategy/strategies";
import { makeAveraged } from "./averaged";

export type Reporter = (line: string) => void;

export interface ExperimentOptions {
  numSamples?: number;
  dice?: DiceSet;
  report?: Reporter;
}

export interface ExperimentSummary {
  maxScoringNumRolls: { sixSided: number; fourSided: number };
  winRates: Record<string, number>;
}

// Strategies the suite scores against the baseline, in report order.
export const EXPERIMENT_STRATEGIES: readonly string[] = ["always-8", "bacon", "swap", "final"];

const silent: Reporter = () => undefined;

/** Integral averages keep one decimal ("3.0"); others print in full ("3.75"). */
export function formatAverage(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/**
 * Roll count (1..10) with the highest average turn score on `dice`.
 * Reports one line per roll count. Ties keep the lower count.
 */
export function maxScoringNumRolls(
  dice: Dice = sixSided,
  options: Pick<ExperimentOptions, "numSamples" | "report"> = {}
): number {
  const report = options.report ?? silent;
  const averagedRollDice = makeAveraged(rollDice, options.numSamples ?? DEFAULT_NUM_SAMPLES);

  let best = 0;
  let bestValue = Number.NEGATIVE_INFINITY;

  for (let numRolls = 1; numRolls <= MAX_ROLLS; numRolls++) {
    const value = averagedRollDice(numRolls, dice);
    report(`${numRolls} dice scores ${formatAverage(value)} on average`);
    if (value > bestValue) {
      best = numRolls;
      bestValue = value;
    }
  }

  return best;
}

/** 0 if strategy0 wins, 1 otherwise (a tie goes to player 1). */
export function winner(strategy0: Strategy, strategy1: Strategy, dice: DiceSet = STANDARD_DICE): PlayerIndex {
  const [score0, score1] = play(strategy0, strategy1, undefined, { dice });
  return score0 > score1 ? 0 : 1;
}

/**
 * Average win rate (0 to 1) of `strategy` against `baseline`, playing
 * `numSamples` games from each seat.
 */
export function averageWinRate(
  strategy: Strategy,
  baseline: Strategy = alwaysRoll(5),
  options: Pick<ExperimentOptions, "numSamples" | "dice"> = {}
): number {
  const averagedWinner = makeAveraged(winner, options.numSamples ?? DEFAULT_NUM_SAMPLES);
  const dice = options.dice ?? STANDARD_DICE;

  const winRateAsPlayer0 = 1 - averagedWinner(strategy, baseline, dice);
  const winRateAsPlayer1 = averagedWinner(baseline, strategy, dice);

  return (winRateAsPlayer0 + winRateAsPlayer1) / 2;
}

/**
 * The experiment suite: best roll counts for both dice, then the win rate
 * of each built-in strategy against always-5.
 */
export function runExperiments(options: ExperimentOptions = {}): ExperimentSummary {
  const report = options.report ?? silent;
  const diceSet = options.dice ?? STANDARD_DICE;
  const numSamples = options.numSamples ?? DEFAULT_NUM_SAMPLES;

  const sixSidedMax = maxScoringNumRolls(diceSet.sixSided, { numSamples, report });
  report(`Max scoring num rolls for six-sided dice: ${sixSidedMax}`);
  const fourSidedMax = maxScoringNumRolls(diceSet.fourSided, { numSamples, report });
  report(`Max scoring num rolls for four-sided dice: ${fourSidedMax}`);

  const baseline = alwaysRoll(5);
  const winRates: Record<string, number> = {};
  for (const name of EXPERIMENT_STRATEGIES) {
    const rate = averageWinRate(getStrategy(name), baseline, { numSamples, dice: diceSet });
    winRates[name] = rate;
    report(`${name} win rate: ${formatAverage(rate)}`);
  }

  return {
    maxScoringNumRolls: { sixSided: sixSidedMax, fourSided: fourSidedMax },
    winRates,
  };
}
