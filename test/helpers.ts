import type { Dice, DiceSet, Strategy } from "../src/types";
import { makeTestDice } from "../src/engine/dice";

export interface CountingDice {
  dice: Dice;
  calls: () => number;
}

/** Scripted dice that also count how often they were rolled. */
export function countingDice(...outcomes: number[]): CountingDice {
  const inner = makeTestDice(...outcomes);
  let n = 0;
  return {
    dice: () => {
      n++;
      return inner();
    },
    calls: () => n,
  };
}

/** One scripted die used for both the four- and six-sided slot. */
export function scriptedDiceSet(...outcomes: number[]): DiceSet {
  const d = makeTestDice(...outcomes);
  return { fourSided: d, sixSided: d };
}

export interface StrategyCall {
  score: number;
  opponentScore: number;
}

/** Wraps a strategy and records every (score, opponentScore) it is asked about. */
export function recordingStrategy(inner: Strategy): { strategy: Strategy; calls: StrategyCall[] } {
  const calls: StrategyCall[] = [];
  return {
    strategy: (score, opponentScore) => {
      calls.push({ score, opponentScore });
      return inner(score, opponentScore);
    },
    calls,
  };
}

/** Returns whatever `fn` throws; fails if it returns normally. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected function to throw");
}
