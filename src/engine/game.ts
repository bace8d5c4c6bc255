// src/engine/game.ts
//
// Plays a full game between two strategies.
//
// The loop keeps the pair (score, opponentScore) from the point of view of
// the player about to move, and rotates it after every turn. Two separate
// exchanges happen per turn, in this order:
//   1. applySwapRule: exchange only when one score is exactly double the other
//   2. rotatePerspective: always exchange, handing the turn over
// Reordering them changes outcomes.

import type { Dice, DiceSet, GameResult, PlayerIndex, Strategy, TurnRecord } from "../types";
import { STANDARD_DICE } from "./dice";
import { GOAL_SCORE, HOG_WILD_MODULUS } from "./rulesConstants";
import { takeTurn } from "./turn";
import { assert } from "./validate";

export type ScorePair = readonly [score: number, opponentScore: number];

export interface PlayOptions {
  /** Dice to choose from each turn. Defaults to the standard fair dice. */
  dice?: DiceSet;

  /** Called after every turn with what happened. */
  onTurn?: (record: TurnRecord) => void;
}

/** Hog wild: the score sum is a multiple of 7 (0 included). */
export function isHogWild(score: number, opponentScore: number): boolean {
  return (score + opponentScore) % HOG_WILD_MODULUS === 0;
}

export function selectDice(score: number, opponentScore: number, diceSet: DiceSet = STANDARD_DICE): Dice {
  return diceFor(isHogWild(score, opponentScore), diceSet);
}

function diceFor(hogWild: boolean, diceSet: DiceSet): Dice {
  return hogWild ? diceSet.fourSided : diceSet.sixSided;
}

export function other(who: PlayerIndex): PlayerIndex {
  return who === 0 ? 1 : 0;
}

export function isSwap(score: number, opponentScore: number): boolean {
  return score === 2 * opponentScore || opponentScore === 2 * score;
}

export function applySwapRule(score: number, opponentScore: number): ScorePair {
  if (isSwap(score, opponentScore)) return [opponentScore, score];
  return [score, opponentScore];
}

export function rotatePerspective(score: number, opponentScore: number): ScorePair {
  return [opponentScore, score];
}

// (score, opponentScore) seen by `who` -> (score0, score1)
function toPlayerOrder(who: PlayerIndex, score: number, opponentScore: number): GameResult {
  return who === 0 ? [score, opponentScore] : [opponentScore, score];
}

/**
 * Simulate a game and return the final scores, player 0 first.
 *
 * strategy0 moves first. The game stops as soon as either score reaches
 * `goal`; no turn is taken after that.
 */
export function play(
  strategy0: Strategy,
  strategy1: Strategy,
  goal: number = GOAL_SCORE,
  options: PlayOptions = {}
): GameResult {
  assert(Number.isInteger(goal) && goal > 0, "INVALID_SCORE", `goal must be a positive integer, got ${goal}`);

  const diceSet = options.dice ?? STANDARD_DICE;
  const onTurn = options.onTurn;

  let who: PlayerIndex = 0;
  let score = 0;
  let opponentScore = 0;
  let turn = 0;

  while (Math.max(score, opponentScore) < goal) {
    const strategy = who === 0 ? strategy0 : strategy1;

    const numRolls = strategy(score, opponentScore);
    const hogWild = isHogWild(score, opponentScore);
    const delta = takeTurn(numRolls, opponentScore, diceFor(hogWild, diceSet), goal);
    score += delta;

    const swapped = isSwap(score, opponentScore);
    [score, opponentScore] = applySwapRule(score, opponentScore);

    turn++;
    onTurn?.({
      turn,
      player: who,
      numRolls,
      hogWild,
      delta,
      swapped,
      scores: toPlayerOrder(who, score, opponentScore),
    });

    [score, opponentScore] = rotatePerspective(score, opponentScore);
    who = other(who);
  }

  return toPlayerOrder(who, score, opponentScore);
}
