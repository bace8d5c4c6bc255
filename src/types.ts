// src/types.ts

/** Which player is about to move: 0 plays first, 1 second. */
export type PlayerIndex = 0 | 1;

/**
 * A source of die outcomes. Each call yields one positive integer.
 * Fair dice draw from a PRNG; test dice replay a fixed script.
 */
export type Dice = () => number;

/** The two dice a game chooses between (Hog wild picks four-sided). */
export interface DiceSet {
  fourSided: Dice;
  sixSided: Dice;
}

/**
 * A strategy picks how many dice to roll (0..10) from the current
 * player's score and the opponent's score. Pure; called every turn.
 */
export type Strategy = (score: number, opponentScore: number) => number;

/** Final scores, player 0 first regardless of who finished the game. */
export type GameResult = readonly [score0: number, score1: number];

/** One entry of a game's turn log. */
export interface TurnRecord {
  /** 1-based turn counter */
  turn: number;
  player: PlayerIndex;
  numRolls: number;

  // True when four-sided dice were in play for this turn.
  hogWild: boolean;

  /** Points the turn itself produced (before any swap). */
  delta: number;
  swapped: boolean;

  /** Scores after the turn, player 0 first. */
  scores: GameResult;
}
