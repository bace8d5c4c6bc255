// src/strategy/index.ts
//
// Name -> strategy lookup for the CLI and the experiment suite.
// always-N is built on demand for N in MIN_ROLLS..MAX_ROLLS.

import type { Strategy } from "../types";
import { HogError } from "../engine/engineError";
import { MAX_ROLLS, MIN_ROLLS } from "../engine/rulesConstants";
import { alwaysRoll, baconStrategy, finalStrategy, swapStrategy } from "./strategies";

export interface StrategyInfo {
  name: string;
  description: string;
  aliases: string[];
}

interface StrategyEntry {
  strategy: Strategy;
  description: string;
}

const STRATEGIES: Record<string, StrategyEntry> = {
  bacon: {
    strategy: baconStrategy,
    description: "Free bacon when it is worth at least 8, else roll 5.",
  },
  swap: {
    strategy: swapStrategy,
    description: "Bacon strategy that also chases beneficial swaps and dodges harmful ones.",
  },
  final: {
    strategy: finalStrategy,
    description: "Rolls more the further behind it is; free bacon past 90.",
  },
};

const ALIASES: Record<string, string> = {
  default: "final",
  baseline: "always-5",
};

const ALWAYS_ROLL = /^always-(\d+)$/;

function resolveName(name: string): string {
  return ALIASES[name] ?? name;
}

export function getStrategy(name: string): Strategy {
  const resolved = resolveName(name);

  const entry = STRATEGIES[resolved];
  if (entry) return entry.strategy;

  const m = ALWAYS_ROLL.exec(resolved);
  if (m) {
    const n = Number(m[1]);
    if (n >= MIN_ROLLS && n <= MAX_ROLLS) return alwaysRoll(n);
  }

  throw new HogError("UNKNOWN_STRATEGY", `Unknown strategy: ${name}. Available: ${listStrategies().join(", ")}`);
}

// The always-N family is listed as one range entry.
export function listStrategies(): string[] {
  return [`always-${MIN_ROLLS}..always-${MAX_ROLLS}`, ...Object.keys(STRATEGIES)];
}

export function listStrategiesWithInfo(): StrategyInfo[] {
  const aliasesOf = (target: string) =>
    Object.entries(ALIASES)
      .filter(([, t]) => t === target)
      .map(([alias]) => alias);

  return [
    {
      name: `always-${MIN_ROLLS}..always-${MAX_ROLLS}`,
      description: "Always roll the same number of dice.",
      aliases: aliasesOf("always-5"),
    },
    ...Object.entries(STRATEGIES).map(([name, entry]) => ({
      name,
      description: entry.description,
      aliases: aliasesOf(name),
    })),
  ];
}

export { alwaysRoll, baconStrategy, swapStrategy, finalStrategy } from "./strategies";
