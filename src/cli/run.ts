/**
 * Hog command line
 *
 * Runs the experiment suite, scores one strategy against a baseline, or
 * traces a single game turn by turn.
 *
 * Usage:
 *   hog --run-experiments [--samples N] [--seed N]
 *   hog --strategy final [--baseline always-5] [--trace]
 */

import { parseArgs } from "node:util";

import type { DiceSet, TurnRecord } from "../types";
import { createRng, makeDiceSet, STANDARD_DICE } from "../engine/dice";
import { isHogError } from "../engine/engineError";
import { play } from "../engine/game";
import { averageWinRate, formatAverage, runExperiments } from "../experiment";
import { getStrategy, listStrategiesWithInfo } from "../strategy";
import { loadConfig, parseIntStrict, validateConfig, type Env, type HogConfig } from "./config";

export interface CliDeps {
  env?: Env;
  log?: (line: string) => void;
  error?: (line: string) => void;
}

const DEFAULT_STRATEGY = "final";
const DEFAULT_BASELINE = "always-5";

export const USAGE = [
  "Usage: hog [options]",
  "",
  "  -r, --run-experiments   run the strategy experiment suite",
  "  -s, --strategy NAME     report the win rate of NAME against the baseline",
  "  -b, --baseline NAME     baseline strategy (default always-5)",
  "  -t, --trace             print every turn of one game",
  "  -n, --samples N         samples per estimate (env HOG_NUM_SAMPLES)",
  "  -g, --goal N            goal score for traced games (env HOG_GOAL)",
  "      --seed N            seed the dice for a reproducible run (env HOG_SEED)",
  "      --list              list available strategies",
  "  -h, --help              show this help",
].join("\n");

function parseCli(argv: string[]) {
  return parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      "run-experiments": { type: "boolean", short: "r" },
      strategy: { type: "string", short: "s" },
      baseline: { type: "string", short: "b" },
      trace: { type: "boolean", short: "t" },
      samples: { type: "string", short: "n" },
      goal: { type: "string", short: "g" },
      seed: { type: "string" },
      list: { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  }).values;
}

type CliValues = ReturnType<typeof parseCli>;

function resolveConfig(env: Env, values: CliValues): HogConfig {
  const base = loadConfig(env);
  return validateConfig({
    numSamples: values.samples !== undefined ? parseIntStrict(values.samples, "--samples") : base.numSamples,
    goal: values.goal !== undefined ? parseIntStrict(values.goal, "--goal") : base.goal,
    seed: values.seed !== undefined ? parseIntStrict(values.seed, "--seed") : base.seed,
    verbose: base.verbose,
  });
}

export function formatTurn(record: TurnRecord): string {
  const action = record.numRolls === 0 ? "takes free bacon" : `rolls ${record.numRolls}`;
  const wild = record.hogWild ? " (hog wild)" : "";
  const swap = record.swapped ? " swap!" : "";
  const [score0, score1] = record.scores;
  return `turn ${record.turn}: player ${record.player} ${action}${wild} +${record.delta}${swap} -> ${score0}-${score1}`;
}

/**
 * Run the CLI against `argv` (without the node and script entries).
 * Returns the process exit code.
 */
export function runCli(argv: string[], deps: CliDeps = {}): number {
  const env = deps.env ?? process.env;
  // eslint-disable-next-line no-console
  const log = deps.log ?? ((line: string) => console.log(line));
  // eslint-disable-next-line no-console
  const error = deps.error ?? ((line: string) => console.error(line));

  let values: CliValues;
  try {
    values = parseCli(argv);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    error(msg);
    error(USAGE);
    return 1;
  }

  if (values.help) {
    log(USAGE);
    return 0;
  }

  if (values.list) {
    for (const info of listStrategiesWithInfo()) {
      const aliases = info.aliases.length > 0 ? ` (aliases: ${info.aliases.join(", ")})` : "";
      log(`${info.name}${aliases}: ${info.description}`);
    }
    return 0;
  }

  try {
    const config = resolveConfig(env, values);
    const dice: DiceSet = config.seed !== undefined ? makeDiceSet(createRng(config.seed)) : STANDARD_DICE;

    const strategyName = values.strategy ?? DEFAULT_STRATEGY;
    const baselineName = values.baseline ?? DEFAULT_BASELINE;
    const trace = values.trace === true || (config.verbose && values.strategy !== undefined);

    if (!values["run-experiments"] && values.strategy === undefined && !trace) {
      log(USAGE);
      return 0;
    }

    // Unknown names fail before any game is played.
    const strategy = getStrategy(strategyName);
    const baseline = getStrategy(baselineName);

    if (values["run-experiments"]) {
      runExperiments({ numSamples: config.numSamples, dice, report: log });
    }

    if (values.strategy !== undefined) {
      const rate = averageWinRate(strategy, baseline, { numSamples: config.numSamples, dice });
      log(`${strategyName} vs ${baselineName} win rate: ${formatAverage(rate)}`);
    }

    if (trace) {
      log(`${strategyName} (player 0) vs ${baselineName} (player 1), goal ${config.goal}`);
      const [score0, score1] = play(strategy, baseline, config.goal, {
        dice,
        onTurn: (record) => log(formatTurn(record)),
      });
      log(`final score: ${score0}-${score1}, winner: player ${score0 > score1 ? 0 : 1}`);
    }

    return 0;
  } catch (err: unknown) {
    if (!isHogError(err)) throw err;
    error(`${err.code}: ${err.message}`);
    return 1;
  }
}
