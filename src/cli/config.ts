// src/cli/config.ts
//
// Run configuration from the environment. Command-line flags are applied
// on top by the CLI.

import { HogError } from "../engine/engineError";
import { DEFAULT_NUM_SAMPLES, GOAL_SCORE, MAX_SEED } from "../engine/rulesConstants";

export type Env = Record<string, string | undefined>;

export interface HogConfig {
  numSamples: number;
  goal: number;
  /** Seed for reproducible dice; undefined means Math.random. */
  seed: number | undefined;
  verbose: boolean;
}

export function envFlag(env: Env, name: string, defaultValue = false): boolean {
  const v = env[name];
  if (v == null) return defaultValue;
  const s = String(v).trim().toLowerCase();
  return s === "1" || s === "true" || s === "yes" || s === "on";
}

export function parseIntStrict(raw: string, name: string): number {
  const s = raw.trim();
  const n = Number(s);
  if (s === "" || !Number.isSafeInteger(n)) {
    throw new HogError("INVALID_CONFIG", `${name} must be an integer, got "${raw}"`);
  }
  return n;
}

export function envInt(env: Env, name: string, defaultValue: number): number {
  const v = env[name];
  if (v == null || v.trim() === "") return defaultValue;
  return parseIntStrict(v, name);
}

function envOptionalInt(env: Env, name: string): number | undefined {
  const v = env[name];
  if (v == null || v.trim() === "") return undefined;
  return parseIntStrict(v, name);
}

export function validateConfig(config: HogConfig): HogConfig {
  if (config.numSamples < 1) {
    throw new HogError("INVALID_CONFIG", `sample count must be positive, got ${config.numSamples}`);
  }
  if (config.goal < 1) {
    throw new HogError("INVALID_CONFIG", `goal must be positive, got ${config.goal}`);
  }
  if (config.seed !== undefined && (config.seed < 0 || config.seed > MAX_SEED)) {
    throw new HogError("INVALID_CONFIG", `seed must be in [0, ${MAX_SEED}], got ${config.seed}`);
  }
  return config;
}

export function loadConfig(env: Env = process.env): HogConfig {
  return validateConfig({
    numSamples: envInt(env, "HOG_NUM_SAMPLES", DEFAULT_NUM_SAMPLES),
    goal: envInt(env, "HOG_GOAL", GOAL_SCORE),
    seed: envOptionalInt(env, "HOG_SEED"),
    verbose: envFlag(env, "HOG_VERBOSE"),
  });
}
