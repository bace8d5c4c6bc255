import { describe, it, expect } from "vitest";

import {
  alwaysRoll,
  baconStrategy,
  finalStrategy,
  getStrategy,
  listStrategies,
  listStrategiesWithInfo,
  swapStrategy,
} from "../src/strategy";
import { thrownBy } from "./helpers";

describe("alwaysRoll", () => {
  it("ignores the scores", () => {
    const strategy = alwaysRoll(5);
    expect(strategy(0, 0)).toBe(5);
    expect(strategy(99, 99)).toBe(5);
  });

  it("rejects roll counts outside 0..10", () => {
    expect(thrownBy(() => alwaysRoll(11))).toMatchObject({ code: "INVALID_ROLL_COUNT" });
  });
});

describe("baconStrategy", () => {
  it("takes free bacon when it is worth at least the margin", () => {
    expect(baconStrategy(0, 7)).toBe(0);
    expect(baconStrategy(95, 99)).toBe(0);
    expect(baconStrategy(50, 75)).toBe(0);
  });

  it("rolls otherwise", () => {
    expect(baconStrategy(0, 0)).toBe(5);
    expect(baconStrategy(5, 36)).toBe(5);
    expect(baconStrategy(5, 36, 7, 3)).toBe(0);
    expect(baconStrategy(20, 11, 8, 2)).toBe(2);
  });
});

describe("swapStrategy", () => {
  it("takes free bacon when it sets up a beneficial swap", () => {
    // bacon(36) = 7 and (11 + 7) * 2 = 36
    expect(swapStrategy(11, 36)).toBe(0);
    expect(baconStrategy(11, 36)).toBe(5);
  });

  it("rolls when free bacon would cause a harmful swap", () => {
    // bacon(9) = 10 and 8 + 10 = 9 * 2
    expect(swapStrategy(8, 9)).toBe(5);
    expect(swapStrategy(8, 9, 8, 3)).toBe(3);
    expect(baconStrategy(8, 9)).toBe(0);
  });

  it("falls back to the bacon margin", () => {
    expect(swapStrategy(13, 28)).toBe(0);
    expect(swapStrategy(40, 55)).toBe(5);
  });
});

describe("finalStrategy", () => {
  it("takes free bacon past 90", () => {
    expect(finalStrategy(91, 0)).toBe(0);
    expect(finalStrategy(95, 99)).toBe(0);
  });

  it("chases swaps when far behind", () => {
    expect(finalStrategy(11, 36)).toBe(0);
    expect(finalStrategy(20, 42)).toBe(10);
    expect(finalStrategy(20, 41)).toBe(10);
  });

  it("rolls more the further behind it is", () => {
    expect(finalStrategy(0, 70)).toBe(10);
    expect(finalStrategy(1, 60)).toBe(10);
    expect(finalStrategy(10, 47)).toBe(8);
    expect(finalStrategy(30, 52)).toBe(8);
    expect(finalStrategy(13, 28)).toBe(6);
    expect(finalStrategy(40, 55)).toBe(6);
  });

  it("rolls 4 when level", () => {
    expect(finalStrategy(0, 0)).toBe(4);
    expect(finalStrategy(45, 45)).toBe(4);
  });

  it("defers to swapStrategy when ahead or slightly behind", () => {
    expect(finalStrategy(20, 11)).toBe(5);
    expect(finalStrategy(30, 19)).toBe(0);
    expect(finalStrategy(8, 9)).toBe(5);
  });

  it("always returns a roll count in 0..10", () => {
    for (let s = 0; s < 100; s++) {
      for (let o = 0; o < 100; o++) {
        const n = finalStrategy(s, o);
        expect(Number.isInteger(n) && n >= 0 && n <= 10).toBe(true);
      }
    }
  });
});

describe("Strategy registry", () => {
  it("resolves built-in names and aliases", () => {
    expect(getStrategy("final")).toBe(finalStrategy);
    expect(getStrategy("default")).toBe(finalStrategy);
    expect(getStrategy("swap")).toBe(swapStrategy);
    expect(getStrategy("bacon")).toBe(baconStrategy);
  });

  it("builds always-N strategies", () => {
    expect(getStrategy("always-8")(0, 0)).toBe(8);
    expect(getStrategy("baseline")(50, 10)).toBe(5);
    expect(getStrategy("always-0")(3, 4)).toBe(0);
  });

  it("rejects unknown names", () => {
    expect(thrownBy(() => getStrategy("always-11"))).toMatchObject({ code: "UNKNOWN_STRATEGY" });
    expect(thrownBy(() => getStrategy("greedy"))).toMatchObject({ code: "UNKNOWN_STRATEGY" });
  });

  it("lists strategies with descriptions", () => {
    expect(listStrategies()).toEqual(["always-0..always-10", "bacon", "swap", "final"]);
    const info = listStrategiesWithInfo();
    expect(info.find((i) => i.name === "final")?.aliases).toEqual(["default"]);
    expect(info[0].aliases).toEqual(["baseline"]);
  });
});
