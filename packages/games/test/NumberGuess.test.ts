import { describe, expect, it } from "vitest";
import {
  createNumberGuess,
  guessNumber,
  hintTier,
  isValidRange,
  performanceRating,
  strategyHint,
  type HintTier,
} from "../src";

const WARMTH: Record<HintTier, number> = {
  WAY_OFF: 0,
  GETTING_WARMER: 1,
  GETTING_CLOSE: 2,
  VERY_CLOSE: 3,
  SO_CLOSE: 4,
};

describe("NumberGuess", () => {
  it("validates ranges", () => {
    expect(isValidRange(1, 100)).toBe(true);
    expect(isValidRange(0, 10_000)).toBe(true);
    expect(isValidRange(0, 10_001)).toBe(false);
    expect(isValidRange(5, 5)).toBe(false);
    expect(isValidRange(10, 1)).toBe(false);
    expect(isValidRange(1.5, 10)).toBe(false);
  });

  it("draws the secret inclusively from the injected source", () => {
    expect(createNumberGuess(1, 10, () => 0).secret).toBe(1);
    expect(createNumberGuess(1, 10, () => 0.65).secret).toBe(7);
    expect(createNumberGuess(1, 10, () => 0.9999).secret).toBe(10);
  });

  it("counts out-of-range guesses as attempts", () => {
    const state = createNumberGuess(1, 10, () => 0.65);

    expect(guessNumber(state, 0)).toEqual({ result: "OUT_OF_RANGE" });
    expect(guessNumber(state, 11)).toEqual({ result: "OUT_OF_RANGE" });
    expect(state.attempts).toBe(2);
  });

  it("answers high, low and correct with hints", () => {
    const state = createNumberGuess(1, 10, () => 0.65);

    expect(guessNumber(state, 3)).toEqual({ result: "TOO_LOW", hint: "GETTING_WARMER" });
    expect(guessNumber(state, 8)).toEqual({ result: "TOO_HIGH", hint: "VERY_CLOSE" });
    expect(guessNumber(state, 7)).toEqual({ result: "CORRECT" });
    expect(state.attempts).toBe(3);
  });

  it("buckets the distance ratio into five tiers", () => {
    expect(hintTier(60, 0, 100)).toBe("WAY_OFF");
    expect(hintTier(50, 0, 100)).toBe("GETTING_WARMER");
    expect(hintTier(30, 0, 100)).toBe("GETTING_CLOSE");
    expect(hintTier(15, 0, 100)).toBe("VERY_CLOSE");
    expect(hintTier(6, 0, 100)).toBe("VERY_CLOSE");
    expect(hintTier(5, 0, 100)).toBe("SO_CLOSE");
  });

  it("never gets colder as the guess gets closer", () => {
    for (const [min, max] of [
      [1, 100],
      [1, 10],
      [0, 10_000],
    ] as const) {
      let previous = Number.POSITIVE_INFINITY;
      for (let distance = 1; distance <= max - min; distance++) {
        const warmth = WARMTH[hintTier(distance, min, max)];
        expect(warmth).toBeLessThanOrEqual(previous);
        previous = warmth;
      }
    }
  });

  it("rates a win against the optimal number of attempts", () => {
    const state = createNumberGuess(1, 100, () => 0);
    const rate = (attempts: number) => performanceRating({ ...state, attempts });

    expect(rate(1)).toBe("INCREDIBLE");
    expect(rate(7)).toBe("EXCELLENT");
    expect(rate(10)).toBe("GOOD");
    expect(rate(14)).toBe("NOT_BAD");
    expect(rate(15)).toBe("KEEP_PRACTICING");
  });

  it("gives a strategy hint", () => {
    const state = { ...createNumberGuess(1, 100, () => 0), attempts: 3 };

    expect(strategyHint(state)).toEqual({ min: 1, max: 100, rangeSize: 100, attempts: 3, optimalAttempts: 7 });
  });
});
