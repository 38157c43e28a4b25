import { randomInt, type NumberGuessState, type RandomSource } from "./types";

export const DEFAULT_MIN = 1;
export const DEFAULT_MAX = 100;
export const MAX_RANGE = 10_000;

export type HintTier = "WAY_OFF" | "GETTING_WARMER" | "GETTING_CLOSE" | "VERY_CLOSE" | "SO_CLOSE";

export const HINT_TEXT: Record<HintTier, string> = {
    WAY_OFF: "Way off!",
    GETTING_WARMER: "Getting warmer...",
    GETTING_CLOSE: "Getting close!",
    VERY_CLOSE: "Very close!",
    SO_CLOSE: "So close!",
};

export type NumberResult =
    | { result: "CORRECT" }
    | { result: "TOO_LOW"; hint: HintTier }
    | { result: "TOO_HIGH"; hint: HintTier }
    | { result: "OUT_OF_RANGE" };

export type Rating = "INCREDIBLE" | "EXCELLENT" | "GOOD" | "NOT_BAD" | "KEEP_PRACTICING";

/**
 * Whether `min..max` is an acceptable range: integers, `min < max` and at
 * most {@link MAX_RANGE} apart.
 */
export function isValidRange(min: number, max: number): boolean {
    return Number.isInteger(min) && Number.isInteger(max) && min < max && max - min <= MAX_RANGE;
}

/**
 * Draws the secret uniformly from `[min, max]`. The range must already be
 * valid.
 */
export function createNumberGuess(min: number, max: number, random: RandomSource): NumberGuessState {
    return {
        game: "number_guess",
        secret: randomInt(min, max, random),
        attempts: 0,
        min,
        max,
    };
}

/**
 * Applies a guess to `state` in place. Every guess, out-of-range ones
 * included, counts as an attempt.
 */
export function guessNumber(state: NumberGuessState, guess: number): NumberResult {
    state.attempts += 1;

    if (!Number.isInteger(guess) || guess < state.min || guess > state.max) {
        return { result: "OUT_OF_RANGE" };
    }
    if (guess === state.secret) {
        return { result: "CORRECT" };
    }

    const tier = hintTier(Math.abs(guess - state.secret), state.min, state.max);
    return guess < state.secret ? { result: "TOO_LOW", hint: tier } : { result: "TOO_HIGH", hint: tier };
}

/**
 * Buckets `distance / (max - min)` into five tiers. Smaller distances never
 * map to a colder tier.
 */
export function hintTier(distance: number, min: number, max: number): HintTier {
    const ratio = distance / (max - min);

    if (ratio > 0.5) return "WAY_OFF";
    if (ratio > 0.3) return "GETTING_WARMER";
    if (ratio > 0.15) return "GETTING_CLOSE";
    if (ratio > 0.05) return "VERY_CLOSE";
    return "SO_CLOSE";
}

export function performanceRating(state: NumberGuessState): Rating {
    const optimal = optimalAttempts(state.max - state.min);

    if (state.attempts === 1) return "INCREDIBLE";
    if (state.attempts <= optimal) return "EXCELLENT";
    if (state.attempts <= optimal + 3) return "GOOD";
    if (state.attempts <= optimal + 7) return "NOT_BAD";
    return "KEEP_PRACTICING";
}

export type StrategyHint = {
    min: number;
    max: number;
    rangeSize: number;
    attempts: number;
    optimalAttempts: number;
};

export function strategyHint(state: NumberGuessState): StrategyHint {
    const rangeSize = state.max - state.min + 1;
    return {
        min: state.min,
        max: state.max,
        rangeSize,
        attempts: state.attempts,
        optimalAttempts: optimalAttempts(rangeSize),
    };
}

function optimalAttempts(span: number): number {
    return Math.max(1, Math.ceil(Math.log2(span)));
}
