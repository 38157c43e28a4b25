import { z } from "zod";
import wordTable from "./data/words.json";
import { randomInt, type HangmanState, type RandomSource } from "./types";

export const MAX_WRONG_GUESSES = 6;
export const CUSTOM_WORD_CATEGORY = "Custom Word";

export type LetterResult =
    | { result: "CORRECT"; count: number }
    | { result: "WRONG" }
    | { result: "ALREADY_GUESSED" }
    | { result: "INVALID_LETTER" };

const WordEntrySchema = z.object({
    word: z
        .string()
        .min(1)
        .regex(/^[A-Z]+$/),
    category: z.string().min(1),
});

export type WordEntry = z.infer<typeof WordEntrySchema>;

const WORDS: readonly WordEntry[] = z.array(WordEntrySchema).min(1).parse(wordTable);

const LETTER = /^\p{L}$/u;
const CUSTOM_WORD = /^[\p{L} ]{1,20}$/u;

const GALLOWS = [
    "  +---+\n  |   |\n      |\n      |\n      |\n      |\n=========",
    "  +---+\n  |   |\n  O   |\n      |\n      |\n      |\n=========",
    "  +---+\n  |   |\n  O   |\n  |   |\n      |\n      |\n=========",
    "  +---+\n  |   |\n  O   |\n /|   |\n      |\n      |\n=========",
    "  +---+\n  |   |\n  O   |\n /|\\  |\n      |\n      |\n=========",
    "  +---+\n  |   |\n  O   |\n /|\\  |\n /    |\n      |\n=========",
    "  +---+\n  |   |\n  O   |\n /|\\  |\n / \\  |\n      |\n=========",
] as const;

export function wordList(): readonly WordEntry[] {
    return WORDS;
}

export function pickWord(random: RandomSource, words: readonly WordEntry[] = WORDS): WordEntry {
    const entry = words[randomInt(0, words.length - 1, random)];
    if (!entry) {
        throw new RangeError("Word table is empty.");
    }
    return entry;
}

/**
 * Normalizes a player-supplied word: trimmed and upper-cased, 1-20 letters or
 * spaces. Returns null when the word is not acceptable.
 */
export function normalizeCustomWord(input: string): string | null {
    const word = input.trim().toUpperCase();
    return CUSTOM_WORD.test(word) ? word : null;
}

export function createHangman(word: string, category: string): HangmanState {
    return {
        game: "hangman",
        word,
        category,
        guessed: [],
        wrong: [],
        maxWrong: MAX_WRONG_GUESSES,
    };
}

/**
 * Applies a letter guess to `state` in place. Repeated letters, right or
 * wrong, are reported and never counted again.
 */
export function guessLetter(state: HangmanState, input: string): LetterResult {
    const letter = input.trim().toUpperCase();
    if (!LETTER.test(letter)) {
        return { result: "INVALID_LETTER" };
    }

    if (state.guessed.includes(letter) || state.wrong.includes(letter)) {
        return { result: "ALREADY_GUESSED" };
    }

    const count = [...state.word].filter((c) => c === letter).length;
    if (count > 0) {
        state.guessed.push(letter);
        return { result: "CORRECT", count };
    }

    state.wrong.push(letter);
    return { result: "WRONG" };
}

export function isSolved(state: HangmanState): boolean {
    return letters(state.word).every((c) => state.guessed.includes(c));
}

export function isHanged(state: HangmanState): boolean {
    return state.wrong.length >= state.maxWrong;
}

/**
 * Word with unrevealed letters as `_`, characters separated by spaces.
 */
export function maskedWord(state: HangmanState): string {
    return [...state.word]
        .map((c) => (LETTER.test(c) && !state.guessed.includes(c) ? "_" : c))
        .join(" ");
}

export type HangmanProgress = {
    found: number;
    total: number;
    wrong: number;
    maxWrong: number;
    category: string;
};

export function hangmanProgress(state: HangmanState): HangmanProgress {
    const all = letters(state.word);
    return {
        found: all.filter((c) => state.guessed.includes(c)).length,
        total: all.length,
        wrong: state.wrong.length,
        maxWrong: state.maxWrong,
        category: state.category,
    };
}

export function gallowsStage(state: HangmanState): number {
    return Math.min(state.wrong.length, GALLOWS.length - 1);
}

export function renderGallows(stage: number): string {
    return GALLOWS[Math.max(0, Math.min(stage, GALLOWS.length - 1))] ?? GALLOWS[0];
}

export type HangmanHint = {
    category: string;
    length: number;
    uniqueLetters: number;
    vowels: number;
    found: number;
};

export function hangmanHint(state: HangmanState): HangmanHint {
    const unique = new Set(letters(state.word));
    return {
        category: state.category,
        length: [...state.word].length,
        uniqueLetters: unique.size,
        vowels: [...unique].filter((c) => "AEIOU".includes(c)).length,
        found: state.guessed.length,
    };
}

function letters(word: string): string[] {
    return [...word].filter((c) => LETTER.test(c));
}
