import { describe, expect, it } from "vitest";
import {
  createHangman,
  gallowsStage,
  guessLetter,
  hangmanHint,
  hangmanProgress,
  isHanged,
  isSolved,
  maskedWord,
  normalizeCustomWord,
  pickWord,
  renderGallows,
  wordList,
} from "../src";

function permutations<T>(items: T[]): T[][] {
  if (items.length <= 1) return [items];
  return items.flatMap((item, i) =>
    permutations([...items.slice(0, i), ...items.slice(i + 1)]).map((rest) => [item, ...rest]),
  );
}

describe("Hangman", () => {
  it("reveals every occurrence of a correct letter", () => {
    const state = createHangman("TEST", "Test Category");

    expect(guessLetter(state, "t")).toEqual({ result: "CORRECT", count: 2 });
    expect(state.guessed).toEqual(["T"]);
    expect(maskedWord(state)).toBe("T _ _ T");
  });

  it("records wrong letters in order", () => {
    const state = createHangman("TEST", "Test Category");

    expect(guessLetter(state, "Z")).toEqual({ result: "WRONG" });
    expect(guessLetter(state, "a")).toEqual({ result: "WRONG" });
    expect(state.wrong).toEqual(["Z", "A"]);
    expect(gallowsStage(state)).toBe(2);
  });

  it("never counts a repeated letter twice", () => {
    const state = createHangman("TEST", "Test Category");
    guessLetter(state, "T");
    guessLetter(state, "Q");

    expect(guessLetter(state, "t")).toEqual({ result: "ALREADY_GUESSED" });
    expect(guessLetter(state, "q")).toEqual({ result: "ALREADY_GUESSED" });
    expect(state.guessed).toEqual(["T"]);
    expect(state.wrong).toEqual(["Q"]);
  });

  it("rejects anything but a single letter", () => {
    const state = createHangman("TEST", "Test Category");

    for (const input of ["", "ab", "1", "?", " "]) {
      expect(guessLetter(state, input)).toEqual({ result: "INVALID_LETTER" });
    }
    expect(state.guessed).toEqual([]);
    expect(state.wrong).toEqual([]);
  });

  it("is solved by the distinct letters in any order", () => {
    for (const order of permutations(["B", "A", "N"])) {
      const state = createHangman("BANANA", "Fruit");
      for (const letter of order) {
        expect(isSolved(state)).toBe(false);
        guessLetter(state, letter);
      }
      expect(isSolved(state)).toBe(true);
    }
  });

  it("is lost on the sixth wrong letter", () => {
    const state = createHangman("TEST", "Test Category");
    for (const letter of ["A", "B", "C", "D", "F"]) guessLetter(state, letter);
    expect(isHanged(state)).toBe(false);

    guessLetter(state, "G");
    expect(isHanged(state)).toBe(true);
    expect(gallowsStage(state)).toBe(6);
  });

  it("normalizes custom words", () => {
    expect(normalizeCustomWord("  new york ")).toBe("NEW YORK");
    expect(normalizeCustomWord("abcdefghijklmnopqrst")).toBe("ABCDEFGHIJKLMNOPQRST");
    expect(normalizeCustomWord("abcdefghijklmnopqrstu")).toBeNull();
    expect(normalizeCustomWord("   ")).toBeNull();
    expect(normalizeCustomWord("r2d2")).toBeNull();
  });

  it("keeps spaces visible and needs no guess for them", () => {
    const state = createHangman("NEW YORK", "Custom Word");
    guessLetter(state, "N");

    expect(maskedWord(state)).toBe("N _ _   _ _ _ _");
    for (const letter of ["E", "W", "Y", "O", "R", "K"]) guessLetter(state, letter);
    expect(isSolved(state)).toBe(true);
  });

  it("reports progress by letter occurrences", () => {
    const state = createHangman("TEST", "Test Category");
    guessLetter(state, "T");
    guessLetter(state, "X");

    expect(hangmanProgress(state)).toEqual({ found: 2, total: 4, wrong: 1, maxWrong: 6, category: "Test Category" });
  });

  it("summarizes the word for hints", () => {
    const state = createHangman("BANANA", "Fruit");
    guessLetter(state, "N");

    expect(hangmanHint(state)).toEqual({ category: "Fruit", length: 6, uniqueLetters: 3, vowels: 1, found: 1 });
  });

  it("picks words with the injected random source", () => {
    const words = [
      { word: "ALPHA", category: "One" },
      { word: "BRAVO", category: "Two" },
    ];

    expect(pickWord(() => 0, words)).toEqual({ word: "ALPHA", category: "One" });
    expect(pickWord(() => 0.75, words)).toEqual({ word: "BRAVO", category: "Two" });
  });

  it("ships an upper-case word table", () => {
    const words = wordList();
    expect(words.length).toBeGreaterThan(20);
    for (const entry of words) {
      expect(entry.word).toMatch(/^[A-Z]+$/);
      expect(entry.category.length).toBeGreaterThan(0);
    }
  });

  it("draws one gallows stage per wrong guess", () => {
    expect(renderGallows(0)).toBe("  +---+\n  |   |\n      |\n      |\n      |\n      |\n=========");
    expect(renderGallows(6)).toBe("  +---+\n  |   |\n  O   |\n /|\\  |\n / \\  |\n      |\n=========");
  });
});
