import { describe, expect, it } from "vitest";
import { GameEngine, renderGame, type LetterGuessResult } from "../src";

function createEngine(random: () => number = () => 0.65) {
  return new GameEngine({ random });
}

describe("GameEngine", () => {
  it("plays a number guessing game to the end", async () => {
    const engine = createEngine();

    const started = await engine.startNumberGuess("100", { min: 1, max: 10 });
    expect(started.status).toBe("started");

    const first = await engine.guessNumber("100", 3);
    expect(first.guess).toEqual({ result: "TOO_LOW", hint: "GETTING_WARMER" });
    expect(first.status).toBe("in_progress");
    expect(first.state.attempts).toBe(1);

    const second = await engine.guessNumber("100", 7);
    expect(second.guess).toEqual({ result: "CORRECT" });
    expect(second.status).toBe("won");
    expect(second.state.attempts).toBe(2);
    expect(second.rating).toBe("EXCELLENT");

    expect(await engine.view("100", "number_guess")).toBeNull();
    await engine.close();
  });

  it("rejects an invalid range without starting a game", async () => {
    const engine = createEngine();

    expect(await engine.startNumberGuess("100", { min: 5, max: 5 })).toEqual({
      status: "rejected",
      reason: "INVALID_RANGE",
    });
    expect(await engine.view("100", "number_guess")).toBeNull();
    await engine.close();
  });

  it("refuses a second game of the same kind", async () => {
    const engine = createEngine();
    await engine.startNumberGuess("100");
    const first = await engine.guessNumber("100", 1);

    await expect(engine.startNumberGuess("100", { min: 1, max: 10 })).rejects.toMatchObject({
      code: "ALREADY_ACTIVE",
    });

    const current = await engine.view("100", "number_guess");
    expect(current).toEqual(first.state);
    await engine.close();
  });

  it("lets one owner play different games at once", async () => {
    const engine = createEngine();
    await engine.startNumberGuess("100");
    await engine.startHangman("100", "parlor");
    await engine.startTicTacToe("100");

    expect((await engine.view("100", "hangman"))?.game).toBe("hangman");
    expect((await engine.view("100", "tictactoe"))?.game).toBe("tictactoe");
    await engine.close();
  });

  it("rejects challenging yourself", async () => {
    const engine = createEngine();

    expect(await engine.startTicTacToe("100", "100")).toEqual({ status: "rejected", reason: "SELF_CHALLENGE" });
    expect(await engine.view("100", "tictactoe")).toBeNull();
    await engine.close();
  });

  it("rejects a blank opponent instead of starting an AI game", async () => {
    const engine = createEngine();

    await expect(engine.startTicTacToe("100", "")).rejects.toMatchObject({ code: "INVALID_INPUT" });
    await expect(engine.startTicTacToe("100", "  ")).rejects.toMatchObject({ code: "INVALID_INPUT" });
    expect(await engine.view("100", "tictactoe")).toBeNull();
    await engine.close();
  });

  it("registers neither player when the opponent is busy", async () => {
    const engine = createEngine();
    await engine.startTicTacToe("200", "300");

    await expect(engine.startTicTacToe("100", "200")).rejects.toMatchObject({ code: "ALREADY_ACTIVE" });
    expect(await engine.view("100", "tictactoe")).toBeNull();
    await engine.close();
  });

  it("keeps the board unchanged when the wrong player moves", async () => {
    const engine = createEngine();
    await engine.startTicTacToe("100", "200");

    const result = await engine.move("200", 5);
    expect(result.outcome).toEqual({ status: "rejected", reason: "NOT_YOUR_TURN" });

    const state = await engine.view("200", "tictactoe");
    expect(state?.game === "tictactoe" ? state.board : null).toEqual(Array.from({ length: 9 }, () => null));
    await engine.close();
  });

  it("removes a finished two-player game for both players", async () => {
    const engine = createEngine();
    await engine.startTicTacToe("100", "200");

    await engine.move("100", 1);
    await engine.move("200", 4);
    await engine.move("100", 2);
    await engine.move("200", 5);
    const last = await engine.move("100", 3);

    expect(last.outcome).toEqual({ status: "won", winner: "X", winnerId: "100", aiMove: null });
    expect(await engine.view("100", "tictactoe")).toBeNull();
    expect(await engine.view("200", "tictactoe")).toBeNull();
    await expect(engine.move("200", 6)).rejects.toMatchObject({ code: "SESSION_NOT_FOUND" });
    await engine.close();
  });

  it("answers the human move with an AI move", async () => {
    const engine = createEngine();
    await engine.startTicTacToe("100");

    const result = await engine.move("100", 1);
    expect(result.outcome).toEqual({ status: "continue", aiMove: 5, next: "X", nextPlayer: "100" });
    expect(result.state.board[4]).toBe("O");
    await engine.close();
  });

  it("plays hangman with a custom word", async () => {
    const engine = createEngine();

    const started = await engine.startHangman("100", "  hi ");
    expect(started).toMatchObject({ status: "started", state: { word: "HI", category: "Custom Word" } });

    const first = await engine.guessLetter("100", "h");
    expect(first.letter).toEqual({ result: "CORRECT", count: 1 });
    expect(first.status).toBe("in_progress");

    const second = await engine.guessLetter("100", "I");
    expect(second.status).toBe("won");
    expect(await engine.view("100", "hangman")).toBeNull();
    await engine.close();
  });

  it("rejects an invalid custom word", async () => {
    const engine = createEngine();

    expect(await engine.startHangman("100", "abc123")).toEqual({ status: "rejected", reason: "INVALID_WORD" });
    await engine.close();
  });

  it("ends hangman as lost after six wrong letters", async () => {
    const engine = createEngine();
    await engine.startHangman("100", "a");

    const results: LetterGuessResult[] = [];
    for (const letter of ["B", "C", "D", "E", "F", "G"]) {
      results.push(await engine.guessLetter("100", letter));
    }

    expect(results.map((r) => r.status)).toEqual([
      "in_progress",
      "in_progress",
      "in_progress",
      "in_progress",
      "in_progress",
      "lost",
    ]);
    expect(await engine.view("100", "hangman")).toBeNull();
    await engine.close();
  });

  it("applies concurrent guesses one at a time", async () => {
    const engine = createEngine();
    await engine.startHangman("100", "abcdef");

    const results = await Promise.all(["A", "B", "C", "D", "E", "F"].map((l) => engine.guessLetter("100", l)));

    expect(results.every((r) => r.letter.result === "CORRECT")).toBe(true);
    expect(results.filter((r) => r.status === "won")).toHaveLength(1);
    await engine.close();
  });

  it("draws random words from the configured table", async () => {
    const engine = new GameEngine({ random: () => 0, words: [{ word: "QUOKKA", category: "Animal" }] });

    const started = await engine.startHangman("100");
    expect(started).toMatchObject({ status: "started", state: { word: "QUOKKA", category: "Animal" } });
    await engine.close();
  });

  it("end aborts a game and returns its last state", async () => {
    const engine = createEngine();
    await engine.startNumberGuess("100", { min: 1, max: 10 });

    const ended = await engine.end("100", "number_guess");
    expect(ended).toMatchObject({ game: "number_guess", secret: 7, attempts: 0 });
    expect(await engine.end("100", "number_guess")).toBeNull();
    await engine.close();
  });

  it("renders each game kind", async () => {
    const engine = createEngine();
    const started = await engine.startNumberGuess("100", { min: 1, max: 10 });
    if (started.status !== "started") throw new Error("expected a started game");

    expect(renderGame(started.state)).toBe("Guess a number between 1 and 10. Attempts: 0");
    await engine.close();
  });
});
