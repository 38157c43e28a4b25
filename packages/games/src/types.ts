import type { OwnerKey } from "@parlor/core";

export type Mark = "X" | "O";
export type Cell = Mark | null;

export type TicTacToeState = {
    game: "tictactoe";
    board: Cell[]; // 9 cells, position n is index n - 1
    currentPlayer: Mark;
    playerX: OwnerKey;
    playerO: OwnerKey | null; // null = AI
    finished: boolean;
};

export type HangmanState = {
    game: "hangman";
    word: string;
    category: string;
    guessed: string[]; // correct letters
    wrong: string[]; // in guess order
    maxWrong: number;
};

export type NumberGuessState = {
    game: "number_guess";
    secret: number;
    attempts: number;
    min: number;
    max: number;
};

/**
 * Payload stored per game session. `game` doubles as the session kind.
 */
export type GameState = TicTacToeState | HangmanState | NumberGuessState;

export type GameKind = GameState["game"];

export const GAME_KINDS: readonly GameKind[] = ["tictactoe", "hangman", "number_guess"];

/**
 * Source of uniform floats in [0, 1). Defaults to `Math.random`.
 */
export type RandomSource = () => number;

export function randomInt(min: number, max: number, random: RandomSource): number {
    return Math.min(max, min + Math.floor(random() * (max - min + 1)));
}
