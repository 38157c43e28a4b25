export * from "./types";
export * from "./TicTacToe";
export * from "./Hangman";
export * from "./NumberGuess";
export * from "./GameEngine";
