import { MapSessionStore, ParlorError, type Logger, type OwnerKey, type SessionStore } from "@parlor/core";
import {
    CUSTOM_WORD_CATEGORY,
    createHangman,
    gallowsStage,
    guessLetter,
    isHanged,
    isSolved,
    maskedWord,
    normalizeCustomWord,
    pickWord,
    renderGallows,
    type LetterResult,
    type WordEntry,
} from "./Hangman";
import {
    DEFAULT_MAX,
    DEFAULT_MIN,
    createNumberGuess,
    guessNumber,
    isValidRange,
    performanceRating,
    type NumberResult,
    type Rating,
} from "./NumberGuess";
import { createTicTacToe, playMove, renderBoard, type MoveOutcome } from "./TicTacToe";
import type {
    GameKind,
    GameState,
    HangmanState,
    NumberGuessState,
    RandomSource,
    TicTacToeState,
} from "./types";

export type StartRejection = "SELF_CHALLENGE" | "INVALID_WORD" | "INVALID_RANGE";

export type StartOutcome<TState> =
    | { status: "started"; state: TState }
    | { status: "rejected"; reason: StartRejection };

export type GameStatus = "in_progress" | "won" | "lost" | "tied";

export type MoveResult = {
    outcome: MoveOutcome;
    state: TicTacToeState;
};

export type LetterGuessResult = {
    letter: LetterResult;
    status: Exclude<GameStatus, "tied">;
    state: HangmanState;
};

export type NumberGuessResult = {
    guess: NumberResult;
    status: Exclude<GameStatus, "lost" | "tied">;
    rating: Rating | null;
    state: NumberGuessState;
};

export type GameEngineOptions = {
    store?: SessionStore<GameState>;
    random?: RandomSource; // default Math.random
    words?: readonly WordEntry[];
    logger?: Logger;
};

/**
 * Game rules on top of a {@link SessionStore}. Each game's kind is its
 * `game` tag, so one owner may hold one session of every game at once.
 *
 * Rule rejections come back as outcome values; store conflicts are thrown as
 * `ParlorError`s (`ALREADY_ACTIVE`, `SESSION_NOT_FOUND`).
 */
export class GameEngine {
    private readonly store: SessionStore<GameState>;
    private readonly random: RandomSource;

    constructor(private readonly options?: GameEngineOptions) {
        this.store = options?.store ?? new MapSessionStore<GameState>({ logger: options?.logger });
        this.random = options?.random ?? Math.random;
    }

    /**
     * Starts a game against `opponent`, or against the AI when no opponent is
     * given. Both players are registered together or not at all.
     */
    async startTicTacToe(owner: OwnerKey, opponent?: OwnerKey | null): Promise<StartOutcome<TicTacToeState>> {
        if (opponent === owner) {
            return { status: "rejected", reason: "SELF_CHALLENGE" };
        }
        if (opponent != null && !opponent.trim()) {
            throw new ParlorError("INVALID_INPUT", "Opponent key must not be blank.", undefined, { owner });
        }

        const owners = opponent != null ? [owner, opponent] : [owner];
        const session = await this.store.start(owners, "tictactoe", createTicTacToe(owner, opponent ?? null));
        return { status: "started", state: asTicTacToe(session.payload) };
    }

    async startHangman(owner: OwnerKey, customWord?: string): Promise<StartOutcome<HangmanState>> {
        let entry: WordEntry;
        if (customWord !== undefined) {
            const word = normalizeCustomWord(customWord);
            if (word === null) {
                return { status: "rejected", reason: "INVALID_WORD" };
            }
            entry = { word, category: CUSTOM_WORD_CATEGORY };
        } else {
            entry = pickWord(this.random, this.options?.words);
        }

        const session = await this.store.start([owner], "hangman", createHangman(entry.word, entry.category));
        return { status: "started", state: asHangman(session.payload) };
    }

    async startNumberGuess(
        owner: OwnerKey,
        range?: { min?: number; max?: number }
    ): Promise<StartOutcome<NumberGuessState>> {
        const min = range?.min ?? DEFAULT_MIN;
        const max = range?.max ?? DEFAULT_MAX;
        if (!isValidRange(min, max)) {
            return { status: "rejected", reason: "INVALID_RANGE" };
        }

        const session = await this.store.start([owner], "number_guess", createNumberGuess(min, max, this.random));
        return { status: "started", state: asNumberGuess(session.payload) };
    }

    async move(owner: OwnerKey, position: number): Promise<MoveResult> {
        return this.store.mutate(owner, "tictactoe", (payload) => {
            const state = asTicTacToe(payload);
            const outcome = playMove(state, owner, position);
            const terminal = outcome.status === "won" || outcome.status === "tied";

            if (terminal) {
                this.options?.logger?.info("Game finished.", { game: "tictactoe", owner, status: outcome.status });
            }
            return { payload: state, outcome: { outcome, state }, terminal };
        });
    }

    async guessLetter(owner: OwnerKey, letter: string): Promise<LetterGuessResult> {
        return this.store.mutate(owner, "hangman", (payload) => {
            const state = asHangman(payload);
            const result = guessLetter(state, letter);
            const status: LetterGuessResult["status"] = isSolved(state)
                ? "won"
                : isHanged(state)
                  ? "lost"
                  : "in_progress";
            const terminal = status !== "in_progress";

            if (terminal) {
                this.options?.logger?.info("Game finished.", { game: "hangman", owner, status });
            }
            return { payload: state, outcome: { letter: result, status, state }, terminal };
        });
    }

    async guessNumber(owner: OwnerKey, guess: number): Promise<NumberGuessResult> {
        return this.store.mutate(owner, "number_guess", (payload) => {
            const state = asNumberGuess(payload);
            const result = guessNumber(state, guess);
            const won = result.result === "CORRECT";
            const status: NumberGuessResult["status"] = won ? "won" : "in_progress";

            if (won) {
                this.options?.logger?.info("Game finished.", { game: "number_guess", owner, attempts: state.attempts });
            }
            return {
                payload: state,
                outcome: {
                    guess: result,
                    status,
                    rating: won ? performanceRating(state) : null,
                    state,
                },
                terminal: won,
            };
        });
    }

    async view(owner: OwnerKey, kind: GameKind): Promise<GameState | null> {
        const session = await this.store.get(owner, kind);
        return session?.payload ?? null;
    }

    /**
     * Aborts the owner's game of `kind` for every player in it. Returns the
     * final state, or null when there was no game.
     */
    async end(owner: OwnerKey, kind: GameKind): Promise<GameState | null> {
        const state = await this.store.end(owner, kind);
        if (state) {
            this.options?.logger?.info("Game aborted.", { game: kind, owner });
        }
        return state;
    }

    async close(): Promise<void> {
        await this.store.close?.();
    }
}

/**
 * Text rendering of any game's current state.
 */
export function renderGame(state: GameState): string {
    switch (state.game) {
        case "tictactoe":
            return renderBoard(state.board);
        case "hangman":
            return `${renderGallows(gallowsStage(state))}\n\n${maskedWord(state)}`;
        case "number_guess":
            return `Guess a number between ${state.min} and ${state.max}. Attempts: ${state.attempts}`;
    }
}

function asTicTacToe(state: GameState): TicTacToeState {
    if (state.game === "tictactoe") return state;
    throw kindMismatch("tictactoe", state);
}

function asHangman(state: GameState): HangmanState {
    if (state.game === "hangman") return state;
    throw kindMismatch("hangman", state);
}

function asNumberGuess(state: GameState): NumberGuessState {
    if (state.game === "number_guess") return state;
    throw kindMismatch("number_guess", state);
}

function kindMismatch(expected: GameKind, state: GameState): ParlorError {
    return new ParlorError("INTERNAL_ERROR", "Session holds a different game.", undefined, {
        expected,
        actual: state.game,
    });
}
