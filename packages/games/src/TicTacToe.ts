import type { OwnerKey } from "@parlor/core";
import type { Cell, Mark, TicTacToeState } from "./types";

export type MoveRejection = "NOT_YOUR_TURN" | "INVALID_POSITION" | "CELL_OCCUPIED";

export type MoveOutcome =
    | { status: "rejected"; reason: MoveRejection }
    | { status: "continue"; aiMove: number | null; next: Mark; nextPlayer: OwnerKey | null }
    | { status: "won"; winner: Mark; winnerId: OwnerKey | null; aiMove: number | null }
    | { status: "tied"; aiMove: number | null };

const LINES: readonly (readonly [number, number, number])[] = [
    [0, 1, 2],
    [3, 4, 5],
    [6, 7, 8],
    [0, 3, 6],
    [1, 4, 7],
    [2, 5, 8],
    [0, 4, 8],
    [2, 4, 6],
];

const CENTRE = 5;
const CORNERS = [1, 3, 7, 9] as const;

export function createTicTacToe(playerX: OwnerKey, playerO: OwnerKey | null): TicTacToeState {
    return {
        game: "tictactoe",
        board: Array.from({ length: 9 }, (): Cell => null),
        currentPlayer: "X",
        playerX,
        playerO,
        finished: false,
    };
}

export function isAiGame(state: TicTacToeState): boolean {
    return state.playerO === null;
}

/**
 * Owner whose turn it is, or null when the AI is to move.
 */
export function currentPlayerId(state: TicTacToeState): OwnerKey | null {
    return state.currentPlayer === "X" ? state.playerX : state.playerO;
}

export function winner(board: readonly Cell[]): Mark | null {
    for (const [a, b, c] of LINES) {
        const mark = board[a];
        if (mark && board[b] === mark && board[c] === mark) {
            return mark;
        }
    }
    return null;
}

export function isBoardFull(board: readonly Cell[]): boolean {
    return board.every((cell) => cell !== null);
}

/**
 * First open position (1-9) that completes a line for `mark`.
 */
export function findWinningMove(board: readonly Cell[], mark: Mark): number | null {
    for (let position = 1; position <= 9; position++) {
        if (board[position - 1] !== null) continue;

        const trial = [...board];
        trial[position - 1] = mark;
        if (winner(trial) === mark) {
            return position;
        }
    }
    return null;
}

/**
 * AI (always O): win, block, centre, corner, then the first open cell.
 */
export function chooseAiMove(board: readonly Cell[]): number | null {
    const win = findWinningMove(board, "O");
    if (win !== null) return win;

    const block = findWinningMove(board, "X");
    if (block !== null) return block;

    if (board[CENTRE - 1] === null) return CENTRE;

    for (const corner of CORNERS) {
        if (board[corner - 1] === null) return corner;
    }

    const open = board.findIndex((cell) => cell === null);
    return open === -1 ? null : open + 1;
}

/**
 * Applies `player`'s move at `position` to `state` in place. In AI games the
 * reply is applied in the same step. Rejected moves leave `state` untouched.
 */
export function playMove(state: TicTacToeState, player: OwnerKey, position: number): MoveOutcome {
    if (state.finished || currentPlayerId(state) !== player) {
        return { status: "rejected", reason: "NOT_YOUR_TURN" };
    }
    if (!Number.isInteger(position) || position < 1 || position > 9) {
        return { status: "rejected", reason: "INVALID_POSITION" };
    }
    if (state.board[position - 1] !== null) {
        return { status: "rejected", reason: "CELL_OCCUPIED" };
    }

    state.board[position - 1] = state.currentPlayer;
    const afterHuman = settle(state, null);
    if (afterHuman || !isAiGame(state)) {
        return afterHuman ?? advance(state, null);
    }

    state.currentPlayer = "O";
    const aiMove = chooseAiMove(state.board);
    if (aiMove === null) return advance(state, null);

    state.board[aiMove - 1] = "O";
    return settle(state, aiMove) ?? advance(state, aiMove);
}

function settle(state: TicTacToeState, aiMove: number | null): MoveOutcome | null {
    const mark = winner(state.board);
    if (mark) {
        state.finished = true;
        return { status: "won", winner: mark, winnerId: mark === "X" ? state.playerX : state.playerO, aiMove };
    }
    if (isBoardFull(state.board)) {
        state.finished = true;
        return { status: "tied", aiMove };
    }
    return null;
}

function advance(state: TicTacToeState, aiMove: number | null): MoveOutcome {
    state.currentPlayer = state.currentPlayer === "X" ? "O" : "X";
    return { status: "continue", aiMove, next: state.currentPlayer, nextPlayer: currentPlayerId(state) };
}

/**
 * Text board with open cells numbered by position.
 */
export function renderBoard(board: readonly Cell[]): string {
    const rows: string[] = [];
    for (let row = 0; row < 3; row++) {
        const cells = [0, 1, 2].map((col) => {
            const index = row * 3 + col;
            return ` ${board[index] ?? String(index + 1)} `;
        });
        rows.push(cells.join("|"));
    }
    return rows.join("\n---|---|---\n");
}
