/**
 * Stable error codes surfaced by Parlor packages.
 */
export type ErrorCode =
    | "ALREADY_ACTIVE"
    | "SESSION_NOT_FOUND"
    | "LOCK_TIMEOUT"
    | "INVALID_INPUT"
    | "PROFILE_REQUIRED"
    | "RATE_LIMITED"
    | "STORE_UNAVAILABLE"
    | "EXECUTOR_FAILED"
    | "INTERNAL_ERROR";

/**
 * Canonical error type used across Parlor packages.
 */
export class ParlorError extends Error {
    readonly details: Record<string, unknown> | undefined;

    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly cause?: unknown,
        details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "ParlorError";
        this.details = details;
    }
}

/**
 * Logger contract used by Parlor packages for optional diagnostics.
 */
export type Logger = {
    debug(msg: string, meta?: unknown): void;
    info(msg: string, meta?: unknown): void;
    warn(msg: string, meta?: unknown): void;
    error(msg: string, meta?: unknown): void;
};

/**
 * Type guard for {@link ParlorError}.
 */
export function isParlorError(error: unknown): error is ParlorError {
    return error instanceof ParlorError;
}

/**
 * Converts unknown errors into {@link ParlorError}.
 */
export function toParlorError(error: unknown): ParlorError {
    if (isParlorError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new ParlorError("INTERNAL_ERROR", error.message, error);
    }

    return new ParlorError("INTERNAL_ERROR", "Unexpected internal error.", error);
}

/**
 * Whether the error is a caller mistake or conflict rather than an I/O failure.
 * Local errors are reported to the caller and never logged as failures.
 */
export function isLocalError(code: ErrorCode): boolean {
    switch (code) {
        case "ALREADY_ACTIVE":
        case "SESSION_NOT_FOUND":
        case "INVALID_INPUT":
        case "PROFILE_REQUIRED":
        case "RATE_LIMITED":
            return true;
        case "LOCK_TIMEOUT":
        case "STORE_UNAVAILABLE":
        case "EXECUTOR_FAILED":
        case "INTERNAL_ERROR":
        default:
            return false;
    }
}

/**
 * Extracts a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
