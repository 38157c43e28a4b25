import pino from "pino";
import type { Logger } from "../errors";

export type CreateLoggerOptions = {
    level?: string; // default LOG_LEVEL or "info"
    name?: string;
    destination?: pino.DestinationStream;
};

/**
 * Creates a pino-backed {@link Logger}. Metadata is logged as the structured
 * object and the message as pino's `msg`.
 */
export function createLogger(options?: CreateLoggerOptions): Logger {
    const level = options?.level ?? process.env.LOG_LEVEL ?? "info";
    const base = options?.destination
        ? pino({ level, name: options.name }, options.destination)
        : pino({ level, name: options?.name });

    return fromPino(base);
}

/**
 * Adapts an existing pino instance to the {@link Logger} contract.
 */
export function fromPino(log: pino.Logger): Logger {
    return {
        debug: (msg, meta) => log.debug(toObject(meta), msg),
        info: (msg, meta) => log.info(toObject(meta), msg),
        warn: (msg, meta) => log.warn(toObject(meta), msg),
        error: (msg, meta) => log.error(toObject(meta), msg),
    };
}

function toObject(meta: unknown): Record<string, unknown> {
    if (meta === undefined) return {};
    if (meta instanceof Error) return { err: meta };
    if (typeof meta === "object" && meta !== null && !Array.isArray(meta)) {
        return { ...meta };
    }
    return { meta };
}
