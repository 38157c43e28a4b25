const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;
const WEEK = 7 * DAY;

const UNITS = new Map<string, number>(
    Object.entries({
        s: SECOND,
        sec: SECOND,
        second: SECOND,
        seconds: SECOND,
        m: MINUTE,
        min: MINUTE,
        minute: MINUTE,
        minutes: MINUTE,
        h: HOUR,
        hr: HOUR,
        hour: HOUR,
        hours: HOUR,
        d: DAY,
        day: DAY,
        days: DAY,
        w: WEEK,
        week: WEEK,
        weeks: WEEK,
    })
);

/**
 * Parses `"30s"`, `"5m"`, `"1h"`, `"2d"`, `"1w"` (and long unit names such as
 * `"10 minutes"`) into milliseconds. Returns null for anything else, including
 * zero.
 */
export function parseDuration(input: string): number | null {
    const match = /^(\d+)\s*([a-z]+)$/.exec(input.trim().toLowerCase());
    if (!match) return null;

    const [, amount, unit] = match;
    const size = unit ? UNITS.get(unit) : undefined;
    const value = Number(amount);
    if (size === undefined || !Number.isSafeInteger(value) || value <= 0) return null;

    return value * size;
}

/**
 * Coarse elapsed time in the largest whole unit: `"45s"`, `"5m"`, `"2h"`,
 * `"3d"`.
 */
export function formatElapsed(ms: number): string {
    const seconds = Math.max(0, Math.floor(ms / SECOND));
    if (seconds < 60) return `${seconds}s`;
    if (seconds < 3600) return `${Math.floor(seconds / 60)}m`;
    if (seconds < 86_400) return `${Math.floor(seconds / 3600)}h`;
    return `${Math.floor(seconds / 86_400)}d`;
}
