export const DEFAULT_TIME_ZONE = "Europe/Copenhagen";

export type ZonedParts = {
    year: number;
    month: number; // 1-12
    day: number;
    hour: number;
    minute: number;
    second: number;
    weekday: number; // 0 = Sunday
};

export type WallTime = Pick<ZonedParts, "year" | "month" | "day" | "hour" | "minute">;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
    let formatter = formatters.get(timeZone);
    if (!formatter) {
        formatter = new Intl.DateTimeFormat("en-US", {
            timeZone,
            year: "numeric",
            month: "2-digit",
            day: "2-digit",
            hour: "2-digit",
            minute: "2-digit",
            second: "2-digit",
            hourCycle: "h23",
        });
        formatters.set(timeZone, formatter);
    }
    return formatter;
}

/**
 * Wall-clock fields of `date` in `timeZone`.
 */
export function zonedParts(date: Date, timeZone: string): ZonedParts {
    const parts = formatterFor(timeZone).formatToParts(date);
    const getPart = (type: Intl.DateTimeFormatPartTypes): number => {
        const value = parts.find((part) => part.type === type)?.value;
        return value ? Number(value) : 0;
    };

    const year = getPart("year");
    const month = getPart("month");
    const day = getPart("day");
    return {
        year,
        month,
        day,
        hour: getPart("hour"),
        minute: getPart("minute"),
        second: getPart("second"),
        weekday: new Date(Date.UTC(year, month - 1, day)).getUTCDay(),
    };
}

/**
 * Calendar date of `date` in `timeZone` as `YYYY-MM-DD`.
 */
export function zonedDateKey(date: Date, timeZone: string): string {
    const { year, month, day } = zonedParts(date, timeZone);
    return `${year}-${pad2(month)}-${pad2(day)}`;
}

export function isSameZonedDay(a: Date, b: Date, timeZone: string): boolean {
    return zonedDateKey(a, timeZone) === zonedDateKey(b, timeZone);
}

export function isWeekday(parts: Pick<ZonedParts, "weekday">): boolean {
    return parts.weekday >= 1 && parts.weekday <= 5;
}

/**
 * Offset of `timeZone` from UTC at `date`, in minutes.
 */
export function offsetMinutes(date: Date, timeZone: string): number {
    const parts = zonedParts(date, timeZone);
    const asUtc = Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second);
    return Math.round((asUtc - Math.floor(date.getTime() / 1000) * 1000) / 60_000);
}

/**
 * Instant at which the wall clock in `timeZone` shows `wall` (seconds zero).
 * Returns null for a wall time skipped by a DST gap; of two instants in a DST
 * overlap the earlier one wins.
 */
export function zonedTimeToDate(wall: WallTime, timeZone: string): Date | null {
    const guess = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, 0);
    const halfDay = 12 * 60 * 60 * 1000;

    const offsets = new Set([
        offsetMinutes(new Date(guess - halfDay), timeZone),
        offsetMinutes(new Date(guess), timeZone),
        offsetMinutes(new Date(guess + halfDay), timeZone),
    ]);

    const matches: number[] = [];
    for (const offset of offsets) {
        const candidate = guess - offset * 60_000;
        const parts = zonedParts(new Date(candidate), timeZone);
        if (
            parts.year === wall.year &&
            parts.month === wall.month &&
            parts.day === wall.day &&
            parts.hour === wall.hour &&
            parts.minute === wall.minute
        ) {
            matches.push(candidate);
        }
    }

    return matches.length > 0 ? new Date(Math.min(...matches)) : null;
}

export function formatWallClock(date: Date, timeZone: string): string {
    const { hour, minute } = zonedParts(date, timeZone);
    return `${pad2(hour)}:${pad2(minute)}`;
}

export function pad2(value: number): string {
    return value.toString().padStart(2, "0");
}
