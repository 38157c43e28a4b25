import { DEFAULT_TIME_ZONE, formatWallClock } from "./clock";
import type { ScheduleNotice } from "./types";

/**
 * Default message text for a schedule notice. Times are shown as `HH:mm` in
 * `timeZone`.
 */
export function formatNotice(notice: ScheduleNotice, timeZone: string = DEFAULT_TIME_ZONE): string {
    const at = (iso: string) => formatWallClock(new Date(iso), timeZone);

    switch (notice.type) {
        case "fired":
            return `Scheduled action for ${at(notice.scheduledFor)} completed at ${at(notice.firedAt)}.`;
        case "failed":
            return `Scheduled action for ${at(notice.scheduledFor)} failed: ${notice.error}\nIt will be retried after a restart, or run it manually.`;
        case "recovered":
            return `Missed action from ${at(notice.scheduledFor)} was recovered at ${at(notice.firedAt)} after a restart.`;
        case "recovery_failed":
            return `Missed action from ${at(notice.scheduledFor)} could not be recovered: ${notice.error}\nRun it manually if it is still needed.`;
        case "expiring":
            return `Your scheduled action expires at ${at(notice.expiresAt)}, in about a minute.`;
    }
}
