import { addHours, differenceInMinutes } from "date-fns";
import { ParlorError, errorMessage, isLocalError, isParlorError, type Logger, type OwnerKey } from "@parlor/core";
import { DEFAULT_TIME_ZONE, isSameZonedDay, isWeekday, zonedDateKey, zonedParts, zonedTimeToDate } from "./clock";
import { purgeStale, type ScheduleStore } from "./ScheduleStore";
import { OwnerRunLimiter, type RunLimit } from "./utils/limiter";
import type { ActionExecutor, Notifier, OwnerProfile, ScheduleData, ScheduleEntry, ScheduleNotice } from "./types";

export type ScheduleRunnerOptions = {
    store: ScheduleStore;
    executor: ActionExecutor;
    notifier: Notifier;
    timeZone?: string; // default Europe/Copenhagen
    weekdaysOnly?: boolean; // default true
    toleranceSeconds?: number; // default 30
    validityHours?: number; // default 10
    pollIntervalMs?: number; // default 60000
    manualRunLimit?: RunLimit; // default 3 per hour per owner
    logger?: Logger;
    now?: () => Date;
};

export type TickReport = {
    fired: OwnerKey[];
    failed: OwnerKey[];
    warned: OwnerKey[];
};

export type RecoveryReport = {
    recovered: OwnerKey[];
    failed: OwnerKey[];
    purged: number;
};

type DueFire = {
    owner: OwnerKey;
    profile: OwnerProfile;
    scheduledFor: string;
};

/**
 * Whether `now` lies within `toleranceSeconds` of `target`.
 */
export function isWithinWindow(target: Date, now: Date, toleranceSeconds: number): boolean {
    return Math.abs(now.getTime() - target.getTime()) <= toleranceSeconds * 1000;
}

/**
 * Today's target instant for `entry`, or null when that wall time does not
 * exist today.
 */
export function targetFor(entry: Pick<ScheduleEntry, "hour" | "minute">, now: Date, timeZone: string): Date | null {
    const { year, month, day } = zonedParts(now, timeZone);
    return zonedTimeToDate({ year, month, day, hour: entry.hour, minute: entry.minute }, timeZone);
}

/**
 * Polls a {@link ScheduleStore} and fires due daily actions.
 *
 * A target instant is written to `pendingFires` before the executor runs and
 * removed only after success, so a crash mid-fire leaves a record that
 * `recover` replays on the next start.
 */
export class ScheduleRunner {
    private readonly timeZone: string;
    private readonly weekdaysOnly: boolean;
    private readonly toleranceSeconds: number;
    private readonly validityHours: number;
    private readonly pollIntervalMs: number;
    private readonly now: () => Date;
    private readonly warnedFor = new Map<OwnerKey, string>();
    private readonly manualRuns: OwnerRunLimiter;
    private timer: NodeJS.Timeout | null = null;
    private ticking = false;

    constructor(private readonly options: ScheduleRunnerOptions) {
        this.timeZone = options.timeZone ?? DEFAULT_TIME_ZONE;
        this.weekdaysOnly = options.weekdaysOnly ?? true;
        this.toleranceSeconds = options.toleranceSeconds ?? 30;
        this.validityHours = options.validityHours ?? 10;
        this.pollIntervalMs = options.pollIntervalMs ?? 60_000;
        this.now = options.now ?? (() => new Date());
        this.manualRuns = new OwnerRunLimiter(options.manualRunLimit ?? { runs: 3, perMs: 3_600_000 });
    }

    /**
     * Loads the store, replays missed fires, then polls until {@link stop}.
     */
    async start(): Promise<RecoveryReport> {
        if (this.timer) {
            throw new ParlorError("INVALID_INPUT", "Schedule runner is already started.");
        }

        await this.options.store.load();
        const report = await this.recover(this.now());

        this.timer = setInterval(() => {
            this.poll().catch((error: unknown) => {
                this.options.logger?.error("Schedule poll failed.", { error: errorMessage(error) });
            });
        }, this.pollIntervalMs);
        this.timer.unref?.();

        this.options.logger?.info("Schedule runner started.", {
            timeZone: this.timeZone,
            pollIntervalMs: this.pollIntervalMs,
        });
        return report;
    }

    stop(): void {
        if (this.timer) clearInterval(this.timer);
        this.timer = null;
        this.manualRuns.disconnect().catch((error: unknown) => {
            this.options.logger?.error("Failed to stop manual run limiter.", { error: errorMessage(error) });
        });
    }

    async tick(now: Date = this.now()): Promise<TickReport> {
        const report: TickReport = { fired: [], failed: [], warned: [] };

        const parts = zonedParts(now, this.timeZone);
        if (!this.weekdaysOnly || isWeekday(parts)) {
            for (const due of await this.claimDue(now)) {
                const ok = await this.fire(due, now);
                (ok ? report.fired : report.failed).push(due.owner);
            }
        }

        report.warned = await this.checkExpiry(now);
        return report;
    }

    /**
     * Replays, per owner, the latest pending fire dated today when nothing has
     * fired today yet. The replayed record is removed whatever the outcome.
     */
    async recover(now: Date = this.now()): Promise<RecoveryReport> {
        const report: RecoveryReport = { recovered: [], failed: [], purged: 0 };
        const today = zonedDateKey(now, this.timeZone);

        const missed = await this.options.store.read((data) => {
            const found: DueFire[] = [];
            for (const [owner, entry] of Object.entries(data.schedules)) {
                const profile = data.profiles[owner];
                if (!entry.enabled || !profile) continue;
                if (entry.lastFired && isSameZonedDay(new Date(entry.lastFired), now, this.timeZone)) continue;

                const latest = entry.pendingFires
                    .filter((fire) => zonedDateKey(new Date(fire), this.timeZone) === today)
                    .sort((a, b) => Date.parse(a) - Date.parse(b))
                    .at(-1);
                if (latest) {
                    found.push({ owner, profile, scheduledFor: latest });
                }
            }
            return found;
        });

        for (const due of missed) {
            this.options.logger?.info("Replaying missed scheduled action.", {
                owner: due.owner,
                scheduledFor: due.scheduledFor,
            });

            let error: unknown = null;
            try {
                await this.options.executor.execute(due.profile, {
                    owner: due.owner,
                    reason: "recovery",
                    scheduledFor: new Date(due.scheduledFor),
                });
            } catch (caught) {
                error = caught ?? new Error("Executor failed.");
            }

            await this.record(due.owner, (entry) => {
                entry.pendingFires = entry.pendingFires.filter((fire) => fire !== due.scheduledFor);
                if (error === null) entry.lastFired = now.toISOString();
            });

            if (error === null) {
                report.recovered.push(due.owner);
                await this.notify(due.owner, {
                    type: "recovered",
                    scheduledFor: due.scheduledFor,
                    firedAt: now.toISOString(),
                });
            } else {
                report.failed.push(due.owner);
                this.options.logger?.error("Missed scheduled action failed.", {
                    owner: due.owner,
                    error: errorMessage(error),
                });
                await this.notify(due.owner, {
                    type: "recovery_failed",
                    scheduledFor: due.scheduledFor,
                    error: errorMessage(error),
                });
            }
        }

        try {
            report.purged = await this.options.store.update((data) => purgeStale(data, now, this.timeZone));
        } catch (error) {
            this.options.logger?.error("Failed to persist recovery results.", { error: errorMessage(error) });
        }
        return report;
    }

    /**
     * Runs the owner's action now against the stored profile. Schedule
     * bookkeeping is left untouched. Each owner gets `manualRunLimit` runs per
     * window; further calls fail with `RATE_LIMITED`.
     */
    async executeNow(owner: OwnerKey): Promise<void> {
        const profile = await this.options.store.getProfile(owner);
        if (!profile) {
            throw new ParlorError("PROFILE_REQUIRED", "Owner has no stored profile.", undefined, { owner });
        }
        await this.manualRuns.run(owner, () =>
            this.options.executor.execute(profile, { owner, reason: "manual", scheduledFor: null })
        );
    }

    private async poll(): Promise<void> {
        if (this.ticking) {
            this.options.logger?.debug("Previous schedule tick still running; skipping.");
            return;
        }

        this.ticking = true;
        try {
            await this.tick(this.now());
        } finally {
            this.ticking = false;
        }
    }

    /**
     * Finds due entries and records their target instant as pending, all in
     * one store update. Nothing is written when nothing is due.
     */
    private async claimDue(now: Date): Promise<DueFire[]> {
        let due = await this.options.store.read((data) => this.findDue(data, now));
        if (due.length === 0) return [];

        try {
            await this.options.store.update((data) => {
                due = this.findDue(data, now);
                for (const { owner, scheduledFor } of due) {
                    data.schedules[owner]?.pendingFires.push(scheduledFor);
                }
            });
        } catch (error) {
            if (due.length === 0) return [];
            this.options.logger?.error("Failed to persist pending fires; firing anyway.", {
                owners: due.map((d) => d.owner),
                error: errorMessage(error),
            });
        }
        return due;
    }

    private findDue(data: ScheduleData, now: Date): DueFire[] {
        const due: DueFire[] = [];
        for (const [owner, entry] of Object.entries(data.schedules)) {
            const profile = data.profiles[owner];
            if (!entry.enabled || !profile) continue;

            const target = targetFor(entry, now, this.timeZone);
            if (!target || !isWithinWindow(target, now, this.toleranceSeconds)) continue;
            if (entry.lastFired && isSameZonedDay(new Date(entry.lastFired), now, this.timeZone)) continue;

            // Already attempted; a failed attempt is left to recovery.
            const scheduledFor = target.toISOString();
            if (entry.pendingFires.includes(scheduledFor)) continue;

            due.push({ owner, profile, scheduledFor });
        }
        return due;
    }

    private async fire(due: DueFire, now: Date): Promise<boolean> {
        try {
            await this.options.executor.execute(due.profile, {
                owner: due.owner,
                reason: "scheduled",
                scheduledFor: new Date(due.scheduledFor),
            });
        } catch (error) {
            const level = isParlorError(error) && isLocalError(error.code) ? "warn" : "error";
            this.options.logger?.[level]("Scheduled action failed.", {
                owner: due.owner,
                scheduledFor: due.scheduledFor,
                error: errorMessage(error),
            });
            await this.notify(due.owner, { type: "failed", scheduledFor: due.scheduledFor, error: errorMessage(error) });
            return false;
        }

        await this.record(due.owner, (entry) => {
            entry.lastFired = now.toISOString();
            entry.pendingFires = entry.pendingFires.filter((fire) => fire !== due.scheduledFor);
        });

        this.options.logger?.info("Scheduled action executed.", {
            owner: due.owner,
            scheduledFor: due.scheduledFor,
        });
        await this.notify(due.owner, {
            type: "fired",
            scheduledFor: due.scheduledFor,
            firedAt: now.toISOString(),
        });
        return true;
    }

    /**
     * Warns each owner once per `lastFired` when the action has one whole
     * minute of validity left.
     */
    private async checkExpiry(now: Date): Promise<OwnerKey[]> {
        const expiring = await this.options.store.read((data) => {
            const found: { owner: OwnerKey; lastFired: string; expiresAt: Date }[] = [];
            for (const [owner, entry] of Object.entries(data.schedules)) {
                if (!entry.enabled || !entry.lastFired || !data.profiles[owner]) continue;

                const expiresAt = addHours(new Date(entry.lastFired), this.validityHours);
                if (differenceInMinutes(expiresAt, now) === 1) {
                    found.push({ owner, lastFired: entry.lastFired, expiresAt });
                }
            }
            return found;
        });

        const warned: OwnerKey[] = [];
        for (const { owner, lastFired, expiresAt } of expiring) {
            if (this.warnedFor.get(owner) === lastFired) continue;

            this.warnedFor.set(owner, lastFired);
            warned.push(owner);
            await this.notify(owner, { type: "expiring", expiresAt: expiresAt.toISOString() });
        }
        return warned;
    }

    private async record(owner: OwnerKey, fn: (entry: ScheduleEntry) => void): Promise<void> {
        try {
            await this.options.store.update((data) => {
                const entry = data.schedules[owner];
                if (entry) fn(entry);
            });
        } catch (error) {
            this.options.logger?.error("Failed to record schedule outcome.", { owner, error: errorMessage(error) });
        }
    }

    private async notify(owner: OwnerKey, notice: ScheduleNotice): Promise<void> {
        try {
            await this.options.notifier.notify(owner, notice);
        } catch (error) {
            this.options.logger?.error("Failed to notify owner.", { owner, notice: notice.type, error: errorMessage(error) });
        }
    }
}
