import { dirname, join } from "node:path";
import {
    KeyedLockProvider,
    ParlorError,
    errorMessage,
    type LockProvider,
    type Logger,
    type OwnerKey,
} from "@parlor/core";
import { DEFAULT_TIME_ZONE, zonedDateKey } from "./clock";
import { FieldCipher } from "./FieldCipher";
import {
    ScheduleDataSchema,
    emptyScheduleData,
    type OwnerProfile,
    type ScheduleData,
    type ScheduleEntry,
} from "./types";
import { readJsonFile, writeJsonAtomic } from "./utils/jsonFile";

export type ScheduleStoreOptions = {
    dataFile: string;
    keyFile?: string; // default: schedule.key beside dataFile
    encrypt?: boolean; // default true
    timeZone?: string; // default Europe/Copenhagen
    lockProvider?: LockProvider;
    logger?: Logger;
    now?: () => Date;
};

export type DisableResult = "disabled" | "already_disabled" | "not_found";

const STORE_LOCK = "schedule-store";

/**
 * Drops pending fires dated before the current day in `timeZone`. Returns the
 * number removed.
 */
export function purgeStale(data: ScheduleData, now: Date, timeZone: string): number {
    const today = zonedDateKey(now, timeZone);
    let removed = 0;

    for (const entry of Object.values(data.schedules)) {
        const kept = entry.pendingFires.filter((fire) => zonedDateKey(new Date(fire), timeZone) >= today);
        removed += entry.pendingFires.length - kept.length;
        entry.pendingFires = kept;
    }
    return removed;
}

export function isValidTime(hour: number, minute: number): boolean {
    return Number.isInteger(hour) && Number.isInteger(minute) && hour >= 0 && hour <= 23 && minute >= 0 && minute <= 59;
}

/**
 * Flat-file store for owner profiles and daily schedules. Every access runs
 * under one store-wide lock; the file is replaced atomically on each save.
 */
export class ScheduleStore {
    private data: ScheduleData | null = null;
    private cipher: FieldCipher | null = null;
    private readonly lockProvider: LockProvider;
    private readonly timeZone: string;
    private readonly now: () => Date;

    constructor(private readonly options: ScheduleStoreOptions) {
        this.lockProvider = options.lockProvider ?? new KeyedLockProvider();
        this.timeZone = options.timeZone ?? DEFAULT_TIME_ZONE;
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Re-reads the snapshot from disk. A missing or unreadable file yields an
     * empty store; the process keeps running either way.
     */
    async load(): Promise<ScheduleData> {
        return this.lockProvider.withLock([STORE_LOCK], async () => {
            this.data = await this.readSnapshot();
            return structuredClone(this.data);
        });
    }

    async save(): Promise<void> {
        return this.lockProvider.withLock([STORE_LOCK], async () => {
            await this.writeSnapshot(await this.current());
        });
    }

    /**
     * Runs `fn` against a copy of the current data.
     */
    async read<T>(fn: (data: ScheduleData) => T): Promise<T> {
        return this.lockProvider.withLock([STORE_LOCK], async () => fn(structuredClone(await this.current())));
    }

    /**
     * Runs `fn` against a draft, keeps the draft and persists it. A throwing
     * `fn` leaves the data untouched. A failed write keeps the in-memory change
     * and throws `STORE_UNAVAILABLE`.
     */
    async update<T>(fn: (data: ScheduleData) => T): Promise<T> {
        return this.lockProvider.withLock([STORE_LOCK], async () => {
            const draft = structuredClone(await this.current());
            const result = fn(draft);
            this.data = draft;
            await this.writeSnapshot(draft);
            return result;
        });
    }

    async setProfile(owner: OwnerKey, profile: OwnerProfile): Promise<void> {
        await this.update((data) => {
            data.profiles[owner] = { ...profile };
        });
    }

    async getProfile(owner: OwnerKey): Promise<OwnerProfile | null> {
        return this.read((data) => data.profiles[owner] ?? null);
    }

    /**
     * Enables a daily schedule at `hour:minute` and resets its bookkeeping.
     * The owner must have a profile.
     */
    async setSchedule(owner: OwnerKey, hour: number, minute: number): Promise<ScheduleEntry> {
        if (!isValidTime(hour, minute)) {
            throw new ParlorError("INVALID_INPUT", "Schedule time must be between 00:00 and 23:59.", undefined, {
                hour,
                minute,
            });
        }

        return this.update((data) => {
            if (!data.profiles[owner]) {
                throw new ParlorError("PROFILE_REQUIRED", "Owner has no stored profile.", undefined, { owner });
            }

            const entry: ScheduleEntry = { hour, minute, enabled: true, lastFired: null, pendingFires: [] };
            data.schedules[owner] = entry;
            return { ...entry };
        });
    }

    async disableSchedule(owner: OwnerKey): Promise<DisableResult> {
        const current = await this.getSchedule(owner);
        if (!current) return "not_found";
        if (!current.enabled) return "already_disabled";

        return this.update((data) => {
            const entry = data.schedules[owner];
            if (!entry) return "not_found";
            if (!entry.enabled) return "already_disabled";

            entry.enabled = false;
            return "disabled";
        });
    }

    async getSchedule(owner: OwnerKey): Promise<ScheduleEntry | null> {
        return this.read((data) => data.schedules[owner] ?? null);
    }

    /**
     * Removes the owner's profile and schedule. Returns whether anything was
     * stored.
     */
    async clearOwner(owner: OwnerKey): Promise<boolean> {
        return this.update((data) => {
            const existed = owner in data.profiles || owner in data.schedules;
            delete data.profiles[owner];
            delete data.schedules[owner];
            return existed;
        });
    }

    private async current(): Promise<ScheduleData> {
        if (!this.data) {
            this.data = await this.readSnapshot();
        }
        return this.data;
    }

    private async readSnapshot(): Promise<ScheduleData> {
        const file = this.options.dataFile;

        let raw: unknown;
        try {
            raw = await readJsonFile(file);
        } catch (error) {
            this.options.logger?.warn("Schedule file is unreadable; starting empty.", {
                file,
                error: errorMessage(error),
            });
            return emptyScheduleData();
        }
        if (raw === null) return emptyScheduleData();

        const parsed = ScheduleDataSchema.safeParse(raw);
        if (!parsed.success) {
            this.options.logger?.warn("Schedule file does not match the expected shape; starting empty.", {
                file,
                issues: parsed.error.issues.map((issue) => issue.path.join(".")),
            });
            return emptyScheduleData();
        }

        const data: ScheduleData = parsed.data;
        const cipher = await this.fieldCipher();
        if (cipher) {
            for (const [owner, profile] of Object.entries(data.profiles)) {
                data.profiles[owner] = this.mapFields(profile, (value) => cipher.decrypt(value) ?? value);
            }
        }

        const purged = purgeStale(data, this.now(), this.timeZone);
        if (purged > 0) {
            this.options.logger?.info("Dropped stale pending fires.", { purged });
        }
        return data;
    }

    private async writeSnapshot(data: ScheduleData): Promise<void> {
        const cipher = await this.fieldCipher();
        const stored: ScheduleData = {
            profiles: {},
            schedules: data.schedules,
        };
        for (const [owner, profile] of Object.entries(data.profiles)) {
            stored.profiles[owner] = cipher ? this.mapFields(profile, (value) => cipher.encrypt(value)) : profile;
        }

        try {
            await writeJsonAtomic(this.options.dataFile, stored);
        } catch (error) {
            this.options.logger?.error("Failed to save schedule file.", {
                file: this.options.dataFile,
                error: errorMessage(error),
            });
            throw new ParlorError("STORE_UNAVAILABLE", "Failed to save schedule data.", error, {
                file: this.options.dataFile,
            });
        }
    }

    private async fieldCipher(): Promise<FieldCipher | null> {
        if (this.options.encrypt === false) return null;
        if (!this.cipher) {
            const keyFile = this.options.keyFile ?? join(dirname(this.options.dataFile), "schedule.key");
            this.cipher = await FieldCipher.loadOrCreate(keyFile, this.options.logger);
        }
        return this.cipher;
    }

    private mapFields(profile: OwnerProfile, fn: (value: string) => string): OwnerProfile {
        const mapped: OwnerProfile = {};
        for (const [field, value] of Object.entries(profile)) {
            mapped[field] = fn(value);
        }
        return mapped;
    }
}
