import { z } from "zod";
import { KeyedLockProvider, ParlorError, errorMessage, type LockProvider, type Logger, type OwnerKey } from "@parlor/core";
import { readJsonFile, writeJsonAtomic } from "./utils/jsonFile";

const ReminderSchema = z.object({
    id: z.number().int().positive(),
    owner: z.string(),
    channelId: z.string(),
    message: z.string(),
    fireAt: z.string().datetime({ offset: true }),
    createdAt: z.string().datetime({ offset: true }),
    replyToMessageId: z.string().nullable().default(null),
});

const ReminderFileSchema = z.object({
    nextId: z.number().int().positive().default(1),
    reminders: z.array(ReminderSchema).default([]),
});

export type Reminder = z.infer<typeof ReminderSchema>;
type ReminderFile = z.infer<typeof ReminderFileSchema>;

export type NewReminder = {
    owner: OwnerKey;
    channelId: string;
    message: string;
    fireAt: Date;
    replyToMessageId?: string | null;
};

export type ReminderStoreOptions = {
    dataFile: string;
    lockProvider?: LockProvider;
    logger?: Logger;
    now?: () => Date;
};

const STORE_LOCK = "reminder-store";

// Text for reminders that only point back at a replied-to message.
export const DEFAULT_REPLY_MESSAGE = "⏰ Reminder";

function emptyFile(): ReminderFile {
    return { nextId: 1, reminders: [] };
}

function byFireTime(a: Reminder, b: Reminder): number {
    return Date.parse(a.fireAt) - Date.parse(b.fireAt) || a.id - b.id;
}

/**
 * One-shot reminders persisted as a single JSON snapshot. Ids increase
 * monotonically and are never reused.
 */
export class ReminderStore {
    private data: ReminderFile | null = null;
    private readonly lockProvider: LockProvider;
    private readonly now: () => Date;

    constructor(private readonly options: ReminderStoreOptions) {
        this.lockProvider = options.lockProvider ?? new KeyedLockProvider();
        this.now = options.now ?? (() => new Date());
    }

    async load(): Promise<Reminder[]> {
        return this.lockProvider.withLock([STORE_LOCK], async () => {
            this.data = await this.readSnapshot();
            return structuredClone(this.data.reminders);
        });
    }

    async add(input: NewReminder): Promise<Reminder> {
        const replyToMessageId = input.replyToMessageId ?? null;
        const message = input.message.trim() || (replyToMessageId !== null ? DEFAULT_REPLY_MESSAGE : "");
        if (!message) {
            throw new ParlorError("INVALID_INPUT", "Reminder message must not be empty.");
        }
        if (Number.isNaN(input.fireAt.getTime())) {
            throw new ParlorError("INVALID_INPUT", "Reminder time is not a valid date.");
        }

        return this.update((data) => {
            const reminder: Reminder = {
                id: data.nextId,
                owner: input.owner,
                channelId: input.channelId,
                message,
                fireAt: input.fireAt.toISOString(),
                createdAt: this.now().toISOString(),
                replyToMessageId,
            };
            data.nextId += 1;
            data.reminders.push(reminder);
            return { ...reminder };
        });
    }

    /**
     * Owner's reminders that have not fired yet, soonest first.
     */
    async listForOwner(owner: OwnerKey, now: Date = this.now()): Promise<Reminder[]> {
        return this.read((data) =>
            data.reminders
                .filter((reminder) => reminder.owner === owner && Date.parse(reminder.fireAt) > now.getTime())
                .sort(byFireTime)
        );
    }

    /**
     * Removes one of the owner's reminders. Returns null when the id does not
     * exist or belongs to someone else.
     */
    async remove(owner: OwnerKey, id: number): Promise<Reminder | null> {
        return this.update((data) => {
            const index = data.reminders.findIndex((reminder) => reminder.id === id && reminder.owner === owner);
            if (index === -1) return null;
            const [removed] = data.reminders.splice(index, 1);
            return removed ?? null;
        });
    }

    async clearOwner(owner: OwnerKey): Promise<number> {
        return this.update((data) => {
            const before = data.reminders.length;
            data.reminders = data.reminders.filter((reminder) => reminder.owner !== owner);
            return before - data.reminders.length;
        });
    }

    async due(now: Date = this.now()): Promise<Reminder[]> {
        return this.read((data) =>
            data.reminders.filter((reminder) => Date.parse(reminder.fireAt) <= now.getTime()).sort(byFireTime)
        );
    }

    /**
     * Removes a delivered reminder by id regardless of owner.
     */
    async complete(id: number): Promise<boolean> {
        return this.update((data) => {
            const before = data.reminders.length;
            data.reminders = data.reminders.filter((reminder) => reminder.id !== id);
            return data.reminders.length < before;
        });
    }

    private async read<T>(fn: (data: ReminderFile) => T): Promise<T> {
        return this.lockProvider.withLock([STORE_LOCK], async () => fn(structuredClone(await this.current())));
    }

    private async update<T>(fn: (data: ReminderFile) => T): Promise<T> {
        return this.lockProvider.withLock([STORE_LOCK], async () => {
            const draft = structuredClone(await this.current());
            const result = fn(draft);
            this.data = draft;

            try {
                await writeJsonAtomic(this.options.dataFile, draft);
            } catch (error) {
                this.options.logger?.error("Failed to save reminders.", {
                    file: this.options.dataFile,
                    error: errorMessage(error),
                });
                throw new ParlorError("STORE_UNAVAILABLE", "Failed to save reminders.", error, {
                    file: this.options.dataFile,
                });
            }
            return result;
        });
    }

    private async current(): Promise<ReminderFile> {
        if (!this.data) {
            this.data = await this.readSnapshot();
        }
        return this.data;
    }

    private async readSnapshot(): Promise<ReminderFile> {
        const file = this.options.dataFile;

        let raw: unknown;
        try {
            raw = await readJsonFile(file);
        } catch (error) {
            this.options.logger?.warn("Reminder file is unreadable; starting empty.", { file, error: errorMessage(error) });
            return emptyFile();
        }
        if (raw === null) return emptyFile();

        const parsed = ReminderFileSchema.safeParse(raw);
        if (!parsed.success) {
            this.options.logger?.warn("Reminder file does not match the expected shape; starting empty.", {
                file,
                issues: parsed.error.issues.map((issue) => issue.path.join(".")),
            });
            return emptyFile();
        }

        const data = parsed.data;
        const highest = data.reminders.reduce((max, reminder) => Math.max(max, reminder.id), 0);
        if (data.nextId <= highest) {
            data.nextId = highest + 1;
        }
        return data;
    }
}
