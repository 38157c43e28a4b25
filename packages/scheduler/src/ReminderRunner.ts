import { errorMessage, type Logger } from "@parlor/core";
import { formatElapsed } from "./duration";
import type { Reminder, ReminderStore } from "./ReminderStore";

export type DeliveryContext = {
    elapsed: string; // time since the reminder was set, e.g. "5m"
};

/**
 * Posts a reminder back to its channel. Throws on failure.
 */
export interface ReminderDelivery {
    deliver(reminder: Reminder, context: DeliveryContext): Promise<void>;
}

export type ReminderRunnerOptions = {
    store: ReminderStore;
    delivery: ReminderDelivery;
    pollIntervalMs?: number; // default 60000
    logger?: Logger;
    now?: () => Date;
};

export type ReminderTickReport = {
    delivered: number[];
    failed: number[];
};

/**
 * Delivers due reminders. A reminder is removed only once delivery succeeds;
 * failures stay queued for the next tick.
 */
export class ReminderRunner {
    private readonly pollIntervalMs: number;
    private readonly now: () => Date;
    private timer: NodeJS.Timeout | null = null;
    private ticking = false;

    constructor(private readonly options: ReminderRunnerOptions) {
        this.pollIntervalMs = options.pollIntervalMs ?? 60_000;
        this.now = options.now ?? (() => new Date());
    }

    async start(): Promise<void> {
        if (this.timer) return;

        const pending = await this.options.store.load();
        this.options.logger?.info("Reminder runner started.", { pending: pending.length });

        this.timer = setInterval(() => {
            this.poll().catch((error: unknown) => {
                this.options.logger?.error("Reminder poll failed.", { error: errorMessage(error) });
            });
        }, this.pollIntervalMs);
        this.timer.unref?.();
    }

    stop(): void {
        if (this.timer) clearInterval(this.timer);
        this.timer = null;
    }

    async tick(now: Date = this.now()): Promise<ReminderTickReport> {
        const report: ReminderTickReport = { delivered: [], failed: [] };

        for (const reminder of await this.options.store.due(now)) {
            const elapsed = formatElapsed(now.getTime() - Date.parse(reminder.createdAt));
            try {
                await this.options.delivery.deliver(reminder, { elapsed });
            } catch (error) {
                report.failed.push(reminder.id);
                this.options.logger?.warn("Reminder delivery failed; will retry.", {
                    id: reminder.id,
                    owner: reminder.owner,
                    error: errorMessage(error),
                });
                continue;
            }

            report.delivered.push(reminder.id);
            try {
                await this.options.store.complete(reminder.id);
            } catch (error) {
                this.options.logger?.error("Failed to remove delivered reminder.", {
                    id: reminder.id,
                    error: errorMessage(error),
                });
            }
        }
        return report;
    }

    private async poll(): Promise<void> {
        if (this.ticking) return;

        this.ticking = true;
        try {
            await this.tick(this.now());
        } finally {
            this.ticking = false;
        }
    }
}
