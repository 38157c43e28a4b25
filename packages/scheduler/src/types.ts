import { z } from "zod";
import type { OwnerKey } from "@parlor/core";

const IsoInstant = z.string().datetime({ offset: true });

export const ScheduleEntrySchema = z.object({
    hour: z.number().int().min(0).max(23),
    minute: z.number().int().min(0).max(59),
    enabled: z.boolean(),
    lastFired: IsoInstant.nullable().default(null),
    pendingFires: z.array(IsoInstant).default([]),
});

export const OwnerProfileSchema = z.record(z.string(), z.string());

export const ScheduleDataSchema = z.object({
    profiles: z.record(z.string(), OwnerProfileSchema).default({}),
    schedules: z.record(z.string(), ScheduleEntrySchema).default({}),
});

/**
 * Recurring daily trigger for one owner. `pendingFires` holds target instants
 * recorded before execution and cleared on success.
 */
export type ScheduleEntry = z.infer<typeof ScheduleEntrySchema>;

/**
 * Opaque string fields (for parking: `plate`, `phone`). Encrypted at rest.
 */
export type OwnerProfile = z.infer<typeof OwnerProfileSchema>;

export type ScheduleData = {
    profiles: Record<OwnerKey, OwnerProfile>;
    schedules: Record<OwnerKey, ScheduleEntry>;
};

export function emptyScheduleData(): ScheduleData {
    return { profiles: {}, schedules: {} };
}

export type ActionReason = "scheduled" | "recovery" | "manual";

export type ActionContext = {
    owner: OwnerKey;
    reason: ActionReason;
    scheduledFor: Date | null; // null for manual runs
};

/**
 * Side effect a schedule triggers. Throws on failure.
 */
export interface ActionExecutor {
    execute(profile: OwnerProfile, context: ActionContext): Promise<void>;
}

export type ScheduleNotice =
    | { type: "fired"; scheduledFor: string; firedAt: string }
    | { type: "failed"; scheduledFor: string; error: string }
    | { type: "recovered"; scheduledFor: string; firedAt: string }
    | { type: "recovery_failed"; scheduledFor: string; error: string }
    | { type: "expiring"; expiresAt: string };

/**
 * Delivers notices to an owner, typically as a direct message.
 */
export interface Notifier {
    notify(owner: OwnerKey, notice: ScheduleNotice): Promise<void>;
}
