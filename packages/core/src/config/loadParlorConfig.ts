import { z } from "zod";
import { ParlorError } from "../errors";

const booleanFlag = z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .transform((value) => value === "true" || value === "1" || value === "yes");

const ParlorConfigSchema = z.object({
    dataDir: z.string().min(1).default("./data"),
    timeZone: z
        .string()
        .default("Europe/Copenhagen")
        .refine(isKnownTimeZone, { message: "Unknown IANA time zone" }),
    pollIntervalMs: z.coerce.number().int().min(1000).default(60_000),
    scheduleToleranceSeconds: z.coerce.number().int().min(0).max(59).default(30),
    validityHours: z.coerce.number().positive().default(10),
    encryptProfiles: booleanFlag.default("true"),
    sessionIdleSeconds: z.coerce.number().int().positive().optional(),
    parkingApiUrl: z.string().url().optional(),
    logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export type ParlorConfig = z.infer<typeof ParlorConfigSchema>;

/**
 * Reads Parlor configuration from environment variables. Invalid values abort
 * with an `INVALID_INPUT` error naming every offending key.
 */
export function loadParlorConfig(env: NodeJS.ProcessEnv = process.env): ParlorConfig {
    const parsed = ParlorConfigSchema.safeParse({
        dataDir: blankToUndefined(env.PARLOR_DATA_DIR),
        timeZone: blankToUndefined(env.PARLOR_TIME_ZONE),
        pollIntervalMs: blankToUndefined(env.PARLOR_POLL_INTERVAL_MS),
        scheduleToleranceSeconds: blankToUndefined(env.PARLOR_SCHEDULE_TOLERANCE_SECONDS),
        validityHours: blankToUndefined(env.PARLOR_VALIDITY_HOURS),
        encryptProfiles: blankToUndefined(env.PARLOR_ENCRYPT_PROFILES)?.toLowerCase(),
        sessionIdleSeconds: blankToUndefined(env.PARLOR_SESSION_IDLE_SECONDS),
        parkingApiUrl: blankToUndefined(env.PARKING_API_URL),
        logLevel: blankToUndefined(env.LOG_LEVEL),
    });

    if (!parsed.success) {
        const keys = parsed.error.issues.map((issue) => issue.path.join("."));
        throw new ParlorError("INVALID_INPUT", `Invalid configuration: ${keys.join(", ")}`, parsed.error, {
            keys,
        });
    }

    return parsed.data;
}

function blankToUndefined(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}

function isKnownTimeZone(timeZone: string): boolean {
    try {
        new Intl.DateTimeFormat("en-US", { timeZone });
        return true;
    } catch {
        return false;
    }
}
