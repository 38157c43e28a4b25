import { randomUUID } from "node:crypto";
import { z } from "zod";
import { ParlorError } from "@parlor/core";
import type { OwnerProfile } from "./types";

const ParkingProfileSchema = z.object({
    phone: z
        .string()
        .trim()
        .regex(/^\d{8}$/, "Phone number must be exactly 8 digits."),
    plate: z
        .string()
        .trim()
        .min(2, "Plate must be 2-10 characters.")
        .max(10, "Plate must be 2-10 characters.")
        .transform((plate) => plate.toUpperCase()),
});

export type ParkingProfile = z.infer<typeof ParkingProfileSchema>;

/**
 * Validates and normalizes parking credentials. Throws `INVALID_INPUT`
 * naming the rejected fields.
 */
export function parseParkingProfile(input: { phone: string; plate: string }): ParkingProfile {
    const parsed = ParkingProfileSchema.safeParse(input);
    if (!parsed.success) {
        const fields = parsed.error.issues.map((issue) => issue.path.join("."));
        throw new ParlorError("INVALID_INPUT", parsed.error.issues.map((issue) => issue.message).join(" "), undefined, {
            fields,
        });
    }
    return parsed.data;
}

/**
 * Reads a stored profile back as parking credentials, or null when fields are
 * missing or no longer valid.
 */
export function toParkingProfile(profile: OwnerProfile): ParkingProfile | null {
    const parsed = ParkingProfileSchema.safeParse(profile);
    return parsed.success ? parsed.data : null;
}

export type ParkingArea = {
    id: number;
    key: string;
};

export type ParkingRequestOptions = {
    area: ParkingArea;
    countryCode?: string; // default "45"
    vehicleCountry?: string; // default "DK"
    durationMinutes?: number; // default 600
    lang?: string; // default "da"
    requestId?: () => string; // default randomUUID
};

export type ParkingRequestBody = {
    email: string;
    PhoneNumber: string;
    VehicleRegistrationCountry: string;
    Duration: number;
    VehicleRegistration: string;
    parkingAreas: { ParkingAreaId: number; ParkingAreaKey: string }[];
    UId: string;
    Lang: string;
};

/**
 * Permit request body for the mobile-parking confirm endpoint.
 */
export function createParkingRequestBody(profile: ParkingProfile, options: ParkingRequestOptions): ParkingRequestBody {
    return {
        email: "",
        PhoneNumber: `${options.countryCode ?? "45"}${profile.phone}`,
        VehicleRegistrationCountry: options.vehicleCountry ?? "DK",
        Duration: options.durationMinutes ?? 600,
        VehicleRegistration: profile.plate,
        parkingAreas: [{ ParkingAreaId: options.area.id, ParkingAreaKey: options.area.key }],
        UId: (options.requestId ?? randomUUID)(),
        Lang: options.lang ?? "da",
    };
}

/**
 * Adapts {@link createParkingRequestBody} to the `buildBody` hook of an
 * `HttpActionExecutor`. Profiles that are not valid parking credentials are
 * rejected with `INVALID_INPUT`.
 */
export function parkingBodyBuilder(options: ParkingRequestOptions): (profile: OwnerProfile) => ParkingRequestBody {
    return (profile) => {
        const parking = toParkingProfile(profile);
        if (!parking) {
            throw new ParlorError("INVALID_INPUT", "Stored profile is not a valid parking profile.");
        }
        return createParkingRequestBody(parking, options);
    };
}
