import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { Logger } from "@parlor/core";

const ALGORITHM = "aes-256-gcm";
const KEY_BYTES = 32;
const NONCE_BYTES = 12;
const TAG_BYTES = 16;

/**
 * AES-256-GCM for individual string fields. Ciphertext is
 * `base64(nonce ‖ ciphertext ‖ tag)`.
 */
export class FieldCipher {
    constructor(private readonly key: Buffer) {
        if (key.length !== KEY_BYTES) {
            throw new RangeError(`Encryption key must be ${KEY_BYTES} bytes.`);
        }
    }

    /**
     * Reads the key at `keyFile`, creating it (mode 0600) when missing or not
     * exactly 32 bytes.
     */
    static async loadOrCreate(keyFile: string, logger?: Logger): Promise<FieldCipher> {
        let existing: Buffer | null = null;
        try {
            existing = await readFile(keyFile);
        } catch (error) {
            if (!isMissingFile(error)) throw error;
        }

        if (existing && existing.length === KEY_BYTES) {
            return new FieldCipher(existing);
        }
        if (existing) {
            logger?.warn("Encryption key has the wrong size; generating a new one.", {
                keyFile,
                bytes: existing.length,
            });
        }

        const key = randomBytes(KEY_BYTES);
        await mkdir(dirname(keyFile), { recursive: true, mode: 0o700 });
        await writeFile(keyFile, key, { mode: 0o600 });
        return new FieldCipher(key);
    }

    encrypt(plaintext: string): string {
        const nonce = randomBytes(NONCE_BYTES);
        const cipher = createCipheriv(ALGORITHM, this.key, nonce);
        const body = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]);
        return Buffer.concat([nonce, body, cipher.getAuthTag()]).toString("base64");
    }

    /**
     * Returns null when `value` was not produced by this key.
     */
    decrypt(value: string): string | null {
        const combined = Buffer.from(value, "base64");
        if (combined.length < NONCE_BYTES + TAG_BYTES) return null;

        const nonce = combined.subarray(0, NONCE_BYTES);
        const tag = combined.subarray(combined.length - TAG_BYTES);
        const body = combined.subarray(NONCE_BYTES, combined.length - TAG_BYTES);

        try {
            const decipher = createDecipheriv(ALGORITHM, this.key, nonce);
            decipher.setAuthTag(tag);
            return Buffer.concat([decipher.update(body), decipher.final()]).toString("utf8");
        } catch {
            return null;
        }
    }
}

export function isMissingFile(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}
