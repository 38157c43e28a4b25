import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { isMissingFile } from "../FieldCipher";

/**
 * Parsed contents of `file`, or null when it does not exist. Unreadable files
 * and invalid JSON throw.
 */
export async function readJsonFile(file: string): Promise<unknown> {
    let raw: string;
    try {
        raw = await readFile(file, "utf8");
    } catch (error) {
        if (isMissingFile(error)) return null;
        throw error;
    }
    return JSON.parse(raw);
}

/**
 * Writes `value` to a temporary sibling and renames it over `file`, so readers
 * see either the old snapshot or the new one.
 */
export async function writeJsonAtomic(file: string, value: unknown, mode = 0o600): Promise<void> {
    await mkdir(dirname(file), { recursive: true, mode: 0o700 });

    const tmpPath = `${file}.${process.pid}.tmp`;
    try {
        await writeFile(tmpPath, JSON.stringify(value, null, 2), { encoding: "utf8", mode });
        await rename(tmpPath, file);
    } catch (error) {
        await rm(tmpPath, { force: true });
        throw error;
    }
}
