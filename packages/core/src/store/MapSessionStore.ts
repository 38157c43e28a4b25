import type { MutateFn, OwnerKey, SessionStore, StoredSession } from "./SessionStore";
import { KeyedLockProvider, type LockProvider } from "../session/LockProvider";
import { ParlorError, type Logger } from "../errors";
import { nowMs, secondsToMs } from "../utils/time";
import { newSessionId } from "../utils/uuid";

export type MapSessionStoreOptions<TPayload> = {
    lockProvider?: LockProvider;
    // sessions untouched for this long are reaped; unset keeps them until a terminal transition
    idleTimeoutSeconds?: number;
    cleanupIntervalSeconds?: number; // default 60
    clone?: (payload: TPayload) => TPayload; // default structuredClone
    logger?: Logger;
    now?: () => number;
};

function slotKey(kind: string, owner: OwnerKey): string {
    return `${kind}:${owner}`;
}

/**
 * In-memory session registry. Each owner slot (`kind:owner`) is locked
 * independently, so work on unrelated owners never serializes.
 */
export class MapSessionStore<TPayload> implements SessionStore<TPayload> {
    private readonly slots = new Map<string, string>();
    private readonly sessions = new Map<string, StoredSession<TPayload>>();
    private readonly lockProvider: LockProvider;
    private readonly clone: (payload: TPayload) => TPayload;
    private readonly now: () => number;
    private readonly cleanupTimer: NodeJS.Timeout | null;

    constructor(private readonly options?: MapSessionStoreOptions<TPayload>) {
        this.lockProvider = options?.lockProvider ?? new KeyedLockProvider();
        this.clone = options?.clone ?? ((payload) => structuredClone(payload));
        this.now = options?.now ?? nowMs;

        if (options?.idleTimeoutSeconds !== undefined) {
            const interval = (options.cleanupIntervalSeconds ?? 60) * 1000;
            this.cleanupTimer = setInterval(() => this.reapIdle(), interval);
            this.cleanupTimer.unref?.();
        } else {
            this.cleanupTimer = null;
        }
    }

    async start(owners: readonly OwnerKey[], kind: string, payload: TPayload): Promise<StoredSession<TPayload>> {
        const unique = [...new Set(owners)];
        if (unique.length === 0 || unique.length !== owners.length) {
            throw new ParlorError("INVALID_INPUT", "A session needs one or more distinct owners.", undefined, {
                kind,
                owners: [...owners],
            });
        }

        const keys = unique.map((owner) => slotKey(kind, owner));

        return this.lockProvider.withLock(keys, async () => {
            // every owner is checked before any slot is written
            const busy = unique.filter((owner) => this.slots.has(slotKey(kind, owner)));
            if (busy.length > 0) {
                throw new ParlorError("ALREADY_ACTIVE", "Owner already has an active session of this kind.", undefined, {
                    kind,
                    owners: busy,
                });
            }

            const at = this.now();
            const session: StoredSession<TPayload> = {
                id: newSessionId(),
                kind,
                owners: unique,
                payload: this.clone(payload),
                createdAt: at,
                updatedAt: at,
            };

            this.sessions.set(session.id, session);
            for (const key of keys) {
                this.slots.set(key, session.id);
            }

            this.options?.logger?.debug("Session started.", { kind, owners: unique, sessionId: session.id });
            return this.snapshot(session);
        });
    }

    async get(owner: OwnerKey, kind: string): Promise<StoredSession<TPayload> | null> {
        const session = this.lookup(owner, kind);
        return session ? this.snapshot(session) : null;
    }

    async mutate<TOutcome>(owner: OwnerKey, kind: string, fn: MutateFn<TPayload, TOutcome>): Promise<TOutcome> {
        const found = this.lookup(owner, kind);
        if (!found) {
            throw notFound(owner, kind);
        }

        const keys = found.owners.map((o) => slotKey(kind, o));

        return this.lockProvider.withLock(keys, async () => {
            const current = this.lookup(owner, kind);
            if (!current || current.id !== found.id) {
                // ended (or replaced) while this call waited for the lock
                throw notFound(owner, kind);
            }

            const result = fn(this.clone(current.payload), this.snapshot(current));

            if (result.terminal) {
                this.remove(current);
                this.options?.logger?.debug("Session reached a terminal state.", { kind, sessionId: current.id });
            } else {
                current.payload = this.clone(result.payload);
                current.updatedAt = this.now();
            }

            return result.outcome;
        });
    }

    async end(owner: OwnerKey, kind: string): Promise<TPayload | null> {
        const found = this.lookup(owner, kind);
        if (!found) return null;

        const keys = found.owners.map((o) => slotKey(kind, o));

        return this.lockProvider.withLock(keys, async () => {
            const current = this.lookup(owner, kind);
            if (!current) return null;

            this.remove(current);
            this.options?.logger?.debug("Session ended.", { kind, sessionId: current.id });
            return current.payload;
        });
    }

    size(): number {
        return this.sessions.size;
    }

    async close(): Promise<void> {
        if (this.cleanupTimer) clearInterval(this.cleanupTimer);
        this.sessions.clear();
        this.slots.clear();
    }

    /**
     * Removes sessions idle for longer than `idleTimeoutSeconds`. Returns the
     * number of sessions reaped.
     */
    reapIdle(): number {
        const idle = this.options?.idleTimeoutSeconds;
        if (idle === undefined) return 0;

        const cutoff = this.now() - secondsToMs(idle);
        let reaped = 0;
        for (const session of [...this.sessions.values()]) {
            if (session.updatedAt < cutoff) {
                this.remove(session);
                reaped++;
            }
        }

        if (reaped > 0) {
            this.options?.logger?.info("Reaped idle sessions.", { reaped });
        }
        return reaped;
    }

    private lookup(owner: OwnerKey, kind: string): StoredSession<TPayload> | null {
        const id = this.slots.get(slotKey(kind, owner));
        if (id === undefined) return null;
        return this.sessions.get(id) ?? null;
    }

    private remove(session: StoredSession<TPayload>): void {
        this.sessions.delete(session.id);
        for (const owner of session.owners) {
            const key = slotKey(session.kind, owner);
            if (this.slots.get(key) === session.id) this.slots.delete(key);
        }
    }

    private snapshot(session: StoredSession<TPayload>): StoredSession<TPayload> {
        return { ...session, owners: [...session.owners], payload: this.clone(session.payload) };
    }
}

function notFound(owner: OwnerKey, kind: string): ParlorError {
    return new ParlorError("SESSION_NOT_FOUND", "No active session of this kind for owner.", undefined, { owner, kind });
}
