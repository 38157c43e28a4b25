import Bottleneck from "bottleneck";
import { ParlorError, type OwnerKey } from "@parlor/core";

export type RunLimit = {
    runs: number;
    perMs: number;
};

/**
 * Per-owner run budget backed by one Bottleneck reservoir each. The reservoir
 * refills to `runs` every `perMs`; calls past the budget are dropped, not queued.
 */
export class OwnerRunLimiter {
    private readonly pools = new Map<OwnerKey, Bottleneck>();

    constructor(private readonly limit: RunLimit) {}

    async run<T>(owner: OwnerKey, fn: () => Promise<T>): Promise<T> {
        const job = { started: false };
        try {
            return await this.limiterFor(owner).schedule(() => {
                job.started = true;
                return fn();
            });
        } catch (error) {
            if (job.started) throw error;
            throw new ParlorError("RATE_LIMITED", "Too many manual runs; try again later.", error, {
                owner,
                runs: this.limit.runs,
                perMs: this.limit.perMs,
            });
        }
    }

    async disconnect(): Promise<void> {
        const limiters = [...this.pools.values()];
        this.pools.clear();
        await Promise.all(limiters.map((limiter) => limiter.disconnect()));
    }

    private limiterFor(owner: OwnerKey): Bottleneck {
        let limiter = this.pools.get(owner);
        if (!limiter) {
            limiter = new Bottleneck({
                reservoir: this.limit.runs,
                reservoirRefreshAmount: this.limit.runs,
                reservoirRefreshInterval: this.limit.perMs,
                highWater: 0,
                strategy: Bottleneck.strategy.OVERFLOW,
            });
            this.pools.set(owner, limiter);
        }
        return limiter;
    }
}
