/**
 * Sliding-window request throttle per external caller.
 *
 * Independent of provider quotas: this limits how often a client may
 * launch workflows, not how often providers are called.
 */

export interface RateLimitResult {
    allowed: boolean;
    remaining: number;
    retryAfterSeconds: number;
    resetAt: Date;
}

export interface RateLimiterOptions {
    maxCalls: number;
    windowSeconds: number;
    now?: () => number;
}

export class RateLimiter {
    private readonly calls = new Map<string, number[]>();
    private readonly maxCalls: number;
    private readonly windowMs: number;
    private readonly now: () => number;

    constructor(options: RateLimiterOptions) {
        if (options.maxCalls <= 0 || options.windowSeconds <= 0) {
            throw new Error('Rate limiter needs a positive call limit and window');
        }
        this.maxCalls = options.maxCalls;
        this.windowMs = options.windowSeconds * 1000;
        this.now = options.now ?? Date.now;
    }

    /**
     * Check and, when allowed, record a call for the client
     */
    check(clientId: string): RateLimitResult {
        const now = this.now();
        const calls = this.activeCalls(clientId, now);

        if (calls.length >= this.maxCalls) {
            const resetAt = calls[0] + this.windowMs;
            return {
                allowed: false,
                remaining: 0,
                retryAfterSeconds: Math.max(1, Math.ceil((resetAt - now) / 1000)),
                resetAt: new Date(resetAt),
            };
        }

        calls.push(now);
        this.calls.set(clientId, calls);

        return {
            allowed: true,
            remaining: this.maxCalls - calls.length,
            retryAfterSeconds: 0,
            resetAt: new Date(calls[0] + this.windowMs),
        };
    }

    getRemaining(clientId: string): number {
        return Math.max(0, this.maxCalls - this.activeCalls(clientId, this.now()).length);
    }

    /**
     * When the oldest call in the window expires; now if there are none
     */
    getResetTime(clientId: string): Date {
        const now = this.now();
        const calls = this.activeCalls(clientId, now);
        return new Date(calls.length > 0 ? calls[0] + this.windowMs : now);
    }

    reset(clientId?: string): void {
        if (clientId === undefined) {
            this.calls.clear();
        } else {
            this.calls.delete(clientId);
        }
    }

    /**
     * Forget clients whose calls have all left the window. Returns how many
     * were dropped.
     */
    sweep(): number {
        const now = this.now();
        let removed = 0;
        for (const clientId of [...this.calls.keys()]) {
            if (this.activeCalls(clientId, now).length === 0) {
                removed++;
            }
        }
        return removed;
    }

    get trackedClients(): number {
        return this.calls.size;
    }

    private activeCalls(clientId: string, now: number): number[] {
        const cutoff = now - this.windowMs;
        const calls = (this.calls.get(clientId) ?? []).filter(t => t > cutoff);

        if (calls.length === 0) {
            this.calls.delete(clientId);
        } else {
            this.calls.set(clientId, calls);
        }
        return calls;
    }
}
