/**
 * Usage Tracker
 *
 * Per-provider request counters over calendar day and month windows in a
 * single configured timezone. All updates run synchronously inside one
 * event-loop turn, so concurrent sessions cannot interleave a counter's
 * read and write.
 */

import { createLogger } from '../logger';
import { ProviderConfig, ProviderId } from '../providers/ai/AiProvider';
import { ProviderUsage, UsageRecord } from './types';

const logger = createLogger('usage-tracker');

interface WindowCounter {
    key: string;
    requests: number;
    tokens: number;
    costUsd: number;
}

interface ProviderCounters {
    day: WindowCounter;
    month: WindowCounter;
    lastUsedAt?: Date;
}

interface Quota {
    daily?: number;
    monthly?: number;
}

export interface UsageTrackerOptions {
    /** IANA timezone for window boundaries (default UTC) */
    timezone?: string;
    now?: () => Date;
}

export interface UsageAmount {
    requests?: number;
    tokens?: number;
    costUsd?: number;
}

type QuotaSource = Pick<ProviderConfig, 'id' | 'dailyQuota' | 'monthlyQuota'>;

/**
 * A request slot held while a call is in flight. Exactly one of
 * `commit` or `release` takes effect; later calls are no-ops.
 */
export interface UsageReservation {
    readonly provider: ProviderId;
    commit(amount?: UsageAmount): UsageRecord | undefined;
    release(): void;
}

export class UsageTracker {
    private readonly quotas = new Map<ProviderId, Quota>();
    private readonly counters = new Map<ProviderId, ProviderCounters>();
    private readonly reserved = new Map<ProviderId, number>();
    private records: UsageRecord[] = [];
    private readonly formatter: Intl.DateTimeFormat;
    private readonly now: () => Date;

    constructor(providers: QuotaSource[], options: UsageTrackerOptions = {}) {
        for (const provider of providers) {
            this.quotas.set(provider.id, {
                daily: provider.dailyQuota,
                monthly: provider.monthlyQuota,
            });
        }

        this.formatter = new Intl.DateTimeFormat('en-US', {
            timeZone: options.timezone ?? 'UTC',
            year: 'numeric',
            month: '2-digit',
            day: '2-digit',
        });
        this.now = options.now ?? (() => new Date());
    }

    /**
     * True iff the provider is under both its daily and monthly quota,
     * counting slots reserved by calls still in flight. A provider without
     * quotas is unlimited.
     */
    isWithinQuota(provider: ProviderId): boolean {
        const quota = this.quotas.get(provider);
        if (!quota || (quota.daily === undefined && quota.monthly === undefined)) {
            return true;
        }

        const counters = this.currentCounters(provider);
        const inFlight = this.reserved.get(provider) ?? 0;
        if (quota.daily !== undefined && counters.day.requests + inFlight >= quota.daily) {
            return false;
        }
        if (quota.monthly !== undefined && counters.month.requests + inFlight >= quota.monthly) {
            return false;
        }
        return true;
    }

    /**
     * Check the quota and hold a request slot in the same synchronous
     * turn, so concurrent callers cannot all pass the check. Returns
     * undefined when the provider is over quota.
     */
    reserve(provider: ProviderId): UsageReservation | undefined {
        if (!this.isWithinQuota(provider)) {
            return undefined;
        }

        this.reserved.set(provider, (this.reserved.get(provider) ?? 0) + 1);
        let settled = false;

        const settle = (): boolean => {
            if (settled) return false;
            settled = true;
            const remaining = (this.reserved.get(provider) ?? 1) - 1;
            if (remaining > 0) {
                this.reserved.set(provider, remaining);
            } else {
                this.reserved.delete(provider);
            }
            return true;
        };

        return {
            provider,
            commit: (amount?: UsageAmount) => (settle() ? this.recordUsage(provider, amount) : undefined),
            release: () => {
                settle();
            },
        };
    }

    /**
     * Append a usage record and bump the provider's window counters
     */
    recordUsage(provider: ProviderId, amount: UsageAmount = {}): UsageRecord {
        const record: UsageRecord = Object.freeze({
            provider,
            requests: amount.requests ?? 1,
            tokens: amount.tokens ?? 0,
            costUsd: amount.costUsd ?? 0,
            timestamp: this.now(),
        });

        const counters = this.currentCounters(provider, record.timestamp);
        for (const window of [counters.day, counters.month]) {
            window.requests += record.requests;
            window.tokens += record.tokens;
            window.costUsd += record.costUsd;
        }
        counters.lastUsedAt = record.timestamp;
        this.records.push(record);

        logger.debug('Usage recorded', {
            provider,
            dailyRequests: counters.day.requests,
            monthlyRequests: counters.month.requests,
        });

        return record;
    }

    getUsage(provider: ProviderId): ProviderUsage {
        const counters = this.currentCounters(provider);
        const quota = this.quotas.get(provider);

        return {
            provider,
            dailyRequests: counters.day.requests,
            monthlyRequests: counters.month.requests,
            dailyTokens: counters.day.tokens,
            monthlyTokens: counters.month.tokens,
            monthlyCostUsd: counters.month.costUsd,
            dailyQuota: quota?.daily,
            monthlyQuota: quota?.monthly,
            reservedRequests: this.reserved.get(provider) ?? 0,
            lastUsedAt: counters.lastUsedAt,
        };
    }

    getRecords(provider?: ProviderId): UsageRecord[] {
        return provider
            ? this.records.filter(r => r.provider === provider)
            : [...this.records];
    }

    /**
     * Drop records outside the current month; they no longer count
     * toward any window. Returns the number removed.
     */
    prune(): number {
        const { month } = this.windowKeys(this.now());
        const before = this.records.length;
        this.records = this.records.filter(r => this.windowKeys(r.timestamp).month === month);

        const removed = before - this.records.length;
        if (removed > 0) {
            logger.info('Pruned usage records', { removed, remaining: this.records.length });
        }
        return removed;
    }

    private currentCounters(provider: ProviderId, at: Date = this.now()): ProviderCounters {
        const keys = this.windowKeys(at);
        let counters = this.counters.get(provider);

        if (!counters) {
            counters = { day: emptyWindow(keys.day), month: emptyWindow(keys.month) };
            this.counters.set(provider, counters);
        }

        // Roll over when the calendar window has changed
        if (counters.day.key !== keys.day) {
            counters.day = emptyWindow(keys.day);
        }
        if (counters.month.key !== keys.month) {
            counters.month = emptyWindow(keys.month);
        }

        return counters;
    }

    private windowKeys(date: Date): { day: string; month: string } {
        const parts = this.formatter.formatToParts(date);
        const part = (type: Intl.DateTimeFormatPartTypes): string =>
            parts.find(p => p.type === type)?.value ?? '';

        const month = `${part('year')}-${part('month')}`;
        return { day: `${month}-${part('day')}`, month };
    }
}

function emptyWindow(key: string): WindowCounter {
    return { key, requests: 0, tokens: 0, costUsd: 0 };
}
