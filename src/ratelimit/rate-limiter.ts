import PQueue from 'p-queue';
import { ConsoleUtil } from '~util/console-util';

/**
 * Pre-flight throttle consulted before an API action is dispatched. `check` resolves once
 * the action may proceed and rejects when the limiter refuses the call.
 */
export interface RateLimiter {
    check(action: string): Promise<void>;
}

export const DEFAULT_LIMIT_PER_SECOND = 20;

export interface RateLimiterOptions {
    /** calls allowed per interval for actions without an override */
    limit?: number;
    /** interval in milliseconds */
    interval?: number;
    overrides?: Record<string, number>;
}

/**
 * Token-bucket style limiter keeping one queue per action name.
 */
export class PQueueRateLimiter implements RateLimiter {

    private static sharedInstance: PQueueRateLimiter | undefined;

    public static Shared(): PQueueRateLimiter {
        if (PQueueRateLimiter.sharedInstance === undefined) {
            PQueueRateLimiter.sharedInstance = new PQueueRateLimiter();
        }
        return PQueueRateLimiter.sharedInstance;
    }

    private readonly queues: Map<string, PQueue> = new Map();
    private readonly limit: number;
    private readonly interval: number;
    private readonly overrides: Record<string, number>;

    constructor(options: RateLimiterOptions = {}) {
        this.limit = options.limit ?? DEFAULT_LIMIT_PER_SECOND;
        this.interval = options.interval ?? 1000;
        this.overrides = { ...options.overrides };
    }

    public limitFor(action: string): number {
        return this.overrides[action] ?? this.limit;
    }

    public async check(action: string): Promise<void> {
        const queue = this.getQueue(action);
        if (queue.size > 0) {
            ConsoleUtil.LogDebug(`rate limit reached for action ${action}, ${queue.size} call(s) waiting`);
        }
        await queue.add(async () => undefined);
    }

    private getQueue(action: string): PQueue {
        let queue = this.queues.get(action);
        if (queue === undefined) {
            queue = new PQueue({ intervalCap: this.limitFor(action), interval: this.interval, carryoverConcurrencyCount: true });
            this.queues.set(action, queue);
        }
        return queue;
    }
}
