/**
 * Reconnect scheduling after an unexpected connection loss.
 * @module vbox/reconnect
 */
import {toError} from './errors';

export type ReconnectStrategy = 'fixed' | 'backoff';

export type ReconnectPolicy = {
    enabled: boolean;
    strategy: ReconnectStrategy;
    /** Delay before the first attempt, and every attempt under `fixed`. */
    delayMs: number;
    /** Upper bound of the `backoff` delay. */
    maxDelayMs: number;
    /** `0` retries forever. */
    maxAttempts: number;
};

export type ReconnectHooks = {
    onAttempt?: (attempt: number, delayMs: number) => void;
    onError?: (error: Error, attempt: number) => void;
    onGiveUp?: (attempts: number) => void;
};

export class ReconnectSupervisor {
    private timer: NodeJS.Timeout | null = null;
    private attempt = 0;
    private generation = 0;

    constructor(
        private readonly policy: ReconnectPolicy,
        private readonly connect: () => Promise<void>,
        private readonly hooks: ReconnectHooks = {},
    ) {}

    /** Attempts made since the last success or cancel. */
    public get attempts(): number {
        return this.attempt;
    }

    public isEnabled(): boolean {
        return this.policy.enabled;
    }

    public isScheduled(): boolean {
        return this.timer !== null;
    }

    public delayFor(attempt: number): number {
        if (this.policy.strategy === 'fixed') return this.policy.delayMs;
        return Math.min(this.policy.delayMs * (2 ** (attempt - 1)), this.policy.maxDelayMs);
    }

    /**
     * Schedule the next attempt. Returns `false` when reconnecting is disabled or
     * the attempt budget is spent; `onGiveUp` runs in the latter case.
     */
    public schedule(): boolean {
        if (!this.policy.enabled) return false;
        if (this.timer) return true;
        if (this.policy.maxAttempts > 0 && this.attempt >= this.policy.maxAttempts) {
            const attempts = this.attempt;
            this.attempt = 0;
            this.hooks.onGiveUp?.(attempts);
            return false;
        }

        this.attempt += 1;
        const attempt = this.attempt;
        const delayMs = this.delayFor(attempt);
        const generation = this.generation;
        this.hooks.onAttempt?.(attempt, delayMs);
        this.timer = setTimeout(() => {
            this.timer = null;
            this.connect().then(() => {
                if (generation === this.generation) this.attempt = 0;
            }).catch((err: unknown) => {
                if (generation !== this.generation) return;
                this.hooks.onError?.(toError(err), attempt);
                this.schedule();
            });
        }, delayMs);
        return true;
    }

    /** Drop any scheduled attempt and forget in-flight ones. */
    public cancel(): void {
        this.generation += 1;
        this.attempt = 0;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
    }
}
