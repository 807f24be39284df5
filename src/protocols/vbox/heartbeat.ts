/**
 * Idle keepalive timer.
 * @module vbox/heartbeat
 */
import {toError} from './errors';

export type HeartbeatSchedulerOptions = {
    /** Idle time before a beat. `0` disables the scheduler. */
    intervalMs: number;
    /** Sends one heartbeat. */
    beat: () => Promise<void>;
    /** Called when a beat fails; the scheduler has already stopped. */
    onError?: (error: Error) => void;
};

/**
 * Fires `beat` once `intervalMs` passes without outbound traffic.
 * Call {@link HeartbeatScheduler.touch} after every write to re-arm it.
 */
export class HeartbeatScheduler {
    private timer: NodeJS.Timeout | null = null;
    private running = false;

    constructor(private readonly options: HeartbeatSchedulerOptions) {}

    public isRunning(): boolean {
        return this.running;
    }

    public start(): void {
        if (this.options.intervalMs <= 0) return;
        this.running = true;
        this.arm();
    }

    /** Restart the idle countdown. No-op while stopped. */
    public touch(): void {
        if (this.running) this.arm();
    }

    public stop(): void {
        this.running = false;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
    }

    private arm(): void {
        if (this.timer) clearTimeout(this.timer);
        this.timer = setTimeout(() => {
            this.timer = null;
            this.options.beat().then(() => {
                if (this.running && !this.timer) this.arm();
            }).catch((err: unknown) => {
                this.stop();
                this.options.onError?.(toError(err));
            });
        }, this.options.intervalMs);
    }
}
