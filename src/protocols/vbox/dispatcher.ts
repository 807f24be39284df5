/**
 * Fan-out of unsolicited key-status pushes to subscribers.
 * @module vbox/dispatcher
 */
import type {Logger} from '../../core/logger';
import {toError} from './errors';
import type {KeyStatusResponse} from './responses';

/** Listener for key-status pushes. A returned promise is observed for rejection only. */
export type KeyStatusListener = (status: KeyStatusResponse) => void | Promise<void>;

const isPromiseLike = (value: unknown): value is PromiseLike<unknown> =>
    typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';

export class KeyStatusDispatcher {
    private readonly listeners = new Set<KeyStatusListener>();

    constructor(private readonly logger: Logger) {}

    public get size(): number {
        return this.listeners.size;
    }

    /** Subscribe; returns the matching unsubscribe function. */
    public add(listener: KeyStatusListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    public remove(listener: KeyStatusListener): boolean {
        return this.listeners.delete(listener);
    }

    public clear(): void {
        this.listeners.clear();
    }

    /**
     * Invoke every listener in registration order. Failures are logged and do not
     * stop delivery to the remaining listeners. Returns the number of listeners called.
     */
    public dispatch(status: KeyStatusResponse): number {
        let delivered = 0;
        for (const listener of Array.from(this.listeners)) {
            delivered += 1;
            try {
                const result = listener(status);
                if (isPromiseLike(result)) {
                    result.then(undefined, (err: unknown) => this.report(err, status));
                }
            } catch (err) {
                this.report(err, status);
            }
        }
        return delivered;
    }

    private report(err: unknown, status: KeyStatusResponse): void {
        this.logger.error(
            {err: toError(err), nodeId: status.nodeId, keyId: status.keyId},
            'Key status listener failed',
        );
    }
}
