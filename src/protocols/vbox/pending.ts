/**
 * In-flight request table keyed by message id.
 * @module vbox/pending
 */
import {RequestTimeoutError, VBoxError} from './errors';
import type {VBoxResponse} from './responses';

type PendingEntry = {
    replyCode: number;
    label: string;
    resolve: (response: VBoxResponse) => void;
    reject: (error: Error) => void;
    timeoutId: NodeJS.Timeout;
};

export class PendingRequestTable {
    private readonly entries = new Map<number, PendingEntry>();

    /** Number of requests awaiting a reply. */
    public get size(): number {
        return this.entries.size;
    }

    public has(messageId: number): boolean {
        return this.entries.has(messageId);
    }

    /**
     * Start waiting for the reply carrying `messageId` and `replyCode`.
     * The returned promise rejects with {@link RequestTimeoutError} after `timeoutMs`.
     */
    public register(messageId: number, replyCode: number, timeoutMs: number, label = 'request'): Promise<VBoxResponse> {
        if (this.entries.has(messageId)) {
            throw new VBoxError({
                message: `Message id ${messageId} is already awaiting a reply`,
                domain: 'protocol',
                code: 'MESSAGE_ID_IN_USE',
                details: {messageId, label},
            });
        }
        return new Promise<VBoxResponse>((resolve, reject) => {
            const timeoutId = setTimeout(() => this.expire(messageId, entry), timeoutMs);
            const entry: PendingEntry = {replyCode, label, resolve, reject, timeoutId};
            this.entries.set(messageId, entry);
        });
    }

    /**
     * Complete the entry matching the response's id and code.
     * Returns `false` when no entry claims the response.
     */
    public resolve(response: VBoxResponse): boolean {
        const entry = this.entries.get(response.messageId);
        if (!entry || entry.replyCode !== response.code) return false;
        this.entries.delete(response.messageId);
        clearTimeout(entry.timeoutId);
        entry.resolve(response);
        return true;
    }

    /** Reject one entry. Returns `false` when it was already finalized. */
    public fail(messageId: number, error: Error): boolean {
        const entry = this.entries.get(messageId);
        if (!entry) return false;
        this.entries.delete(messageId);
        clearTimeout(entry.timeoutId);
        entry.reject(error);
        return true;
    }

    /** Reject every entry with `error`; returns how many were rejected. */
    public invalidateAll(error: Error): number {
        const entries = Array.from(this.entries.values());
        this.entries.clear();
        for (const entry of entries) {
            clearTimeout(entry.timeoutId);
            entry.reject(error);
        }
        return entries.length;
    }

    private expire(messageId: number, entry: PendingEntry): void {
        if (this.entries.get(messageId) !== entry) return;
        this.entries.delete(messageId);
        entry.reject(new RequestTimeoutError(`${entry.label} timed out waiting for a reply`, {
            messageId,
            replyCode: entry.replyCode,
        }));
    }
}
