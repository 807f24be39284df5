/**
 * Cyclic message id source, one per connection.
 * @module vbox/message-id
 */
import {MESSAGE_ID_MAX, MESSAGE_ID_MIN} from './constants';

export class MessageIdAllocator {
    private last: number;

    constructor(base = 0) {
        this.last = MessageIdAllocator.normalize(base);
    }

    /** Next id in `1..255`; wraps after 255. */
    public next(): number {
        this.last = this.last >= MESSAGE_ID_MAX ? MESSAGE_ID_MIN : this.last + 1;
        return this.last;
    }

    /** Restart so that the following `next()` returns `base + 1` (or 1 after 255). */
    public reset(base = 0): void {
        this.last = MessageIdAllocator.normalize(base);
    }

    /** Make `id` the value returned by the following `next()`. */
    public setNext(id: number): void {
        if (!Number.isInteger(id) || id < MESSAGE_ID_MIN || id > MESSAGE_ID_MAX) {
            throw new RangeError(`Message id must be ${MESSAGE_ID_MIN}-${MESSAGE_ID_MAX}, got ${id}`);
        }
        this.last = id - 1;
    }

    private static normalize(base: number): number {
        if (!Number.isInteger(base) || base < 0 || base > MESSAGE_ID_MAX) {
            throw new RangeError(`Message id base must be 0-${MESSAGE_ID_MAX}, got ${base}`);
        }
        return base;
    }
}
