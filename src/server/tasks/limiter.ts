import { ProtocolError } from '../../errors.js';

/**
 * Caps how many task bodies run at once.
 *
 * At capacity, `acquire` rejects the newcomer with a resource-exhausted protocol error rather
 * than queueing it. A limit of `0` means unlimited.
 */
export class ConcurrencyLimiter {
    private _active = 0;

    constructor(readonly limit: number = 0) {
        if (!Number.isInteger(limit) || limit < 0) {
            throw new RangeError(`Concurrency limit must be a non-negative integer, got ${limit}`);
        }
    }

    get active(): number {
        return this._active;
    }

    get available(): number {
        return this.limit === 0 ? Number.POSITIVE_INFINITY : this.limit - this._active;
    }

    /**
     * Takes a slot and returns its release function, or undefined when none is free.
     * Releasing more than once is harmless.
     */
    tryAcquire(): (() => void) | undefined {
        if (this.limit !== 0 && this._active >= this.limit) {
            return undefined;
        }
        this._active++;

        let released = false;
        return () => {
            if (released) {
                return;
            }
            released = true;
            this._active--;
        };
    }

    /**
     * Like {@link ConcurrencyLimiter.tryAcquire}, but throws when at capacity.
     */
    acquire(): () => void {
        const release = this.tryAcquire();
        if (!release) {
            throw ProtocolError.resourceExhausted(`Maximum concurrent tasks reached (${this.limit})`, { limit: this.limit });
        }
        return release;
    }
}
