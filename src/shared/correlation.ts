import { TimeoutError } from '../errors.js';
import type { RequestId, Result } from '../types.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';

export const DEFAULT_REQUEST_TIMEOUT_MSEC = 60000;

/**
 * Options for waiting on a server-initiated request.
 */
export type WaitOptions = {
    /**
     * Rejects the waiter with the signal's reason when aborted.
     */
    signal?: AbortSignal;

    /**
     * Milliseconds to wait for the response. `0` or a negative value disables the timer.
     */
    timeout?: number;
};

type PendingRequest = {
    method: string;
    resolve: (result: Result) => void;
    reject: (error: Error) => void;
};

/**
 * Maps outstanding server-to-client request IDs to single-fulfillment waiters.
 *
 * Every waiter is settled exactly once, by whichever comes first of: a response, an error
 * response, abort, timeout or {@link CorrelationTable.rejectAll}. The entry is removed before it is
 * settled, so a second response for the same ID finds nothing and is dropped.
 */
export class CorrelationTable {
    private _requestMessageId = 0;
    private _pending = new Map<string, PendingRequest>();

    constructor(private readonly _logger: Logger = silentLogger) {}

    /**
     * Allocates a request ID never used before by this table.
     */
    nextId(): number {
        return this._requestMessageId++;
    }

    get size(): number {
        return this._pending.size;
    }

    has(id: RequestId): boolean {
        return this._pending.has(String(id));
    }

    /**
     * Registers a waiter for `id` and returns the promise it settles.
     *
     * The waiter is in the table when this returns, so a response that arrives before the
     * caller awaits is not lost.
     */
    register(id: RequestId, method: string, options: WaitOptions = {}): Promise<Result> {
        const key = String(id);
        if (this._pending.has(key)) {
            return Promise.reject(new Error(`A request with ID ${key} is already pending`));
        }

        const { signal, timeout = DEFAULT_REQUEST_TIMEOUT_MSEC } = options;
        if (signal?.aborted) {
            return Promise.reject(abortReason(signal));
        }

        return new Promise<Result>((resolve, reject) => {
            let timer: ReturnType<typeof setTimeout> | undefined;

            const onAbort = () => {
                const pending = this._take(key);
                pending?.reject(abortReason(signal));
            };

            const cleanup = () => {
                if (timer !== undefined) {
                    clearTimeout(timer);
                }
                signal?.removeEventListener('abort', onAbort);
            };

            this._pending.set(key, {
                method,
                resolve: result => {
                    cleanup();
                    resolve(result);
                },
                reject: error => {
                    cleanup();
                    reject(error);
                }
            });

            if (timeout > 0) {
                timer = setTimeout(() => {
                    const pending = this._take(key);
                    pending?.reject(new TimeoutError(method, timeout));
                }, timeout);
            }

            signal?.addEventListener('abort', onAbort, { once: true });
        });
    }

    /**
     * Fulfils the waiter for `id`. Returns false, and drops the response, when no waiter is
     * registered: a duplicate, a late response after timeout, or a reply to something this
     * table never sent (such as a client answering a ping with an empty body).
     */
    resolve(id: RequestId, result: Result): boolean {
        const pending = this._take(String(id));
        if (!pending) {
            this._logger.debug('Dropping response for unknown request ID', { id });
            return false;
        }
        pending.resolve(result);
        return true;
    }

    /**
     * Rejects the waiter for `id`. Same drop rule as {@link CorrelationTable.resolve}.
     */
    reject(id: RequestId, error: Error): boolean {
        const pending = this._take(String(id));
        if (!pending) {
            this._logger.debug('Dropping error response for unknown request ID', { id, error: error.message });
            return false;
        }
        pending.reject(error);
        return true;
    }

    /**
     * Rejects every outstanding waiter with `error` and empties the table.
     * Returns how many waiters were rejected.
     */
    rejectAll(error: Error): number {
        const pending = [...this._pending.values()];
        this._pending.clear();
        for (const waiter of pending) {
            waiter.reject(error);
        }
        return pending.length;
    }

    /**
     * Cancels the waiter for `id`, if still pending.
     */
    cancel(id: RequestId, reason?: unknown): boolean {
        const pending = this._take(String(id));
        if (!pending) {
            return false;
        }
        pending.reject(reason instanceof Error ? reason : new Error(`Request ${pending.method} cancelled`));
        return true;
    }

    private _take(key: string): PendingRequest | undefined {
        const pending = this._pending.get(key);
        if (pending) {
            this._pending.delete(key);
        }
        return pending;
    }
}

function abortReason(signal: AbortSignal | undefined): Error {
    const reason: unknown = signal?.reason;
    if (reason instanceof Error) {
        return reason;
    }
    const error = new Error(reason === undefined ? 'This operation was aborted' : String(reason));
    error.name = 'AbortError';
    return error;
}
