import { TransportError } from '../errors.js';
import type { JSONRPCMessage } from '../types.js';
import { MessageQueue } from './MessageQueue.js';

export const DEFAULT_CHANNEL_CAPACITY = 1000;

/**
 * A session's single outbound queue of server-to-client messages.
 *
 * Producers `push` without blocking; a full or closed channel throws a recoverable
 * {@link TransportError} instead of waiting. One consumer (the transport pump) pulls with
 * `next()` or `for await`, receiving messages in push order. After `close()` the consumer
 * still receives what was already queued, then the iteration ends.
 */
export class OutboundChannel<T = JSONRPCMessage> implements AsyncIterable<T> {
    private readonly _queue: MessageQueue<T>;
    private _consumers: Array<(result: IteratorResult<T, undefined>) => void> = [];
    private _closed = false;

    constructor(capacity: number = DEFAULT_CHANNEL_CAPACITY) {
        this._queue = new MessageQueue<T>(capacity);
    }

    get closed(): boolean {
        return this._closed;
    }

    get size(): number {
        return this._queue.length;
    }

    get capacity(): number {
        return this._queue.capacity;
    }

    /**
     * Queues a message for delivery, handing it straight to a waiting consumer when there is one.
     */
    push(message: T): void {
        if (this._closed) {
            throw TransportError.channelClosed();
        }

        const consumer = this._consumers.shift();
        if (consumer) {
            consumer({ done: false, value: message });
            return;
        }

        if (!this._queue.enqueue(message)) {
            throw TransportError.channelFull(this._queue.capacity);
        }
    }

    /**
     * Resolves with the next message, or `done` once the channel is closed and empty.
     *
     * Aborting `signal` resolves a pending wait with `done` and takes nothing from the channel,
     * so a consumer that goes away does not lose the next message.
     */
    next(signal?: AbortSignal): Promise<IteratorResult<T, undefined>> {
        if (this._queue.length > 0) {
            const value = this._queue.dequeue();
            if (value !== undefined) {
                return Promise.resolve({ done: false, value });
            }
        }

        if (this._closed || signal?.aborted) {
            return Promise.resolve({ done: true, value: undefined });
        }

        return new Promise(resolve => {
            const onAbort = () => {
                this._consumers = this._consumers.filter(waiting => waiting !== consumer);
                resolve({ done: true, value: undefined });
            };
            const consumer = (result: IteratorResult<T, undefined>) => {
                signal?.removeEventListener('abort', onAbort);
                resolve(result);
            };
            signal?.addEventListener('abort', onAbort, { once: true });
            this._consumers.push(consumer);
        });
    }

    /**
     * Removes and returns whatever is queued right now, without waiting.
     */
    drain(): T[] {
        return this._queue.drain();
    }

    /**
     * Closes the channel. Idempotent. Waiting consumers are released with `done`.
     */
    close(): void {
        if (this._closed) {
            return;
        }
        this._closed = true;

        const consumers = this._consumers;
        this._consumers = [];
        for (const consumer of consumers) {
            consumer({ done: true, value: undefined });
        }
    }

    [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
        return {
            next: () => this.next()
        };
    }
}
