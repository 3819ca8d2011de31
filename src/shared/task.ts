import type { Task, TaskStatus } from '../types.js';

export type TerminalTaskStatus = Extract<TaskStatus, 'completed' | 'failed' | 'cancelled'>;

/**
 * Checks if a task status represents a terminal state.
 * Terminal states are those where the task has finished and will not change.
 *
 * @param status - The task status to check
 * @returns True if the status is terminal (completed, failed, or cancelled)
 */
export function isTerminal(status: TaskStatus): status is TerminalTaskStatus {
    return status === 'completed' || status === 'failed' || status === 'cancelled';
}

/**
 * A signal that fires once with a value and stays fired.
 *
 * `fire` returns true only for the call that actually fired it, so a caller can use it as
 * the check-and-set of a one-time transition.
 */
export class CompletionSignal<T> {
    private _value: { readonly value: T } | undefined;
    private readonly _resolve: (value: T) => void;
    readonly promise: Promise<T>;

    constructor() {
        let settle: (value: T) => void = () => {};
        this.promise = new Promise<T>(resolve => {
            settle = resolve;
        });
        this._resolve = settle;
    }

    get fired(): boolean {
        return this._value !== undefined;
    }

    /**
     * The value the signal fired with, if it has.
     */
    get value(): T | undefined {
        return this._value?.value;
    }

    fire(value: T): boolean {
        if (this._value !== undefined) {
            return false;
        }
        this._value = { value };
        this._resolve(value);
        return true;
    }

    /**
     * Waits for the signal, or rejects with the abort reason when `signal` aborts first.
     * An abort leaves the signal itself untouched.
     */
    wait(signal?: AbortSignal): Promise<T> {
        if (!signal) {
            return this.promise;
        }
        if (signal.aborted) {
            return Promise.reject(toAbortError(signal));
        }

        return new Promise<T>((resolve, reject) => {
            const onAbort = () => reject(toAbortError(signal));
            signal.addEventListener('abort', onAbort, { once: true });
            this.promise.then(
                value => {
                    signal.removeEventListener('abort', onAbort);
                    resolve(value);
                },
                (error: unknown) => {
                    signal.removeEventListener('abort', onAbort);
                    reject(error);
                }
            );
        });
    }
}

function toAbortError(signal: AbortSignal): Error {
    const reason: unknown = signal.reason;
    if (reason instanceof Error) {
        return reason;
    }
    const error = new Error(reason === undefined ? 'This operation was aborted' : String(reason));
    error.name = 'AbortError';
    return error;
}

/**
 * Copies a task so callers never hold a reference into the store.
 */
export function snapshotTask(task: Task): Task {
    return { ...task };
}
