import { randomBytes } from 'node:crypto';

import { ProtocolError } from '../../errors.js';
import type { Logger } from '../../shared/logger.js';
import { silentLogger } from '../../shared/logger.js';
import { CompletionSignal, isTerminal, snapshotTask } from '../../shared/task.js';
import type { CallToolResult, Result, Task } from '../../types.js';
import type { TaskHooks, TaskMetrics } from './hooks.js';

/**
 * How a task finished. Delivered once, through {@link TaskEntry.done}.
 */
export type TaskOutcome<R extends Result = CallToolResult> =
    | { status: 'completed'; result: R }
    | { status: 'failed'; error: Error }
    | { status: 'cancelled'; reason: string };

/**
 * Where a task's TTL is measured from.
 * - `createdAt`: TTL counts from creation, whatever the status.
 * - `terminal`: TTL counts from the terminal transition; running tasks never expire.
 */
export type TtlPolicy = 'createdAt' | 'terminal';

export interface TaskStoreOptions {
    /**
     * Suggested poll interval for tasks that do not ask for one. Defaults to 1000ms.
     */
    defaultPollInterval?: number;

    /**
     * Upper bound applied to requested TTLs.
     */
    maxTtl?: number;

    ttlPolicy?: TtlPolicy;

    /**
     * How often the background sweep runs, in milliseconds. `0` disables it; expired tasks
     * are then only dropped when looked up or by calling {@link InMemoryTaskStore.sweep}.
     * Defaults to 1000ms.
     */
    sweepInterval?: number;

    hooks?: TaskHooks;
    logger?: Logger;
}

export interface CreateTaskOptions {
    /**
     * Caller-chosen ID. Generated (32 hex characters) when omitted.
     */
    taskId?: string;
    sessionId?: string;
    toolName?: string;
    ttl?: number;
    pollInterval?: number;
}

export interface ListTasksOptions {
    sessionId?: string;
    cursor?: string;
    pageSize?: number;
}

/**
 * A handle to one stored task. Read-only: the task only changes through the store.
 */
export interface TaskEntry<R extends Result = CallToolResult> {
    readonly taskId: string;
    readonly sessionId?: string;
    readonly toolName?: string;

    /**
     * Aborted when the task is cancelled or expires. Task bodies should watch it.
     */
    readonly signal: AbortSignal;

    /**
     * Resolves once, at the terminal transition.
     */
    readonly done: Promise<TaskOutcome<R>>;

    snapshot(): Task;
}

export type TaskStatusListener<R extends Result = CallToolResult> = (task: Task, entry: TaskEntry<R>) => void;

type StoredTask<R extends Result> = {
    task: Task;
    handle: TaskEntry<R>;
    createdAtMs: number;
    terminalAtMs?: number;
    abortController: AbortController;
    completion: CompletionSignal<TaskOutcome<R>>;
};

export const DEFAULT_POLL_INTERVAL = 1000;
export const DEFAULT_SWEEP_INTERVAL = 1000;
const DEFAULT_PAGE_SIZE = 50;

/**
 * In-memory task store.
 *
 * Every transition is a synchronous check-and-set on one entry, so two transitions on the same
 * task cannot interleave, and a transition on one task never waits on another. The terminal
 * transition fires the entry's completion signal in the same step that changes the status,
 * which makes the first terminal write win and every later one a no-op.
 */
export class InMemoryTaskStore<R extends Result = CallToolResult> {
    private _tasks = new Map<string, StoredTask<R>>();
    private _listeners = new Set<TaskStatusListener<R>>();
    private _sweepTimer?: ReturnType<typeof setInterval>;
    private readonly _logger: Logger;
    private readonly _hooks: TaskHooks;
    private readonly _ttlPolicy: TtlPolicy;

    constructor(private readonly _options: TaskStoreOptions = {}) {
        this._logger = _options.logger ?? silentLogger;
        this._hooks = _options.hooks ?? {};
        this._ttlPolicy = _options.ttlPolicy ?? 'createdAt';

        const interval = _options.sweepInterval ?? DEFAULT_SWEEP_INTERVAL;
        if (interval > 0) {
            this._sweepTimer = setInterval(() => {
                this.sweep();
            }, interval);

            // Prevent timer from keeping process alive
            if (typeof this._sweepTimer.unref === 'function') {
                this._sweepTimer.unref();
            }
        }
    }

    get ttlPolicy(): TtlPolicy {
        return this._ttlPolicy;
    }

    get size(): number {
        return this._tasks.size;
    }

    createTask(options: CreateTaskOptions = {}): TaskEntry<R> {
        const taskId = options.taskId ?? generateTaskId();
        if (this._tasks.has(taskId)) {
            throw ProtocolError.internalError(`Task with ID ${taskId} already exists`);
        }

        const now = Date.now();
        const createdAt = new Date(now).toISOString();
        const ttl = this._clampTtl(options.ttl);
        const task: Task = {
            taskId,
            status: 'working',
            ttl,
            createdAt,
            lastUpdatedAt: createdAt,
            pollInterval: options.pollInterval ?? this._options.defaultPollInterval ?? DEFAULT_POLL_INTERVAL
        };

        const abortController = new AbortController();
        const completion = new CompletionSignal<TaskOutcome<R>>();
        const stored: StoredTask<R> = {
            task,
            createdAtMs: now,
            abortController,
            completion,
            handle: {
                taskId,
                sessionId: options.sessionId,
                toolName: options.toolName,
                signal: abortController.signal,
                done: completion.promise,
                snapshot: () => snapshotTask(stored.task)
            }
        };
        this._tasks.set(taskId, stored);

        this._logger.debug('Task created', { taskId, sessionId: options.sessionId, ttl });
        this._hooks.onTaskCreated?.(this._metrics(stored, now));

        return stored.handle;
    }

    /**
     * Returns a snapshot of the task with its entry.
     *
     * @throws {ProtocolError} invalid params when the task does not exist, has expired or
     * belongs to a different session than `sessionId`.
     */
    getTask(taskId: string, sessionId?: string): { task: Task; entry: TaskEntry<R> } {
        const stored = this._lookup(taskId, sessionId);
        return { task: snapshotTask(stored.task), entry: stored.handle };
    }

    /**
     * Point-in-time copies of every live task visible to `sessionId`, in insertion order.
     */
    listTasks(sessionId?: string): Task[] {
        const now = Date.now();
        const tasks: Task[] = [];
        for (const stored of [...this._tasks.values()]) {
            if (this._expireIfDue(stored, now)) {
                continue;
            }
            if (visibleTo(stored, sessionId)) {
                tasks.push(snapshotTask(stored.task));
            }
        }
        return tasks;
    }

    /**
     * Paginated listing. The cursor is the ID of the last task of the previous page.
     */
    listTasksPage(options: ListTasksOptions = {}): { tasks: Task[]; nextCursor?: string } {
        const all = this.listTasks(options.sessionId);
        const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;

        let start = 0;
        if (options.cursor !== undefined) {
            const index = all.findIndex(task => task.taskId === options.cursor);
            if (index < 0) {
                throw ProtocolError.invalidParams(`Invalid cursor: ${options.cursor}`);
            }
            start = index + 1;
        }

        const tasks = all.slice(start, start + pageSize);
        const last = tasks.at(-1);
        const nextCursor = start + pageSize < all.length && last ? last.taskId : undefined;
        return nextCursor === undefined ? { tasks } : { tasks, nextCursor };
    }

    /**
     * Moves a running task between `working` and `input_required`.
     * Returns false when the task is gone or already terminal.
     */
    updateStatus(entry: TaskEntry<R>, status: 'working' | 'input_required', statusMessage?: string): boolean {
        const stored = this._owned(entry);
        if (!stored || isTerminal(stored.task.status)) {
            return false;
        }
        if (stored.task.status === status && stored.task.statusMessage === statusMessage) {
            return true;
        }

        stored.task.status = status;
        setStatusMessage(stored.task, statusMessage);
        stored.task.lastUpdatedAt = new Date().toISOString();
        this._notify(stored);
        return true;
    }

    /**
     * Records the task's outcome: `completed` with `result` when `error` is absent, `failed` otherwise.
     *
     * First write wins. Returns true for the call that made the transition and false when the
     * task was already terminal or is gone; the stored outcome is never overwritten.
     */
    completeTask(entry: TaskEntry<R>, result: R | undefined, error?: unknown): boolean {
        const stored = this._owned(entry);
        if (!stored || isTerminal(stored.task.status)) {
            return false;
        }

        let outcome: TaskOutcome<R>;
        if (error === undefined || error === null) {
            if (result === undefined) {
                outcome = { status: 'failed', error: new Error('Task finished without a result') };
            } else {
                outcome = { status: 'completed', result };
            }
        } else {
            outcome = { status: 'failed', error: error instanceof Error ? error : new Error(String(error)) };
        }

        if (!this._finish(stored, outcome)) {
            return false;
        }

        const metrics = this._metrics(stored, Date.now());
        if (outcome.status === 'completed') {
            this._logger.debug('Task completed', { taskId: entry.taskId });
            this._hooks.onTaskCompleted?.(metrics);
        } else if (outcome.status === 'failed') {
            this._logger.info('Task failed', { taskId: entry.taskId, error: outcome.error.message });
            this._hooks.onTaskFailed?.({ ...metrics, error: outcome.error });
        }
        return true;
    }

    /**
     * Cancels a running task and aborts its body's signal.
     *
     * @throws {ProtocolError} invalid params when the task does not exist or is already terminal.
     */
    cancelTask(taskId: string, sessionId?: string, reason: string = 'The task was cancelled by request.'): Task {
        const stored = this._lookup(taskId, sessionId);
        if (isTerminal(stored.task.status)) {
            throw ProtocolError.invalidParams(`Cannot cancel task in terminal status: ${stored.task.status}`);
        }

        this._finish(stored, { status: 'cancelled', reason });
        stored.abortController.abort(new Error(reason));

        this._logger.info('Task cancelled', { taskId, reason });
        this._hooks.onTaskCancelled?.({ ...this._metrics(stored, Date.now()), reason });

        return snapshotTask(stored.task);
    }

    /**
     * Waits until the task is terminal and returns its outcome.
     *
     * When `signal` aborts first the returned promise rejects with the abort reason and the
     * task is left as it was.
     *
     * @throws {ProtocolError} invalid params when the task does not exist.
     */
    async waitForResult(taskId: string, options: { signal?: AbortSignal; sessionId?: string } = {}): Promise<TaskOutcome<R>> {
        const stored = this._lookup(taskId, options.sessionId);
        return stored.completion.wait(options.signal);
    }

    /**
     * Subscribes to status transitions after creation. Returns the unsubscribe function.
     */
    onStatusChange(listener: TaskStatusListener<R>): () => void {
        this._listeners.add(listener);
        return () => {
            this._listeners.delete(listener);
        };
    }

    /**
     * Removes every task whose TTL has elapsed at `now`, whatever its status.
     * Returns the IDs removed.
     */
    sweep(now: number = Date.now()): string[] {
        const removed: string[] = [];
        for (const stored of [...this._tasks.values()]) {
            if (this._expireIfDue(stored, now)) {
                removed.push(stored.task.taskId);
            }
        }
        return removed;
    }

    /**
     * Cancels every running task owned by `sessionId`. Used when a session goes away.
     */
    cancelSessionTasks(sessionId: string, reason: string = 'Session closed'): number {
        let cancelled = 0;
        for (const stored of [...this._tasks.values()]) {
            if (stored.handle.sessionId === sessionId && !isTerminal(stored.task.status)) {
                this.cancelTask(stored.task.taskId, undefined, reason);
                cancelled++;
            }
        }
        return cancelled;
    }

    /**
     * Stops the sweep, aborts running task bodies and forgets every task.
     */
    close(): void {
        if (this._sweepTimer) {
            clearInterval(this._sweepTimer);
            this._sweepTimer = undefined;
        }
        for (const stored of this._tasks.values()) {
            if (!isTerminal(stored.task.status)) {
                this._finish(stored, { status: 'cancelled', reason: 'Task store closed' });
                stored.abortController.abort(new Error('Task store closed'));
            }
        }
        this._tasks.clear();
        this._listeners.clear();
    }

    private _finish(stored: StoredTask<R>, outcome: TaskOutcome<R>): boolean {
        if (isTerminal(stored.task.status) || !stored.completion.fire(outcome)) {
            return false;
        }

        const now = Date.now();
        stored.terminalAtMs = now;
        stored.task.status = outcome.status;
        stored.task.lastUpdatedAt = new Date(now).toISOString();
        if (outcome.status === 'failed') {
            setStatusMessage(stored.task, outcome.error.message || 'Task failed');
        } else if (outcome.status === 'cancelled') {
            setStatusMessage(stored.task, outcome.reason);
        } else {
            setStatusMessage(stored.task, 'Task completed');
        }

        this._notify(stored);
        return true;
    }

    private _lookup(taskId: string, sessionId: string | undefined): StoredTask<R> {
        const stored = this._tasks.get(taskId);
        if (!stored || this._expireIfDue(stored, Date.now()) || !visibleTo(stored, sessionId)) {
            throw ProtocolError.taskNotFound(taskId);
        }
        return stored;
    }

    private _owned(entry: TaskEntry<R>): StoredTask<R> | undefined {
        const stored = this._tasks.get(entry.taskId);
        return stored && stored.handle === entry ? stored : undefined;
    }

    private _expireIfDue(stored: StoredTask<R>, now: number): boolean {
        const ttl = stored.task.ttl;
        if (ttl === null) {
            return false;
        }

        const anchor = this._ttlPolicy === 'createdAt' ? stored.createdAtMs : stored.terminalAtMs;
        if (anchor === undefined || now <= anchor + ttl) {
            return false;
        }

        if (this._tasks.get(stored.task.taskId) !== stored) {
            return true;
        }
        this._tasks.delete(stored.task.taskId);

        if (!isTerminal(stored.task.status)) {
            this._finish(stored, { status: 'cancelled', reason: 'Task expired' });
            stored.abortController.abort(new Error('Task expired'));
        }

        this._logger.debug('Task expired', { taskId: stored.task.taskId, ttl });
        this._hooks.onTaskExpired?.(this._metrics(stored, now));
        return true;
    }

    private _clampTtl(requested: number | undefined): number | null {
        const max = this._options.maxTtl;
        if (requested === undefined) {
            return max ?? null;
        }
        return max === undefined ? requested : Math.min(requested, max);
    }

    private _metrics(stored: StoredTask<R>, now: number): TaskMetrics {
        return {
            taskId: stored.task.taskId,
            sessionId: stored.handle.sessionId,
            toolName: stored.handle.toolName,
            duration: now - stored.createdAtMs
        };
    }

    private _notify(stored: StoredTask<R>): void {
        for (const listener of this._listeners) {
            try {
                listener(snapshotTask(stored.task), stored.handle);
            } catch (error) {
                this._logger.warning('Task status listener threw', {
                    taskId: stored.task.taskId,
                    error: error instanceof Error ? error.message : String(error)
                });
            }
        }
    }
}

/**
 * Generates a unique task ID: 16 bytes of random data encoded as hex (32 characters).
 */
export function generateTaskId(): string {
    return randomBytes(16).toString('hex');
}

function visibleTo<R extends Result>(stored: StoredTask<R>, sessionId: string | undefined): boolean {
    const owner = stored.handle.sessionId;
    return sessionId === undefined || owner === undefined || owner === sessionId;
}

function setStatusMessage(task: Task, statusMessage: string | undefined): void {
    if (statusMessage === undefined) {
        delete task.statusMessage;
    } else {
        task.statusMessage = statusMessage;
    }
}
