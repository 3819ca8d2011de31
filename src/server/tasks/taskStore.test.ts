import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ProtocolError } from '../../errors.js';
import type { CallToolResult, Task } from '../../types.js';
import { ErrorCode } from '../../types.js';
import type { TaskMetrics } from './hooks.js';
import { InMemoryTaskStore } from './taskStore.js';

const START = new Date('2026-01-01T00:00:00.000Z');

const okResult = (text: string): CallToolResult => ({ content: [{ type: 'text', text }] });

describe('InMemoryTaskStore', () => {
    let store: InMemoryTaskStore;

    beforeEach(() => {
        vi.useFakeTimers();
        vi.setSystemTime(START);
        store = new InMemoryTaskStore({ sweepInterval: 0 });
    });

    afterEach(() => {
        store.close();
        vi.useRealTimers();
    });

    describe('createTask', () => {
        it('should create a working task with the requested TTL and the default poll interval', () => {
            const entry = store.createTask({ ttl: 60000 });
            const task = entry.snapshot();

            expect(task.taskId).toMatch(/^[0-9a-f]{32}$/);
            expect(task.status).toBe('working');
            expect(task.ttl).toBe(60000);
            expect(task.pollInterval).toBe(1000);
            expect(task.createdAt).toBe('2026-01-01T00:00:00.000Z');
            expect(task.lastUpdatedAt).toBe('2026-01-01T00:00:00.000Z');
            expect(task.statusMessage).toBeUndefined();
        });

        it('should use null TTL when none is requested and no maximum is set', () => {
            expect(store.createTask().snapshot().ttl).toBeNull();
        });

        it('should generate distinct IDs', () => {
            const ids = new Set(Array.from({ length: 20 }, () => store.createTask().taskId));
            expect(ids.size).toBe(20);
        });

        it('should reject a duplicate caller-chosen ID', () => {
            store.createTask({ taskId: 'fixed' });

            expect(() => store.createTask({ taskId: 'fixed' })).toThrow(ProtocolError);
            expect(() => store.createTask({ taskId: 'fixed' })).toThrow(
                `MCP error ${ErrorCode.InternalError}: Task with ID fixed already exists`
            );
        });

        it('should clamp TTLs to maxTtl', () => {
            const clamped = new InMemoryTaskStore({ sweepInterval: 0, maxTtl: 5000 });

            expect(clamped.createTask({ ttl: 60000 }).snapshot().ttl).toBe(5000);
            expect(clamped.createTask({ ttl: 2000 }).snapshot().ttl).toBe(2000);
            expect(clamped.createTask().snapshot().ttl).toBe(5000);

            clamped.close();
        });
    });

    describe('getTask', () => {
        it('should return a copy that later transitions do not change', () => {
            const entry = store.createTask({ ttl: 60000 });
            const { task } = store.getTask(entry.taskId);

            store.completeTask(entry, okResult('done'));

            expect(task.status).toBe('working');
            expect(store.getTask(entry.taskId).task.status).toBe('completed');
        });

        it('should report unknown IDs as invalid params', () => {
            expect(() => store.getTask('missing')).toThrow('MCP error -32602: Task not found: missing');
        });

        it('should hide tasks of other sessions', () => {
            const entry = store.createTask({ sessionId: 'session-a' });

            expect(store.getTask(entry.taskId, 'session-a').task.taskId).toBe(entry.taskId);
            expect(() => store.getTask(entry.taskId, 'session-b')).toThrow(`Task not found: ${entry.taskId}`);
        });
    });

    describe('listTasks', () => {
        it('should list every live task', () => {
            const ids = [store.createTask().taskId, store.createTask().taskId, store.createTask().taskId];

            expect(new Set(store.listTasks().map(task => task.taskId))).toEqual(new Set(ids));
        });

        it('should only list tasks of the given session', () => {
            const mine = store.createTask({ sessionId: 'session-a' });
            store.createTask({ sessionId: 'session-b' });

            expect(store.listTasks('session-a').map(task => task.taskId)).toEqual([mine.taskId]);
        });

        it('should page with the last task ID as cursor', () => {
            const ids = ['t1', 't2', 't3'].map(taskId => store.createTask({ taskId }).taskId);

            const first = store.listTasksPage({ pageSize: 2 });
            expect(first.tasks.map(task => task.taskId)).toEqual([ids[0], ids[1]]);
            expect(first.nextCursor).toBe('t2');

            const second = store.listTasksPage({ pageSize: 2, cursor: first.nextCursor });
            expect(second.tasks.map(task => task.taskId)).toEqual(['t3']);
            expect(second.nextCursor).toBeUndefined();
        });

        it('should reject an unknown cursor', () => {
            store.createTask({ taskId: 't1' });

            expect(() => store.listTasksPage({ cursor: 'nope' })).toThrow('MCP error -32602: Invalid cursor: nope');
        });
    });

    describe('updateStatus', () => {
        it('should move a running task between working and input_required', () => {
            const entry = store.createTask();

            expect(store.updateStatus(entry, 'input_required', 'Waiting for the user')).toBe(true);
            expect(entry.snapshot().status).toBe('input_required');
            expect(entry.snapshot().statusMessage).toBe('Waiting for the user');

            expect(store.updateStatus(entry, 'working')).toBe(true);
            expect(entry.snapshot().status).toBe('working');
            expect(entry.snapshot().statusMessage).toBeUndefined();
        });

        it('should refuse to leave a terminal status', () => {
            const entry = store.createTask();
            store.completeTask(entry, okResult('done'));

            expect(store.updateStatus(entry, 'working')).toBe(false);
            expect(entry.snapshot().status).toBe('completed');
        });
    });

    describe('completeTask', () => {
        it('should record the result and resolve done', async () => {
            const entry = store.createTask();

            expect(store.completeTask(entry, okResult('42'))).toBe(true);

            const task = entry.snapshot();
            expect(task.status).toBe('completed');
            expect(task.statusMessage).toBe('Task completed');
            await expect(entry.done).resolves.toEqual({ status: 'completed', result: okResult('42') });
        });

        it('should record a failure with the error message', async () => {
            const entry = store.createTask();

            expect(store.completeTask(entry, undefined, new Error('boom'))).toBe(true);

            expect(entry.snapshot().status).toBe('failed');
            expect(entry.snapshot().statusMessage).toBe('boom');
            const outcome = await entry.done;
            expect(outcome.status).toBe('failed');
            expect(outcome.status === 'failed' && outcome.error.message).toBe('boom');
        });

        it('should keep the first outcome', async () => {
            const entry = store.createTask();

            expect(store.completeTask(entry, okResult('first'))).toBe(true);
            expect(store.completeTask(entry, okResult('second'))).toBe(false);
            expect(store.completeTask(entry, undefined, new Error('late'))).toBe(false);

            expect(entry.snapshot().status).toBe('completed');
            await expect(entry.done).resolves.toEqual({ status: 'completed', result: okResult('first') });
        });

        it('should ignore an entry the store no longer holds', () => {
            const other = new InMemoryTaskStore({ sweepInterval: 0 });
            const foreign = other.createTask({ taskId: 'shared-id' });
            store.createTask({ taskId: 'shared-id' });

            expect(store.completeTask(foreign, okResult('x'))).toBe(false);
            expect(store.getTask('shared-id').task.status).toBe('working');

            other.close();
        });
    });

    describe('cancelTask', () => {
        it('should cancel a running task and abort its signal', async () => {
            const entry = store.createTask();

            const task = store.cancelTask(entry.taskId);

            expect(task.status).toBe('cancelled');
            expect(task.statusMessage).toBe('The task was cancelled by request.');
            expect(entry.signal.aborted).toBe(true);
            await expect(entry.done).resolves.toEqual({ status: 'cancelled', reason: 'The task was cancelled by request.' });
        });

        it('should succeed once and then report the terminal status', () => {
            const entry = store.createTask();

            store.cancelTask(entry.taskId, undefined, 'stop');

            expect(() => store.cancelTask(entry.taskId)).toThrow('MCP error -32602: Cannot cancel task in terminal status: cancelled');
        });

        it('should not let a late result overwrite the cancellation', () => {
            const entry = store.createTask();
            store.cancelTask(entry.taskId);

            expect(store.completeTask(entry, okResult('too late'))).toBe(false);
            expect(entry.snapshot().status).toBe('cancelled');
        });

        it('should settle a cancel racing a completion exactly once', async () => {
            const onTaskCompleted = vi.fn();
            const onTaskCancelled = vi.fn();
            const racing = new InMemoryTaskStore({ sweepInterval: 0, hooks: { onTaskCompleted, onTaskCancelled } });
            const entry = racing.createTask();

            const results = await Promise.allSettled([
                Promise.resolve().then(() => racing.completeTask(entry, okResult('done'))),
                Promise.resolve().then(() => racing.cancelTask(entry.taskId))
            ]);

            // The completion was queued first, so it wins and the cancel finds a terminal task.
            expect(results[0]).toEqual({ status: 'fulfilled', value: true });
            expect(results[1]?.status).toBe('rejected');
            expect(entry.snapshot().status).toBe('completed');
            expect(onTaskCompleted).toHaveBeenCalledTimes(1);
            expect(onTaskCancelled).not.toHaveBeenCalled();

            racing.close();
        });
    });

    describe('waitForResult', () => {
        it('should wait until the task completes', async () => {
            const entry = store.createTask();
            setTimeout(() => store.completeTask(entry, okResult('late')), 100);

            const waiting = store.waitForResult(entry.taskId);
            await vi.advanceTimersByTimeAsync(100);

            await expect(waiting).resolves.toEqual({ status: 'completed', result: okResult('late') });
        });

        it('should give every waiter the same outcome', async () => {
            const entry = store.createTask();
            const waiters = [store.waitForResult(entry.taskId), store.waitForResult(entry.taskId)];

            store.completeTask(entry, okResult('shared'));

            await expect(Promise.all(waiters)).resolves.toEqual([
                { status: 'completed', result: okResult('shared') },
                { status: 'completed', result: okResult('shared') }
            ]);
        });

        it('should stop waiting when the caller aborts, leaving the task running', async () => {
            const entry = store.createTask();
            const controller = new AbortController();

            const waiting = store.waitForResult(entry.taskId, { signal: controller.signal });
            controller.abort(new Error('client went away'));

            await expect(waiting).rejects.toThrow('client went away');
            expect(entry.snapshot().status).toBe('working');
        });

        it('should reject unknown tasks', async () => {
            await expect(store.waitForResult('missing')).rejects.toThrow('Task not found: missing');
        });
    });

    describe('TTL', () => {
        it('should drop a task once its TTL has elapsed', () => {
            const entry = store.createTask({ ttl: 100 });
            store.completeTask(entry, okResult('done'));

            vi.advanceTimersByTime(150);

            expect(() => store.getTask(entry.taskId)).toThrow(`Task not found: ${entry.taskId}`);
            expect(store.listTasks()).toEqual([]);
        });

        it('should keep a task until its TTL has elapsed', () => {
            const entry = store.createTask({ ttl: 100 });

            vi.advanceTimersByTime(100);

            expect(store.getTask(entry.taskId).task.status).toBe('working');
        });

        it('should expire a running task, cancelling and aborting it', async () => {
            const onTaskExpired = vi.fn();
            const expiring = new InMemoryTaskStore({ sweepInterval: 0, hooks: { onTaskExpired } });
            const entry = expiring.createTask({ ttl: 100 });

            expect(expiring.sweep(Date.now() + 150)).toEqual([entry.taskId]);

            expect(entry.signal.aborted).toBe(true);
            await expect(entry.done).resolves.toEqual({ status: 'cancelled', reason: 'Task expired' });
            expect(onTaskExpired).toHaveBeenCalledTimes(1);
            expect(expiring.size).toBe(0);

            expiring.close();
        });

        it('should sweep in the background', () => {
            const sweeping = new InMemoryTaskStore({ sweepInterval: 50 });
            sweeping.createTask({ ttl: 100 });
            sweeping.createTask({ ttl: 10000 });

            vi.advanceTimersByTime(150);

            expect(sweeping.size).toBe(1);
            sweeping.close();
        });

        it('should keep running tasks past their TTL under the terminal policy', () => {
            const terminal = new InMemoryTaskStore({ sweepInterval: 0, ttlPolicy: 'terminal' });
            const entry = terminal.createTask({ ttl: 100 });

            vi.advanceTimersByTime(150);
            expect(terminal.getTask(entry.taskId).task.status).toBe('working');

            terminal.completeTask(entry, okResult('done'));
            vi.advanceTimersByTime(100);
            expect(terminal.getTask(entry.taskId).task.status).toBe('completed');

            vi.advanceTimersByTime(1);
            expect(() => terminal.getTask(entry.taskId)).toThrow(`Task not found: ${entry.taskId}`);

            terminal.close();
        });

        it('should never expire tasks with a null TTL', () => {
            const entry = store.createTask();

            vi.advanceTimersByTime(24 * 60 * 60 * 1000);

            expect(store.getTask(entry.taskId).task.status).toBe('working');
        });
    });

    describe('observers', () => {
        it('should report each transition after creation', () => {
            const seen: Array<Pick<Task, 'status' | 'statusMessage'>> = [];
            store.onStatusChange(task => seen.push({ status: task.status, statusMessage: task.statusMessage }));

            const entry = store.createTask();
            store.updateStatus(entry, 'input_required', 'Need input');
            store.completeTask(entry, okResult('done'));

            expect(seen).toEqual([
                { status: 'input_required', statusMessage: 'Need input' },
                { status: 'completed', statusMessage: 'Task completed' }
            ]);
        });

        it('should pass the entry so listeners know the owning session', () => {
            const owners: Array<string | undefined> = [];
            store.onStatusChange((_task, entry) => owners.push(entry.sessionId));

            store.cancelTask(store.createTask({ sessionId: 'session-a' }).taskId);

            expect(owners).toEqual(['session-a']);
        });

        it('should stop notifying after unsubscribe', () => {
            const listener = vi.fn();
            const unsubscribe = store.onStatusChange(listener);
            unsubscribe();

            store.cancelTask(store.createTask().taskId);

            expect(listener).not.toHaveBeenCalled();
        });

        it('should keep going when a listener throws', () => {
            const after = vi.fn();
            store.onStatusChange(() => {
                throw new Error('listener failure');
            });
            store.onStatusChange(after);

            const entry = store.createTask();
            expect(store.completeTask(entry, okResult('done'))).toBe(true);
            expect(after).toHaveBeenCalledTimes(1);
        });

        it('should call each lifecycle hook once with task metrics', () => {
            const created: TaskMetrics[] = [];
            const failed: TaskMetrics[] = [];
            const hooked = new InMemoryTaskStore({
                sweepInterval: 0,
                hooks: {
                    onTaskCreated: metrics => created.push(metrics),
                    onTaskFailed: metrics => failed.push(metrics)
                }
            });

            const entry = hooked.createTask({ taskId: 'hooked', sessionId: 'session-a', toolName: 'slow-tool' });
            vi.advanceTimersByTime(250);
            hooked.completeTask(entry, undefined, new Error('broken'));
            hooked.completeTask(entry, undefined, new Error('again'));

            expect(created).toEqual([{ taskId: 'hooked', sessionId: 'session-a', toolName: 'slow-tool', duration: 0 }]);
            expect(failed).toHaveLength(1);
            expect(failed[0]?.duration).toBe(250);
            expect(failed[0]?.error?.message).toBe('broken');

            hooked.close();
        });
    });

    describe('session teardown', () => {
        it('should cancel only the running tasks of the session', () => {
            const running = store.createTask({ sessionId: 'session-a' });
            const finished = store.createTask({ sessionId: 'session-a' });
            const other = store.createTask({ sessionId: 'session-b' });
            store.completeTask(finished, okResult('done'));

            expect(store.cancelSessionTasks('session-a')).toBe(1);

            expect(running.snapshot().status).toBe('cancelled');
            expect(running.snapshot().statusMessage).toBe('Session closed');
            expect(finished.snapshot().status).toBe('completed');
            expect(other.snapshot().status).toBe('working');
        });

        it('should abort running bodies and forget every task on close', () => {
            const entry = store.createTask();

            store.close();

            expect(entry.signal.aborted).toBe(true);
            expect(store.size).toBe(0);
        });
    });
});
