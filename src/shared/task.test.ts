import { describe, expect, it } from 'vitest';
import { CompletionSignal, isTerminal } from './task.js';
import { TaskSchema } from '../types.js';

describe('Task utility functions', () => {
    describe('isTerminal', () => {
        it('should return true for completed status', () => {
            expect(isTerminal('completed')).toBe(true);
        });

        it('should return true for failed status', () => {
            expect(isTerminal('failed')).toBe(true);
        });

        it('should return true for cancelled status', () => {
            expect(isTerminal('cancelled')).toBe(true);
        });

        it('should return false for working status', () => {
            expect(isTerminal('working')).toBe(false);
        });

        it('should return false for input_required status', () => {
            expect(isTerminal('input_required')).toBe(false);
        });
    });
});

describe('CompletionSignal', () => {
    it('should fire exactly once and keep the first value', async () => {
        const signal = new CompletionSignal<string>();

        expect(signal.fired).toBe(false);
        expect(signal.fire('first')).toBe(true);
        expect(signal.fire('second')).toBe(false);

        expect(signal.value).toBe('first');
        await expect(signal.promise).resolves.toBe('first');
    });

    it('should release every waiter when fired', async () => {
        const signal = new CompletionSignal<number>();
        const waiters = [signal.wait(), signal.wait(), signal.wait()];

        signal.fire(7);

        await expect(Promise.all(waiters)).resolves.toEqual([7, 7, 7]);
    });

    it('should reject a waiter whose abort signal fires first, without firing the signal', async () => {
        const signal = new CompletionSignal<number>();
        const controller = new AbortController();
        const waiting = signal.wait(controller.signal);

        controller.abort(new Error('caller gave up'));

        await expect(waiting).rejects.toThrow('caller gave up');
        expect(signal.fired).toBe(false);
    });

    it('should reject immediately when the abort signal is already aborted', async () => {
        const signal = new CompletionSignal<number>();

        await expect(signal.wait(AbortSignal.abort())).rejects.toBeDefined();
    });
});

describe('Task Schema Validation', () => {
    it('should accept a task with ttl and pollInterval', () => {
        const parsed = TaskSchema.parse({
            taskId: 'test-123',
            status: 'working',
            ttl: 60000,
            createdAt: '2025-01-01T00:00:00.000Z',
            lastUpdatedAt: '2025-01-01T00:00:00.000Z',
            pollInterval: 1000
        });

        expect(parsed.ttl).toBe(60000);
        expect(parsed.pollInterval).toBe(1000);
    });

    it('should accept a null ttl', () => {
        const result = TaskSchema.safeParse({
            taskId: 'test-456',
            status: 'completed',
            ttl: null,
            createdAt: '2025-01-01T00:00:00.000Z',
            lastUpdatedAt: '2025-01-01T00:00:00.000Z'
        });

        expect(result.success).toBe(true);
    });

    it('should reject an unknown status', () => {
        const result = TaskSchema.safeParse({
            taskId: 'test-789',
            status: 'paused',
            ttl: null,
            createdAt: '2025-01-01T00:00:00.000Z',
            lastUpdatedAt: '2025-01-01T00:00:00.000Z'
        });

        expect(result.success).toBe(false);
    });
});
