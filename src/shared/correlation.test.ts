import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { TimeoutError } from '../errors.js';
import { CorrelationTable } from './correlation.js';
import type { Logger } from './logger.js';
import { loggerFrom } from './logger.js';

describe('CorrelationTable', () => {
    let table: CorrelationTable;

    beforeEach(() => {
        vi.useFakeTimers();
        table = new CorrelationTable();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('should allocate increasing IDs', () => {
        expect([table.nextId(), table.nextId(), table.nextId()]).toEqual([0, 1, 2]);
    });

    it('should fulfil a waiter with the matching response and forget it', async () => {
        const waiting = table.register(7, 'roots/list');

        expect(table.has(7)).toBe(true);
        expect(table.resolve(7, { roots: [] })).toBe(true);

        await expect(waiting).resolves.toEqual({ roots: [] });
        expect(table.size).toBe(0);
    });

    it('should drop a second response for the same ID', async () => {
        const waiting = table.register(1, 'ping');

        expect(table.resolve(1, { first: true })).toBe(true);
        expect(table.resolve(1, { second: true })).toBe(false);

        await expect(waiting).resolves.toEqual({ first: true });
    });

    it('should log dropped responses at debug level', () => {
        const debug = vi.fn();
        const logger: Logger = loggerFrom((level, message, extra) => {
            if (level === 'debug') {
                debug(message, extra);
            }
        });
        const logged = new CorrelationTable(logger);

        expect(logged.resolve('unknown', {})).toBe(false);

        expect(debug).toHaveBeenCalledWith('Dropping response for unknown request ID', { id: 'unknown' });
    });

    it('should match string and numeric forms of the same ID', async () => {
        const waiting = table.register(3, 'ping');

        expect(table.resolve('3', {})).toBe(true);
        await expect(waiting).resolves.toEqual({});
    });

    it('should reject a duplicate registration', async () => {
        const first = table.register(1, 'ping');

        await expect(table.register(1, 'ping')).rejects.toThrow('A request with ID 1 is already pending');

        table.resolve(1, {});
        await expect(first).resolves.toEqual({});
    });

    it('should reject with the error response', async () => {
        const waiting = table.register(2, 'sampling/createMessage');

        expect(table.reject(2, new Error('User rejected sampling request'))).toBe(true);

        await expect(waiting).rejects.toThrow('User rejected sampling request');
        expect(table.size).toBe(0);
    });

    it('should time out and remove the waiter', async () => {
        const waiting = table.register(4, 'elicitation/create', { timeout: 500 });
        const settled = expect(waiting).rejects.toBeInstanceOf(TimeoutError);

        await vi.advanceTimersByTimeAsync(500);

        await settled;
        await expect(waiting).rejects.toThrow('Request elicitation/create timed out after 500ms');
        expect(table.size).toBe(0);
        expect(table.resolve(4, {})).toBe(false);
    });

    it('should reject with the abort reason and remove the waiter', async () => {
        const controller = new AbortController();
        const waiting = table.register(5, 'roots/list', { signal: controller.signal });

        controller.abort(new Error('handler cancelled'));

        await expect(waiting).rejects.toThrow('handler cancelled');
        expect(table.has(5)).toBe(false);
        expect(vi.getTimerCount()).toBe(0);
    });

    it('should reject at once when the signal is already aborted', async () => {
        const controller = new AbortController();
        controller.abort();

        await expect(table.register(6, 'roots/list', { signal: controller.signal })).rejects.toThrow('This operation was aborted');
        expect(table.size).toBe(0);
    });

    it('should reject every waiter on teardown', async () => {
        const waiters = [table.register(1, 'a'), table.register(2, 'b'), table.register(3, 'c')];

        expect(table.rejectAll(new Error('Connection closed'))).toBe(3);

        const results = await Promise.allSettled(waiters);
        expect(results.map(result => result.status)).toEqual(['rejected', 'rejected', 'rejected']);
        expect(table.size).toBe(0);
        expect(vi.getTimerCount()).toBe(0);
    });

    it('should cancel a waiter with a generic error when no reason is given', async () => {
        const waiting = table.register(8, 'roots/list');

        expect(table.cancel(8)).toBe(true);
        expect(table.cancel(8)).toBe(false);

        await expect(waiting).rejects.toThrow('Request roots/list cancelled');
    });
});
