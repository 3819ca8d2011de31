import { describe, expect, it } from 'vitest';

import { silentLogger } from '../shared/logger.js';
import { loadServerOptionsFromEnv, resolveServerOptions } from './config.js';

describe('resolveServerOptions', () => {
    it('should fill in defaults', () => {
        const resolved = resolveServerOptions({ logger: silentLogger });

        expect(resolved).toEqual({
            elicitation: false,
            maxConcurrentTasks: 0,
            defaultPollInterval: 1000,
            ttlPolicy: 'createdAt',
            sweepInterval: 1000,
            requestTimeout: 60000,
            maxQueuedMessages: 1000,
            logger: silentLogger,
            taskHooks: undefined
        });
    });

    it('should turn on every task feature when tasks is given', () => {
        expect(resolveServerOptions({ tasks: {}, logger: silentLogger }).tasks).toEqual({ list: true, cancel: true, toolCalls: true });
        expect(resolveServerOptions({ tasks: { cancel: false }, logger: silentLogger }).tasks).toEqual({
            list: true,
            cancel: false,
            toolCalls: true
        });
    });

    it('should list every invalid field', () => {
        expect(() => resolveServerOptions({ maxConcurrentTasks: -1, defaultPollInterval: 0 })).toThrow(/^Invalid server options:\n/);
        expect(() => resolveServerOptions({ maxConcurrentTasks: -1, defaultPollInterval: 0 })).toThrow(/maxConcurrentTasks/);
        expect(() => resolveServerOptions({ maxConcurrentTasks: -1, defaultPollInterval: 0 })).toThrow(/defaultPollInterval/);
    });

    it('should build a logger when none is given', () => {
        const resolved = resolveServerOptions({ logLevel: 'debug' });

        expect(typeof resolved.logger.debug).toBe('function');
        expect(resolved.logLevel).toBe('debug');
    });
});

describe('loadServerOptionsFromEnv', () => {
    it('should read only the variables that are set', () => {
        expect(
            loadServerOptionsFromEnv({
                MCP_MAX_CONCURRENT_TASKS: '4',
                MCP_TASK_SWEEP_INTERVAL_MS: '250',
                MCP_LOG_LEVEL: 'warning',
                MCP_TASK_TTL_POLICY: 'terminal',
                MCP_REQUEST_TIMEOUT_MS: '',
                HOME: '/home/test'
            })
        ).toEqual({
            maxConcurrentTasks: 4,
            sweepInterval: 250,
            logLevel: 'warning',
            ttlPolicy: 'terminal'
        });
    });

    it('should return nothing for an empty environment', () => {
        expect(loadServerOptionsFromEnv({})).toEqual({});
    });

    it('should reject malformed values', () => {
        expect(() => loadServerOptionsFromEnv({ MCP_MAX_CONCURRENT_TASKS: 'many' })).toThrow(/^Invalid environment:\n/);
        expect(() => loadServerOptionsFromEnv({ MCP_LOG_LEVEL: 'verbose' })).toThrow(/MCP_LOG_LEVEL/);
        expect(() => loadServerOptionsFromEnv({ MCP_TASK_TTL_POLICY: 'never' })).toThrow(/MCP_TASK_TTL_POLICY/);
    });

    it('should combine with explicit options', () => {
        const resolved = resolveServerOptions({ ...loadServerOptionsFromEnv({ MCP_REQUEST_TIMEOUT_MS: '5000' }), logger: silentLogger });

        expect(resolved.requestTimeout).toBe(5000);
    });
});
