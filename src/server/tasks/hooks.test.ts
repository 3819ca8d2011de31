import { describe, expect, it } from 'vitest';

import type { TaskMetrics } from './hooks.js';
import { combineTaskHooks } from './hooks.js';

describe('combineTaskHooks', () => {
    it('should call every hook set in registration order', () => {
        const calls: string[] = [];
        const hooks = combineTaskHooks(
            { onTaskCreated: metrics => calls.push(`first created ${metrics.taskId}`) },
            undefined,
            {
                onTaskCreated: metrics => calls.push(`second created ${metrics.taskId}`),
                onTaskFailed: metrics => calls.push(`second failed ${metrics.error?.message}`)
            }
        );
        const metrics: TaskMetrics = { taskId: 't-1', duration: 0 };

        hooks.onTaskCreated?.(metrics);
        hooks.onTaskFailed?.({ ...metrics, error: new Error('boom') });
        hooks.onTaskExpired?.(metrics);

        expect(calls).toEqual(['first created t-1', 'second created t-1', 'second failed boom']);
    });
});
