/**
 * Measurements passed to task lifecycle hooks.
 */
export interface TaskMetrics {
    taskId: string;
    sessionId?: string;
    toolName?: string;
    /**
     * Milliseconds between creation and the event being reported.
     */
    duration: number;
    /**
     * Set for failed tasks.
     */
    error?: Error;
    /**
     * Set for cancelled tasks.
     */
    reason?: string;
}

/**
 * Task lifecycle callbacks. Each terminal hook is called at most once per task.
 */
export interface TaskHooks {
    onTaskCreated?: (metrics: TaskMetrics) => void;
    onTaskCompleted?: (metrics: TaskMetrics) => void;
    onTaskFailed?: (metrics: TaskMetrics) => void;
    onTaskCancelled?: (metrics: TaskMetrics) => void;
    /**
     * Called when the sweep removes a task whose TTL elapsed.
     */
    onTaskExpired?: (metrics: TaskMetrics) => void;
}

/**
 * Merges several hook sets into one that calls each in registration order.
 */
export function combineTaskHooks(...hooks: Array<TaskHooks | undefined>): TaskHooks {
    const present = hooks.filter((h): h is TaskHooks => h !== undefined);
    const fanOut =
        (pick: (h: TaskHooks) => ((metrics: TaskMetrics) => void) | undefined) =>
        (metrics: TaskMetrics): void => {
            for (const h of present) {
                pick(h)?.(metrics);
            }
        };

    return {
        onTaskCreated: fanOut(h => h.onTaskCreated),
        onTaskCompleted: fanOut(h => h.onTaskCompleted),
        onTaskFailed: fanOut(h => h.onTaskFailed),
        onTaskCancelled: fanOut(h => h.onTaskCancelled),
        onTaskExpired: fanOut(h => h.onTaskExpired)
    };
}
