import * as z from 'zod/v4';

import type { LogLevel, Logger } from '../shared/logger.js';
import { createLogger, isLogLevel } from '../shared/logger.js';
import type { TaskHooks } from './tasks/hooks.js';

const LogLevelSchema = z.custom<LogLevel>(value => typeof value === 'string' && isLogLevel(value), {
    message: 'Expected one of: emerg, alert, crit, error, warning, notice, info, debug'
});

export const TtlPolicySchema = z.enum(['createdAt', 'terminal']);

/**
 * Which task features the server advertises. Every flag defaults to on once the object is given.
 */
export const TaskCapabilityOptionsSchema = z.object({
    list: z.boolean().default(true),
    cancel: z.boolean().default(true),
    toolCalls: z.boolean().default(true)
});

/**
 * The serializable part of {@link ServerOptions}.
 */
export const ServerSettingsSchema = z.object({
    instructions: z.string().optional(),

    /**
     * Absent: the server has no task capability and every `tasks/*` method is unknown.
     */
    tasks: TaskCapabilityOptionsSchema.optional(),

    /**
     * Whether tool handlers may elicit input from the client.
     */
    elicitation: z.boolean().default(false),

    /**
     * Task bodies allowed to run at once. `0` means unlimited.
     */
    maxConcurrentTasks: z.number().int().nonnegative().default(0),

    defaultPollInterval: z.number().int().positive().default(1000),
    maxTtl: z.number().int().positive().optional(),
    ttlPolicy: TtlPolicySchema.default('createdAt'),
    sweepInterval: z.number().int().nonnegative().default(1000),

    /**
     * Milliseconds to wait for the client to answer a server-initiated request.
     */
    requestTimeout: z.number().int().nonnegative().default(60000),

    /**
     * Capacity of each session's outbound channel.
     */
    maxQueuedMessages: z.number().int().positive().default(1000),

    sessionTimeout: z.number().int().positive().optional(),
    maxSessions: z.number().int().positive().optional(),

    /**
     * Threshold for the default logger. Ignored when `logger` is given.
     */
    logLevel: LogLevelSchema.optional()
});

export type ServerSettings = z.input<typeof ServerSettingsSchema>;
export type ResolvedServerSettings = z.output<typeof ServerSettingsSchema>;

export interface ServerOptions extends ServerSettings {
    logger?: Logger;
    taskHooks?: TaskHooks;
}

export interface ResolvedServerOptions extends ResolvedServerSettings {
    logger: Logger;
    taskHooks?: TaskHooks;
}

/**
 * Validates options and fills in defaults.
 *
 * @throws {Error} listing every invalid field.
 */
export function resolveServerOptions(options: ServerOptions = {}): ResolvedServerOptions {
    const { logger, taskHooks, ...settings } = options;
    const parsed = ServerSettingsSchema.safeParse(settings);
    if (!parsed.success) {
        throw new Error(`Invalid server options:\n${z.prettifyError(parsed.error)}`);
    }

    return {
        ...parsed.data,
        logger: logger ?? createLogger({ level: parsed.data.logLevel ?? 'info' }),
        taskHooks
    };
}

const EnvSchema = z.object({
    MCP_MAX_CONCURRENT_TASKS: z.coerce.number().int().nonnegative().optional(),
    MCP_TASK_SWEEP_INTERVAL_MS: z.coerce.number().int().nonnegative().optional(),
    MCP_REQUEST_TIMEOUT_MS: z.coerce.number().int().nonnegative().optional(),
    MCP_LOG_LEVEL: LogLevelSchema.optional(),
    MCP_TASK_TTL_POLICY: TtlPolicySchema.optional()
});

/**
 * Reads the settings that can come from the environment. Unset and empty variables are
 * left out, so the result can be spread over explicit options.
 */
export function loadServerOptionsFromEnv(env: Record<string, string | undefined> = process.env): ServerSettings {
    const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''));
    const parsed = EnvSchema.safeParse(present);
    if (!parsed.success) {
        throw new Error(`Invalid environment:\n${z.prettifyError(parsed.error)}`);
    }

    const vars = parsed.data;
    const settings: ServerSettings = {};
    if (vars.MCP_MAX_CONCURRENT_TASKS !== undefined) {
        settings.maxConcurrentTasks = vars.MCP_MAX_CONCURRENT_TASKS;
    }
    if (vars.MCP_TASK_SWEEP_INTERVAL_MS !== undefined) {
        settings.sweepInterval = vars.MCP_TASK_SWEEP_INTERVAL_MS;
    }
    if (vars.MCP_REQUEST_TIMEOUT_MS !== undefined) {
        settings.requestTimeout = vars.MCP_REQUEST_TIMEOUT_MS;
    }
    if (vars.MCP_LOG_LEVEL !== undefined) {
        settings.logLevel = vars.MCP_LOG_LEVEL;
    }
    if (vars.MCP_TASK_TTL_POLICY !== undefined) {
        settings.ttlPolicy = vars.MCP_TASK_TTL_POLICY;
    }
    return settings;
}
