import * as z from 'zod/v4';

import { ProtocolError, toJSONRPCError } from '../errors.js';
import type { Logger } from '../shared/logger.js';
import type {
    CallToolResult,
    Implementation,
    InitializeResult,
    JSONRPCMessage,
    JSONRPCNotification,
    JSONRPCRequest,
    JSONRPCResponse,
    RequestId,
    Result,
    ServerCapabilities,
    Tool
} from '../types.js';
import {
    CallToolRequestParamsSchema,
    CancelledNotificationSchema,
    CancelTaskRequestSchema,
    GetTaskPayloadRequestSchema,
    GetTaskRequestSchema,
    InitializeRequestSchema,
    JSONRPC_VERSION,
    LATEST_PROTOCOL_VERSION,
    ListTasksRequestSchema,
    RELATED_TASK_META_KEY,
    SUPPORTED_PROTOCOL_VERSIONS
} from '../types.js';
import type { ClientSession } from './session.js';
import type { ConcurrencyLimiter } from './tasks/limiter.js';
import type { InMemoryTaskStore, TaskEntry } from './tasks/taskStore.js';

export type TaskSupport = 'forbidden' | 'optional' | 'required';

/**
 * What a tool handler gets besides its arguments.
 */
export interface HandlerContext {
    /**
     * Aborted when the client cancels the request or, for task-augmented calls, the task.
     */
    signal: AbortSignal;
    requestId: RequestId;
    sessionId: string;

    /**
     * The session the request arrived on. Server-to-client requests made on behalf of
     * this handler go to it.
     */
    session: ClientSession;

    /**
     * Set when the call runs as a task.
     */
    taskId?: string;

    /**
     * Moves the task between `working` and `input_required`. Only present for task-augmented calls.
     */
    reportStatus?: (status: 'working' | 'input_required', statusMessage?: string) => void;
}

export type ToolHandler = (args: Record<string, unknown>, ctx: HandlerContext) => CallToolResult | Promise<CallToolResult>;

export interface RegisteredTool {
    tool: Tool;
    handler: ToolHandler;
}

export interface TaskFeatures {
    list: boolean;
    cancel: boolean;
    toolCalls: boolean;
}

export interface DispatcherOptions {
    serverInfo: Implementation;
    instructions?: string;
    capabilities: ServerCapabilities;

    /**
     * Absent: `tasks/*` methods are unknown and `params.task` on tool calls is ignored.
     */
    tasks?: TaskFeatures;

    tools: ReadonlyMap<string, RegisteredTool>;
    taskStore: InMemoryTaskStore;
    limiter: ConcurrencyLimiter;
    logger: Logger;

    onRootsListChanged?: (session: ClientSession) => void;
}

/**
 * Options for {@link RequestDispatcher.handleRequest}.
 */
export interface HandleRequestOptions {
    /**
     * Aborting it cancels the request as a `notifications/cancelled` would, e.g. when the
     * HTTP client that sent it disconnects.
     */
    signal?: AbortSignal;
}

interface RequestScope {
    signal: AbortSignal;

    /**
     * Schedules work to start once the response has been handed over.
     */
    afterResponse: (action: () => void) => void;
}

interface RequestOutcome {
    response: JSONRPCResponse | undefined;
    afterResponse: () => void;
}

type RequestHandler = (request: JSONRPCRequest, session: ClientSession, scope: RequestScope) => Result | Promise<Result>;

/**
 * Methods a client may call before it has sent `initialize`.
 */
const PRE_INITIALIZE_METHODS = new Set(['initialize', 'ping']);

/**
 * Routes inbound JSON-RPC messages for every session of one server.
 *
 * Each request runs in its own async flow. Handler failures are turned into error
 * responses here and never propagate to the transport. Responses from the client are
 * handed to the session's correlation table.
 */
export class RequestDispatcher {
    private readonly _handlers = new Map<string, RequestHandler>();
    private readonly _inFlight = new Map<string, AbortController>();
    private readonly _logger: Logger;

    constructor(private readonly _options: DispatcherOptions) {
        this._logger = _options.logger;

        this._handlers.set('initialize', (request, session) => this._initialize(request, session));
        this._handlers.set('ping', () => ({}));
        this._handlers.set('tools/list', () => ({ tools: [...this._options.tools.values()].map(registered => registered.tool) }));
        this._handlers.set('tools/call', (request, session, scope) => this._callTool(request, session, scope));

        const tasks = _options.tasks;
        if (tasks) {
            this._handlers.set('tasks/get', (request, session) => this._getTask(request, session));
            this._handlers.set('tasks/result', (request, session, { signal }) => this._getTaskResult(request, session, signal));
            if (tasks.list) {
                this._handlers.set('tasks/list', (request, session) => this._listTasks(request, session));
            }
            if (tasks.cancel) {
                this._handlers.set('tasks/cancel', (request, session) => this._cancelTask(request, session));
            }
        }
    }

    /**
     * Number of inbound requests currently being handled, across all sessions.
     */
    get inFlightCount(): number {
        return this._inFlight.size;
    }

    /**
     * Handles one inbound message. Responses to requests are queued on the session's channel.
     */
    async handleMessage(session: ClientSession, message: JSONRPCMessage): Promise<void> {
        if (!('method' in message)) {
            if (!session.resolveResponse(message)) {
                this._logger.debug('Dropping response with no pending request', { sessionId: session.sessionId, id: message.id });
            }
            return;
        }

        if ('id' in message) {
            const { response, afterResponse } = await this._run(session, message);
            if (response) {
                this._deliver(session, response);
            }
            afterResponse();
            return;
        }

        this.handleNotification(session, message);
    }

    /**
     * Runs a request to completion and returns its response, or undefined when the request
     * was cancelled: a cancelled request gets no response.
     */
    async handleRequest(
        session: ClientSession,
        request: JSONRPCRequest,
        options: HandleRequestOptions = {}
    ): Promise<JSONRPCResponse | undefined> {
        const { response, afterResponse } = await this._run(session, request, options.signal);
        afterResponse();
        return response;
    }

    private async _run(session: ClientSession, request: JSONRPCRequest, signal?: AbortSignal): Promise<RequestOutcome> {
        const key = inFlightKey(session.sessionId, request.id);
        const controller = new AbortController();
        this._inFlight.set(key, controller);

        const onAbort = () => controller.abort(signal?.reason);
        if (signal?.aborted) {
            onAbort();
        } else {
            signal?.addEventListener('abort', onAbort, { once: true });
        }

        const deferred: Array<() => void> = [];
        const afterResponse = () => {
            for (const action of deferred.splice(0)) {
                action();
            }
        };
        const scope: RequestScope = {
            signal: controller.signal,
            afterResponse: action => {
                deferred.push(action);
            }
        };

        try {
            const handler = this._handlers.get(request.method);
            if (!handler) {
                throw ProtocolError.methodNotFound(request.method);
            }
            if (!PRE_INITIALIZE_METHODS.has(request.method) && session.capabilities === undefined) {
                throw ProtocolError.invalidRequest('Server not initialized');
            }
            if (controller.signal.aborted) {
                this._logger.debug('Skipping request cancelled before it started', { sessionId: session.sessionId, id: request.id });
                return { response: undefined, afterResponse };
            }

            const result = await handler(request, session, scope);
            if (controller.signal.aborted) {
                this._logger.debug('Dropping result of cancelled request', { sessionId: session.sessionId, id: request.id });
                return { response: undefined, afterResponse };
            }
            return { response: { jsonrpc: JSONRPC_VERSION, id: request.id, result }, afterResponse };
        } catch (error) {
            if (controller.signal.aborted) {
                this._logger.debug('Request cancelled', { sessionId: session.sessionId, id: request.id, method: request.method });
                return { response: undefined, afterResponse };
            }
            this._logger.debug('Request failed', {
                sessionId: session.sessionId,
                method: request.method,
                error: error instanceof Error ? error.message : String(error)
            });
            return { response: toJSONRPCError(request.id, error), afterResponse };
        } finally {
            signal?.removeEventListener('abort', onAbort);
            if (this._inFlight.get(key) === controller) {
                this._inFlight.delete(key);
            }
        }
    }

    handleNotification(session: ClientSession, notification: JSONRPCNotification): void {
        switch (notification.method) {
            case 'notifications/initialized': {
                if (!session.markInitialized()) {
                    this._logger.warning('Ignoring initialized notification before initialize', { sessionId: session.sessionId });
                }
                return;
            }
            case 'notifications/cancelled': {
                const parsed = CancelledNotificationSchema.shape.params.safeParse(notification.params);
                if (!parsed.success) {
                    this._logger.debug('Ignoring malformed cancellation', { sessionId: session.sessionId });
                    return;
                }
                const controller = this._inFlight.get(inFlightKey(session.sessionId, parsed.data.requestId));
                controller?.abort(new Error(parsed.data.reason ?? 'Request cancelled by client'));
                return;
            }
            case 'notifications/roots/list_changed': {
                this._options.onRootsListChanged?.(session);
                return;
            }
            default: {
                this._logger.debug('Ignoring notification', { sessionId: session.sessionId, method: notification.method });
            }
        }
    }

    /**
     * Aborts every in-flight request of a session. Used when the session goes away.
     */
    abortSession(sessionId: string, reason: string = 'Session closed'): void {
        const prefix = `${sessionId}\u0000`;
        for (const [key, controller] of this._inFlight) {
            if (key.startsWith(prefix)) {
                controller.abort(new Error(reason));
            }
        }
    }

    private _deliver(session: ClientSession, response: JSONRPCResponse): void {
        try {
            session.send(response);
        } catch (error) {
            this._logger.warning('Failed to deliver response', {
                sessionId: session.sessionId,
                id: response.id,
                error: error instanceof Error ? error.message : String(error)
            });
        }
    }

    private _initialize(request: JSONRPCRequest, session: ClientSession): InitializeResult {
        const params = parseParams(InitializeRequestSchema.shape.params, request.params, request.method);
        const protocolVersion = SUPPORTED_PROTOCOL_VERSIONS.includes(params.protocolVersion)
            ? params.protocolVersion
            : LATEST_PROTOCOL_VERSION;

        session.beginInitialize({
            protocolVersion,
            capabilities: params.capabilities,
            clientInfo: params.clientInfo
        });
        this._logger.info('Session initialized', {
            sessionId: session.sessionId,
            client: params.clientInfo.name,
            protocolVersion
        });

        const result: InitializeResult = {
            protocolVersion,
            capabilities: this._options.capabilities,
            serverInfo: this._options.serverInfo
        };
        if (this._options.instructions !== undefined) {
            result.instructions = this._options.instructions;
        }
        return result;
    }

    private async _callTool(request: JSONRPCRequest, session: ClientSession, scope: RequestScope): Promise<Result> {
        const { signal } = scope;
        const params = parseParams(CallToolRequestParamsSchema, request.params, request.method);
        const registered = this._options.tools.get(params.name);
        if (!registered) {
            throw ProtocolError.invalidParams(`Tool ${params.name} not found`);
        }

        const taskSupport: TaskSupport = registered.tool.execution?.taskSupport ?? 'forbidden';
        const args = params.arguments ?? {};
        const taskParams = this._options.tasks?.toolCalls ? params.task : undefined;

        if (taskParams) {
            if (taskSupport === 'forbidden') {
                throw ProtocolError.invalidParams(`Tool ${params.name} does not support task-augmented execution`);
            }

            const { taskStore, limiter } = this._options;
            const release = limiter.acquire();
            let entry: TaskEntry;
            try {
                entry = taskStore.createTask({
                    sessionId: session.sessionId,
                    toolName: params.name,
                    ttl: taskParams.ttl,
                    pollInterval: taskParams.pollInterval
                });
            } catch (error) {
                release();
                throw error;
            }

            const ctx: HandlerContext = {
                signal: entry.signal,
                requestId: request.id,
                sessionId: session.sessionId,
                session,
                taskId: entry.taskId,
                reportStatus: (status, statusMessage) => {
                    taskStore.updateStatus(entry, status, statusMessage);
                }
            };

            // Status notifications of this task must not reach the channel before its CreateTaskResult.
            scope.afterResponse(() => {
                void this._runTask(entry, registered.handler, args, ctx, release);
            });

            return { task: entry.snapshot() };
        }

        if (taskSupport === 'required') {
            throw ProtocolError.invalidParams(`Tool ${params.name} requires task-augmented execution`);
        }

        const ctx: HandlerContext = { signal, requestId: request.id, sessionId: session.sessionId, session };
        try {
            return await registered.handler(args, ctx);
        } catch (error) {
            if (error instanceof ProtocolError || signal.aborted) {
                throw error;
            }
            return toolError(error);
        }
    }

    /**
     * Runs a task body detached from the request that created it and records how it ended.
     * A body that finishes after the task was cancelled or expired changes nothing.
     * Never rejects.
     */
    private async _runTask(
        entry: TaskEntry,
        handler: ToolHandler,
        args: Record<string, unknown>,
        ctx: HandlerContext,
        release: () => void
    ): Promise<void> {
        const { taskStore } = this._options;
        if (entry.signal.aborted) {
            release();
            return;
        }
        try {
            const result = await handler(args, ctx);
            taskStore.completeTask(entry, result);
        } catch (error) {
            taskStore.completeTask(entry, undefined, error);
        } finally {
            release();
        }
    }

    private _getTask(request: JSONRPCRequest, session: ClientSession): Result {
        const { taskId } = parseParams(GetTaskRequestSchema.shape.params, request.params, request.method);
        return this._options.taskStore.getTask(taskId, session.sessionId).task;
    }

    private _listTasks(request: JSONRPCRequest, session: ClientSession): Result {
        const params = parseParams(ListTasksRequestSchema.shape.params, request.params, request.method);
        return this._options.taskStore.listTasksPage({ cursor: params?.cursor, sessionId: session.sessionId });
    }

    private _cancelTask(request: JSONRPCRequest, session: ClientSession): Result {
        const { taskId } = parseParams(CancelTaskRequestSchema.shape.params, request.params, request.method);
        return this._options.taskStore.cancelTask(taskId, session.sessionId);
    }

    private async _getTaskResult(request: JSONRPCRequest, session: ClientSession, signal: AbortSignal): Promise<Result> {
        const { taskId } = parseParams(GetTaskPayloadRequestSchema.shape.params, request.params, request.method);
        const outcome = await this._options.taskStore.waitForResult(taskId, { signal, sessionId: session.sessionId });

        switch (outcome.status) {
            case 'completed': {
                return withRelatedTask(outcome.result, taskId);
            }
            case 'failed': {
                return withRelatedTask(toolError(outcome.error), taskId);
            }
            case 'cancelled': {
                throw ProtocolError.invalidParams('Task was cancelled', { taskId, reason: outcome.reason });
            }
        }
    }
}

function inFlightKey(sessionId: string, requestId: RequestId): string {
    return `${sessionId}\u0000${typeof requestId}:${requestId}`;
}

function parseParams<T>(schema: z.ZodType<T>, params: unknown, method: string): T {
    const parsed = schema.safeParse(params ?? {});
    if (!parsed.success) {
        throw ProtocolError.invalidParams(`Invalid params for ${method}: ${z.prettifyError(parsed.error)}`);
    }
    return parsed.data;
}

function toolError(error: unknown): CallToolResult {
    return {
        content: [{ type: 'text', text: error instanceof Error ? error.message : String(error) }],
        isError: true
    };
}

function withRelatedTask(result: CallToolResult, taskId: string): CallToolResult {
    return {
        ...result,
        _meta: { ...result._meta, [RELATED_TASK_META_KEY]: { taskId } }
    };
}
