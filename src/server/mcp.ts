import { CapabilityError, StateError } from '../errors.js';
import type { Logger } from '../shared/logger.js';
import type { Transport } from '../shared/transport.js';
import type {
    CreateMessageRequestParams,
    CreateMessageResult,
    ElicitResult,
    Implementation,
    JSONRPCMessage,
    JSONRPCRequest,
    JSONRPCResponse,
    ListRootsResult,
    ServerCapabilities,
    Task,
    Tool
} from '../types.js';
import type { ResolvedServerOptions, ServerOptions } from './config.js';
import { resolveServerOptions } from './config.js';
import type { HandleRequestOptions, HandlerContext, RegisteredTool, TaskSupport, ToolHandler } from './dispatcher.js';
import { RequestDispatcher } from './dispatcher.js';
import type { FormElicitationParams, UrlElicitationParams } from './session.js';
import { ClientSession } from './session.js';
import { SessionRegistry } from './sessions.js';
import { ConcurrencyLimiter } from './tasks/limiter.js';
import type { TaskEntry } from './tasks/taskStore.js';
import { InMemoryTaskStore } from './tasks/taskStore.js';

export interface ToolConfig {
    title?: string;
    description?: string;

    /**
     * JSON Schema of the arguments. Not enforced; published through `tools/list`.
     */
    inputSchema?: Tool['inputSchema'];

    /**
     * Defaults to `forbidden`.
     */
    taskSupport?: TaskSupport;
}

/**
 * An MCP server: session registry, task store and request dispatcher behind one object.
 *
 * Each connected transport gets its own {@link ClientSession}. Tool handlers receive a
 * {@link HandlerContext} naming that session; the client-callback methods of this class
 * (`requestElicitation`, `listRoots`, `createMessage`, ...) take that context to know
 * which client to ask.
 */
export class McpServer {
    readonly sessions: SessionRegistry;
    readonly tasks: InMemoryTaskStore;

    private readonly _options: ResolvedServerOptions;
    private readonly _logger: Logger;
    private readonly _limiter: ConcurrencyLimiter;
    private readonly _tools = new Map<string, RegisteredTool>();
    private readonly _dispatcher: RequestDispatcher;
    private readonly _rootsListeners = new Set<(session: ClientSession) => void>();
    private _closed = false;

    constructor(
        private readonly _serverInfo: Implementation,
        options: ServerOptions = {}
    ) {
        this._options = resolveServerOptions(options);
        this._logger = this._options.logger;
        this._limiter = new ConcurrencyLimiter(this._options.maxConcurrentTasks);

        this.tasks = new InMemoryTaskStore({
            defaultPollInterval: this._options.defaultPollInterval,
            maxTtl: this._options.maxTtl,
            ttlPolicy: this._options.ttlPolicy,
            sweepInterval: this._options.sweepInterval,
            hooks: this._options.taskHooks,
            logger: this._logger
        });

        this.sessions = new SessionRegistry({
            maxSessions: this._options.maxSessions,
            sessionTimeout: this._options.sessionTimeout,
            logger: this._logger,
            events: {
                onSessionUnregistered: session => {
                    this._dispatcher.abortSession(session.sessionId);
                    const cancelled = this.tasks.cancelSessionTasks(session.sessionId);
                    if (cancelled > 0) {
                        this._logger.info('Cancelled tasks of closed session', { sessionId: session.sessionId, cancelled });
                    }
                }
            }
        });

        this._dispatcher = new RequestDispatcher({
            serverInfo: this._serverInfo,
            instructions: this._options.instructions,
            capabilities: this.capabilities,
            tasks: this._options.tasks,
            tools: this._tools,
            taskStore: this.tasks,
            limiter: this._limiter,
            logger: this._logger,
            onRootsListChanged: session => this._emitRootsListChanged(session)
        });

        if (this._options.tasks) {
            this.tasks.onStatusChange((task, entry) => this._sendTaskStatus(task, entry));
        }
    }

    /**
     * What this server advertises in its `initialize` result.
     */
    get capabilities(): ServerCapabilities {
        const capabilities: ServerCapabilities = { tools: {}, logging: {} };
        const tasks = this._options.tasks;
        if (tasks) {
            capabilities.tasks = {
                ...(tasks.list ? { list: {} } : {}),
                ...(tasks.cancel ? { cancel: {} } : {}),
                ...(tasks.toolCalls ? { requests: { tools: { call: {} } } } : {})
            };
        }
        return capabilities;
    }

    get limiter(): ConcurrencyLimiter {
        return this._limiter;
    }

    /**
     * Registers a tool.
     *
     * @throws {Error} when the name is taken, or when the tool requires task execution on a
     * server that does not run tool calls as tasks.
     */
    registerTool(name: string, config: ToolConfig, handler: ToolHandler): void {
        if (this._tools.has(name)) {
            throw new Error(`Tool ${name} is already registered`);
        }

        const taskSupport = config.taskSupport ?? 'forbidden';
        if (taskSupport === 'required' && !this._options.tasks?.toolCalls) {
            throw new Error(`Tool ${name} requires task execution, but task-augmented tool calls are not enabled`);
        }

        const tool: Tool = {
            name,
            inputSchema: config.inputSchema ?? { type: 'object' },
            execution: { taskSupport }
        };
        if (config.title !== undefined) {
            tool.title = config.title;
        }
        if (config.description !== undefined) {
            tool.description = config.description;
        }

        this._tools.set(name, { tool, handler });
    }

    /**
     * Creates and registers a session that is not bound to a transport yet.
     */
    createSession(sessionId?: string): ClientSession {
        if (this._closed) {
            throw StateError.invalidState('Server is closed');
        }
        const session = new ClientSession({
            sessionId,
            channelCapacity: this._options.maxQueuedMessages,
            requestTimeout: this._options.requestTimeout,
            logger: this._logger
        });
        this.sessions.register(session);
        return session;
    }

    /**
     * Dispatches an inbound message for `session`. Responses go to the session's channel.
     */
    handleMessage(session: ClientSession, message: JSONRPCMessage): Promise<void> {
        this.sessions.touch(session.sessionId);
        return this._dispatcher.handleMessage(session, message);
    }

    /**
     * Runs one request and hands its response back instead of queueing it.
     * Resolves to undefined when the request was cancelled, by the client or through `options.signal`.
     */
    handleRequest(
        session: ClientSession,
        request: JSONRPCRequest,
        options?: HandleRequestOptions
    ): Promise<JSONRPCResponse | undefined> {
        this.sessions.touch(session.sessionId);
        return this._dispatcher.handleRequest(session, request, options);
    }

    /**
     * Inbound requests still being handled, across all sessions.
     */
    get inFlightRequests(): number {
        return this._dispatcher.inFlightCount;
    }

    /**
     * Attaches to the given transport, starts it, and starts listening for messages.
     *
     * The server assumes ownership of the transport, replacing any callbacks that have already
     * been set. The session created for it lives until the transport closes.
     */
    async connect(transport: Transport): Promise<ClientSession> {
        const session = this.createSession(transport.sessionId);
        let transportClosed = false;

        transport.onmessage = message => {
            this.handleMessage(session, message).catch(error => {
                this._logger.error('Failed to handle message', {
                    sessionId: session.sessionId,
                    error: error instanceof Error ? error.message : String(error)
                });
            });
        };
        transport.onerror = error => {
            this._logger.warning('Transport error', { sessionId: session.sessionId, error: error.message });
        };
        transport.onclose = () => {
            transportClosed = true;
            this.sessions.unregister(session.sessionId, 'Transport closed');
        };

        await transport.start();

        void this._pump(session, transport, () => transportClosed);
        return session;
    }

    /**
     * Asks the client behind `ctx` to fill in a form.
     *
     * For a task-augmented call the task shows `input_required` while the client answers.
     *
     * @throws {StateError} when `ctx` names no live session.
     * @throws {CapabilityError} when the server or the client does not support form elicitation.
     * The task status is left untouched and nothing is sent.
     */
    async requestElicitation(ctx: HandlerContext | undefined, params: FormElicitationParams): Promise<ElicitResult> {
        const session = this._activeSession(ctx, 'request elicitation');
        this._assertServerElicitation('elicitation/create');
        if (!session.supports('elicitation.form')) {
            throw CapabilityError.clientDoesNotSupport('elicitation', 'elicitation/create');
        }
        return this._awaitingInput(ctx, params.message, () => session.elicitInput(params, { signal: ctx?.signal }));
    }

    /**
     * Asks the client behind `ctx` to open a URL. See {@link McpServer.sendElicitationComplete}.
     */
    async requestUrlElicitation(ctx: HandlerContext | undefined, params: UrlElicitationParams): Promise<ElicitResult> {
        const session = this._activeSession(ctx, 'request URL elicitation');
        this._assertServerElicitation('elicitation/create');
        if (!session.supports('elicitation.url')) {
            throw CapabilityError.clientDoesNotSupport('elicitation.url', 'elicitation/create');
        }
        return this._awaitingInput(ctx, params.message, () => session.elicitUrl(params, { signal: ctx?.signal }));
    }

    sendElicitationComplete(ctx: HandlerContext | undefined, elicitationId: string): void {
        const session = this._activeSession(ctx, 'complete elicitation');
        this._assertServerElicitation('notifications/elicitation/complete');
        session.sendElicitationComplete(elicitationId);
    }

    async listRoots(ctx: HandlerContext | undefined): Promise<ListRootsResult> {
        const session = this._activeSession(ctx, 'list roots');
        return session.listRoots({ signal: ctx?.signal });
    }

    async createMessage(ctx: HandlerContext | undefined, params: CreateMessageRequestParams): Promise<CreateMessageResult> {
        const session = this._activeSession(ctx, 'create message');
        return session.createMessage(params, { signal: ctx?.signal });
    }

    /**
     * Subscribes to `notifications/roots/list_changed` from any session. Returns the unsubscribe function.
     */
    onRootsListChanged(listener: (session: ClientSession) => void): () => void {
        this._rootsListeners.add(listener);
        return () => {
            this._rootsListeners.delete(listener);
        };
    }

    /**
     * Closes every session and stops the task sweep. Running task bodies are aborted.
     */
    async close(): Promise<void> {
        if (this._closed) {
            return;
        }
        this._closed = true;
        this.sessions.close();
        this.tasks.close();
    }

    private async _pump(session: ClientSession, transport: Transport, transportClosed: () => boolean): Promise<void> {
        for await (const message of session.channel) {
            try {
                await transport.send(message);
            } catch (error) {
                this._logger.error('Failed to send message', {
                    sessionId: session.sessionId,
                    error: error instanceof Error ? error.message : String(error)
                });
                this.sessions.unregister(session.sessionId, 'Send failed');
                break;
            }
        }

        if (!transportClosed()) {
            try {
                await transport.close();
            } catch (error) {
                this._logger.warning('Failed to close transport', {
                    sessionId: session.sessionId,
                    error: error instanceof Error ? error.message : String(error)
                });
            }
        }
    }

    private _activeSession(ctx: HandlerContext | undefined, operation: string): ClientSession {
        const session = ctx?.session;
        if (!session || session.closed) {
            throw StateError.noActiveSession(operation);
        }
        return session;
    }

    private _assertServerElicitation(method: string): void {
        if (!this._options.elicitation) {
            throw CapabilityError.serverDoesNotSupport('elicitation', method);
        }
    }

    private async _awaitingInput<T>(ctx: HandlerContext | undefined, message: string, ask: () => Promise<T>): Promise<T> {
        ctx?.reportStatus?.('input_required', message);
        try {
            return await ask();
        } finally {
            ctx?.reportStatus?.('working');
        }
    }

    private _emitRootsListChanged(session: ClientSession): void {
        for (const listener of this._rootsListeners) {
            try {
                listener(session);
            } catch (error) {
                this._logger.warning('Roots listener threw', {
                    sessionId: session.sessionId,
                    error: error instanceof Error ? error.message : String(error)
                });
            }
        }
    }

    private _sendTaskStatus(task: Task, entry: TaskEntry): void {
        if (entry.sessionId === undefined) {
            return;
        }
        const session = this.sessions.get(entry.sessionId);
        if (!session?.initialized) {
            return;
        }
        try {
            session.sendTaskStatus(task);
        } catch (error) {
            this._logger.debug('Could not deliver task status', {
                taskId: task.taskId,
                error: error instanceof Error ? error.message : String(error)
            });
        }
    }
}
