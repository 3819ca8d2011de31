import type { ZodType } from 'zod/v4';

import { CapabilityError, ProtocolError, StateError, TransportError } from '../errors.js';
import type { WaitOptions } from '../shared/correlation.js';
import { CorrelationTable, DEFAULT_REQUEST_TIMEOUT_MSEC } from '../shared/correlation.js';
import type { Logger } from '../shared/logger.js';
import { silentLogger } from '../shared/logger.js';
import { DEFAULT_CHANNEL_CAPACITY, OutboundChannel } from '../shared/outboundChannel.js';
import type {
    ClientCapabilities,
    CreateMessageRequestParams,
    CreateMessageResult,
    ElicitRequestFormParams,
    ElicitRequestURLParams,
    ElicitResult,
    Implementation,
    JSONRPCErrorResponse,
    JSONRPCMessage,
    JSONRPCResultResponse,
    ListRootsResult,
    LoggingLevel,
    Result,
    Task
} from '../types.js';
import { CreateMessageResultSchema, ElicitResultSchema, JSONRPC_VERSION, ListRootsResultSchema } from '../types.js';
import { generateSessionId } from './sessions.js';

/**
 * Client features the server can ask about before sending a request that needs one.
 */
export type ClientFeature = 'roots' | 'sampling' | 'elicitation.form' | 'elicitation.url' | 'tasks';

/**
 * Form elicitation as a handler writes it; the mode is filled in when sending.
 */
export type FormElicitationParams = Pick<ElicitRequestFormParams, 'message' | 'requestedSchema' | '_meta'>;

/**
 * URL elicitation as a handler writes it; the mode is filled in when sending.
 */
export type UrlElicitationParams = Pick<ElicitRequestURLParams, 'message' | 'elicitationId' | 'url' | '_meta'>;

export interface ClientSessionOptions {
    sessionId?: string;

    /**
     * Capacity of the outbound channel. Defaults to 1000 messages.
     */
    channelCapacity?: number;

    /**
     * Default timeout for server-to-client requests. Defaults to 60 seconds.
     */
    requestTimeout?: number;

    logger?: Logger;
}

/**
 * Parameters recorded from the client's `initialize` request.
 */
export interface InitializeInfo {
    protocolVersion: string;
    capabilities: ClientCapabilities;
    clientInfo: Implementation;
}

/**
 * State of one client connection.
 *
 * The session owns a single outbound channel: notifications, server-to-client requests and
 * responses to the client's requests all go through it, so the transport sees them in the
 * order they were queued. Server-to-client requests are matched with their responses through
 * the session's correlation table.
 */
export class ClientSession {
    readonly sessionId: string;
    readonly channel: OutboundChannel<JSONRPCMessage>;

    private readonly _pending: CorrelationTable;
    private readonly _requestTimeout: number;
    private readonly _logger: Logger;
    private _info?: Readonly<InitializeInfo>;
    private _initialized = false;
    private _closed = false;
    private _closeListeners: Array<() => void> = [];

    constructor(options: ClientSessionOptions = {}) {
        this.sessionId = options.sessionId ?? generateSessionId();
        this.channel = new OutboundChannel<JSONRPCMessage>(options.channelCapacity ?? DEFAULT_CHANNEL_CAPACITY);
        this._logger = options.logger ?? silentLogger;
        this._pending = new CorrelationTable(this._logger);
        this._requestTimeout = options.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT_MSEC;
    }

    /**
     * Capabilities the client declared at initialization. Frozen once set.
     */
    get capabilities(): Readonly<ClientCapabilities> | undefined {
        return this._info?.capabilities;
    }

    get clientInfo(): Readonly<Implementation> | undefined {
        return this._info?.clientInfo;
    }

    get protocolVersion(): string | undefined {
        return this._info?.protocolVersion;
    }

    /**
     * True once the client has sent `notifications/initialized`.
     */
    get initialized(): boolean {
        return this._initialized;
    }

    get closed(): boolean {
        return this._closed;
    }

    /**
     * Number of server-to-client requests awaiting a response.
     */
    get pendingRequestCount(): number {
        return this._pending.size;
    }

    /**
     * Records what the client sent in `initialize`. Allowed once per session.
     */
    beginInitialize(info: InitializeInfo): void {
        if (this._closed) {
            throw StateError.sessionClosed(this.sessionId);
        }
        if (this._info) {
            throw ProtocolError.invalidRequest('Session is already initialized');
        }
        this._info = Object.freeze({
            protocolVersion: info.protocolVersion,
            clientInfo: Object.freeze({ ...info.clientInfo }),
            capabilities: deepFreeze(structuredClone(info.capabilities))
        });
    }

    /**
     * Marks the handshake complete. Ignored until `initialize` has been seen.
     */
    markInitialized(): boolean {
        if (!this._info || this._closed) {
            return false;
        }
        this._initialized = true;
        return true;
    }

    supports(feature: ClientFeature): boolean {
        const capabilities = this._info?.capabilities;
        if (!capabilities) {
            return false;
        }

        switch (feature) {
            case 'roots':
                return capabilities.roots !== undefined;
            case 'sampling':
                return capabilities.sampling !== undefined;
            case 'tasks':
                return capabilities.tasks !== undefined;
            case 'elicitation.form': {
                const elicitation = capabilities.elicitation;
                if (!elicitation) {
                    return false;
                }
                // An empty elicitation capability predates modes and means form support.
                return elicitation.form !== undefined || elicitation.url === undefined;
            }
            case 'elicitation.url':
                return capabilities.elicitation?.url !== undefined;
        }
    }

    /**
     * Queues any message for the client.
     *
     * @throws {TransportError} when the channel is closed or full.
     */
    send(message: JSONRPCMessage): void {
        this.channel.push(message);
    }

    /**
     * Queues a notification. Fire-and-forget: nothing waits for the client.
     */
    sendNotification(method: string, params?: Record<string, unknown>): void {
        this.send(params === undefined ? { jsonrpc: JSONRPC_VERSION, method } : { jsonrpc: JSONRPC_VERSION, method, params });
    }

    /**
     * Sends a request to the client and waits for its response.
     *
     * Settles on whichever comes first: the matching response, `options.signal` aborting,
     * the timeout, or the session closing. The correlation entry is gone afterwards in every case.
     *
     * @throws {TransportError} immediately, with nothing left registered, when the request
     * cannot be queued.
     */
    sendRequest(method: string, params?: Record<string, unknown>, options: WaitOptions = {}): Promise<Result> {
        if (this._closed) {
            return Promise.reject(TransportError.connectionClosed(`Session ${this.sessionId} is closed`));
        }

        const id = this._pending.nextId();
        const waiting = this._pending.register(id, method, {
            signal: options.signal,
            timeout: options.timeout ?? this._requestTimeout
        });

        try {
            this.send(params === undefined ? { jsonrpc: JSONRPC_VERSION, id, method } : { jsonrpc: JSONRPC_VERSION, id, method, params });
        } catch (error) {
            this._pending.cancel(id, error);
        }

        return waiting;
    }

    /**
     * Routes a response from the client to the waiter that sent the request.
     *
     * Returns false when no waiter is registered for the ID. The response is then dropped:
     * duplicates, late replies and replies to requests this session never made all end here.
     */
    resolveResponse(response: JSONRPCResultResponse | JSONRPCErrorResponse): boolean {
        if (response.id === null) {
            this._logger.debug('Dropping error response without an ID', { sessionId: this.sessionId });
            return false;
        }
        if ('error' in response) {
            return this._pending.reject(response.id, new ProtocolError(response.error.code, response.error.message, response.error.data));
        }
        return this._pending.resolve(response.id, response.result ?? {});
    }

    /**
     * Asks the client to fill in a form.
     *
     * @throws {CapabilityError} when the client did not declare form elicitation; nothing is sent.
     */
    async elicitInput(params: FormElicitationParams, options?: WaitOptions): Promise<ElicitResult> {
        if (!this.supports('elicitation.form')) {
            throw CapabilityError.clientDoesNotSupport('elicitation', 'elicitation/create');
        }
        const result = await this.sendRequest('elicitation/create', { ...params, mode: 'form' }, options);
        return parseResult(ElicitResultSchema, result, 'elicitation/create');
    }

    /**
     * Asks the client to send the user to an out-of-band URL. The answer only says whether the
     * user agreed to go; completion arrives later through {@link ClientSession.sendElicitationComplete}.
     *
     * @throws {CapabilityError} when the client did not declare URL elicitation; nothing is sent.
     */
    async elicitUrl(params: UrlElicitationParams, options?: WaitOptions): Promise<ElicitResult> {
        if (!this.supports('elicitation.url')) {
            throw CapabilityError.clientDoesNotSupport('elicitation.url', 'elicitation/create');
        }
        const result = await this.sendRequest('elicitation/create', { ...params, mode: 'url' }, options);
        return parseResult(ElicitResultSchema, result, 'elicitation/create');
    }

    /**
     * Tells the client an out-of-band elicitation finished. No response is expected.
     */
    sendElicitationComplete(elicitationId: string): void {
        if (!this.supports('elicitation.url')) {
            throw CapabilityError.clientDoesNotSupport('elicitation.url', 'notifications/elicitation/complete');
        }
        this.sendNotification('notifications/elicitation/complete', { elicitationId });
    }

    async listRoots(options?: WaitOptions): Promise<ListRootsResult> {
        if (!this.supports('roots')) {
            throw CapabilityError.clientDoesNotSupport('roots', 'roots/list');
        }
        const result = await this.sendRequest('roots/list', undefined, options);
        return parseResult(ListRootsResultSchema, result, 'roots/list');
    }

    async createMessage(params: CreateMessageRequestParams, options?: WaitOptions): Promise<CreateMessageResult> {
        if (!this.supports('sampling')) {
            throw CapabilityError.clientDoesNotSupport('sampling', 'sampling/createMessage');
        }
        const result = await this.sendRequest('sampling/createMessage', params, options);
        return parseResult(CreateMessageResultSchema, result, 'sampling/createMessage');
    }

    sendTaskStatus(task: Task): void {
        this.sendNotification('notifications/tasks/status', { task });
    }

    sendLoggingMessage(level: LoggingLevel, data: unknown, logger?: string): void {
        this.sendNotification('notifications/message', logger === undefined ? { level, data } : { level, data, logger });
    }

    /**
     * Registers a callback run once when the session closes.
     */
    onClose(listener: () => void): void {
        if (this._closed) {
            listener();
            return;
        }
        this._closeListeners.push(listener);
    }

    /**
     * Tears the session down: every pending request is rejected with a connection-closed error
     * and the outbound channel is closed. Idempotent.
     */
    close(reason: string = 'Session closed'): void {
        if (this._closed) {
            return;
        }
        this._closed = true;

        const rejected = this._pending.rejectAll(TransportError.connectionClosed(reason));
        this.channel.close();
        this._logger.debug('Session closed', { sessionId: this.sessionId, rejectedRequests: rejected });

        const listeners = this._closeListeners;
        this._closeListeners = [];
        for (const listener of listeners) {
            listener();
        }
    }
}

function parseResult<T>(schema: ZodType<T>, result: Result, method: string): T {
    const parsed = schema.safeParse(result);
    if (!parsed.success) {
        throw ProtocolError.invalidParams(`Invalid result for ${method}: ${parsed.error.message}`);
    }
    return parsed.data;
}

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null) {
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
        Object.freeze(value);
    }
    return value;
}
