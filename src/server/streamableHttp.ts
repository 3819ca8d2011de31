import type { ErrorRequestHandler, Express, Request, Response, Router } from 'express';
import express from 'express';

import type { JSONRPCMessage, JSONRPCRequest, JSONRPCResponse } from '../types.js';
import { ErrorCode, JSONRPC_VERSION, JSONRPCMessageSchema } from '../types.js';
import type { McpServer } from './mcp.js';
import type { ClientSession } from './session.js';

const DEFAULT_MAX_BODY_BYTES = 100 * 1024; // Express default (100kb), made explicit.

export const SESSION_ID_HEADER = 'mcp-session-id';

function hasStringType(error: unknown): error is { type: string } {
    return typeof error === 'object' && error !== null && 'type' in error && typeof error.type === 'string';
}

function sendJsonRpcError(res: Response, status: number, code: number, message: string): void {
    res.status(status).json({
        jsonrpc: JSONRPC_VERSION,
        error: { code, message },
        id: null
    });
}

// Ensure body parsing failures return JSON-RPC-shaped errors (instead of HTML).
const jsonBodyErrorHandler: ErrorRequestHandler = (error, _req, res, next) => {
    if (res.headersSent) return next(error);

    const type = hasStringType(error) ? error.type : '';
    if (type === 'entity.too.large') {
        sendJsonRpcError(res, 413, ErrorCode.ConnectionClosed, 'Payload too large');
        return;
    }
    if (type === 'entity.parse.failed') {
        sendJsonRpcError(res, 400, ErrorCode.ParseError, 'Parse error: Invalid JSON');
        return;
    }

    next(error);
};

function isRequest(message: JSONRPCMessage): message is JSONRPCRequest {
    return 'method' in message && 'id' in message;
}

function acceptsOnlyEventStream(req: Request): boolean {
    const accept = req.header('accept') ?? '';
    return accept.includes('text/event-stream') && !accept.includes('application/json');
}

function writeEvent(res: Response, message: JSONRPCMessage): void {
    if (res.destroyed) {
        return;
    }
    res.write(`event: message\ndata: ${JSON.stringify(message)}\n\n`);
}

/**
 * Writes the session's outbound messages as SSE events until the channel closes or `signal` aborts.
 */
async function pumpChannel(session: ClientSession, res: Response, signal: AbortSignal): Promise<void> {
    while (true) {
        const next = await session.channel.next(signal);
        if (next.done) {
            return;
        }
        writeEvent(res, next.value);
    }
}

/**
 * Options for the Streamable HTTP binding.
 */
export interface StreamableHttpOptions {
    /**
     * Maximum size (in bytes) for JSON request bodies. Defaults to 100kb.
     */
    maxBodyBytes?: number;
}

/**
 * Express router binding an {@link McpServer} to Streamable HTTP.
 *
 * - `POST` carries client messages. An `initialize` request without the `Mcp-Session-Id`
 *   header opens a session; everything else must name a known session. Responses to
 *   requests come back in the POST response body. A client that accepts only
 *   `text/event-stream` gets an SSE stream that also carries the session's notifications
 *   and requests until the responses are written, unless a `GET` stream is open.
 *   Closing the connection cancels the requests.
 * - `GET` opens the server-to-client SSE stream of a session: notifications and
 *   server-initiated requests such as elicitation. One stream per session.
 * - `DELETE` terminates a session.
 */
export function createStreamableHttpRouter(server: McpServer, options: StreamableHttpOptions = {}): Router {
    const router = express.Router();
    const streaming = new Set<string>();

    router.use(express.json({ limit: options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES }));
    router.use(jsonBodyErrorHandler);

    const lookupSession = (req: Request, res: Response): ClientSession | undefined => {
        const sessionId = req.header(SESSION_ID_HEADER);
        if (!sessionId) {
            sendJsonRpcError(res, 400, ErrorCode.InvalidRequest, 'Bad Request: Mcp-Session-Id header is required');
            return undefined;
        }
        const session = server.sessions.get(sessionId);
        if (!session) {
            sendJsonRpcError(res, 404, ErrorCode.InvalidRequest, 'Session not found');
            return undefined;
        }
        return session;
    };

    const handlePost = async (req: Request, res: Response): Promise<void> => {
        const body: unknown = req.body;
        const batch = Array.isArray(body);
        const parsed = JSONRPCMessageSchema.array().min(1).safeParse(batch ? body : [body]);
        if (!parsed.success) {
            sendJsonRpcError(res, 400, ErrorCode.InvalidRequest, 'Invalid Request: expected JSON-RPC message(s)');
            return;
        }

        const messages = parsed.data;
        const initializing = messages.some(message => isRequest(message) && message.method === 'initialize');

        let session: ClientSession;
        let created = false;
        if (initializing && req.header(SESSION_ID_HEADER) === undefined) {
            if (messages.length > 1) {
                sendJsonRpcError(res, 400, ErrorCode.InvalidRequest, 'Invalid Request: Only one initialization request is allowed');
                return;
            }
            session = server.createSession();
            created = true;
        } else {
            const found = lookupSession(req, res);
            if (!found) {
                return;
            }
            session = found;
        }

        const requests: JSONRPCRequest[] = [];
        for (const message of messages) {
            if (isRequest(message)) {
                requests.push(message);
            } else {
                await server.handleMessage(session, message);
            }
        }

        if (requests.length === 0) {
            res.status(202).end();
            return;
        }

        // A client that goes away cancels what it was waiting for.
        const disconnected = new AbortController();
        res.on('close', () => {
            if (!res.writableFinished) {
                disconnected.abort(new Error('Client disconnected'));
            }
        });
        const handleAll = () =>
            Promise.all(requests.map(request => server.handleRequest(session, request, { signal: disconnected.signal }))).then(settled =>
                settled.filter((response): response is JSONRPCResponse => response !== undefined)
            );

        if (!created && acceptsOnlyEventStream(req) && !streaming.has(session.sessionId)) {
            // The POST stream carries what the session emits while its requests run, then their responses.
            streaming.add(session.sessionId);
            res.writeHead(200, {
                'Content-Type': 'text/event-stream',
                'Cache-Control': 'no-cache',
                [SESSION_ID_HEADER]: session.sessionId
            });
            const finished = new AbortController();
            try {
                const [responses] = await Promise.all([
                    handleAll().finally(() => finished.abort()),
                    pumpChannel(session, res, finished.signal)
                ]);
                for (const message of session.channel.drain()) {
                    writeEvent(res, message);
                }
                for (const response of responses) {
                    writeEvent(res, response);
                }
            } finally {
                streaming.delete(session.sessionId);
                res.end();
            }
            return;
        }

        const responses = await handleAll();
        if (created && (disconnected.signal.aborted || responses.some(response => 'error' in response))) {
            server.sessions.unregister(session.sessionId, 'Initialization failed');
        } else {
            res.setHeader(SESSION_ID_HEADER, session.sessionId);
        }
        if (disconnected.signal.aborted) {
            return;
        }

        if (responses.length === 0) {
            res.status(202).end();
            return;
        }

        if (acceptsOnlyEventStream(req)) {
            res.writeHead(200, { 'Content-Type': 'text/event-stream', 'Cache-Control': 'no-cache' });
            for (const response of responses) {
                writeEvent(res, response);
            }
            res.end();
            return;
        }

        res.status(200).json(batch ? responses : responses[0]);
    };

    const handleGet = async (req: Request, res: Response): Promise<void> => {
        if (!(req.header('accept') ?? '').includes('text/event-stream')) {
            sendJsonRpcError(res, 406, ErrorCode.InvalidRequest, 'Not Acceptable: Client must accept text/event-stream');
            return;
        }
        const session = lookupSession(req, res);
        if (!session) {
            return;
        }
        if (streaming.has(session.sessionId)) {
            sendJsonRpcError(res, 409, ErrorCode.InvalidRequest, 'Conflict: Only one SSE stream is allowed per session');
            return;
        }

        streaming.add(session.sessionId);
        const disconnected = new AbortController();
        res.on('close', () => disconnected.abort());

        res.writeHead(200, {
            'Content-Type': 'text/event-stream',
            'Cache-Control': 'no-cache',
            Connection: 'keep-alive',
            [SESSION_ID_HEADER]: session.sessionId
        });
        res.flushHeaders();

        try {
            await pumpChannel(session, res, disconnected.signal);
        } finally {
            streaming.delete(session.sessionId);
            res.end();
        }
    };

    router.post('/', (req, res, next) => {
        handlePost(req, res).catch(next);
    });

    router.get('/', (req, res, next) => {
        handleGet(req, res).catch(next);
    });

    router.delete('/', (req, res) => {
        const sessionId = req.header(SESSION_ID_HEADER);
        if (!sessionId) {
            sendJsonRpcError(res, 400, ErrorCode.InvalidRequest, 'Bad Request: Mcp-Session-Id header is required');
            return;
        }
        if (!server.sessions.unregister(sessionId, 'Terminated by client')) {
            sendJsonRpcError(res, 404, ErrorCode.InvalidRequest, 'Session not found');
            return;
        }
        res.status(200).end();
    });

    return router;
}

/**
 * Options for creating an MCP Express application.
 */
export interface CreateMcpExpressAppOptions extends StreamableHttpOptions {
    /**
     * Where the MCP endpoint is mounted. Defaults to `/mcp`.
     */
    path?: string;
}

/**
 * Creates an Express application serving `server` over Streamable HTTP.
 *
 * @example
 * ```typescript
 * const app = createMcpExpressApp(server);
 * app.listen(3000);
 * ```
 */
export function createMcpExpressApp(server: McpServer, options: CreateMcpExpressAppOptions = {}): Express {
    const { path = '/mcp', ...routerOptions } = options;

    const app = express();
    app.use(path, createStreamableHttpRouter(server, routerOptions));

    return app;
}
