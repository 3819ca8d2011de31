/**
 * Error hierarchy for the session and task layer.
 *
 * 1. Protocol errors cross the wire as JSON-RPC errors (`ProtocolError`).
 *    Store-level failures (task not found, cancel on a terminal task, limiter at capacity)
 *    are raised as protocol errors so the dispatcher can answer with them directly.
 *
 * 2. SDK errors (`SdkError` subclasses) are local and never cross the wire as-is:
 *    - StateError: no active session, session closed, not initialized
 *    - CapabilityError: the client did not negotiate a capability
 *    - TransportError: the outbound channel is closed or full, or the connection went away
 *    - TimeoutError: a server-to-client request did not get an answer in time
 */

import { ErrorCode } from './types.js';
import type { JSONRPCErrorResponse, RequestId } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════
// SDK Error Codes (for local errors that don't cross the wire)
// ═══════════════════════════════════════════════════════════════════════════

export enum SdkErrorCode {
    // State errors
    NO_ACTIVE_SESSION = 'NO_ACTIVE_SESSION',
    SESSION_CLOSED = 'SESSION_CLOSED',
    NOT_INITIALIZED = 'NOT_INITIALIZED',
    INVALID_STATE = 'INVALID_STATE',

    // Capability errors
    CAPABILITY_NOT_SUPPORTED = 'CAPABILITY_NOT_SUPPORTED',
    ELICITATION_NOT_SUPPORTED = 'ELICITATION_NOT_SUPPORTED',
    ROOTS_NOT_SUPPORTED = 'ROOTS_NOT_SUPPORTED',
    SAMPLING_NOT_SUPPORTED = 'SAMPLING_NOT_SUPPORTED',

    // Transport errors
    SEND_FAILED = 'SEND_FAILED',
    CHANNEL_CLOSED = 'CHANNEL_CLOSED',
    CHANNEL_FULL = 'CHANNEL_FULL',
    CONNECTION_CLOSED = 'CONNECTION_CLOSED',

    // Timeouts
    REQUEST_TIMEOUT = 'REQUEST_TIMEOUT'
}

// ═══════════════════════════════════════════════════════════════════════════
// Protocol Errors (cross the wire as JSON-RPC errors)
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Protocol-level errors that cross the wire as JSON-RPC errors, with a fixed code.
 */
export class ProtocolError extends Error {
    readonly isProtocolLevel = true as const;

    constructor(
        public readonly code: number,
        message: string,
        public readonly data?: unknown
    ) {
        super(`MCP error ${code}: ${message}`);
        this.name = 'ProtocolError';
    }

    /**
     * Creates a parse error (-32700)
     */
    static parseError(message: string = 'Parse error', data?: unknown): ProtocolError {
        return new ProtocolError(ErrorCode.ParseError, message, data);
    }

    /**
     * Creates an invalid request error (-32600)
     */
    static invalidRequest(message: string = 'Invalid request', data?: unknown): ProtocolError {
        return new ProtocolError(ErrorCode.InvalidRequest, message, data);
    }

    /**
     * Creates a method not found error (-32601)
     */
    static methodNotFound(method: string, data?: unknown): ProtocolError {
        return new ProtocolError(ErrorCode.MethodNotFound, `Method not found: ${method}`, data);
    }

    /**
     * Creates an invalid params error (-32602)
     */
    static invalidParams(message: string = 'Invalid params', data?: unknown): ProtocolError {
        return new ProtocolError(ErrorCode.InvalidParams, message, data);
    }

    /**
     * Creates an internal error (-32603)
     */
    static internalError(message: string = 'Internal error', data?: unknown): ProtocolError {
        return new ProtocolError(ErrorCode.InternalError, message, data);
    }

    /**
     * Creates a resource exhausted error (-32003), raised when the task limiter is at capacity.
     */
    static resourceExhausted(message: string = 'Resource exhausted', data?: unknown): ProtocolError {
        return new ProtocolError(ErrorCode.ResourceExhausted, message, data);
    }

    /**
     * A missing, expired or foreign task. Reported as invalid params so that an expired ID
     * looks exactly like one that never existed.
     */
    static taskNotFound(taskId: string): ProtocolError {
        return new ProtocolError(ErrorCode.InvalidParams, `Task not found: ${taskId}`);
    }
}

// ═══════════════════════════════════════════════════════════════════════════
// SDK Error Hierarchy (local errors - don't cross the wire)
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base class for local errors.
 */
export abstract class SdkError extends Error {
    abstract readonly code: SdkErrorCode;

    /**
     * Whether retrying the operation may succeed
     */
    readonly recoverable: boolean = false;

    constructor(message: string) {
        super(message);
        this.name = this.constructor.name;
    }
}

/**
 * Errors related to session state.
 */
export class StateError extends SdkError {
    readonly code: SdkErrorCode;

    constructor(
        code: SdkErrorCode.NO_ACTIVE_SESSION | SdkErrorCode.SESSION_CLOSED | SdkErrorCode.NOT_INITIALIZED | SdkErrorCode.INVALID_STATE,
        message: string
    ) {
        super(message);
        this.code = code;
    }

    /**
     * No client session is bound to the handler context the call was made from.
     */
    static noActiveSession(operation: string = 'perform this operation'): StateError {
        return new StateError(SdkErrorCode.NO_ACTIVE_SESSION, `Cannot ${operation}: no active session`);
    }

    static sessionClosed(sessionId: string): StateError {
        return new StateError(SdkErrorCode.SESSION_CLOSED, `Session ${sessionId} is closed`);
    }

    static notInitialized(sessionId: string): StateError {
        return new StateError(SdkErrorCode.NOT_INITIALIZED, `Session ${sessionId} has not completed initialization`);
    }

    static invalidState(message: string): StateError {
        return new StateError(SdkErrorCode.INVALID_STATE, message);
    }
}

type CapabilityErrorCode =
    | SdkErrorCode.CAPABILITY_NOT_SUPPORTED
    | SdkErrorCode.ELICITATION_NOT_SUPPORTED
    | SdkErrorCode.ROOTS_NOT_SUPPORTED
    | SdkErrorCode.SAMPLING_NOT_SUPPORTED;

/**
 * Errors related to missing or unsupported capabilities.
 */
export class CapabilityError extends SdkError {
    readonly code: CapabilityErrorCode;

    constructor(
        public readonly capability: string,
        public readonly requiredFor?: string,
        code: CapabilityErrorCode = SdkErrorCode.CAPABILITY_NOT_SUPPORTED
    ) {
        const message = requiredFor
            ? `Capability '${capability}' is not supported (required for ${requiredFor})`
            : `Capability '${capability}' is not supported`;
        super(message);
        this.code = code;
    }

    /**
     * Creates a capability error for a missing client capability
     */
    static clientDoesNotSupport(capability: string, requiredFor?: string): CapabilityError {
        return new CapabilityError(capability, requiredFor, codeForCapability(capability));
    }

    /**
     * Creates a capability error for a capability this server was not configured with
     */
    static serverDoesNotSupport(capability: string, requiredFor?: string): CapabilityError {
        return new CapabilityError(capability, requiredFor, codeForCapability(capability));
    }
}

function codeForCapability(capability: string): CapabilityErrorCode {
    if (capability.startsWith('elicitation')) {
        return SdkErrorCode.ELICITATION_NOT_SUPPORTED;
    }
    if (capability === 'roots') {
        return SdkErrorCode.ROOTS_NOT_SUPPORTED;
    }
    if (capability === 'sampling') {
        return SdkErrorCode.SAMPLING_NOT_SUPPORTED;
    }
    return SdkErrorCode.CAPABILITY_NOT_SUPPORTED;
}

/**
 * Errors related to delivering messages to the client. All of them are worth a retry.
 */
export class TransportError extends SdkError {
    readonly code: SdkErrorCode;
    override readonly recoverable = true;

    constructor(
        code: SdkErrorCode.SEND_FAILED | SdkErrorCode.CHANNEL_CLOSED | SdkErrorCode.CHANNEL_FULL | SdkErrorCode.CONNECTION_CLOSED,
        message: string,
        public override readonly cause?: Error
    ) {
        super(message);
        this.code = code;
    }

    static sendFailed(message: string = 'Failed to send message', cause?: Error): TransportError {
        return new TransportError(SdkErrorCode.SEND_FAILED, message, cause);
    }

    static channelClosed(): TransportError {
        return new TransportError(SdkErrorCode.CHANNEL_CLOSED, 'Outbound channel is closed');
    }

    static channelFull(capacity: number): TransportError {
        return new TransportError(SdkErrorCode.CHANNEL_FULL, `Outbound channel is full (capacity ${capacity})`);
    }

    static connectionClosed(message: string = 'Connection closed'): TransportError {
        return new TransportError(SdkErrorCode.CONNECTION_CLOSED, message);
    }
}

/**
 * A server-to-client request that was not answered in time.
 */
export class TimeoutError extends SdkError {
    readonly code = SdkErrorCode.REQUEST_TIMEOUT as const;

    constructor(
        public readonly method: string,
        public readonly timeout: number
    ) {
        super(`Request ${method} timed out after ${timeout}ms`);
    }
}

// ═══════════════════════════════════════════════════════════════════════════
// Type Guards
// ═══════════════════════════════════════════════════════════════════════════

export function isProtocolError(error: unknown): error is ProtocolError {
    return error instanceof ProtocolError;
}

export function isSdkError(error: unknown): error is SdkError {
    return error instanceof SdkError;
}

export function isCapabilityError(error: unknown): error is CapabilityError {
    return error instanceof CapabilityError;
}

export function isTransportError(error: unknown): error is TransportError {
    return error instanceof TransportError;
}

/**
 * True for the rejection an aborted `AbortSignal` produces (`AbortError` or the signal's own reason).
 */
export function isAbortError(error: unknown, signal?: AbortSignal): boolean {
    if (signal?.aborted && error === signal.reason) {
        return true;
    }
    return error instanceof Error && error.name === 'AbortError';
}

/**
 * Maps any thrown value to the JSON-RPC error response for `id`.
 *
 * Protocol errors keep their code; state and capability errors become invalid request;
 * everything else is an internal error. The `MCP error <code>: ` prefix is not repeated on the wire.
 */
export function toJSONRPCError(id: RequestId | null, error: unknown): JSONRPCErrorResponse {
    if (error instanceof ProtocolError) {
        const prefix = `MCP error ${error.code}: `;
        const message = error.message.startsWith(prefix) ? error.message.slice(prefix.length) : error.message;
        return {
            jsonrpc: '2.0',
            id,
            error: error.data === undefined ? { code: error.code, message } : { code: error.code, message, data: error.data }
        };
    }

    if (error instanceof StateError || error instanceof CapabilityError) {
        return { jsonrpc: '2.0', id, error: { code: ErrorCode.InvalidRequest, message: error.message } };
    }

    const message = error instanceof Error ? error.message : String(error);
    return { jsonrpc: '2.0', id, error: { code: ErrorCode.InternalError, message: message || 'Internal error' } };
}
