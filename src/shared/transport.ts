import type { JSONRPCMessage, RequestId } from '../types.js';

/**
 * Options for sending a JSON-RPC message.
 */
export type TransportSendOptions = {
    /**
     * If present, `relatedRequestId` is used to indicate to the transport which incoming request to associate this outgoing message with.
     */
    relatedRequestId?: RequestId;
};

/**
 * Describes the minimal contract for an MCP transport that a server can communicate over.
 *
 * The server owns the transport once connected: it replaces the callbacks and drains the
 * session's outbound channel into `send`, in order.
 */
export interface Transport {
    /**
     * Starts processing messages on the transport, including any connection steps that might need to be taken.
     *
     * This method should only be called after callbacks are installed, or else messages may be lost.
     */
    start(): Promise<void>;

    /**
     * Sends a JSON-RPC message (request, notification or response).
     */
    send(message: JSONRPCMessage, options?: TransportSendOptions): Promise<void>;

    /**
     * Closes the connection.
     */
    close(): Promise<void>;

    /**
     * Callback for when the connection is closed for any reason.
     *
     * This should be invoked when close() is called as well.
     */
    onclose?: () => void;

    /**
     * Callback for when an error occurs.
     *
     * Note that errors are not necessarily fatal; they are used for reporting any kind of exceptional condition out of band.
     */
    onerror?: (error: Error) => void;

    /**
     * Callback for when a message (request, notification or response) is received over the connection.
     */
    onmessage?: (message: JSONRPCMessage) => void;

    /**
     * The session ID generated for this connection, when the transport has one.
     */
    sessionId?: string;
}
