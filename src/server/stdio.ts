import process from 'node:process';
import type { Readable, Writable } from 'node:stream';

import { ReadBuffer, serializeMessage } from '../shared/stdio.js';
import type { Transport } from '../shared/transport.js';
import type { JSONRPCMessage } from '../types.js';

/**
 * Options for configuring `StdioServerTransport`.
 */
export interface StdioServerTransportOptions {
    /**
     * The readable stream to use for input. Defaults to `process.stdin`.
     */
    stdin?: Readable;

    /**
     * The writable stream to use for output. Defaults to `process.stdout`.
     */
    stdout?: Writable;
}

/**
 * Server transport for stdio: this communicates with an MCP client by reading from the current process' `stdin` and writing to `stdout`.
 *
 * One process, one client: the server creates a single session for it. Nothing else may
 * write to `stdout`; log to `stderr`.
 *
 * @example
 * ```ts
 * const server = new McpServer({ name: 'my-server', version: '1.0.0' });
 * await server.connect(new StdioServerTransport());
 * ```
 */
export class StdioServerTransport implements Transport {
    private _readBuffer: ReadBuffer = new ReadBuffer();
    private _started = false;
    private _closed = false;
    private _stdin: Readable;
    private _stdout: Writable;

    constructor(options: StdioServerTransportOptions = {}) {
        this._stdin = options.stdin ?? process.stdin;
        this._stdout = options.stdout ?? process.stdout;
    }

    onclose?: () => void;
    onerror?: (error: Error) => void;
    onmessage?: (message: JSONRPCMessage) => void;

    // Arrow functions to bind `this` properly, while maintaining function identity.
    _ondata = (chunk: Buffer) => {
        this._readBuffer.append(chunk);
        this.processReadBuffer();
    };
    _onerror = (error: Error) => {
        this.onerror?.(error);
    };
    _onend = () => {
        void this.close();
    };

    /**
     * Starts listening for messages on `stdin`.
     */
    async start(): Promise<void> {
        if (this._started) {
            throw new Error('StdioServerTransport already started! If using McpServer, note that connect() calls start() automatically.');
        }

        this._started = true;
        this._stdin.on('data', this._ondata);
        this._stdin.on('error', this._onerror);
        this._stdin.on('end', this._onend);
    }

    private processReadBuffer() {
        while (true) {
            try {
                const message = this._readBuffer.readMessage();
                if (message === null) {
                    break;
                }

                this.onmessage?.(message);
            } catch (error) {
                this.onerror?.(error instanceof Error ? error : new Error(String(error)));
            }
        }
    }

    async close(): Promise<void> {
        if (this._closed) {
            return;
        }
        this._closed = true;

        // Remove our event listeners first
        this._stdin.off('data', this._ondata);
        this._stdin.off('error', this._onerror);
        this._stdin.off('end', this._onend);

        // Only pause stdin if we were the only listener
        if (this._stdin.listenerCount('data') === 0) {
            this._stdin.pause();
        }

        this._readBuffer.clear();
        this.onclose?.();
    }

    send(message: JSONRPCMessage): Promise<void> {
        return new Promise(resolve => {
            const json = serializeMessage(message);
            if (this._stdout.write(json)) {
                resolve();
            } else {
                this._stdout.once('drain', resolve);
            }
        });
    }
}
