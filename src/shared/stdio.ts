import type { JSONRPCMessage } from '../types.js';
import { JSONRPCMessageSchema } from '../types.js';

/**
 * Buffers a continuous stdio stream into discrete JSON-RPC messages.
 *
 * Lines that are not JSON are skipped. A JSON line that is not a JSON-RPC message makes
 * `readMessage` throw, once, for that line.
 */
export class ReadBuffer {
    private _validLines: object[] = [];
    private _lastIncompleteLine: string = '';

    append(chunk: Buffer): void {
        this._processChunk(chunk);
    }

    readMessage(): JSONRPCMessage | null {
        const line = this._validLines.shift();
        if (line === undefined) {
            return null;
        }
        return deserializeMessage(line);
    }

    clear(): void {
        this._validLines = [];
        this._lastIncompleteLine = '';
    }

    private _processChunk(newChunk: Buffer): void {
        // Combine any previously incomplete line with the new chunk
        const combinedText = this._lastIncompleteLine + newChunk.toString('utf8');
        const newLines = combinedText.split('\n');

        // The last element may be incomplete, so store it for the next chunk
        this._lastIncompleteLine = newLines.pop() ?? '';
        for (const line of newLines) {
            const parsed = safeJsonParse(line.replace(/\r$/, ''));
            if (parsed !== undefined) {
                this._validLines.push(parsed);
            }
        }
    }
}

/**
 * Parses a JSON line, returning undefined for anything that is not a JSON object.
 */
function safeJsonParse(line: string): object | undefined {
    if (line.trim() === '') {
        return undefined;
    }
    try {
        const value: unknown = JSON.parse(line);
        return typeof value === 'object' && value !== null ? value : undefined;
    } catch {
        return undefined;
    }
}

/**
 * Validates a parsed object as a JSON-RPC message.
 */
export function deserializeMessage(line: object): JSONRPCMessage {
    return JSONRPCMessageSchema.parse(line);
}

/**
 * Serializes a JSON-RPC message to a newline-terminated frame.
 */
export function serializeMessage(message: JSONRPCMessage): string {
    return JSON.stringify(message) + '\n';
}
