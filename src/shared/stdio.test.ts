import { describe, expect, test } from 'vitest';

import type { JSONRPCMessage } from '../types.js';
import { ReadBuffer, serializeMessage } from './stdio.js';

const testMessage: JSONRPCMessage = {
    jsonrpc: '2.0',
    method: 'foobar'
};

test('should have no messages after initialization', () => {
    const readBuffer = new ReadBuffer();
    expect(readBuffer.readMessage()).toBeNull();
});

test('should only yield a message after a newline', () => {
    const readBuffer = new ReadBuffer();

    readBuffer.append(Buffer.from(JSON.stringify(testMessage)));
    expect(readBuffer.readMessage()).toBeNull();

    readBuffer.append(Buffer.from('\n'));
    expect(readBuffer.readMessage()).toEqual(testMessage);
    expect(readBuffer.readMessage()).toBeNull();
});

test('should be reusable after clearing', () => {
    const readBuffer = new ReadBuffer();

    readBuffer.append(Buffer.from('foobar'));
    readBuffer.clear();
    expect(readBuffer.readMessage()).toBeNull();

    readBuffer.append(Buffer.from(JSON.stringify(testMessage)));
    readBuffer.append(Buffer.from('\n'));
    expect(readBuffer.readMessage()).toEqual(testMessage);
});

test('should accept CRLF line endings', () => {
    const readBuffer = new ReadBuffer();

    readBuffer.append(Buffer.from(JSON.stringify(testMessage) + '\r\n'));

    expect(readBuffer.readMessage()).toEqual(testMessage);
});

test('should join a message split across chunks', () => {
    const readBuffer = new ReadBuffer();
    const line = serializeMessage({ jsonrpc: '2.0', id: 1, method: 'ping' });

    readBuffer.append(Buffer.from(line.slice(0, 10)));
    expect(readBuffer.readMessage()).toBeNull();
    readBuffer.append(Buffer.from(line.slice(10)));

    expect(readBuffer.readMessage()).toEqual({ jsonrpc: '2.0', id: 1, method: 'ping' });
});

describe('non-JSON line filtering', () => {
    test('should filter out non-JSON lines mixed with valid messages', () => {
        const readBuffer = new ReadBuffer();

        const message1: JSONRPCMessage = { jsonrpc: '2.0', method: 'method1' };
        const message2: JSONRPCMessage = { jsonrpc: '2.0', method: 'method2' };

        readBuffer.append(
            Buffer.from('Debug line 1\n' + JSON.stringify(message1) + '\n' + 'Another non-JSON line\n\n' + JSON.stringify(message2) + '\n')
        );

        expect(readBuffer.readMessage()).toEqual(message1);
        expect(readBuffer.readMessage()).toEqual(message2);
        expect(readBuffer.readMessage()).toBeNull();
    });

    test('should skip JSON scalars', () => {
        const readBuffer = new ReadBuffer();

        readBuffer.append(Buffer.from('42\n"text"\nnull\n' + JSON.stringify(testMessage) + '\n'));

        expect(readBuffer.readMessage()).toEqual(testMessage);
        expect(readBuffer.readMessage()).toBeNull();
    });

    test('should throw once for a JSON object that is not a JSON-RPC message', () => {
        const readBuffer = new ReadBuffer();

        readBuffer.append(Buffer.from('{"hello":"world"}\n' + JSON.stringify(testMessage) + '\n'));

        expect(() => readBuffer.readMessage()).toThrow();
        expect(readBuffer.readMessage()).toEqual(testMessage);
    });
});

test('should terminate serialized messages with a newline', () => {
    expect(serializeMessage(testMessage)).toBe('{"jsonrpc":"2.0","method":"foobar"}\n');
});
