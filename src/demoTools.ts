import * as z from 'zod/v4';

import type { HandlerContext } from './server/dispatcher.js';
import type { McpServer } from './server/mcp.js';
import type { CallToolResult } from './types.js';

const EchoArgsSchema = z.object({ message: z.string() });
const CountdownArgsSchema = z.object({ seconds: z.number().int().min(0).max(600).default(3) });
const ConfirmArgsSchema = z.object({ question: z.string().default('Proceed?') });

function text(value: string): CallToolResult {
    return { content: [{ type: 'text', text: value }] };
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal.aborted) {
            reject(signal.reason);
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(signal.reason);
        };
        const timer = setTimeout(() => {
            signal.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Tools served by the command-line entry point.
 *
 * - `echo` answers at once and cannot run as a task.
 * - `countdown` may run as a task, reporting the seconds left as its status message.
 * - `confirm` elicits a yes/no answer from the user.
 */
export function registerDemoTools(server: McpServer): void {
    server.registerTool(
        'echo',
        {
            description: 'Returns the message it was given',
            inputSchema: { type: 'object', properties: { message: { type: 'string' } }, required: ['message'] }
        },
        args => text(EchoArgsSchema.parse(args).message)
    );

    server.registerTool(
        'countdown',
        {
            description: 'Counts down one second at a time',
            inputSchema: { type: 'object', properties: { seconds: { type: 'integer', minimum: 0, maximum: 600 } } },
            taskSupport: 'optional'
        },
        async (args, ctx: HandlerContext) => {
            const { seconds } = CountdownArgsSchema.parse(args);
            for (let left = seconds; left > 0; left--) {
                ctx.reportStatus?.('working', `${left} seconds left`);
                await sleep(1000, ctx.signal);
            }
            return text('Liftoff');
        }
    );

    server.registerTool(
        'confirm',
        {
            description: 'Asks the user a yes/no question',
            inputSchema: { type: 'object', properties: { question: { type: 'string' } } },
            taskSupport: 'optional'
        },
        async (args, ctx) => {
            const { question } = ConfirmArgsSchema.parse(args);
            const answer = await server.requestElicitation(ctx, {
                message: question,
                requestedSchema: {
                    type: 'object',
                    properties: { confirm: { type: 'boolean', title: 'Confirm' } },
                    required: ['confirm']
                }
            });
            if (answer.action !== 'accept') {
                return text(`User chose to ${answer.action}`);
            }
            return text(answer.content?.confirm === true ? 'Confirmed' : 'Not confirmed');
        }
    );
}
