import * as z from 'zod/v4';

export const LATEST_PROTOCOL_VERSION = '2025-11-25';
export const DEFAULT_NEGOTIATED_PROTOCOL_VERSION = '2025-03-26';
export const SUPPORTED_PROTOCOL_VERSIONS = [LATEST_PROTOCOL_VERSION, '2025-06-18', '2025-03-26', '2024-11-05'];

/* Task-related metadata key, attached to results delivered through tasks/result. */
export const RELATED_TASK_META_KEY = 'io.modelcontextprotocol/related-task';

/* JSON-RPC types */
export const JSONRPC_VERSION = '2.0';

/**
 * Error codes defined by the JSON-RPC specification, plus the ones this server adds.
 */
export enum ErrorCode {
    // SDK error codes
    ConnectionClosed = -32000,
    RequestTimeout = -32001,
    ResourceExhausted = -32003,

    // Standard JSON-RPC error codes
    ParseError = -32700,
    InvalidRequest = -32600,
    MethodNotFound = -32601,
    InvalidParams = -32602,
    InternalError = -32603,

    // MCP-specific error codes
    UrlElicitationRequired = -32042
}

/**
 * A uniquely identifying ID for a request in JSON-RPC.
 */
export const RequestIdSchema = z.union([z.string(), z.number().int()]);

const MetaSchema = z.record(z.string(), z.unknown());

export const RequestParamsSchema = z.looseObject({
    _meta: MetaSchema.optional()
});

export const RequestSchema = z.object({
    method: z.string(),
    params: RequestParamsSchema.optional()
});

export const NotificationSchema = z.object({
    method: z.string(),
    params: z.looseObject({ _meta: MetaSchema.optional() }).optional()
});

export const ResultSchema = z.looseObject({
    _meta: MetaSchema.optional()
});

export const JSONRPCRequestSchema = z
    .object({
        jsonrpc: z.literal(JSONRPC_VERSION),
        id: RequestIdSchema
    })
    .extend(RequestSchema.shape)
    .strict();

export const JSONRPCNotificationSchema = z
    .object({
        jsonrpc: z.literal(JSONRPC_VERSION)
    })
    .extend(NotificationSchema.shape)
    .strict();

/**
 * A successful (non-error) response to a request. `result` is optional on the wire:
 * some clients answer a ping with no result at all.
 */
export const JSONRPCResultResponseSchema = z
    .object({
        jsonrpc: z.literal(JSONRPC_VERSION),
        id: RequestIdSchema,
        result: ResultSchema.optional()
    })
    .strict();

export const ErrorSchema = z.object({
    code: z.number().int(),
    message: z.string(),
    data: z.unknown().optional()
});

export const JSONRPCErrorResponseSchema = z
    .object({
        jsonrpc: z.literal(JSONRPC_VERSION),
        id: RequestIdSchema.nullable(),
        error: ErrorSchema
    })
    .strict();

export const JSONRPCResponseSchema = z.union([JSONRPCResultResponseSchema, JSONRPCErrorResponseSchema]);

export const JSONRPCMessageSchema = z.union([
    JSONRPCRequestSchema,
    JSONRPCNotificationSchema,
    JSONRPCResultResponseSchema,
    JSONRPCErrorResponseSchema
]);

export const isJSONRPCRequest = (value: unknown): value is JSONRPCRequest => JSONRPCRequestSchema.safeParse(value).success;
export const isJSONRPCNotification = (value: unknown): value is JSONRPCNotification => JSONRPCNotificationSchema.safeParse(value).success;
export const isJSONRPCResultResponse = (value: unknown): value is JSONRPCResultResponse =>
    JSONRPCResultResponseSchema.safeParse(value).success;
export const isJSONRPCErrorResponse = (value: unknown): value is JSONRPCErrorResponse =>
    JSONRPCErrorResponseSchema.safeParse(value).success;

/* Empty result */
export const EmptyResultSchema = ResultSchema.strict();

/* Tasks */
export const TaskStatusSchema = z.enum(['working', 'input_required', 'completed', 'failed', 'cancelled']);

/**
 * Options a requestor attaches to a task-augmented request.
 */
export const TaskCreationParamsSchema = z.looseObject({
    /**
     * Requested duration in milliseconds to retain the task from creation.
     */
    ttl: z.number().int().nonnegative().optional(),
    /**
     * Suggested time in milliseconds between status checks.
     */
    pollInterval: z.number().int().positive().optional()
});

export const TaskSchema = z.object({
    taskId: z.string(),
    status: TaskStatusSchema,
    /**
     * Time in milliseconds to keep the task after creation. `null` means unlimited.
     */
    ttl: z.union([z.number(), z.null()]),
    /**
     * ISO 8601 timestamp, UTC.
     */
    createdAt: z.string(),
    lastUpdatedAt: z.string(),
    pollInterval: z.number().optional(),
    statusMessage: z.string().optional()
});

export const RelatedTaskMetadataSchema = z.object({
    taskId: z.string()
});

export const CreateTaskResultSchema = ResultSchema.extend({
    task: TaskSchema
});

export const TaskStatusNotificationSchema = NotificationSchema.extend({
    method: z.literal('notifications/tasks/status'),
    params: z.looseObject({ task: TaskSchema })
});

const TaskIdParamsSchema = RequestParamsSchema.extend({
    taskId: z.string()
});

export const GetTaskRequestSchema = RequestSchema.extend({
    method: z.literal('tasks/get'),
    params: TaskIdParamsSchema
});

export const GetTaskResultSchema = ResultSchema.extend(TaskSchema.shape);

export const GetTaskPayloadRequestSchema = RequestSchema.extend({
    method: z.literal('tasks/result'),
    params: TaskIdParamsSchema
});

export const ListTasksRequestSchema = RequestSchema.extend({
    method: z.literal('tasks/list'),
    params: RequestParamsSchema.extend({
        cursor: z.string().optional()
    }).optional()
});

export const ListTasksResultSchema = ResultSchema.extend({
    tasks: z.array(TaskSchema),
    nextCursor: z.string().optional()
});

export const CancelTaskRequestSchema = RequestSchema.extend({
    method: z.literal('tasks/cancel'),
    params: TaskIdParamsSchema
});

export const CancelTaskResultSchema = ResultSchema.extend(TaskSchema.shape);

/* Capabilities */
export const ImplementationSchema = z.looseObject({
    name: z.string(),
    version: z.string(),
    title: z.string().optional()
});

export const ElicitationCapabilitySchema = z.looseObject({
    form: z.looseObject({}).optional(),
    url: z.looseObject({}).optional()
});

export const ClientTasksCapabilitySchema = z.looseObject({
    list: z.looseObject({}).optional(),
    cancel: z.looseObject({}).optional(),
    requests: z.looseObject({}).optional()
});

/**
 * Capabilities a client may support. Known capabilities are defined here, in this schema, but this is not a closed set.
 */
export const ClientCapabilitiesSchema = z.looseObject({
    experimental: z.record(z.string(), z.looseObject({})).optional(),
    sampling: z.looseObject({ tools: z.looseObject({}).optional() }).optional(),
    elicitation: ElicitationCapabilitySchema.optional(),
    roots: z.looseObject({ listChanged: z.boolean().optional() }).optional(),
    tasks: ClientTasksCapabilitySchema.optional()
});

export const ServerTasksCapabilitySchema = z.looseObject({
    list: z.looseObject({}).optional(),
    cancel: z.looseObject({}).optional(),
    requests: z
        .looseObject({
            tools: z.looseObject({ call: z.looseObject({}).optional() }).optional()
        })
        .optional()
});

export const ServerCapabilitiesSchema = z.looseObject({
    experimental: z.record(z.string(), z.looseObject({})).optional(),
    logging: z.looseObject({}).optional(),
    tools: z.looseObject({ listChanged: z.boolean().optional() }).optional(),
    tasks: ServerTasksCapabilitySchema.optional()
});

/* Initialization */
export const InitializeRequestSchema = RequestSchema.extend({
    method: z.literal('initialize'),
    params: RequestParamsSchema.extend({
        protocolVersion: z.string(),
        capabilities: ClientCapabilitiesSchema,
        clientInfo: ImplementationSchema
    })
});

export const isInitializeRequest = (value: unknown): value is InitializeRequest => InitializeRequestSchema.safeParse(value).success;

export const InitializeResultSchema = ResultSchema.extend({
    protocolVersion: z.string(),
    capabilities: ServerCapabilitiesSchema,
    serverInfo: ImplementationSchema,
    instructions: z.string().optional()
});

/* Cancellation */
export const CancelledNotificationSchema = NotificationSchema.extend({
    method: z.literal('notifications/cancelled'),
    params: z.looseObject({
        requestId: RequestIdSchema,
        reason: z.string().optional()
    })
});

/* Content */
export const TextContentSchema = z.looseObject({
    type: z.literal('text'),
    text: z.string()
});

export const ImageContentSchema = z.looseObject({
    type: z.literal('image'),
    data: z.string(),
    mimeType: z.string()
});

export const AudioContentSchema = z.looseObject({
    type: z.literal('audio'),
    data: z.string(),
    mimeType: z.string()
});

export const ContentBlockSchema = z.union([TextContentSchema, ImageContentSchema, AudioContentSchema, z.looseObject({ type: z.string() })]);

/* Tools */
export const ToolExecutionSchema = z.looseObject({
    /**
     * Whether the tool may be (`optional`), must be (`required`) or must not be (`forbidden`)
     * invoked as a task.
     */
    taskSupport: z.enum(['forbidden', 'optional', 'required']).optional()
});

export const ToolSchema = z.looseObject({
    name: z.string(),
    title: z.string().optional(),
    description: z.string().optional(),
    inputSchema: z.looseObject({ type: z.literal('object') }),
    execution: ToolExecutionSchema.optional()
});

export const ListToolsResultSchema = ResultSchema.extend({
    tools: z.array(ToolSchema),
    nextCursor: z.string().optional()
});

export const CallToolRequestParamsSchema = RequestParamsSchema.extend({
    name: z.string(),
    arguments: z.record(z.string(), z.unknown()).optional(),
    task: TaskCreationParamsSchema.optional()
});

export const CallToolRequestSchema = RequestSchema.extend({
    method: z.literal('tools/call'),
    params: CallToolRequestParamsSchema
});

export const CallToolResultSchema = ResultSchema.extend({
    content: z.array(ContentBlockSchema).default([]),
    structuredContent: z.record(z.string(), z.unknown()).optional(),
    isError: z.boolean().optional()
});

/* Sampling */
export const SamplingMessageSchema = z.looseObject({
    role: z.enum(['user', 'assistant']),
    content: z.union([TextContentSchema, ImageContentSchema, AudioContentSchema])
});

export const CreateMessageRequestParamsSchema = RequestParamsSchema.extend({
    messages: z.array(SamplingMessageSchema),
    systemPrompt: z.string().optional(),
    maxTokens: z.number().int(),
    temperature: z.number().optional(),
    stopSequences: z.array(z.string()).optional(),
    modelPreferences: z.looseObject({}).optional()
});

export const CreateMessageResultSchema = ResultSchema.extend({
    model: z.string(),
    stopReason: z.string().optional(),
    role: z.enum(['user', 'assistant']),
    content: z.union([TextContentSchema, ImageContentSchema, AudioContentSchema])
});

/* Roots */
export const RootSchema = z.looseObject({
    uri: z.string().startsWith('file://'),
    name: z.string().optional()
});

export const ListRootsResultSchema = ResultSchema.extend({
    roots: z.array(RootSchema)
});

export const RootsListChangedNotificationSchema = NotificationSchema.extend({
    method: z.literal('notifications/roots/list_changed')
});

/* Elicitation */
export const ElicitRequestFormParamsSchema = RequestParamsSchema.extend({
    /**
     * Absent mode is treated as form mode, as older clients do not send it.
     */
    mode: z.literal('form').optional(),
    message: z.string(),
    requestedSchema: z.looseObject({
        type: z.literal('object'),
        properties: z.record(z.string(), z.looseObject({})),
        required: z.array(z.string()).optional()
    })
});

export const ElicitRequestURLParamsSchema = RequestParamsSchema.extend({
    mode: z.literal('url'),
    message: z.string(),
    elicitationId: z.string(),
    url: z.url()
});

export const ElicitRequestParamsSchema = z.union([ElicitRequestFormParamsSchema, ElicitRequestURLParamsSchema]);

export const ElicitResultSchema = ResultSchema.extend({
    action: z.enum(['accept', 'decline', 'cancel']),
    content: z.record(z.string(), z.union([z.string(), z.number(), z.boolean(), z.array(z.string())])).optional()
});

export const ElicitationCompleteNotificationSchema = NotificationSchema.extend({
    method: z.literal('notifications/elicitation/complete'),
    params: z.looseObject({
        elicitationId: z.string()
    })
});

/* Logging */
export const LoggingLevelSchema = z.enum(['debug', 'info', 'notice', 'warning', 'error', 'critical', 'alert', 'emergency']);

export const LoggingMessageNotificationSchema = NotificationSchema.extend({
    method: z.literal('notifications/message'),
    params: z.looseObject({
        level: LoggingLevelSchema,
        logger: z.string().optional(),
        data: z.unknown()
    })
});

/* Type exports */
export type RequestId = z.infer<typeof RequestIdSchema>;
export type Request = z.infer<typeof RequestSchema>;
export type Notification = z.infer<typeof NotificationSchema>;
export type Result = z.infer<typeof ResultSchema>;
export type JSONRPCRequest = z.infer<typeof JSONRPCRequestSchema>;
export type JSONRPCNotification = z.infer<typeof JSONRPCNotificationSchema>;
export type JSONRPCResultResponse = z.infer<typeof JSONRPCResultResponseSchema>;
export type JSONRPCErrorResponse = z.infer<typeof JSONRPCErrorResponseSchema>;
export type JSONRPCResponse = z.infer<typeof JSONRPCResponseSchema>;
export type JSONRPCMessage = z.infer<typeof JSONRPCMessageSchema>;

export type TaskStatus = z.infer<typeof TaskStatusSchema>;
export type TaskCreationParams = z.infer<typeof TaskCreationParamsSchema>;
export type Task = z.infer<typeof TaskSchema>;
export type RelatedTaskMetadata = z.infer<typeof RelatedTaskMetadataSchema>;
export type CreateTaskResult = z.infer<typeof CreateTaskResultSchema>;
export type TaskStatusNotification = z.infer<typeof TaskStatusNotificationSchema>;
export type ListTasksResult = z.infer<typeof ListTasksResultSchema>;

export type Implementation = z.infer<typeof ImplementationSchema>;
export type ClientCapabilities = z.infer<typeof ClientCapabilitiesSchema>;
export type ServerCapabilities = z.infer<typeof ServerCapabilitiesSchema>;
export type InitializeRequest = z.infer<typeof InitializeRequestSchema>;
export type InitializeResult = z.infer<typeof InitializeResultSchema>;

export type ContentBlock = z.infer<typeof ContentBlockSchema>;
export type Tool = z.infer<typeof ToolSchema>;
export type ToolExecution = z.infer<typeof ToolExecutionSchema>;
export type CallToolRequest = z.infer<typeof CallToolRequestSchema>;
export type CallToolResult = z.infer<typeof CallToolResultSchema>;

export type CreateMessageRequestParams = z.infer<typeof CreateMessageRequestParamsSchema>;
export type CreateMessageResult = z.infer<typeof CreateMessageResultSchema>;
export type Root = z.infer<typeof RootSchema>;
export type ListRootsResult = z.infer<typeof ListRootsResultSchema>;

export type ElicitRequestFormParams = z.infer<typeof ElicitRequestFormParamsSchema>;
export type ElicitRequestURLParams = z.infer<typeof ElicitRequestURLParamsSchema>;
export type ElicitRequestParams = z.infer<typeof ElicitRequestParamsSchema>;
export type ElicitResult = z.infer<typeof ElicitResultSchema>;

export type LoggingLevel = z.infer<typeof LoggingLevelSchema>;
export type LoggingMessageNotification = z.infer<typeof LoggingMessageNotificationSchema>;
