export * from './errors.js';
export * from './types.js';

export { CorrelationTable, DEFAULT_REQUEST_TIMEOUT_MSEC } from './shared/correlation.js';
export type { WaitOptions } from './shared/correlation.js';
export type { CreateLoggerOptions, LogLevel, Logger } from './shared/logger.js';
export { consoleLogger, createLogger, isLogLevel, LogLevels, loggerFrom, silentLogger, stderrLogger } from './shared/logger.js';
export { DEFAULT_CHANNEL_CAPACITY, OutboundChannel } from './shared/outboundChannel.js';
export { ReadBuffer, deserializeMessage, serializeMessage } from './shared/stdio.js';
export { CompletionSignal, isTerminal } from './shared/task.js';
export type { TerminalTaskStatus } from './shared/task.js';
export type { Transport, TransportSendOptions } from './shared/transport.js';

export { loadServerOptionsFromEnv, resolveServerOptions, ServerSettingsSchema } from './server/config.js';
export type { ResolvedServerOptions, ServerOptions, ServerSettings } from './server/config.js';
export { RequestDispatcher } from './server/dispatcher.js';
export type { HandlerContext, HandleRequestOptions, RegisteredTool, TaskFeatures, TaskSupport, ToolHandler } from './server/dispatcher.js';
export { McpServer } from './server/mcp.js';
export type { ToolConfig } from './server/mcp.js';
export { ClientSession } from './server/session.js';
export type { ClientFeature, ClientSessionOptions, FormElicitationParams, InitializeInfo, UrlElicitationParams } from './server/session.js';
export { generateSessionId, SessionRegistry } from './server/sessions.js';
export type { SessionRegistryEvents, SessionRegistryOptions } from './server/sessions.js';
export { StdioServerTransport } from './server/stdio.js';
export type { StdioServerTransportOptions } from './server/stdio.js';
export { createMcpExpressApp, createStreamableHttpRouter, SESSION_ID_HEADER } from './server/streamableHttp.js';
export type { CreateMcpExpressAppOptions, StreamableHttpOptions } from './server/streamableHttp.js';
export { combineTaskHooks } from './server/tasks/hooks.js';
export type { TaskHooks, TaskMetrics } from './server/tasks/hooks.js';
export { ConcurrencyLimiter } from './server/tasks/limiter.js';
export { DEFAULT_POLL_INTERVAL, DEFAULT_SWEEP_INTERVAL, generateTaskId, InMemoryTaskStore } from './server/tasks/taskStore.js';
export type { CreateTaskOptions, ListTasksOptions, TaskEntry, TaskOutcome, TaskStatusListener, TaskStoreOptions, TtlPolicy } from './server/tasks/taskStore.js';
