/**
 * @logwire/core — handler facade, dispatch queue, batch writer and
 * connection manager.
 */

export { LogHandler } from './handler.js';
export type { HandlerStats, LogHandlerOptions, LogResult } from './handler.js';
export { DispatchQueue, DEFAULT_QUEUE_CAPACITY } from './queue.js';
export { SharedState } from './shared-state.js';
export { BatchWriter } from './batch-writer.js';
export type { BatchWriterOptions } from './batch-writer.js';
export { ConnectionManager } from './connection-manager.js';
export type { ConnectionManagerOptions, ConnectionState } from './connection-manager.js';
export {
	ACCEPTED_SCHEMES,
	DEFAULT_REMOTE_OPTIONS,
	remoteOptionsFromEnv,
	resolveRemoteOptions,
	validateRemoteUrl,
} from './config.js';
export type { DurationInput, RemoteEnvConfig, RemoteOptions, RemoteOptionsInput } from './config.js';
