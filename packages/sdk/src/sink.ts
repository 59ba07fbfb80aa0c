/**
 * Local sink interface — the always-on baseline destination.
 *
 * Every log() call that passes the level gate is written here synchronously,
 * before anything happens on the remote path. The sink's outcome is the only
 * delivery outcome a caller ever sees.
 */

import type { LogEvent } from './types.js';

/**
 * Local sink.
 *
 * Implement this to add a new baseline destination. `write` runs on the
 * caller's stack for every event, so it should be fast; throwing reports a
 * failed write to the caller.
 */
export interface LocalSink {
	/** Unique sink ID */
	readonly id: string;

	/** Write one record for one event. Throws on failure. */
	write(event: LogEvent): void;
}

/**
 * Sink registration — what a sink package exports.
 */
export interface SinkRegistration<TConfig = Record<string, unknown>> {
	/** Unique sink ID */
	id: string;
	/** Sink class */
	sink: new (config?: TConfig) => LocalSink;
	/** JSON Schema for config validation */
	configSchema?: Record<string, unknown>;
}
