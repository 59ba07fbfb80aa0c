/**
 * Remote streaming configuration: defaults, validation, environment.
 */

import { ConfigError, errorMessage, parseDuration } from '@logwire/sdk';
import { DEFAULT_QUEUE_CAPACITY } from './queue.js';

/** Milliseconds, or a duration string such as "5s" */
export type DurationInput = number | string;

export interface RemoteOptionsInput {
	/** Dispatch queue capacity (default: 1000) */
	queueCapacity?: number;
	/** Periodic flush interval (default: 5s) */
	batchInterval?: DurationInput;
	/** Flush as soon as this many payloads are batched (default: 50) */
	maxBatchSize?: number;
	/** Pause between reconnect attempts (default: 5s) */
	reconnectDelay?: DurationInput;
	/** Give up after this many consecutive failed dials; null retries forever (default: null) */
	maxReconnectAttempts?: number | null;
	/** WebSocket handshake timeout (default: 10s) */
	handshakeTimeout?: DurationInput;
	/** Largest inbound frame in bytes (default: 4096) */
	readBufferSize?: number;
	/** Unflushed outbound bytes allowed before a send fails (default: 4096) */
	writeBufferSize?: number;
	/** Keepalive ping interval (default: 30s) */
	pingInterval?: DurationInput;
	/** Connection is lost when nothing is acknowledged for this long (default: 60s) */
	pongWait?: DurationInput;
	/** Default deadline for close() (default: 15s) */
	closeTimeout?: DurationInput;
	/** Add hostname and process_id to every wire message (default: false) */
	includeProcessContext?: boolean;
}

export interface RemoteOptions {
	queueCapacity: number;
	batchIntervalMs: number;
	maxBatchSize: number;
	reconnectDelayMs: number;
	maxReconnectAttempts: number | null;
	handshakeTimeoutMs: number;
	readBufferSize: number;
	writeBufferSize: number;
	pingIntervalMs: number;
	pongWaitMs: number;
	closeTimeoutMs: number;
	includeProcessContext: boolean;
}

export const DEFAULT_REMOTE_OPTIONS: Readonly<RemoteOptions> = Object.freeze({
	queueCapacity: DEFAULT_QUEUE_CAPACITY,
	batchIntervalMs: 5_000,
	maxBatchSize: 50,
	reconnectDelayMs: 5_000,
	maxReconnectAttempts: null,
	handshakeTimeoutMs: 10_000,
	readBufferSize: 4096,
	writeBufferSize: 4096,
	pingIntervalMs: 30_000,
	pongWaitMs: 60_000,
	closeTimeoutMs: 15_000,
	includeProcessContext: false,
});

export const ACCEPTED_SCHEMES: readonly string[] = ['ws:', 'wss:'];

// ─── Validation ──────────────────────────────────────────────────────────────

/**
 * Validate a collector URL. Throws ConfigError when it is empty, cannot be
 * parsed, or does not use ws:// or wss://.
 */
export function validateRemoteUrl(url: string): URL {
	if (url.trim() === '') {
		throw new ConfigError('remote URL cannot be empty');
	}
	let parsed: URL;
	try {
		parsed = new URL(url);
	} catch (err) {
		throw new ConfigError(`invalid remote URL: ${errorMessage(err)}`, { cause: err });
	}
	if (!ACCEPTED_SCHEMES.includes(parsed.protocol)) {
		const scheme = parsed.protocol.replace(/:$/, '');
		throw new ConfigError(`invalid remote URL scheme: ${scheme} (must be ws or wss)`);
	}
	return parsed;
}

function toMs(name: string, value: DurationInput | undefined, fallback: number): number {
	if (value === undefined) return fallback;
	let ms: number;
	if (typeof value === 'number') {
		ms = value;
	} else {
		try {
			ms = parseDuration(value);
		} catch (err) {
			throw new ConfigError(`${name}: ${errorMessage(err)}`, { cause: err });
		}
	}
	if (!Number.isFinite(ms) || ms <= 0) {
		throw new ConfigError(`${name} must be a positive duration, got ${String(value)}`);
	}
	return ms;
}

function toPositiveInt(name: string, value: number | undefined, fallback: number): number {
	if (value === undefined) return fallback;
	if (!Number.isInteger(value) || value < 1) {
		throw new ConfigError(`${name} must be a positive integer, got ${value}`);
	}
	return value;
}

/** Merge input over the defaults and validate. Throws ConfigError. */
export function resolveRemoteOptions(input: RemoteOptionsInput = {}): RemoteOptions {
	const d = DEFAULT_REMOTE_OPTIONS;

	let maxReconnectAttempts = d.maxReconnectAttempts;
	if (input.maxReconnectAttempts !== undefined) {
		const max = input.maxReconnectAttempts;
		if (max !== null && (!Number.isInteger(max) || max < 0)) {
			throw new ConfigError(
				`maxReconnectAttempts must be a non-negative integer or null, got ${max}`,
			);
		}
		maxReconnectAttempts = max;
	}

	const options: RemoteOptions = {
		queueCapacity: toPositiveInt('queueCapacity', input.queueCapacity, d.queueCapacity),
		batchIntervalMs: toMs('batchInterval', input.batchInterval, d.batchIntervalMs),
		maxBatchSize: toPositiveInt('maxBatchSize', input.maxBatchSize, d.maxBatchSize),
		reconnectDelayMs: toMs('reconnectDelay', input.reconnectDelay, d.reconnectDelayMs),
		maxReconnectAttempts,
		handshakeTimeoutMs: toMs('handshakeTimeout', input.handshakeTimeout, d.handshakeTimeoutMs),
		readBufferSize: toPositiveInt('readBufferSize', input.readBufferSize, d.readBufferSize),
		writeBufferSize: toPositiveInt('writeBufferSize', input.writeBufferSize, d.writeBufferSize),
		pingIntervalMs: toMs('pingInterval', input.pingInterval, d.pingIntervalMs),
		pongWaitMs: toMs('pongWait', input.pongWait, d.pongWaitMs),
		closeTimeoutMs: toMs('closeTimeout', input.closeTimeout, d.closeTimeoutMs),
		includeProcessContext: input.includeProcessContext ?? d.includeProcessContext,
	};

	if (options.pingIntervalMs >= options.pongWaitMs) {
		throw new ConfigError(
			`pingInterval (${options.pingIntervalMs}ms) must be shorter than pongWait (${options.pongWaitMs}ms)`,
		);
	}

	return options;
}

// ─── Environment ─────────────────────────────────────────────────────────────

export interface RemoteEnvConfig {
	url?: string;
	token?: string;
	options: RemoteOptionsInput;
}

function envInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
	const raw = env[name];
	if (raw === undefined || raw.trim() === '') return undefined;
	const value = Number(raw);
	if (!Number.isInteger(value)) {
		throw new ConfigError(`${name} must be an integer, got "${raw}"`);
	}
	return value;
}

function envString(env: NodeJS.ProcessEnv, name: string): string | undefined {
	const raw = env[name];
	return raw === undefined || raw.trim() === '' ? undefined : raw.trim();
}

/**
 * Read LOGWIRE_* variables. Unset variables are left out so that other
 * sources (flags, config file, defaults) can fill them.
 */
export function remoteOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): RemoteEnvConfig {
	const options: RemoteOptionsInput = {};

	const assign = <K extends keyof RemoteOptionsInput>(
		key: K,
		value: RemoteOptionsInput[K] | undefined,
	): void => {
		if (value !== undefined) options[key] = value;
	};

	assign('queueCapacity', envInt(env, 'LOGWIRE_QUEUE_CAPACITY'));
	assign('batchInterval', envString(env, 'LOGWIRE_BATCH_INTERVAL'));
	assign('maxBatchSize', envInt(env, 'LOGWIRE_MAX_BATCH_SIZE'));
	assign('reconnectDelay', envString(env, 'LOGWIRE_RECONNECT_DELAY'));
	assign('handshakeTimeout', envString(env, 'LOGWIRE_HANDSHAKE_TIMEOUT'));
	assign('readBufferSize', envInt(env, 'LOGWIRE_READ_BUFFER_SIZE'));
	assign('writeBufferSize', envInt(env, 'LOGWIRE_WRITE_BUFFER_SIZE'));
	assign('pingInterval', envString(env, 'LOGWIRE_PING_INTERVAL'));
	assign('pongWait', envString(env, 'LOGWIRE_PONG_WAIT'));
	assign('closeTimeout', envString(env, 'LOGWIRE_CLOSE_TIMEOUT'));

	const maxReconnects = envString(env, 'LOGWIRE_MAX_RECONNECTS');
	if (maxReconnects !== undefined) {
		assign(
			'maxReconnectAttempts',
			maxReconnects.toLowerCase() === 'unlimited' ? null : envInt(env, 'LOGWIRE_MAX_RECONNECTS'),
		);
	}

	const processContext = envString(env, 'LOGWIRE_PROCESS_CONTEXT');
	if (processContext !== undefined) {
		assign('includeProcessContext', ['1', 'true', 'yes'].includes(processContext.toLowerCase()));
	}

	return {
		url: envString(env, 'LOGWIRE_URL'),
		token: env.LOGWIRE_TOKEN,
		options,
	};
}
