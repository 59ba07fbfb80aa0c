/**
 * LogHandler — the logging entry point.
 *
 * Library-first API:
 *   const log = new LogHandler({ sink, dialer });
 *   log.configureRemote('wss://collector.example/ingest', token);
 *   log.start();
 *   log.withAttributes({ service: 'apps' }).info('started');
 *   await log.close();
 *
 * Every event is written synchronously to the local sink; when remote
 * streaming is configured it is also serialized and offered, without
 * waiting, to the dispatch queue. Derived handlers share one root.
 */

import { hostname } from 'node:os';
import {
	type AttrInput,
	ClosedError,
	ConfigError,
	type Diagnostics,
	type EncodedAttributes,
	FlushTimeoutError,
	type LocalSink,
	type LogEvent,
	type LogLevel,
	type LogRecord,
	type Scope,
	type TransportDialer,
	EMPTY_SCOPE,
	buildEvent,
	createDiagnostics,
	errorMessage,
	levelEnabled,
	scopeWithAttrs,
	scopeWithGroup,
	serializeEvent,
} from '@logwire/sdk';
import { BatchWriter } from './batch-writer.js';
import {
	DEFAULT_REMOTE_OPTIONS,
	type RemoteOptions,
	type RemoteOptionsInput,
	resolveRemoteOptions,
	validateRemoteUrl,
} from './config.js';
import { type ConnectionState, ConnectionManager, closeConnection } from './connection-manager.js';
import { DispatchQueue } from './queue.js';
import { SharedState } from './shared-state.js';

// ─── Options & Results ────────────────────────────────────────────────────────

export interface LogHandlerOptions {
	/** Baseline destination, written for every enabled event */
	sink: LocalSink;
	/** Minimum level (default: info) */
	level?: LogLevel;
	/** Side channel for logwire's own problems (default: JSON lines on stderr) */
	diagnostics?: Diagnostics;
	/** Opens remote connections; required before configureRemote() */
	dialer?: TransportDialer;
}

/** Outcome of one log() call. Only the local sink's outcome is reported. */
export type LogResult =
	| { status: 'written' }
	| { status: 'filtered' }
	| { status: 'closed'; error: ClosedError }
	| { status: 'failed'; error: Error };

export interface HandlerStats {
	/** Payloads waiting in the dispatch queue */
	queued: number;
	/** Payloads taken from the queue but not yet sent */
	batched: number;
	/** Payloads discarded because the queue was full or closed */
	dropped: number;
	/** Payloads handed to a connection */
	sent: number;
	state: ConnectionState | 'disabled';
}

interface RemoteRuntime {
	url: string;
	options: RemoteOptions;
	context: EncodedAttributes | undefined;
	queue: DispatchQueue;
	writer: BatchWriter;
	manager: ConnectionManager;
}

/** Resolves true when `task` settles within `ms`, false otherwise. */
function settleWithin(task: Promise<unknown>, ms: number): Promise<boolean> {
	return new Promise((resolve) => {
		const timer = setTimeout(() => resolve(false), Math.max(0, ms));
		const done = (): void => {
			clearTimeout(timer);
			resolve(true);
		};
		task.then(done, done);
	});
}

// ─── Root ─────────────────────────────────────────────────────────────────────

/**
 * State owned by the root handler and referenced by every derived one.
 * @internal
 */
export class HandlerRoot {
	readonly shared = new SharedState();
	readonly sink: LocalSink;
	readonly level: LogLevel;
	readonly diagnostics: Diagnostics;
	readonly dialer: TransportDialer | null;
	private readonly controller = new AbortController();
	private remote: RemoteRuntime | null = null;
	private started = false;
	private tasks: Promise<void>[] = [];
	private closing: Promise<void> | null = null;
	private detachSignal: (() => void) | null = null;
	private overflowing = false;

	constructor(options: LogHandlerOptions) {
		this.sink = options.sink;
		this.level = options.level ?? 'info';
		this.diagnostics = options.diagnostics ?? createDiagnostics();
		this.dialer = options.dialer ?? null;
	}

	get runtime(): RemoteRuntime | null {
		return this.remote;
	}

	configureRemote(url: string, token: string, input?: RemoteOptionsInput): void {
		if (this.shared.closed) {
			throw new ConfigError('cannot configure remote logging: handler is closed');
		}
		if (this.started) {
			throw new ConfigError('remote logging must be configured before start()');
		}
		if (this.remote) {
			throw new ConfigError('remote logging is already configured');
		}
		validateRemoteUrl(url);
		const dialer = this.dialer;
		if (!dialer) {
			throw new ConfigError('remote logging needs a transport dialer (LogHandlerOptions.dialer)');
		}
		const options = resolveRemoteOptions(input);

		if (token === '') {
			this.diagnostics.warn(
				'remote logging configured without an authentication token; connections will not be authenticated (security risk)',
				{ url },
			);
		}

		const queue = new DispatchQueue(options.queueCapacity);
		this.shared.attachQueue(queue);
		const writer = new BatchWriter(
			this.shared,
			queue,
			{ batchIntervalMs: options.batchIntervalMs, maxBatchSize: options.maxBatchSize },
			this.diagnostics,
		);
		const manager = new ConnectionManager(
			this.shared,
			dialer,
			{
				url,
				token,
				reconnectDelayMs: options.reconnectDelayMs,
				maxReconnectAttempts: options.maxReconnectAttempts,
				handshakeTimeoutMs: options.handshakeTimeoutMs,
				readBufferSize: options.readBufferSize,
				writeBufferSize: options.writeBufferSize,
				pingIntervalMs: options.pingIntervalMs,
				pongWaitMs: options.pongWaitMs,
			},
			this.diagnostics,
		);
		const context = options.includeProcessContext
			? { hostname: hostname(), process_id: process.pid }
			: undefined;

		this.remote = { url, options, context, queue, writer, manager };
		this.diagnostics.info('remote logging configured', { url });
	}

	start(signal?: AbortSignal): void {
		if (this.started || this.shared.closed) return;
		this.started = true;

		if (signal) {
			if (signal.aborted) {
				this.controller.abort();
			} else {
				const onAbort = (): void => this.controller.abort();
				signal.addEventListener('abort', onAbort, { once: true });
				this.detachSignal = () => signal.removeEventListener('abort', onAbort);
			}
		}

		const remote = this.remote;
		if (!remote) return;

		// Once cancelled nothing drains the queue, so stop filling it
		this.controller.signal.addEventListener('abort', () => remote.queue.close(), { once: true });

		this.tasks = [
			remote.writer.start(this.controller.signal).catch((err: unknown) => {
				this.diagnostics.error(`batch writer failed: ${errorMessage(err)}`);
			}),
			remote.manager.start(this.controller.signal).catch((err: unknown) => {
				this.diagnostics.error(`connection manager failed: ${errorMessage(err)}`);
			}),
		];
	}

	/** Offer an event to the remote path. Never throws, never waits. */
	dispatch(event: LogEvent): void {
		const remote = this.remote;
		if (!remote || !this.shared.canEnqueue()) return;

		let payload: string;
		try {
			payload = serializeEvent(event, remote.context);
		} catch (err) {
			this.diagnostics.warn(errorMessage(err), {
				event_level: event.level,
				event_message: event.message,
			});
			return;
		}

		if (this.shared.enqueue(payload)) {
			if (this.overflowing) {
				this.overflowing = false;
				this.diagnostics.debug('dispatch queue accepting messages again', {
					dropped: remote.queue.dropped,
				});
			}
		} else if (!this.overflowing) {
			this.overflowing = true;
			this.diagnostics.debug('dispatch queue full; dropping remote log messages', {
				capacity: remote.queue.capacity,
			});
		}
	}

	close(timeoutMs?: number): Promise<void> {
		if (!this.closing) {
			const timeout =
				timeoutMs ?? this.remote?.options.closeTimeoutMs ?? DEFAULT_REMOTE_OPTIONS.closeTimeoutMs;
			this.closing = this.shutdown(timeout);
		}
		return this.closing;
	}

	/**
	 * Shutdown protocol:
	 *   1. mark closed, so nothing more is queued
	 *   2. flush what is pending, bounded by the deadline
	 *   3. close the queue and let the writer finish its final drain
	 *   4. tear down: take the current connection, close it, stop the manager
	 *
	 * The connection manager keeps dialing and publishing through steps 2
	 * and 3, so a connection still being established can carry the flush.
	 */
	private async shutdown(timeoutMs: number): Promise<void> {
		try {
			await this.runShutdown(timeoutMs);
		} finally {
			this.detachSignal?.();
			this.detachSignal = null;
		}
	}

	private async runShutdown(timeoutMs: number): Promise<void> {
		const deadline = Date.now() + timeoutMs;
		const left = (): number => Math.max(0, deadline - Date.now());

		this.shared.markClosed();

		const remote = this.remote;
		if (!remote) {
			this.controller.abort();
			return;
		}

		let timedOut: FlushTimeoutError | null = null;
		const remaining = remote.writer.isRunning
			? await remote.writer.drain(timeoutMs)
			: remote.writer.pending;
		if (remaining > 0) {
			timedOut = new FlushTimeoutError(remaining);
			this.diagnostics.warn(timedOut.message, { remaining });
		}

		remote.queue.close();
		if (this.tasks.length > 0 && !(await settleWithin(this.tasks[0], left()))) {
			this.diagnostics.debug('batch writer did not finish before the close deadline');
		}

		this.shared.tearDown();
		const conn = this.shared.take();
		if (conn) await settleWithin(closeConnection(conn, this.diagnostics), left());
		this.controller.abort();
		if (this.tasks.length > 1) await settleWithin(this.tasks[1], left());

		if (timedOut) throw timedOut;
	}
}

// ─── Handler ──────────────────────────────────────────────────────────────────

export class LogHandler {
	private readonly root: HandlerRoot;
	private readonly scope: Scope;

	constructor(source: LogHandlerOptions | HandlerRoot, scope: Scope = EMPTY_SCOPE) {
		this.root = source instanceof HandlerRoot ? source : new HandlerRoot(source);
		this.scope = scope;
	}

	/**
	 * Record one event: write it to the local sink, then offer it to the
	 * remote path. Returns the local sink's outcome.
	 */
	log(record: LogRecord): LogResult {
		const root = this.root;
		if (root.shared.closed) return { status: 'closed', error: new ClosedError() };
		if (!this.enabled(record.level)) return { status: 'filtered' };

		const event = buildEvent(record, this.scope);

		let result: LogResult;
		try {
			root.sink.write(event);
			result = { status: 'written' };
		} catch (err) {
			result = {
				status: 'failed',
				error: err instanceof Error ? err : new Error(errorMessage(err)),
			};
		}

		root.dispatch(event);
		return result;
	}

	debug(message: string, attrs?: AttrInput): LogResult {
		return this.log({ level: 'debug', message, attrs });
	}

	info(message: string, attrs?: AttrInput): LogResult {
		return this.log({ level: 'info', message, attrs });
	}

	warn(message: string, attrs?: AttrInput): LogResult {
		return this.log({ level: 'warn', message, attrs });
	}

	error(message: string, attrs?: AttrInput): LogResult {
		return this.log({ level: 'error', message, attrs });
	}

	enabled(level: LogLevel): boolean {
		return levelEnabled(level, this.root.level);
	}

	/** Derive a handler that adds `attrs` to every event. Empty input returns this handler. */
	withAttributes(attrs: AttrInput): LogHandler {
		const scope = scopeWithAttrs(this.scope, attrs);
		return scope === this.scope ? this : new LogHandler(this.root, scope);
	}

	/** Derive a handler that nests later attributes under `name`. Empty name returns this handler. */
	withGroup(name: string): LogHandler {
		const scope = scopeWithGroup(this.scope, name);
		return scope === this.scope ? this : new LogHandler(this.root, scope);
	}

	/**
	 * Enable remote streaming. Must be called once, before start().
	 * Throws ConfigError for an empty, unparsable or non-ws(s) URL.
	 */
	configureRemote(url: string, token: string, options?: RemoteOptionsInput): void {
		this.root.configureRemote(url, token, options);
	}

	/** Launch the batch writer and connection manager. Returns immediately. */
	start(signal?: AbortSignal): void {
		this.root.start(signal);
	}

	/**
	 * Shut down the whole root. Every call, on any derived handler, returns the
	 * same promise. Rejects with FlushTimeoutError when pending messages could
	 * not be flushed before the deadline.
	 */
	close(timeoutMs?: number): Promise<void> {
		return this.root.close(timeoutMs);
	}

	get remoteEnabled(): boolean {
		return this.root.runtime !== null;
	}

	get closed(): boolean {
		return this.root.shared.closed;
	}

	get connectionState(): ConnectionState | 'disabled' {
		return this.root.runtime?.manager.state ?? 'disabled';
	}

	/** Subscribe to connection state changes. Returns an unsubscribe function. */
	onConnectionState(listener: (state: ConnectionState) => void): () => void {
		const manager = this.root.runtime?.manager;
		if (!manager) return () => {};
		manager.on('state', listener);
		return () => {
			manager.off('state', listener);
		};
	}

	stats(): HandlerStats {
		const remote = this.root.runtime;
		if (!remote) return { queued: 0, batched: 0, dropped: 0, sent: 0, state: 'disabled' };
		return {
			queued: remote.queue.size,
			batched: remote.writer.batched,
			dropped: remote.queue.dropped,
			sent: remote.writer.sent,
			state: remote.manager.state,
		};
	}
}
