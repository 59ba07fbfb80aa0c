/**
 * Connection manager — owns the remote connection's lifecycle.
 *
 *   disconnected → connecting → connected → disconnected → …
 *
 * with `closed` as the terminal state once the handler closes, the task is
 * cancelled, or a finite retry budget runs out. While connected, a keepalive
 * ticker pings the peer and a liveness deadline, extended by every
 * acknowledgement, detects silent loss.
 */

import { EventEmitter } from 'node:events';
import type { Diagnostics, TransportConnection, TransportDialer } from '@logwire/sdk';
import { errorMessage } from '@logwire/sdk';
import type { SharedState } from './shared-state.js';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'closed';

export interface ConnectionManagerOptions {
	url: string;
	token: string;
	reconnectDelayMs: number;
	/** null retries forever */
	maxReconnectAttempts: number | null;
	handshakeTimeoutMs: number;
	readBufferSize: number;
	writeBufferSize: number;
	pingIntervalMs: number;
	pongWaitMs: number;
}

/** Wait `ms`, returning early when `signal` aborts. */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
	if (signal.aborted) return Promise.resolve();
	return new Promise((resolve) => {
		const done = (): void => {
			clearTimeout(timer);
			signal.removeEventListener('abort', done);
			resolve();
		};
		const timer = setTimeout(done, ms);
		signal.addEventListener('abort', done, { once: true });
	});
}

/** Close a connection, reporting (not throwing) failures. */
export async function closeConnection(
	conn: TransportConnection,
	diagnostics: Diagnostics,
): Promise<void> {
	try {
		await conn.close();
	} catch (err) {
		diagnostics.debug(`error closing connection: ${errorMessage(err)}`);
	}
}

export class ConnectionManager extends EventEmitter {
	private readonly shared: SharedState;
	private readonly dialer: TransportDialer;
	private readonly options: ConnectionManagerOptions;
	private readonly diagnostics: Diagnostics;
	private stateValue: ConnectionState = 'disconnected';
	private failedAttempts = 0;
	private running: Promise<void> | null = null;

	constructor(
		shared: SharedState,
		dialer: TransportDialer,
		options: ConnectionManagerOptions,
		diagnostics: Diagnostics,
	) {
		super();
		this.shared = shared;
		this.dialer = dialer;
		this.options = options;
		this.diagnostics = diagnostics;
	}

	/** Start the supervising loop. Calling it again returns the same task. */
	start(signal: AbortSignal): Promise<void> {
		if (!this.running) this.running = this.run(signal);
		return this.running;
	}

	get state(): ConnectionState {
		return this.stateValue;
	}

	/** Consecutive failed dials since the last successful connection */
	get attempts(): number {
		return this.failedAttempts;
	}

	private setState(next: ConnectionState): void {
		if (this.stateValue === next) return;
		const previous = this.stateValue;
		this.stateValue = next;
		this.emit('state', next, previous);
	}

	private stopping(signal: AbortSignal): boolean {
		return signal.aborted || this.shared.tornDown;
	}

	private budget(): string {
		const max = this.options.maxReconnectAttempts;
		return max === null ? '(unlimited)' : `of ${max}`;
	}

	// ─── Loop ────────────────────────────────────────────────────────────────

	private async run(signal: AbortSignal): Promise<void> {
		const max = this.options.maxReconnectAttempts;
		try {
			while (!this.stopping(signal)) {
				this.setState('connecting');

				let conn: TransportConnection;
				try {
					conn = await this.dialer.dial({
						url: this.options.url,
						token: this.options.token,
						handshakeTimeoutMs: this.options.handshakeTimeoutMs,
						readBufferSize: this.options.readBufferSize,
						writeBufferSize: this.options.writeBufferSize,
						signal,
					});
				} catch (err) {
					this.setState('disconnected');
					if (this.stopping(signal)) break;

					this.failedAttempts++;
					if (max !== null && this.failedAttempts > max) {
						this.diagnostics.error(
							`giving up on remote logging after ${this.failedAttempts} failed connection attempts: ${errorMessage(err)}`,
						);
						return;
					}
					this.diagnostics.warn(
						`connection attempt ${this.failedAttempts} ${this.budget()} failed: ${errorMessage(err)}`,
						{ attempt: this.failedAttempts, max_attempts: max ?? 'unlimited' },
					);
					await sleep(this.options.reconnectDelayMs, signal);
					continue;
				}

				this.failedAttempts = 0;

				// Shutdown may have torn down while the dial was in flight
				if (this.stopping(signal) || !this.shared.publish(conn)) {
					await closeConnection(conn, this.diagnostics);
					break;
				}

				this.setState('connected');
				this.diagnostics.debug('connected to remote collector', { url: this.options.url });

				const reason = await this.supervise(conn, signal);

				// Shutdown may already have taken (and closed) the connection
				if (this.shared.release(conn)) {
					await closeConnection(conn, this.diagnostics);
				}
				this.setState('disconnected');
				if (this.stopping(signal)) break;

				this.diagnostics.warn(
					`connection lost (${reason}); reconnecting in ${this.options.reconnectDelayMs}ms`,
				);
				await sleep(this.options.reconnectDelayMs, signal);
			}
		} finally {
			this.setState('closed');
		}
	}

	/**
	 * Watch a live connection until it is lost or the task is cancelled.
	 * Resolves with a short description of why supervision ended.
	 */
	private supervise(conn: TransportConnection, signal: AbortSignal): Promise<string> {
		return new Promise((resolve) => {
			let settled = false;

			const deadline = setTimeout(() => {
				finish(`no acknowledgement within ${this.options.pongWaitMs}ms`);
			}, this.options.pongWaitMs);
			deadline.unref();

			const keepalive = setInterval(() => {
				conn.ping().catch((err: unknown) => {
					finish(`keepalive failed: ${errorMessage(err)}`);
				});
			}, this.options.pingIntervalMs);
			keepalive.unref();

			const onAbort = (): void => finish('cancelled');

			const unsubscribeFailure = this.shared.onTransmitFailure((failed, err) => {
				if (failed === conn) finish(`transmit failed: ${err.message}`);
			});

			function finish(reason: string): void {
				if (settled) return;
				settled = true;
				clearTimeout(deadline);
				clearInterval(keepalive);
				signal.removeEventListener('abort', onAbort);
				unsubscribeFailure();
				resolve(reason);
			}

			conn.onAck(() => {
				if (!settled) deadline.refresh();
			});
			conn.onClose((reason) => {
				finish(reason ? `closed: ${reason.message}` : 'closed by peer');
			});
			signal.addEventListener('abort', onAbort, { once: true });
			if (signal.aborted) finish('cancelled');
		});
	}
}
