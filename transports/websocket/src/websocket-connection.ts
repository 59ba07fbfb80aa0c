/**
 * WebSocket transport — dials the collector with `ws` and adapts the socket
 * to the TransportConnection contract.
 */

import WebSocket from 'ws';
import {
	type DialOptions,
	TransmitError,
	type TransportConnection,
	type TransportDialer,
	errorMessage,
} from '@logwire/sdk';

/** How long close() waits for the peer's close frame before terminating */
export const DEFAULT_CLOSE_GRACE_MS = 1_000;

export class WebSocketConnection implements TransportConnection {
	private readonly socket: WebSocket;
	private readonly writeBufferSize: number;
	private readonly closeGraceMs: number;
	private readonly ackListeners: Array<() => void> = [];
	private readonly closeListeners: Array<(reason: Error | undefined) => void> = [];
	private lastError: Error | undefined;
	private ended = false;
	private endReason: Error | undefined;
	private closing: Promise<void> | null = null;

	constructor(socket: WebSocket, writeBufferSize: number, closeGraceMs = DEFAULT_CLOSE_GRACE_MS) {
		this.socket = socket;
		this.writeBufferSize = writeBufferSize;
		this.closeGraceMs = closeGraceMs;

		const ack = (): void => {
			for (const listener of this.ackListeners) listener();
		};
		socket.on('pong', ack);
		socket.on('message', ack);
		socket.on('error', (err: Error) => {
			this.lastError = err;
		});
		socket.on('close', (code: number, reason: Buffer) => {
			if (code === 1000) {
				this.end(this.lastError);
				return;
			}
			const detail = reason.length > 0 ? `: ${reason.toString('utf8')}` : '';
			this.end(this.lastError ?? new Error(`connection closed with code ${code}${detail}`));
		});
	}

	send(message: string): Promise<void> {
		if (this.socket.readyState !== WebSocket.OPEN) {
			return Promise.reject(new TransmitError('connection is not open'));
		}
		if (this.socket.bufferedAmount > this.writeBufferSize) {
			return Promise.reject(
				new TransmitError(
					`write buffer full: ${this.socket.bufferedAmount} bytes pending (limit ${this.writeBufferSize})`,
				),
			);
		}
		return new Promise((resolve, reject) => {
			this.socket.send(message, (err) => {
				if (err) reject(new TransmitError(err.message, { cause: err }));
				else resolve();
			});
		});
	}

	ping(): Promise<void> {
		if (this.socket.readyState !== WebSocket.OPEN) {
			return Promise.reject(new Error('connection is not open'));
		}
		return new Promise((resolve, reject) => {
			this.socket.ping(undefined, undefined, (err) => {
				if (err) reject(err);
				else resolve();
			});
		});
	}

	onAck(listener: () => void): void {
		this.ackListeners.push(listener);
	}

	onClose(listener: (reason: Error | undefined) => void): void {
		if (this.ended) {
			const reason = this.endReason;
			queueMicrotask(() => listener(reason));
			return;
		}
		this.closeListeners.push(listener);
	}

	/** Close handshake (code 1000); terminates the socket if the peer stays silent. */
	close(): Promise<void> {
		if (!this.closing) {
			this.closing = new Promise((resolve) => {
				if (this.socket.readyState === WebSocket.CLOSED) {
					resolve();
					return;
				}
				const timer = setTimeout(() => this.socket.terminate(), this.closeGraceMs);
				timer.unref();
				this.socket.once('close', () => {
					clearTimeout(timer);
					resolve();
				});
				if (this.socket.readyState === WebSocket.OPEN) {
					this.socket.close(1000, 'client closing');
				}
			});
		}
		return this.closing;
	}

	get isOpen(): boolean {
		return this.socket.readyState === WebSocket.OPEN;
	}

	private end(reason: Error | undefined): void {
		if (this.ended) return;
		this.ended = true;
		this.endReason = reason;
		for (const listener of this.closeListeners) listener(reason);
	}
}

export interface WebSocketDialerOptions {
	/** Grace period for each connection's close handshake (default: 1s) */
	closeGraceMs?: number;
}

/**
 * Dials `ws://` and `wss://` collectors, sending the token as a bearer
 * Authorization header.
 */
export class WebSocketDialer implements TransportDialer {
	private readonly closeGraceMs: number;

	constructor(options: WebSocketDialerOptions = {}) {
		this.closeGraceMs = options.closeGraceMs ?? DEFAULT_CLOSE_GRACE_MS;
	}

	dial(options: DialOptions): Promise<WebSocketConnection> {
		const { signal } = options;
		if (signal?.aborted) return Promise.reject(new Error('dial aborted'));

		const headers: Record<string, string> = {};
		if (options.token !== '') headers.Authorization = `Bearer ${options.token}`;

		return new Promise((resolve, reject) => {
			const socket = new WebSocket(options.url, {
				headers,
				handshakeTimeout: options.handshakeTimeoutMs,
				maxPayload: options.readBufferSize,
			});
			let settled = false;

			const onOpen = (): void => {
				if (settled) return;
				settled = true;
				signal?.removeEventListener('abort', onAbort);
				const conn = new WebSocketConnection(socket, options.writeBufferSize, this.closeGraceMs);
				socket.off('error', onError);
				resolve(conn);
			};
			// Stays attached until open: terminate() while connecting reports an error later
			const onError = (err: Error): void => {
				if (settled) return;
				settled = true;
				signal?.removeEventListener('abort', onAbort);
				reject(new Error(`dial ${options.url}: ${errorMessage(err)}`, { cause: err }));
			};
			const onAbort = (): void => {
				if (settled) return;
				settled = true;
				socket.terminate();
				reject(new Error('dial aborted'));
			};

			socket.once('open', onOpen);
			socket.on('error', onError);
			signal?.addEventListener('abort', onAbort, { once: true });
		});
	}
}
