/**
 * LocalCollector — an in-process development collector.
 *
 * Accepts WebSocket connections on 127.0.0.1, checks the bearer token,
 * records every text message and can drop its clients to simulate
 * connection loss. Pings are answered by `ws` itself.
 */

import { EventEmitter } from 'node:events';
import type { IncomingMessage } from 'node:http';
import WebSocket, { WebSocketServer } from 'ws';

export interface LocalCollectorOptions {
	/** Port to listen on (default: 0, any free port) */
	port?: number;
	/** Interface to bind (default: 127.0.0.1) */
	host?: string;
	/** Expected bearer token; connections without it get 401. Empty accepts anyone. */
	token?: string;
	/** Largest accepted message in bytes (default: 1 MiB) */
	maxPayload?: number;
}

function rawToString(data: WebSocket.RawData): string {
	if (Buffer.isBuffer(data)) return data.toString('utf8');
	if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
	return Buffer.from(data).toString('utf8');
}

/**
 * Emits `message` (text), `connection` (authorization header),
 * `disconnect` (close code) and `clientError` (Error).
 */
export class LocalCollector extends EventEmitter {
	/** Every text message received, in arrival order */
	readonly messages: string[] = [];
	/** Authorization header of every accepted connection */
	readonly authorizations: Array<string | undefined> = [];
	/** Close codes of finished connections */
	readonly closeCodes: number[] = [];
	private readonly options: LocalCollectorOptions;
	private readonly clients = new Set<WebSocket>();
	private server: WebSocketServer | null = null;
	private boundPort = 0;

	constructor(options: LocalCollectorOptions = {}) {
		super();
		this.options = options;
	}

	/** Start listening. Resolves with the bound port. */
	async start(): Promise<number> {
		if (this.server) return this.boundPort;
		const token = this.options.token ?? '';
		const verifyClient = (
			info: { req: IncomingMessage },
			callback: (accepted: boolean, code?: number, message?: string) => void,
		): void => {
			if (token === '' || info.req.headers.authorization === `Bearer ${token}`) {
				callback(true);
			} else {
				callback(false, 401, 'Unauthorized');
			}
		};

		const server = new WebSocketServer({
			host: this.options.host ?? '127.0.0.1',
			port: this.options.port ?? 0,
			maxPayload: this.options.maxPayload ?? 1024 * 1024,
			verifyClient,
		});

		await new Promise<void>((resolve, reject) => {
			server.once('listening', () => resolve());
			server.once('error', reject);
		});

		server.on('connection', (socket: WebSocket, req: IncomingMessage) => {
			this.clients.add(socket);
			this.authorizations.push(req.headers.authorization);
			this.emit('connection', req.headers.authorization);

			socket.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
				if (isBinary) return;
				const text = rawToString(data);
				this.messages.push(text);
				this.emit('message', text);
			});
			socket.on('error', (err: Error) => {
				this.emit('clientError', err);
			});
			socket.on('close', (code: number) => {
				this.clients.delete(socket);
				this.closeCodes.push(code);
				this.emit('disconnect', code);
			});
		});

		const address = server.address();
		this.boundPort = typeof address === 'object' && address !== null ? address.port : 0;
		this.server = server;
		return this.boundPort;
	}

	get port(): number {
		return this.boundPort;
	}

	get url(): string {
		return `ws://${this.options.host ?? '127.0.0.1'}:${this.boundPort}`;
	}

	get clientCount(): number {
		return this.clients.size;
	}

	/** Terminate every client without a close handshake. */
	dropClients(): void {
		for (const client of this.clients) client.terminate();
	}

	/** Resolves once at least `count` messages have arrived. */
	waitForMessages(count: number, timeoutMs = 2_000): Promise<string[]> {
		if (this.messages.length >= count) return Promise.resolve([...this.messages]);
		return new Promise((resolve, reject) => {
			const onMessage = (): void => {
				if (this.messages.length < count) return;
				clearTimeout(timer);
				this.off('message', onMessage);
				resolve([...this.messages]);
			};
			const timer = setTimeout(() => {
				this.off('message', onMessage);
				reject(
					new Error(`timed out waiting for ${count} messages (received ${this.messages.length})`),
				);
			}, timeoutMs);
			this.on('message', onMessage);
		});
	}

	async stop(): Promise<void> {
		const server = this.server;
		if (!server) return;
		this.server = null;
		this.dropClients();
		await new Promise<void>((resolve, reject) => {
			server.close((err) => (err ? reject(err) : resolve()));
		});
	}
}
