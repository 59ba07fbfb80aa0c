/**
 * Transport contract between the connection manager and a concrete
 * push-connection implementation (WebSocket, or an in-process fake in tests).
 */

export interface DialOptions {
	/** Collector endpoint (ws:// or wss://) */
	url: string;
	/** Bearer token; sent as `Authorization: Bearer <token>` when non-empty */
	token: string;
	/** Handshake timeout in milliseconds */
	handshakeTimeoutMs: number;
	/** Largest inbound frame accepted, in bytes */
	readBufferSize: number;
	/** Outbound bytes allowed to sit unflushed before a send fails */
	writeBufferSize: number;
	/** Aborts an in-flight dial */
	signal?: AbortSignal;
}

/**
 * A live, authenticated connection to the collector.
 *
 * Exactly one owner releases it: the connection manager after a loss, or the
 * handler's shutdown protocol if it took the connection first.
 */
export interface TransportConnection {
	/** Send one text message. Rejects with TransmitError on failure. */
	send(message: string): Promise<void>;

	/** Send a liveness ping. Rejects if the ping cannot be written. */
	ping(): Promise<void>;

	/** Called for every acknowledgement from the peer (pong or inbound message). */
	onAck(listener: () => void): void;

	/** Called once when the connection ends, for whatever reason. */
	onClose(listener: (reason: Error | undefined) => void): void;

	/** Close handshake, then release. Safe to call more than once. */
	close(): Promise<void>;
}

export interface TransportDialer {
	dial(options: DialOptions): Promise<TransportConnection>;
}
