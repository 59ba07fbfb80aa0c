/**
 * Shared state block — the one piece of state several tasks mutate.
 *
 * Holds the current connection, the closed and torn-down flags and the
 * dispatch queue for a handler root. Every derived handler, the batch writer
 * and the connection manager hold a reference to the same block. All reads and updates happen in
 * synchronous methods, so on the event loop each one is atomic with respect to
 * every other task: "closed?", "queue open?" and "who owns the connection?"
 * can never be observed half-updated.
 */

import type { TransportConnection } from '@logwire/sdk';
import type { DispatchQueue } from './queue.js';

export type PublishListener = (conn: TransportConnection) => void;
export type TransmitFailureListener = (conn: TransportConnection, err: Error) => void;

export class SharedState {
	private connection: TransportConnection | null = null;
	private closedFlag = false;
	private tornDownFlag = false;
	private dispatchQueue: DispatchQueue | null = null;
	private readonly publishListeners = new Set<PublishListener>();
	private readonly failureListeners = new Set<TransmitFailureListener>();

	// ─── Closed flag ─────────────────────────────────────────────────────────

	get closed(): boolean {
		return this.closedFlag;
	}

	/** Flip closed false → true. Returns false if it was already closed. */
	markClosed(): boolean {
		if (this.closedFlag) return false;
		this.closedFlag = true;
		return true;
	}

	/** Set when shutdown takes the connection; the connection manager stops here. */
	get tornDown(): boolean {
		return this.tornDownFlag;
	}

	tearDown(): void {
		this.tornDownFlag = true;
	}

	// ─── Queue ───────────────────────────────────────────────────────────────

	attachQueue(queue: DispatchQueue): void {
		this.dispatchQueue = queue;
	}

	/** Safe to enqueue: not closed, and a queue exists that is still open. */
	canEnqueue(): boolean {
		return !this.closedFlag && this.dispatchQueue !== null && !this.dispatchQueue.isClosed;
	}

	/** Check and enqueue in one step. Returns false when the payload was not queued. */
	enqueue(payload: string): boolean {
		if (!this.canEnqueue() || !this.dispatchQueue) return false;
		return this.dispatchQueue.offer(payload);
	}

	// ─── Current connection ──────────────────────────────────────────────────

	get current(): TransportConnection | null {
		return this.connection;
	}

	/**
	 * Make `conn` the current connection. Still allowed while closing drains
	 * the queue; refused once torn down, so nothing is published after
	 * shutdown took the connection.
	 */
	publish(conn: TransportConnection): boolean {
		if (this.tornDownFlag) return false;
		this.connection = conn;
		for (const listener of this.publishListeners) listener(conn);
		return true;
	}

	/**
	 * Clear `conn` if it is still current. Returns true when the caller now
	 * owns releasing it; false when someone else already took it.
	 */
	release(conn: TransportConnection): boolean {
		if (this.connection !== conn) return false;
		this.connection = null;
		return true;
	}

	/** Take the current connection out, whatever it is. Used by shutdown. */
	take(): TransportConnection | null {
		const conn = this.connection;
		this.connection = null;
		return conn;
	}

	// ─── Notifications ───────────────────────────────────────────────────────

	onPublish(listener: PublishListener): () => void {
		this.publishListeners.add(listener);
		return () => {
			this.publishListeners.delete(listener);
		};
	}

	/** The batch writer reports failed sends; the connection manager treats them as loss. */
	reportTransmitFailure(conn: TransportConnection, err: Error): void {
		for (const listener of this.failureListeners) listener(conn, err);
	}

	onTransmitFailure(listener: TransmitFailureListener): () => void {
		this.failureListeners.add(listener);
		return () => {
			this.failureListeners.delete(listener);
		};
	}
}
