/**
 * Batch writer — the dispatch queue's only consumer.
 *
 * Moves queued payloads into an in-memory batch and flushes it over the
 * current connection when the batch interval ticks, the batch is full, or an
 * immediate flush is requested. Each payload goes out as its own message.
 * Recovery from a failed send is left to the connection manager.
 */

import { type Diagnostics, TransmitError, type TransportConnection, errorMessage } from '@logwire/sdk';
import type { DispatchQueue } from './queue.js';
import type { SharedState } from './shared-state.js';

export interface BatchWriterOptions {
	batchIntervalMs: number;
	maxBatchSize: number;
}

/** Coalescing wake-up signal for the writer loop. */
class Wakeup {
	private resolver: (() => void) | null = null;
	private pending = false;

	notify(): void {
		const resolve = this.resolver;
		if (resolve) {
			this.resolver = null;
			resolve();
		} else {
			this.pending = true;
		}
	}

	wait(): Promise<void> {
		if (this.pending) {
			this.pending = false;
			return Promise.resolve();
		}
		return new Promise((resolve) => {
			this.resolver = resolve;
		});
	}
}

export class BatchWriter {
	private readonly shared: SharedState;
	private readonly queue: DispatchQueue;
	private readonly options: BatchWriterOptions;
	private readonly diagnostics: Diagnostics;
	private readonly wakeup = new Wakeup();
	private readonly progressListeners = new Set<() => void>();
	private batch: string[] = [];
	private flushRequested = false;
	private tickDue = false;
	private sentCount = 0;
	private running: Promise<void> | null = null;
	private stopped = false;
	/** Last connection a send failed on; never written to again */
	private failed: TransportConnection | null = null;

	constructor(
		shared: SharedState,
		queue: DispatchQueue,
		options: BatchWriterOptions,
		diagnostics: Diagnostics,
	) {
		this.shared = shared;
		this.queue = queue;
		this.options = options;
		this.diagnostics = diagnostics;
	}

	/** Start the consumer loop. Calling it again returns the same task. */
	start(signal: AbortSignal): Promise<void> {
		if (!this.running) this.running = this.run(signal);
		return this.running;
	}

	/** Ask for an immediate flush of everything pending. */
	requestFlush(): void {
		this.flushRequested = true;
		this.wakeup.notify();
	}

	/**
	 * Request an immediate flush and wait until nothing is pending, or until
	 * `timeoutMs` passes. Resolves with the number of payloads still pending.
	 * A writer that has already stopped resolves at once.
	 */
	drain(timeoutMs: number): Promise<number> {
		this.requestFlush();
		if (this.pending === 0 || this.stopped) return Promise.resolve(this.pending);

		return new Promise((resolve) => {
			const finish = (remaining: number): void => {
				clearTimeout(timer);
				this.progressListeners.delete(onProgress);
				resolve(remaining);
			};
			const onProgress = (): void => {
				if (this.pending === 0 || this.stopped) finish(this.pending);
			};
			const timer = setTimeout(() => finish(this.pending), timeoutMs);
			this.progressListeners.add(onProgress);
		});
	}

	/** Payloads queued or batched but not yet transmitted */
	get pending(): number {
		return this.queue.size + this.batch.length;
	}

	get batched(): number {
		return this.batch.length;
	}

	get sent(): number {
		return this.sentCount;
	}

	get isRunning(): boolean {
		return this.running !== null && !this.stopped;
	}

	// ─── Loop ────────────────────────────────────────────────────────────────

	private async run(signal: AbortSignal): Promise<void> {
		const wake = (): void => this.wakeup.notify();
		const unsubscribeQueue = this.queue.subscribe(() => {
			// A full batch that cannot be flushed stops draining the queue,
			// so new payloads only wake the loop when there is room.
			if (this.batch.length < this.options.maxBatchSize || this.queue.isClosed) wake();
		});
		const unsubscribePublish = this.shared.onPublish(wake);
		signal.addEventListener('abort', wake, { once: true });
		const ticker = setInterval(() => {
			this.tickDue = true;
			wake();
		}, this.options.batchIntervalMs);
		ticker.unref();

		try {
			while (!signal.aborted && !this.queue.isClosed) {
				this.fill();

				let progressed = false;
				if (
					this.batch.length >= this.options.maxBatchSize ||
					this.tickDue ||
					this.flushRequested
				) {
					this.tickDue = false;
					progressed = await this.flush();
				}

				if (this.pending === 0) this.flushRequested = false;
				this.reportProgress();

				// Room freed and more waiting: keep going without sleeping
				if (progressed && this.queue.size > 0) continue;
				await this.wakeup.wait();
			}
		} finally {
			clearInterval(ticker);
			unsubscribeQueue();
			unsubscribePublish();
			signal.removeEventListener('abort', wake);
		}

		// Final drain: everything left goes out in one best-effort flush
		this.batch.push(...this.queue.take(this.queue.size));
		await this.flush();
		if (this.batch.length > 0) {
			this.diagnostics.debug(`batch writer stopped with ${this.batch.length} unsent messages`);
		}
		this.stopped = true;
		this.reportProgress();
	}

	private fill(): void {
		const room = this.options.maxBatchSize - this.batch.length;
		if (room > 0) this.batch.push(...this.queue.take(room));
	}

	/**
	 * Send the batch in order over the current connection. Stops at the first
	 * failure; unsent payloads stay at the head of the batch until another
	 * connection is published. Returns true when at least one payload went out.
	 */
	private async flush(): Promise<boolean> {
		if (this.batch.length === 0) return false;
		const conn = this.shared.current;
		if (!conn || conn === this.failed) return false;

		const outgoing = [...this.batch];
		let sent = 0;
		try {
			for (const payload of outgoing) {
				await conn.send(payload);
				sent++;
			}
		} catch (err) {
			const error =
				err instanceof TransmitError
					? err
					: new TransmitError(errorMessage(err), { cause: err });
			this.failed = conn;
			this.diagnostics.warn(`failed to write message: ${error.message}`, {
				unsent: outgoing.length - sent,
			});
			this.shared.reportTransmitFailure(conn, error);
		} finally {
			this.batch.splice(0, sent);
			this.sentCount += sent;
		}
		return sent > 0;
	}

	private reportProgress(): void {
		for (const listener of [...this.progressListeners]) listener();
	}
}
