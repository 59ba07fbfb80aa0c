/**
 * Dispatch queue — bounded FIFO between producers and the batch writer.
 *
 * offer() never blocks and never throws: a full or closed queue discards the
 * payload and reports false. Exactly one consumer drains it.
 */

export const DEFAULT_QUEUE_CAPACITY = 1000;

export type QueueListener = () => void;

export class DispatchQueue {
	readonly capacity: number;
	private items: string[] = [];
	private head = 0;
	private closedFlag = false;
	private droppedCount = 0;
	private readonly listeners = new Set<QueueListener>();

	constructor(capacity = DEFAULT_QUEUE_CAPACITY) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new RangeError(`queue capacity must be a positive integer, got ${capacity}`);
		}
		this.capacity = capacity;
	}

	/** Enqueue without waiting. Returns false when the payload was dropped. */
	offer(payload: string): boolean {
		if (this.closedFlag || this.size >= this.capacity) {
			this.droppedCount++;
			return false;
		}
		this.items.push(payload);
		this.notify();
		return true;
	}

	/** Remove up to `max` payloads, oldest first. */
	take(max: number): string[] {
		const count = Math.min(max, this.size);
		if (count <= 0) return [];
		const taken = this.items.slice(this.head, this.head + count);
		this.head += count;
		// Compact once the consumed prefix dominates the backing array
		if (this.head > 64 && this.head * 2 >= this.items.length) {
			this.items = this.items.slice(this.head);
			this.head = 0;
		}
		return taken;
	}

	/** Stop accepting payloads and wake the consumer. Idempotent. */
	close(): void {
		if (this.closedFlag) return;
		this.closedFlag = true;
		this.notify();
	}

	/** Called after every accepted payload and on close. */
	subscribe(listener: QueueListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	get size(): number {
		return this.items.length - this.head;
	}

	get isClosed(): boolean {
		return this.closedFlag;
	}

	get isFull(): boolean {
		return this.size >= this.capacity;
	}

	get dropped(): number {
		return this.droppedCount;
	}

	private notify(): void {
		for (const listener of this.listeners) listener();
	}
}
