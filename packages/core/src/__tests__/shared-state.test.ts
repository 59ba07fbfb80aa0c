import { FakeConnection } from '@logwire/sdk';
import { describe, expect, it, vi } from 'vitest';
import { DispatchQueue } from '../queue.js';
import { SharedState } from '../shared-state.js';

function connection(): FakeConnection {
	return new FakeConnection({
		url: 'ws://127.0.0.1:9/logs',
		token: 'test-secret',
		handshakeTimeoutMs: 1000,
		readBufferSize: 4096,
		writeBufferSize: 4096,
	});
}

describe('SharedState', () => {
	it('enqueues only while open and a queue is attached', () => {
		const shared = new SharedState();
		expect(shared.enqueue('early')).toBe(false);

		const queue = new DispatchQueue(2);
		shared.attachQueue(queue);
		expect(shared.enqueue('a')).toBe(true);

		expect(shared.markClosed()).toBe(true);
		expect(shared.markClosed()).toBe(false);
		expect(shared.enqueue('b')).toBe(false);
		expect(queue.take(10)).toEqual(['a']);
	});

	it('publishes while closed until torn down', () => {
		const shared = new SharedState();
		const listener = vi.fn();
		shared.onPublish(listener);
		const first = connection();

		shared.markClosed();
		expect(shared.publish(first)).toBe(true);
		expect(shared.current).toBe(first);
		expect(listener).toHaveBeenCalledWith(first);

		shared.tearDown();
		expect(shared.tornDown).toBe(true);
		expect(shared.publish(connection())).toBe(false);
		expect(shared.current).toBe(first);
		expect(listener).toHaveBeenCalledTimes(1);
	});

	it('lets exactly one side release a connection', () => {
		const shared = new SharedState();
		const conn = connection();
		shared.publish(conn);

		expect(shared.take()).toBe(conn);
		expect(shared.release(conn)).toBe(false);
		expect(shared.take()).toBeNull();
	});
});
