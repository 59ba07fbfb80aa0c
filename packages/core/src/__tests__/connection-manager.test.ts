import { FakeDialer, RecordingDiagnostics, TransmitError } from '@logwire/sdk';
import { afterEach, describe, expect, it, vi } from 'vitest';
import {
	type ConnectionManagerOptions,
	type ConnectionState,
	ConnectionManager,
} from '../connection-manager.js';
import { SharedState } from '../shared-state.js';

const controllers: AbortController[] = [];

function setup(overrides: Partial<ConnectionManagerOptions> = {}) {
	const shared = new SharedState();
	const dialer = new FakeDialer();
	const diagnostics = new RecordingDiagnostics();
	const manager = new ConnectionManager(
		shared,
		dialer,
		{
			url: 'ws://127.0.0.1:9/logs',
			token: 'test-secret',
			reconnectDelayMs: 20,
			maxReconnectAttempts: null,
			handshakeTimeoutMs: 1000,
			readBufferSize: 4096,
			writeBufferSize: 4096,
			pingIntervalMs: 1000,
			pongWaitMs: 5000,
			...overrides,
		},
		diagnostics,
	);
	const controller = new AbortController();
	controllers.push(controller);
	return { shared, dialer, diagnostics, manager, controller };
}

afterEach(() => {
	for (const controller of controllers.splice(0)) controller.abort();
});

describe('ConnectionManager', () => {
	it('dials with the configured endpoint and publishes the connection', async () => {
		const { shared, dialer, manager, controller } = setup();
		void manager.start(controller.signal);

		await vi.waitFor(() => expect(manager.state).toBe('connected'));
		expect(shared.current).toBe(dialer.current);
		expect(dialer.attempts).toHaveLength(1);
		expect(dialer.attempts[0]).toMatchObject({
			url: 'ws://127.0.0.1:9/logs',
			token: 'test-secret',
			handshakeTimeoutMs: 1000,
			readBufferSize: 4096,
			writeBufferSize: 4096,
		});
	});

	it('retries failed dials and resets the attempt counter on success', async () => {
		const { dialer, diagnostics, manager, controller } = setup();
		dialer.failNext(2);
		void manager.start(controller.signal);

		await vi.waitFor(() => expect(manager.state).toBe('connected'));
		expect(dialer.attempts).toHaveLength(3);
		expect(manager.attempts).toBe(0);
		expect(diagnostics.messages('warn')).toEqual([
			'connection attempt 1 (unlimited) failed: connection refused',
			'connection attempt 2 (unlimited) failed: connection refused',
		]);
	});

	it('gives up once the reconnect cap is exceeded', async () => {
		const { shared, dialer, diagnostics, manager, controller } = setup({
			maxReconnectAttempts: 2,
			reconnectDelayMs: 10,
		});
		dialer.setFailAlways(true);

		await manager.start(controller.signal);

		expect(dialer.attempts).toHaveLength(3);
		expect(manager.state).toBe('closed');
		expect(shared.current).toBeNull();
		expect(diagnostics.messages('warn')).toEqual([
			'connection attempt 1 of 2 failed: connection refused',
			'connection attempt 2 of 2 failed: connection refused',
		]);
		expect(diagnostics.messages('error')).toEqual([
			'giving up on remote logging after 3 failed connection attempts: connection refused',
		]);
	});

	it('reconnects after the reconnect delay when the peer goes away', async () => {
		const { shared, dialer, diagnostics, manager, controller } = setup();
		const connectedAt: number[] = [];
		manager.on('state', (state: ConnectionState) => {
			if (state === 'connected') connectedAt.push(Date.now());
		});
		void manager.start(controller.signal);
		await vi.waitFor(() => expect(manager.state).toBe('connected'));

		const first = dialer.connections[0];
		const droppedAt = Date.now();
		first.drop();

		await vi.waitFor(() => expect(dialer.connections).toHaveLength(2));
		await vi.waitFor(() => expect(manager.state).toBe('connected'));
		const second = dialer.connections[1];

		expect(shared.current).toBe(second);
		expect(first.closeCalls).toBe(1);
		expect(connectedAt).toHaveLength(2);
		expect(connectedAt[1] - droppedAt).toBeGreaterThanOrEqual(15);
		expect(connectedAt[1] - droppedAt).toBeLessThan(1000);
		expect(diagnostics.messages('warn')).toEqual([
			'connection lost (closed: connection reset by peer); reconnecting in 20ms',
		]);
	});

	it('resets the attempt counter after reconnecting', async () => {
		const { dialer, diagnostics, manager, controller } = setup();
		void manager.start(controller.signal);
		await vi.waitFor(() => expect(manager.state).toBe('connected'));

		dialer.failNext(1);
		dialer.connections[0].drop();

		await vi.waitFor(() => expect(dialer.connections).toHaveLength(2));
		expect(dialer.attempts).toHaveLength(3);
		expect(manager.attempts).toBe(0);
		expect(diagnostics.messages('warn')).toContain(
			'connection attempt 1 (unlimited) failed: connection refused',
		);
	});

	it('sends keepalive pings while connected', async () => {
		const { dialer, manager, controller } = setup({ pingIntervalMs: 20, pongWaitMs: 200 });
		void manager.start(controller.signal);
		await vi.waitFor(() => expect(manager.state).toBe('connected'));

		await vi.waitFor(() => expect(dialer.connections[0].pings).toBeGreaterThanOrEqual(3));
		expect(manager.state).toBe('connected');
		expect(dialer.connections).toHaveLength(1);
	});

	it('treats a missing acknowledgement as connection loss', async () => {
		const { dialer, diagnostics, manager, controller } = setup({
			pingIntervalMs: 20,
			pongWaitMs: 60,
		});
		dialer.configure = (conn) => {
			if (dialer.connections.length === 0) conn.autoAck = false;
		};
		void manager.start(controller.signal);

		await vi.waitFor(() => expect(dialer.connections).toHaveLength(2));
		expect(dialer.connections[0].closeCalls).toBe(1);
		expect(diagnostics.messages('warn')).toContain(
			'connection lost (no acknowledgement within 60ms); reconnecting in 20ms',
		);
	});

	it('treats a failed ping as connection loss', async () => {
		const { dialer, diagnostics, manager, controller } = setup({ pingIntervalMs: 20 });
		dialer.configure = (conn) => {
			if (dialer.connections.length === 0) conn.setPingFailure(new Error('socket hang up'));
		};
		void manager.start(controller.signal);

		await vi.waitFor(() => expect(dialer.connections).toHaveLength(2));
		expect(diagnostics.messages('warn')).toContain(
			'connection lost (keepalive failed: socket hang up); reconnecting in 20ms',
		);
	});

	it('treats a transmit failure on the current connection as loss', async () => {
		const { shared, dialer, diagnostics, manager, controller } = setup();
		void manager.start(controller.signal);
		await vi.waitFor(() => expect(manager.state).toBe('connected'));

		const first = dialer.connections[0];
		shared.reportTransmitFailure(first, new TransmitError('broken pipe'));

		await vi.waitFor(() => expect(dialer.connections).toHaveLength(2));
		expect(first.closeCalls).toBe(1);
		expect(diagnostics.messages('warn')).toContain(
			'connection lost (transmit failed: broken pipe); reconnecting in 20ms',
		);
	});

	it('closes the connection and stops when cancelled', async () => {
		const { shared, dialer, manager, controller } = setup();
		const states: ConnectionState[] = [];
		manager.on('state', (state: ConnectionState) => states.push(state));
		const task = manager.start(controller.signal);
		await vi.waitFor(() => expect(manager.state).toBe('connected'));

		controller.abort();
		await task;

		expect(states).toEqual(['connecting', 'connected', 'disconnected', 'closed']);
		expect(shared.current).toBeNull();
		expect(dialer.connections[0].closeCalls).toBe(1);
		expect(dialer.attempts).toHaveLength(1);
	});

	it('does not close a connection that shutdown already took', async () => {
		const { shared, dialer, manager, controller } = setup();
		const task = manager.start(controller.signal);
		await vi.waitFor(() => expect(manager.state).toBe('connected'));

		shared.markClosed();
		shared.tearDown();
		const taken = shared.take();
		expect(taken).toBe(dialer.connections[0]);
		await taken?.close();
		await task;

		expect(dialer.connections[0].closeCalls).toBe(1);
		expect(manager.state).toBe('closed');
		expect(dialer.attempts).toHaveLength(1);
	});

	it('keeps connecting while the queue drains after close', async () => {
		const { shared, dialer, manager, controller } = setup();
		dialer.configure = () => {
			shared.markClosed();
		};
		void manager.start(controller.signal);

		await vi.waitFor(() => expect(manager.state).toBe('connected'));
		expect(shared.closed).toBe(true);
		expect(shared.current).toBe(dialer.connections[0]);
		expect(dialer.connections[0].closeCalls).toBe(0);
	});

	it('closes a connection that arrives after teardown', async () => {
		const { shared, dialer, manager, controller } = setup();
		dialer.configure = () => {
			shared.markClosed();
			shared.tearDown();
		};

		await manager.start(controller.signal);

		expect(dialer.connections[0].closeCalls).toBe(1);
		expect(shared.current).toBeNull();
		expect(manager.state).toBe('closed');
	});
});
