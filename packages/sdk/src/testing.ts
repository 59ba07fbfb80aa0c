/**
 * Test harness for logwire.
 *
 * In-process stand-ins for the local sink and the transport, so handler,
 * writer and connection-manager behaviour can be exercised without a network.
 */

import type { Diagnostics, DiagnosticFields } from './diagnostics.js';
import { TransmitError } from './errors.js';
import type { LocalSink } from './sink.js';
import type { DialOptions, TransportConnection, TransportDialer } from './transport.js';
import type { AttrInput, LogEvent, LogLevel, LogRecord } from './types.js';

// ─── Mock Sink ────────────────────────────────────────────────────────────────

/**
 * Mock local sink.
 * Records every written event; can be told to fail.
 */
export class MockSink implements LocalSink {
	readonly id: string;
	readonly events: LogEvent[] = [];
	private failure: Error | null = null;

	constructor(id = 'mock-sink') {
		this.id = id;
	}

	/** Make subsequent writes throw `error` (or succeed again with null) */
	setFailure(error: Error | null): void {
		this.failure = error;
	}

	write(event: LogEvent): void {
		if (this.failure) throw this.failure;
		this.events.push(event);
	}

	get messages(): string[] {
		return this.events.map((e) => e.message);
	}
}

// ─── Recording Diagnostics ────────────────────────────────────────────────────

export interface RecordedDiagnostic {
	level: LogLevel;
	message: string;
	fields?: DiagnosticFields;
}

/** Diagnostics that keep every entry in memory for assertions. */
export class RecordingDiagnostics implements Diagnostics {
	readonly entries: RecordedDiagnostic[] = [];

	debug(message: string, fields?: DiagnosticFields): void {
		this.entries.push({ level: 'debug', message, fields });
	}

	info(message: string, fields?: DiagnosticFields): void {
		this.entries.push({ level: 'info', message, fields });
	}

	warn(message: string, fields?: DiagnosticFields): void {
		this.entries.push({ level: 'warn', message, fields });
	}

	error(message: string, fields?: DiagnosticFields): void {
		this.entries.push({ level: 'error', message, fields });
	}

	messages(level?: LogLevel): string[] {
		return this.entries.filter((e) => !level || e.level === level).map((e) => e.message);
	}
}

// ─── Fake Connection ──────────────────────────────────────────────────────────

/**
 * In-process transport connection.
 * Records sent messages; tests drive acks, failures and peer disconnects.
 */
export class FakeConnection implements TransportConnection {
	readonly sent: string[] = [];
	pings = 0;
	closeCalls = 0;
	private ackListeners: Array<() => void> = [];
	private closeListeners: Array<(reason: Error | undefined) => void> = [];
	private sendFailuresAfter: number | null = null;
	private pingFailure: Error | null = null;
	private ended = false;
	private endReason: Error | undefined;
	/** Answer every ping with an ack (default: true) */
	autoAck = true;

	constructor(readonly options: DialOptions) {}

	/** Let `count` more sends succeed, then fail every send after that */
	failSendsAfter(count: number | null): void {
		this.sendFailuresAfter = count;
	}

	/** Make subsequent pings reject with `error` (or succeed again with null) */
	setPingFailure(error: Error | null): void {
		this.pingFailure = error;
	}

	async send(message: string): Promise<void> {
		if (this.ended) throw new TransmitError('connection is closed');
		if (this.sendFailuresAfter !== null) {
			if (this.sendFailuresAfter <= 0) throw new TransmitError('simulated write failure');
			this.sendFailuresAfter--;
		}
		this.sent.push(message);
	}

	async ping(): Promise<void> {
		if (this.pingFailure) throw this.pingFailure;
		this.pings++;
		if (this.autoAck) this.ack();
	}

	onAck(listener: () => void): void {
		this.ackListeners.push(listener);
	}

	onClose(listener: (reason: Error | undefined) => void): void {
		if (this.ended) {
			queueMicrotask(() => listener(this.endReason));
			return;
		}
		this.closeListeners.push(listener);
	}

	/** Simulate an acknowledgement from the peer */
	ack(): void {
		for (const listener of this.ackListeners) listener();
	}

	/** Simulate the peer going away */
	drop(reason: Error = new Error('connection reset by peer')): void {
		this.end(reason);
	}

	async close(): Promise<void> {
		this.closeCalls++;
		this.end(undefined);
	}

	get isClosed(): boolean {
		return this.ended;
	}

	get parsed(): Record<string, unknown>[] {
		return this.sent.map((m): Record<string, unknown> => JSON.parse(m));
	}

	private end(reason: Error | undefined): void {
		if (this.ended) return;
		this.ended = true;
		this.endReason = reason;
		for (const listener of this.closeListeners) listener(reason);
	}
}

// ─── Fake Dialer ──────────────────────────────────────────────────────────────

/**
 * In-process dialer. Hands out FakeConnections; can fail a number of dials
 * or every dial from now on.
 */
export class FakeDialer implements TransportDialer {
	readonly connections: FakeConnection[] = [];
	readonly attempts: DialOptions[] = [];
	private failuresLeft = 0;
	private failAlways = false;
	private waiters: Array<{ count: number; resolve: () => void }> = [];
	/** Applied to every new connection before it is returned */
	configure: ((conn: FakeConnection) => void) | null = null;
	/** Each dial settles only after this many milliseconds */
	delayMs = 0;

	/** Fail the next `count` dials */
	failNext(count: number): void {
		this.failuresLeft = count;
	}

	/** Fail every dial until called again with false */
	setFailAlways(fail: boolean): void {
		this.failAlways = fail;
	}

	async dial(options: DialOptions): Promise<FakeConnection> {
		this.attempts.push(options);
		this.notifyWaiters();
		if (this.delayMs > 0) await new Promise((resolve) => setTimeout(resolve, this.delayMs));
		if (this.failAlways || this.failuresLeft > 0) {
			if (this.failuresLeft > 0) this.failuresLeft--;
			throw new Error('connection refused');
		}
		const conn = new FakeConnection(options);
		this.configure?.(conn);
		this.connections.push(conn);
		return conn;
	}

	/** The most recent connection, if any */
	get current(): FakeConnection | undefined {
		return this.connections[this.connections.length - 1];
	}

	/** Resolves once `count` dial attempts have been made */
	waitForAttempts(count: number): Promise<void> {
		if (this.attempts.length >= count) return Promise.resolve();
		return new Promise((resolve) => {
			this.waiters.push({ count, resolve });
		});
	}

	private notifyWaiters(): void {
		const ready = this.waiters.filter((w) => this.attempts.length >= w.count);
		this.waiters = this.waiters.filter((w) => this.attempts.length < w.count);
		for (const w of ready) w.resolve();
	}
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

/**
 * Create a log record with sensible defaults for testing.
 */
export function createTestRecord(
	overrides: Partial<LogRecord> & { attrs?: AttrInput } = {},
): LogRecord {
	return {
		level: 'info',
		message: 'test message',
		timestamp: new Date('2024-01-15T10:30:45.123Z'),
		...overrides,
	};
}
