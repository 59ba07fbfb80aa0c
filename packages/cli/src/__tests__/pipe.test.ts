import { Readable } from 'node:stream';
import {
	ConfigError,
	FakeDialer,
	FlushTimeoutError,
	MockSink,
	RecordingDiagnostics,
} from '@logwire/sdk';
import { LocalCollector } from '@logwire/transport-websocket';
import { afterEach, describe, expect, it } from 'vitest';
import type { CliConfig } from '../config.js';
import { createSink, runPipe } from '../commands/pipe.js';

function config(overrides: Partial<CliConfig> = {}): CliConfig {
	return {
		configPath: undefined,
		url: undefined,
		token: 'test-secret',
		level: 'info',
		format: 'json',
		attributes: {},
		remote: {},
		...overrides,
	};
}

const collectors: LocalCollector[] = [];

afterEach(async () => {
	for (const collector of collectors.splice(0)) await collector.stop();
});

describe('runPipe', () => {
	it('logs every non-empty line to the local sink', async () => {
		const sink = new MockSink();

		const summary = await runPipe({
			input: Readable.from(['first\nsecond\n', '\n   \nthird\n']),
			config: config({ level: 'warn' }),
			sink,
			diagnostics: new RecordingDiagnostics(),
		});

		expect(summary.lines).toBe(3);
		expect(sink.messages).toEqual(['first', 'second', 'third']);
		expect(sink.events.map((e) => e.level)).toEqual(['warn', 'warn', 'warn']);
		expect(summary.stats.state).toBe('disabled');
	});

	it('nests the configured attributes under the group', async () => {
		const sink = new MockSink();

		await runPipe({
			input: Readable.from(['request served\n']),
			config: config({ attributes: { service: 'api', build: '42' } }),
			group: 'origin',
			sink,
			diagnostics: new RecordingDiagnostics(),
		});

		expect(sink.events[0].attributes).toEqual({ origin: { service: 'api', build: '42' } });
	});

	it('streams every line to the collector before returning', async () => {
		const dialer = new FakeDialer();

		const summary = await runPipe({
			input: Readable.from(['one\ntwo\nthree\n']),
			config: config({ url: 'ws://127.0.0.1:9/logs', remote: { batchInterval: '20ms' } }),
			sink: new MockSink(),
			dialer,
			diagnostics: new RecordingDiagnostics(),
			closeTimeoutMs: 1000,
		});

		expect(dialer.attempts[0].token).toBe('test-secret');
		expect(dialer.connections[0].parsed.map((m) => m.message)).toEqual(['one', 'two', 'three']);
		expect(summary.stats).toMatchObject({ sent: 3, dropped: 0, state: 'closed' });
	});

	it('rejects with FlushTimeoutError when the collector is unreachable', async () => {
		const dialer = new FakeDialer();
		dialer.setFailAlways(true);

		await expect(
			runPipe({
				input: Readable.from(['lost\n']),
				config: config({ url: 'ws://127.0.0.1:9/logs', remote: { reconnectDelay: '20ms' } }),
				sink: new MockSink(),
				dialer,
				diagnostics: new RecordingDiagnostics(),
				closeTimeoutMs: 50,
			}),
		).rejects.toBeInstanceOf(FlushTimeoutError);
	});

	it('reads nothing once the signal has aborted', async () => {
		const sink = new MockSink();
		const controller = new AbortController();
		controller.abort();

		const summary = await runPipe({
			input: Readable.from(['ignored\n']),
			config: config(),
			sink,
			diagnostics: new RecordingDiagnostics(),
			signal: controller.signal,
		});

		expect(summary.lines).toBe(0);
		expect(sink.events).toEqual([]);
	});

	it('delivers lines to a local collector over WebSocket', async () => {
		const collector = new LocalCollector({ token: 'test-secret' });
		collectors.push(collector);
		await collector.start();

		await runPipe({
			input: Readable.from(['alpha\nbeta\n']),
			config: config({
				url: collector.url,
				attributes: { service: 'pipe-test' },
				remote: { batchInterval: '20ms' },
			}),
			sink: new MockSink(),
			diagnostics: new RecordingDiagnostics(),
			closeTimeoutMs: 2000,
		});

		const messages = (await collector.waitForMessages(2)).map(
			(m): Record<string, unknown> => JSON.parse(m),
		);
		expect(messages).toEqual([
			{ timestamp: expect.any(String), level: 'INFO', message: 'alpha', service: 'pipe-test' },
			{ timestamp: expect.any(String), level: 'INFO', message: 'beta', service: 'pipe-test' },
		]);
		expect(collector.authorizations).toEqual(['Bearer test-secret']);
	});
});

describe('createSink', () => {
	it('builds the stream sink for a supported format', () => {
		expect(createSink({ format: 'pretty' }).id).toBe('stream');
	});

	it('checks the format against the sink schema', () => {
		expect(() => createSink({ format: 'xml' })).toThrow(
			'sink "stream": /format: must be equal to one of the allowed values',
		);
	});

	it('fails the pipe before reading when the format is unsupported', async () => {
		const input = Readable.from(['never logged\n']);
		await expect(
			runPipe({ input, config: config({ format: 'xml' }), diagnostics: new RecordingDiagnostics() }),
		).rejects.toBeInstanceOf(ConfigError);
	});
});
