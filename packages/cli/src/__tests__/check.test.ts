import { ConfigError, FakeDialer } from '@logwire/sdk';
import { LocalCollector } from '@logwire/transport-websocket';
import { afterEach, describe, expect, it } from 'vitest';
import { checkEndpoint } from '../commands/check.js';

const URL = 'ws://127.0.0.1:9/logs';
const collectors: LocalCollector[] = [];

afterEach(async () => {
	for (const collector of collectors.splice(0)) await collector.stop();
});

describe('checkEndpoint', () => {
	it('succeeds when the ping is acknowledged and closes the connection', async () => {
		const dialer = new FakeDialer();

		const result = await checkEndpoint(URL, { token: 'test-secret', dialer });

		expect(result).toMatchObject({ url: URL, ok: true });
		expect(result.latencyMs).toBeGreaterThanOrEqual(0);
		expect(dialer.attempts[0].token).toBe('test-secret');
		expect(dialer.connections[0].pings).toBe(1);
		expect(dialer.connections[0].closeCalls).toBe(1);
	});

	it('reports a refused dial', async () => {
		const dialer = new FakeDialer();
		dialer.setFailAlways(true);

		const result = await checkEndpoint(URL, { token: 'test-secret', dialer });

		expect(result).toEqual({ url: URL, ok: false, error: 'connection refused' });
	});

	it('reports a ping that cannot be written', async () => {
		const dialer = new FakeDialer();
		dialer.configure = (conn) => conn.setPingFailure(new Error('socket hang up'));

		const result = await checkEndpoint(URL, { token: 'test-secret', dialer });

		expect(result).toEqual({ url: URL, ok: false, error: 'socket hang up' });
		expect(dialer.connections[0].closeCalls).toBe(1);
	});

	it('gives up when nothing acknowledges the ping', async () => {
		const dialer = new FakeDialer();
		dialer.configure = (conn) => {
			conn.autoAck = false;
		};

		const result = await checkEndpoint(URL, {
			token: 'test-secret',
			dialer,
			remote: { pingInterval: 10, pongWait: 50 },
		});

		expect(result).toEqual({ url: URL, ok: false, error: 'no acknowledgement within 50ms' });
	});

	it('throws ConfigError for a non-WebSocket URL', async () => {
		await expect(
			checkEndpoint('http://127.0.0.1:9/logs', { token: '', dialer: new FakeDialer() }),
		).rejects.toBeInstanceOf(ConfigError);
	});

	it('checks a local collector over WebSocket', async () => {
		const collector = new LocalCollector({ token: 'test-secret' });
		collectors.push(collector);
		await collector.start();

		const accepted = await checkEndpoint(collector.url, { token: 'test-secret' });
		expect(accepted.ok).toBe(true);

		const refused = await checkEndpoint(collector.url, { token: 'wrong-secret' });
		expect(refused.ok).toBe(false);
		expect(refused.error).toContain('401');
	});
});
