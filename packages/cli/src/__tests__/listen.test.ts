import { WebSocketDialer } from '@logwire/transport-websocket';
import { describe, expect, it, vi } from 'vitest';
import { startListener } from '../commands/listen.js';

describe('startListener', () => {
	it('hands every received message to the callback', async () => {
		const received: string[] = [];
		const collector = await startListener({
			port: 0,
			token: 'test-secret',
			onMessage: (message) => received.push(message),
		});

		try {
			const conn = await new WebSocketDialer({ closeGraceMs: 200 }).dial({
				url: collector.url,
				token: 'test-secret',
				handshakeTimeoutMs: 2000,
				readBufferSize: 4096,
				writeBufferSize: 4096,
			});
			await conn.send('{"message":"first"}');
			await conn.send('{"message":"second"}');

			await vi.waitFor(() => expect(received).toHaveLength(2));
			expect(received).toEqual(['{"message":"first"}', '{"message":"second"}']);
			await conn.close();
		} finally {
			await collector.stop();
		}
	});
});
