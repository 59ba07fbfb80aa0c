import { describe, expect, it } from 'vitest';
import { createDiagnostics, silentDiagnostics } from '../diagnostics.js';

function capture() {
	const lines: string[] = [];
	return { lines, stream: { write: (chunk: string) => lines.push(chunk) } };
}

const now = () => new Date('2024-01-15T10:30:45.123Z');

describe('createDiagnostics', () => {
	it('writes one JSON line per diagnostic', () => {
		const { lines, stream } = capture();
		const diagnostics = createDiagnostics({ stream, source: 'wslogging', now });

		diagnostics.warn('connection attempt 2 of 5 failed', { attempt: 2 });

		expect(lines).toEqual([
			'{"time":"2024-01-15T10:30:45.123Z","level":"WARN","source":"wslogging","msg":"connection attempt 2 of 5 failed","attempt":2}\n',
		]);
	});

	it('defaults the source to logwire', () => {
		const { lines, stream } = capture();
		createDiagnostics({ stream, now }).info('ready');
		expect(JSON.parse(lines[0])).toEqual({
			time: '2024-01-15T10:30:45.123Z',
			level: 'INFO',
			source: 'logwire',
			msg: 'ready',
		});
	});

	it('skips entries below the configured level', () => {
		const { lines, stream } = capture();
		const diagnostics = createDiagnostics({ stream, level: 'warn', now });

		diagnostics.debug('hidden');
		diagnostics.info('hidden');
		diagnostics.error('shown');

		expect(lines).toHaveLength(1);
		expect(JSON.parse(lines[0]).level).toBe('ERROR');
	});

	it('falls back to plain text when fields cannot be serialized', () => {
		const { lines, stream } = capture();
		createDiagnostics({ stream, now }).error('boom', { size: 1n });
		expect(lines).toEqual(['[logwire] ERROR boom\n']);
	});

	it('never throws when the stream fails', () => {
		const diagnostics = createDiagnostics({
			stream: {
				write: () => {
					throw new Error('EPIPE');
				},
			},
		});
		expect(() => diagnostics.error('lost')).not.toThrow();
	});

	it('has a silent variant', () => {
		expect(() => silentDiagnostics.warn('nothing')).not.toThrow();
	});
});
