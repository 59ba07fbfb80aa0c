import { describe, expect, it } from 'vitest';
import {
	LOG_LEVELS,
	attr,
	group,
	isGroupValue,
	isLogLevel,
	levelEnabled,
	levelName,
	parseDuration,
	parseLevel,
	toAttrs,
} from '../types.js';

describe('parseDuration', () => {
	it('parses milliseconds', () => {
		expect(parseDuration('100ms')).toBe(100);
	});

	it('parses seconds', () => {
		expect(parseDuration('30s')).toBe(30000);
	});

	it('parses minutes', () => {
		expect(parseDuration('5m')).toBe(300000);
	});

	it('parses hours', () => {
		expect(parseDuration('2h')).toBe(7200000);
	});

	it('parses days', () => {
		expect(parseDuration('7d')).toBe(604800000);
	});

	it('parses fractional values', () => {
		expect(parseDuration('1.5s')).toBe(1500);
	});

	it('throws on invalid format', () => {
		expect(() => parseDuration('abc')).toThrow('Invalid duration format');
		expect(() => parseDuration('5x')).toThrow('Invalid duration format');
		expect(() => parseDuration('')).toThrow('Invalid duration format');
		expect(() => parseDuration('5')).toThrow('Invalid duration format');
	});
});

describe('levels', () => {
	it('orders levels by severity', () => {
		expect(levelEnabled('error', 'warn')).toBe(true);
		expect(levelEnabled('warn', 'warn')).toBe(true);
		expect(levelEnabled('info', 'warn')).toBe(false);
		expect(levelEnabled('debug', 'debug')).toBe(true);
	});

	it('uses upper-case names on the wire', () => {
		expect(LOG_LEVELS.map(levelName)).toEqual(['DEBUG', 'INFO', 'WARN', 'ERROR']);
	});

	it('parses level names case-insensitively', () => {
		expect(parseLevel('INFO')).toBe('info');
		expect(parseLevel(' Debug ')).toBe('debug');
		expect(parseLevel('warning')).toBe('warn');
		expect(parseLevel('fatal')).toBeUndefined();
		expect(isLogLevel('error')).toBe(true);
		expect(isLogLevel(3)).toBe(false);
	});
});

describe('attributes', () => {
	it('builds attrs and groups', () => {
		expect(attr('user', 'ada')).toEqual({ key: 'user', value: 'ada' });
		const g = group('http', attr('status', 200));
		expect(isGroupValue(g.value)).toBe(true);
		expect(isGroupValue({ kind: 'group' })).toBe(false);
	});

	it('normalizes object input in key order and skips undefined values', () => {
		expect(toAttrs({ b: 1, a: 'x', c: undefined })).toEqual([
			{ key: 'b', value: 1 },
			{ key: 'a', value: 'x' },
		]);
		expect(toAttrs(undefined)).toEqual([]);
		expect(toAttrs([attr('k', true)])).toEqual([{ key: 'k', value: true }]);
	});
});
