/**
 * Line formats for the stream sink.
 */

import type { ChalkInstance } from 'chalk';
import {
	type EncodedValue,
	type LogEvent,
	type LogLevel,
	formatTimestamp,
	levelName,
} from '@logwire/sdk';

export type SinkFormat = 'json' | 'pretty';

export const SINK_FORMATS: readonly SinkFormat[] = ['json', 'pretty'];

// ─── JSON ─────────────────────────────────────────────────────────────────────

/**
 * JSON.stringify replacer that writes bigints as strings and marks
 * references back to an enclosing object as "[Circular]".
 */
function lenientReplacer(): (this: unknown, key: string, value: unknown) => unknown {
	const ancestors: unknown[] = [];
	return function (this: unknown, _key: string, value: unknown): unknown {
		if (typeof value === 'bigint') return value.toString();
		if (typeof value !== 'object' || value === null) return value;
		while (ancestors.length > 0 && ancestors[ancestors.length - 1] !== this) {
			ancestors.pop();
		}
		if (ancestors.includes(value)) return '[Circular]';
		ancestors.push(value);
		return value;
	};
}

/** `{"time":…,"level":"INFO","msg":…, ...attributes}` */
export function formatJson(event: LogEvent): string {
	const entry: Record<string, unknown> = {};
	const time = formatTimestamp(event.timestamp);
	if (time !== undefined) entry.time = time;
	entry.level = levelName(event.level);
	entry.msg = event.message;
	Object.assign(entry, event.attributes);
	return JSON.stringify(entry, lenientReplacer());
}

// ─── Pretty ───────────────────────────────────────────────────────────────────

function isNested(value: EncodedValue): value is { [key: string]: EncodedValue } {
	return (
		typeof value === 'object' &&
		value !== null &&
		!Array.isArray(value) &&
		!('toJSON' in value && typeof value.toJSON === 'function')
	);
}

/** Flatten nested attribute maps into dotted keys, in order. */
export function flattenAttributes(
	attributes: Readonly<Record<string, EncodedValue>>,
	prefix = '',
): Array<[string, EncodedValue]> {
	const pairs: Array<[string, EncodedValue]> = [];
	for (const [key, value] of Object.entries(attributes)) {
		const path = prefix ? `${prefix}.${key}` : key;
		if (isNested(value)) pairs.push(...flattenAttributes(value, path));
		else pairs.push([path, value]);
	}
	return pairs;
}

/** Render one value for `key=value`; strings with spaces or quotes are quoted. */
export function formatValue(value: EncodedValue): string {
	if (typeof value === 'string') {
		return value === '' || /[\s"=]/.test(value) ? JSON.stringify(value) : value;
	}
	if (value === null || typeof value === 'number' || typeof value === 'boolean') return String(value);
	return JSON.stringify(value, lenientReplacer()) ?? String(value);
}

function paintLevel(level: LogLevel, label: string, chalk: ChalkInstance): string {
	switch (level) {
		case 'debug':
			return chalk.gray(label);
		case 'info':
			return chalk.cyan(label);
		case 'warn':
			return chalk.yellow(label);
		case 'error':
			return chalk.red(label);
	}
}

/** `HH:MM:SS.mmm LEVEL message key=value …` (UTC clock time) */
export function formatPretty(event: LogEvent, chalk: ChalkInstance): string {
	const parts: string[] = [];
	const time = formatTimestamp(event.timestamp);
	if (time !== undefined) parts.push(chalk.dim(time.slice(11, 23)));
	parts.push(paintLevel(event.level, levelName(event.level).padEnd(5), chalk));
	parts.push(event.message);
	for (const [key, value] of flattenAttributes(event.attributes)) {
		parts.push(`${chalk.dim(`${key}=`)}${formatValue(value)}`);
	}
	return parts.join(' ');
}
