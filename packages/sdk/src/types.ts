/**
 * Core types for logwire.
 *
 * Levels, attributes, records (what callers hand in), events (what sinks and
 * the wire receive), and the small value helpers shared by every package.
 */

// ─── Levels ───────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Severity weights. Gaps leave room for custom levels in between. */
export const LEVEL_WEIGHTS: Readonly<Record<LogLevel, number>> = {
	debug: -4,
	info: 0,
	warn: 4,
	error: 8,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: unknown): value is LogLevel {
	return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

/** Upper-case level name used on the wire and by JSON sinks (`INFO`). */
export function levelName(level: LogLevel): string {
	return level.toUpperCase();
}

/**
 * Parse a level name case-insensitively. `warning` is accepted for `warn`.
 * Returns undefined for anything else.
 */
export function parseLevel(value: string): LogLevel | undefined {
	const normalized = value.trim().toLowerCase();
	if (normalized === 'warning') return 'warn';
	return isLogLevel(normalized) ? normalized : undefined;
}

export function levelEnabled(level: LogLevel, minimum: LogLevel): boolean {
	return LEVEL_WEIGHTS[level] >= LEVEL_WEIGHTS[minimum];
}

// ─── Attributes ───────────────────────────────────────────────────────────────

/** Values serialized through their own toJSON (URL, Buffer, custom classes). */
export interface JsonSerializable {
	toJSON(): unknown;
}

export type AttrScalar = string | number | boolean | null | bigint | Date | Error;

/** A nested attribute group. An empty key inlines the group into its parent. */
export interface GroupValue {
	readonly kind: 'group';
	readonly attrs: readonly Attr[];
}

export type AttrValue =
	| AttrScalar
	| JsonSerializable
	| GroupValue
	| readonly AttrValue[]
	| AttrObject;

/** Plain object input; converted to a group, keys in insertion order. */
export interface AttrObject {
	readonly [key: string]: AttrValue | undefined;
}

export interface Attr {
	readonly key: string;
	readonly value: AttrValue;
}

/** Attribute input accepted by the handler API. */
export type AttrInput = readonly Attr[] | AttrObject;

export function attr(key: string, value: AttrValue): Attr {
	return { key, value };
}

export function group(key: string, ...attrs: Attr[]): Attr {
	return { key, value: { kind: 'group', attrs } };
}

export function isGroupValue(value: unknown): value is GroupValue {
	return (
		typeof value === 'object' &&
		value !== null &&
		'kind' in value &&
		value.kind === 'group' &&
		'attrs' in value &&
		Array.isArray(value.attrs)
	);
}

function isAttrList(input: AttrInput): input is readonly Attr[] {
	return Array.isArray(input);
}

/** Normalize attribute input into an ordered attr list. Undefined values are skipped. */
export function toAttrs(input: AttrInput | undefined): Attr[] {
	if (!input) return [];
	if (isAttrList(input)) return [...input];
	const attrs: Attr[] = [];
	for (const [key, value] of Object.entries(input)) {
		if (value === undefined) continue;
		attrs.push({ key, value });
	}
	return attrs;
}

// ─── Records and events ───────────────────────────────────────────────────────

/** What a caller hands to `LogHandler.log()`. */
export interface LogRecord {
	level: LogLevel;
	message: string;
	attrs?: AttrInput;
	/** Defaults to now. `null` produces an event without a timestamp. */
	timestamp?: Date | null;
}

/** Encoded attribute value: scalars, arrays, or nested attribute maps. */
export type EncodedValue =
	| string
	| number
	| boolean
	| null
	| JsonSerializable
	| readonly EncodedValue[]
	| EncodedAttributes;

export interface EncodedAttributes {
	[key: string]: EncodedValue;
}

/**
 * Immutable event handed to the local sink and serialized for the wire.
 * Attributes already include the emitting handler's scope, nested by group.
 */
export interface LogEvent {
	readonly timestamp: Date | null;
	readonly level: LogLevel;
	readonly message: string;
	readonly attributes: Readonly<EncodedAttributes>;
}

// ─── Durations ────────────────────────────────────────────────────────────────

const DURATION_UNITS: Record<string, number> = {
	ms: 1,
	s: 1_000,
	m: 60_000,
	h: 3_600_000,
	d: 86_400_000,
};

/**
 * Parse a duration string (`100ms`, `5s`, `2m`, `1h`, `7d`) into milliseconds.
 */
export function parseDuration(value: string): number {
	const match = value.trim().match(/^(\d+(?:\.\d+)?)(ms|s|m|h|d)$/);
	if (!match) {
		throw new Error(`Invalid duration format: "${value}" (expected e.g. 500ms, 5s, 2m)`);
	}
	return Math.round(Number.parseFloat(match[1]) * DURATION_UNITS[match[2]]);
}
