/**
 * Event encoder — turns a live logging call plus the emitting handler's
 * scope into an immutable LogEvent, and a LogEvent into its wire form.
 */

import { EncodingError, errorMessage } from './errors.js';
import {
	type Attr,
	type AttrInput,
	type AttrObject,
	type AttrValue,
	type EncodedAttributes,
	type EncodedValue,
	type JsonSerializable,
	type LogEvent,
	type LogRecord,
	isGroupValue,
	levelName,
	toAttrs,
} from './types.js';

// ─── Scope ────────────────────────────────────────────────────────────────────

/** A persistent attribute, remembering the group path it was bound under. */
export interface ScopedAttr {
	readonly groups: readonly string[];
	readonly attr: Attr;
}

/**
 * Persistent attributes and group path of one handler.
 * Never mutated: deriving builds a new scope that copies and appends.
 */
export interface Scope {
	readonly attrs: readonly ScopedAttr[];
	readonly groups: readonly string[];
}

export const EMPTY_SCOPE: Scope = Object.freeze({ attrs: [], groups: [] });

export function scopeWithAttrs(scope: Scope, input: AttrInput): Scope {
	const added = toAttrs(input);
	if (added.length === 0) return scope;
	return {
		attrs: [...scope.attrs, ...added.map((attr) => ({ groups: scope.groups, attr }))],
		groups: scope.groups,
	};
}

export function scopeWithGroup(scope: Scope, name: string): Scope {
	if (name === '') return scope;
	return { attrs: scope.attrs, groups: [...scope.groups, name] };
}

// ─── Value encoding ───────────────────────────────────────────────────────────

function isJsonSerializable(value: object): value is JsonSerializable {
	return 'toJSON' in value && typeof value.toJSON === 'function';
}

function isEncodedMap(value: EncodedValue | undefined): value is EncodedAttributes {
	return (
		typeof value === 'object' &&
		value !== null &&
		!Array.isArray(value) &&
		!isJsonSerializable(value)
	);
}

function isAttrArray(value: AttrValue): value is readonly AttrValue[] {
	return Array.isArray(value);
}

/** Plain object literal given as an attribute value. */
function isAttrObject(value: AttrValue): value is AttrObject {
	return (
		typeof value === 'object' &&
		value !== null &&
		!(value instanceof Date) &&
		!(value instanceof Error) &&
		!isAttrArray(value) &&
		!isGroupValue(value) &&
		!isJsonSerializable(value)
	);
}

/** Attributes of a group-like value, or undefined when the value is a leaf. */
function groupAttrs(value: AttrValue): Attr[] | undefined {
	if (isGroupValue(value)) return [...value.attrs];
	if (isAttrObject(value)) return toAttrs(value);
	return undefined;
}

function encodeLeaf(value: AttrValue, seen: Set<object>): EncodedValue {
	if (value instanceof Date) {
		return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
	}
	if (value instanceof Error) return value.message;
	if (isAttrArray(value)) {
		if (seen.has(value)) return '[Circular]';
		seen.add(value);
		const items = value.map((item) => encodeValue(item, seen) ?? null);
		seen.delete(value);
		return items;
	}
	if (typeof value === 'object' && value !== null && isJsonSerializable(value)) return value;
	if (typeof value === 'bigint') return value.toString();
	if (
		typeof value === 'string' ||
		typeof value === 'number' ||
		typeof value === 'boolean' ||
		value === null
	) {
		return value;
	}
	return String(value);
}

function encodeValue(value: AttrValue, seen: Set<object>): EncodedValue | undefined {
	const attrs = groupAttrs(value);
	if (!attrs) return encodeLeaf(value, seen);
	if (typeof value === 'object' && value !== null) {
		if (seen.has(value)) return '[Circular]';
		seen.add(value);
	}
	const nested: EncodedAttributes = {};
	for (const a of attrs) addAttr(nested, a, seen);
	if (typeof value === 'object' && value !== null) seen.delete(value);
	return Object.keys(nested).length > 0 ? nested : undefined;
}

/** Merge `source` into `target`, combining nested maps key by key. */
function mergeInto(target: EncodedAttributes, source: EncodedAttributes): void {
	for (const [key, value] of Object.entries(source)) {
		const existing = target[key];
		if (isEncodedMap(existing) && isEncodedMap(value)) {
			mergeInto(existing, value);
		} else {
			target[key] = value;
		}
	}
}

function addAttr(target: EncodedAttributes, a: Attr, seen: Set<object>): void {
	const encoded = encodeValue(a.value, seen);
	if (encoded === undefined) return; // empty group
	if (a.key === '' && isEncodedMap(encoded)) {
		// Empty-keyed group: inline into the current level
		mergeInto(target, encoded);
		return;
	}
	mergeInto(target, { [a.key]: encoded });
}

/** Place attrs under a group path, creating nested maps only when something lands. */
function placeUnder(
	root: EncodedAttributes,
	groups: readonly string[],
	attrs: readonly Attr[],
	seen: Set<object>,
): void {
	const local: EncodedAttributes = {};
	for (const a of attrs) addAttr(local, a, seen);
	if (Object.keys(local).length === 0) return;

	let wrapped = local;
	for (let i = groups.length - 1; i >= 0; i--) {
		wrapped = { [groups[i]]: wrapped };
	}
	mergeInto(root, wrapped);
}

// ─── Events ───────────────────────────────────────────────────────────────────

/** Encode attribute input alone (persistent attrs, test helpers). */
export function encodeAttributes(input: AttrInput, groups: readonly string[] = []): EncodedAttributes {
	const root: EncodedAttributes = {};
	placeUnder(root, groups, toAttrs(input), new Set());
	return root;
}

/**
 * Build the immutable event for one logging call.
 *
 * Persistent attributes come first, each under the group path that was
 * active when it was bound; record attributes follow under the full path.
 */
export function buildEvent(record: LogRecord, scope: Scope = EMPTY_SCOPE): LogEvent {
	const attributes: EncodedAttributes = {};
	const seen = new Set<object>();

	for (const scoped of scope.attrs) {
		placeUnder(attributes, scoped.groups, [scoped.attr], seen);
	}
	placeUnder(attributes, scope.groups, toAttrs(record.attrs), seen);

	const timestamp = record.timestamp === undefined ? new Date() : record.timestamp;

	return Object.freeze({
		timestamp,
		level: record.level,
		message: record.message,
		attributes,
	});
}

/** Wire timestamp: RFC 3339 with milliseconds, or undefined when absent or invalid. */
export function formatTimestamp(timestamp: Date | null): string | undefined {
	if (!timestamp || Number.isNaN(timestamp.getTime())) return undefined;
	return timestamp.toISOString();
}

/**
 * Wire shape of an event: timestamp, level, message, optional context
 * fields, then the attributes flattened into the same object.
 */
export function wireEntry(event: LogEvent, context?: EncodedAttributes): EncodedAttributes {
	const entry: EncodedAttributes = {};
	const timestamp = formatTimestamp(event.timestamp);
	if (timestamp !== undefined) entry.timestamp = timestamp;
	entry.level = levelName(event.level);
	entry.message = event.message;
	if (context) Object.assign(entry, context);
	Object.assign(entry, event.attributes);
	return entry;
}

/**
 * Serialize an event into one wire message.
 * Throws EncodingError when the payload cannot be represented as JSON.
 */
export function serializeEvent(event: LogEvent, context?: EncodedAttributes): string {
	try {
		return JSON.stringify(wireEntry(event, context));
	} catch (err) {
		throw new EncodingError(`failed to encode log entry: ${errorMessage(err)}`, { cause: err });
	}
}
