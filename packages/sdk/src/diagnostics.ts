/**
 * Diagnostics — logwire's own side channel.
 *
 * Infrastructure problems (dial failures, dropped payloads, encoding errors)
 * are reported here, never through the application's log results. Output is
 * one JSON line per diagnostic so it sits cleanly next to JSON application logs.
 */

import { type LogLevel, levelEnabled, levelName } from './types.js';

export type DiagnosticFields = Record<string, unknown>;

export interface Diagnostics {
	debug(message: string, fields?: DiagnosticFields): void;
	info(message: string, fields?: DiagnosticFields): void;
	warn(message: string, fields?: DiagnosticFields): void;
	error(message: string, fields?: DiagnosticFields): void;
}

/** Minimal writable target such as process.stderr or a test buffer */
export interface LineWriter {
	write(chunk: string): unknown;
}

export interface DiagnosticsOptions {
	/** Destination (default: process.stderr) */
	stream?: LineWriter;
	/** Value of the `source` field (default: "logwire") */
	source?: string;
	/** Lowest level written (default: debug) */
	level?: LogLevel;
	/** Clock override for tests */
	now?: () => Date;
}

export function createDiagnostics(options: DiagnosticsOptions = {}): Diagnostics {
	const stream = options.stream ?? process.stderr;
	const source = options.source ?? 'logwire';
	const minimum = options.level ?? 'debug';
	const now = options.now ?? (() => new Date());

	const emit = (level: LogLevel, message: string, fields?: DiagnosticFields): void => {
		if (!levelEnabled(level, minimum)) return;
		const entry = {
			time: now().toISOString(),
			level: levelName(level),
			source,
			msg: message,
			...fields,
		};
		let line: string;
		try {
			line = JSON.stringify(entry);
		} catch {
			line = `[${source}] ${levelName(level)} ${message}`;
		}
		try {
			stream.write(`${line}\n`);
		} catch {
			// The side channel has nowhere left to report to
		}
	};

	return {
		debug: (message, fields) => emit('debug', message, fields),
		info: (message, fields) => emit('info', message, fields),
		warn: (message, fields) => emit('warn', message, fields),
		error: (message, fields) => emit('error', message, fields),
	};
}

export const silentDiagnostics: Diagnostics = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
};
