/**
 * Stream sink — writes one line per event to a writable stream.
 *
 * Writes to process.stderr by default so stdout stays clean for the
 * application's own output.
 */

import { Chalk, type ChalkInstance } from 'chalk';
import type { LineWriter, LocalSink, LogEvent } from '@logwire/sdk';
import { type SinkFormat, formatJson, formatPretty } from './format.js';

export interface StreamSinkConfig {
	/** Line format (default: json) */
	format?: SinkFormat;
	/** ANSI colors in pretty output (default: whether the target is a TTY) */
	color?: boolean;
	/** Destination (default: process.stderr) */
	stream?: LineWriter & { isTTY?: boolean };
}

export class StreamSink implements LocalSink {
	readonly id = 'stream';
	private readonly stream: LineWriter;
	private readonly format: SinkFormat;
	private readonly chalk: ChalkInstance;

	constructor(config: StreamSinkConfig = {}) {
		const stream = config.stream ?? process.stderr;
		this.stream = stream;
		this.format = config.format ?? 'json';
		const color = config.color ?? stream.isTTY === true;
		this.chalk = new Chalk({ level: color ? 1 : 0 });
	}

	/** Throws when the target's write throws. */
	write(event: LogEvent): void {
		const line = this.format === 'pretty' ? formatPretty(event, this.chalk) : formatJson(event);
		this.stream.write(`${line}\n`);
	}
}
