/**
 * logwire pipe — Log every line of stdin.
 *
 * Each non-empty line becomes one event, written to stderr and, when a
 * collector URL is configured, streamed to it. Ends on EOF or SIGINT/SIGTERM.
 */

import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { type HandlerStats, LogHandler } from '@logwire/core';
import {
	type Diagnostics,
	FlushTimeoutError,
	type LocalSink,
	type TransportDialer,
	createDiagnostics,
	errorMessage,
} from '@logwire/sdk';
import { type StreamSinkConfig, register as registerStreamSink } from '@logwire/sink-stream';
import { WebSocketDialer } from '@logwire/transport-websocket';
import type { Command } from 'commander';
import { type CliConfig, configPathOption, loadCliConfig } from '../config.js';
import * as output from '../output.js';
import { compileSchema, validateWith } from '../schema.js';

export interface PipeOptions {
	input: Readable;
	config: CliConfig;
	/** Nest the configured attributes under this group */
	group?: string;
	/** Local destination (default: stream sink on stderr in the configured format) */
	sink?: LocalSink;
	dialer?: TransportDialer;
	diagnostics?: Diagnostics;
	/** Stops reading early; pending lines are still flushed */
	signal?: AbortSignal;
	/** close() deadline override in milliseconds */
	closeTimeoutMs?: number;
}

export interface PipeSummary {
	lines: number;
	stats: HandlerStats;
}

/** Build the stream sink, checking its config against the sink's own schema. */
export function createSink(config: Pick<CliConfig, 'format'>): LocalSink {
	const registration = registerStreamSink();
	const validate = compileSchema<StreamSinkConfig>(registration.configSchema ?? {});
	const sinkConfig = validateWith(validate, { format: config.format }, `sink "${registration.id}"`);
	return new registration.sink(sinkConfig);
}

/**
 * Read `input` to the end and log every non-empty line at the configured
 * level. Rejects with FlushTimeoutError when the collector did not receive
 * everything before the close deadline.
 */
export async function runPipe(options: PipeOptions): Promise<PipeSummary> {
	const { config } = options;
	const handler = new LogHandler({
		sink: options.sink ?? createSink(config),
		// Every line is logged at config.level, so nothing is filtered
		level: 'debug',
		diagnostics: options.diagnostics,
		dialer: options.dialer ?? new WebSocketDialer(),
	});

	if (config.url) handler.configureRemote(config.url, config.token, config.remote);
	handler.start();

	const log = handler.withGroup(options.group ?? '').withAttributes(config.attributes);

	const reader = createInterface({ input: options.input, crlfDelay: Number.POSITIVE_INFINITY });
	const stop = (): void => reader.close();
	options.signal?.addEventListener('abort', stop, { once: true });

	let lines = 0;
	try {
		if (!options.signal?.aborted) {
			for await (const text of reader) {
				if (text.trim() === '') continue;
				log.log({ level: config.level, message: text });
				lines++;
			}
		}
	} finally {
		options.signal?.removeEventListener('abort', stop);
		reader.close();
	}

	await handler.close(options.closeTimeoutMs);
	return { lines, stats: handler.stats() };
}

// ─── Command registration ────────────────────────────────────────────────────

interface PipeCommandOptions {
	url?: string;
	token?: string;
	level?: string;
	format?: string;
	attr: string[];
	group?: string;
}

function collect(value: string, previous: string[]): string[] {
	return [...previous, value];
}

export function registerPipeCommand(program: Command): void {
	program
		.command('pipe')
		.description('Log every line of stdin, streaming to the configured collector')
		.option('--url <url>', 'Collector URL (ws:// or wss://)')
		.option('--token <token>', 'Bearer token for the collector')
		.option('-l, --level <level>', 'Level each line is logged at (debug, info, warn, error)')
		.option('-f, --format <format>', 'Local output format (json, pretty)')
		.option('-a, --attr <key=value>', 'Attribute added to every line (repeatable)', collect, [])
		.option('-g, --group <name>', 'Group the attributes are nested under')
		.action(async (opts: PipeCommandOptions, cmd: Command) => {
			const controller = new AbortController();
			const onSignal = (): void => controller.abort();
			process.once('SIGINT', onSignal);
			process.once('SIGTERM', onSignal);

			try {
				const config = await loadCliConfig({
					configPath: configPathOption(cmd),
					flags: {
						url: opts.url,
						token: opts.token,
						level: opts.level,
						format: opts.format,
						attr: opts.attr,
					},
				});
				if (config.configPath) output.verbose(`Loaded ${config.configPath}`);
				if (config.url) output.verbose(`Streaming to ${config.url}`);

				const summary = await runPipe({
					input: process.stdin,
					config,
					group: opts.group,
					diagnostics: createDiagnostics({
						level: output.isVerboseMode() ? 'debug' : 'info',
					}),
					signal: controller.signal,
				});

				if (output.isJsonMode()) {
					output.json({
						lines: summary.lines,
						sent: summary.stats.sent,
						dropped: summary.stats.dropped,
					});
				} else {
					output.verbose(
						`${summary.lines} line(s) logged, ${summary.stats.sent} sent, ${summary.stats.dropped} dropped`,
					);
				}
			} catch (err) {
				if (err instanceof FlushTimeoutError) {
					output.error(`Not every line reached the collector: ${err.message}`);
				} else {
					output.error(`Pipe failed: ${errorMessage(err)}`);
				}
				process.exitCode = 1;
			} finally {
				process.off('SIGINT', onSignal);
				process.off('SIGTERM', onSignal);
			}
		});
}
