/**
 * logwire listen — Run a local development collector.
 *
 * Prints every received message on stdout, one per line, until SIGINT or
 * SIGTERM.
 */

import { errorMessage } from '@logwire/sdk';
import { LocalCollector } from '@logwire/transport-websocket';
import type { Command } from 'commander';
import * as output from '../output.js';

export interface ListenOptions {
	port: number;
	host?: string;
	token?: string;
	/** Called for every message received */
	onMessage: (message: string) => void;
}

/**
 * Start a collector wired to `onMessage`. Connection events are reported
 * through verbose output.
 */
export async function startListener(options: ListenOptions): Promise<LocalCollector> {
	const collector = new LocalCollector({
		port: options.port,
		host: options.host,
		token: options.token,
	});
	collector.on('message', options.onMessage);
	collector.on('connection', (authorization: string | undefined) => {
		output.verbose(`Client connected${authorization ? ' (authenticated)' : ''}`);
	});
	collector.on('disconnect', (code: number) => {
		output.verbose(`Client disconnected (code ${code})`);
	});
	collector.on('clientError', (err: Error) => {
		output.warn(`Client error: ${err.message}`);
	});
	await collector.start();
	return collector;
}

function waitForSignal(): Promise<NodeJS.Signals> {
	return new Promise((resolve) => {
		const onSignal = (signal: NodeJS.Signals): void => {
			process.off('SIGINT', onSignal);
			process.off('SIGTERM', onSignal);
			resolve(signal);
		};
		process.on('SIGINT', onSignal);
		process.on('SIGTERM', onSignal);
	});
}

// ─── Command registration ────────────────────────────────────────────────────

interface ListenCommandOptions {
	port: string;
	host: string;
	token?: string;
}

export function registerListenCommand(program: Command): void {
	program
		.command('listen')
		.description('Run a local collector and print every message it receives')
		.option('-p, --port <port>', 'Port to listen on', '8080')
		.option('--host <host>', 'Interface to bind', '127.0.0.1')
		.option('--token <token>', 'Bearer token clients must present')
		.action(async (opts: ListenCommandOptions) => {
			const port = Number(opts.port);
			if (!Number.isInteger(port) || port < 0 || port > 65_535) {
				output.error(`Invalid port: ${opts.port}`);
				process.exitCode = 1;
				return;
			}

			let collector: LocalCollector;
			try {
				collector = await startListener({
					port,
					host: opts.host,
					token: opts.token,
					onMessage: (message) => output.line(message),
				});
			} catch (err) {
				output.error(`Failed to start collector: ${errorMessage(err)}`);
				process.exitCode = 1;
				return;
			}

			output.success(`Listening on ${collector.url}`);
			if (!opts.token) output.warn('No token set; every client is accepted');

			const signal = await waitForSignal();
			output.verbose(`Received ${signal}, stopping`);
			await collector.stop();
			output.info(`${collector.messages.length} message(s) received`);
		});
}
