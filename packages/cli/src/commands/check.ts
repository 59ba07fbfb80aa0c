/**
 * logwire check — Verify that the configured collector is reachable.
 *
 * Dials once with the configured token, sends a keepalive ping and waits
 * for the acknowledgement.
 */

import { type RemoteOptionsInput, resolveRemoteOptions, validateRemoteUrl } from '@logwire/core';
import {
	ConfigError,
	type TransportConnection,
	type TransportDialer,
	errorMessage,
} from '@logwire/sdk';
import { WebSocketDialer } from '@logwire/transport-websocket';
import type { Command } from 'commander';
import { configPathOption, loadCliConfig } from '../config.js';
import * as output from '../output.js';

export interface CheckResult {
	url: string;
	ok: boolean;
	/** Ping round trip, when the check succeeded */
	latencyMs?: number;
	error?: string;
}

export interface CheckOptions {
	token: string;
	remote?: RemoteOptionsInput;
	dialer?: TransportDialer;
}

/**
 * Dial `url` and wait for one acknowledged ping. Connection failures are
 * reported in the result; an invalid URL or option throws ConfigError.
 */
export async function checkEndpoint(url: string, options: CheckOptions): Promise<CheckResult> {
	validateRemoteUrl(url);
	const remote = resolveRemoteOptions(options.remote);
	const dialer = options.dialer ?? new WebSocketDialer();

	let conn: TransportConnection;
	try {
		conn = await dialer.dial({
			url,
			token: options.token,
			handshakeTimeoutMs: remote.handshakeTimeoutMs,
			readBufferSize: remote.readBufferSize,
			writeBufferSize: remote.writeBufferSize,
		});
	} catch (err) {
		return { url, ok: false, error: errorMessage(err) };
	}

	const started = Date.now();
	const live = conn;
	try {
		await new Promise<void>((resolve, reject) => {
			const timer = setTimeout(() => {
				reject(new Error(`no acknowledgement within ${remote.pongWaitMs}ms`));
			}, remote.pongWaitMs);
			live.onAck(() => {
				clearTimeout(timer);
				resolve();
			});
			live.onClose((reason) => {
				clearTimeout(timer);
				reject(reason ?? new Error('closed by peer'));
			});
			live.ping().catch((err: unknown) => {
				clearTimeout(timer);
				reject(err);
			});
		});
		return { url, ok: true, latencyMs: Date.now() - started };
	} catch (err) {
		return { url, ok: false, error: errorMessage(err) };
	} finally {
		await live.close();
	}
}

// ─── Command registration ────────────────────────────────────────────────────

interface CheckCommandOptions {
	url?: string;
	token?: string;
}

export function registerCheckCommand(program: Command): void {
	program
		.command('check')
		.description('Check that the configured collector accepts connections')
		.option('--url <url>', 'Collector URL (ws:// or wss://)')
		.option('--token <token>', 'Bearer token for the collector')
		.action(async (opts: CheckCommandOptions, cmd: Command) => {
			try {
				const config = await loadCliConfig({
					configPath: configPathOption(cmd),
					flags: { url: opts.url, token: opts.token },
				});
				if (!config.url) {
					throw new ConfigError(
						'no collector URL configured (use --url, LOGWIRE_URL or remote.url in logwire.yaml)',
					);
				}

				const spin = output.spinner(`Connecting to ${config.url}`);
				const result = await checkEndpoint(config.url, {
					token: config.token,
					remote: config.remote,
				});

				if (output.isJsonMode()) {
					output.json(result);
				}
				if (result.ok) {
					spin.succeed(`${config.url} is reachable (${result.latencyMs}ms)`);
				} else {
					spin.fail(`${config.url} is not reachable: ${result.error}`);
					process.exitCode = 1;
				}
			} catch (err) {
				output.error(`Check failed: ${errorMessage(err)}`);
				process.exitCode = 1;
			}
		});
}
