/**
 * CLI configuration: logwire.yaml, LOGWIRE_* variables and flags.
 *
 * Precedence, highest first: command-line flags, environment, config file,
 * built-in defaults. logwire.yaml is checked against CONFIG_FILE_SCHEMA.
 * Remote option defaults are applied later by resolveRemoteOptions().
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { Command } from 'commander';
import yaml from 'js-yaml';
import { type RemoteOptionsInput, remoteOptionsFromEnv } from '@logwire/core';
import { ConfigError, type LogLevel, errorMessage, parseLevel } from '@logwire/sdk';
import { type AttributeValue, type RawRemoteConfig, checkFileConfig } from './schema.js';

export const CONFIG_FILE_NAME = 'logwire.yaml';

export interface CliFlags {
	url?: string;
	token?: string;
	level?: string;
	format?: string;
	/** Repeated `key=value` pairs */
	attr?: string[];
}

export interface CliConfig {
	/** File the configuration was read from, if any */
	configPath: string | undefined;
	url: string | undefined;
	token: string;
	level: LogLevel;
	/** Local output format; checked against the sink's schema when the sink is created */
	format: string;
	attributes: Record<string, AttributeValue>;
	remote: RemoteOptionsInput;
}

export interface LoadCliConfigOptions {
	/** Explicit config file; it is an error if it does not exist */
	configPath?: string;
	/** Directory searched for logwire.yaml (default: process.cwd()) */
	cwd?: string;
	flags?: CliFlags;
	env?: NodeJS.ProcessEnv;
}

/** What logwire.yaml contributes */
export interface FileConfig {
	url?: string;
	token?: string;
	level?: LogLevel;
	format?: string;
	attributes: Record<string, AttributeValue>;
	remote: RemoteOptionsInput;
}

// ─── File ────────────────────────────────────────────────────────────────────

function toLevel(value: string, where: string): LogLevel {
	const level = parseLevel(value);
	if (!level) {
		throw new ConfigError(`${where}: unknown level "${value}" (expected debug, info, warn or error)`);
	}
	return level;
}

function resolveToken(raw: RawRemoteConfig, env: NodeJS.ProcessEnv, file: string): string | undefined {
	if (raw.token !== undefined || raw.token_env === undefined) return raw.token;
	const token = env[raw.token_env];
	if (token === undefined) {
		throw new ConfigError(`${file}: remote.token_env names ${raw.token_env}, which is not set`);
	}
	return token;
}

function toRemoteOptions(raw: RawRemoteConfig): RemoteOptionsInput {
	return {
		queueCapacity: raw.queue_capacity,
		batchInterval: raw.batch_interval,
		maxBatchSize: raw.max_batch_size,
		reconnectDelay: raw.reconnect_delay,
		maxReconnectAttempts: raw.max_reconnects === 'unlimited' ? null : raw.max_reconnects,
		handshakeTimeout: raw.handshake_timeout,
		readBufferSize: raw.read_buffer_size,
		writeBufferSize: raw.write_buffer_size,
		pingInterval: raw.ping_interval,
		pongWait: raw.pong_wait,
		closeTimeout: raw.close_timeout,
		includeProcessContext: raw.process_context,
	};
}

/** Parse the text of a logwire.yaml file. Throws ConfigError. */
export function parseConfigFile(
	content: string,
	file: string,
	env: NodeJS.ProcessEnv = process.env,
): FileConfig {
	let loaded: unknown;
	try {
		loaded = yaml.load(content);
	} catch (err) {
		throw new ConfigError(`${file}: invalid YAML: ${errorMessage(err)}`, { cause: err });
	}

	// An empty file is an empty config
	if (loaded === undefined || loaded === null) return { attributes: {}, remote: {} };
	const raw = checkFileConfig(loaded, file);
	const remote = raw.remote ?? {};

	return {
		url: remote.url,
		token: resolveToken(remote, env, file),
		level: raw.level === undefined ? undefined : toLevel(raw.level, `${file}: level`),
		format: raw.format,
		attributes: raw.attributes ?? {},
		remote: toRemoteOptions(remote),
	};
}

async function readConfigFile(
	path: string,
	required: boolean,
	env: NodeJS.ProcessEnv,
): Promise<FileConfig | undefined> {
	let content: string;
	try {
		content = await readFile(path, 'utf-8');
	} catch (err) {
		if (!required && err instanceof Error && 'code' in err && err.code === 'ENOENT') {
			return undefined;
		}
		throw new ConfigError(`cannot read config file ${path}: ${errorMessage(err)}`, { cause: err });
	}
	return parseConfigFile(content, path, env);
}

// ─── Flags ───────────────────────────────────────────────────────────────────

/** Parse repeated `key=value` flags. Numbers and booleans stay strings. */
export function parseAttributePairs(pairs: readonly string[]): Record<string, string> {
	const attributes: Record<string, string> = {};
	for (const pair of pairs) {
		const eq = pair.indexOf('=');
		if (eq <= 0) {
			throw new ConfigError(`invalid attribute "${pair}" (expected key=value)`);
		}
		attributes[pair.slice(0, eq).trim()] = pair.slice(eq + 1);
	}
	return attributes;
}

// ─── Loading ─────────────────────────────────────────────────────────────────

/**
 * Load the CLI configuration. Reads `configPath` when given, otherwise
 * logwire.yaml in `cwd` when present, then layers environment and flags.
 */
export async function loadCliConfig(options: LoadCliConfigOptions = {}): Promise<CliConfig> {
	const env = options.env ?? process.env;
	const flags = options.flags ?? {};

	const configPath = options.configPath
		? resolve(options.configPath)
		: resolve(options.cwd ?? process.cwd(), CONFIG_FILE_NAME);
	const file = await readConfigFile(configPath, options.configPath !== undefined, env);

	const fromEnv = remoteOptionsFromEnv(env);
	const envLevel = env.LOGWIRE_LEVEL?.trim() || undefined;
	const envFormat = env.LOGWIRE_FORMAT?.trim() || undefined;

	const level = flags.level ?? envLevel;
	const format = flags.format ?? envFormat;

	return {
		configPath: file ? configPath : undefined,
		url: flags.url ?? fromEnv.url ?? file?.url,
		token: flags.token ?? fromEnv.token ?? file?.token ?? '',
		level: level !== undefined ? toLevel(level, 'level') : (file?.level ?? 'info'),
		format: (format ?? file?.format ?? 'pretty').trim().toLowerCase(),
		attributes: { ...file?.attributes, ...parseAttributePairs(flags.attr ?? []) },
		remote: { ...file?.remote, ...fromEnv.options },
	};
}

/** The global `--config` option, as seen from any subcommand. */
export function configPathOption(cmd: Command): string | undefined {
	const value: unknown = cmd.optsWithGlobals().config;
	return typeof value === 'string' ? value : undefined;
}
