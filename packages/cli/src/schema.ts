/**
 * JSON Schema validation for logwire.yaml and sink configuration.
 */

import { Ajv, type ErrorObject, type ValidateFunction } from 'ajv';
import { ConfigError } from '@logwire/sdk';

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });

/** Compile a JSON Schema into a validator that narrows to `T`. */
export function compileSchema<T>(schema: Record<string, unknown>): ValidateFunction<T> {
	return ajv.compile<T>(schema);
}

function describeError(error: ErrorObject): string {
	const path = error.instancePath || '/';
	const key: unknown = error.params.additionalProperty;
	if (error.keyword === 'additionalProperties' && typeof key === 'string') {
		return `${path}: unknown key "${key}"`;
	}
	return `${path}: ${error.message ?? 'is invalid'}`;
}

export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
	return (errors ?? []).map(describeError).join('; ');
}

/** Validate `data`, throwing ConfigError prefixed with `where` when it does not match. */
export function validateWith<T>(validate: ValidateFunction<T>, data: unknown, where: string): T {
	if (!validate(data)) {
		throw new ConfigError(`${where}: ${formatSchemaErrors(validate.errors)}`);
	}
	return data;
}

// ─── logwire.yaml ────────────────────────────────────────────────────────────

export type AttributeValue = string | number | boolean;

/** A duration is milliseconds or a string such as "5s". */
export type DurationValue = number | string;

export interface RawRemoteConfig {
	url?: string;
	token?: string;
	token_env?: string;
	queue_capacity?: number;
	batch_interval?: DurationValue;
	max_batch_size?: number;
	reconnect_delay?: DurationValue;
	max_reconnects?: number | 'unlimited';
	handshake_timeout?: DurationValue;
	read_buffer_size?: number;
	write_buffer_size?: number;
	ping_interval?: DurationValue;
	pong_wait?: DurationValue;
	close_timeout?: DurationValue;
	process_context?: boolean;
}

export interface RawFileConfig {
	level?: string;
	format?: string;
	attributes?: Record<string, AttributeValue>;
	remote?: RawRemoteConfig;
}

const duration = { type: ['number', 'string'] };

export const CONFIG_FILE_SCHEMA = {
	type: 'object',
	properties: {
		level: { type: 'string', description: 'Level each line is logged at' },
		format: { type: 'string', description: 'Local output format' },
		attributes: {
			type: 'object',
			additionalProperties: { type: ['string', 'number', 'boolean'] },
		},
		remote: {
			type: 'object',
			properties: {
				url: { type: 'string' },
				token: { type: 'string' },
				token_env: { type: 'string', description: 'Environment variable holding the token' },
				queue_capacity: { type: 'integer' },
				batch_interval: duration,
				max_batch_size: { type: 'integer' },
				reconnect_delay: duration,
				max_reconnects: {
					anyOf: [{ type: 'integer' }, { type: 'string', const: 'unlimited' }],
				},
				handshake_timeout: duration,
				read_buffer_size: { type: 'integer' },
				write_buffer_size: { type: 'integer' },
				ping_interval: duration,
				pong_wait: duration,
				close_timeout: duration,
				process_context: { type: 'boolean' },
			},
			additionalProperties: false,
		},
	},
	additionalProperties: false,
};

const validateFileConfig = compileSchema<RawFileConfig>(CONFIG_FILE_SCHEMA);

/** Check parsed logwire.yaml content against CONFIG_FILE_SCHEMA. Throws ConfigError. */
export function checkFileConfig(raw: unknown, file: string): RawFileConfig {
	return validateWith(validateFileConfig, raw, file);
}
