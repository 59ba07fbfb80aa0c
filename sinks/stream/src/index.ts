/**
 * @logwire/sink-stream — registration entry point.
 */

import type { SinkRegistration } from '@logwire/sdk';
import { SINK_FORMATS } from './format.js';
import { type StreamSinkConfig, StreamSink } from './stream-sink.js';

export function register(): SinkRegistration<StreamSinkConfig> {
	return {
		id: 'stream',
		sink: StreamSink,
		configSchema: {
			type: 'object',
			properties: {
				format: {
					type: 'string',
					enum: [...SINK_FORMATS],
					description: 'One JSON object per line, or a compact human-readable line.',
					default: 'json',
				},
				color: {
					type: 'boolean',
					description: 'Use ANSI colors in pretty output.',
				},
			},
			additionalProperties: false,
		},
	};
}

export { StreamSink } from './stream-sink.js';
export type { StreamSinkConfig } from './stream-sink.js';
export { SINK_FORMATS, flattenAttributes, formatJson, formatPretty, formatValue } from './format.js';
export type { SinkFormat } from './format.js';
