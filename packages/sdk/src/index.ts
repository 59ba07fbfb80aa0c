/**
 * @logwire/sdk — shared types, contracts, encoder, errors and test helpers.
 */

export * from './types.js';
export * from './errors.js';
export * from './diagnostics.js';
export * from './encoder.js';
export type { LocalSink, SinkRegistration } from './sink.js';
export type { DialOptions, TransportConnection, TransportDialer } from './transport.js';
export {
	FakeConnection,
	FakeDialer,
	MockSink,
	RecordingDiagnostics,
	createTestRecord,
} from './testing.js';
export type { RecordedDiagnostic } from './testing.js';
