/**
 * Error taxonomy.
 *
 * Only ConfigError (from configureRemote) and ClosedError (as a log result)
 * ever reach application code. The rest describe remote-delivery problems and
 * travel on the diagnostics channel, or as the rejection of close().
 */

export type LogwireErrorCode = 'CONFIG' | 'CLOSED' | 'ENCODING' | 'TRANSMIT' | 'FLUSH_TIMEOUT';

export class LogwireError extends Error {
	readonly code: LogwireErrorCode;

	constructor(code: LogwireErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'LogwireError';
		this.code = code;
	}
}

/** Invalid remote configuration (URL, scheme, option values, call order). */
export class ConfigError extends LogwireError {
	constructor(message: string, options?: { cause?: unknown }) {
		super('CONFIG', message, options);
		this.name = 'ConfigError';
	}
}

/** log() was called after close() began. */
export class ClosedError extends LogwireError {
	constructor() {
		super('CLOSED', 'handler has been closed and is no longer accepting log messages');
		this.name = 'ClosedError';
	}
}

/** An event could not be serialized for the wire. */
export class EncodingError extends LogwireError {
	constructor(message: string, options?: { cause?: unknown }) {
		super('ENCODING', message, options);
		this.name = 'EncodingError';
	}
}

/** A write to the active connection failed. */
export class TransmitError extends LogwireError {
	constructor(message: string, options?: { cause?: unknown }) {
		super('TRANSMIT', message, options);
		this.name = 'TransmitError';
	}
}

/** close() could not drain everything before its deadline. */
export class FlushTimeoutError extends LogwireError {
	readonly remaining: number;

	constructor(remaining: number) {
		super(
			'FLUSH_TIMEOUT',
			`flush timed out with ${remaining} message${remaining === 1 ? '' : 's'} still pending`,
		);
		this.name = 'FlushTimeoutError';
		this.remaining = remaining;
	}
}

/** Render an unknown thrown value as a message string. */
export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
