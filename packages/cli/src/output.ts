/**
 * Output formatting utilities for the CLI.
 *
 * Colored status lines, JSON mode, quiet mode and spinner support. Log
 * events themselves go through the stream sink, never through here.
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';

// ─── Global output state ─────────────────────────────────────────────────────

let jsonMode = false;
let quietMode = false;
let verboseMode = false;

export function setJsonMode(enabled: boolean): void {
	jsonMode = enabled;
}

export function setQuietMode(enabled: boolean): void {
	quietMode = enabled;
}

export function setVerboseMode(enabled: boolean): void {
	verboseMode = enabled;
}

export function isJsonMode(): boolean {
	return jsonMode;
}

export function isVerboseMode(): boolean {
	return verboseMode && !quietMode && !jsonMode;
}

// ─── Basic output ────────────────────────────────────────────────────────────

export function info(message: string): void {
	if (quietMode || jsonMode) return;
	console.log(message);
}

export function success(message: string): void {
	if (quietMode || jsonMode) return;
	console.log(chalk.green(`  ✓ ${message}`));
}

export function error(message: string): void {
	if (jsonMode) return;
	console.error(chalk.red(`  ✗ ${message}`));
}

export function warn(message: string): void {
	if (quietMode || jsonMode) return;
	console.warn(chalk.yellow(`  ! ${message}`));
}

export function verbose(message: string): void {
	if (!isVerboseMode()) return;
	console.log(chalk.dim(`  … ${message}`));
}

export function heading(text: string): void {
	if (quietMode || jsonMode) return;
	console.log(chalk.bold(text));
}

/** Payload lines (received messages) print in every mode. */
export function line(text: string): void {
	console.log(text);
}

// ─── JSON output ─────────────────────────────────────────────────────────────

export function json(data: unknown): void {
	console.log(JSON.stringify(data, null, 2));
}

// ─── Spinner ─────────────────────────────────────────────────────────────────

export function spinner(text: string): Ora {
	if (jsonMode || quietMode) {
		// Return a no-op spinner
		return ora({ text, isSilent: true });
	}
	return ora({ text, color: 'cyan', stream: process.stderr }).start();
}
