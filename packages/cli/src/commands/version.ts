/**
 * logwire version — Print version info.
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Command } from 'commander';
import * as output from '../output.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function isVersioned(value: unknown): value is { version: string } {
	return (
		typeof value === 'object' &&
		value !== null &&
		'version' in value &&
		typeof value.version === 'string'
	);
}

export async function getVersion(): Promise<string> {
	try {
		// Walk up from commands/ to find package.json
		const pkgPath = resolve(__dirname, '..', '..', 'package.json');
		const pkg: unknown = JSON.parse(await readFile(pkgPath, 'utf-8'));
		return isVersioned(pkg) ? pkg.version : 'unknown';
	} catch {
		return 'unknown';
	}
}

export function registerVersionCommand(program: Command): void {
	program
		.command('version')
		.description('Print version info')
		.action(async () => {
			const version = await getVersion();

			if (output.isJsonMode()) {
				output.json({
					logwire: version,
					node: process.version,
					platform: `${process.platform} ${process.arch}`,
				});
				return;
			}

			output.info(`logwire  ${version}`);
			output.info(`node     ${process.version}`);
			output.info(`platform ${process.platform} ${process.arch}`);
		});
}
