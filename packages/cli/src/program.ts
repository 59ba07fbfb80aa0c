/**
 * The logwire command tree.
 */

import { Command } from 'commander';
import { registerCheckCommand } from './commands/check.js';
import { registerListenCommand } from './commands/listen.js';
import { registerPipeCommand } from './commands/pipe.js';
import { registerVersionCommand } from './commands/version.js';
import * as output from './output.js';

export function createProgram(): Command {
	const program = new Command();

	program
		.name('logwire')
		.description('Structured logging with best-effort streaming to a remote collector')
		.option('-c, --config <path>', 'Path to logwire.yaml (default: ./logwire.yaml when present)')
		.option('--json', 'Machine-readable output')
		.option('-q, --quiet', 'Only print errors')
		.option('-v, --verbose', 'Print extra detail')
		.hook('preAction', (thisCommand) => {
			const opts = thisCommand.opts();
			output.setJsonMode(opts.json === true);
			output.setQuietMode(opts.quiet === true);
			output.setVerboseMode(opts.verbose === true);
		});

	registerPipeCommand(program);
	registerListenCommand(program);
	registerCheckCommand(program);
	registerVersionCommand(program);

	return program;
}
