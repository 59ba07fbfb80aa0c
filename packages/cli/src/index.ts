/**
 * logwire command line entry point.
 */

import { errorMessage } from '@logwire/sdk';
import { createProgram } from './program.js';

createProgram()
	.parseAsync(process.argv)
	.catch((err: unknown) => {
		console.error(`logwire: ${errorMessage(err)}`);
		process.exitCode = 1;
	});
