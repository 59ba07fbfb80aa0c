import { afterEach, describe, expect, it, vi } from 'vitest';
import * as output from '../output.js';
import { createProgram } from '../program.js';

afterEach(() => {
	output.setJsonMode(false);
	output.setQuietMode(false);
	output.setVerboseMode(false);
});

describe('logwire program', () => {
	it('registers the commands', () => {
		const names = createProgram().commands.map((cmd) => cmd.name());
		expect(names).toEqual(['pipe', 'listen', 'check', 'version']);
	});

	it('prints version info as JSON in json mode', async () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

		await createProgram().parseAsync(['node', 'logwire', '--json', 'version']);

		expect(log).toHaveBeenCalledTimes(1);
		const printed: unknown = JSON.parse(String(log.mock.calls[0][0]));
		expect(printed).toEqual({
			logwire: '0.3.0',
			node: process.version,
			platform: `${process.platform} ${process.arch}`,
		});
	});

	it('applies the global output flags before the command runs', async () => {
		vi.spyOn(console, 'log').mockImplementation(() => undefined);

		await createProgram().parseAsync(['node', 'logwire', '--quiet', '--verbose', 'version']);

		expect(output.isJsonMode()).toBe(false);
		expect(output.isVerboseMode()).toBe(false);
	});
});
