#!/usr/bin/env node
import cliCursor from 'cli-cursor';
import { program } from 'commander';

import { CustomError } from './errors.js';

import { StlDumper } from './stl-dumper.js';

import { logError } from './util/wrapped-log.js';

cliCursor.hide(process.stdout);

try {
	await program
		.name('stl-reader')
		.description('read EBU Tech 3264 (EBU-STL) subtitle files')
		.addHelpCommand(false)
		.addCommand(StlDumper.command)
		.parseAsync();
} catch (err: unknown) {
	if (err instanceof CustomError) {
		logError(err.message);
	} else {
		console.error(err);
	}

	process.exitCode = 1;
}
