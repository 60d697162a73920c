import fs, { promises as fsP } from 'fs';
import path from 'path';

import { Command } from 'commander';

import { NonFatalError, ParseError } from './errors.js';
import type { Diagnostic } from './errors.js';
import { parseFromPath } from './parser.js';
import { fragmentsToText } from './text/control-codes.js';
import { formatTimecode } from './timecode.js';

import { mkdirIfDoesNotExist } from './util/mkdir-if-does-not-exist.js';
import { ProgressLogger } from './util/progress-logger.js';
import { resolvePathArguments } from './util/resolve-path-arguments.js';
import type { ResolvedPaths } from './util/resolve-path-arguments.js';
import { logDiagnostics } from './util/wrapped-log.js';

import type { StlDocument } from './types/document.js';

const EXTENSION = 'stl';

type Settings = {
	verbose?: boolean;
	declaredCodePage?: boolean;
	text?: boolean;
};

const jsonReplacer = (_key: string, value: unknown) => value instanceof Uint8Array ? Buffer.from(value).toString('hex') : value;

export function documentToJSON(document: StlDocument) {
	return JSON.stringify({
		...document,
		subtitles: document.subtitles.map(subtitle => ({ ...subtitle, text: fragmentsToText(subtitle.fragments) })),
	}, jsonReplacer, '\t');
}

/** One cue per paragraph: the timecodes, then the subtitle's rows. Comments are left out. */
export function documentToText(document: StlDocument) {
	return document.subtitles
		.filter(subtitle => !subtitle.comment)
		.map(subtitle => `${formatTimecode(subtitle.timeCodeIn)} --> ${formatTimecode(subtitle.timeCodeOut)}\n${fragmentsToText(subtitle.fragments)}\n`)
		.join('\n');
}

export class StlDumper {
	static command = new Command()
		.command('dump <source> [destination]')
		.description('decode one or more .stl files into JSON')
		.option('-v, --verbose', 'verbose output')
		.option('-d, --declared-code-page', 'decode header text with the code page the file declares')
		.option('-t, --text', 'also write the plain text of every subtitle')
		.action(async (source: string, destination?: string) => {
			const paths = await resolvePathArguments(EXTENSION, source, destination);

			const dumper = new StlDumper(paths, StlDumper.command.opts<Settings>());
			await dumper.run();
		});

	private readonly diagnostics = new Map<string, readonly Diagnostic[]>();
	private readonly progressLogger?: ProgressLogger;

	private constructor(
		private readonly paths: ResolvedPaths,
		private readonly settings: Settings,
	) {
		if (this.settings.verbose) this.progressLogger = new ProgressLogger();
	}

	private async run() {
		if (this.settings.verbose) console.time('Duration');

		const { files } = this.paths;
		this.progressLogger?.start(files.length);

		for (const file of files) {
			await this.dumpFile(file);
			this.progressLogger?.tick(file);
		}

		for (const [file, diagnostics] of this.diagnostics) logDiagnostics(file, diagnostics);

		if (this.settings.verbose) console.timeEnd('Duration');
	}

	////////
	// DUMP

	private async dumpFile(relativePath: string) {
		const sourcePath = path.join(this.paths.sourceRoot, relativePath);

		await fsP.access(sourcePath, fs.constants.R_OK)
			.catch(() => { throw new NonFatalError('NO_READ_PERMISSIONS_PATH', { path: sourcePath }); });

		const document = await this.parseFile(sourcePath, relativePath);
		if (document.diagnostics.length > 0) this.diagnostics.set(relativePath, document.diagnostics);

		const destinationBase = path.join(this.paths.destinationRoot, relativePath.slice(0, -path.extname(relativePath).length));
		await mkdirIfDoesNotExist(path.dirname(destinationBase));

		await fsP.writeFile(`${destinationBase}.json`, documentToJSON(document));
		if (this.settings.text) await fsP.writeFile(`${destinationBase}.txt`, documentToText(document));
	}

	private async parseFile(sourcePath: string, relativePath: string) {
		try {
			return await parseFromPath(sourcePath, { headerText: this.settings.declaredCodePage ? 'declared' : 'default' });
		} catch (err: unknown) {
			if (err instanceof ParseError) throw new NonFatalError('FILE_CORRUPTED_OR_INVALID', { path: relativePath, reason: err.message });
			throw err;
		}
	}
}
