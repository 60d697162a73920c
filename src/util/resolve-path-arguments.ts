import fs, { promises as fsP } from 'fs';
import path from 'path';

import { NonFatalError } from '../errors.js';

export interface ResolvedPaths {
	/** Directory the `files` are relative to. */
	sourceRoot: string;
	files: string[];
	destinationRoot: string;
}

type PathType = 'source' | 'destination';

async function checkAccess(pathArg: string, type: PathType) {
	await fsP.access(pathArg, fs.constants.F_OK).catch(() => {
		throw new NonFatalError('PATH_DOES_NOT_EXIST', { type });
	});

	const [mode, messageKey] = type === 'source'
		? [fs.constants.R_OK, 'NO_READ_PERMISSIONS_TYPE'] as const
		: [fs.constants.W_OK, 'NO_WRITE_PERMISSIONS_TYPE'] as const;

	await fsP.access(pathArg, mode).catch(() => {
		throw new NonFatalError(messageKey, { type });
	});
}

async function collectFiles(root: string, extension: string, relativeDir = ''): Promise<string[]> {
	const entries = await fsP.readdir(path.join(root, relativeDir), { withFileTypes: true });
	const files: string[] = [];

	for (const entry of entries) {
		const relativePath = path.join(relativeDir, entry.name);

		if (entry.isDirectory()) {
			files.push(...await collectFiles(root, extension, relativePath));
		} else if (entry.isFile() && hasExtension(entry.name, extension)) {
			files.push(relativePath);
		}
	}

	return files.sort();
}

export function hasExtension(filePath: string, extension: string) {
	return path.extname(filePath).toLowerCase() === `.${extension}`;
}

/**
 * Resolves the source to a list of files and checks both paths. Without a
 * destination, output goes beside a source file or into a source directory.
 */
export async function resolvePathArguments(extension: string, source: string, destination?: string): Promise<ResolvedPaths> {
	source = path.resolve(source);
	await checkAccess(source, 'source');

	const sourceEntry = await fsP.stat(source);
	let resolved: Omit<ResolvedPaths, 'destinationRoot'>;

	if (sourceEntry.isFile() && hasExtension(source, extension)) {
		resolved = { sourceRoot: path.dirname(source), files: [path.basename(source)] };
	} else if (sourceEntry.isDirectory()) {
		resolved = { sourceRoot: source, files: await collectFiles(source, extension) };
	} else {
		throw new NonFatalError('SOURCE_INVALID', { extension });
	}

	if (resolved.files.length === 0) throw new NonFatalError('SOURCE_INVALID', { extension });

	if (typeof destination !== 'string') return { ...resolved, destinationRoot: resolved.sourceRoot };

	destination = path.resolve(destination);
	await checkAccess(destination, 'destination');
	if (!(await fsP.stat(destination)).isDirectory()) throw new NonFatalError('DESTINATION_INVALID');

	return { ...resolved, destinationRoot: destination };
}
