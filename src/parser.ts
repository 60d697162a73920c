import { promises as fsP } from 'fs';
import type { PathLike } from 'fs';

import { assembleSubtitles } from './assembler.js';
import { createDocument } from './document.js';
import { ParseError } from './errors.js';
import { readGeneralBlock } from './readers/gsi-reader.js';
import { readTtiBlocks } from './readers/tti-reader.js';
import { characterTableFromCode, latinTable } from './text/character-tables.js';
import { decodeTextField } from './text/control-codes.js';
import { ByteReader } from './util/byte-reader.js';

import type { ParseOptions, StlDocument } from './types/document.js';

export type ParseResult =
	| { ok: true; document: StlDocument }
	| { ok: false; error: ParseError };

/**
 * Decodes a complete EBU-STL file held in memory.
 *
 * @throws {ParseError} when the file is truncated, a timecode or time range is
 * invalid, extension blocks are out of sequence, or the code page or frame
 * rate fields cannot be read at all.
 */
export function parse(bytes: Uint8Array, options: ParseOptions = {}): StlDocument {
	const reader = new ByteReader(bytes);

	const { generalBlock, diagnostics } = readGeneralBlock(reader, options);
	const table = characterTableFromCode(generalBlock.characterCodeTable) ?? latinTable;

	const blocks = readTtiBlocks(reader, generalBlock.frameRate).map(block => ({
		block,
		fragments: decodeTextField(block.textField, table),
	}));

	return createDocument(generalBlock, assembleSubtitles(blocks), diagnostics);
}

export function tryParse(bytes: Uint8Array, options?: ParseOptions): ParseResult {
	try {
		return { ok: true, document: parse(bytes, options) };
	} catch (err: unknown) {
		if (err instanceof ParseError) return { ok: false, error: err };
		throw err;
	}
}

export async function parseFromPath(path: PathLike, options?: ParseOptions) {
	const bytes = await fsP.readFile(path);
	return parse(bytes, options);
}
