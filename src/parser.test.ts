import { promises as fsP } from 'fs';
import os from 'os';
import path from 'path';

import { afterEach, beforeEach, describe, it, expect, expectTypeOf } from 'vitest';

import { ParseError } from './errors.js';
import { parse, parseFromPath, tryParse } from './parser.js';
import { fragmentsToText } from './text/control-codes.js';

import { buildGsi, buildStl, buildTti } from './testing/stl-builder.js';
import type { StlDocument, Subtitle, UserDataBlock } from './types/document.js';
import type { TextFragment } from './types/fragments.js';

const catchError = (fn: () => unknown) => {
	try {
		fn();
	} catch (err: unknown) {
		return err;
	}

	throw new Error('Expected an error to be thrown.');
};

describe('parse', () => {
	it('reads a file with no subtitles', () => {
		const document = parse(buildGsi());

		expect(document.generalBlock.frameRate).toBe(25);
		expect(document.subtitles).toEqual([]);
		expect(document.userDataBlocks).toEqual([]);
		expect(document.diagnostics).toEqual([]);
	});

	it('decodes subtitle text and styling', () => {
		const document = parse(buildStl(buildGsi(), buildTti({ text: [0x8A, 'Hi', 0x80, 'there', 0x81] })));

		expect(document.subtitles).toHaveLength(1);
		expect(document.subtitles[0].fragments).toEqual([
			{ type: 'rowBreak' },
			{ type: 'text', text: 'Hi' },
			{ type: 'italicsOn' },
			{ type: 'text', text: 'there' },
			{ type: 'italicsOff' },
		]);
	});

	it('fails when the last block is short', () => {
		const bytes = buildStl(buildGsi(), buildTti(), buildTti()).subarray(0, 1024 + 255);
		const err = catchError(() => parse(bytes));

		expect(err).toBeInstanceOf(ParseError);
		expect(err).toMatchObject({ kind: 'TRUNCATED_INPUT', offset: 1152, details: { available: 127 } });
	});

	it('joins a subtitle split across extension blocks', () => {
		const document = parse(buildStl(
			buildGsi(),
			buildTti({ extensionBlockNumber: 0, timeCodeIn: [10, 0, 1, 0], timeCodeOut: [10, 0, 2, 0], text: ['Once upon ', 0x8A] }),
			buildTti({ extensionBlockNumber: 1, timeCodeIn: [10, 0, 2, 0], timeCodeOut: [10, 0, 3, 0], text: ['a time'] }),
			buildTti({ extensionBlockNumber: 2, timeCodeIn: [10, 0, 3, 0], timeCodeOut: [10, 0, 4, 5], text: ['there was'] }),
		));

		expect(document.subtitles).toHaveLength(1);

		const [subtitle] = document.subtitles;
		expect(subtitle.timeCodeIn).toEqual({ hours: 10, minutes: 0, seconds: 1, frames: 0 });
		expect(subtitle.timeCodeOut).toEqual({ hours: 10, minutes: 0, seconds: 4, frames: 5 });
		expect(subtitle.fragments).toEqual([
			{ type: 'text', text: 'Once upon ' },
			{ type: 'rowBreak' },
			{ type: 'text', text: 'a time' },
			{ type: 'rowBreak' },
			{ type: 'text', text: 'there was' },
		]);
		expect(fragmentsToText(subtitle.fragments)).toBe('Once upon \na time\nthere was');
	});

	it('starts each extension block on a new row', () => {
		const document = parse(buildStl(
			buildGsi(),
			buildTti({ extensionBlockNumber: 0, text: ['Hi'] }),
			buildTti({ extensionBlockNumber: 1, text: ['there'] }),
		));

		expect(document.subtitles[0].fragments).toEqual([
			{ type: 'text', text: 'Hi' },
			{ type: 'rowBreak' },
			{ type: 'text', text: 'there' },
		]);
	});

	it('keeps a style toggle that crosses a block boundary', () => {
		const document = parse(buildStl(
			buildGsi(),
			buildTti({ extensionBlockNumber: 0, text: [0x80, 'Hello'] }),
			buildTti({ extensionBlockNumber: 0xFF, text: ['world', 0x81, 'plain'] }),
		));

		expect(document.subtitles[0].fragments).toEqual([
			{ type: 'italicsOn' },
			{ type: 'text', text: 'Hello' },
			{ type: 'rowBreak' },
			{ type: 'text', text: 'world' },
			{ type: 'italicsOff' },
			{ type: 'text', text: 'plain' },
		]);
	});

	it('exposes subtitles as read-only', () => {
		expectTypeOf<Subtitle['fragments']>().toEqualTypeOf<readonly TextFragment[]>();
		expectTypeOf<StlDocument['subtitles']>().toEqualTypeOf<readonly Subtitle[]>();
		expectTypeOf<UserDataBlock['data']>().toEqualTypeOf<Uint8Array>();
	});

	it('fails when an extension block is missing', () => {
		const err = catchError(() => parse(buildStl(
			buildGsi(),
			buildTti({ extensionBlockNumber: 0 }),
			buildTti({ extensionBlockNumber: 2 }),
		)));

		expect(err).toBeInstanceOf(ParseError);
		expect(err).toMatchObject({
			kind: 'BROKEN_EXTENSION_SEQUENCE',
			offset: 1152,
			message: 'TTI block 1 (subtitle 1) has extension block number 2, expected 1.',
		});
	});

	it('fails on a timecode past the frame rate', () => {
		const err = catchError(() => parse(buildStl(buildGsi(), buildTti({ timeCodeOut: [10, 0, 3, 25] }))));

		expect(err).toBeInstanceOf(ParseError);
		expect(err).toMatchObject({ kind: 'INVALID_TIMECODE', offset: 1024 + 9, details: { record: 0, field: 'time code out' } });
	});

	it('decodes text with the declared character table', () => {
		const document = parse(buildStl(
			buildGsi({ characterCodeTable: '01' }),
			buildTti({ text: [0xBF, 0xE0, 0xD8, 0xD2, 0xD5, 0xE2] }),
		));

		expect(fragmentsToText(document.subtitles[0].fragments)).toBe('Привет');
	});

	it('falls back to Latin for an unknown character table', () => {
		const document = parse(buildStl(
			buildGsi({ characterCodeTable: '09' }),
			buildTti({ text: ['caf', 0xC2, 'e'] }),
		));

		expect(fragmentsToText(document.subtitles[0].fragments)).toBe('café');
		expect(document.diagnostics.map(diagnostic => diagnostic.kind)).toEqual(['UNRECOGNIZED_CHARACTER_CODE_TABLE']);
	});

	it('keeps user data blocks apart from subtitles', () => {
		const document = parse(buildStl(
			buildGsi(),
			buildTti({ subtitleNumber: 1 }),
			buildTti({ subtitleNumber: 1, extensionBlockNumber: 0xFE, text: [0x01, 0x02] }),
			buildTti({ subtitleNumber: 2 }),
		));

		expect(document.subtitles.map(subtitle => subtitle.subtitleNumber)).toEqual([1, 2]);
		expect(document.userDataBlocks).toHaveLength(1);
		expect(document.userDataBlocks[0].recordIndex).toBe(1);
		expect(document.userDataBlocks[0].data.slice(0, 3)).toEqual(Uint8Array.from([0x01, 0x02, 0x8F]));
	});

	it('does not share memory with the input', () => {
		const bytes = buildStl(buildGsi(), buildTti({ extensionBlockNumber: 0xFE, text: [0x01] }));
		const document = parse(bytes);

		bytes[1024 + 16] = 0x02;
		expect(document.userDataBlocks[0].data[0]).toBe(0x01);
	});

	it('gives equal documents for the same input', () => {
		const bytes = buildStl(
			buildGsi(),
			buildTti({ extensionBlockNumber: 0, text: ['A'] }),
			buildTti({ extensionBlockNumber: 0xFF, text: [0x81, 'B'] }),
		);

		expect(parse(bytes)).toEqual(parse(bytes));
	});
});

describe('tryParse', () => {
	it('returns the document', () => {
		const result = tryParse(buildGsi());

		expect(result.ok).toBe(true);
		if (result.ok) expect(result.document.subtitles).toEqual([]);
	});

	it('returns the error instead of throwing it', () => {
		const result = tryParse(buildGsi().subarray(0, 100));

		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.kind).toBe('TRUNCATED_INPUT');
	});
});

describe('parseFromPath', () => {
	let directory: string;

	beforeEach(async () => {
		directory = await fsP.mkdtemp(path.join(os.tmpdir(), 'stl-reader-'));
	});

	afterEach(async () => {
		await fsP.rm(directory, { recursive: true, force: true });
	});

	it('reads and decodes a file', async () => {
		const filePath = path.join(directory, 'episode.stl');
		await fsP.writeFile(filePath, buildStl(buildGsi(), buildTti({ text: ['Hello'] })));

		const document = await parseFromPath(filePath);
		expect(fragmentsToText(document.subtitles[0].fragments)).toBe('Hello');
	});
});
