import { describe, it, expect } from 'vitest';

import { assembleSubtitles } from './assembler.js';
import { ParseError } from './errors.js';

import type { DecodedBlock } from './types/document.js';
import type { TextFragment } from './types/fragments.js';
import type { TtiBlock } from './types/tti.js';

const tc = (seconds: number, frames = 0) => ({ hours: 10, minutes: 0, seconds, frames });

let recordIndex = 0;

const decoded = (overrides: Partial<TtiBlock>, ...texts: string[]): DecodedBlock => {
	const index = recordIndex++;
	return {
		block: {
			recordIndex: index,
			offset: 1024 + index * 128,
			subtitleGroupNumber: 0,
			subtitleNumber: 1,
			extensionBlockNumber: 0xFF,
			cumulativeStatusCode: 0,
			cumulativeStatus: 'none',
			timeCodeIn: tc(1),
			timeCodeOut: tc(3),
			verticalPosition: 20,
			justificationCode: 2,
			justification: 'centred',
			comment: false,
			textField: new Uint8Array(112),
			...overrides,
		},
		fragments: texts.map((text): TextFragment => ({ type: 'text', text })),
	};
};

const catchError = (fn: () => unknown) => {
	try {
		fn();
	} catch (err: unknown) {
		return err;
	}

	throw new Error('Expected an error to be thrown.');
};

describe('assembleSubtitles', () => {
	it('makes one subtitle of each terminating block', () => {
		const { subtitles } = assembleSubtitles([
			decoded({ subtitleNumber: 1 }, 'one'),
			decoded({ subtitleNumber: 2, timeCodeIn: tc(4), timeCodeOut: tc(6) }, 'two'),
		]);

		expect(subtitles.map(subtitle => [subtitle.subtitleNumber, subtitle.blockCount, subtitle.fragments])).toEqual([
			[1, 1, [{ type: 'text', text: 'one' }]],
			[2, 1, [{ type: 'text', text: 'two' }]],
		]);
	});

	it('merges extension blocks 0, 1, 2 in order', () => {
		const { subtitles } = assembleSubtitles([
			decoded({ extensionBlockNumber: 0, timeCodeIn: tc(1), timeCodeOut: tc(2), verticalPosition: 18 }, 'A'),
			decoded({ extensionBlockNumber: 1, timeCodeIn: tc(2), timeCodeOut: tc(3) }, 'B'),
			decoded({ extensionBlockNumber: 2, timeCodeIn: tc(3), timeCodeOut: tc(5, 10) }, 'C'),
		]);

		expect(subtitles).toHaveLength(1);
		expect(subtitles[0]).toMatchObject({
			subtitleNumber: 1,
			timeCodeIn: tc(1),
			timeCodeOut: tc(5, 10),
			verticalPosition: 18,
			blockCount: 3,
			fragments: [
				{ type: 'text', text: 'A' },
				{ type: 'rowBreak' },
				{ type: 'text', text: 'B' },
				{ type: 'rowBreak' },
				{ type: 'text', text: 'C' },
			],
		});
	});

	it('adds no row break after a block that already ends in one', () => {
		const first = decoded({ extensionBlockNumber: 0 });
		const { subtitles } = assembleSubtitles([
			{ ...first, fragments: [{ type: 'text', text: 'A' }, { type: 'rowBreak' }] },
			decoded({ extensionBlockNumber: 0xFF }, 'B'),
		]);

		expect(subtitles[0].fragments).toEqual([
			{ type: 'text', text: 'A' },
			{ type: 'rowBreak' },
			{ type: 'text', text: 'B' },
		]);
	});

	it('closes an extended subtitle with its 0xFF block', () => {
		const { subtitles } = assembleSubtitles([
			decoded({ extensionBlockNumber: 0 }, 'A'),
			decoded({ extensionBlockNumber: 0xFF }, 'B'),
			decoded({ subtitleNumber: 2, extensionBlockNumber: 0xFF }, 'C'),
		]);

		expect(subtitles.map(subtitle => subtitle.blockCount)).toEqual([2, 1]);
	});

	it('closes an open subtitle when the next one starts', () => {
		const { subtitles } = assembleSubtitles([
			decoded({ extensionBlockNumber: 0 }, 'A'),
			decoded({ subtitleNumber: 2, extensionBlockNumber: 0 }, 'B'),
		]);

		expect(subtitles.map(subtitle => subtitle.subtitleNumber)).toEqual([1, 2]);
	});

	it('fails when an extension block is skipped', () => {
		const blocks = [
			decoded({ extensionBlockNumber: 0 }, 'A'),
			decoded({ extensionBlockNumber: 2 }, 'C'),
		];
		const err = catchError(() => assembleSubtitles(blocks));

		expect(err).toBeInstanceOf(ParseError);
		expect(err).toMatchObject({
			kind: 'BROKEN_EXTENSION_SEQUENCE',
			offset: blocks[1].block.offset,
			details: { record: blocks[1].block.recordIndex, subtitle: 1, found: 2, expected: 1 },
		});
	});

	it('fails when an extension block belongs to another subtitle', () => {
		const err = catchError(() => assembleSubtitles([
			decoded({ extensionBlockNumber: 0 }, 'A'),
			decoded({ subtitleNumber: 2, extensionBlockNumber: 1 }, 'B'),
		]));

		expect(err).toMatchObject({ kind: 'BROKEN_EXTENSION_SEQUENCE', details: { subtitle: 2, found: 1, expected: 0 } });
	});

	it('fails when a subtitle ends before it starts', () => {
		const err = catchError(() => assembleSubtitles([
			decoded({ timeCodeIn: tc(5), timeCodeOut: tc(4, 24) }, 'A'),
		]));

		expect(err).toBeInstanceOf(ParseError);
		expect(err).toMatchObject({
			kind: 'INVALID_TIME_RANGE',
			details: { subtitle: 1, timeCodeIn: '10:00:05:00', timeCodeOut: '10:00:04:24' },
		});
	});

	it('sets user data blocks aside', () => {
		const data = Uint8Array.from([1, 2, 3]);
		const { subtitles, userDataBlocks } = assembleSubtitles([
			decoded({ extensionBlockNumber: 0 }, 'A'),
			decoded({ extensionBlockNumber: 0xFE, subtitleNumber: 1, textField: data }),
			decoded({ extensionBlockNumber: 1 }, 'B'),
		]);

		expect(subtitles).toHaveLength(1);
		expect(subtitles[0].fragments).toEqual([{ type: 'text', text: 'A' }, { type: 'rowBreak' }, { type: 'text', text: 'B' }]);
		expect(userDataBlocks).toHaveLength(1);
		expect(userDataBlocks[0].data).toBe(data);
	});

	it('keeps cumulative status as metadata', () => {
		const { subtitles } = assembleSubtitles([
			decoded({ subtitleNumber: 1, cumulativeStatusCode: 1, cumulativeStatus: 'first' }, 'A'),
			decoded({ subtitleNumber: 2, cumulativeStatusCode: 3, cumulativeStatus: 'last' }, 'B'),
		]);

		expect(subtitles.map(subtitle => subtitle.cumulativeStatus)).toEqual(['first', 'last']);
	});
});
