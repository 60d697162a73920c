import { ParseError } from './errors.js';

import { compareTimecodes, formatTimecode } from './timecode.js';

import type { DecodedBlock, Subtitle, UserDataBlock } from './types/document.js';
import type { TextFragment } from './types/fragments.js';
import { LAST_EXTENSION_BLOCK, USER_DATA_BLOCK } from './types/tti.js';
import type { TtiBlock } from './types/tti.js';

export interface Assembly {
	subtitles: Subtitle[];
	userDataBlocks: UserDataBlock[];
}

interface OpenSubtitle {
	first: TtiBlock;
	last: TtiBlock;
	blockCount: number;
	fragments: TextFragment[];
}

const belongsTo = (block: TtiBlock, open: OpenSubtitle) =>
	block.subtitleNumber === open.last.subtitleNumber && block.subtitleGroupNumber === open.last.subtitleGroupNumber;

/**
 * Groups TTI blocks into subtitles. Extension block 0 opens a subtitle, 1, 2, …
 * continue it, and 0xFF closes it (or stands alone as a one-block subtitle).
 * Each further block starts on a new row unless the fragments so far already
 * end in a row break. User data blocks (0xFE) are set aside.
 */
export class SubtitleAssembler {
	private readonly subtitles: Subtitle[] = [];
	private readonly userDataBlocks: UserDataBlock[] = [];
	private open?: OpenSubtitle;

	add(decoded: DecodedBlock) {
		const { block } = decoded;

		switch (block.extensionBlockNumber) {
			case USER_DATA_BLOCK:
				this.userDataBlocks.push({
					recordIndex: block.recordIndex,
					subtitleNumber: block.subtitleNumber,
					data: block.textField,
				});
				break;

			case 0:
				this.close();
				this.start(decoded);
				break;

			case LAST_EXTENSION_BLOCK:
				if (this.open && belongsTo(block, this.open)) {
					this.extend(this.open, decoded);
				} else {
					this.close();
					this.start(decoded);
				}
				this.close();
				break;

			default: {
				const open = this.open && belongsTo(block, this.open) ? this.open : undefined;
				const expected = open ? open.last.extensionBlockNumber + 1 : 0;
				if (!open || block.extensionBlockNumber !== expected) {
					throw new ParseError('BROKEN_EXTENSION_SEQUENCE', block.offset, {
						record: block.recordIndex,
						subtitle: block.subtitleNumber,
						found: block.extensionBlockNumber,
						expected,
					});
				}

				this.extend(open, decoded);
				break;
			}
		}
	}

	finish(): Assembly {
		this.close();
		return { subtitles: this.subtitles, userDataBlocks: this.userDataBlocks };
	}

	private start({ block, fragments }: DecodedBlock) {
		this.open = { first: block, last: block, blockCount: 1, fragments: [...fragments] };
	}

	private extend(open: OpenSubtitle, { block, fragments }: DecodedBlock) {
		if (open.fragments.at(-1)?.type !== 'rowBreak') open.fragments.push({ type: 'rowBreak' });
		open.fragments.push(...fragments);
		open.last = block;
		open.blockCount++;
	}

	private close() {
		if (this.open) this.subtitles.push(toSubtitle(this.open));
		this.open = undefined;
	}
}

export function assembleSubtitles(blocks: readonly DecodedBlock[]) {
	const assembler = new SubtitleAssembler();
	for (const block of blocks) assembler.add(block);

	return assembler.finish();
}

function toSubtitle({ first, last, blockCount, fragments }: OpenSubtitle): Subtitle {
	if (compareTimecodes(last.timeCodeOut, first.timeCodeIn) < 0) {
		throw new ParseError('INVALID_TIME_RANGE', first.offset, {
			subtitle: first.subtitleNumber,
			record: first.recordIndex,
			timeCodeIn: formatTimecode(first.timeCodeIn),
			timeCodeOut: formatTimecode(last.timeCodeOut),
		});
	}

	return {
		subtitleNumber: first.subtitleNumber,
		subtitleGroupNumber: first.subtitleGroupNumber,
		timeCodeIn: first.timeCodeIn,
		timeCodeOut: last.timeCodeOut,
		verticalPosition: first.verticalPosition,
		justificationCode: first.justificationCode,
		justification: first.justification,
		cumulativeStatus: first.cumulativeStatus,
		comment: first.comment,
		blockCount,
		fragments,
	};
}
