import { ParseError } from '../errors.js';

import { formatTimecode, isValidTimecode } from '../timecode.js';
import type { Timecode } from '../timecode.js';
import type { ByteReader } from '../util/byte-reader.js';

import { TEXT_FIELD_SIZE, TTI_BLOCK_SIZE, USER_DATA_BLOCK } from '../types/tti.js';
import type { CumulativeStatus, Justification, TtiBlock } from '../types/tti.js';

const cumulativeStatuses: CumulativeStatus[] = ['none', 'first', 'intermediate', 'last'];
const justifications: Justification[] = ['unchanged', 'left', 'centred', 'right'];

const lookup = <T>(values: T[], code: number, fallback: T) => code < values.length ? values[code] : fallback;

export class TtiReader {
	constructor(
		private readonly reader: ByteReader,
		private readonly frameRate: number,
	) {}

	readAll() {
		const blocks: TtiBlock[] = [];
		while (this.reader.bytesRemaining > 0) blocks.push(this.readBlock(blocks.length));

		return blocks;
	}

	private readBlock(recordIndex: number): TtiBlock {
		const offset = this.reader.offset;
		if (this.reader.bytesRemaining < TTI_BLOCK_SIZE) {
			throw new ParseError('TRUNCATED_INPUT', offset, {
				expected: TTI_BLOCK_SIZE,
				record: `TTI block ${recordIndex}`,
				offset,
				available: this.reader.bytesRemaining,
			});
		}

		const subtitleGroupNumber = this.reader.readUInt8();
		const subtitleNumber = this.reader.readUInt16();
		const extensionBlockNumber = this.reader.readUInt8();
		const cumulativeStatusCode = this.reader.readUInt8();
		const timeCodeIn = this.readTimecode();
		const timeCodeOut = this.readTimecode();
		const verticalPosition = this.reader.readUInt8();
		const justificationCode = this.reader.readUInt8();
		const comment = this.reader.readUInt8() !== 0;
		const textField = this.reader.readBytes(TEXT_FIELD_SIZE);

		// user data blocks carry no timing
		if (extensionBlockNumber !== USER_DATA_BLOCK) {
			this.validateTimecode(timeCodeIn, 'time code in', recordIndex, offset + 5);
			this.validateTimecode(timeCodeOut, 'time code out', recordIndex, offset + 9);
		}

		return {
			recordIndex,
			offset,
			subtitleGroupNumber,
			subtitleNumber,
			extensionBlockNumber,
			cumulativeStatusCode,
			cumulativeStatus: lookup(cumulativeStatuses, cumulativeStatusCode, 'unknown'),
			timeCodeIn,
			timeCodeOut,
			verticalPosition,
			justificationCode,
			justification: lookup(justifications, justificationCode, 'unknown'),
			comment,
			textField,
		};
	}

	private readTimecode(): Timecode {
		return {
			hours: this.reader.readUInt8(),
			minutes: this.reader.readUInt8(),
			seconds: this.reader.readUInt8(),
			frames: this.reader.readUInt8(),
		};
	}

	private validateTimecode(timecode: Timecode, field: string, recordIndex: number, offset: number) {
		if (isValidTimecode(timecode, this.frameRate)) return;

		throw new ParseError('INVALID_TIMECODE', offset, {
			record: recordIndex,
			field,
			timecode: formatTimecode(timecode),
			frameRate: this.frameRate,
		});
	}
}

export function readTtiBlocks(reader: ByteReader, frameRate: number) {
	return new TtiReader(reader, frameRate).readAll();
}
