export { parse, parseFromPath, tryParse } from './parser.js';
export type { ParseResult } from './parser.js';

export { assembleSubtitles, SubtitleAssembler } from './assembler.js';
export type { Assembly } from './assembler.js';
export { createDocument } from './document.js';
export { CustomError, ParseError } from './errors.js';
export type { Diagnostic, DiagnosticKind, ParseErrorKind } from './errors.js';
export { GsiReader, readGeneralBlock } from './readers/gsi-reader.js';
export { TtiReader, readTtiBlocks } from './readers/tti-reader.js';
export {
	characterTableFromCode,
	codePageTable,
	DEFAULT_CODE_PAGE,
	REPLACEMENT_CHARACTER,
} from './text/character-tables.js';
export type { CharacterTable, CharacterTableId } from './text/character-tables.js';
export { decodeTextField, fragmentsToText } from './text/control-codes.js';
export {
	compareTimecodes,
	formatTimecode,
	parseTimecodeDigits,
	timecodeToFrames,
	timecodeToMilliseconds,
	timecodeToSeconds,
} from './timecode.js';
export type { Timecode } from './timecode.js';
export { ByteReader } from './util/byte-reader.js';

export type { DecodedBlock, ParseOptions, StlDocument, Subtitle, UserDataBlock } from './types/document.js';
export type { CharacterSize, TeletextColour, TextFragment } from './types/fragments.js';
export { GSI_BLOCK_SIZE } from './types/gsi.js';
export type { DisplayStandard, GeneralBlock, StlDate } from './types/gsi.js';
export { LAST_EXTENSION_BLOCK, TEXT_FIELD_SIZE, TTI_BLOCK_SIZE, USER_DATA_BLOCK } from './types/tti.js';
export type { CumulativeStatus, Justification, TtiBlock } from './types/tti.js';
