import { createDiagnostic, ParseError } from '../errors.js';
import type { Diagnostic, DiagnosticKind } from '../errors.js';

import { characterTableFromCode, codePageTable, defaultCodePageTable } from '../text/character-tables.js';
import type { CharacterTable } from '../text/character-tables.js';
import languageTable from '../text/tables/languages.json' with { type: 'json' };
import { parseTimecodeDigits } from '../timecode.js';
import type { ByteReader } from '../util/byte-reader.js';

import { GSI_BLOCK_SIZE } from '../types/gsi.js';
import type { DisplayStandard, GeneralBlock, StlDate } from '../types/gsi.js';
import type { ParseOptions } from '../types/document.js';

const languages = new Map<string, string>(Object.entries(languageTable));

const displayStandards = new Map<string, DisplayStandard>([
	[' ', 'unspecified'],
	['\0', 'unspecified'],
	['0', 'openSubtitling'],
	['1', 'level1Teletext'],
	['2', 'level2Teletext'],
]);

const isBlank = (value: string) => value.replace(/\0/g, ' ').trim() === '';

export class GsiReader {
	private readonly diagnostics: Diagnostic[] = [];
	private textTable: CharacterTable = defaultCodePageTable;

	constructor(
		private readonly reader: ByteReader,
		private readonly options: ParseOptions = {},
	) {}

	read() {
		const start = this.reader.offset;
		if (this.reader.bytesRemaining < GSI_BLOCK_SIZE) {
			throw new ParseError('TRUNCATED_INPUT', start, {
				expected: GSI_BLOCK_SIZE,
				record: 'the general block',
				offset: start,
				available: this.reader.bytesRemaining,
			});
		}

		const codePageNumber = this.readCodePageNumber();
		const [diskFormatCode, frameRate] = this.readDiskFormatCode();
		const [displayStandardCode, displayStandard] = this.readDisplayStandard();
		const [characterCodeTable, characterTable] = this.readCharacterCodeTable();
		const [languageCode, language] = this.readLanguageCode();

		const generalBlock: GeneralBlock = {
			codePageNumber,
			diskFormatCode,
			frameRate,
			displayStandardCode,
			displayStandard,
			characterCodeTable,
			characterTable,
			languageCode,
			language,
			originalProgrammeTitle: this.readText(32),
			originalEpisodeTitle: this.readText(32),
			translatedProgrammeTitle: this.readText(32),
			translatedEpisodeTitle: this.readText(32),
			translatorName: this.readText(32),
			translatorContactDetails: this.readText(32),
			subtitleListReferenceCode: this.readText(16),
			creationDate: this.readDate('creationDate'),
			revisionDate: this.readDate('revisionDate'),
			revisionNumber: this.readNumber('revisionNumber', 2),
			totalTtiBlocks: this.readNumber('totalTtiBlocks', 5),
			totalSubtitles: this.readNumber('totalSubtitles', 5),
			totalSubtitleGroups: this.readNumber('totalSubtitleGroups', 3),
			maxCharactersPerRow: this.readNumber('maxCharactersPerRow', 2),
			maxRows: this.readNumber('maxRows', 2),
			timeCodeStatus: this.reader.readChar8(1),
			timeCodeStartOfProgramme: this.readTimecode('timeCodeStartOfProgramme'),
			timeCodeFirstInCue: this.readTimecode('timeCodeFirstInCue'),
			totalDisks: this.readNumber('totalDisks', 1) ?? 1,
			diskSequenceNumber: this.readNumber('diskSequenceNumber', 1) ?? 1,
			countryOfOrigin: this.readText(3),
			publisher: this.readText(32),
			editorName: this.readText(32),
			editorContactDetails: this.readText(32),
			spare: this.reader.readBytes(75),
			userDefinedArea: this.reader.readBytes(576),
		};

		return { generalBlock, diagnostics: this.diagnostics };
	}

	//////////////////
	// CODED FIELDS

	private readCodePageNumber() {
		const offset = this.reader.offset;
		const codePageNumber = this.reader.readChar8(3);

		if (!isBlank(codePageNumber) && !/^\d{3}$/.test(codePageNumber)) {
			throw new ParseError('UNRECOGNIZED_CODE_PAGE', offset, { value: codePageNumber });
		}

		const table = codePageTable(codePageNumber);
		if (!table) {
			if (!isBlank(codePageNumber)) this.diagnose('UNRECOGNIZED_CODE_PAGE', 'codePageNumber', codePageNumber, offset);
		} else if (this.options.headerText === 'declared') {
			this.textTable = table;
		}

		return codePageNumber;
	}

	private readDiskFormatCode() {
		const offset = this.reader.offset;
		const diskFormatCode = this.reader.readChar8(8);

		const match = /^STL(\d\d)\.01$/.exec(diskFormatCode);
		const frameRate = match ? Number(match[1]) : 0;
		if (frameRate === 0) throw new ParseError('UNRECOGNIZED_FRAME_RATE', offset, { value: diskFormatCode });
		if (frameRate !== 25 && frameRate !== 30) this.diagnose('UNRECOGNIZED_FRAME_RATE', 'diskFormatCode', String(frameRate), offset);

		return [diskFormatCode, frameRate] as const;
	}

	private readDisplayStandard() {
		const offset = this.reader.offset;
		const code = this.reader.readChar8(1);

		const displayStandard = displayStandards.get(code);
		if (displayStandard) return [code, displayStandard] as const;

		this.diagnose('UNRECOGNIZED_DISPLAY_STANDARD', 'displayStandardCode', code, offset);
		return [code, 'unknown'] as const;
	}

	private readCharacterCodeTable() {
		const offset = this.reader.offset;
		const code = this.reader.readChar8(2);

		const table = characterTableFromCode(code);
		if (table) return [code, table.id] as const;

		this.diagnose('UNRECOGNIZED_CHARACTER_CODE_TABLE', 'characterCodeTable', code, offset);
		return [code, 'unknown'] as const;
	}

	private readLanguageCode() {
		const offset = this.reader.offset;
		const code = this.reader.readChar8(2);

		const language = languages.get(code.toUpperCase());
		if (!language && !isBlank(code)) this.diagnose('UNRECOGNIZED_LANGUAGE_CODE', 'languageCode', code, offset);

		return [code, language] as const;
	}

	////////////////
	// PLAIN FIELDS

	private readText(length: number) {
		return this.textTable.decode(this.reader.readBytes(length));
	}

	private readNumber(field: string, length: number) {
		const offset = this.reader.offset;
		const raw = this.reader.readChar8(length);
		if (isBlank(raw)) return undefined;

		const digits = raw.trim();
		if (/^\d+$/.test(digits)) return Number(digits);

		this.diagnose('MALFORMED_FIELD', field, raw, offset);
		return undefined;
	}

	/** YYMMDD; two-digit years from 80 on are taken as 19xx. */
	private readDate(field: string): StlDate | undefined {
		const offset = this.reader.offset;
		const raw = this.reader.readChar8(6);
		if (isBlank(raw)) return undefined;

		const match = /^(\d\d)(\d\d)(\d\d)$/.exec(raw);
		const date = match && {
			year: Number(match[1]) + (Number(match[1]) >= 80 ? 1900 : 2000),
			month: Number(match[2]),
			day: Number(match[3]),
		};

		if (!date || date.month < 1 || date.month > 12 || date.day < 1 || date.day > 31) {
			this.diagnose('MALFORMED_FIELD', field, raw, offset);
			return undefined;
		}

		return date;
	}

	private readTimecode(field: string) {
		const offset = this.reader.offset;
		const raw = this.reader.readChar8(8);
		if (isBlank(raw)) return undefined;

		const timecode = parseTimecodeDigits(raw);
		if (!timecode) this.diagnose('MALFORMED_FIELD', field, raw, offset);

		return timecode;
	}

	private diagnose(kind: DiagnosticKind, field: string, value: string, offset: number) {
		this.diagnostics.push(createDiagnostic(kind, field, value, offset));
	}
}

export function readGeneralBlock(reader: ByteReader, options?: ParseOptions) {
	return new GsiReader(reader, options).read();
}
