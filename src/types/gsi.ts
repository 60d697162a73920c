import type { CharacterTableId } from '../text/character-tables.js';
import type { Timecode } from '../timecode.js';

export const GSI_BLOCK_SIZE = 1024;

/*
 * char8 | 0x3   | code page number                  | "437", "850", "860", "863" or "865"
 * char8 | 0x8   | disk format code                  | "STL25.01" or "STL30.01"
 * char8 | 0x1   | display standard code             | " ", "0", "1" or "2"
 * char8 | 0x2   | character code table              | "00" to "04"
 * char8 | 0x2   | language code                     | hex
 * text  | 0x20  | original programme title          |
 * text  | 0x20  | original episode title            |
 * text  | 0x20  | translated programme title        |
 * text  | 0x20  | translated episode title          |
 * text  | 0x20  | translator's name                 |
 * text  | 0x20  | translator's contact details      |
 * text  | 0x10  | subtitle list reference code      |
 * char8 | 0x6   | creation date                     | YYMMDD
 * char8 | 0x6   | revision date                     | YYMMDD
 * char8 | 0x2   | revision number                   |
 * char8 | 0x5   | total number of TTI blocks        |
 * char8 | 0x5   | total number of subtitles         |
 * char8 | 0x3   | total number of subtitle groups   |
 * char8 | 0x2   | maximum number of characters/row  |
 * char8 | 0x2   | maximum number of displayable rows |
 * char8 | 0x1   | time code status                  | "0" or "1"
 * char8 | 0x8   | time code: start of programme     | HHMMSSFF
 * char8 | 0x8   | time code: first in-cue           | HHMMSSFF
 * char8 | 0x1   | total number of disks             | blank means 1
 * char8 | 0x1   | disk sequence number              | blank means 1
 * text  | 0x3   | country of origin                 | ISO 3166 alpha-3
 * text  | 0x20  | publisher                         |
 * text  | 0x20  | editor's name                     |
 * text  | 0x20  | editor's contact details          |
 * data  | 0x4B  | spare                             |
 * data  | 0x240 | user-defined area                 |
 */
export interface GeneralBlock {
	codePageNumber: string;
	diskFormatCode: string;
	frameRate: number;
	displayStandardCode: string;
	displayStandard: DisplayStandard;
	characterCodeTable: string;
	characterTable: CharacterTableId | 'unknown';
	languageCode: string;
	language?: string;
	originalProgrammeTitle: string;
	originalEpisodeTitle: string;
	translatedProgrammeTitle: string;
	translatedEpisodeTitle: string;
	translatorName: string;
	translatorContactDetails: string;
	subtitleListReferenceCode: string;
	creationDate?: StlDate;
	revisionDate?: StlDate;
	revisionNumber?: number;
	totalTtiBlocks?: number;
	totalSubtitles?: number;
	totalSubtitleGroups?: number;
	maxCharactersPerRow?: number;
	maxRows?: number;
	timeCodeStatus: string;
	timeCodeStartOfProgramme?: Timecode;
	timeCodeFirstInCue?: Timecode;
	totalDisks: number;
	diskSequenceNumber: number;
	countryOfOrigin: string;
	publisher: string;
	editorName: string;
	editorContactDetails: string;
	spare: Uint8Array;
	userDefinedArea: Uint8Array;
}

export type DisplayStandard = 'unspecified' | 'openSubtitling' | 'level1Teletext' | 'level2Teletext' | 'unknown';

export interface StlDate {
	year: number;
	month: number;
	day: number;
}
