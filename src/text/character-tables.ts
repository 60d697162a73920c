import iconv from 'iconv-lite';

import iso6937 from './tables/iso6937.json' with { type: 'json' };

export type CharacterTableId = 'latin' | 'cyrillic' | 'arabic' | 'greek' | 'hebrew';

export interface CharacterTable<Id extends string = string> {
	readonly id: Id;
	decode(bytes: Uint8Array): string;
}

export const REPLACEMENT_CHARACTER = '\uFFFD';

export const DEFAULT_CODE_PAGE = '850';

const toByteMap = (entries: Record<string, string>) =>
	new Map(Object.entries(entries).map(([hex, char]) => [parseInt(hex, 16), char]));

const latinCharacters = toByteMap(iso6937.characters);
const latinDiacritics = toByteMap(iso6937.diacritics);

const decodeLatinCharacter = (byte: number) => {
	if (byte >= 0x20 && byte < 0x7F) return String.fromCharCode(byte);
	return latinCharacters.get(byte) ?? REPLACEMENT_CHARACTER;
};

/*
 * ISO 6937 puts a non-spacing diacritic (0xC1-0xCF) before the letter it
 * modifies; Unicode wants the combining mark after it.
 */
const latin: CharacterTable<'latin'> = {
	id: 'latin',
	decode(bytes) {
		let text = '';
		let pendingMark: string | undefined;

		for (const byte of bytes) {
			const mark = latinDiacritics.get(byte);
			if (mark !== undefined) {
				if (pendingMark !== undefined) text += pendingMark;
				pendingMark = mark;
				continue;
			}

			text += decodeLatinCharacter(byte);
			if (pendingMark !== undefined) {
				text += pendingMark;
				pendingMark = undefined;
			}
		}

		if (pendingMark !== undefined) text += pendingMark;

		return text.normalize('NFC');
	},
};

const iconvTable = <Id extends string>(id: Id, encoding: string): CharacterTable<Id> => ({
	id,
	decode: bytes => iconv.decode(Buffer.from(bytes), encoding),
});

const characterTables = new Map<string, CharacterTable<CharacterTableId>>([
	['00', latin],
	['01', iconvTable('cyrillic', 'iso-8859-5')],
	['02', iconvTable('arabic', 'iso-8859-6')],
	['03', iconvTable('greek', 'iso-8859-7')],
	['04', iconvTable('hebrew', 'iso-8859-8')],
]);

const cp850 = iconvTable('cp850', 'cp850');

const codePageTables = new Map<string, CharacterTable>([
	['437', iconvTable('cp437', 'cp437')],
	['850', cp850],
	['860', iconvTable('cp860', 'cp860')],
	['863', iconvTable('cp863', 'cp863')],
	['865', iconvTable('cp865', 'cp865')],
]);

export const latinTable = latin;

export const defaultCodePageTable = cp850;

/** Table for TTI text, keyed by the general block's two-digit character code table. */
export function characterTableFromCode(code: string) {
	return characterTables.get(code);
}

/** Table for general block text, keyed by its three-digit code page number. */
export function codePageTable(codePageNumber: string) {
	return codePageTables.get(codePageNumber);
}
