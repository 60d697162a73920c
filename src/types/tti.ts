import type { Timecode } from '../timecode.js';

export const TTI_BLOCK_SIZE = 128;
export const TEXT_FIELD_SIZE = 112;

export const LAST_EXTENSION_BLOCK = 0xFF;
export const USER_DATA_BLOCK = 0xFE;

/*
 * uint8    | 0x1  | subtitle group number  |
 * uint16   | 0x1  | subtitle number        |
 * uint8    | 0x1  | extension block number | 0xFF on the last block of a subtitle, 0xFE for user data
 * uint8    | 0x1  | cumulative status      | 0 to 3
 * Timecode | 0x1  | time code in           |
 * Timecode | 0x1  | time code out          |
 * uint8    | 0x1  | vertical position      |
 * uint8    | 0x1  | justification code     | 0 to 3
 * uint8    | 0x1  | comment flag           | 0 = subtitle data, 1 = comment
 * data     | 0x70 | text field             | padded with 0x8F
 */
export interface TtiBlock {
	recordIndex: number;
	offset: number;
	subtitleGroupNumber: number;
	subtitleNumber: number;
	extensionBlockNumber: number;
	cumulativeStatusCode: number;
	cumulativeStatus: CumulativeStatus;
	timeCodeIn: Timecode;
	timeCodeOut: Timecode;
	verticalPosition: number;
	justificationCode: number;
	justification: Justification;
	comment: boolean;
	textField: Uint8Array;
}

export type CumulativeStatus = 'none' | 'first' | 'intermediate' | 'last' | 'unknown';

export type Justification = 'unchanged' | 'left' | 'centred' | 'right' | 'unknown';
