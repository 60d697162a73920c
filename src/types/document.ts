import type { Diagnostic } from '../errors.js';
import type { TextFragment } from './fragments.js';
import type { GeneralBlock } from './gsi.js';
import type { CumulativeStatus, Justification, TtiBlock } from './tti.js';
import type { Timecode } from '../timecode.js';

export interface ParseOptions {
	/**
	 * Table for the general block's text fields. `default` always uses code
	 * page 850; `declared` uses the file's own code page when it is known.
	 */
	headerText?: 'default' | 'declared';
}

export interface DecodedBlock {
	block: TtiBlock;
	fragments: TextFragment[];
}

export interface Subtitle {
	readonly subtitleNumber: number;
	readonly subtitleGroupNumber: number;
	readonly timeCodeIn: Readonly<Timecode>;
	readonly timeCodeOut: Readonly<Timecode>;
	readonly verticalPosition: number;
	readonly justificationCode: number;
	readonly justification: Justification;
	readonly cumulativeStatus: CumulativeStatus;
	readonly comment: boolean;
	readonly blockCount: number;
	readonly fragments: readonly TextFragment[];
}

export interface UserDataBlock {
	readonly recordIndex: number;
	readonly subtitleNumber: number;
	readonly data: Uint8Array;
}

export interface StlDocument {
	readonly generalBlock: Readonly<GeneralBlock>;
	readonly subtitles: readonly Subtitle[];
	readonly userDataBlocks: readonly UserDataBlock[];
	readonly diagnostics: readonly Diagnostic[];
}
