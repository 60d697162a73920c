import type { Assembly } from './assembler.js';
import type { Diagnostic } from './errors.js';

import type { StlDocument } from './types/document.js';
import type { GeneralBlock } from './types/gsi.js';

export function createDocument(generalBlock: GeneralBlock, { subtitles, userDataBlocks }: Assembly, diagnostics: Diagnostic[]): StlDocument {
	return {
		generalBlock,
		subtitles,
		userDataBlocks,
		diagnostics,
	};
}
