import type { CharacterTable } from './character-tables.js';
import type { TeletextColour, TextFragment } from '../types/fragments.js';

export const FILL_BYTE = 0x8F;
export const ROW_BREAK = 0x8A;

const colours: TeletextColour[] = ['black', 'red', 'green', 'yellow', 'blue', 'magenta', 'cyan', 'white'];

export function isControlByte(byte: number) {
	return byte < 0x20 || (byte >= 0x80 && byte <= 0x9F);
}

/*
 * 0x00-0x07 alpha colour           0x80/0x81 italics on/off
 * 0x08/0x09 flash/steady           0x82/0x83 underline on/off
 * 0x0A/0x0B end box/start box      0x84/0x85 boxing on/off
 * 0x0C-0x0F character size         0x8A      CR/LF
 * 0x1C/0x1D black/new background   0x8F      unused space
 *
 * Mosaic and reserved codes are kept as unsupported.
 */
export function controlFragment(byte: number): TextFragment {
	if (byte <= 0x07) return { type: 'colour', colour: colours[byte] };

	switch (byte) {
		case 0x08: return { type: 'flash' };
		case 0x09: return { type: 'steady' };
		case 0x0A: return { type: 'endBox' };
		case 0x0B: return { type: 'startBox' };
		case 0x0C: return { type: 'size', size: 'normal' };
		case 0x0D: return { type: 'size', size: 'doubleHeight' };
		case 0x0E: return { type: 'size', size: 'doubleWidth' };
		case 0x0F: return { type: 'size', size: 'doubleSize' };
		case 0x1C: return { type: 'background', background: 'black' };
		case 0x1D: return { type: 'background', background: 'new' };
		case 0x80: return { type: 'italicsOn' };
		case 0x81: return { type: 'italicsOff' };
		case 0x82: return { type: 'underlineOn' };
		case 0x83: return { type: 'underlineOff' };
		case 0x84: return { type: 'boxingOn' };
		case 0x85: return { type: 'boxingOff' };
		case ROW_BREAK: return { type: 'rowBreak' };
		default: return { type: 'unsupported', code: byte };
	}
}

/**
 * Splits a TTI text field into text runs and markers, stopping at the first
 * unused-space byte. Every control byte becomes a marker in place, style
 * toggles included.
 */
export function decodeTextField(field: Uint8Array, table: CharacterTable): TextFragment[] {
	const fragments: TextFragment[] = [];
	let runStart = -1;

	const endRun = (runEnd: number) => {
		if (runStart < 0) return;
		fragments.push({ type: 'text', text: table.decode(field.subarray(runStart, runEnd)) });
		runStart = -1;
	};

	let index = 0;
	for (; index < field.length; index++) {
		const byte = field[index];
		if (byte === FILL_BYTE) break;

		if (!isControlByte(byte)) {
			if (runStart < 0) runStart = index;
			continue;
		}

		endRun(index);
		fragments.push(controlFragment(byte));
	}

	endRun(index);

	return fragments;
}

export function fragmentsToText(fragments: readonly TextFragment[]) {
	let text = '';
	for (const fragment of fragments) {
		if (fragment.type === 'text') text += fragment.text;
		else if (fragment.type === 'rowBreak') text += '\n';
	}

	return text;
}
