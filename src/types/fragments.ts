export type TeletextColour = 'black' | 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'white';

export type CharacterSize = 'normal' | 'doubleHeight' | 'doubleWidth' | 'doubleSize';

export type TextFragment =
	| { type: 'text'; text: string }
	| { type: 'rowBreak' }
	| { type: 'italicsOn' }
	| { type: 'italicsOff' }
	| { type: 'underlineOn' }
	| { type: 'underlineOff' }
	| { type: 'boxingOn' }
	| { type: 'boxingOff' }
	| { type: 'colour'; colour: TeletextColour }
	| { type: 'flash' }
	| { type: 'steady' }
	| { type: 'startBox' }
	| { type: 'endBox' }
	| { type: 'size'; size: CharacterSize }
	| { type: 'background'; background: 'black' | 'new' }
	| { type: 'unsupported'; code: number };

export type FragmentType = TextFragment['type'];
