// @typescript-eslint/indent is known to be iffy with type definitions
/* eslint-disable @typescript-eslint/indent */
import type { Primitive } from 'type-fest';

const messages = {
	// parse errors
	BROKEN_EXTENSION_SEQUENCE: 'TTI block {record} (subtitle {subtitle}) has extension block number {found}, expected {expected}.',
	INVALID_TIMECODE: 'TTI block {record} has an invalid {field} {timecode} at {frameRate} fps.',
	INVALID_TIME_RANGE: 'Subtitle {subtitle} (TTI block {record}) ends at {timeCodeOut}, before it starts at {timeCodeIn}.',
	TRUNCATED_INPUT: 'Expected {expected} bytes for {record} at offset {offset}, but only {available} remain.',
	UNRECOGNIZED_CODE_PAGE: 'Code page number "{value}" is not a number.',
	UNRECOGNIZED_FRAME_RATE: 'Disk format code "{value}" does not declare a frame rate.',

	// cli errors
	DESTINATION_INVALID: 'Destination must be a directory.',
	FILE_CORRUPTED_OR_INVALID: '"{path}" is either corrupted or an invalid STL file: {reason}',
	NO_READ_PERMISSIONS_PATH: 'No read permissions for "{path}".',
	NO_READ_PERMISSIONS_TYPE: 'No read permissions for {type} path.',
	NO_WRITE_PERMISSIONS_PATH: 'No write permissions for "{path}".',
	NO_WRITE_PERMISSIONS_TYPE: 'No write permissions for {type} path.',
	PATH_DOES_NOT_EXIST: 'The {type} path does not exist.',
	SOURCE_INVALID: 'Source must be a .{extension} file or a directory containing .{extension} files.',
} as const;

const diagnosticMessages = {
	MALFORMED_FIELD: 'Field {field} holds "{value}", which could not be read.',
	UNRECOGNIZED_CHARACTER_CODE_TABLE: 'Character code table "{value}" is unknown; text is decoded as Latin.',
	UNRECOGNIZED_CODE_PAGE: 'Code page number "{value}" is unknown.',
	UNRECOGNIZED_DISPLAY_STANDARD: 'Display standard code "{value}" is unknown.',
	UNRECOGNIZED_FRAME_RATE: 'Frame rate {value} is not one of 25 or 30 fps.',
	UNRECOGNIZED_LANGUAGE_CODE: 'Language code "{value}" is unknown.',
} as const;

type Tokens<S extends string> =
	S extends `${string}{${infer Token}}${infer Rest}`
	? Token | Tokens<Rest>
	: never;

type ReplacementObject<S extends string> =
	string extends S
	? string[]
	: S extends `${string}{${string}}${string}`
	? [replacementObject: Record<Tokens<S>, Primitive>]
	: [replacementObject?: Record<string, never>];

export type ParseErrorKind =
	| 'BROKEN_EXTENSION_SEQUENCE'
	| 'INVALID_TIMECODE'
	| 'INVALID_TIME_RANGE'
	| 'TRUNCATED_INPUT'
	| 'UNRECOGNIZED_CODE_PAGE'
	| 'UNRECOGNIZED_FRAME_RATE';

export type NonFatalErrorKind = Exclude<keyof typeof messages, ParseErrorKind>;

export type DiagnosticKind = keyof typeof diagnosticMessages;

export type ParseErrorDetails<K extends ParseErrorKind> = Record<Tokens<typeof messages[K]>, Primitive>;

const formatMessage = (template: string, replacementObject?: unknown) => {
	const replacements = new Map<string, unknown>(
		typeof replacementObject === 'object' && replacementObject !== null ? Object.entries(replacementObject) : [],
	);

	return template.replace(/{([a-z\d]+)}/gi, (token, key: string) => replacements.has(key) ? String(replacements.get(key)) : token);
};

export class CustomError extends Error {}

export class NonFatalError<MSG extends NonFatalErrorKind> extends CustomError {
	constructor(messageKey: MSG, ...[replacementObject]: ReplacementObject<typeof messages[MSG]>) {
		super(formatMessage(messages[messageKey], replacementObject));
	}
}

export class ParseError<K extends ParseErrorKind = ParseErrorKind> extends CustomError {
	constructor(
		readonly kind: K,
		readonly offset: number,
		readonly details: ParseErrorDetails<K>,
	) {
		super(formatMessage(messages[kind], details));
	}
}

export interface Diagnostic {
	kind: DiagnosticKind;
	field: string;
	value: string;
	offset: number;
	message: string;
}

export function createDiagnostic(kind: DiagnosticKind, field: string, value: string, offset: number): Diagnostic {
	return {
		kind,
		field,
		value,
		offset,
		message: formatMessage(diagnosticMessages[kind], { field, value }),
	};
}
