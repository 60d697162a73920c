import { format } from 'util';

import chalk from 'chalk';
import termSize from 'term-size';
import wrapAnsi from 'wrap-ansi';

import type { Diagnostic } from '../errors.js';

let columns = 80;

const resize = () => {
	({ columns } = termSize());
	if (process.platform === 'win32') columns--;
};
resize();

process.stdout.on('resize', resize);

const wrap = (message: string, params: unknown[]) => wrapAnsi(format(message, ...params), columns, { hard: true, trim: false });

const hexOffset = (offset: number) => `0x${offset.toString(16).toUpperCase().padStart(4, '0')}`;

export const logWarning = (message: string, ...params: unknown[]) => console.warn(wrap(`[${chalk.yellow('WARNING')}] ${message}`, params));
export const logError = (message: string, ...params: unknown[]) => console.error(wrap(`[${chalk.red('ERROR')}] ${message}`, params));

/** One warning per diagnostic, pointing at the file and the byte offset of the field. */
export function logDiagnostics(file: string, diagnostics: readonly Diagnostic[]) {
	for (const { offset, message } of diagnostics) logWarning('%s %s %s', file, chalk.dim(`@ ${hexOffset(offset)}`), message);
}
