import fs, { promises as fsP } from 'fs';

import { NonFatalError } from '../errors.js';

export async function mkdirIfDoesNotExist(destinationPath: string) {
	const exists = await fsP.access(destinationPath, fs.constants.F_OK).then(() => true, () => false);

	if (!exists) {
		await fsP.mkdir(destinationPath, { recursive: true });
		return;
	}

	await fsP.access(destinationPath, fs.constants.W_OK).catch(() => {
		throw new NonFatalError('NO_WRITE_PERMISSIONS_PATH', { path: destinationPath });
	});
}
