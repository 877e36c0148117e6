import fs from 'fs/promises';
import path from 'path';
import { UPLOAD_DIR } from '../config.js';

/** Deletes every file in the upload directory that belongs to the upload `id`. Returns the deleted names. */
export async function removeUploads(id: string, uploadDir = UPLOAD_DIR): Promise<string[]> {
	let files: string[];
	try {
		files = await fs.readdir(uploadDir);
	} catch (error) {
		if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
			console.warn('Upload directory does not exist, skipping file cleanup');
			return [];
		}
		throw error;
	}

	const filesToDelete = files.filter(file => file.startsWith(`${id}-`));
	const deleted: string[] = [];
	await Promise.all(
		filesToDelete.map(async file => {
			try {
				await fs.unlink(path.join(uploadDir, file));
				deleted.push(file);
			} catch (err) {
				console.warn(`Failed to delete file ${file}:`, err);
			}
		}),
	);

	console.log(`Deleted ${deleted.length} files for upload ID: ${id}`);
	return deleted;
}
