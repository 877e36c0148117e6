import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';

/** Resolves `path` to an absolute path, expanding a leading `~` to the home directory. */
export function expandPath(input: string): string {
	if (input === '~') return os.homedir();
	if (input.startsWith('~/') || input.startsWith('~\\')) {
		return path.resolve(os.homedir(), input.slice(2));
	}
	return path.resolve(input);
}

export async function pathExists(target: string): Promise<boolean> {
	return fs
		.access(target)
		.then(() => true)
		.catch(() => false);
}

/** First `<prefix>_<i><ext>` in `dir` that does not exist yet, counting from 1. */
export async function nextFreePath(dir: string, prefix: string, ext: string): Promise<string> {
	for (let i = 1; ; i++) {
		const candidate = path.join(dir, `${prefix}_${i}${ext}`);
		if (!(await pathExists(candidate))) return candidate;
	}
}

/**
 * Most recently modified file in `dir` with the given extension.
 * When `prefix` is set, only names starting with it are considered.
 */
export async function newestFile(dir: string, ext: string, prefix = ''): Promise<string | undefined> {
	const names = (await fs.readdir(dir)).filter(name => name.toLowerCase().endsWith(ext) && name.startsWith(prefix));

	let newest: { file: string; mtime: number } | undefined;
	for (const name of names) {
		const file = path.join(dir, name);
		const stats = await fs.stat(file);
		if (!stats.isFile()) continue;
		if (!newest || stats.mtimeMs > newest.mtime) {
			newest = { file, mtime: stats.mtimeMs };
		}
	}
	return newest?.file;
}
