import { promises as fs } from 'fs';
import { join } from 'path';
import { DATA_PATH, DEBUG_LOGGING } from '../config.js';
import { AppError } from '../middleware/error.js';
import type { PrinterProfile } from '../types.js';
import { parsePrinterConfig } from './printer-config.js';

const PROFILE_DIR = 'printers';

export function isValidProfileName(name: unknown): name is string {
	return typeof name === 'string' && /^[a-zA-Z0-9_-]+$/.test(name);
}

export function profilePath(name: string, base = DATA_PATH): string {
	return join(base, PROFILE_DIR, `${name}.ini`);
}

function isMissing(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Saves a printer config under `name`. The content is parsed first so that
 * only configs the slicer pipeline can use are stored.
 * @throws {AppError} 400 if the config is missing bed shape, filament, printer model or layer height.
 */
export async function saveProfile(name: string, content: string, base = DATA_PATH): Promise<PrinterProfile> {
	const config = parsePrinterConfig(content);
	try {
		await fs.mkdir(join(base, PROFILE_DIR), { recursive: true });
		await fs.writeFile(profilePath(name, base), content, 'utf8');
	} catch (error) {
		throw new AppError(500, `Failed to save printer profile`, error instanceof Error ? error.message : String(error));
	}
	return {
		name,
		printerModel: config.printerModel,
		filamentType: config.filamentType,
		layerHeight: config.layerHeight,
		bed: config.bed,
		bedCenter: config.bedCenter,
	};
}

/**
 * Lists the names of the stored printer profiles.
 * @returns Names without the .ini extension, or an empty array if nothing was stored yet.
 */
export async function listProfiles(base = DATA_PATH): Promise<string[]> {
	try {
		const files = await fs.readdir(join(base, PROFILE_DIR));
		return files
			.filter(f => f.endsWith('.ini'))
			.map(f => f.replace(/\.ini$/, ''))
			.sort();
	} catch (error) {
		if (isMissing(error)) return [];
		throw new AppError(500, `Failed to read profiles directory`, error instanceof Error ? error.message : String(error));
	}
}

export async function getProfile(name: string, base = DATA_PATH): Promise<PrinterProfile> {
	let raw: string;
	try {
		raw = await fs.readFile(profilePath(name, base), 'utf8');
	} catch (error) {
		if (isMissing(error)) throw new AppError(404, `Printer profile '${name}' not found`);
		throw new AppError(500, `Failed to read printer profile`, error instanceof Error ? error.message : String(error));
	}

	const config = parsePrinterConfig(raw);
	return {
		name,
		printerModel: config.printerModel,
		filamentType: config.filamentType,
		layerHeight: config.layerHeight,
		bed: config.bed,
		bedCenter: config.bedCenter,
	};
}

export async function deleteProfile(name: string, base = DATA_PATH): Promise<void> {
	try {
		await fs.unlink(profilePath(name, base));
		if (DEBUG_LOGGING) console.debug(`[deleteProfile] Successfully deleted ${name}`);
	} catch (error) {
		if (isMissing(error)) {
			throw new AppError(404, `Printer profile '${name}' not found`);
		}
		throw new AppError(500, `Failed to delete printer profile`);
	}
}
