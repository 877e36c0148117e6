import * as fs from 'fs';
import * as path from 'path';
import { MODEL_EXTENSIONS } from '../slicing/models.js';

export interface CliInput {
	inputFile: string;
	printerConfig: string;
	slicer: string;
	merge: string[];
}

/**
 * Checks the paths handed to the CLI. Returns the error lines to print;
 * an empty array means everything can be sliced.
 */
export function validateCliInput(input: CliInput): string[] {
	const errors: string[] = [];

	for (const model of [input.inputFile, ...input.merge]) {
		if (!fs.existsSync(model)) {
			errors.push('Error: input file not found', path.resolve(model));
			continue;
		}
		const ext = path.extname(model).toLowerCase();
		if (!MODEL_EXTENSIONS.some(allowed => allowed === ext)) {
			errors.push('Error: input file has invalid format', `Files need to be .stl or .3mf, not .${ext.replace(/^\./, '')}`);
		}
	}

	if (!fs.existsSync(input.slicer)) {
		errors.push(`Error: slicer not found at ${path.resolve(input.slicer)}`);
	}
	if (!fs.existsSync(input.printerConfig)) {
		errors.push(`Error: printer config file not found at ${path.resolve(input.printerConfig)}`);
	}

	return errors;
}

/** Creates the output folder when missing. Returns its absolute path. */
export function ensureOutputFolder(folder: string): string {
	const resolved = path.resolve(folder);
	if (!fs.existsSync(resolved)) {
		console.log(`Output path not found, creating ${resolved}`);
		fs.mkdirSync(resolved, { recursive: true });
	}
	return resolved;
}
