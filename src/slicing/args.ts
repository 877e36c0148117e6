import { AppError } from '../middleware/error.js';
import type { ExtraArgs } from './models.js';

export function toOptionName(key: string): string {
	return key
		.replace(/([a-z0-9])([A-Z])/g, '$1-$2')
		.replace(/_/g, '-')
		.toLowerCase();
}

/**
 * Turns an options record into slicer command line arguments.
 *
 * `{ layer_height: 0.2, supportMaterial: true }` becomes
 * `['--layer-height', '0.2', '--support-material']`. `false` and `undefined` are left out.
 */
export function toCliArgs(extra: ExtraArgs = {}): string[] {
	const args: string[] = [];
	for (const [key, value] of Object.entries(extra)) {
		if (value === undefined || value === false) continue;
		const option = `--${toOptionName(key)}`;
		if (value === true) {
			args.push(option);
		} else {
			args.push(option, String(value));
		}
	}
	return args;
}

/** Parses `key=value` pairs from the command line. A bare `key` becomes a flag. */
export function parseSetOptions(pairs: string[]): ExtraArgs {
	const extra: ExtraArgs = {};
	for (const pair of pairs) {
		const separator = pair.indexOf('=');
		const key = (separator === -1 ? pair : pair.slice(0, separator)).trim();
		if (!key) throw new AppError(400, `Invalid slicer option: ${pair}`);
		extra[key] = separator === -1 ? true : pair.slice(separator + 1);
	}
	return extra;
}

/**
 * Print settings a remote client may override. Anything else (post-processing
 * scripts, config loading, output paths) stays under the server's control.
 */
export const TUNABLE_OPTIONS: ReadonlySet<string> = new Set([
	'layer-height',
	'first-layer-height',
	'perimeters',
	'top-solid-layers',
	'bottom-solid-layers',
	'fill-density',
	'fill-pattern',
	'top-fill-pattern',
	'bottom-fill-pattern',
	'infill-every-layers',
	'seam-position',
	'support-material',
	'support-material-auto',
	'support-material-threshold',
	'support-material-buildplate-only',
	'brim-width',
	'skirts',
	'skirt-distance',
	'spiral-vase',
	'ironing',
	'temperature',
	'first-layer-temperature',
	'bed-temperature',
	'first-layer-bed-temperature',
]);

/** Validates the JSON object of slicer options sent along with an upload. */
export function parseExtraArgs(raw: unknown): ExtraArgs {
	if (raw === undefined || raw === null || raw === '') return {};

	let parsed: unknown = raw;
	if (typeof raw === 'string') {
		try {
			parsed = JSON.parse(raw);
		} catch (error) {
			throw new AppError(400, 'Invalid slicer options', error instanceof Error ? error.message : String(error));
		}
	}

	if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
		throw new AppError(400, 'Invalid slicer options', 'Expected a JSON object');
	}

	const extra: ExtraArgs = {};
	for (const [key, value] of Object.entries(parsed)) {
		if (!TUNABLE_OPTIONS.has(toOptionName(key))) {
			throw new AppError(400, 'Invalid slicer options', `Option ${key} is not allowed`);
		}
		if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
			throw new AppError(400, 'Invalid slicer options', `Option ${key} must be a string, number or boolean`);
		}
		extra[key] = value;
	}
	return extra;
}

export function sanitizeFilenameComponent(value: string): string {
	const cleaned = value
		.trim()
		.replace(/[^A-Za-z0-9._-]+/g, '_')
		.replace(/^_+|_+$/g, '');
	return cleaned || 'unknown';
}
