import { readFileSync } from 'fs';
import { AppError } from '../middleware/error.js';
import { expandPath } from '../fs/files.js';

export type BedBounds = {
	x1: number;
	x2: number;
	y1: number;
	y2: number;
};

export interface PrinterConfig {
	bedShape: [number, number][];
	bed: BedBounds;
	bedCenter: [number, number];
	filamentType: string;
	printerModel: string;
	/** Kept verbatim, it ends up in the output filename. */
	layerHeight: string;
	values: Record<string, string>;
}

const REQUIRED_KEYS = ['bed_shape', 'filament_type', 'printer_model', 'layer_height'] as const;

/**
 * Reads `key = value` lines of a slicer config export.
 * Keys are lower-cased; `#` and `;` start a comment line; section headers are ignored.
 */
export function parseConfigValues(text: string): Record<string, string> {
	const values: Record<string, string> = {};
	for (const rawLine of text.split(/\r?\n/)) {
		const line = rawLine.trim();
		if (!line || line.startsWith('#') || line.startsWith(';') || line.startsWith('[')) continue;

		const match = line.match(/^([^=]+?)\s*=\s*(.*)$/);
		if (match && match[1]) {
			values[match[1].trim().toLowerCase()] = match[2] ?? '';
		}
	}
	return values;
}

export function parseBedShape(value: string): [number, number][] {
	const points = value
		.split(',')
		.map(point => point.trim())
		.filter(Boolean)
		.map((point): [number, number] => {
			const [x, y, ...rest] = point.split('x').map(Number);
			if (x === undefined || y === undefined || rest.length > 0 || !Number.isFinite(x) || !Number.isFinite(y)) {
				throw new AppError(400, 'Invalid bed_shape in printer config', `Cannot read point "${point}"`);
			}
			return [x, y];
		});

	if (points.length === 0) {
		throw new AppError(400, 'Invalid bed_shape in printer config', 'No points given');
	}
	return points;
}

export function parsePrinterConfig(text: string): PrinterConfig {
	const values = parseConfigValues(text);

	const missing = REQUIRED_KEYS.filter(key => !values[key]);
	if (missing.length > 0) {
		throw new AppError(400, 'Invalid printer config', `Missing ${missing.join(', ')}`);
	}

	const bedShape = parseBedShape(values.bed_shape ?? '');
	const xs = bedShape.map(([x]) => x);
	const ys = bedShape.map(([, y]) => y);
	const bed: BedBounds = {
		x1: Math.min(...xs),
		x2: Math.max(...xs),
		y1: Math.min(...ys),
		y2: Math.max(...ys),
	};

	return {
		bedShape,
		bed,
		bedCenter: [(bed.x1 + bed.x2) / 2, (bed.y1 + bed.y2) / 2],
		filamentType: values.filament_type ?? '',
		printerModel: values.printer_model ?? '',
		layerHeight: values.layer_height ?? '',
		values,
	};
}

/** Loads and parses a printer config; returns its absolute path alongside. */
export function loadPrinterConfig(configPath: string): { path: string; config: PrinterConfig } {
	const resolved = expandPath(configPath);

	let text: string;
	try {
		text = readFileSync(resolved, 'utf8');
	} catch (error) {
		if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
			throw new AppError(404, 'Printer config not found', resolved);
		}
		throw new AppError(500, 'Failed to read printer config', error instanceof Error ? error.message : String(error));
	}

	return { path: resolved, config: parsePrinterConfig(text) };
}
