import { describe, expect, it } from 'vitest';
import { AppError } from '../middleware/error.js';
import { parseExtraArgs, parseSetOptions, sanitizeFilenameComponent, toCliArgs, toOptionName } from './args.js';

describe('toOptionName', () => {
	it('turns underscores and camelCase into dashes', () => {
		expect(toOptionName('layer_height')).toBe('layer-height');
		expect(toOptionName('fillDensity')).toBe('fill-density');
		expect(toOptionName('brim-width')).toBe('brim-width');
	});
});

describe('toCliArgs', () => {
	it('emits an option followed by its value', () => {
		expect(toCliArgs({ layer_height: 0.2, fillDensity: '20%' })).toEqual(['--layer-height', '0.2', '--fill-density', '20%']);
	});

	it('emits true as a bare flag and drops false and undefined', () => {
		expect(toCliArgs({ support_material: true, brim: false, skirts: undefined })).toEqual(['--support-material']);
	});

	it('returns nothing for no options', () => {
		expect(toCliArgs()).toEqual([]);
	});
});

describe('parseSetOptions', () => {
	it('splits on the first equals sign', () => {
		expect(parseSetOptions(['fill_density=20%', 'start_gcode=G28 X=0', 'ensure_vertical_shell_thickness'])).toEqual({
			fill_density: '20%',
			start_gcode: 'G28 X=0',
			ensure_vertical_shell_thickness: true,
		});
	});

	it('rejects a pair without a key', () => {
		expect(() => parseSetOptions(['=3'])).toThrow('Invalid slicer option: =3');
	});
});

describe('parseExtraArgs', () => {
	it('accepts a JSON object of scalars', () => {
		expect(parseExtraArgs('{"layer_height":0.15,"spiral_vase":true}')).toEqual({ layer_height: 0.15, spiral_vase: true });
	});

	it('accepts tunable options in camelCase too', () => {
		expect(parseExtraArgs({ fillDensity: '20%', brim_width: 3 })).toEqual({ fillDensity: '20%', brim_width: 3 });
	});

	it.each([
		['{"post_process":"sh -c reboot"}', 'post_process'],
		['{"postProcess":"sh -c reboot"}', 'postProcess'],
		['{"output":"/tmp/x"}', 'output'],
		['{"load":"/etc/passwd"}', 'load'],
		['{"layer_height":0.2,"datadir":"/"}', 'datadir'],
	])('rejects options that are not tunable: %s', (raw, key) => {
		try {
			parseExtraArgs(raw);
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(AppError);
			expect(error instanceof AppError && error.status).toBe(400);
			expect(error instanceof AppError && error.causeMessage).toBe(`Option ${key} is not allowed`);
		}
	});

	it('treats a missing value as no options', () => {
		expect(parseExtraArgs(undefined)).toEqual({});
		expect(parseExtraArgs('')).toEqual({});
	});

	it('rejects arrays and nested values', () => {
		expect(() => parseExtraArgs('[1]')).toThrow(AppError);
		expect(() => parseExtraArgs({ perimeters: { count: 3 } })).toThrow('Invalid slicer options');
	});

	it('rejects malformed JSON with a 400', () => {
		try {
			parseExtraArgs('{nope');
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(AppError);
			expect(error instanceof AppError && error.status).toBe(400);
		}
	});
});

describe('sanitizeFilenameComponent', () => {
	it('replaces characters that do not belong in filenames', () => {
		expect(sanitizeFilenameComponent('Original Prusa i3 MK3S')).toBe('Original_Prusa_i3_MK3S');
		expect(sanitizeFilenameComponent('PLA;PETG')).toBe('PLA_PETG');
		expect(sanitizeFilenameComponent('../../etc/passwd')).toBe('.._.._etc_passwd');
	});

	it('trims quotes and padding', () => {
		expect(sanitizeFilenameComponent(' "MK3S" ')).toBe('MK3S');
	});

	it('keeps decimals', () => {
		expect(sanitizeFilenameComponent('0.15')).toBe('0.15');
	});

	it('falls back when nothing is left', () => {
		expect(sanitizeFilenameComponent('  ')).toBe('unknown');
		expect(sanitizeFilenameComponent('???')).toBe('unknown');
	});
});
