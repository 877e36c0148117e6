import { describe, expect, it } from 'vitest';
import { tempDir, writeFixture } from '../testing/fixtures.js';
import { extractSliceData, parseSliceData, timeStringToSeconds } from './gcode.js';

const FOOTER = [
	'G1 X10 Y10 E0.5',
	'; filament used [mm] = 1234.56',
	'; filament used [cm3] = 2.97',
	'; filament used [g] = 3.68',
	'; filament cost = 0.09',
	'; total filaments used [g] = 3.68',
	'; estimated printing time (normal mode) = 1h 2m 3s',
	'; estimated printing time (silent mode) = 1h 5m 40s',
	'; estimated first layer printing time (normal mode) = 2m 10s',
	'',
].join('\n');

describe('timeStringToSeconds', () => {
	it('adds up days, hours, minutes and seconds', () => {
		expect(timeStringToSeconds('1h 2m 3s')).toBe(3723);
		expect(timeStringToSeconds('1d 0h 1m 0s')).toBe(86460);
		expect(timeStringToSeconds('45s')).toBe(45);
	});

	it('ignores parts it does not understand', () => {
		expect(timeStringToSeconds('2m  about')).toBe(120);
	});
});

describe('parseSliceData', () => {
	it('reads print times and filament usage', () => {
		expect(parseSliceData(FOOTER)).toEqual({
			times: { normal: '1h 2m 3s', silent: '1h 5m 40s' },
			filament: { used_mm: '1234.56', used_cm3: '2.97', used_g: '3.68', cost: '0.09' },
		});
	});

	it('fails without a print time', () => {
		expect(parseSliceData('; filament used [g] = 3.68\n')).toEqual({ error: 'Failed to parse printing time from G-code' });
	});
});

describe('extractSliceData', () => {
	it('reads a G-code file', async () => {
		const file = writeFixture(tempDir(), 'part.gcode', FOOTER);
		const data = await extractSliceData(file);
		expect('times' in data && data.times.normal).toBe('1h 2m 3s');
	});

	it('reports unreadable files', async () => {
		expect(await extractSliceData('/nonexistent/part.gcode')).toEqual({ error: 'Failed to extract slice data from G-code' });
	});
});
