import fs from 'fs/promises';
import type { FilamentInfo, PrintTimes } from '../types.js';

export function timeStringToSeconds(timeStr: string): number {
	const timeParts = timeStr.trim().split(/\s+/);
	let totalSeconds = 0;

	for (const part of timeParts) {
		const value = parseInt(part.slice(0, -1));
		if (Number.isNaN(value)) continue;
		if (part.endsWith('d')) {
			totalSeconds += value * 86400;
		} else if (part.endsWith('h')) {
			totalSeconds += value * 3600;
		} else if (part.endsWith('m')) {
			totalSeconds += value * 60;
		} else if (part.endsWith('s')) {
			totalSeconds += value;
		}
	}

	return totalSeconds;
}

const keyMap: Record<string, keyof FilamentInfo> = {
	'used [mm]': 'used_mm',
	'used [cm3]': 'used_cm3',
	'used [g]': 'used_g',
	cost: 'cost',
};

/** Reads print time and filament usage from the comments the slicer appends to the G-code. */
export function parseSliceData(gcode: string): { times: PrintTimes; filament: FilamentInfo } | { error: string } {
	const times: Partial<PrintTimes> = {};
	const filament: FilamentInfo = {};

	for (const line of gcode.split(/\r?\n/)) {
		if (!line.startsWith(';')) continue;

		const time = line.match(/^; estimated printing time \((normal|silent) mode\) = (.+)$/);
		if (time && time[1] && time[2]) {
			times[time[1] === 'normal' ? 'normal' : 'silent'] = time[2].trim();
			continue;
		}

		const match = line.match(/^; (?:total )?filament (used \[mm\]|used \[cm3\]|used \[g\]|cost) = (.+)$/);
		if (match && match[1] && match[2]) {
			const mappedKey = keyMap[match[1]];
			if (mappedKey) {
				filament[mappedKey] = match[2].trim();
			}
		}
	}

	if (!times.normal) {
		return { error: 'Failed to parse printing time from G-code' };
	}
	return { times: { ...times, normal: times.normal }, filament };
}

export async function extractSliceData(filePath: string) {
	try {
		return parseSliceData(await fs.readFile(filePath, 'utf-8'));
	} catch (error) {
		console.error('Error extracting slice data:', error);
		return { error: 'Failed to extract slice data from G-code' };
	}
}
