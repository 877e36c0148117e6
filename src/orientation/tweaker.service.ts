import path from 'path';
import { DEBUG_LOGGING, PYTHON_PATH, SLICE_TIMEOUT_MS, TWEAKER_PATH } from '../config.js';
import { AppError, describeError } from '../middleware/error.js';
import type { CommandRunner } from '../process/runner.js';

export type TweakerSettings = {
	/** Interpreter the optimizer script runs under. */
	python: string;
	script: string;
	timeout: number;
};

export type TweakResult = {
	outputFile: string;
	/** Lower is better. Rounded to two decimals. */
	unprintability: number;
};

export const defaultTweakerSettings: TweakerSettings = {
	python: PYTHON_PATH,
	script: TWEAKER_PATH,
	timeout: SLICE_TIMEOUT_MS,
};

export function roundScore(value: number): number {
	return Math.round(value * 100) / 100;
}

/** Score from the last `Unprintability: <n>` line the optimizer printed. */
export function parseUnprintability(stdout: string): number | undefined {
	const matches = [...stdout.matchAll(/Unprintability:\s*([-+]?\d+(?:\.\d+)?(?:[eE][-+]?\d+)?)/g)];
	const score = matches.at(-1)?.[1];
	if (!score) return undefined;

	const value = Number(score);
	return Number.isFinite(value) ? roundScore(value) : undefined;
}

/**
 * Runs the orientation optimizer on `inputFile` in extended, verbose mode.
 * The re-oriented mesh is written to `tweaked_<index>.stl` in `workdir`.
 */
export function tweakFile(inputFile: string, workdir: string, index: number, settings: TweakerSettings, run: CommandRunner): TweakResult {
	const outputFile = path.join(workdir, `tweaked_${index}.stl`);
	const args = [settings.script, '-i', inputFile, '-o', outputFile, '-x', '-vb'];

	if (DEBUG_LOGGING) console.log(`Executing tweaker with args:`, args);

	let stdout: string;
	try {
		({ stdout } = run(settings.python, args, { timeout: settings.timeout }));
	} catch (error) {
		throw new AppError(500, `Couldn't run tweaker on file ${inputFile}`, describeError(error));
	}

	const unprintability = parseUnprintability(stdout);
	if (unprintability === undefined) {
		throw new AppError(500, `Couldn't run tweaker on file ${inputFile}`, 'No unprintability score in tweaker output');
	}

	console.log(`Unprintability: ${unprintability}`);
	return { outputFile, unprintability };
}
