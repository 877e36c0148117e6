import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { BoxGeometry } from 'three';
import { toBinaryStl } from '../mesh/mesh.service.js';
import { CommandError, type CommandRunner, type RunOptions } from '../process/runner.js';

export const PRINTER_INI = [
	'# generated by PrusaSlicer 2.6.0',
	'bed_shape = 0x0,250x0,250x210,0x210',
	'filament_type = PLA',
	'layer_height = 0.2',
	'printer_model = MK3S',
	'start_gcode = M115 U3.13.0 ; tell printer latest fw version',
	'',
].join('\n');

const createdDirs: string[] = [];

export function tempDir(prefix = 'autoslice-test-'): string {
	const dir = mkdtempSync(path.join(os.tmpdir(), prefix));
	createdDirs.push(dir);
	return dir;
}

/** Removes every directory handed out by `tempDir` so far. */
export function removeTempDirs(): void {
	for (const dir of createdDirs.splice(0)) {
		rmSync(dir, { recursive: true, force: true });
	}
}

export function writeFixture(dir: string, name: string, content: string | Uint8Array): string {
	const file = path.join(dir, name);
	mkdirSync(path.dirname(file), { recursive: true });
	writeFileSync(file, content);
	return file;
}

/** A 10 mm cube whose lowest face sits at `zMin`. */
export function boxStl(zMin: number): Uint8Array {
	const geometry = new BoxGeometry(10, 10, 10);
	geometry.translate(0, 0, zMin + 5);
	return toBinaryStl(geometry);
}

export function tweakerOutput(score: number): string {
	return [
		'Input file: model.stl',
		'Calculating the optimal orientation:',
		'  model.stl',
		'Result-stats:',
		' Tweaked Z-axis: \t[ 0.  0. -1.]',
		' Axis, angle:   \t[1, 0, 0], 180.0',
		` Unprintability: \t${score}`,
		'Found result:    \t0.42 s',
		'',
	].join('\n');
}

export function argAfter(args: string[], flag: string): string {
	const value = args[args.indexOf(flag) + 1];
	if (args.indexOf(flag) === -1 || value === undefined) {
		throw new Error(`Missing ${flag} in ${args.join(' ')}`);
	}
	return value;
}

export type RecordedCall = {
	file: string;
	args: string[];
	options?: RunOptions;
};

export type FakeRunnerOptions = {
	/** Unprintability reported for each tweaker run, in order. */
	scores?: number[];
	/** Lowest Z of the mesh the tweaker writes. */
	zMin?: number;
	/** Replaces the print time placeholder in the G-code name. */
	printTime?: string;
	writeGcode?: boolean;
	failTweaker?: boolean;
	failSlicer?: boolean;
};

/**
 * Stands in for the orientation optimizer and the slicer. It writes the files
 * they would write and records every invocation.
 */
export function createFakeRunner(options: FakeRunnerOptions = {}) {
	const calls: RecordedCall[] = [];
	const mergedMeshes: Buffer[] = [];
	let tweaks = 0;

	const runner: CommandRunner = (file, args, runOptions) => {
		calls.push({ file, args, options: runOptions });

		if (args.includes('-vb')) {
			if (options.failTweaker) {
				throw new CommandError(file, 1, '', 'ModuleNotFoundError: No module named numpy', 'Command failed');
			}
			const score = options.scores?.[tweaks] ?? 0.5;
			tweaks++;
			writeFileSync(argAfter(args, '-o'), boxStl(options.zMin ?? 7.5));
			return { stdout: tweakerOutput(score), stderr: '' };
		}

		if (args.includes('--merge')) {
			if (options.failSlicer) {
				throw new CommandError(file, 2, '', 'Objects could not fit on the bed', 'Command failed');
			}
			for (const arg of args) {
				if (/translated_\d+\.stl$/.test(arg)) mergedMeshes.push(readFileSync(arg));
			}
			if (options.writeGcode ?? true) {
				const output = argAfter(args, '--output').replace('{print_time}', options.printTime ?? '1h2m');
				writeFileSync(output, '; estimated printing time (normal mode) = 1h 2m 0s\n');
			}
			return { stdout: 'Slicing result exported', stderr: '' };
		}

		if (args.includes('--help-options')) {
			return { stdout: '--layer-height  Layer height in mm', stderr: '' };
		}

		return { stdout: '', stderr: '' };
	};

	return { runner, calls, mergedMeshes };
}
