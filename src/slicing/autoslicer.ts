import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DEBUG_LOGGING } from '../config.js';
import { AppError, describeError } from '../middleware/error.js';
import { expandPath, newestFile } from '../fs/files.js';
import { adjustHeight } from '../mesh/mesh.service.js';
import { defaultTweakerSettings, tweakFile, type TweakerSettings } from '../orientation/tweaker.service.js';
import { execRunner, type CommandRunner } from '../process/runner.js';
import { loadPrinterConfig, type PrinterConfig } from '../profiles/printer-config.js';
import { sanitizeFilenameComponent, toCliArgs } from './args.js';
import { MODEL_EXTENSIONS, type ExtraArgs, type SliceOptions, type SliceResult, type Thresholds, type Volume } from './models.js';

/** Placeholder the slicer replaces with the estimated print time. */
export const PRINT_TIME_PLACEHOLDER = '{print_time}';

/** Whole numbers keep one decimal place, so 1 reads `1.0`. */
export function formatScore(score: number): string {
	return Number.isInteger(score) ? score.toFixed(1) : String(score);
}

export interface AutoSlicerOptions {
	runner?: CommandRunner;
	tweaker?: Partial<TweakerSettings>;
	thresholds?: Partial<Thresholds>;
}

/**
 * Orients each added model, drops it onto the build plate and slices all of
 * them together with the printer config loaded from `configPath`.
 *
 * Slicer parameters are picked from the worst unprintability score: above
 * `thresholds.supports` supports are enabled, above `thresholds.brim` a brim is added.
 */
export class AutoSlicer {
	static readonly THRESHOLD_SUPPORTS = 1.0;
	static readonly THRESHOLD_BRIM = 2.0;

	readonly slicer: string;
	readonly thresholds: Thresholds;
	configPath: string;
	config: PrinterConfig;
	volumes: Volume[] = [];
	lastOutputFile = '';

	private readonly run: CommandRunner;
	private readonly tweaker: TweakerSettings;

	constructor(slicerPath: string, configPath: string, options: AutoSlicerOptions = {}) {
		this.slicer = expandPath(slicerPath);
		const loaded = loadPrinterConfig(configPath);
		this.configPath = loaded.path;
		this.config = loaded.config;

		this.run = options.runner ?? execRunner;
		this.tweaker = { ...defaultTweakerSettings, ...options.tweaker };
		this.thresholds = {
			supports: options.thresholds?.supports ?? AutoSlicer.THRESHOLD_SUPPORTS,
			brim: options.thresholds?.brim ?? AutoSlicer.THRESHOLD_BRIM,
		};
	}

	setConfig(configPath: string): void {
		const loaded = loadPrinterConfig(configPath);
		this.configPath = loaded.path;
		this.config = loaded.config;
	}

	/**
	 * Queues a model for the next slice. `extraArgs` are passed to the slicer
	 * right after this model, so they only apply to it.
	 */
	addVolume(input: string, extraArgs: ExtraArgs = {}): Volume {
		if (typeof input !== 'string' || input.length === 0) {
			throw new TypeError('input must be a path to a model file');
		}

		const ext = path.extname(input).toLowerCase();
		if (!MODEL_EXTENSIONS.some(allowed => allowed === ext)) {
			throw new AppError(400, 'Invalid model file type', `Files need to be .stl or .3mf, not ${ext || 'without extension'}`);
		}

		const volume: Volume = { path: expandPath(input), args: toCliArgs(extraArgs), tmpPath: '' };
		this.volumes.push(volume);
		return volume;
	}

	/**
	 * Orients and slices every queued volume. `output` names the G-code: its
	 * directory is where the file goes and its stem starts the filename, which
	 * is then extended with print details.
	 */
	async slice(output: string, options: SliceOptions = {}): Promise<SliceResult> {
		if (this.volumes.length === 0) {
			throw new AppError(400, 'No volumes to slice');
		}

		const workdir = await fs.mkdtemp(path.join(os.tmpdir(), 'autoslice-'));
		if (DEBUG_LOGGING) console.log(`Temp. dir: ${workdir}`);

		let result: SliceResult;
		try {
			for (const [index, volume] of this.volumes.entries()) {
				const tweaked = tweakFile(volume.path, workdir, index + 1, this.tweaker, this.run);
				volume.unprintability = tweaked.unprintability;
				volume.tmpPath = await adjustHeight(tweaked.outputFile, workdir);
			}

			result = await this.runSlicer(output, options.extraArgs);
		} finally {
			await fs.rm(workdir, { recursive: true, force: true });
		}

		if (options.view) {
			this.viewGcode(result.gcode);
		}
		return result;
	}

	/** Highest score among the prepared volumes. */
	unprintability(): number {
		const scores = this.volumes.map(volume => {
			if (volume.unprintability === undefined || !volume.tmpPath) {
				throw new AppError(500, 'Volume has not been prepared for slicing', volume.path);
			}
			return volume.unprintability;
		});
		if (scores.length === 0) {
			throw new AppError(400, 'No volumes to slice');
		}
		return Math.max(...scores);
	}

	/**
	 * `<stem>_<layer height>mm_U<score>_{print_time}_<filament>_<printer>.gcode`
	 * next to `output`.
	 */
	outputFileName(output: string, unprintability: number): string {
		const resolved = expandPath(output);
		const name = [
			sanitizeFilenameComponent(path.parse(resolved).name),
			`${sanitizeFilenameComponent(this.config.layerHeight)}mm`,
			`U${formatScore(unprintability)}`,
			PRINT_TIME_PLACEHOLDER,
			sanitizeFilenameComponent(this.config.filamentType),
			sanitizeFilenameComponent(this.config.printerModel),
		].join('_');
		return path.join(path.dirname(resolved), `${name}.gcode`);
	}

	/** Slicer arguments for the prepared volumes, without the executable. */
	buildSlicerArgs(output: string, extraArgs: ExtraArgs = {}): { args: string[]; outputFile: string; unprintability: number } {
		const unprintability = this.unprintability();
		const outputFile = this.outputFileName(output, unprintability);

		const args = ['--load', this.configPath, '-g', '--merge'];
		for (const volume of this.volumes) {
			args.push(volume.tmpPath, ...volume.args);
		}

		if (unprintability > this.thresholds.brim) {
			args.push('--brim-width', '5', '--skirt-distance', '6');
		}
		if (unprintability > this.thresholds.supports) {
			args.push('--support-material');
		}

		args.push(...toCliArgs(extraArgs));
		args.push('--output', outputFile);

		return { args, outputFile, unprintability };
	}

	private async runSlicer(output: string, extraArgs: ExtraArgs = {}): Promise<SliceResult> {
		const { args, outputFile, unprintability } = this.buildSlicerArgs(output, extraArgs);
		const command = [this.slicer, ...args];

		if (DEBUG_LOGGING) console.log(`Executing slicer with args:`, args);

		try {
			const { stdout } = this.run(this.slicer, args);
			if (stdout && DEBUG_LOGGING) {
				console.log(`Slicer stdout:`, stdout);
			}
		} catch (error) {
			throw new AppError(500, `Couldn't slice volumes ${this.volumes.map(volume => volume.path).join(', ')}`, describeError(error));
		}

		const prefix = path.basename(outputFile).split(PRINT_TIME_PLACEHOLDER)[0] ?? '';
		const gcode = await newestFile(path.dirname(outputFile), '.gcode', prefix);
		if (!gcode) {
			throw new AppError(500, 'No output files generated by slicer');
		}

		this.lastOutputFile = gcode;
		return { gcode, unprintability, command };
	}

	/** Opens `gcodePath` in the slicer's G-code viewer and waits for it to close. */
	viewGcode(gcodePath: string): void {
		this.run(this.slicer, ['--gcodeviewer', gcodePath], { timeout: 0 });
	}

	/** The slicer's own description of every option it accepts. */
	help(): string {
		return this.run(this.slicer, ['--help-options']).stdout;
	}
}
