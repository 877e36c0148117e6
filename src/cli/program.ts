import { Command } from 'commander';
import * as path from 'path';
import { AppError } from '../middleware/error.js';
import { parseSetOptions } from '../slicing/args.js';
import { AutoSlicer } from '../slicing/autoslicer.js';
import type { ExtraArgs, SliceOptions, SliceResult } from '../slicing/models.js';
import { ensureOutputFolder, validateCliInput } from './validate.js';

export interface CLIOptions {
	output: string;
	merge: string[];
	set: string[];
	view: boolean;
}

export type Slicer = {
	addVolume(input: string, extraArgs?: ExtraArgs): unknown;
	slice(output: string, options?: SliceOptions): Promise<SliceResult>;
};

export type SlicerFactory = (slicerPath: string, configPath: string) => Slicer;

const defaultFactory: SlicerFactory = (slicerPath, configPath) => new AutoSlicer(slicerPath, configPath);

function collect(value: string, previous: string[]): string[] {
	return [...previous, value];
}

export async function main(inputFile: string, printerConfig: string, slicerPath: string, options: CLIOptions, createSlicer: SlicerFactory): Promise<number> {
	const errors = validateCliInput({ inputFile, printerConfig, slicer: slicerPath, merge: options.merge });
	if (errors.length > 0) {
		errors.forEach(line => console.error(line));
		return 1;
	}

	try {
		const outputFolder = ensureOutputFolder(options.output);
		const extraArgs = parseSetOptions(options.set);

		const slicer = createSlicer(slicerPath, printerConfig);
		slicer.addVolume(path.resolve(inputFile));
		for (const model of options.merge) {
			slicer.addVolume(path.resolve(model));
		}

		const output = path.join(outputFolder, path.parse(inputFile).name);
		const result = await slicer.slice(output, { view: options.view, extraArgs });

		console.log(`G-code written to ${result.gcode} (unprintability ${result.unprintability})`);
		return 0;
	} catch (error) {
		if (error instanceof AppError) {
			console.error(`Error: ${error.message}`);
			if (error.causeMessage) console.error(error.causeMessage);
			return 1;
		}
		throw error;
	}
}

export function createProgram(createSlicer: SlicerFactory = defaultFactory): Command {
	const program = new Command();

	program
		.name('autoslice')
		.description('Orient a model for printing and slice it to G-code')
		.argument('<inputFile>', 'The file to be sliced (STL/3MF)')
		.argument('<printerConfig>', 'Printer config file exported from the slicer')
		.argument('<slicer>', 'Slicer executable location')
		.option('-o, --output <folder>', 'Output folder (default is current location)', process.cwd())
		.option('-m, --merge <file>', 'Additional model to place on the same plate (repeatable)', collect, [])
		.option('-s, --set <key=value>', 'Extra slicer option, e.g. fill_density=20% (repeatable)', collect, [])
		.option('--view', 'Open the result in the G-code viewer', false)
		.action(async (inputFile: string, printerConfig: string, slicerPath: string, options: CLIOptions) => {
			process.exitCode = await main(inputFile, printerConfig, slicerPath, options, createSlicer);
		});

	return program;
}
