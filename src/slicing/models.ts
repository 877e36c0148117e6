export type ExtraArgValue = string | number | boolean | undefined;

/** Extra slicer options, keyed by option name without the leading dashes. */
export type ExtraArgs = Record<string, ExtraArgValue>;

export const MODEL_EXTENSIONS = ['.stl', '.3mf'] as const;

export interface Volume {
	/** Absolute path of the model as supplied. */
	path: string;
	/** Arguments passed to the slicer right after this volume. */
	args: string[];
	/** Re-oriented and height-adjusted copy inside the run's temp directory. */
	tmpPath: string;
	unprintability?: number;
}

export interface Thresholds {
	supports: number;
	brim: number;
}

export interface SliceOptions {
	/** Open the result in the slicer's G-code viewer. */
	view?: boolean;
	extraArgs?: ExtraArgs;
}

export interface SliceResult {
	gcode: string;
	unprintability: number;
	command: string[];
}
