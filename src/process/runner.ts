import { execFileSync } from 'child_process';
import { SLICE_TIMEOUT_MS } from '../config.js';

export type CommandOutput = {
	stdout: string;
	stderr: string;
};

export type RunOptions = {
	/** Milliseconds before the child is killed. 0 waits forever. */
	timeout?: number;
};

/**
 * Runs an external program to completion and returns what it printed.
 * Throws when the program cannot be started or exits with a non-zero status.
 */
export type CommandRunner = (file: string, args: string[], options?: RunOptions) => CommandOutput;

export class CommandError extends Error {
	file: string;
	status: number | null;
	stdout: string;
	stderr: string;

	constructor(file: string, status: number | null, stdout: string, stderr: string, reason: string) {
		super(`${file} failed${status === null ? '' : ` with exit code ${status}`}: ${stderr.trim() || reason}`);
		this.name = 'CommandError';
		this.file = file;
		this.status = status;
		this.stdout = stdout;
		this.stderr = stderr;
	}
}

function outputOf(err: object, key: 'stdout' | 'stderr'): string {
	const value: unknown = Reflect.get(err, key);
	if (typeof value === 'string') return value;
	if (Buffer.isBuffer(value)) return value.toString('utf-8');
	return '';
}

function statusOf(err: object): number | null {
	const value: unknown = Reflect.get(err, 'status');
	return typeof value === 'number' ? value : null;
}

export const execRunner: CommandRunner = (file, args, options = {}) => {
	try {
		const stdout = execFileSync(file, args, {
			encoding: 'utf-8',
			stdio: ['ignore', 'pipe', 'pipe'],
			timeout: options.timeout ?? SLICE_TIMEOUT_MS,
			maxBuffer: 64 * 1024 * 1024,
		});
		return { stdout, stderr: '' };
	} catch (err) {
		if (err instanceof Error) {
			throw new CommandError(file, statusOf(err), outputOf(err, 'stdout'), outputOf(err, 'stderr'), err.message);
		}
		throw new CommandError(file, null, '', '', String(err));
	}
};
