import { existsSync } from 'fs';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { AppError } from '../middleware/error.js';
import { createFakeRunner, tempDir, tweakerOutput } from '../testing/fixtures.js';
import { parseUnprintability, roundScore, tweakFile } from './tweaker.service.js';

const settings = { python: 'python-test', script: '/opt/Tweaker-3/Tweaker.py', timeout: 1000 };

describe('parseUnprintability', () => {
	it('reads the score from verbose output', () => {
		expect(parseUnprintability(tweakerOutput(2.456))).toBe(2.46);
	});

	it('uses the last score when several are printed', () => {
		expect(parseUnprintability('Unprintability: 4.2\n...\nUnprintability: 0.731\n')).toBe(0.73);
	});

	it('understands exponent notation', () => {
		expect(parseUnprintability('Unprintability: 1.5e-3')).toBe(0);
	});

	it('returns undefined without a score', () => {
		expect(parseUnprintability('Traceback (most recent call last):')).toBeUndefined();
	});
});

describe('roundScore', () => {
	it('rounds to two decimals', () => {
		expect(roundScore(1.004)).toBe(1);
		expect(roundScore(3.14159)).toBe(3.14);
	});
});

describe('tweakFile', () => {
	it('runs the optimizer in extended verbose mode', () => {
		const workdir = tempDir();
		const { runner, calls } = createFakeRunner({ scores: [1.234] });

		const result = tweakFile('/models/part.stl', workdir, 3, settings, runner);

		const outputFile = path.join(workdir, 'tweaked_3.stl');
		expect(result).toEqual({ outputFile, unprintability: 1.23 });
		expect(calls).toEqual([
			{
				file: 'python-test',
				args: ['/opt/Tweaker-3/Tweaker.py', '-i', '/models/part.stl', '-o', outputFile, '-x', '-vb'],
				options: { timeout: 1000 },
			},
		]);
		expect(existsSync(outputFile)).toBe(true);
	});

	it('wraps a failed run', () => {
		const { runner } = createFakeRunner({ failTweaker: true });
		try {
			tweakFile('/models/part.stl', tempDir(), 1, settings, runner);
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(AppError);
			expect(error instanceof AppError && error.message).toBe("Couldn't run tweaker on file /models/part.stl");
			expect(error instanceof AppError && error.causeMessage).toBe('python-test failed with exit code 1: ModuleNotFoundError: No module named numpy');
		}
	});

	it('fails when no score is printed', () => {
		const runner = () => ({ stdout: 'done', stderr: '' });
		expect(() => tweakFile('/models/part.stl', tempDir(), 1, settings, runner)).toThrow("Couldn't run tweaker on file /models/part.stl");
	});
});
