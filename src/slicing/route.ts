import { Router } from 'express';
import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import { DEBUG_LOGGING, DELETE_AFTER_SLICE_FAILURE, SLICER_PATH, UPLOAD_DIR } from '../config.js';
import { AppError } from '../middleware/error.js';
import { uploadModel } from '../middleware/upload.js';
import { isValidProfileName, profilePath } from '../profiles/settings.service.js';
import { makeSignedUrl } from '../storage/signed-url.js';
import { removeUploads } from '../storage/uploads.js';
import type { SlicingResult } from '../types.js';
import { parseExtraArgs, sanitizeFilenameComponent } from './args.js';
import { AutoSlicer } from './autoslicer.js';
import { extractSliceData, timeStringToSeconds } from './gcode.js';
import { execRunner, type CommandRunner } from '../process/runner.js';

export function slicingRouter(runner: CommandRunner = execRunner): Router {
	const router: Router = Router();

	// Upload one or more models and slice them together on one plate
	router.post('/', uploadModel.array('files', 10), async (req, res, next) => {
		const id = crypto.randomUUID();
		try {
			const files = Array.isArray(req.files) ? req.files : [];
			const [first] = files;
			if (!first) {
				throw new AppError(400, 'At least one model file is required');
			}

			const printer: unknown = req.body.printer;
			if (!isValidProfileName(printer)) {
				throw new AppError(400, 'A valid printer profile name is required');
			}

			const extraArgs = parseExtraArgs(req.body.args);

			if (!SLICER_PATH) {
				throw new AppError(500, 'Slicing is not configured properly on the server', 'SLICER_PATH environment variable is not defined');
			}

			const slicer = new AutoSlicer(SLICER_PATH, profilePath(printer), { runner });

			await fs.mkdir(UPLOAD_DIR, { recursive: true });
			for (const [index, file] of files.entries()) {
				const ext = path.extname(file.originalname).toLowerCase();
				const modelPath = path.join(UPLOAD_DIR, `${id}-model-${index + 1}${ext}`);
				await fs.writeFile(modelPath, file.buffer);
				if (DEBUG_LOGGING) console.log(`Stored model ${file.originalname} as ${modelPath} (${file.size} bytes)`);
				slicer.addVolume(modelPath);
			}

			const stem = sanitizeFilenameComponent(path.parse(first.originalname).name);
			const result = await slicer.slice(path.join(UPLOAD_DIR, `${id}-${stem}`), { extraArgs });

			const sliceData = await extractSliceData(result.gcode);
			if ('error' in sliceData) {
				throw new AppError(500, sliceData.error);
			}
			const { times, filament } = sliceData;

			const gcodeFilename = path.basename(result.gcode);
			const gcodeUrl = makeSignedUrl(gcodeFilename);
			if (!gcodeUrl) {
				throw new AppError(500, 'Failed to generate G-code download URL');
			}
			const gcodeStats = await fs.stat(result.gcode);

			const body: SlicingResult = {
				id,
				gcodeFilename,
				gcodeSize: gcodeStats.size,
				gcodeUrl,
				unprintability: result.unprintability,
				times,
				printSeconds: timeStringToSeconds(times.normal),
				filament,
			};
			res.json(body);
		} catch (error) {
			if (DELETE_AFTER_SLICE_FAILURE) {
				await removeUploads(id).catch(err => console.warn('Failed to clean up uploads:', err));
			}
			next(error);
		}
	});

	router.delete('/:id', async (req, res, next) => {
		try {
			const id = req.params.id ?? '';
			if (!/^[0-9a-f-]{36}$/i.test(id)) {
				throw new AppError(400, 'Invalid upload ID');
			}

			const deleted = await removeUploads(id);
			if (deleted.length === 0) {
				throw new AppError(404, 'No files found for upload ID');
			}

			res.status(204).send();
		} catch (error) {
			next(error);
		}
	});

	return router;
}
