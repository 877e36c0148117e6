import express, { type Express } from 'express';
import cors from 'cors';
import fs from 'fs';
import path from 'path';
import { DOWNLOAD_SECRET, PUBLIC_FRONTEND_URL, UPLOAD_DIR } from './config.js';
import { AppError, errorHandler } from './middleware/error.js';
import profiles from './profiles/route.js';
import type { CommandRunner } from './process/runner.js';
import { slicingRouter } from './slicing/route.js';
import { verifySignature } from './storage/signed-url.js';

export interface AppOptions {
	/** Runs the orientation optimizer and the slicer. Defaults to real child processes. */
	runner?: CommandRunner;
}

export function createApp(options: AppOptions = {}): Express {
	const app = express();

	app.use(
		cors({
			origin: PUBLIC_FRONTEND_URL,
			methods: ['GET', 'POST', 'OPTIONS', 'DELETE'],
		}),
	);
	app.use(express.json({ limit: '1mb' }));

	app.use('/profiles', profiles);
	app.use('/slice', slicingRouter(options.runner));

	app.get('/', (req, res) => {
		res.sendStatus(200);
	});

	// Protected file download (signed, permanent)
	app.get('/file/:filename', (req, res, next) => {
		try {
			const filename = req.params.filename;
			const s = typeof req.query.s === 'string' ? req.query.s : undefined;

			if (!DOWNLOAD_SECRET || !filename || !s) {
				throw new AppError(400, 'Invalid link');
			}

			if (!verifySignature(filename, s, DOWNLOAD_SECRET)) {
				throw new AppError(403, 'Invalid signature');
			}

			// Prevent path traversal
			const filePath = path.resolve(UPLOAD_DIR, filename);
			if (!filePath.startsWith(UPLOAD_DIR + path.sep)) {
				throw new AppError(400, 'Invalid path');
			}
			if (!fs.existsSync(filePath)) {
				throw new AppError(404, 'Not found');
			}

			res.sendFile(filePath);
		} catch (error) {
			next(error);
		}
	});

	app.use(errorHandler);

	return app;
}
