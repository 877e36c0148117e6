import { Router } from 'express';
import { AppError } from '../middleware/error.js';
import { uploadConfig } from '../middleware/upload.js';
import { deleteProfile, getProfile, isValidProfileName, listProfiles, saveProfile } from './settings.service.js';

const router: Router = Router();

router.post('/', uploadConfig.single('file'), async (req, res, next) => {
	try {
		const name: unknown = req.body.name;

		if (!isValidProfileName(name)) {
			throw new AppError(400, 'Name must only contain letters, numbers, dashes and underscores');
		}

		if (!req.file) {
			throw new AppError(400, 'File is required');
		}

		const profile = await saveProfile(name, req.file.buffer.toString('utf8'));

		res.status(201).json(profile);
	} catch (error) {
		next(error);
	}
});

router.get('/', async (req, res, next) => {
	try {
		res.status(200).json(await listProfiles());
	} catch (error) {
		next(error);
	}
});

router.get('/:name', async (req, res, next) => {
	try {
		if (!isValidProfileName(req.params.name)) {
			throw new AppError(400, 'Invalid profile name');
		}

		res.status(200).json(await getProfile(req.params.name));
	} catch (error) {
		next(error);
	}
});

router.delete('/:name', async (req, res, next) => {
	try {
		if (!isValidProfileName(req.params.name)) {
			throw new AppError(400, 'Invalid profile name');
		}

		await deleteProfile(req.params.name);

		res.status(204).send();
	} catch (error) {
		next(error);
	}
});

export default router;
