import multer from 'multer';
import path from 'path';
import { AppError } from './error.js';
import { MODEL_EXTENSIONS } from '../slicing/models.js';

const storage = multer.memoryStorage();

export const uploadConfig = multer({
	storage,
	fileFilter: (req, file, cb) => {
		const ext = path.extname(file.originalname).toLowerCase();
		if (ext !== '.ini') {
			return cb(new AppError(400, 'Invalid file type. Only INI printer configs are allowed.'));
		}
		cb(null, true);
	},
	limits: { fileSize: 1_000_000 },
});

export const uploadModel = multer({
	storage,
	fileFilter: (req, file, cb) => {
		const allowedMimeTypes = ['model/stl', 'model/3mf', 'application/sla', 'application/vnd.ms-pki.stl', 'application/octet-stream'];
		const ext = path.extname(file.originalname).toLowerCase();

		if (!allowedMimeTypes.includes(file.mimetype) || !MODEL_EXTENSIONS.some(allowed => allowed === ext)) {
			return cb(new AppError(400, 'Invalid file type. Only STL and 3MF files are allowed.'));
		}
		cb(null, true);
	},
	limits: { fileSize: 100_000_000, files: 10 },
});
