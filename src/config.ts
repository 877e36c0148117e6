import dotenv from 'dotenv';
import path from 'path';

dotenv.config();

function flag(name: string, fallback: boolean): boolean {
	const value = process.env[name];
	if (value === undefined || value === '') return fallback;
	return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

function positiveInt(name: string, fallback: number): number {
	const value = Number(process.env[name]);
	return Number.isInteger(value) && value > 0 ? value : fallback;
}

// Configuration constants
export const DEBUG_LOGGING = flag('DEBUG_LOGGING', false);
export const DELETE_AFTER_SLICE_FAILURE = flag('DELETE_AFTER_SLICE_FAILURE', false);

export const PORT = positiveInt('PORT', 3000);
export const ENV = process.env.ENV || 'production';

export const UPLOAD_DIR = path.resolve(process.env.UPLOAD_DIR || path.join(process.cwd(), 'uploads'));
export const DATA_PATH = path.resolve(process.env.DATA_PATH || path.join(process.cwd(), 'data'));

export const SLICER_PATH = process.env.SLICER_PATH;
export const PYTHON_PATH = process.env.PYTHON_PATH || 'python3';
export const TWEAKER_PATH = path.resolve(process.env.TWEAKER_PATH || path.join(process.cwd(), 'Tweaker-3', 'Tweaker.py'));
export const SLICE_TIMEOUT_MS = positiveInt('SLICE_TIMEOUT_MS', 300_000); // 5 minutes

export const DOWNLOAD_SECRET = process.env.DOWNLOAD_SECRET;
export const PUBLIC_BASE_URL = ENV === 'development' ? `http://localhost:${PORT}` : process.env.PUBLIC_BASE_URL;
export const PUBLIC_FRONTEND_URL = ENV === 'development' ? 'http://localhost:5173' : process.env.PUBLIC_FRONTEND_URL;
