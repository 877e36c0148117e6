import crypto from 'crypto';
import { DOWNLOAD_SECRET, PUBLIC_BASE_URL } from '../config.js';

export function signFilename(filename: string, secret: string): string {
	return crypto.createHmac('sha256', secret).update(filename).digest('hex');
}

export const makeSignedUrl = (filename: string, secret = DOWNLOAD_SECRET, base = PUBLIC_BASE_URL): string | null => {
	if (!secret) {
		console.error('DOWNLOAD_SECRET is required for signed URLs');
		return null;
	}
	const sig = signFilename(filename, secret);
	return `${base ?? ''}/file/${encodeURIComponent(filename)}?s=${sig}`;
};

export function verifySignature(filename: string, signature: string, secret: string): boolean {
	const expected = signFilename(filename, secret);
	// Constant-time compare
	if (signature.length !== expected.length) return false;
	return crypto.timingSafeEqual(Buffer.from(signature, 'utf8'), Buffer.from(expected, 'utf8'));
}
