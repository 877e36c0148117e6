import type { NextFunction, Response, Request } from 'express';
import multer from 'multer';

export class AppError extends Error {
	status: number = 500;
	causeMessage?: string;

	constructor(status: number, message: string, causeMessage?: string) {
		super(message);
		this.name = 'AppError';
		this.status = status;
		this.causeMessage = causeMessage;
	}
}

export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export function toAppError(error: unknown): AppError {
	if (error instanceof AppError) return error;
	if (error instanceof multer.MulterError) return new AppError(400, error.message, error.code);
	return new AppError(500, 'Internal server error', describeError(error));
}

export function errorResponse(err: unknown): { status: number; body: { message: string; details?: string } } {
	const error = toAppError(err);
	return {
		status: error.status,
		body: {
			message: error.message,
			...(error.status < 500 && error.causeMessage ? { details: error.causeMessage } : {}),
		},
	};
}

/* eslint-disable @typescript-eslint/no-unused-vars */
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
	const error = toAppError(err);
	const stack = err instanceof Error ? err.stack : undefined;

	console.error(
		`[${new Date().toISOString()}] Error: ${error.message} 
    at ${req.method} ${req.originalUrl} with ${stack ?? 'no stack trace'}
    ${error.causeMessage ? `Cause: ${error.causeMessage}` : ''}`,
	);

	if (res.headersSent) return;
	const { status, body } = errorResponse(error);
	res.status(status).json(body);
}
