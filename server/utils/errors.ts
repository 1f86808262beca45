import type { Response } from 'express';
import { ZodError } from 'zod';
import { log, logError } from '../logger';

export class HttpError extends Error {
  status: number;

  constructor(message: string, status = 500) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
  }
}

export class ValidationError extends HttpError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(message, 404);
    this.name = 'NotFoundError';
  }
}

export class UnsupportedFileError extends HttpError {
  readonly extension: string;

  constructor(extension: string) {
    super('Неподдерживаемый формат файла. Используйте .csv, .xlsx или .xls', 400);
    this.name = 'UnsupportedFileError';
    this.extension = extension;
  }
}

export class FileParseError extends HttpError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super(`Ошибка при загрузке файла: ${reason}`, 400);
    this.name = 'FileParseError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Converts anything thrown inside a route into a status and a user-facing message.
 */
export function toHttpError(error: unknown): HttpError {
  if (error instanceof HttpError) {
    return error;
  }

  if (error instanceof ZodError) {
    const message = error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join(', ');
    return new ValidationError(message);
  }

  if (error instanceof Error) {
    return new HttpError(error.message || 'Internal Server Error', 500);
  }

  return new HttpError('Internal Server Error', 500);
}

/**
 * Единый ответ об ошибке для маршрутов: { error }.
 */
export function sendError(res: Response, error: unknown, source: string): void {
  const httpError = toHttpError(error);
  if (httpError.status >= 500) {
    logError('Необработанная ошибка', error, source);
  } else {
    log(`⚠️ ${httpError.message}`, source);
  }
  res.status(httpError.status).json({ error: httpError.message });
}
