export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: number | string) {
    super(404, 'NOT_FOUND', `${resource} for ${id} not found`);
  }
}

/**
 * The request was well-formed but the computed result breaks a hard floor
 * (e.g. a nutrition target below minimum protein or calories).
 */
export class UnprocessableError extends AppError {
  constructor(code: string, message: string, details?: unknown) {
    super(422, code, message, details);
  }
}

/**
 * An upstream collaborator (health source, recipe API) could not be reached.
 */
export class UpstreamError extends AppError {
  constructor(code: string, message: string, statusCode = 502) {
    super(statusCode, code, message);
  }
}
