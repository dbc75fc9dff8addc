export class AppError extends Error {
  constructor(
    public statusCode: 400 | 401 | 403 | 404 | 500,
    message: string,
    public code?: string,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export const createNotFoundError = (resource: string) =>
  new AppError(404, `${resource} not found`, 'NOT_FOUND');

export const createBadRequestError = (message: string) =>
  new AppError(400, message, 'BAD_REQUEST');
