// ============================================
// src/utils/errors.ts
// ============================================

export class AppError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

export interface FieldError {
  field: string;
  message: string;
}

export class ValidationError extends AppError {
  readonly details: FieldError[];

  constructor(details: FieldError[]) {
    super('Validation failed', 422);
    this.details = details;
  }
}

export class BadRequestError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class InvalidIdError extends BadRequestError {
  constructor(id: string) {
    super(`'${id}' is not a valid ObjectId, it must be a 24-character hex string`);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

// Anything that goes wrong reaching or talking to the database
export class StorageError extends AppError {
  constructor(message: string) {
    super(message, 500);
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const truncate = (text: string, max: number): string =>
  text.length > max ? text.slice(0, max) : text;
