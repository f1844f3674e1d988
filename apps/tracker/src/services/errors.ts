export class ValidationError extends Error {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

export class NotFoundError extends Error {
  readonly entity: string;
  readonly id: number;

  constructor(entity: string, id: number) {
    super(`${entity} not found`);
    this.name = 'NotFoundError';
    this.entity = entity;
    this.id = id;
  }
}

/** A failed push to an external service. Nothing local is rolled back. */
export class UploadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UploadError';
  }
}

/** No enabled upload adapter can take the request. */
export class UploadUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UploadUnavailableError';
  }
}
