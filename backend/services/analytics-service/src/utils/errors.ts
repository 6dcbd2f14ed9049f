/**
 * RFC 7807 Problem Details Options
 */
export interface ProblemDetailOptions {
  detail?: string;
  instance?: string;
  type?: string;
  [key: string]: unknown;
}

/**
 * RFC 7807 Problem Details Response
 */
export interface ProblemDetailResponse {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  code?: string;
  [key: string]: unknown;
}

const ERROR_TYPE_BASE = 'urn:analytics:errors:';

export class AppError extends Error {
  public statusCode: number;
  public code: string;
  public detail?: string;
  public instance?: string;
  public type: string;
  public additionalProperties: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = 'INTERNAL_ERROR',
    options: ProblemDetailOptions = {}
  ) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;

    const { detail, instance, type, ...rest } = options;
    this.detail = detail;
    this.instance = instance;
    this.type = type || `${ERROR_TYPE_BASE}${code}`;
    this.additionalProperties = rest;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to RFC 7807 Problem Details JSON
   */
  toJSON(): ProblemDetailResponse {
    return {
      type: this.type,
      title: this.message,
      status: this.statusCode,
      code: this.code,
      ...(this.detail ? { detail: this.detail } : {}),
      ...(this.instance ? { instance: this.instance } : {}),
      ...this.additionalProperties,
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, options?: ProblemDetailOptions) {
    super(message, 400, 'VALIDATION_ERROR', options);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, options?: ProblemDetailOptions) {
    super(`${resource} not found`, 404, 'NOT_FOUND', options);
  }
}
