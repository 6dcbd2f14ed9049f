/**
 * Error Classes Export
 */

export {
  AppError,
  ValidationError,
  NotFoundError,
  ProblemDetailOptions,
  ProblemDetailResponse,
} from '../utils/errors';

import { AppError } from '../utils/errors';

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
