import { ZodError } from 'zod';
import {
  ActionConfigurationError,
  ComboOptionNotFoundError,
  ElementConfigurationError,
  ElementNotChangeableError,
  ElementNotFoundError,
  ScreenMappingError,
  StatusBarError,
  TableConfigurationError,
  TableFillError,
  TransactionError,
} from './errors.js';

export type ErrorCategory = 'configuration' | 'domain' | 'ui' | 'unknown';

export function classifyError(error: unknown): ErrorCategory {
  if (
    error instanceof ScreenMappingError ||
    error instanceof ElementConfigurationError ||
    error instanceof ActionConfigurationError ||
    error instanceof TableConfigurationError
  ) {
    return 'configuration';
  }

  if (
    error instanceof StatusBarError ||
    error instanceof TableFillError ||
    error instanceof TransactionError
  ) {
    return 'domain';
  }

  if (
    error instanceof ElementNotFoundError ||
    error instanceof ElementNotChangeableError ||
    error instanceof ComboOptionNotFoundError
  ) {
    return 'ui';
  }

  if (error instanceof ZodError) {
    return 'configuration';
  }

  return 'unknown';
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

