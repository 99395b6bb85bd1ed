// src/lib/error-normaliser.ts
import { msg } from './error-messages.js';

export interface PublicError {
  type: 'BAD_INPUT' | 'INTERNAL';
  message: string;           // public phrase from the catalogue
  retryable: false;
}

/**
 * Public phrase for a failure that never became an AppError: a framework
 * 4xx (body parser, route matching) or anything unexpected.
 */
export function toPublicError(type: PublicError['type']): PublicError {
  switch (type) {
    case 'BAD_INPUT':
      return { type, message: msg('BAD_INPUT_SCHEMA'), retryable: false };
    case 'INTERNAL':
      // Don't leak internal details
      return { type, message: msg('INTERNAL_UNEXPECTED'), retryable: false };
  }
}
