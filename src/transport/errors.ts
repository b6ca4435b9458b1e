/**
 * Server-side error handling.
 */

import { GraphQLError } from 'graphql';
import type { Logger } from 'pino';
import type { FormattedError } from './types.js';

/**
 * Base transport error. Thrown while handling an HTTP request and sent to
 * the client as a single-entry `errors` array with `statusCode`.
 */
export class ServiceError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly extensions: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number,
    extensions: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'ServiceError';
    this.code = code;
    this.statusCode = statusCode;
    this.extensions = extensions;
  }

  /**
   * Converts to a GraphQL-compatible error format.
   */
  toGraphQL(): FormattedError {
    return {
      message: this.message,
      extensions: {
        code: this.code,
        ...this.extensions,
      },
    };
  }
}

/**
 * Malformed HTTP request (unreadable body, missing query).
 */
export class BadRequestError extends ServiceError {
  constructor(message: string) {
    super(message, 'BAD_REQUEST', 400);
    this.name = 'BadRequestError';
  }
}

export class MethodNotAllowedError extends ServiceError {
  readonly allow: string;

  constructor(message: string, allow: string) {
    super(message, 'METHOD_NOT_ALLOWED', 405);
    this.name = 'MethodNotAllowedError';
    this.allow = allow;
  }
}

export class RouteNotFoundError extends ServiceError {
  constructor(pathname: string) {
    super('Not found', 'NOT_FOUND', 404, { path: pathname });
    this.name = 'RouteNotFoundError';
  }
}

export interface FormatErrorOptions {
  /**
   * Hide the message of unexpected errors.
   */
  readonly maskErrors: boolean;
  readonly logger: Logger;
}

export const MASKED_ERROR_MESSAGE = 'An unexpected error occurred';

/**
 * Formats an error for GraphQL response.
 *
 * Errors thrown by resolvers are logged; their message is replaced when
 * `maskErrors` is set.
 */
export function formatError(
  error: GraphQLError,
  options: FormatErrorOptions
): FormattedError {
  const originalError = error.originalError;

  if (originalError instanceof ServiceError) {
    return originalError.toGraphQL();
  }

  // Thrown from a resolver: store failures and other faults. Variable
  // coercion errors also carry an originalError, but no path.
  if (
    originalError &&
    !(originalError instanceof GraphQLError) &&
    error.path !== undefined
  ) {
    options.logger.error({ err: originalError, path: error.path }, 'resolver failed');

    if (options.maskErrors) {
      return {
        message: MASKED_ERROR_MESSAGE,
        extensions: { code: 'INTERNAL_SERVER_ERROR', path: error.path },
      };
    }

    return {
      message: originalError.message,
      extensions: {
        code: 'INTERNAL_SERVER_ERROR',
        path: error.path,
        stack: originalError.stack,
      },
    };
  }

  // GraphQL syntax, validation and variable coercion errors
  return {
    message: error.message,
    extensions: {
      code: 'GRAPHQL_ERROR',
      locations: error.locations,
      path: error.path,
    },
  };
}
