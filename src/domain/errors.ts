/**
 * Domain Errors
 *
 * Typed error classes for expected domain failures.
 * Repositories return them inside a Result rather than throwing them.
 */

// ============================================
// Base Error
// ============================================

export abstract class DomainError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

// ============================================
// Not Found Errors
// ============================================

export class NotFoundError extends DomainError {
  readonly code = "NOT_FOUND";

  constructor(
    readonly resourceType: string,
    readonly resourceId: string
  ) {
    super(`${resourceType} with id "${resourceId}" not found`);
  }
}

/**
 * Raised for unknown ids and for ids that are not valid store identifiers;
 * callers cannot tell the two apart.
 */
export class UserNotFoundError extends NotFoundError {
  constructor(id: string) {
    super("User", id);
  }
}
