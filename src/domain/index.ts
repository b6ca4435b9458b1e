/**
 * Domain Layer
 *
 * Contains:
 * - Entities: Core business objects
 * - Result: Expected-failure values
 * - Domain Errors: Business-specific error types
 */

export * from "./entities.js";
export * from "./errors.js";
export * from "./result.js";
