/**
 * Infrastructure Layer
 *
 * Contains:
 * - Database: MongoDB connection lifecycle
 * - Repositories: Data access abstraction
 */

export * from "./database.js";
export * from "./repositories.js";
