/**
 * Presentation Layer
 *
 * Contains:
 * - Context: Request-scoped dependencies
 * - Resolvers: GraphQL operation handlers
 */

export * from "./context.js";
export * from "./resolvers.js";
