/**
 * Schema Loading
 */

import { readFileSync, existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

/**
 * Load a GraphQL SDL schema from a file.
 *
 * @param schemaPath - Path or file URL of the .graphql file
 * @throws Error when the file does not exist
 *
 * @example
 * ```typescript
 * const schema = loadCompiledSchema(new URL('../schema/schema.graphql', import.meta.url));
 * ```
 */
export function loadCompiledSchema(schemaPath: string | URL): string {
  const path = schemaPath instanceof URL ? fileURLToPath(schemaPath) : schemaPath;

  if (!existsSync(path)) {
    throw new Error(`Schema not found: ${path}`);
  }

  return readFileSync(path, 'utf-8');
}
