import { loadCompiledSchema } from "./transport/schema.js";

/** Location of the SDL, relative to both `src/` and `dist/`. */
export const SCHEMA_URL = new URL("../schema/schema.graphql", import.meta.url);

export function loadUserSchema(): string {
  return loadCompiledSchema(SCHEMA_URL);
}
