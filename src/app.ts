/**
 * Assembles the GraphQL server from the schema, the resolvers and a user
 * repository. Used by the process entry point and by tests.
 */

import type { Logger } from "pino";
import { createServer, type CorsOptions, type GraphQLServer } from "./transport/server.js";
import type { ServerOptions } from "./transport/types.js";
import type { UserRepository } from "./infrastructure/repositories.js";
import { createContext, resolvers, type Context } from "./presentation/index.js";
import { loadUserSchema } from "./schema.js";

export interface AppOptions {
  readonly users: UserRepository;
  readonly logger: Logger;
  readonly server?: ServerOptions;
  readonly cors?: CorsOptions | false;
}

export function createApp(options: AppOptions): GraphQLServer {
  const { users, logger } = options;

  return createServer<Context>({
    schema: loadUserSchema(),
    resolvers,
    context: (baseContext) => createContext({ users, baseContext }),
    logger,
    options: options.server,
    cors: options.cors,
  });
}
