/**
 * GraphQL User Service
 *
 * Process entry point: loads configuration, opens the database, starts the
 * HTTP server and closes both on SIGINT/SIGTERM.
 *
 * Build: npm run build
 * Start: npm start
 */

import "dotenv/config";
import { createApp } from "./app.js";
import { loadConfig, ConfigError, type Config } from "./config.js";
import { connectDatabase, MongoUserRepository } from "./infrastructure/index.js";
import { createLogger } from "./logger.js";

async function main(): Promise<void> {
  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      createLogger().fatal({ issues: error.issues }, "invalid configuration");
      process.exit(1);
    }
    throw error;
  }

  const logger = createLogger(config.logLevel);
  const db = await connectDatabase(config.mongo, logger);

  const server = createApp({
    users: new MongoUserRepository(db.users, logger.child({ component: "users" })),
    logger,
    server: {
      port: config.port,
      host: config.host,
      introspection: !config.production,
      playground: !config.production,
      maskErrors: config.production,
    },
    cors: { origin: config.corsOrigin },
  });

  await server.listen();

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    logger.info({ signal }, "shutting down");
    await server.stop();
    await db.close();
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ err: error }, "shutdown failed");
          process.exit(1);
        }
      );
    });
  }
}

main().catch((error: unknown) => {
  createLogger().fatal({ err: error }, "failed to start");
  process.exit(1);
});
