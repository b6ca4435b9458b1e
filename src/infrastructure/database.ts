/**
 * Database connection lifecycle.
 *
 * Opened once at startup and passed explicitly to whatever needs it;
 * closed on shutdown.
 */

import { MongoClient, type Collection } from "mongodb";
import type { Logger } from "pino";
import type { UserDocument } from "./repositories.js";

export const USERS_COLLECTION = "usersData";

export interface DatabaseConfig {
  readonly uri: string;
  readonly name: string;
}

export interface Database {
  readonly users: Collection<UserDocument>;
  close(): Promise<void>;
}

/**
 * Connects to MongoDB and returns the collections the service uses.
 * @throws MongoError when the server cannot be reached
 */
export async function connectDatabase(
  config: DatabaseConfig,
  logger: Logger
): Promise<Database> {
  const client = new MongoClient(config.uri);
  await client.connect();

  const db = client.db(config.name);
  logger.info({ database: config.name }, "connected to MongoDB");

  return {
    users: db.collection<UserDocument>(USERS_COLLECTION),
    async close() {
      await client.close();
      logger.info("MongoDB connection closed");
    },
  };
}
