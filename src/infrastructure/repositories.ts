/**
 * Repository Interfaces & Implementations
 *
 * The user repository is the only module that talks to the document store.
 * It returns domain entities and uses Result types for records that do not
 * exist; store failures are thrown.
 */

import { ObjectId } from "mongodb";
import type { Logger } from "pino";
import {
  UserId,
  UserNotFoundError,
  ok,
  err,
  type User,
  type Result,
} from "../domain/index.js";

// ============================================
// Repository Interface
// ============================================

export interface UserRepository {
  findAll(): Promise<User[]>;
  findById(id: string): Promise<Result<User, UserNotFoundError>>;
  create(input: CreateUserData): Promise<User>;
  delete(id: string): Promise<Result<void, UserNotFoundError>>;
}

// ============================================
// Input Types
// ============================================

export interface CreateUserData {
  readonly name: string;
  readonly email: string;
}

// ============================================
// Stored Document
// ============================================

export interface UserDocument {
  _id: ObjectId;
  name: string;
  email: string;
}

/**
 * The part of a MongoDB collection the repository uses.
 * `Collection<UserDocument>` from the driver satisfies it.
 */
export interface UserCollection {
  find(): { toArray(): Promise<UserDocument[]> };
  findOne(filter: { _id: ObjectId }): Promise<UserDocument | null>;
  insertOne(doc: { name: string; email: string }): Promise<{ insertedId: ObjectId }>;
  deleteOne(filter: { _id: ObjectId }): Promise<{ deletedCount: number }>;
}

// ============================================
// Identifier Parsing
// ============================================

const OBJECT_ID_PATTERN = /^[0-9a-fA-F]{24}$/;

/**
 * Parses a client-supplied id into a store identifier.
 * Returns null for anything that is not a 24-character hex string.
 */
export function parseUserId(raw: string): ObjectId | null {
  if (!OBJECT_ID_PATTERN.test(raw)) {
    return null;
  }
  return ObjectId.createFromHexString(raw);
}

function documentToUser(doc: UserDocument): User {
  return {
    id: UserId(doc._id.toHexString()),
    name: doc.name,
    email: doc.email,
  };
}

// ============================================
// MongoDB Implementation
// ============================================

export class MongoUserRepository implements UserRepository {
  constructor(
    private readonly collection: UserCollection,
    private readonly logger: Logger
  ) {}

  async findAll(): Promise<User[]> {
    const docs = await this.collection.find().toArray();
    return docs.map(documentToUser);
  }

  async findById(id: string): Promise<Result<User, UserNotFoundError>> {
    const objectId = parseUserId(id);
    if (!objectId) {
      this.logger.debug({ id }, "malformed user id");
      return err(new UserNotFoundError(id));
    }

    const doc = await this.collection.findOne({ _id: objectId });
    return doc ? ok(documentToUser(doc)) : err(new UserNotFoundError(id));
  }

  async create(input: CreateUserData): Promise<User> {
    const { insertedId } = await this.collection.insertOne({
      name: input.name,
      email: input.email,
    });
    return documentToUser({ _id: insertedId, name: input.name, email: input.email });
  }

  async delete(id: string): Promise<Result<void, UserNotFoundError>> {
    const objectId = parseUserId(id);
    if (!objectId) {
      this.logger.debug({ id }, "malformed user id");
      return err(new UserNotFoundError(id));
    }

    const { deletedCount } = await this.collection.deleteOne({ _id: objectId });
    return deletedCount === 1 ? ok(undefined) : err(new UserNotFoundError(id));
  }
}

// ============================================
// In-Memory Implementation
// ============================================

/**
 * Keeps users in a Map keyed by hex id. Ids are minted and parsed exactly
 * as the MongoDB implementation does, so callers see the same behavior.
 */
export class InMemoryUserRepository implements UserRepository {
  private users = new Map<string, User>();

  async findAll(): Promise<User[]> {
    return Array.from(this.users.values());
  }

  async findById(id: string): Promise<Result<User, UserNotFoundError>> {
    const objectId = parseUserId(id);
    const user = objectId ? this.users.get(objectId.toHexString()) : undefined;
    return user ? ok(user) : err(new UserNotFoundError(id));
  }

  async create(input: CreateUserData): Promise<User> {
    const user = documentToUser({
      _id: new ObjectId(),
      name: input.name,
      email: input.email,
    });
    this.users.set(user.id, user);
    return user;
  }

  async delete(id: string): Promise<Result<void, UserNotFoundError>> {
    const objectId = parseUserId(id);
    if (!objectId || !this.users.delete(objectId.toHexString())) {
      return err(new UserNotFoundError(id));
    }
    return ok(undefined);
  }
}
