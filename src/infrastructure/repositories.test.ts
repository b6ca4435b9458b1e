import { describe, it, expect, vi, beforeEach } from "vitest";
import { ObjectId } from "mongodb";
import { pino } from "pino";
import {
  InMemoryUserRepository,
  MongoUserRepository,
  parseUserId,
  type UserCollection,
  type UserDocument,
} from "./repositories.js";
import { UserNotFoundError } from "../domain/errors.js";

const logger = pino({ level: "silent" });

/** In-process stand-in for the MongoDB users collection. */
class FakeUserCollection implements UserCollection {
  readonly docs = new Map<string, UserDocument>();

  find() {
    const docs = Array.from(this.docs.values());
    return { toArray: async () => docs };
  }

  async findOne(filter: { _id: ObjectId }): Promise<UserDocument | null> {
    return this.docs.get(filter._id.toHexString()) ?? null;
  }

  async insertOne(doc: { name: string; email: string }): Promise<{ insertedId: ObjectId }> {
    const insertedId = new ObjectId();
    this.docs.set(insertedId.toHexString(), { _id: insertedId, ...doc });
    return { insertedId };
  }

  async deleteOne(filter: { _id: ObjectId }): Promise<{ deletedCount: number }> {
    return { deletedCount: this.docs.delete(filter._id.toHexString()) ? 1 : 0 };
  }
}

describe("parseUserId", () => {
  it("parses a 24-character hex string", () => {
    const id = parseUserId("64b7f0c2a1b2c3d4e5f60718");
    expect(id?.toHexString()).toBe("64b7f0c2a1b2c3d4e5f60718");
  });

  it("accepts upper-case hex", () => {
    expect(parseUserId("64B7F0C2A1B2C3D4E5F60718")?.toHexString()).toBe(
      "64b7f0c2a1b2c3d4e5f60718"
    );
  });

  it.each(["", "not-a-valid-id", "64b7f0c2a1b2c3d4e5f6071", "64b7f0c2a1b2c3d4e5f60718a", "zzzzzzzzzzzzzzzzzzzzzzzz", "abcdefghijkl"])(
    "returns null for %j",
    (raw) => {
      expect(parseUserId(raw)).toBeNull();
    }
  );
});

describe("MongoUserRepository", () => {
  let collection: FakeUserCollection;
  let repo: MongoUserRepository;

  beforeEach(() => {
    collection = new FakeUserCollection();
    repo = new MongoUserRepository(collection, logger);
  });

  it("returns an empty list for an empty collection", async () => {
    expect(await repo.findAll()).toEqual([]);
  });

  it("inserts a document and returns the user with the minted id", async () => {
    const user = await repo.create({ name: "Alice", email: "alice@example.com" });

    expect(user.id).toMatch(/^[0-9a-f]{24}$/);
    expect(user).toEqual({ id: user.id, name: "Alice", email: "alice@example.com" });
    const doc = collection.docs.get(user.id);
    expect(doc?._id.toHexString()).toBe(user.id);
    expect(doc?.name).toBe("Alice");
    expect(doc?.email).toBe("alice@example.com");
  });

  it("lists every stored user", async () => {
    const alice = await repo.create({ name: "Alice", email: "alice@example.com" });
    const bob = await repo.create({ name: "Bob", email: "bob@example.com" });

    expect(await repo.findAll()).toEqual([alice, bob]);
  });

  it("finds a user by id", async () => {
    const alice = await repo.create({ name: "Alice", email: "alice@example.com" });

    const result = await repo.findById(alice.id);

    expect(result.ok).toBe(true);
    expect(result.value).toEqual(alice);
  });

  it("returns UserNotFoundError for an id that was never issued", async () => {
    const result = await repo.findById("64b7f0c2a1b2c3d4e5f60718");

    expect(result.ok).toBe(false);
    expect(result.error).toBeInstanceOf(UserNotFoundError);
    expect(result.error?.message).toBe('User with id "64b7f0c2a1b2c3d4e5f60718" not found');
  });

  it("returns UserNotFoundError for a malformed id without querying the store", async () => {
    const findOne = vi.spyOn(collection, "findOne");

    const result = await repo.findById("not-a-valid-id");

    expect(result.ok).toBe(false);
    expect(result.error).toBeInstanceOf(UserNotFoundError);
    expect(findOne).not.toHaveBeenCalled();
  });

  it("deletes a user exactly once", async () => {
    const alice = await repo.create({ name: "Alice", email: "alice@example.com" });

    expect((await repo.delete(alice.id)).ok).toBe(true);
    expect((await repo.delete(alice.id)).ok).toBe(false);
    expect(collection.docs.size).toBe(0);
  });

  it("treats a malformed id on delete as not found", async () => {
    const deleteOne = vi.spyOn(collection, "deleteOne");

    const result = await repo.delete("not-a-valid-id");

    expect(result.ok).toBe(false);
    expect(result.error).toBeInstanceOf(UserNotFoundError);
    expect(deleteOne).not.toHaveBeenCalled();
  });

  it("propagates store failures", async () => {
    vi.spyOn(collection, "insertOne").mockRejectedValue(new Error("connection refused"));

    await expect(repo.create({ name: "Alice", email: "alice@example.com" })).rejects.toThrow(
      "connection refused"
    );
  });
});

describe("InMemoryUserRepository", () => {
  let repo: InMemoryUserRepository;

  beforeEach(() => {
    repo = new InMemoryUserRepository();
  });

  it("mints store-format ids", async () => {
    const user = await repo.create({ name: "Alice", email: "alice@example.com" });
    expect(parseUserId(user.id)?.toHexString()).toBe(user.id);
  });

  it("finds a user regardless of the id's hex case", async () => {
    const user = await repo.create({ name: "Alice", email: "alice@example.com" });

    const result = await repo.findById(user.id.toUpperCase());

    expect(result.value).toEqual(user);
  });

  it("returns not found for malformed and unknown ids", async () => {
    expect((await repo.findById("not-a-valid-id")).ok).toBe(false);
    expect((await repo.findById("64b7f0c2a1b2c3d4e5f60718")).ok).toBe(false);
    expect((await repo.delete("not-a-valid-id")).ok).toBe(false);
  });

  it("deletes a user exactly once", async () => {
    const user = await repo.create({ name: "Alice", email: "alice@example.com" });

    expect((await repo.delete(user.id)).ok).toBe(true);
    expect((await repo.delete(user.id)).ok).toBe(false);
    expect(await repo.findAll()).toEqual([]);
  });
});
