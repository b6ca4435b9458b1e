import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryUserRepository } from "../infrastructure/repositories.js";
import { UserCommandService, UserQueryService } from "./user-use-cases.js";

describe("user use cases", () => {
  let queries: UserQueryService;
  let commands: UserCommandService;

  beforeEach(() => {
    const repo = new InMemoryUserRepository();
    queries = new UserQueryService(repo);
    commands = new UserCommandService(repo);
  });

  it("lists no users on an empty store", async () => {
    expect(await queries.listUsers()).toEqual([]);
  });

  it("reads back an added user", async () => {
    const added = await commands.addUser({ name: "Alice", email: "alice@example.com" });

    expect(await queries.getUser({ id: added.id })).toEqual({
      id: added.id,
      name: "Alice",
      email: "alice@example.com",
    });
  });

  it("returns null for unknown and malformed ids", async () => {
    expect(await queries.getUser({ id: "64b7f0c2a1b2c3d4e5f60718" })).toBeNull();
    expect(await queries.getUser({ id: "not-a-valid-id" })).toBeNull();
  });

  it("reports whether a delete removed a user", async () => {
    const added = await commands.addUser({ name: "Alice", email: "alice@example.com" });

    expect(await commands.deleteUser({ id: added.id })).toBe(true);
    expect(await commands.deleteUser({ id: added.id })).toBe(false);
    expect(await commands.deleteUser({ id: "not-a-valid-id" })).toBe(false);
  });
});
