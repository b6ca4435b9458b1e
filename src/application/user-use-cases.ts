/**
 * User Use Cases
 *
 * Application-level operations over the user repository. Each method is a
 * single repository call; not-found results are turned into the absence
 * values the API exposes.
 */

import { okOrNull, type User } from "../domain/index.js";
import type { UserRepository } from "../infrastructure/repositories.js";

// ============================================
// Query Use Cases
// ============================================

export interface GetUserQuery {
  readonly id: string;
}

export class UserQueryService {
  constructor(private readonly userRepo: UserRepository) {}

  async listUsers(): Promise<User[]> {
    return this.userRepo.findAll();
  }

  /** Resolves to null when no user has the id, or the id is malformed. */
  async getUser(query: GetUserQuery): Promise<User | null> {
    return okOrNull(await this.userRepo.findById(query.id));
  }
}

// ============================================
// Command Use Cases
// ============================================

export interface AddUserCommand {
  readonly name: string;
  readonly email: string;
}

export interface DeleteUserCommand {
  readonly id: string;
}

export class UserCommandService {
  constructor(private readonly userRepo: UserRepository) {}

  async addUser(command: AddUserCommand): Promise<User> {
    return this.userRepo.create({ name: command.name, email: command.email });
  }

  /** Resolves to true only when a record was removed. */
  async deleteUser(command: DeleteUserCommand): Promise<boolean> {
    const result = await this.userRepo.delete(command.id);
    return result.ok;
  }
}
