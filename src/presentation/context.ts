/**
 * GraphQL Context
 *
 * Request-scoped context containing the application services.
 * Created fresh for each operation.
 */

import type { BaseContext } from "../transport/types.js";
import type { UserRepository } from "../infrastructure/repositories.js";
import { UserQueryService, UserCommandService } from "../application/index.js";

// ============================================
// Services Container
// ============================================

export interface Services {
  readonly userQuery: UserQueryService;
  readonly userCommand: UserCommandService;
}

function createServices(users: UserRepository): Services {
  return {
    userQuery: new UserQueryService(users),
    userCommand: new UserCommandService(users),
  };
}

// ============================================
// GraphQL Context
// ============================================

export interface Context extends BaseContext {
  /** Application services */
  readonly services: Services;
}

export interface ContextOptions {
  readonly users: UserRepository;
  readonly baseContext: BaseContext;
}

export function createContext(options: ContextOptions): Context {
  const { users, baseContext } = options;

  return {
    ...baseContext,
    services: createServices(users),
  };
}
