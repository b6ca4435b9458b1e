/**
 * GraphQL Resolvers
 *
 * Maps each GraphQL field to one application service call.
 * Not-found outcomes arrive here as null or false, never as errors.
 */

import type { Resolvers } from "../transport/types.js";
import type { Context } from "./context.js";
import type { User } from "../domain/entities.js";

// ============================================
// Query Resolvers
// ============================================

const queryResolvers = {
  users: async (_parent: unknown, _args: unknown, ctx: Context) => {
    const users = await ctx.services.userQuery.listUsers();
    return users.map(userToGraphQL);
  },

  userById: async (_parent: unknown, args: { id: string }, ctx: Context) => {
    const user = await ctx.services.userQuery.getUser({ id: args.id });
    return user ? userToGraphQL(user) : null;
  },
};

// ============================================
// Mutation Resolvers
// ============================================

const mutationResolvers = {
  addUser: async (
    _parent: unknown,
    args: { name: string; email: string },
    ctx: Context
  ) => {
    const user = await ctx.services.userCommand.addUser({
      name: args.name,
      email: args.email,
    });
    ctx.logger.info({ userId: user.id }, "user added");
    return userToGraphQL(user);
  },

  deleteUser: async (_parent: unknown, args: { id: string }, ctx: Context) => {
    const deleted = await ctx.services.userCommand.deleteUser({ id: args.id });
    if (deleted) {
      ctx.logger.info({ userId: args.id }, "user deleted");
    }
    return deleted;
  },
};

// ============================================
// Domain to GraphQL Mappers
// ============================================

function userToGraphQL(user: User) {
  return {
    id: user.id,
    name: user.name,
    email: user.email,
  };
}

// ============================================
// Export Combined Resolvers
// ============================================

export const resolvers: Resolvers<Context> = {
  Query: queryResolvers,
  Mutation: mutationResolvers,
};
