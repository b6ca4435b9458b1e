/**
 * Core types for the GraphQL transport.
 */

import type { GraphQLResolveInfo } from 'graphql';
import type { Logger } from 'pino';

/**
 * Server options.
 */
export interface ServerOptions {
  /**
   * Port to listen on. `0` picks a free port.
   * @default 5050
   */
  readonly port?: number;

  /**
   * Host to bind to.
   * @default '0.0.0.0'
   */
  readonly host?: string;

  /**
   * Path of the GraphQL endpoint.
   * @default '/graphql'
   */
  readonly endpoint?: string;

  /**
   * Enable introspection queries.
   * @default true
   */
  readonly introspection?: boolean;

  /**
   * Serve the GraphiQL explorer on GET requests that accept HTML.
   * @default true
   */
  readonly playground?: boolean;

  /**
   * Replace messages of unexpected resolver errors with a generic one.
   * @default false
   */
  readonly maskErrors?: boolean;

  /**
   * Plaintext body served at `/`.
   */
  readonly rootMessage?: string;
}

/**
 * Base context interface that all contexts extend.
 */
export interface BaseContext {
  readonly request: RequestInfo;

  /**
   * Logger bound to the request id.
   */
  readonly logger: Logger;
}

/**
 * Request information.
 */
export interface RequestInfo {
  readonly id: string;
  readonly headers: Headers;
  readonly ip: string;
  readonly method: string;
  readonly url: string;
}

/**
 * Builds the per-request context from the base context.
 */
export type ContextFactory<TContext extends BaseContext> = (
  base: BaseContext
) => Promise<TContext> | TContext;

/**
 * A GraphQL operation as received over HTTP.
 */
export interface GraphQLRequest {
  readonly query: string;
  readonly variables?: Record<string, unknown>;
  readonly operationName?: string;
}

/**
 * Field resolver function type.
 *
 * Declared through a method so that resolvers with narrower `args`
 * types can be assigned to it.
 */
export type ResolverFn<TContext> = {
  bivarianceHack(
    parent: unknown,
    args: Record<string, unknown>,
    context: TContext,
    info: GraphQLResolveInfo
  ): unknown;
}['bivarianceHack'];

export type FieldResolvers<TContext> = Record<string, ResolverFn<TContext>>;

/**
 * Resolver map keyed by object type name, then field name.
 */
export interface Resolvers<TContext extends BaseContext> {
  Query?: FieldResolvers<TContext>;
  Mutation?: FieldResolvers<TContext>;
  [typeName: string]: FieldResolvers<TContext> | undefined;
}

/**
 * Execution result as sent to the client.
 */
export interface ExecutionResult<TData = Record<string, unknown>> {
  readonly data?: TData | null;
  readonly errors?: ReadonlyArray<FormattedError>;
}

export interface FormattedError {
  readonly message: string;
  readonly extensions: Record<string, unknown>;
}
