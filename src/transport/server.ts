/**
 * GraphQL Server Implementation
 *
 * Serves a schema-first GraphQL endpoint over `node:http`, with the
 * GraphiQL explorer, a plaintext liveness root and a health check.
 */

import * as http from 'node:http';
import {
  buildSchema,
  execute,
  getOperationAST,
  isObjectType,
  parse,
  specifiedRules,
  validate,
  GraphQLError,
  NoSchemaIntrospectionCustomRule,
} from 'graphql';
import type { DocumentNode, GraphQLSchema, ValidationRule } from 'graphql';
import type { Logger } from 'pino';
import { z } from 'zod';
import type {
  BaseContext,
  ContextFactory,
  ExecutionResult,
  GraphQLRequest,
  Resolvers,
  ServerOptions,
} from './types.js';
import { createBaseContext } from './context.js';
import {
  formatError,
  BadRequestError,
  MethodNotAllowedError,
  RouteNotFoundError,
  ServiceError,
  MASKED_ERROR_MESSAGE,
} from './errors.js';
import { generatePlaygroundHTML, acceptsHTML } from './playground.js';

/**
 * Default server options.
 */
const DEFAULT_OPTIONS: Required<ServerOptions> = {
  port: 5050,
  host: '0.0.0.0',
  endpoint: '/graphql',
  introspection: true,
  playground: true,
  maskErrors: false,
  rootMessage: 'GraphQL user service is running',
};

/**
 * CORS configuration options.
 */
export interface CorsOptions {
  /**
   * Allowed origins. Use '*' for all origins or an array of specific origins.
   * @default '*'
   */
  readonly origin?: string | string[];
}

const CORS_METHODS = ['GET', 'POST', 'OPTIONS'];
const CORS_ALLOWED_HEADERS = ['Content-Type', 'X-Request-ID'];
const CORS_EXPOSED_HEADERS = ['X-Request-ID'];
const CORS_MAX_AGE = 86400;

/**
 * Applies CORS headers to a response.
 */
function applyCorsHeaders(
  res: http.ServerResponse,
  req: http.IncomingMessage,
  options: CorsOptions = {}
): void {
  const origin = options.origin ?? '*';
  const requestOrigin = req.headers.origin || '*';

  if (origin === '*') {
    res.setHeader('Access-Control-Allow-Origin', '*');
  } else if (Array.isArray(origin)) {
    res.setHeader('Vary', 'Origin');
    if (origin.includes(requestOrigin)) {
      res.setHeader('Access-Control-Allow-Origin', requestOrigin);
    }
  } else {
    res.setHeader('Access-Control-Allow-Origin', origin);
  }

  res.setHeader('Access-Control-Allow-Methods', CORS_METHODS.join(', '));
  res.setHeader('Access-Control-Allow-Headers', CORS_ALLOWED_HEADERS.join(', '));
  res.setHeader('Access-Control-Expose-Headers', CORS_EXPOSED_HEADERS.join(', '));
  res.setHeader('Access-Control-Max-Age', String(CORS_MAX_AGE));
}

/**
 * Creates a CORS middleware helper.
 * Returns true when the request was a preflight and has been answered.
 */
export function corsMiddleware(options: CorsOptions = {}): (
  req: http.IncomingMessage,
  res: http.ServerResponse
) => boolean {
  return (req, res) => {
    applyCorsHeaders(res, req, options);

    if (req.method === 'OPTIONS') {
      res.statusCode = 204;
      res.end();
      return true;
    }

    return false;
  };
}

/**
 * Server configuration.
 */
export interface ServerConfig<TContext extends BaseContext> {
  /**
   * GraphQL SDL.
   */
  readonly schema: string;

  readonly resolvers: Resolvers<TContext>;

  /**
   * Builds the context passed to every resolver of one operation.
   */
  readonly context: ContextFactory<TContext>;

  readonly logger: Logger;

  readonly options?: ServerOptions;

  /**
   * CORS configuration. Set to false to disable CORS.
   */
  readonly cors?: CorsOptions | false;
}

export interface GraphQLServer {
  /**
   * Starts the server.
   */
  listen(options?: { port?: number; host?: string }): Promise<ServerInfo>;

  /**
   * Stops the server gracefully.
   */
  stop(): Promise<void>;

  /**
   * Executes a GraphQL operation in-process.
   */
  execute<TData = Record<string, unknown>>(
    request: GraphQLRequest
  ): Promise<ExecutionResult<TData>>;

  /**
   * The request listener, usable without `listen()`.
   */
  readonly handler: http.RequestListener;

  /**
   * Returns the underlying HTTP server (if started).
   */
  readonly httpServer: http.Server | null;
}

/**
 * Server info returned after starting.
 */
export interface ServerInfo {
  readonly url: string;
  readonly port: number;
  readonly host: string;
}

const RequestBodySchema = z.object({
  query: z.string().optional(),
  variables: z.record(z.unknown()).nullish(),
  operationName: z.string().nullish(),
});

const VariablesSchema = z.record(z.unknown());

type RequestBody = z.infer<typeof RequestBodySchema>;

/**
 * Reads the request body as a string.
 */
function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = '';
    req.setEncoding('utf-8');

    req.on('data', (chunk: string) => {
      body += chunk;
    });
    req.on('end', () => resolve(body));
    req.on('error', reject);
  });
}

/**
 * Parses the request body based on content type.
 */
function parseRequestBody(body: string, contentType: string): GraphQLRequest {
  if (contentType.includes('application/graphql')) {
    return toGraphQLRequest({ query: body });
  }

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    if (contentType.includes('application/json')) {
      throw new BadRequestError('Request body is not valid JSON');
    }
    // Treat as raw query
    return toGraphQLRequest({ query: body });
  }

  const parsed = RequestBodySchema.safeParse(json);
  if (!parsed.success) {
    throw new BadRequestError('Invalid GraphQL request body');
  }
  return toGraphQLRequest(parsed.data);
}

function toGraphQLRequest(body: RequestBody): GraphQLRequest {
  if (!body.query) {
    throw new BadRequestError('Missing query in request body');
  }
  return {
    query: body.query,
    variables: body.variables ?? undefined,
    operationName: body.operationName ?? undefined,
  };
}

/**
 * Reads a GraphQL request from the URL parameters of a GET request.
 */
function parseQueryParams(params: URLSearchParams): GraphQLRequest {
  const query = params.get('query');
  if (!query) {
    throw new BadRequestError('Missing query parameter');
  }

  const rawVariables = params.get('variables');
  let variables: Record<string, unknown> | undefined;
  if (rawVariables) {
    let json: unknown;
    try {
      json = JSON.parse(rawVariables);
    } catch {
      throw new BadRequestError('Invalid variables parameter');
    }
    const parsed = VariablesSchema.safeParse(json);
    if (!parsed.success) {
      throw new BadRequestError('Invalid variables parameter');
    }
    variables = parsed.data;
  }

  return {
    query,
    variables,
    operationName: params.get('operationName') ?? undefined,
  };
}

/**
 * Sends a JSON response.
 */
function sendJson(
  res: http.ServerResponse,
  statusCode: number,
  data: unknown
): void {
  const json = JSON.stringify(data);
  res.statusCode = statusCode;
  res.setHeader('Content-Type', 'application/json; charset=utf-8');
  res.setHeader('Content-Length', Buffer.byteLength(json));
  res.end(json);
}

/**
 * Sends an HTML response.
 */
function sendHtml(
  res: http.ServerResponse,
  statusCode: number,
  html: string
): void {
  res.statusCode = statusCode;
  res.setHeader('Content-Type', 'text/html; charset=utf-8');
  res.setHeader('Content-Length', Buffer.byteLength(html));
  res.end(html);
}

/**
 * Sends a plaintext response.
 */
function sendText(
  res: http.ServerResponse,
  statusCode: number,
  text: string
): void {
  res.statusCode = statusCode;
  res.setHeader('Content-Type', 'text/plain; charset=utf-8');
  res.setHeader('Content-Length', Buffer.byteLength(text));
  res.end(text);
}

/**
 * Builds a GraphQL schema from SDL and attaches the resolvers to its fields.
 * @throws Error when a resolver names a type or field the schema lacks
 */
function buildExecutableSchema<TContext extends BaseContext>(
  schemaSource: string,
  resolvers: Resolvers<TContext>
): GraphQLSchema {
  const schema = buildSchema(schemaSource);

  for (const [typeName, typeResolvers] of Object.entries(resolvers)) {
    const type = schema.getType(typeName);
    if (!isObjectType(type)) {
      throw new Error(`Resolvers given for unknown object type "${typeName}"`);
    }

    const fields = type.getFields();
    for (const [fieldName, resolver] of Object.entries(typeResolvers ?? {})) {
      const field = fields[fieldName];
      if (!field) {
        throw new Error(`Resolver given for unknown field "${typeName}.${fieldName}"`);
      }
      field.resolve = resolver;
    }
  }

  return schema;
}

/**
 * Converts http.IncomingMessage headers to Headers object.
 */
function convertHeaders(incomingHeaders: http.IncomingHttpHeaders): Headers {
  const headers = new Headers();
  for (const [key, value] of Object.entries(incomingHeaders)) {
    if (value) {
      if (Array.isArray(value)) {
        for (const v of value) {
          headers.append(key, v);
        }
      } else {
        headers.set(key, value);
      }
    }
  }
  return headers;
}

/**
 * Creates a new GraphQL server.
 *
 * @example
 * ```typescript
 * const server = createServer({
 *   schema: `type Query { hello: String! }`,
 *   resolvers: { Query: { hello: () => 'Hello, world!' } },
 *   context: (base) => base,
 *   logger,
 * });
 *
 * const info = await server.listen({ port: 4000 });
 * ```
 */
export function createServer<TContext extends BaseContext>(
  config: ServerConfig<TContext>
): GraphQLServer {
  const options = { ...DEFAULT_OPTIONS, ...config.options };
  const corsOptions = config.cors !== false ? (config.cors || {}) : null;
  const logger = config.logger;

  const schema = buildExecutableSchema(config.schema, config.resolvers);
  const validationRules: ReadonlyArray<ValidationRule> = options.introspection
    ? specifiedRules
    : [...specifiedRules, NoSchemaIntrospectionCustomRule];

  let httpServer: http.Server | null = null;

  // Execute a GraphQL operation
  const executeOperation = async <TData>(
    request: GraphQLRequest,
    base: BaseContext,
    allowMutations: boolean
  ): Promise<ExecutionResult<TData>> => {
    const format = (error: GraphQLError) =>
      formatError(error, { maskErrors: options.maskErrors, logger: base.logger });

    let document: DocumentNode;
    try {
      document = parse(request.query);
    } catch (error) {
      if (error instanceof GraphQLError) {
        return { errors: [format(error)] };
      }
      throw error;
    }

    const validationErrors = validate(schema, document, validationRules);
    if (validationErrors.length > 0) {
      return { errors: validationErrors.map(format) };
    }

    if (!allowMutations) {
      const operation = getOperationAST(document, request.operationName);
      if (operation && operation.operation !== 'query') {
        throw new MethodNotAllowedError(
          `Cannot execute a ${operation.operation} over GET`,
          'POST'
        );
      }
    }

    const contextValue = await config.context(base);
    const result = await execute({
      schema,
      document,
      variableValues: request.variables,
      operationName: request.operationName,
      contextValue,
    });

    return {
      data: result.data as TData | null | undefined,
      errors: result.errors?.map(format),
    };
  };

  const handleGraphQL = async (
    req: http.IncomingMessage,
    res: http.ServerResponse,
    url: URL,
    base: BaseContext
  ): Promise<void> => {
    if (req.method === 'GET') {
      if (options.playground && acceptsHTML(base.request.headers)) {
        sendHtml(res, 200, generatePlaygroundHTML({ endpoint: options.endpoint }));
        return;
      }

      const result = await executeOperation(parseQueryParams(url.searchParams), base, false);
      sendJson(res, 200, result);
      return;
    }

    if (req.method === 'POST') {
      const body = await readBody(req);
      const request = parseRequestBody(body, req.headers['content-type'] || '');
      const result = await executeOperation(request, base, true);
      sendJson(res, 200, result);
      return;
    }

    throw new MethodNotAllowedError('Method not allowed', 'GET, POST, OPTIONS');
  };

  const handleRequest = async (
    req: http.IncomingMessage,
    res: http.ServerResponse
  ): Promise<void> => {
    const startedAt = Date.now();
    const url = new URL(req.url || '/', `http://${req.headers.host || 'localhost'}`);
    const base = createBaseContext(
      {
        headers: convertHeaders(req.headers),
        method: req.method || 'GET',
        url: req.url || '/',
        remoteAddress: req.socket.remoteAddress,
      },
      logger
    );

    res.setHeader('X-Request-ID', base.request.id);
    res.on('finish', () => {
      base.logger.debug(
        {
          method: base.request.method,
          path: url.pathname,
          status: res.statusCode,
          ip: base.request.ip,
          durationMs: Date.now() - startedAt,
        },
        'request completed'
      );
    });

    if (corsOptions && corsMiddleware(corsOptions)(req, res)) {
      return;
    }

    try {
      if (url.pathname === options.endpoint) {
        await handleGraphQL(req, res, url, base);
      } else if (url.pathname === '/' && req.method === 'GET') {
        sendText(res, 200, options.rootMessage);
      } else if (url.pathname === '/health' && req.method === 'GET') {
        sendJson(res, 200, { status: 'ok' });
      } else {
        throw new RouteNotFoundError(url.pathname);
      }
    } catch (error) {
      if (error instanceof ServiceError) {
        if (error instanceof MethodNotAllowedError) {
          res.setHeader('Allow', error.allow);
        }
        sendJson(res, error.statusCode, { errors: [error.toGraphQL()] });
        return;
      }

      base.logger.error({ err: error }, 'request failed');
      const message =
        options.maskErrors || !(error instanceof Error) ? MASKED_ERROR_MESSAGE : error.message;
      sendJson(res, 500, {
        errors: [{ message, extensions: { code: 'INTERNAL_SERVER_ERROR' } }],
      });
    }
  };

  const handler: http.RequestListener = (req, res) => {
    handleRequest(req, res).catch((error: unknown) => {
      logger.error({ err: error }, 'failed to send response');
      res.destroy();
    });
  };

  return {
    handler,

    get httpServer() {
      return httpServer;
    },

    async listen(listenOptions) {
      const port = listenOptions?.port ?? options.port;
      const host = listenOptions?.host ?? options.host;
      const server = http.createServer(handler);

      await new Promise<void>((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, host, () => {
          server.off('error', reject);
          resolve();
        });
      });
      httpServer = server;

      const address = server.address();
      const boundPort = typeof address === 'object' && address !== null ? address.port : port;
      const url = `http://${host}:${boundPort}`;

      logger.info({ url: `${url}${options.endpoint}` }, 'server listening');
      if (options.playground) {
        logger.info({ url: `${url}${options.endpoint}` }, 'GraphiQL available');
      }

      return { url, port: boundPort, host };
    },

    async stop() {
      const server = httpServer;
      if (!server) {
        return;
      }

      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) {
            reject(err);
          } else {
            resolve();
          }
        });
      });
      httpServer = null;
      logger.info('server stopped');
    },

    async execute<TData = Record<string, unknown>>(request: GraphQLRequest) {
      const base = createBaseContext(
        { headers: new Headers(), method: 'POST', url: options.endpoint },
        logger
      );
      return executeOperation<TData>(request, base, true);
    },
  };
}
