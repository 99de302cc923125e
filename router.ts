// Copyright 2018-2024 the oak authors. All rights reserved.

/**
 * The main module of arbor that contains the core {@linkcode Router}, which
 * resolves requests against a table of endpoints and runs the lifecycle hooks
 * of the matched endpoint and its parents around the endpoint's handler.
 *
 * @module
 */

import createHttpError from "http-errors";
import { getReasonPhrase, StatusCodes } from "http-status-codes";

import { Context } from "./context.ts";
import {
  Endpoint,
  type EndpointInit,
  type Handler,
  type Hook,
} from "./endpoint.ts";
import {
  type ErrorKind,
  type ExceptionHook,
  ExceptionHandlers,
} from "./exception_handlers.ts";
import {
  configure,
  getLogger,
  type Logger,
  type LoggerOptions,
} from "./logger.ts";
import type { RouteOptions } from "./path_pattern.ts";
import { RouteRequest } from "./request.ts";
import { isHaltSignal, RouteResponse } from "./response.ts";
import { type RouteEntry, RouteTable } from "./route_table.ts";
import NodeRequestServer from "./request_server_node.ts";
import type {
  Addr,
  EndpointMethod,
  FallbackHandler,
  RequestEvent,
  RequestServer,
  RequestServerOptions,
  RouteMatch,
} from "./types.ts";
import { jsonResponse } from "./utils.ts";

/**
 * A hook which wraps the processing of a request. Calling `next` continues
 * processing; a hook which never calls it skips the rest of the pipeline.
 */
export interface AroundHook {
  (context: Context, next: () => Promise<void>): void | Promise<void>;
}

/**
 * The definition of an endpoint, along with the method and path it is
 * registered for.
 */
export interface RouteDescriptor extends EndpointInit {
  method: EndpointMethod;
  path: string;
}

/**
 * Details provided an `onError` hook.
 */
export interface ErrorDetails {
  /**
   * The error message which was generated.
   */
  message: string;
  /**
   * The cause of the error. This is typically an `Error` instance, but can be
   * any value.
   */
  cause: unknown;
  /**
   * The request which was being processed when the error occurred.
   */
  request: Request;
  /**
   * The context of the request, if the error occurred while an endpoint was
   * processing it.
   */
  context?: Context;
  /**
   * If a route was matched, this will be the endpoint that was matched.
   */
  route?: Endpoint;
}

/**
 * Details provided to an `onHandled` hook.
 */
export interface HandledDetails {
  /**
   * The duration in milliseconds that it took to handle the request.
   */
  duration: number;
  request: Request;
  /**
   * The response which is being returned to the client.
   */
  response: Response;
  /**
   * If a route was matched, this will be the endpoint that was matched.
   */
  route?: Endpoint;
}

/**
 * Options which can be specified when listening for requests.
 */
export interface ListenOptions {
  /**
   * The port to listen on. Defaults to `0`, which picks a free port.
   */
  port?: number;
  /**
   * The hostname to listen on. Defaults to `"127.0.0.1"`.
   */
  hostname?: string;
  /**
   * The server constructor to use when listening for requests. Defaults to
   * a server built on `node:http`.
   */
  server?: new (options: RequestServerOptions) => RequestServer;
  /**
   * The signal to use to stop listening for requests. When this signal is
   * aborted, the server will stop listening for requests and finish processing
   * any requests that are currently being handled.
   */
  signal?: AbortSignal;
  /**
   * A callback which is invoked when the server starts listening for requests.
   *
   * The address that the server is listening on is provided.
   */
  onListen?(addr: Addr): void;
}

/**
 * Options which can be specified when creating an instance of
 * {@linkcode Router}.
 */
export interface RouterOptions extends RouteOptions {
  /**
   * A handler for requests which match no route and for which there is no
   * catch-all endpoint. If not set, those requests are responded to with
   * `404 Not Found`.
   */
  fallback?: FallbackHandler;
  /**
   * An optional logger configuration which can be used to configure the
   * integrated logger. There are three ways to output logs:
   *
   * - output logs to the console
   * - output logs to a file
   * - output logs to a stream
   *
   * If the value of the option is `true`, logs will be output to the console at
   * the `"warn"` level. If you provide an object, you can choose the level
   * for each log sink of `console`, `file`, and `stream`.
   *
   * @default false
   *
   * @example Output debug logs to the console
   *
   * ```ts
   * import { Router } from "arbor";
   *
   * const router = new Router({
   *   logger: {
   *     console: { level: "debug" },
   *   },
   * });
   * ```
   */
  logger?: boolean | LoggerOptions;
  /**
   * An optional handler when an error escapes the processing of a request.
   *
   * The handler can return a {@linkcode Response} which will be sent to the
   * client instead of the default `500 Internal Server Error`.
   */
  onError?(
    details: ErrorDetails,
  ): Promise<Response | undefined | void> | Response | undefined | void;
  /**
   * A callback which is invoked each time the router completes handling a
   * request.
   */
  onHandled?(details: HandledDetails): Promise<void> | void;
  /**
   * A callback that is invoked each time a request is presented to the router.
   */
  onRequest?(request: Request): Promise<void> | void;
}

function toInit(handlerOrInit: Handler | EndpointInit): EndpointInit {
  return typeof handlerOrInit === "function"
    ? { handler: handlerOrInit }
    : handlerOrInit;
}

function reasonPhrase(status: number): string {
  try {
    return getReasonPhrase(status);
  } catch {
    return "Error";
  }
}

/**
 * The main class of arbor, which provides the functionality of receiving
 * requests and routing them to endpoints.
 *
 * @example
 *
 * ```ts
 * import { Router } from "arbor";
 *
 * const router = new Router();
 *
 * router.before((ctx) => {
 *   if (!ctx.request.header("authorization")) {
 *     ctx.halt({ status: 401, body: { error: "Unauthorized" } });
 *   }
 * });
 *
 * router.get("/users/{id}", (ctx) => {
 *   ctx.response.body = { id: ctx.params.id };
 * });
 *
 * router.listen({ port: 8080 });
 * ```
 */
export class Router {
  #after: Hook[] = [];
  #around: AroundHook[] = [];
  #before: Hook[] = [];
  #catchAll?: Endpoint;
  #exceptionHandlers = new ExceptionHandlers();
  #fallback?: FallbackHandler;
  #handling = new Set<Promise<void>>();
  #logger: Logger;
  #onError?: RouterOptions["onError"];
  #onHandled?: RouterOptions["onHandled"];
  #onRequest?: RouterOptions["onRequest"];
  #routes: RouteTable;

  #add(
    method: EndpointMethod,
    path: string,
    handlerOrInit: Handler | EndpointInit,
  ): Endpoint {
    const endpoint = new Endpoint(method, path, toInit(handlerOrInit));
    this.register(method, path, endpoint);
    return endpoint;
  }

  async #error(details: ErrorDetails): Promise<Response> {
    const { cause, request } = details;
    this.#logger.error(
      { err: cause },
      `${details.context?.id ?? "-"} error handling ${request.method} ${
        new URL(request.url).pathname
      }: ${details.message}`,
    );
    if (this.#onError) {
      try {
        const maybeResponse = await this.#onError(details);
        if (maybeResponse) {
          this.#logger.debug("responding with onError response");
          return maybeResponse;
        }
      } catch (error) {
        this.#logger.error({ err: error }, "error notification failed");
      }
    }
    if (createHttpError.isHttpError(cause)) {
      return jsonResponse(
        { error: cause.expose ? cause.message : reasonPhrase(cause.status) },
        cause.status,
        cause.headers,
      );
    }
    return jsonResponse(
      { error: "Internal Server Error" },
      StatusCodes.INTERNAL_SERVER_ERROR,
    );
  }

  /**
   * Run the global and hierarchy hooks and the handler for a request. Errors
   * thrown within, other than a halt, are dispatched to the registered
   * exception hooks.
   */
  async #execute(context: Context, match: RouteMatch): Promise<void> {
    const { endpoint, hierarchy } = match;
    const core = async () => {
      for (const hook of this.#before) {
        await hook(context);
      }
      for (const level of hierarchy) {
        for (const hook of level.metadataHooks) {
          await hook(context);
        }
      }
      for (const level of hierarchy) {
        for (const hook of level.beforeHooks) {
          await hook(context);
        }
      }
      if (endpoint.hasHandler()) {
        await endpoint.invoke(context);
      }
      for (const level of [...hierarchy].reverse()) {
        for (const hook of level.afterHooks) {
          await hook(context);
        }
      }
      for (const hook of this.#after) {
        await hook(context);
      }
    };
    const wrapped = this.#around.reduceRight<() => Promise<void>>(
      (next, hook) => async () => {
        await hook(context, next);
      },
      core,
    );
    try {
      await wrapped();
    } catch (error) {
      if (isHaltSignal(error)) {
        throw error;
      }
      const resolved = this.#exceptionHandlers.resolve(error);
      if (!resolved) {
        throw error;
      }
      this.#logger
        .debug(`${context.id} rescuing error with ${resolved.kind.name}`);
      await resolved.hook(error, context);
    }
  }

  #serve(event: RequestEvent): void {
    const promise: Promise<void> = this.handle(event.request, event.addr)
      .then((response) => event.respond(response))
      .catch((cause) => {
        this.#logger.error({ err: cause }, `${event.id} error responding`);
        if (!event.responded) {
          return event.respond(
            jsonResponse(
              { error: "Internal Server Error" },
              StatusCodes.INTERNAL_SERVER_ERROR,
            ),
          );
        }
      })
      .catch((cause) => {
        this.#logger.error({ err: cause }, `${event.id} response failed`);
      })
      .finally(() => {
        this.#handling.delete(promise);
      });
    this.#handling.add(promise);
  }

  constructor(options: RouterOptions = {}) {
    const {
      fallback,
      logger,
      onError,
      onHandled,
      onRequest,
      ...routeOptions
    } = options;
    this.#fallback = fallback;
    this.#onError = onError;
    this.#onHandled = onHandled;
    this.#onRequest = onRequest;
    if (logger) {
      configure(typeof logger === "object" ? logger : undefined);
    }
    this.#logger = getLogger("arbor.router");
    this.#routes = new RouteTable(routeOptions);
  }

  /**
   * Register an endpoint for a method and path template. Path templates can
   * contain parameters as `{name}` placeholders. Registering a method and path
   * which is already registered replaces the existing endpoint.
   */
  register(method: EndpointMethod, path: string, endpoint: Endpoint): void {
    if (!path.startsWith("/")) {
      throw new TypeError(`Route paths must start with "/", got "${path}".`);
    }
    this.#logger.debug(`registering ${method} ${path}`);
    this.#routes.register(method, path, endpoint);
  }

  /**
   * Define an endpoint based on the provided descriptor.
   */
  route(descriptor: RouteDescriptor): Endpoint {
    const { method, path, ...init } = descriptor;
    return this.#add(method, path, init);
  }

  /**
   * Register a catch-all endpoint at a path, which applies to requests of any
   * method. The hooks of the endpoint run for every request below the path.
   */
  all(path: string, handlerOrInit: Handler | EndpointInit): Endpoint {
    return this.#add("all", path, handlerOrInit);
  }

  /** Register an endpoint for `GET` requests. */
  get(path: string, handlerOrInit: Handler | EndpointInit): Endpoint {
    return this.#add("get", path, handlerOrInit);
  }

  /** Register an endpoint for `HEAD` requests. */
  head(path: string, handlerOrInit: Handler | EndpointInit): Endpoint {
    return this.#add("head", path, handlerOrInit);
  }

  /** Register an endpoint for `OPTIONS` requests. */
  options(path: string, handlerOrInit: Handler | EndpointInit): Endpoint {
    return this.#add("options", path, handlerOrInit);
  }

  /** Register an endpoint for `POST` requests. */
  post(path: string, handlerOrInit: Handler | EndpointInit): Endpoint {
    return this.#add("post", path, handlerOrInit);
  }

  /** Register an endpoint for `PUT` requests. */
  put(path: string, handlerOrInit: Handler | EndpointInit): Endpoint {
    return this.#add("put", path, handlerOrInit);
  }

  /** Register an endpoint for `PATCH` requests. */
  patch(path: string, handlerOrInit: Handler | EndpointInit): Endpoint {
    return this.#add("patch", path, handlerOrInit);
  }

  /** Register an endpoint for `DELETE` requests. */
  delete(path: string, handlerOrInit: Handler | EndpointInit): Endpoint {
    return this.#add("delete", path, handlerOrInit);
  }

  /**
   * Set the endpoint which handles requests that match no route. Its hooks
   * and handler run through the full pipeline, before any fallback is
   * considered.
   */
  catchAll(handlerOrInit: Handler | EndpointInit): Endpoint {
    this.#catchAll = new Endpoint("all", "*", toInit(handlerOrInit));
    return this.#catchAll;
  }

  /** Add a hook which runs before the hooks of every endpoint. */
  before(hook: Hook): this {
    this.#before.push(hook);
    return this;
  }

  /** Add a hook which runs after the hooks of every endpoint. */
  after(hook: Hook): this {
    this.#after.push(hook);
    return this;
  }

  /**
   * Add a hook which wraps the processing of every request. The first hook
   * added is the outermost.
   */
  around(hook: AroundHook): this {
    this.#around.push(hook);
    return this;
  }

  /**
   * Register a hook which recovers from errors of a kind, including its
   * subclasses, thrown while processing a request. The hook registered for
   * the nearest kind of an error is used.
   */
  rescueFrom<E extends Error>(
    kind: ErrorKind<E>,
    hook: ExceptionHook<E>,
  ): this {
    this.#exceptionHandlers.register(kind, hook);
    return this;
  }

  /**
   * Resolve a method and path against the registered routes, returning the
   * matched endpoint and its hierarchy.
   *
   * This is intended to be used for testing purposes.
   */
  match(method: string, path: string): RouteMatch | undefined {
    return this.#routes.find(method, path);
  }

  /** Remove every route and the catch-all endpoint. */
  reset(): void {
    this.#logger.debug("resetting routes");
    this.#routes.reset();
    this.#catchAll = undefined;
  }

  /** The registered routes, in registration order. */
  routes(): RouteEntry[] {
    return [...this.#routes];
  }

  /**
   * Handle a request, resolving with the response to send to the client.
   */
  async handle(request: Request, addr?: Addr): Promise<Response> {
    const start = performance.now();
    const { pathname } = new URL(request.url);
    let context: Context | undefined;
    let route: Endpoint | undefined;
    let response: Response;
    try {
      await this.#onRequest?.(request);
      const match = this.#routes.find(request.method, pathname) ??
        (this.#catchAll
          ? { endpoint: this.#catchAll, hierarchy: [this.#catchAll] }
          : undefined);
      if (match) {
        route = match.endpoint;
        context = new Context(
          new RouteRequest(request, {
            params: match.params,
            schema: match.endpoint.schema,
            addr,
          }),
          new RouteResponse(),
        );
        this.#logger
          .debug(`${context.id} matched ${route.method} ${route.path}`);
        try {
          await this.#execute(context, match);
          response = context.response.toResponse();
        } catch (error) {
          if (!isHaltSignal(error)) {
            throw error;
          }
          this.#logger.debug(`${context.id} halted`);
          response = error.response.toResponse();
        }
      } else if (this.#fallback) {
        this.#logger
          .debug(`no route for ${request.method} ${pathname}, fallback`);
        response = await this.#fallback(request);
      } else {
        this.#logger.debug(`no route for ${request.method} ${pathname}`);
        response = jsonResponse({ error: "Not Found" }, StatusCodes.NOT_FOUND);
      }
    } catch (cause) {
      response = await this.#error({
        message: cause instanceof Error ? cause.message : String(cause),
        cause,
        request,
        context,
        route,
      });
    }
    const duration = performance.now() - start;
    this.#logger.info(
      `${request.method} ${pathname} ${response.status} in ${
        parseFloat(duration.toFixed(2))
      }ms`,
    );
    await this.#onHandled?.({ duration, request, response, route });
    return response;
  }

  /**
   * A fetch handler, for use with servers which take a function from a
   * {@linkcode Request} to a {@linkcode Response}.
   */
  fetch = (request: Request): Promise<Response> => this.handle(request);

  /**
   * Start listening for requests on the provided port and hostname. Resolves
   * once the server has closed, after the signal is aborted.
   */
  async listen(options: ListenOptions = {}): Promise<void> {
    const {
      server: Server = NodeRequestServer,
      port = 0,
      hostname,
      signal,
      onListen,
    } = options;
    const abortController = new AbortController();
    const close = async () => {
      this.#logger.debug("closing server");
      await Promise.all(this.#handling);
      abortController.abort();
    };
    signal?.addEventListener("abort", () => {
      close().catch((cause) => {
        this.#logger.error({ err: cause }, "error closing server");
      });
    }, { once: true });
    const server = new Server({
      port,
      hostname,
      signal: abortController.signal,
    });
    const addr = await server.listen();
    this.#logger.info(`listening on: ${addr.hostname}:${addr.port}`);
    onListen?.(addr);
    for await (const event of server) {
      this.#serve(event);
    }
    await Promise.all(this.#handling);
  }
}
