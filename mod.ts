// Copyright 2018-2024 the oak authors. All rights reserved.

/**
 * arbor is a framework for JSON APIs on Node.js which routes requests through
 * a hierarchy of endpoints, running an exactly ordered chain of lifecycle
 * hooks around the handler of each request.
 *
 * ## Basic usage
 *
 * Import the {@linkcode Router}, create an instance of it, register endpoints
 * on the router, and then call the `.listen()` method on the router to start
 * listening for requests:
 *
 * ```ts
 * import { Router } from "arbor";
 *
 * const router = new Router();
 * router.get("/", (ctx) => {
 *   ctx.response.body = { hello: "world" };
 * });
 * router.listen({ port: 3000 });
 * ```
 *
 * The router can also be used without listening, by passing Fetch API
 * {@linkcode Request} objects to `.handle()`, or by handing `.fetch` to a
 * server which takes a fetch handler.
 *
 * ## Endpoints and the hierarchy
 *
 * An endpoint is registered for a method and path template, where parameters
 * are written as `{name}`. An endpoint bundles:
 *
 * - `metadata` hooks, which populate request scoped values on
 *   `ctx.metadata`,
 * - `before` hooks,
 * - a `handler`,
 * - `after` hooks.
 *
 * The hooks of an endpoint apply to every request for a deeper path with the
 * same method. For a request to `GET /api/users/1`, the hooks of `GET /api`
 * and `GET /api/users` run as well. Endpoints registered with `.all()` apply
 * to requests of any method below their path.
 *
 * The hooks of a request run in this order:
 *
 * 1. global `around` hooks, the first registered being outermost,
 * 2. global `before` hooks,
 * 3. the metadata hooks of the hierarchy, shallowest first,
 * 4. the before hooks of the hierarchy, shallowest first,
 * 5. the handler of the matched endpoint,
 * 6. the after hooks of the hierarchy, deepest first,
 * 7. global `after` hooks.
 *
 * ## Halting
 *
 * Calling `ctx.halt()` stops processing and the response is sent as it is.
 *
 * ```ts
 * router.before((ctx) => {
 *   if (!ctx.request.header("authorization")) {
 *     ctx.halt({ status: 401, body: { error: "Unauthorized" } });
 *   }
 * });
 * ```
 *
 * ## Rescuing errors
 *
 * Errors thrown while processing a request can be handled with
 * `.rescueFrom()`. The hook registered for the nearest class of the error is
 * used. Errors which are not rescued result in a `500 Internal Server Error`,
 * or for HTTP errors raised with `ctx.throw()`, the status of the error.
 *
 * ## Validation
 *
 * The merged parameters of a request (query string, JSON body and path
 * parameters) and the bodies of responses can be validated with
 * [valibot](https://valibot.dev/) schemas, which is re-exported as `v`:
 *
 * ```ts
 * import { Router, v } from "arbor";
 *
 * const router = new Router();
 * router.put("/statistics/{id}", {
 *   schema: {
 *     params: v.object({ id: v.pipe(v.string(), v.digits()) }),
 *     responses: { 200: v.object({ status: v.string() }) },
 *   },
 *   handler(ctx) {
 *     ctx.response.body = { status: `ok for ${ctx.params.id}` };
 *   },
 * });
 * ```
 *
 * ## Route files
 *
 * {@linkcode loadRoutes} registers endpoints from a directory of route files,
 * where the directories give the path and the file name gives the method.
 *
 * ## Logging
 *
 * arbor logs with [pino](https://getpino.io/). To enable logging, provide a
 * {@linkcode LoggerOptions} object on the property `logger` to the router when
 * creating it, or set it to `true` to log events at the `"warn"` level to the
 * console.
 *
 * @module
 */

/**
 * The re-export of the [valibot](https://valibot.dev/guides/introduction/)
 * library which is used for schema validation in arbor.
 */
export * as v from "valibot";
export { StatusCodes } from "http-status-codes";

export { Context } from "./context.ts";
export {
  Endpoint,
  type EndpointInit,
  type Handler,
  type Hook,
} from "./endpoint.ts";
export {
  ancestry,
  type ErrorKind,
  ExceptionHandlers,
  type ExceptionHook,
} from "./exception_handlers.ts";
export type { LevelName, LoggerOptions } from "./logger.ts";
export type { RouteOptions } from "./path_pattern.ts";
export { RouteRequest, type ResolveParamsResult } from "./request.ts";
export { type HaltInit, HaltSignal, RouteResponse } from "./response.ts";
export {
  defineRoute,
  type LoadedRoute,
  loadRoutes,
  type LoadRoutesOptions,
  RouteLoadError,
} from "./route_loader.ts";
export { type RouteEntry, RouteTable } from "./route_table.ts";
export {
  type AroundHook,
  type ErrorDetails,
  type HandledDetails,
  type ListenOptions,
  type RouteDescriptor,
  Router,
  type RouterOptions,
} from "./router.ts";
export type {
  BodySchema,
  SchemaDescriptor,
  ValidationDetails,
} from "./schema.ts";
export type {
  Addr,
  EndpointMethod,
  FallbackHandler,
  HttpMethod,
  Metadata,
  ParamsDictionary,
  RequestEvent,
  RequestServer,
  RouteMatch,
} from "./types.ts";
