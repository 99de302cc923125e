// Copyright 2018-2024 the oak authors. All rights reserved.

/**
 * Discovers endpoints from a directory of route files. The directories of a
 * file give the path of the route, with `$name` directories becoming `{name}`
 * parameters, and the name of the file gives the method:
 *
 * ```
 * routes/
 *   api/
 *     all.ts            -> catch-all for /api
 *     users/
 *       $id/
 *         get.ts        -> GET /api/users/{id}
 * ```
 *
 * Each route file default exports an endpoint definition, typically created
 * with {@linkcode defineRoute}.
 *
 * @module
 */

import { readdir } from "node:fs/promises";
import { extname, join, resolve, sep } from "node:path";
import { pathToFileURL } from "node:url";
import * as v from "valibot";

import { Endpoint, type EndpointInit, type Hook } from "./endpoint.ts";
import { getLogger } from "./logger.ts";
import type { Router } from "./router.ts";
import type { SchemaDescriptor } from "./schema.ts";
import type { EndpointMethod } from "./types.ts";
import { isRecord } from "./utils.ts";

/** The file names which are recognised as route files. */
export const ROUTE_METHODS = [
  "all",
  "get",
  "post",
  "put",
  "patch",
  "delete",
  "head",
  "options",
] as const;

const DEFAULT_EXTENSIONS = [".ts", ".mts", ".js", ".mjs"];

export interface LoadRoutesOptions {
  /** The directory which contains the route files. */
  directory: string;
  /**
   * The extensions of route files.
   *
   * @default [".ts", ".mts", ".js", ".mjs"]
   */
  extensions?: string[];
}

/** A route which was registered by {@linkcode loadRoutes}. */
export interface LoadedRoute {
  method: EndpointMethod;
  path: string;
  /** The absolute path of the route file. */
  source: string;
}

/** Raised when a route file is misnamed or does not export an endpoint. */
export class RouteLoadError extends Error {
  readonly source: string;

  constructor(message: string, source: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "RouteLoadError";
    this.source = source;
  }
}

const hookSchema = v.custom<Hook>((input) => typeof input === "function");

const endpointInitSchema = v.object({
  description: v.optional(v.string()),
  metadata: v.optional(v.union([hookSchema, v.array(hookSchema)])),
  before: v.optional(v.union([hookSchema, v.array(hookSchema)])),
  after: v.optional(v.union([hookSchema, v.array(hookSchema)])),
  handler: v.optional(hookSchema),
  schema: v.optional(v.custom<SchemaDescriptor>(isRecord)),
});

/**
 * Define the endpoint of a route file. The value should be the default export
 * of the file.
 *
 * @example
 *
 * ```ts
 * // routes/ping/get.ts
 * import { defineRoute } from "arbor";
 *
 * export default defineRoute({
 *   handler(ctx) {
 *     ctx.response.body = { message: "pong" };
 *   },
 * });
 * ```
 */
export function defineRoute(init: EndpointInit): EndpointInit {
  return init;
}

function isRouteMethod(value: string): value is EndpointMethod {
  return ROUTE_METHODS.some((method) => method === value);
}

/**
 * Determine the method and path of a route file, given the path of the file
 * relative to the routes directory.
 */
export function routeInfo(
  relativePath: string,
): { method: EndpointMethod; path: string } {
  const parts = relativePath.split(/[\\/]/).filter((part) => part.length > 0);
  const file = parts.pop() ?? "";
  const method = file.slice(0, file.length - extname(file).length)
    .toLowerCase();
  if (!isRouteMethod(method)) {
    throw new RouteLoadError(
      `Invalid HTTP method in filename: ${file}. Must be one of: ${
        ROUTE_METHODS.join(", ")
      }`,
      relativePath,
    );
  }
  const segments = parts.map((part) =>
    part.startsWith("$") ? `{${part.slice(1)}}` : part
  );
  return { method, path: `/${segments.join("/")}` };
}

function isRouteFile(file: string, extensions: string[]): boolean {
  return extensions.includes(extname(file)) && !file.endsWith(".d.ts") &&
    !/\.(test|spec)\.[^.]+$/.test(file);
}

/**
 * Find the route files below a directory, relative to it, in the order they
 * are registered: catch-all files first, then the others, each by depth and
 * then by path.
 */
export async function findRouteFiles(
  directory: string,
  extensions: string[] = DEFAULT_EXTENSIONS,
): Promise<string[]> {
  const entries = await readdir(directory, { recursive: true });
  const files = entries.filter((entry) => isRouteFile(entry, extensions));
  const rank = (file: string): [number, number] => {
    const name = file.split(sep).at(-1) ?? file;
    const isAll = name.slice(0, name.length - extname(name).length) === "all";
    return [isAll ? 0 : 1, file.split(sep).length];
  };
  return files.sort((a, b) => {
    const [allA, depthA] = rank(a);
    const [allB, depthB] = rank(b);
    return allA - allB || depthA - depthB || (a < b ? -1 : a > b ? 1 : 0);
  });
}

const registered = new WeakMap<Router, Set<string>>();

async function importRoute(source: string): Promise<EndpointInit> {
  let mod: unknown;
  try {
    mod = await import(pathToFileURL(source).href);
  } catch (cause) {
    throw new RouteLoadError(`Unable to import route file: ${source}`, source, {
      cause,
    });
  }
  const init = isRecord(mod) ? mod.default : undefined;
  const result = v.safeParse(endpointInitSchema, init);
  if (!result.success) {
    throw new RouteLoadError(
      `Route file does not default export an endpoint: ${source}`,
      source,
      { cause: new v.ValiError(result.issues) },
    );
  }
  return result.output;
}

/**
 * Register the endpoints of every route file below a directory with a router.
 * A file is registered with a router at most once, loading the same directory
 * again registers only new files.
 */
export async function loadRoutes(
  router: Router,
  options: LoadRoutesOptions,
): Promise<LoadedRoute[]> {
  const logger = getLogger("arbor.route_loader");
  const directory = resolve(options.directory);
  const files = await findRouteFiles(directory, options.extensions);
  let seen = registered.get(router);
  if (!seen) {
    seen = new Set();
    registered.set(router, seen);
  }
  const loaded: LoadedRoute[] = [];
  for (const file of files) {
    const source = join(directory, file);
    if (seen.has(source)) {
      logger.debug(`skipping already registered route file: ${source}`);
      continue;
    }
    const { method, path } = routeInfo(file);
    const init = await importRoute(source);
    router.register(method, path, new Endpoint(method, path, init, source));
    seen.add(source);
    logger.debug(`loaded ${method} ${path} from ${source}`);
    loaded.push({ method, path, source });
  }
  logger.info(`loaded ${loaded.length} routes from ${directory}`);
  return loaded;
}
