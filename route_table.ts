// Copyright 2018-2024 the oak authors. All rights reserved.

/**
 * The route table maps a method and path template to an
 * {@linkcode Endpoint}, resolves concrete request paths against it and
 * assembles the hierarchy of endpoints whose hooks apply to a request.
 *
 * Templates are matched exactly first, then as patterns in registration
 * order. Overlapping patterns for the same method are not ranked, the first
 * one registered wins.
 *
 * @module
 */

import { CATCH_ALL } from "./constants.ts";
import type { Endpoint } from "./endpoint.ts";
import { getLogger, type Logger } from "./logger.ts";
import {
  compilePath,
  type PathMatcher,
  type RouteOptions,
} from "./path_pattern.ts";
import type { RouteMatch } from "./types.ts";
import { splitPath } from "./utils.ts";

/** A registration in the {@linkcode RouteTable}. */
export interface RouteEntry {
  /** The upper case HTTP method, or `"ALL"` for a catch-all. */
  method: string;
  path: string;
  endpoint: Endpoint;
  matcher: PathMatcher;
}

function keyOf(method: string, path: string): string {
  return `${method} ${path}`;
}

export class RouteTable {
  #entries = new Map<string, RouteEntry>();
  #logger: Logger;
  #options: RouteOptions;

  /** The number of registrations. */
  get size(): number {
    return this.#entries.size;
  }

  constructor(options: RouteOptions = {}) {
    this.#options = options;
    this.#logger = getLogger("arbor.route_table");
  }

  /**
   * Register an endpoint for a method and path template. Registering the same
   * method and path again replaces the endpoint, keeping the position of the
   * original registration.
   */
  register(method: string, path: string, endpoint: Endpoint): void {
    const upper = method.toUpperCase();
    const matcher = compilePath(path, this.#options);
    this.#entries.set(keyOf(upper, path), {
      method: upper,
      path,
      endpoint,
      matcher,
    });
    this.#logger.debug(`registered ${upper} ${path}`);
  }

  /** Get the endpoint registered for exactly the method and path template. */
  get(method: string, path: string): Endpoint | undefined {
    return this.#entries.get(keyOf(method.toUpperCase(), path))?.endpoint;
  }

  /**
   * Resolve a request method and concrete path to an endpoint and its
   * hierarchy, or `undefined` when nothing matches.
   */
  find(method: string, path: string): RouteMatch | undefined {
    const upper = method.toUpperCase();
    const exact = this.#entries.get(keyOf(upper, path)) ??
      this.#entries.get(keyOf(CATCH_ALL, path));
    if (exact) {
      this.#logger.debug(`exact match: ${upper} ${path}`);
      return {
        endpoint: exact.endpoint,
        hierarchy: this.#hierarchy(upper, path, exact.endpoint),
      };
    }
    for (const candidate of [upper, CATCH_ALL]) {
      for (const entry of this.#entries.values()) {
        if (entry.method !== candidate) {
          continue;
        }
        const params = entry.matcher.match(path);
        if (params) {
          this.#logger
            .debug(`pattern match: ${upper} ${path} -> ${entry.path}`);
          return {
            endpoint: entry.endpoint,
            hierarchy: this.#hierarchy(upper, path, entry.endpoint),
            params,
          };
        }
      }
    }
    this.#logger.debug(`no match: ${upper} ${path}`);
    return undefined;
  }

  /** Remove every registration. */
  reset(): void {
    this.#entries.clear();
  }

  #endpointAt(method: string, prefix: string): Endpoint | undefined {
    const exact = this.#entries.get(keyOf(method, prefix));
    if (exact) {
      return exact.endpoint;
    }
    for (const entry of this.#entries.values()) {
      if (entry.method === method && entry.matcher.match(prefix)) {
        return entry.endpoint;
      }
    }
    return undefined;
  }

  #hierarchy(method: string, path: string, endpoint: Endpoint): Endpoint[] {
    const segments = splitPath(path);
    const seen = new Set<Endpoint>();
    const hierarchy: Endpoint[] = [];
    const append = (candidate: Endpoint | undefined) => {
      if (candidate && !seen.has(candidate)) {
        seen.add(candidate);
        hierarchy.push(candidate);
      }
    };
    for (let i = 1; i <= segments.length; i++) {
      const prefix = `/${segments.slice(0, i).join("/")}`;
      append(this.#endpointAt(CATCH_ALL, prefix));
      append(this.#endpointAt(method, prefix));
    }
    append(endpoint);
    return hierarchy;
  }

  *entries(): IterableIterator<RouteEntry> {
    yield* this.#entries.values();
  }

  [Symbol.iterator](): IterableIterator<RouteEntry> {
    return this.entries();
  }
}
