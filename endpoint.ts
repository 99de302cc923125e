// Copyright 2018-2024 the oak authors. All rights reserved.

import type {
  inspect as nodeInspect,
  InspectOptionsStylized,
} from "node:util";
import { StatusCodes } from "http-status-codes";

import type { Context } from "./context.ts";
import { getLogger, type Logger } from "./logger.ts";
import { Schema, type SchemaDescriptor } from "./schema.ts";
import type { EndpointMethod } from "./types.ts";
import { toArray } from "./utils.ts";

/**
 * A function which is called with the {@linkcode Context} of a request. Hooks
 * and handlers communicate by mutating the response and the metadata of the
 * context, and can stop processing by halting the response.
 */
export interface Hook {
  (context: Context): void | Promise<void>;
}

/** The terminal function of an endpoint. */
export type Handler = Hook;

/**
 * The definition of an endpoint, as passed to the registration methods of the
 * router or exported from a route file.
 */
export interface EndpointInit {
  /** A human readable description of the endpoint. */
  description?: string;
  /** Hooks which populate the metadata of the request. */
  metadata?: Hook | Hook[];
  /** Hooks which run before the handler. */
  before?: Hook | Hook[];
  /** Hooks which run after the handler. */
  after?: Hook | Hook[];
  /** The handler of the endpoint. */
  handler?: Handler;
  /**
   * Validation schemas for the parameters of requests and the bodies of
   * responses.
   */
  schema?: SchemaDescriptor;
}

/**
 * A bundle of lifecycle hooks and a handler registered for a method and path.
 *
 * The hooks of an endpoint also apply to requests for deeper paths, where the
 * endpoint is part of the hierarchy of the matched route.
 */
export class Endpoint {
  #after: Hook[] = [];
  #before: Hook[] = [];
  #description?: string;
  #handler?: Handler;
  #logger: Logger;
  #metadata: Hook[] = [];
  #method: EndpointMethod;
  #path: string;
  #schema: Schema;
  #source?: string;

  get afterHooks(): readonly Hook[] {
    return this.#after;
  }

  get beforeHooks(): readonly Hook[] {
    return this.#before;
  }

  get description(): string | undefined {
    return this.#description;
  }

  get handler(): Handler | undefined {
    return this.#handler;
  }

  /** Determines if the endpoint applies to every HTTP method. */
  get isCatchAll(): boolean {
    return this.#method === "all";
  }

  get metadataHooks(): readonly Hook[] {
    return this.#metadata;
  }

  get method(): EndpointMethod {
    return this.#method;
  }

  /** The path template the endpoint is registered at. */
  get path(): string {
    return this.#path;
  }

  get schema(): Schema {
    return this.#schema;
  }

  /** The route file the endpoint was loaded from, if any. */
  get source(): string | undefined {
    return this.#source;
  }

  constructor(
    method: EndpointMethod,
    path: string,
    init: EndpointInit = {},
    source?: string,
  ) {
    this.#method = method;
    this.#path = path;
    this.#source = source;
    this.#description = init.description;
    this.#schema = new Schema(init.schema);
    this.#metadata.push(...toArray(init.metadata));
    this.#before.push(...toArray(init.before));
    this.#after.push(...toArray(init.after));
    this.#handler = init.handler;
    this.#logger = getLogger("arbor.endpoint");
    this.#logger.debug(`created endpoint: ${method} ${path}`);
  }

  addAfter(hook: Hook): this {
    this.#after.push(hook);
    return this;
  }

  addBefore(hook: Hook): this {
    this.#before.push(hook);
    return this;
  }

  addMetadata(hook: Hook): this {
    this.#metadata.push(hook);
    return this;
  }

  /** Set the handler, replacing any existing one. */
  setHandler(handler: Handler): this {
    this.#handler = handler;
    return this;
  }

  hasAfter(): boolean {
    return this.#after.length > 0;
  }

  hasBefore(): boolean {
    return this.#before.length > 0;
  }

  hasHandler(): boolean {
    return !!this.#handler;
  }

  hasMetadata(): boolean {
    return this.#metadata.length > 0;
  }

  /**
   * Resolve the parameters of the request, call the handler and validate the
   * response.
   *
   * A body which is not valid JSON, or parameters which fail validation,
   * result in a `400 Bad Request` without the handler being called. The
   * handler is not called for a response which has already been halted. A
   * response body which does not match the schema for its status is replaced
   * by a `500 Internal Server Error`.
   */
  async invoke(context: Context): Promise<void> {
    const { request, response } = context;
    const resolved = await request.resolveParams();
    if (!resolved.ok) {
      response.status = StatusCodes.BAD_REQUEST;
      if (resolved.reason === "json") {
        this.#logger.info(`${context.id} invalid JSON in request body`);
        response.body = { error: "Invalid JSON in request body" };
      } else {
        this.#logger.info(`${context.id} request validation failed`);
        response.body = {
          error: "Validation failed",
          details: resolved.details,
        };
      }
      return;
    }
    if (!response.isHalted() && this.#handler) {
      this.#logger.debug(`[${this.#path}] ${context.id} calling handler`);
      await this.#handler(context);
    }
    const status = response.status;
    const validated = await this.#schema.validateResponse(
      status,
      response.body,
    );
    if (validated.details) {
      this.#logger.error(`[${this.#path}] ${context.id} response is invalid`);
      response.status = StatusCodes.INTERNAL_SERVER_ERROR;
      response.body = {
        error: "Response validation failed",
        status_code: status,
        details: validated.details,
      };
    }
  }

  [Symbol.for("nodejs.util.inspect.custom")](
    depth: number,
    options: InspectOptionsStylized,
    inspect: typeof nodeInspect,
  ): string {
    if (depth < 0) {
      return options.stylize(`[${this.constructor.name}]`, "special");
    }
    const newOptions = {
      ...options,
      depth: options.depth == null ? null : options.depth - 1,
    };
    return `${options.stylize(this.constructor.name, "special")} ${
      inspect({
        method: this.#method,
        path: this.#path,
        source: this.#source,
        metadata: this.#metadata.length,
        before: this.#before.length,
        after: this.#after.length,
        handler: this.hasHandler(),
      }, newOptions)
    }`;
  }
}
