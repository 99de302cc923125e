// Copyright 2018-2024 the oak authors. All rights reserved.

/**
 * The module which contains the {@linkcode RouteRequest} class, a wrapper
 * around a Fetch API {@linkcode Request} which provides the values routes
 * need: the path, headers, parsed query string, JSON body and the merged and
 * validated parameters of the request.
 *
 * @module
 */

import { type ParsedQs, parse } from "qs";

import { getLogger, type Logger } from "./logger.ts";
import type { Schema, ValidationDetails } from "./schema.ts";
import type { Addr, ParamsDictionary } from "./types.ts";
import { isRecord } from "./utils.ts";

/** The outcome of {@linkcode RouteRequest.resolveParams}. */
export type ResolveParamsResult =
  | { ok: true; params: Record<string, unknown> }
  | { ok: false; reason: "json" }
  | { ok: false; reason: "schema"; details: ValidationDetails };

export interface RouteRequestInit {
  /** The parameters captured from the path of the request. */
  params?: ParamsDictionary;
  /** The schema the merged parameters are validated against. */
  schema?: Schema;
  /** The address of the remote connection, when known. */
  addr?: Addr;
}

export class RouteRequest {
  #addr?: Addr;
  #bodyText?: Promise<string>;
  #logger: Logger;
  #params?: Record<string, unknown>;
  #pathParams: ParamsDictionary;
  #query?: ParsedQs;
  #request: Request;
  #resolved?: Promise<ResolveParamsResult>;
  #schema?: Schema;
  #url: URL;

  /** The content type of the request, if any. */
  get contentType(): string | undefined {
    return this.#request.headers.get("content-type") ?? undefined;
  }

  /** The headers of the request. */
  get headers(): Headers {
    return this.#request.headers;
  }

  /** Determines if the request has a JSON content type. */
  get isJson(): boolean {
    return this.contentType?.includes("application/json") ?? false;
  }

  /** The HTTP method of the request, in upper case. */
  get method(): string {
    return this.#request.method;
  }

  /**
   * The parameters of the request. After a successful
   * {@linkcode resolveParams} these are the validated parameters, before that
   * the path parameters merged over the query string.
   */
  get params(): Record<string, unknown> {
    return this.#params ?? { ...this.query, ...this.#pathParams };
  }

  /** The pathname of the request URL. */
  get path(): string {
    return this.#url.pathname;
  }

  /** The parameters captured from the path of the request. */
  get pathParams(): ParamsDictionary {
    return this.#pathParams;
  }

  /**
   * The query string of the request, parsed with
   * [qs](https://github.com/ljharb/qs) so nested keys like `a[b]=c` become
   * objects.
   */
  get query(): ParsedQs {
    if (!this.#query) {
      this.#query = parse(this.#url.search.slice(1));
    }
    return this.#query;
  }

  /**
   * The address of the client. Proxy headers are consulted first:
   * the leftmost `X-Forwarded-For` entry, then `X-Real-IP`.
   */
  get remoteIp(): string | undefined {
    const forwarded = this.#request.headers.get("x-forwarded-for");
    if (forwarded) {
      const [first] = forwarded.split(",");
      if (first?.trim()) {
        return first.trim();
      }
    }
    const realIp = this.#request.headers.get("x-real-ip")?.trim();
    if (realIp) {
      return realIp;
    }
    return this.#addr?.hostname;
  }

  /** The underlying Fetch API {@linkcode Request}. */
  get request(): Request {
    return this.#request;
  }

  /** The parsed URL of the request. */
  get url(): URL {
    return this.#url;
  }

  constructor(request: Request, init: RouteRequestInit = {}) {
    this.#request = request;
    this.#url = new URL(request.url);
    this.#pathParams = init.params ?? {};
    this.#schema = init.schema;
    this.#addr = init.addr;
    this.#logger = getLogger("arbor.request");
  }

  /**
   * Read the body of the request as text. The body is read once, later calls
   * resolve with the same value.
   */
  body(): Promise<string> {
    if (!this.#bodyText) {
      this.#bodyText = this.#request.bodyUsed
        ? Promise.resolve("")
        : this.#request.text();
    }
    return this.#bodyText;
  }

  /** Get the value of a request header. */
  header(name: string): string | undefined {
    return this.#request.headers.get(name) ?? undefined;
  }

  /**
   * Parse the body of the request as JSON, resolving with `undefined` when
   * the body is empty or not valid JSON.
   */
  async json(): Promise<unknown> {
    const text = await this.body();
    if (!text) {
      return undefined;
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      this.#logger.debug({ err: error }, "request body is not valid JSON");
      return undefined;
    }
  }

  /**
   * Assemble the parameters of the request and validate them.
   *
   * The query string values, the members of a JSON object body and the path
   * parameters are merged, later sources overriding earlier ones. A JSON body
   * that cannot be parsed fails with the reason `"json"`. When a schema is
   * present, the merged parameters are validated; on failure the reason is
   * `"schema"` and {@linkcode params} keeps the unvalidated values.
   */
  resolveParams(): Promise<ResolveParamsResult> {
    if (!this.#resolved) {
      this.#resolved = this.#resolveParams();
    }
    return this.#resolved;
  }

  async #resolveParams(): Promise<ResolveParamsResult> {
    let body: unknown;
    if (this.isJson) {
      const text = await this.body();
      if (text) {
        try {
          body = JSON.parse(text);
        } catch (error) {
          this.#logger.debug({ err: error }, "invalid JSON in request body");
          this.#params = {};
          return { ok: false, reason: "json" };
        }
      }
    }
    const assembled: Record<string, unknown> = {
      ...this.query,
      ...(isRecord(body) ? body : {}),
      ...this.#pathParams,
    };
    if (!this.#schema) {
      this.#params = assembled;
      return { ok: true, params: assembled };
    }
    const result = await this.#schema.validateParams(assembled);
    if (result.details) {
      this.#params = assembled;
      return { ok: false, reason: "schema", details: result.details };
    }
    const params = isRecord(result.output) ? result.output : assembled;
    this.#params = params;
    return { ok: true, params };
  }
}
