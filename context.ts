// Copyright 2018-2024 the oak authors. All rights reserved.

/**
 * The module which contains the {@linkcode Context} class which provides an
 * interface for working with requests.
 *
 * As the router handles requests, it will create a context populated with
 * information about the request and a response to be filled in. The same
 * context is handed to every hook and the handler of the request.
 *
 * @module
 */

import createHttpError from "http-errors";
import hyperid from "hyperid";

import type { RouteRequest } from "./request.ts";
import type { HaltInit, RouteResponse } from "./response.ts";
import type { Metadata } from "./types.ts";

const instance = hyperid({ urlSafe: true });

export class Context {
  #id: string;
  #metadata: Metadata = {};
  #request: RouteRequest;
  #response: RouteResponse;

  /**
   * A unique identifier for the request.
   *
   * This can be used for logging and debugging purposes.
   */
  get id(): string {
    return this.#id;
  }

  /**
   * Values shared between every hook and the handler of the request. Each
   * request starts with an empty record, so values set by a metadata hook of a
   * shallower endpoint are visible to, and can be overwritten by, deeper
   * ones.
   */
  get metadata(): Metadata {
    return this.#metadata;
  }

  /**
   * The parameters of the request. See {@linkcode RouteRequest.params}.
   */
  get params(): Record<string, unknown> {
    return this.#request.params;
  }

  get request(): RouteRequest {
    return this.#request;
  }

  get response(): RouteResponse {
    return this.#response;
  }

  /** The parsed form of the request's URL. */
  get url(): URL {
    return this.#request.url;
  }

  constructor(request: RouteRequest, response: RouteResponse, id?: string) {
    this.#request = request;
    this.#response = response;
    this.#id = id ?? instance();
  }

  /** Halt the request. See {@linkcode RouteResponse.halt}. */
  halt(init?: HaltInit): never {
    return this.#response.halt(init);
  }

  /**
   * Throw an HTTP error with the specified status and message. If the status
   * is not provided, it will default to `500 Internal Server Error`. Unless
   * rescued, the router responds with the status of the error and, for client
   * errors, its message.
   */
  throw(
    status = 500,
    message?: string,
    properties?: Record<string, unknown>,
  ): never {
    const rest: (string | Record<string, unknown>)[] = [];
    if (message !== undefined) {
      rest.push(message);
    }
    if (properties) {
      rest.push(properties);
    }
    throw createHttpError(status, ...rest);
  }
}
