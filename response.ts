// Copyright 2018-2024 the oak authors. All rights reserved.

/**
 * The module which contains the {@linkcode RouteResponse} class, which
 * accumulates the status, headers and body of a response while a request is
 * processed, and the {@linkcode HaltSignal} which is thrown to stop the
 * processing of a request early.
 *
 * @module
 */

import { serialize, type SerializeOptions } from "cookie";
import { StatusCodes } from "http-status-codes";
import type { HeadersInit } from "undici-types";

import { CONTENT_TYPE_JSON, NULL_BODY_STATUSES } from "./constants.ts";

/**
 * Values which can be applied to a response when halting.
 */
export interface HaltInit {
  /** The status to set on the response. */
  status?: number;
  /** The body to set on the response. */
  body?: unknown;
  /** Headers which are set on the response. */
  headers?: HeadersInit;
}

/**
 * Thrown when processing of a request is halted. It is not an `Error` and is
 * never handed to exception handlers; the router resolves the request with
 * the response the signal carries.
 */
export class HaltSignal {
  readonly response: RouteResponse;

  constructor(response: RouteResponse) {
    this.response = response;
  }
}

/** Determines if a thrown value is a {@linkcode HaltSignal}. */
export function isHaltSignal(value: unknown): value is HaltSignal {
  return value instanceof HaltSignal;
}

/** Informational statuses cannot be sent as the final response. */
function assertStatus(status: number): void {
  if (!Number.isInteger(status) || status < 200 || status > 599) {
    throw new RangeError(`Invalid response status: ${status}`);
  }
}

/**
 * The mutable response of a request. Hooks and handlers set the status, body
 * and headers, and once processing is complete the router converts it into a
 * Fetch API {@linkcode Response}.
 *
 * The body can be any value. Strings are sent as is, other values are
 * serialized as JSON.
 */
export class RouteResponse {
  #body: unknown;
  #halted = false;
  #headers = new Headers({ "content-type": CONTENT_TYPE_JSON });
  #status: number = StatusCodes.OK;

  /** The body of the response. */
  get body(): unknown {
    return this.#body;
  }

  set body(value: unknown) {
    this.#body = value;
  }

  /** The headers which will be sent with the response. */
  get headers(): Headers {
    return this.#headers;
  }

  /** The status of the response, which defaults to `200`. */
  get status(): number {
    return this.#status;
  }

  set status(value: number) {
    assertStatus(value);
    this.#status = value;
  }

  /** Set a header on the response. */
  header(name: string, value: string): this {
    this.#headers.set(name, value);
    return this;
  }

  /**
   * Append a `set-cookie` header to the response. The `path` of the cookie
   * defaults to `"/"`.
   */
  setCookie(name: string, value: string, options: SerializeOptions = {}): this {
    this.#headers.append(
      "set-cookie",
      serialize(name, value, { path: "/", ...options }),
    );
    return this;
  }

  /**
   * Instruct the client to delete a cookie, by setting it empty and already
   * expired. The `path` and `domain` must match those the cookie was set with.
   */
  deleteCookie(
    name: string,
    options: Pick<SerializeOptions, "domain" | "path"> = {},
  ): this {
    return this.setCookie(name, "", {
      ...options,
      expires: new Date(0),
      maxAge: 0,
    });
  }

  /**
   * Stop processing the request. The response is marked as halted and a
   * {@linkcode HaltSignal} is thrown, so no further hooks or the handler run.
   */
  halt(init: HaltInit = {}): never {
    const { status, body, headers } = init;
    if (status !== undefined) {
      this.status = status;
    }
    if (body !== undefined) {
      this.#body = body;
    }
    if (headers) {
      for (const [key, value] of new Headers(headers)) {
        this.#headers.set(key, value);
      }
    }
    this.markHalted();
    throw new HaltSignal(this);
  }

  /** Determines if the response has been halted. */
  isHalted(): boolean {
    return this.#halted;
  }

  /**
   * Mark the response as halted without throwing. The handler of the endpoint
   * will not be called.
   */
  markHalted(): void {
    this.#halted = true;
  }

  /**
   * Set the response to redirect the client. The status defaults to
   * `302 Found`.
   */
  redirect(
    location: string,
    status: number = StatusCodes.MOVED_TEMPORARILY,
  ): this {
    this.status = status;
    this.#headers.set("location", location);
    return this;
  }

  /** Convert the response into a Fetch API {@linkcode Response}. */
  toResponse(): Response {
    const status = this.#status;
    let body: string | null = null;
    if (
      !NULL_BODY_STATUSES.includes(status) && this.#body !== undefined &&
      this.#body !== null
    ) {
      body = typeof this.#body === "string"
        ? this.#body
        : JSON.stringify(this.#body);
    }
    return new Response(body, { status, headers: this.#headers });
  }
}
