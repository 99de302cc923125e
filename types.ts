// Copyright 2018-2024 the oak authors. All rights reserved.

import type { HTTP_METHODS } from "./constants.ts";
import type { Endpoint } from "./endpoint.ts";

/** The HTTP methods which routes can be registered for. */
export type HttpMethod = typeof HTTP_METHODS[number];

/**
 * The method an endpoint is registered with. `"all"` marks a catch-all
 * endpoint which applies to every HTTP method.
 */
export type EndpointMethod = Lowercase<HttpMethod> | "all";

/**
 * The base type for parameters that are parsed from the path of a request.
 */
export interface ParamsDictionary {
  [key: string]: string;
}

/**
 * The request scoped values which are shared between every hook and the
 * handler of a request.
 */
export type Metadata = Record<string, unknown>;

/**
 * The result of resolving a request method and path against the route table.
 */
export interface RouteMatch {
  /** The most specific endpoint which matched. */
  endpoint: Endpoint;
  /**
   * The endpoints whose hooks apply to the request, ordered from the
   * shallowest path to the deepest. Always contains {@linkcode endpoint}.
   */
  hierarchy: Endpoint[];
  /**
   * The parameters captured from the path. Absent when the route matched
   * exactly.
   */
  params?: ParamsDictionary;
}

/**
 * The network address representation.
 */
export interface Addr {
  /**
   * The transport protocol used for the address.
   */
  transport: "tcp" | "udp";
  /**
   * The hostname or IP address.
   */
  hostname: string;
  /**
   * The port number.
   */
  port: number;
}

/**
 * A function which is handed requests that the router could not resolve.
 */
export interface FallbackHandler {
  (request: Request): Promise<Response> | Response;
}

/**
 * A request received by a {@linkcode RequestServer}, along with the means to
 * send the response back to the client.
 */
export interface RequestEvent {
  /** The address of the remote connection. */
  readonly addr: Addr;
  /** A unique identifier of the request event. */
  readonly id: string;
  readonly request: Request;
  /** Determines if a response has been sent. */
  readonly responded: boolean;
  /** Send the response to the client. */
  respond(response: Response): Promise<void>;
}

/** Options which are provided when constructing a request server. */
export interface RequestServerOptions {
  hostname?: string;
  port?: number;
  /** Aborting the signal closes the server. */
  signal: AbortSignal;
}

/**
 * A server which listens for requests and yields them as request events.
 */
export interface RequestServer extends AsyncIterable<RequestEvent> {
  /** Start listening, resolving with the address listened on. */
  listen(): Promise<Addr>;
}
