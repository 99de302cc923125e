// Copyright 2018-2024 the oak authors. All rights reserved.

import hyperid from "hyperid";
import { StatusCodes } from "http-status-codes";
import {
  createServer,
  type IncomingMessage,
  type ServerResponse,
} from "node:http";

import { BODYLESS_METHODS, CONTENT_TYPE_JSON } from "./constants.ts";
import { getLogger } from "./logger.ts";
import type {
  Addr,
  RequestEvent,
  RequestServer,
  RequestServerOptions,
} from "./types.ts";
import { createPromiseWithResolvers, jsonResponse } from "./utils.ts";

const instance = hyperid({ urlSafe: true });

function toHeaders(incomingMessage: IncomingMessage): Headers {
  const headers = new Headers();
  for (const [key, value] of Object.entries(incomingMessage.headers)) {
    if (Array.isArray(value)) {
      for (const item of value) {
        headers.append(key, item);
      }
    } else if (value !== undefined) {
      headers.set(key, value);
    }
  }
  return headers;
}

function toBody(
  incomingMessage: IncomingMessage,
): ReadableStream<Uint8Array> {
  let closed = false;
  return new ReadableStream<Uint8Array>({
    start: (controller) => {
      incomingMessage.on("data", (chunk: Uint8Array) => {
        if (!closed) {
          controller.enqueue(chunk);
        }
      });
      incomingMessage.on("error", (err) => {
        closed = true;
        controller.error(err);
      });
      incomingMessage.on("end", () => {
        if (!closed) {
          closed = true;
          controller.close();
        }
      });
    },
  });
}

/**
 * Convert an incoming message into a Fetch API {@linkcode Request}. The URL
 * is resolved against the origin the server listens on, not the `Host`
 * header of the request. Throws a `TypeError` when the request target is not
 * a valid URL.
 */
export function toRequest(
  incomingMessage: IncomingMessage,
  origin: string,
): Request {
  const method = incomingMessage.method ?? "GET";
  const url = new URL(incomingMessage.url ?? "/", origin);
  return new Request(url, {
    body: BODYLESS_METHODS.includes(method) ? null : toBody(incomingMessage),
    duplex: "half",
    headers: toHeaders(incomingMessage),
    method,
  });
}

/** The origin of a server listening on the hostname and port. */
export function originOf(hostname: string, port: number): string {
  const host = hostname.includes(":") ? `[${hostname}]` : hostname;
  return `http://${host}:${port}`;
}

function respondBadRequest(
  serverResponse: ServerResponse<IncomingMessage>,
): void {
  serverResponse.writeHead(StatusCodes.BAD_REQUEST, {
    "content-type": CONTENT_TYPE_JSON,
  });
  serverResponse.end(JSON.stringify({ error: "Bad Request" }));
}

class NodeRequestEvent implements RequestEvent {
  #id = instance();
  #incomingMessage: IncomingMessage;
  #request: Request;
  #responded = false;
  #serverResponse: ServerResponse<IncomingMessage>;

  get addr(): Addr {
    const { remoteAddress, remotePort } = this.#incomingMessage.socket;
    return {
      transport: "tcp",
      hostname: remoteAddress ?? "",
      port: remotePort ?? 0,
    };
  }

  get id(): string {
    return this.#id;
  }

  get request(): Request {
    return this.#request;
  }

  get responded(): boolean {
    return this.#responded;
  }

  constructor(
    incomingMessage: IncomingMessage,
    serverResponse: ServerResponse<IncomingMessage>,
    request: Request,
  ) {
    this.#incomingMessage = incomingMessage;
    this.#serverResponse = serverResponse;
    this.#request = request;
  }

  async respond(response: Response): Promise<void> {
    if (this.#responded) {
      throw new Error("Request already responded to.");
    }
    this.#responded = true;
    const headers = new Map<string, string[]>();
    for (const [key, value] of response.headers) {
      const values = headers.get(key) ?? [];
      values.push(value);
      headers.set(key, values);
    }
    this.#serverResponse.statusCode = response.status;
    for (const [key, value] of headers) {
      this.#serverResponse.setHeader(key, value);
    }
    if (response.body) {
      for await (const chunk of response.body) {
        const { promise, resolve, reject } = createPromiseWithResolvers<void>();
        this.#serverResponse.write(chunk, (err) => {
          if (err) {
            reject(err);
          } else {
            resolve();
          }
        });
        await promise;
      }
    }
    const { promise, resolve } = createPromiseWithResolvers<void>();
    this.#serverResponse.end(() => resolve());
    await promise;
  }
}

/**
 * A request server built on `node:http`, which yields each request it
 * receives as a {@linkcode RequestEvent} with a Fetch API
 * {@linkcode Request}.
 */
export default class NodeRequestServer implements RequestServer {
  #closed = true;
  #hostname: string;
  #logger = getLogger("arbor.server");
  #port: number;
  #signal: AbortSignal;
  #stream?: ReadableStream<NodeRequestEvent>;

  get closed(): boolean {
    return this.#closed;
  }

  constructor(options: RequestServerOptions) {
    const { hostname, port, signal } = options;
    this.#hostname = hostname ?? "127.0.0.1";
    this.#port = port ?? 0;
    this.#signal = signal;
  }

  listen(): Promise<Addr> {
    const { promise, resolve, reject } = createPromiseWithResolvers<Addr>();
    this.#stream = new ReadableStream<NodeRequestEvent>({
      start: (controller) => {
        const server = createServer((incomingMessage, serverResponse) => {
          let request: Request;
          try {
            request = toRequest(
              incomingMessage,
              originOf(this.#hostname, this.#port),
            );
          } catch (cause) {
            this.#logger.info({ err: cause }, "rejecting malformed request");
            respondBadRequest(serverResponse);
            return;
          }
          const event = new NodeRequestEvent(
            incomingMessage,
            serverResponse,
            request,
          );
          if (this.#closed) {
            event.respond(
              jsonResponse({ error: "Service Unavailable" }, 503),
            ).catch((cause) => {
              this.#logger.error({ err: cause }, "error rejecting request");
            });
            return;
          }
          controller.enqueue(event);
        });
        this.#signal.addEventListener("abort", () => {
          if (!this.#closed) {
            this.#closed = true;
            this.#logger.debug("server closed");
            controller.close();
          }
        }, { once: true });
        server.once("error", reject);
        server.listen(
          { port: this.#port, host: this.#hostname, signal: this.#signal },
          () => {
            this.#closed = false;
            const address = server.address();
            if (address !== null && typeof address === "object") {
              this.#port = address.port;
            }
            resolve({
              transport: "tcp",
              hostname: this.#hostname,
              port: this.#port,
            });
          },
        );
      },
    });
    return promise;
  }

  [Symbol.asyncIterator](): AsyncIterator<RequestEvent> {
    if (!this.#stream) {
      throw new TypeError("Server hasn't started listening.");
    }
    return this.#stream[Symbol.asyncIterator]();
  }
}
