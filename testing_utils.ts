// Copyright 2018-2024 the oak authors. All rights reserved.

import hyperid from "hyperid";
import type pino from "pino";

import type {
  Addr,
  RequestEvent,
  RequestServer,
  RequestServerOptions,
} from "./types.ts";
import { createPromiseWithResolvers, isRecord } from "./utils.ts";

const instance = hyperid({ urlSafe: true });

/** Create a request for a path on `http://localhost`. */
export function createRequest(path: string, init?: RequestInit): Request {
  return new Request(new URL(path, "http://localhost/"), init);
}

/** Create a request with a JSON body. */
export function createJsonRequest(
  method: string,
  path: string,
  body: unknown,
): Request {
  return createRequest(path, {
    method,
    body: typeof body === "string" ? body : JSON.stringify(body),
    headers: { "content-type": "application/json" },
  });
}

export class MockRequestEvent implements RequestEvent {
  #addr: Addr;
  #id = instance();
  #request: Request;
  #resolve: (value: Response | PromiseLike<Response>) => void;
  #responded = false;
  #response: Promise<Response>;

  get addr(): Addr {
    return this.#addr;
  }

  get id(): string {
    return this.#id;
  }

  get request(): Request {
    return this.#request;
  }

  get response(): Promise<Response> {
    return this.#response;
  }

  get responded(): boolean {
    return this.#responded;
  }

  constructor(
    input: URL | string,
    init?: RequestInit,
    addr: Addr = { hostname: "127.0.0.1", port: 80, transport: "tcp" },
  ) {
    this.#addr = addr;
    this.#request = new Request(input, init);
    const { promise, resolve } = createPromiseWithResolvers<Response>();
    this.#response = promise;
    this.#resolve = resolve;
  }

  respond(response: Response): Promise<void> {
    if (this.#responded) {
      throw new Error("Request already responded to.");
    }
    this.#responded = true;
    this.#resolve(response);
    return Promise.resolve();
  }
}

/**
 * A request server which yields the events it is given, closing once every
 * event has been yielded and the signal is aborted.
 */
export function mockRequestServer(
  events: MockRequestEvent[],
): new (options: RequestServerOptions) => RequestServer {
  return class MockRequestServer implements RequestServer {
    #signal: AbortSignal;

    constructor(options: RequestServerOptions) {
      this.#signal = options.signal;
    }

    listen(): Promise<Addr> {
      return Promise.resolve({
        hostname: "127.0.0.1",
        port: 8080,
        transport: "tcp",
      });
    }

    async *[Symbol.asyncIterator](): AsyncGenerator<RequestEvent> {
      yield* events;
      if (!this.#signal.aborted) {
        const { promise, resolve } = createPromiseWithResolvers<void>();
        this.#signal.addEventListener("abort", () => resolve(), { once: true });
        await promise;
      }
    }
  };
}

/** A pino destination which keeps the parsed log records in memory. */
export class LogCollector implements pino.DestinationStream {
  readonly records: Record<string, unknown>[] = [];

  write(msg: string): void {
    for (const line of msg.split("\n")) {
      if (!line) {
        continue;
      }
      const record: unknown = JSON.parse(line);
      if (isRecord(record)) {
        this.records.push(record);
      }
    }
  }

  /** The messages of the collected records. */
  get messages(): string[] {
    return this.records.map((record) => String(record.msg));
  }
}
