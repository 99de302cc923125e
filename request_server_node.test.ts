// Copyright 2018-2024 the oak authors. All rights reserved.

import { IncomingMessage } from "node:http";
import { Socket } from "node:net";
import { expect, test } from "vitest";

import { originOf, toRequest } from "./request_server_node.ts";

function incoming(
  url: string,
  headers: Record<string, string> = {},
): IncomingMessage {
  const message = new IncomingMessage(new Socket());
  message.method = "GET";
  message.url = url;
  message.headers = headers;
  return message;
}

test("originOf - includes the port", () => {
  expect(originOf("127.0.0.1", 8080)).toBe("http://127.0.0.1:8080");
  expect(originOf("localhost", 0)).toBe("http://localhost:0");
});

test("originOf - brackets IPv6 hostnames", () => {
  expect(originOf("::1", 3000)).toBe("http://[::1]:3000");
});

test("toRequest - resolves the URL against the server origin", () => {
  const request = toRequest(
    incoming("/ping?page=2", { host: "a b", accept: "application/json" }),
    originOf("127.0.0.1", 8080),
  );
  expect(request.url).toBe("http://127.0.0.1:8080/ping?page=2");
  expect(request.method).toBe("GET");
  expect(request.headers.get("accept")).toBe("application/json");
  expect(request.body).toBeNull();
});

test("toRequest - throws on a malformed request target", () => {
  expect(() => toRequest(incoming("//["), originOf("127.0.0.1", 8080)))
    .toThrow(TypeError);
});
