// Copyright 2018-2024 the oak authors. All rights reserved.

import createHttpError from "http-errors";
import { assert, expect, test } from "vitest";

import { Context } from "./context.ts";
import { RouteRequest } from "./request.ts";
import { isHaltSignal, RouteResponse } from "./response.ts";
import { createRequest } from "./testing_utils.ts";

function setup(path = "/items/1?page=2", id?: string): Context {
  return new Context(
    new RouteRequest(createRequest(path), { params: { id: "1" } }),
    new RouteResponse(),
    id,
  );
}

function thrownBy(fn: () => void): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

test("Context - should be able to create a new context", () => {
  const context = setup();
  expect(context).toBeInstanceOf(Context);
  expect(context.url.pathname).toBe("/items/1");
  expect(context.params).toEqual({ page: "2", id: "1" });
  expect(context.request.method).toBe("GET");
  expect(context.response.status).toBe(200);
});

test("Context - ids are unique unless provided", () => {
  expect(setup().id).not.toBe(setup().id);
  expect(setup("/", "request-1").id).toBe("request-1");
});

test("Context - metadata starts empty and is shared", () => {
  const context = setup();
  expect(context.metadata).toEqual({});
  context.metadata.user = "jane";
  expect(context.metadata.user).toBe("jane");
  expect(setup().metadata).toEqual({});
});

test("Context - halt halts the response", () => {
  const context = setup();
  const thrown = thrownBy(() => context.halt({ status: 403 }));
  assert(isHaltSignal(thrown));
  expect(thrown.response).toBe(context.response);
  expect(context.response.status).toBe(403);
});

test("Context - throw defaults to an internal server error", () => {
  const context = setup();
  const thrown = thrownBy(() => context.throw());
  assert(createHttpError.isHttpError(thrown));
  expect(thrown.status).toBe(500);
  expect(thrown.expose).toBe(false);
});

test("Context - throw sets the status, message and properties", () => {
  const context = setup();
  const thrown = thrownBy(() =>
    context.throw(404, "Item not found", { code: "missing" })
  );
  assert(createHttpError.isHttpError(thrown));
  expect(thrown.status).toBe(404);
  expect(thrown.message).toBe("Item not found");
  expect(thrown.expose).toBe(true);
  expect(thrown.code).toBe("missing");
});
