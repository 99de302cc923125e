// Copyright 2018-2024 the oak authors. All rights reserved.

import { assert, expect, test } from "vitest";

import { HaltSignal, isHaltSignal, RouteResponse } from "./response.ts";

test("RouteResponse - defaults to an empty JSON 200", async () => {
  const response = new RouteResponse();
  expect(response.status).toBe(200);
  expect(response.body).toBeUndefined();
  const actual = response.toResponse();
  expect(actual.status).toBe(200);
  expect(actual.headers.get("content-type")).toBe(
    "application/json; charset=UTF-8",
  );
  expect(await actual.text()).toBe("");
});

test("RouteResponse - serializes bodies as JSON", async () => {
  const response = new RouteResponse();
  response.status = 201;
  response.body = { id: 1, tags: ["a"] };
  const actual = response.toResponse();
  expect(actual.status).toBe(201);
  expect(await actual.json()).toEqual({ id: 1, tags: ["a"] });
});

test("RouteResponse - sends string bodies as is", async () => {
  const response = new RouteResponse();
  response.header("content-type", "text/plain").body = "hello";
  const actual = response.toResponse();
  expect(actual.headers.get("content-type")).toBe("text/plain");
  expect(await actual.text()).toBe("hello");
});

test("RouteResponse - null body statuses have no body", async () => {
  const response = new RouteResponse();
  response.status = 204;
  response.body = { ignored: true };
  const actual = response.toResponse();
  expect(actual.status).toBe(204);
  expect(actual.body).toBeNull();
});

test("RouteResponse - rejects invalid statuses", () => {
  const response = new RouteResponse();
  expect(() => {
    response.status = 99;
  }).toThrow(RangeError);
  expect(() => {
    response.status = 101;
  }).toThrow("Invalid response status: 101");
  expect(() => {
    response.status = 600;
  }).toThrow("Invalid response status: 600");
  expect(() => {
    response.status = 200.5;
  }).toThrow(RangeError);
  expect(response.status).toBe(200);
});

test("RouteResponse - redirect sets the location", () => {
  const response = new RouteResponse();
  response.redirect("/login");
  expect(response.status).toBe(302);
  expect(response.headers.get("location")).toBe("/login");
  response.redirect("/moved", 301);
  expect(response.status).toBe(301);
  expect(response.headers.get("location")).toBe("/moved");
});

test("RouteResponse - halt applies the init and throws a signal", () => {
  const response = new RouteResponse();
  let thrown: unknown;
  try {
    response.halt({
      status: 401,
      body: { error: "Unauthorized" },
      headers: { "www-authenticate": "Bearer" },
    });
  } catch (error) {
    thrown = error;
  }
  assert(isHaltSignal(thrown));
  expect(thrown).toBeInstanceOf(HaltSignal);
  expect(thrown).not.toBeInstanceOf(Error);
  expect(thrown.response).toBe(response);
  expect(response.isHalted()).toBe(true);
  expect(response.status).toBe(401);
  expect(response.body).toEqual({ error: "Unauthorized" });
  expect(response.headers.get("www-authenticate")).toBe("Bearer");
});

test("RouteResponse - halt without init keeps the response", () => {
  const response = new RouteResponse();
  response.body = { partial: true };
  let thrown: unknown;
  try {
    response.halt();
  } catch (error) {
    thrown = error;
  }
  expect(thrown).toBeInstanceOf(HaltSignal);
  expect(response.status).toBe(200);
  expect(response.body).toEqual({ partial: true });
});

test("RouteResponse - markHalted does not throw", () => {
  const response = new RouteResponse();
  expect(response.isHalted()).toBe(false);
  response.markHalted();
  expect(response.isHalted()).toBe(true);
});

test("isHaltSignal - only matches halt signals", () => {
  expect(isHaltSignal(new HaltSignal(new RouteResponse()))).toBe(true);
  expect(isHaltSignal(new Error("halt"))).toBe(false);
  expect(isHaltSignal(undefined)).toBe(false);
});

test("RouteResponse - setCookie appends set-cookie headers", () => {
  const response = new RouteResponse();
  response.setCookie("session", "abc", { httpOnly: true })
    .setCookie("theme", "dark", { path: "/app" });
  expect(response.toResponse().headers.getSetCookie()).toEqual([
    "session=abc; Path=/; HttpOnly",
    "theme=dark; Path=/app",
  ]);
});

test("RouteResponse - deleteCookie expires the cookie", () => {
  const response = new RouteResponse();
  response.deleteCookie("session");
  expect(response.headers.getSetCookie()).toEqual([
    "session=; Max-Age=0; Path=/; Expires=Thu, 01 Jan 1970 00:00:00 GMT",
  ]);
});
