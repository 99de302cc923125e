// Copyright 2018-2024 the oak authors. All rights reserved.

import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { assert, expect, test } from "vitest";

import {
  findRouteFiles,
  loadRoutes,
  RouteLoadError,
  routeInfo,
} from "./route_loader.ts";
import { Router } from "./router.ts";
import { createJsonRequest, createRequest } from "./testing_utils.ts";

const routes = fileURLToPath(new URL("./_fixtures/routes", import.meta.url));

async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  return undefined;
}

test("routeInfo - derives the method and path", () => {
  expect(routeInfo("users/$id/get.ts")).toEqual({
    method: "get",
    path: "/users/{id}",
  });
  expect(routeInfo("api/POST.ts")).toEqual({ method: "post", path: "/api" });
  expect(routeInfo("all.mjs")).toEqual({ method: "all", path: "/" });
});

test("routeInfo - rejects unknown methods", () => {
  expect(() => routeInfo("things/fetch.ts")).toThrow(
    "Invalid HTTP method in filename: fetch.ts. Must be one of: all, get, post, put, patch, delete, head, options",
  );
  expect(() => routeInfo("things/fetch.ts")).toThrow(RouteLoadError);
});

test("findRouteFiles - orders catch-alls first, then by depth", async () => {
  expect(await findRouteFiles(routes)).toEqual([
    join("api", "v1", "all.ts"),
    join("api", "v1", "get.ts"),
    join("api", "v1", "ping", "get.ts"),
    join("api", "v1", "statistics", "$id", "put.ts"),
    join("api", "v1", "users", "$id", "get.ts"),
  ]);
  expect(await findRouteFiles(routes, [".mjs"])).toEqual([]);
});

test("loadRoutes - registers every route file once", async () => {
  const router = new Router();
  const loaded = await loadRoutes(router, { directory: routes });
  expect(loaded.map(({ method, path }) => `${method} ${path}`)).toEqual([
    "all /api/v1",
    "get /api/v1",
    "get /api/v1/ping",
    "put /api/v1/statistics/{id}",
    "get /api/v1/users/{id}",
  ]);
  expect(loaded[2].source).toBe(join(routes, "api", "v1", "ping", "get.ts"));
  const endpoint = router.match("GET", "/api/v1/ping")?.endpoint;
  assert(endpoint);
  expect(endpoint.source).toBe(loaded[2].source);
  expect(endpoint.description).toBe("Returns an affirmative ping");

  expect(await loadRoutes(router, { directory: routes })).toEqual([]);
  expect(router.routes()).toHaveLength(5);
});

test("loadRoutes - loaded routes share the hierarchy hooks", async () => {
  const router = new Router();
  await loadRoutes(router, { directory: routes });

  const ping = await router.handle(createRequest("/api/v1/ping"));
  expect(ping.status).toBe(200);
  expect(ping.headers.get("x-api-version")).toBe("1.0");
  expect(ping.headers.get("x-api-key")).toBe("test-secret");
  expect(await ping.json()).toEqual({ id: "ping", message: "pong" });

  const user = await router.handle(createRequest("/api/v1/users/1"));
  expect(await user.json()).toEqual({
    id: "1",
    username: "jane_doe",
    email: "jane@example.com",
  });

  const missing = await router.handle(createRequest("/api/v1/users/2"));
  expect(missing.status).toBe(404);
  expect(await missing.json()).toEqual({ error: "User not found" });
});

test("loadRoutes - loaded routes validate their params", async () => {
  const router = new Router();
  await loadRoutes(router, { directory: routes });

  const updated = await router.handle(
    createJsonRequest("PUT", "/api/v1/statistics/7", {
      statistic: { name: "Visitors" },
    }),
  );
  expect(updated.status).toBe(200);
  expect(updated.headers.get("x-api-version")).toBe("v1");
  expect(await updated.json()).toEqual({ status: "ok for 7" });

  const invalid = await router.handle(
    createJsonRequest("PUT", "/api/v1/statistics/7", {}),
  );
  expect(invalid.status).toBe(400);
  const body: unknown = await invalid.json();
  assert(typeof body === "object" && body !== null && "details" in body);
  assert(typeof body.details === "object" && body.details !== null);
  expect(Object.keys(body.details)).toEqual(["statistic"]);
});

test("loadRoutes - rejects misnamed route files", async () => {
  const directory = fileURLToPath(
    new URL("./_fixtures/invalid_routes", import.meta.url),
  );
  const error = await rejectionOf(loadRoutes(new Router(), { directory }));
  assert(error instanceof RouteLoadError);
  expect(error.message).toBe(
    "Invalid HTTP method in filename: fetch.ts. Must be one of: all, get, post, put, patch, delete, head, options",
  );
});

test("loadRoutes - rejects files without an endpoint export", async () => {
  const directory = fileURLToPath(
    new URL("./_fixtures/bad_routes", import.meta.url),
  );
  const router = new Router();
  const error = await rejectionOf(loadRoutes(router, { directory }));
  assert(error instanceof RouteLoadError);
  expect(error.source).toBe(join(directory, "get.ts"));
  expect(error.message).toBe(
    `Route file does not default export an endpoint: ${
      join(directory, "get.ts")
    }`,
  );
  expect(router.routes()).toEqual([]);
});
