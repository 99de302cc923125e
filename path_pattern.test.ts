// Copyright 2018-2024 the oak authors. All rights reserved.

import { expect, test } from "vitest";

import { compilePath, toPathSyntax } from "./path_pattern.ts";

test("toPathSyntax - converts placeholders into named parameters", () => {
  expect(toPathSyntax("/users/{id}")).toBe('/users/:"id"');
  expect(toPathSyntax("/a/{x}/b/{y}")).toBe('/a/:"x"/b/:"y"');
});

test("toPathSyntax - escapes reserved characters in literal text", () => {
  expect(toPathSyntax("/files/a:b*")).toBe("/files/a\\:b\\*");
});

test("compilePath - exposes the parameter names in order", () => {
  expect(compilePath("/a/{x}/b/{y}").names).toEqual(["x", "y"]);
  expect(compilePath("/static").names).toEqual([]);
});

test("compilePath - matches and captures parameters", () => {
  const matcher = compilePath("/users/{id}");
  expect(matcher.template).toBe("/users/{id}");
  expect(matcher.match("/users/42")).toEqual({ id: "42" });
  expect(matcher.match("/users")).toBeUndefined();
  expect(matcher.match("/users/42/posts")).toBeUndefined();
});

test("compilePath - decodes captured values", () => {
  const matcher = compilePath("/users/{name}");
  expect(matcher.match("/users/jane%20doe")).toEqual({ name: "jane doe" });
});

test("compilePath - literal text with reserved characters matches as is", () => {
  const matcher = compilePath("/files/a:b");
  expect(matcher.match("/files/a:b")).toEqual({});
  expect(matcher.match("/files/a")).toBeUndefined();
});

test("compilePath - allows a trailing slash by default", () => {
  expect(compilePath("/users/{id}").match("/users/42/")).toEqual({ id: "42" });
  expect(compilePath("/users/{id}", { trailing: false }).match("/users/42/"))
    .toBeUndefined();
});

test("compilePath - is case insensitive unless sensitive is set", () => {
  expect(compilePath("/Users/{id}").match("/users/1")).toEqual({ id: "1" });
  expect(compilePath("/Users/{id}", { sensitive: true }).match("/users/1"))
    .toBeUndefined();
});
