// Copyright 2018-2024 the oak authors. All rights reserved.

import * as v from "valibot";
import { assert, expect, test } from "vitest";

import { Schema } from "./schema.ts";

test("Schema - empty schema should passthrough values for params", async () => {
  const schema = new Schema();
  expect(schema.hasParams).toBe(false);
  const result = await schema.validateParams({ a: "1", b: 2 });
  expect(result).toEqual({ output: { a: "1", b: 2 } });
});

test("Schema - empty schema should passthrough values for response", async () => {
  const schema = new Schema();
  const result = await schema.validateResponse(200, { hello: "world" });
  expect(result).toEqual({ output: { hello: "world" } });
});

test("Schema - params schema should validate params", async () => {
  const schema = new Schema({
    params: v.object({ id: v.pipe(v.string(), v.transform(Number)) }),
  });
  expect(schema.hasParams).toBe(true);
  const result = await schema.validateParams({ id: "42", extra: true });
  expect(result).toEqual({ output: { id: 42 } });
});

test("Schema - invalid params should return details keyed by path", async () => {
  const schema = new Schema({
    params: v.object({ id: v.string(), name: v.string() }),
  });
  const result = await schema.validateParams({ id: 1, name: "a" });
  assert(result.details);
  expect(Object.keys(result.details)).toEqual(["id"]);
  expect(result.details.id).toHaveLength(1);
});

test("Schema - nested issues should be keyed by dotted path", async () => {
  const schema = new Schema({
    params: v.object({ statistic: v.object({ name: v.string() }) }),
  });
  const result = await schema.validateParams({ statistic: { name: 1 } });
  assert(result.details);
  expect(Object.keys(result.details)).toEqual(["statistic.name"]);
});

test("Schema - issues about the whole value are keyed by root", async () => {
  const schema = new Schema({ params: v.object({ id: v.string() }) });
  const result = await schema.validateParams("not an object");
  assert(result.details);
  expect(Object.keys(result.details)).toEqual(["root"]);
});

test("Schema - response schema should be selected by status", async () => {
  const schema = new Schema({
    responses: {
      200: v.object({ id: v.string() }),
      404: v.object({ error: v.string() }),
    },
  });
  expect(schema.responseStatuses).toEqual([200, 404]);
  expect(await schema.validateResponse(200, { id: "1" })).toEqual({
    output: { id: "1" },
  });
  const invalid = await schema.validateResponse(404, { id: "1" });
  assert(invalid.details);
  expect(Object.keys(invalid.details)).toEqual(["error"]);
});

test("Schema - responses without a schema or body pass through", async () => {
  const schema = new Schema({
    responses: { 200: v.object({ id: v.string() }) },
  });
  expect(await schema.validateResponse(500, { anything: true })).toEqual({
    output: { anything: true },
  });
  expect(await schema.validateResponse(200, undefined)).toEqual({
    output: undefined,
  });
});

test("Schema - async schemas are supported", async () => {
  const schema = new Schema({
    params: v.objectAsync({
      name: v.pipeAsync(
        v.string(),
        v.checkAsync((input) => Promise.resolve(input !== "taken"), "taken"),
      ),
    }),
  });
  expect(await schema.validateParams({ name: "free" })).toEqual({
    output: { name: "free" },
  });
  const result = await schema.validateParams({ name: "taken" });
  expect(result.details).toEqual({ name: ["taken"] });
});
