// Copyright 2018-2024 the oak authors. All rights reserved.

import { fileURLToPath } from "node:url";

import { loadRoutes, Router, StatusCodes, v } from "../mod.ts";

const router = new Router({ logger: { console: { level: "debug" } } });

const book = v.object({
  author: v.string(),
  title: v.string(),
});

type Book = v.InferOutput<typeof book>;

const books = new Map<number, Book>();

class BookNotFound extends Error {}

router.around(async (ctx, next) => {
  const start = performance.now();
  await next();
  ctx.response.header(
    "x-response-time",
    `${(performance.now() - start).toFixed(2)}ms`,
  );
});

router.before((ctx) => {
  ctx.metadata.startedAt = Date.now();
});

router.rescueFrom(BookNotFound, (error, ctx) => {
  ctx.response.status = StatusCodes.NOT_FOUND;
  ctx.response.body = { error: error.message };
});

router.all("/book", {
  before(ctx) {
    ctx.response.header("x-collection", "books");
  },
});

router.get("/book", (ctx) => {
  ctx.response.body = [...books.values()];
});

router.get("/book/{id}", {
  schema: {
    params: v.object({
      id: v.pipe(v.string(), v.digits(), v.transform(Number)),
    }),
    responses: { 200: book },
  },
  handler(ctx) {
    const id = Number(ctx.params.id);
    const value = books.get(id);
    if (!value) {
      throw new BookNotFound(`Book ${id} not found`);
    }
    ctx.response.body = value;
  },
});

router.post("/book", {
  schema: {
    params: book,
    responses: { 201: book },
  },
  handler(ctx) {
    const { author, title } = ctx.params;
    const id = books.size + 1;
    books.set(id, { author: String(author), title: String(title) });
    ctx.response.status = StatusCodes.CREATED;
    ctx.response.header("location", `/book/${id}`);
    ctx.response.body = books.get(id);
  },
});

router.delete("/book/{id}", (ctx) => {
  if (!books.delete(Number(ctx.params.id))) {
    ctx.throw(StatusCodes.NOT_FOUND, "Book not found");
  }
  ctx.response.status = StatusCodes.NO_CONTENT;
});

await loadRoutes(router, {
  directory: fileURLToPath(new URL("../_fixtures/routes", import.meta.url)),
});

await router.listen({
  port: 3000,
  onListen({ hostname, port }) {
    console.log(`listening on http://${hostname}:${port}`);
  },
});
