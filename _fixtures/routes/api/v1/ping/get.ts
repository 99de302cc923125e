// Copyright 2018-2024 the oak authors. All rights reserved.

import { defineRoute, v } from "../../../../../mod.ts";

export default defineRoute({
  description: "Returns an affirmative ping",
  schema: {
    responses: {
      200: v.object({ id: v.string(), message: v.string() }),
    },
  },
  before(ctx) {
    ctx.response.header("x-api-key", "test-secret");
  },
  handler(ctx) {
    ctx.response.status = 200;
    ctx.response.body = { id: "ping", message: "pong" };
  },
});
