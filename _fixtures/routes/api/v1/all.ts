// Copyright 2018-2024 the oak authors. All rights reserved.

import { defineRoute } from "../../../../mod.ts";

export default defineRoute({
  description: "Shared hooks for every /api/v1 request",
  before(ctx) {
    ctx.response.header("x-api-version", "v1");
  },
});
