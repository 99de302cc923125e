// Copyright 2018-2024 the oak authors. All rights reserved.

import { defineRoute } from "../../../../mod.ts";

export default defineRoute({
  description: "API filter which applies to every GET below /api/v1",
  before(ctx) {
    ctx.response.header("x-api-version", "1.0");
  },
});
