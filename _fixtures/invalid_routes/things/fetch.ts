// Copyright 2018-2024 the oak authors. All rights reserved.

import { defineRoute } from "../../../mod.ts";

export default defineRoute({
  handler(ctx) {
    ctx.response.body = { thing: true };
  },
});
