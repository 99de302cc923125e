// Copyright 2018-2024 the oak authors. All rights reserved.

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["*.test.ts"],
  },
});
