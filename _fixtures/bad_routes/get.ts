// Copyright 2018-2024 the oak authors. All rights reserved.

export default {
  description: "A handler which is not a function",
  handler: "not a function",
};
