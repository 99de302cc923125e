// Copyright 2018-2024 the oak authors. All rights reserved.

export const BODYLESS_METHODS = ["GET", "HEAD"];
/** The route table key used for catch-all registrations. */
export const CATCH_ALL = "ALL";
export const CONTENT_TYPE_JSON = "application/json; charset=UTF-8";
export const HTTP_METHODS = [
  "GET",
  "POST",
  "PUT",
  "PATCH",
  "DELETE",
  "HEAD",
  "OPTIONS",
] as const;
/** Statuses which must be sent without a body. */
export const NULL_BODY_STATUSES = [204, 205, 304];
