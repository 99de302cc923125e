// Copyright 2018-2024 the oak authors. All rights reserved.

import type { HeadersInit } from "undici-types";

import { CONTENT_TYPE_JSON } from "./constants.ts";

/**
 * Creates a promise with resolve and reject functions that can be called.
 *
 * `Promise.withResolvers` is not available on Node.js 20.
 */
export function createPromiseWithResolvers<T>(): {
  promise: Promise<T>;
  resolve: (value: T | PromiseLike<T>) => void;
  reject: (reason?: unknown) => void;
} {
  let resolve: (value: T | PromiseLike<T>) => void = () => {};
  let reject: (reason?: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Safely decode a URI component, where if it fails, instead of throwing,
 * just returns the original string.
 */
export function decodeComponent(text: string): string {
  try {
    return decodeURIComponent(text);
  } catch {
    return text;
  }
}

/** Determines if a value is a plain object record. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Create a response with a JSON body. */
export function jsonResponse(
  body: unknown,
  status: number,
  headers?: HeadersInit,
): Response {
  const response = new Response(JSON.stringify(body), { status, headers });
  response.headers.set("content-type", CONTENT_TYPE_JSON);
  return response;
}

/** Split a pathname into its non-empty segments. */
export function splitPath(pathname: string): string[] {
  return pathname.split("/").filter((segment) => segment.length > 0);
}

/** Ensure a value is an array, wrapping single values. */
export function toArray<T>(value: T | T[] | undefined): T[] {
  if (value === undefined) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}
