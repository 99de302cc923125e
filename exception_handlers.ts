// Copyright 2018-2024 the oak authors. All rights reserved.

import type { Context } from "./context.ts";

/**
 * A class of error which can be rescued. This is `Error` or any of its
 * subclasses.
 */
export type ErrorKind<E extends Error = Error> = abstract new (
  ...args: never[]
) => E;

/** A function which recovers from an error raised while handling a request. */
export interface ExceptionHook<E extends Error = Error> {
  (error: E, context: Context): void | Promise<void>;
}

/** The result of resolving an error against the registry. */
export interface ResolvedExceptionHook {
  kind: ErrorKind;
  hook: (error: unknown, context: Context) => void | Promise<void>;
}

/** Determines if a value is `Error` or a subclass of it. */
export function isErrorKind(value: unknown): value is ErrorKind {
  return typeof value === "function" &&
    (value === Error || value.prototype instanceof Error);
}

/**
 * The kinds an error is an instance of, starting with its own class and
 * ending with `Error`. A value which is not an `Error` has no ancestry.
 */
export function ancestry(error: unknown): ErrorKind[] {
  const kinds: ErrorKind[] = [];
  if (!(error instanceof Error)) {
    return kinds;
  }
  let proto: unknown = Object.getPrototypeOf(error);
  while (proto !== null && typeof proto === "object") {
    const ctor: unknown = Object.getOwnPropertyDescriptor(proto, "constructor")
      ?.value;
    if (isErrorKind(ctor) && !kinds.includes(ctor)) {
      kinds.push(ctor);
    }
    if (ctor === Error) {
      break;
    }
    proto = Object.getPrototypeOf(proto);
  }
  return kinds;
}

/**
 * A registry of hooks which recover from errors, keyed by the kind of error
 * they handle. An error is handled by the hook registered for the nearest
 * kind in its ancestry.
 */
export class ExceptionHandlers {
  #hooks = new Map<ErrorKind, ResolvedExceptionHook["hook"]>();

  get size(): number {
    return this.#hooks.size;
  }

  /**
   * Register a hook for a kind of error, replacing any hook already
   * registered for the kind.
   */
  register<E extends Error>(kind: ErrorKind<E>, hook: ExceptionHook<E>): void {
    if (!isErrorKind(kind)) {
      throw new TypeError("Exception kind must be Error or a subclass of it.");
    }
    this.#hooks.set(kind, (error, context) => {
      if (!(error instanceof kind)) {
        throw error;
      }
      return hook(error, context);
    });
  }

  /** Find the hook for the nearest registered kind of the error. */
  resolve(error: unknown): ResolvedExceptionHook | undefined {
    for (const kind of ancestry(error)) {
      const hook = this.#hooks.get(kind);
      if (hook) {
        return { kind, hook };
      }
    }
    return undefined;
  }

  clear(): void {
    this.#hooks.clear();
  }
}
