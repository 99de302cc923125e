// Copyright 2018-2024 the oak authors. All rights reserved.

/**
 * Compiles route path templates, where parameters are written as
 * brace-delimited placeholders like `/users/{id}`, into matchers which are
 * able to extract the parameters from a concrete request path.
 *
 * @module
 */

import { type Keys, pathToRegexp } from "path-to-regexp";

import type { ParamsDictionary } from "./types.ts";
import { decodeComponent } from "./utils.ts";

/**
 * Options which can be set with on a route, related to how matching against a
 * path pattern works.
 */
export interface RouteOptions {
  /**
   * When matching route paths, enforce cases sensitive matches.
   *
   * @default false
   */
  sensitive?: boolean;
  /**
   * When matching route paths, allow an optional trailing slash to match.
   *
   * @default true
   */
  trailing?: boolean;
}

/** A compiled path template. */
export interface PathMatcher {
  /** The template the matcher was compiled from. */
  readonly template: string;
  /** The template converted into a {@linkcode RegExp}. */
  readonly regexp: RegExp;
  /** The names of the parameters, in the order they appear. */
  readonly names: string[];
  /**
   * Match a concrete path, returning the parameters captured from it, or
   * `undefined` if the path does not match.
   */
  match(pathname: string): ParamsDictionary | undefined;
}

const PLACEHOLDER = /\{([^{}/]+)\}/g;
const RESERVED = /[{}()[\]+?!*:\\]/g;

/**
 * Convert a template using `{name}` placeholders into the syntax understood by
 * [path-to-regexp](https://github.com/pillarjs/path-to-regexp). Literal text
 * is escaped, so characters like `:` or `*` in a template have no special
 * meaning.
 */
export function toPathSyntax(template: string): string {
  let result = "";
  let lastIndex = 0;
  for (const match of template.matchAll(PLACEHOLDER)) {
    const index = match.index ?? 0;
    result += template.slice(lastIndex, index).replace(RESERVED, "\\$&");
    result += `:${JSON.stringify(match[1])}`;
    lastIndex = index + match[0].length;
  }
  return result + template.slice(lastIndex).replace(RESERVED, "\\$&");
}

/** Compile a path template into a {@linkcode PathMatcher}. */
export function compilePath(
  template: string,
  options: RouteOptions = {},
): PathMatcher {
  const { sensitive = false, trailing = true } = options;
  const { regexp, keys } = pathToRegexp(toPathSyntax(template), {
    sensitive,
    trailing,
  });
  const names = keyNames(keys);
  return {
    template,
    regexp,
    names,
    match(pathname) {
      const match = regexp.exec(pathname);
      if (!match) {
        return undefined;
      }
      const params: ParamsDictionary = {};
      const captures = match.slice(1);
      for (let i = 0; i < captures.length; i++) {
        const name = names[i];
        const capture = captures[i];
        if (name !== undefined && capture !== undefined) {
          params[name] = decodeComponent(capture);
        }
      }
      return params;
    },
  };
}

function keyNames(keys: Keys): string[] {
  return keys.map((key) => key.name);
}
