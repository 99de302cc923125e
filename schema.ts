// Copyright 2018-2024 the oak authors. All rights reserved.

import {
  type BaseIssue,
  type BaseSchema,
  type BaseSchemaAsync,
  type Config,
  flatten,
  safeParseAsync,
} from "valibot";

import { getLogger } from "./logger.ts";

/**
 * A base type of the schema that can be applied to the parameters of a
 * request or the body of a response.
 */
export type BodySchema =
  | BaseSchema<unknown, unknown, BaseIssue<unknown>>
  | BaseSchemaAsync<unknown, unknown, BaseIssue<unknown>>;

/**
 * Validation errors keyed by the dot path of the offending value. Issues which
 * concern the value as a whole are keyed by `"root"`.
 */
export type ValidationDetails = Record<string, string[]>;

type MaybeValid<T> = { output: T; details?: undefined } | {
  output?: undefined;
  details: ValidationDetails;
};

/**
 * A descriptor for a schema that can be applied to a request and response.
 */
export interface SchemaDescriptor {
  /**
   * A schema applied to the parameters of a request, which are the query
   * string values, the members of a JSON object body and the path parameters
   * merged together, in that order of precedence.
   */
  params?: BodySchema;
  /**
   * Schemas applied to the body of a response, keyed by the status of the
   * response.
   */
  responses?: Record<number, BodySchema>;
  /**
   * Options that can be applied to the validation of the schema.
   */
  options?: Config<BaseIssue<unknown>>;
}

/** Convert valibot issues into a plain map of messages. */
export function toDetails(
  issues: [BaseIssue<unknown>, ...BaseIssue<unknown>[]],
): ValidationDetails {
  const flat = flatten(issues);
  const details: ValidationDetails = {};
  if (flat.root) {
    details.root = [...flat.root];
  }
  for (const [key, messages] of Object.entries(flat.nested ?? {})) {
    if (messages) {
      details[key] = [...messages];
    }
  }
  return details;
}

/**
 * A class that can apply validation schemas to the parameters of a request
 * and the body of a response.
 */
export class Schema {
  #logger = getLogger("arbor.schema");
  #options?: Config<BaseIssue<unknown>>;
  #params?: BodySchema;
  #responses: Map<number, BodySchema>;

  /** Determines if a params schema was provided. */
  get hasParams(): boolean {
    return !!this.#params;
  }

  /** The statuses which have a response schema. */
  get responseStatuses(): number[] {
    return [...this.#responses.keys()];
  }

  constructor(descriptor: SchemaDescriptor = {}) {
    this.#params = descriptor.params;
    this.#options = descriptor.options;
    this.#responses = new Map(
      Object.entries(descriptor.responses ?? {}).map((
        [status, schema],
      ) => [Number(status), schema]),
    );
  }

  /**
   * Validate the assembled parameters of a request. If no schema was provided
   * the input is passed through.
   */
  async validateParams(input: unknown): Promise<MaybeValid<unknown>> {
    if (!this.#params) {
      return { output: input };
    }
    const result = await safeParseAsync(this.#params, input, this.#options);
    if (result.success) {
      this.#logger.debug("params are valid");
      return { output: result.output };
    }
    this.#logger.info("params are invalid");
    return { details: toDetails(result.issues) };
  }

  /**
   * Validate the body of a response against the schema registered for its
   * status. Without a schema for the status, or without a body, the body is
   * passed through.
   */
  async validateResponse(
    status: number,
    body: unknown,
  ): Promise<MaybeValid<unknown>> {
    const schema = this.#responses.get(status);
    if (!schema || body === undefined || body === null) {
      return { output: body };
    }
    const result = await safeParseAsync(schema, body, this.#options);
    if (result.success) {
      return { output: result.output };
    }
    this.#logger.error(`response body for status ${status} is invalid`);
    return { details: toDetails(result.issues) };
  }
}
