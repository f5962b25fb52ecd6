import type { Context } from "hono";
import type { z } from "zod";
import { RequestValidationError, type ValidationIssue } from "../compute/errors.js";

type Source = "body" | "query";

function toIssues(source: Source, error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    loc: [source, ...issue.path],
    msg: issue.message,
    type: issue.code,
  }));
}

/** Parse the JSON body against `schema` or throw a RequestValidationError. */
export async function parseBody<S extends z.ZodTypeAny>(c: Context, schema: S): Promise<z.output<S>> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch {
    throw new RequestValidationError([{ loc: ["body"], msg: "Malformed JSON body", type: "json_invalid" }]);
  }
  const result = schema.safeParse(raw);
  if (!result.success) throw new RequestValidationError(toIssues("body", result.error));
  return result.data;
}

/** Parse the query string against `schema` or throw a RequestValidationError. */
export function parseQuery<S extends z.ZodTypeAny>(c: Context, schema: S): z.output<S> {
  const result = schema.safeParse(c.req.query());
  if (!result.success) throw new RequestValidationError(toIssues("query", result.error));
  return result.data;
}
