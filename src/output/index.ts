import { z } from "zod";
import { err, ok, type Result } from "neverthrow";
import { ExecutionError, formatZodIssues } from "../errors/index.js";

export type OutputFields = Record<string, unknown>;
export type OutputSchema<S extends z.ZodRawShape = z.ZodRawShape> = z.ZodObject<S>;
export type FieldsOf<S extends z.ZodRawShape> = z.output<z.ZodObject<S>>;

/** Result record of one successful execution. `fields` conforms to the producing Step's schema. */
export interface Output<T = OutputFields> {
  readonly step: string;
  readonly fields: Readonly<T>;
}

export interface OutputFieldSpec {
  name: string;
  optional: boolean;
  description?: string;
}

export function describeOutput(schema: OutputSchema): OutputFieldSpec[] {
  return Object.entries(schema.shape).map(([name, type]) => ({
    name,
    optional: type.isOptional(),
    ...(type.description ? { description: type.description } : {}),
  }));
}

/**
 * Checks raw fields against the schema. A missing or mistyped declared field
 * fails the execution; undeclared fields are dropped.
 */
export function createOutput<S extends z.ZodRawShape>(
  step: string,
  schema: OutputSchema<S>,
  raw: unknown
): Result<Output<FieldsOf<S>>, ExecutionError> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return err(
      new ExecutionError(step, `output does not match its schema (${formatZodIssues(parsed.error).join("; ")})`, {
        cause: parsed.error,
      })
    );
  }
  return ok(freezeOutput(step, parsed.data));
}

export function freezeOutput<T>(step: string, fields: T): Output<T> {
  return Object.freeze({ step, fields: Object.freeze({ ...fields }) });
}
