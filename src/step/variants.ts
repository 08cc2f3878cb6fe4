import { z } from "zod";
import { Step, type ConfigShape, type StepDefinition, type StepOptions } from "./step.js";

export type Row = Record<string, unknown>;

export const Records = z.array(z.record(z.unknown()));

/** Input of every step that consumes a dataset: the `data` field of the previous Output. */
export const DatasetInput = z.object({ data: Records });
export type DatasetInput = z.output<typeof DatasetInput>;

type DatasetShape = z.ZodRawShape & { data: z.ZodTypeAny };

/** A reader populates `data` from an external source; it takes no input. */
export function defineReader<R extends ConfigShape, S extends DatasetShape>(
  definition: Omit<StepDefinition<R, unknown, S>, "kind" | "input">,
  options?: StepOptions
): Step<R, unknown, S> {
  return new Step<R, unknown, S>({ ...definition, kind: "reader" }, options);
}

/** A transformation turns its input dataset into a new `data` field. */
export function defineTransformation<R extends ConfigShape, I, S extends DatasetShape>(
  definition: Omit<StepDefinition<R, I, S>, "kind" | "input"> & { input: z.ZodType<I, z.ZodTypeDef, unknown> },
  options?: StepOptions
): Step<R, I, S> {
  return new Step<R, I, S>({ ...definition, kind: "transformation" }, options);
}

/** A writer consumes its input dataset and reports what it wrote. */
export function defineWriter<R extends ConfigShape, I, S extends z.ZodRawShape>(
  definition: Omit<StepDefinition<R, I, S>, "kind" | "input"> & { input: z.ZodType<I, z.ZodTypeDef, unknown> },
  options?: StepOptions
): Step<R, I, S> {
  return new Step<R, I, S>({ ...definition, kind: "writer" }, options);
}
