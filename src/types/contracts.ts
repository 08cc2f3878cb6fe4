import type { Result } from "neverthrow";
import type { Context } from "../context/index.js";
import type { CompositionError, ConfigResolutionError, StepError, ValidationError } from "../errors/index.js";
import type { Output, OutputFieldSpec, OutputFields } from "../output/index.js";

/**
 * Capability tag. Readers populate an output dataset from nothing, transformations
 * turn an input dataset into an output dataset, writers consume an input dataset
 * and report what they wrote.
 */
export type StepKind = "step" | "reader" | "transformation" | "writer" | "task";

export type StepState = "constructed" | "validated" | "executing" | "succeeded" | "failed";

export interface ConfigRequirementSpec {
  path: string;
  optional: boolean;
  description?: string;
}

export interface StepRequirements {
  config: ConfigRequirementSpec[];
  output: OutputFieldSpec[];
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

export type ValidateError = ConfigResolutionError | ValidationError | CompositionError;

/** The contract every unit of work satisfies, Tasks included. */
export interface StepLike<I = unknown, O = OutputFields> {
  readonly name: string;
  readonly kind: StepKind;
  /** Repeated execution with the same Context and input yields the same Output. Declared, not enforced. */
  readonly idempotent: boolean;
  /** Last observed lifecycle state of this instance. */
  readonly state: StepState;
  declareRequirements(): StepRequirements;
  validate(context: Context): Result<void, ValidateError>;
  execute(context: Context, input: I, options?: ExecuteOptions): Promise<Result<Output<O>, StepError>>;
}

export type AnyStep = StepLike<unknown, OutputFields>;

export interface StepDescription {
  name: string;
  kind: StepKind;
  idempotent: boolean;
  description?: string;
  requirements: StepRequirements;
}
