import type { ZodError } from "zod";
import type { Output } from "../output/index.js";

export type StepPhase = "validate" | "execute";

/** A child that finished before a Task stopped, with the Output it produced. */
export interface CompletedChild {
  position: number;
  name: string;
  output: Output;
}

/**
 * Dotted-path lookup failed. `stoppedAt` is the namespace where resolution
 * stopped ("" for the root), `segment` the key that was absent there.
 */
export class ContextKeyNotFoundError extends Error {
  public readonly _tag = "ContextKeyNotFoundError" as const;

  constructor(
    public readonly path: string,
    public readonly segment: string,
    public readonly stoppedAt: string
  ) {
    super(`Context key not found: '${path}' (no '${segment}' in ${stoppedAt ? `namespace '${stoppedAt}'` : "<root>"})`);
    this.name = "ContextKeyNotFoundError";
  }
}

/** A required Context path is absent or of the wrong type. Raised by validate(), before any side effect. */
export class ConfigResolutionError extends Error {
  public readonly _tag = "ConfigResolutionError" as const;

  constructor(
    public readonly step: string,
    public readonly path: string,
    public readonly reason: "missing" | "type",
    public readonly issues: string[],
    options?: { cause?: unknown }
  ) {
    super(`Step '${step}' requires config '${path}': ${issues.join("; ")}`, options);
    this.name = "ConfigResolutionError";
  }
}

/** A Step's own precondition on its resolved configuration or on its input failed. */
export class ValidationError extends Error {
  public readonly _tag = "ValidationError" as const;

  constructor(
    public readonly step: string,
    public readonly issues: string[],
    options?: { cause?: unknown }
  ) {
    super(`Step '${step}' is invalid: ${issues.join("; ")}`, options);
    this.name = "ValidationError";
  }
}

export class ExecutionError extends Error {
  public readonly _tag = "ExecutionError" as const;

  constructor(
    public readonly step: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`Step '${step}' failed: ${message}`, options);
    this.name = "ExecutionError";
  }
}

export interface CompositionErrorInit {
  task: string;
  child: string;
  position: number;
  total: number;
  phase: StepPhase;
  completed: CompletedChild[];
  cause: StepError;
}

/** A Task-level wrapping of a child's failure. */
export class CompositionError extends Error {
  public readonly _tag = "CompositionError" as const;
  public readonly task: string;
  public readonly child: string;
  public readonly position: number;
  public readonly total: number;
  public readonly phase: StepPhase;
  public readonly completed: readonly CompletedChild[];
  public readonly cause: StepError;

  constructor(init: CompositionErrorInit) {
    super(
      `Task '${init.task}' failed at step ${init.position}/${init.total} '${init.child}' during ${init.phase}` +
        ` (completed: ${listCompleted(init.completed)})`,
      { cause: init.cause }
    );
    this.name = "CompositionError";
    this.task = init.task;
    this.child = init.child;
    this.position = init.position;
    this.total = init.total;
    this.phase = init.phase;
    this.completed = Object.freeze([...init.completed]);
    this.cause = init.cause;
  }
}

export interface CancelledErrorInit {
  /** Task or Step that observed the abort. */
  unit: string;
  /** 1-based position of the child at which a Task observed the abort. */
  position?: number;
  completed?: CompletedChild[];
  reason?: unknown;
  cause?: unknown;
}

/** Execution was aborted by an external signal. Distinct from ExecutionError. */
export class CancelledError extends Error {
  public readonly _tag = "CancelledError" as const;
  public readonly unit: string;
  public readonly position?: number;
  public readonly completed: readonly CompletedChild[];
  public readonly reason: unknown;

  constructor(init: CancelledErrorInit) {
    const where = init.position !== undefined ? ` at step ${init.position}` : "";
    super(`'${init.unit}' was cancelled${where}: ${reasonText(init.reason)}`, { cause: init.cause });
    this.name = "CancelledError";
    this.unit = init.unit;
    this.position = init.position;
    this.completed = Object.freeze([...(init.completed ?? [])]);
    this.reason = init.reason;
  }
}

export type StepError =
  | ConfigResolutionError
  | ValidationError
  | ExecutionError
  | CompositionError
  | CancelledError;

/** Errors that name the leaf Step where a failure originated. */
export type LeafError = ConfigResolutionError | ValidationError | ExecutionError;

export function isStepError(e: unknown): e is StepError {
  return (
    e instanceof ConfigResolutionError ||
    e instanceof ValidationError ||
    e instanceof ExecutionError ||
    e instanceof CompositionError ||
    e instanceof CancelledError
  );
}

function isLeafError(e: unknown): e is LeafError {
  return e instanceof ConfigResolutionError || e instanceof ValidationError || e instanceof ExecutionError;
}

/** The error followed by every `cause` beneath it, outermost first. */
export function errorChain(error: unknown): unknown[] {
  const chain: unknown[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;
  while (current !== undefined && current !== null && !seen.has(current)) {
    chain.push(current);
    seen.add(current);
    current = current instanceof Error ? current.cause : undefined;
  }
  return chain;
}

/** The deepest error in the chain that identifies a leaf Step. */
export function originOf(error: unknown): LeafError | undefined {
  const leaves = errorChain(error).filter(isLeafError);
  return leaves[leaves.length - 1];
}

/** Task positions from the outermost Task inwards, e.g. `[1, 2]` for the 2nd child of the 1st child. */
export function failurePath(error: unknown): number[] {
  return errorChain(error)
    .filter((e): e is CompositionError => e instanceof CompositionError)
    .map(e => e.position);
}

export function isCancellation(error: unknown): boolean {
  return errorChain(error).some(e => e instanceof CancelledError);
}

export function describeError(error: unknown): string {
  return errorChain(error)
    .map((e, depth) => `${"  ".repeat(depth)}${e instanceof Error ? `${e.name}: ${e.message}` : String(e)}`)
    .join("\n");
}

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map(issue => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message));
}

function listCompleted(completed: readonly CompletedChild[]): string {
  if (completed.length === 0) return "none";
  return completed.map(c => `${c.position} '${c.name}'`).join(", ");
}

function reasonText(reason: unknown): string {
  if (reason instanceof Error) return reason.message;
  if (reason === undefined) return "aborted";
  return String(reason);
}
