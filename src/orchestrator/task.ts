import { err, ok, type Result } from "neverthrow";
import type { Context } from "../context/index.js";
import { defaultContext } from "../context/defaults.js";
import {
  CancelledError,
  CompositionError,
  ExecutionError,
  isCancellation,
  type StepError,
  type StepPhase,
} from "../errors/index.js";
import { COLOR, fmtMs, getLogger, type Logger } from "../logging/index.js";
import type { Output, OutputFieldSpec, OutputFields } from "../output/index.js";
import type {
  AnyStep,
  ConfigRequirementSpec,
  ExecuteOptions,
  StepDescription,
  StepKind,
  StepLike,
  StepRequirements,
  StepState,
} from "../types/contracts.js";
import { budgetSignal, type Budget } from "./budget.js";
import { append, completedChildren, createTrace, latest, type Trace, type TraceEntry } from "./trace.js";

/**
 * How a Task assembles its Output. `last`: the last child's fields. `history`:
 * `{ last, history }` where history lists every child's fields in order.
 */
export type Aggregation = "last" | "history";

/** Turns child `position`'s Output into the next child's input. */
export type ChainFn = (output: Output, child: AnyStep, position: number) => unknown;

export interface TaskDefinition {
  name: string;
  description?: string;
  children: readonly AnyStep[];
  aggregation?: Aggregation;
  /** Defaults to passing `output.fields`. */
  chain?: ChainFn;
  /** Narrows or augments the Context a child sees. Defaults to the Task's own Context. */
  contextFor?: (context: Context, child: AnyStep, position: number) => Context;
  budget?: Budget;
  /** Defaults to true when every child is idempotent. */
  idempotent?: boolean;
}

export interface TaskOptions {
  context?: Context;
}

export interface HistoryEntry {
  position: number;
  step: string;
  fields: Readonly<OutputFields>;
}

/** A Task's Output carries the trace of every child that ran. */
export interface TaskOutput extends Output<OutputFields> {
  readonly trace: readonly TraceEntry[];
}

const passFields: ChainFn = output => output.fields;

/**
 * Ordered composition of Steps and Tasks that itself satisfies the Step
 * contract. Children run one after another in declared order; the first
 * failure stops the Task and comes back wrapped with the child's name,
 * 1-based position and the children that had completed. Side effects of
 * completed children are not undone.
 */
export class Task implements StepLike<unknown, OutputFields> {
  readonly name: string;
  readonly kind: StepKind = "task";
  readonly idempotent: boolean;
  readonly description?: string;
  readonly aggregation: Aggregation;
  readonly children: readonly AnyStep[];
  readonly context: Context;

  private readonly chain: ChainFn;
  private readonly logger: Logger;
  private _state: StepState = "constructed";

  constructor(
    private readonly definition: TaskDefinition,
    options: TaskOptions = {}
  ) {
    if (!definition.name) throw new TypeError("Task name is required");
    if (definition.children.length === 0) throw new TypeError(`Task '${definition.name}' has no children`);
    this.name = definition.name;
    this.description = definition.description;
    this.children = Object.freeze([...definition.children]);
    this.aggregation = definition.aggregation ?? "last";
    this.chain = definition.chain ?? passFields;
    this.idempotent = definition.idempotent ?? this.children.every(c => c.idempotent);
    this.context = options.context ?? defaultContext;
    this.logger = getLogger(definition.name);
  }

  get state(): StepState {
    return this._state;
  }

  withContext(context: Context): Task {
    return new Task(this.definition, { context });
  }

  /**
   * Union of the children's configuration paths (first declaration wins; a path
   * is optional only if every child declares it optional) and the aggregated
   * output fields. Paths are reported as each child declares them: a child
   * that `contextFor` narrows to a namespace still reports paths relative to
   * that namespace, not to the Task's Context.
   */
  declareRequirements(): StepRequirements {
    const config = new Map<string, ConfigRequirementSpec>();
    for (const child of this.children) {
      for (const req of child.declareRequirements().config) {
        const seen = config.get(req.path);
        if (!seen) config.set(req.path, { ...req });
        else if (!req.optional) seen.optional = false;
      }
    }
    return { config: [...config.values()], output: this.outputSpec() };
  }

  describe(): StepDescription {
    return {
      name: this.name,
      kind: this.kind,
      idempotent: this.idempotent,
      ...(this.description ? { description: this.description } : {}),
      requirements: this.declareRequirements(),
    };
  }

  /** Validates every child in order; stops at the first failure. */
  validate(context: Context = this.context): Result<void, CompositionError> {
    for (let i = 0; i < this.children.length; i++) {
      const child = this.children[i];
      const position = i + 1;
      const validated = child.validate(this.childContext(context, child, position));
      if (validated.isErr()) {
        return this.fail(this.wrap(child, position, "validate", [], validated.error));
      }
    }
    this._state = "validated";
    return ok(undefined);
  }

  async execute(context: Context, input: unknown, options: ExecuteOptions = {}): Promise<Result<TaskOutput, StepError>> {
    const signal = budgetSignal(this.definition.budget, options.signal);
    const total = this.children.length;
    const trace = createTrace();
    const started = Date.now();
    let artifact = input;

    this._state = "executing";
    this.logger.step(`${COLOR.cyan("▶ task")} ${this.name} ${COLOR.gray(`(${total} steps)`)}`);

    for (let i = 0; i < total; i++) {
      const child = this.children[i];
      const position = i + 1;

      if (signal?.aborted) {
        return this.fail(
          new CancelledError({ unit: this.name, position, completed: completedChildren(trace), reason: signal.reason })
        );
      }

      const childContext = this.childContext(context, child, position);
      const validated = child.validate(childContext);
      if (validated.isErr()) {
        return this.fail(this.wrap(child, position, "validate", completedChildren(trace), validated.error));
      }

      this.logger.step(`${COLOR.cyan("▶ step")} ${position}/${total} ${child.name}`);
      const childStarted = Date.now();
      const result = await child.execute(childContext, artifact, signal ? { signal } : {});
      if (result.isErr()) {
        if (isCancellation(result.error)) {
          return this.fail(
            new CancelledError({
              unit: this.name,
              position,
              completed: completedChildren(trace),
              reason: signal?.reason,
              cause: result.error,
            })
          );
        }
        return this.fail(this.wrap(child, position, "execute", completedChildren(trace), result.error));
      }

      append(trace, { position, step: child.name, kind: child.kind, output: result.value });
      this.logger.step(`${COLOR.green("✓ step")} ${position}/${total} ${child.name} ${COLOR.gray(`(${fmtMs(Date.now() - childStarted)})`)}`);

      try {
        artifact = this.chain(result.value, child, position);
      } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        return this.fail(new ExecutionError(this.name, `chaining output of step ${position} '${child.name}' failed: ${reason}`, { cause: e }));
      }
    }

    this._state = "succeeded";
    this.logger.step(`${COLOR.green("✓ done")} ${this.name} ${COLOR.gray(`(${fmtMs(Date.now() - started)})`)}`);
    return ok(this.assemble(trace));
  }

  /** Validates and executes against the bound Context. */
  async run(input?: unknown, options?: ExecuteOptions): Promise<Result<TaskOutput, StepError>> {
    const validated = this.validate(this.context);
    if (validated.isErr()) return err(validated.error);
    return this.execute(this.context, input, options);
  }

  private childContext(context: Context, child: AnyStep, position: number): Context {
    return this.definition.contextFor ? this.definition.contextFor(context, child, position) : context;
  }

  private assemble(trace: Trace): TaskOutput {
    const frozenTrace = Object.freeze([...trace]);
    const last = latest(trace);
    const lastFields: Readonly<OutputFields> = last ? last.output.fields : {};
    const fields: OutputFields =
      this.aggregation === "history"
        ? {
            last: lastFields,
            history: trace.map((e): HistoryEntry => ({ position: e.position, step: e.step, fields: e.output.fields })),
          }
        : { ...lastFields };
    return Object.freeze({ step: this.name, fields: Object.freeze(fields), trace: frozenTrace });
  }

  private outputSpec(): OutputFieldSpec[] {
    if (this.aggregation === "history") {
      return [
        { name: "last", optional: false },
        { name: "history", optional: false },
      ];
    }
    return this.children[this.children.length - 1].declareRequirements().output;
  }

  private wrap(
    child: AnyStep,
    position: number,
    phase: StepPhase,
    completed: ReturnType<typeof completedChildren>,
    cause: StepError
  ): CompositionError {
    return new CompositionError({
      task: this.name,
      child: child.name,
      position,
      total: this.children.length,
      phase,
      completed,
      cause,
    });
  }

  private fail<E extends StepError>(error: E): Result<never, E> {
    this._state = "failed";
    this.logger.warn(error.message);
    return err(error);
  }
}

export function sequence(name: string, ...children: AnyStep[]): Task {
  return new Task({ name, children });
}
