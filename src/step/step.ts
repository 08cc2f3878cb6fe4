import { z } from "zod";
import { err, ok, type Result } from "neverthrow";
import type { Context } from "../context/index.js";
import { defaultContext } from "../context/defaults.js";
import {
  CancelledError,
  ConfigResolutionError,
  ExecutionError,
  ValidationError,
  formatZodIssues,
  type StepError,
} from "../errors/index.js";
import { getLogger, fmtMs, COLOR, type Logger } from "../logging/index.js";
import { createOutput, describeOutput, type FieldsOf, type Output } from "../output/index.js";
import type {
  ExecuteOptions,
  StepDescription,
  StepKind,
  StepLike,
  StepRequirements,
  StepState,
} from "../types/contracts.js";

/** Configuration requirements keyed by dotted Context path, e.g. `{ "source.path": z.string() }`. */
export type ConfigShape = z.ZodRawShape;
export type ResolvedConfig<R extends ConfigShape> = z.output<z.ZodObject<R>>;

type MaybePromise<T> = T | Promise<T>;

export interface StepRunContext<C> {
  /** The Context this execution runs against; read-only. */
  readonly context: Context;
  /** Required configuration, resolved from `context` and parsed by its declared types. */
  readonly config: C;
  readonly logger: Logger;
  readonly signal: AbortSignal;
  /** Throws a CancelledError when the signal has been aborted. */
  throwIfCancelled(): void;
}

export interface StepDefinition<R extends ConfigShape, I, S extends z.ZodRawShape> {
  name: string;
  kind?: Exclude<StepKind, "task">;
  description?: string;
  /** Context paths this step needs. Optional zod types mark optional paths. */
  requires: R;
  /** Parsed before run(); a mismatch is a ValidationError. */
  input?: z.ZodType<I, z.ZodTypeDef, unknown>;
  output: z.ZodObject<S>;
  idempotent?: boolean;
  /** Precondition over the resolved configuration; returned strings are validation issues. */
  check?(config: ResolvedConfig<R>): string[] | undefined;
  run(ctx: StepRunContext<ResolvedConfig<R>>, input: I): MaybePromise<z.input<z.ZodObject<S>>>;
}

export interface StepOptions {
  /** Context bound to this step and used by run(). Defaults to `defaultContext`. */
  context?: Context;
}

/**
 * Atomic unit of work: declares the configuration it needs and the Output it
 * produces, validates the former against a Context and checks the latter after
 * running. Failures come back as typed Results, never as thrown errors.
 */
export class Step<R extends ConfigShape = ConfigShape, I = unknown, S extends z.ZodRawShape = z.ZodRawShape>
  implements StepLike<I, FieldsOf<S>>
{
  readonly name: string;
  readonly kind: StepKind;
  readonly idempotent: boolean;
  readonly description?: string;
  readonly context: Context;

  private readonly configSchema: z.ZodObject<R>;
  private readonly logger: Logger;
  private _state: StepState = "constructed";

  constructor(
    private readonly definition: StepDefinition<R, I, S>,
    options: StepOptions = {}
  ) {
    if (!definition.name) throw new TypeError("Step name is required");
    this.name = definition.name;
    this.kind = definition.kind ?? "step";
    this.idempotent = definition.idempotent ?? false;
    this.description = definition.description;
    this.context = options.context ?? defaultContext;
    this.configSchema = z.object(definition.requires);
    this.logger = getLogger(definition.name);
  }

  get state(): StepState {
    return this._state;
  }

  /** Same definition bound to another Context. */
  withContext(context: Context): Step<R, I, S> {
    return new Step(this.definition, { context });
  }

  declareRequirements(): StepRequirements {
    return {
      config: Object.entries(this.configSchema.shape).map(([path, type]) => ({
        path,
        optional: type.isOptional(),
        ...(type.description ? { description: type.description } : {}),
      })),
      output: describeOutput(this.definition.output),
    };
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

  validate(context: Context = this.context): Result<void, ConfigResolutionError | ValidationError> {
    const result = this.resolveConfig(context).andThen(config => this.checkConfig(config));
    if (result.isErr()) {
      this._state = "failed";
      this.logger.error(result.error.message);
      return err(result.error);
    }
    this._state = "validated";
    return ok(undefined);
  }

  async execute(context: Context, input: I, options: ExecuteOptions = {}): Promise<Result<Output<FieldsOf<S>>, StepError>> {
    const signal = options.signal ?? new AbortController().signal;
    if (signal.aborted) {
      return this.fail(new CancelledError({ unit: this.name, reason: signal.reason }));
    }
    const config = this.resolveConfig(context).andThen(c => this.checkConfig(c));
    if (config.isErr()) return this.fail(config.error);
    const parsedInput = this.parseInput(input);
    if (parsedInput.isErr()) return this.fail(parsedInput.error);

    this._state = "executing";
    const started = Date.now();
    this.logger.step(`${COLOR.cyan("▶")} ${this.name}`, { kind: this.kind });

    const runCtx: StepRunContext<ResolvedConfig<R>> = {
      context,
      config: config.value,
      logger: this.logger,
      signal,
      throwIfCancelled: () => {
        if (signal.aborted) throw new CancelledError({ unit: this.name, reason: signal.reason });
      },
    };

    let raw: unknown;
    try {
      raw = await this.definition.run(runCtx, parsedInput.value);
    } catch (e) {
      if (e instanceof CancelledError) return this.fail(e);
      if (signal.aborted) return this.fail(new CancelledError({ unit: this.name, reason: signal.reason, cause: e }));
      return this.fail(new ExecutionError(this.name, e instanceof Error ? e.message : String(e), { cause: e }));
    }

    const output = createOutput(this.name, this.definition.output, raw);
    if (output.isErr()) return this.fail(output.error);

    this._state = "succeeded";
    this.logger.step(`${COLOR.green("✓ done")} ${this.name} ${COLOR.gray(`(${fmtMs(Date.now() - started)})`)}`);
    return ok(output.value);
  }

  /** Validates against the bound Context, then executes. */
  async run(input: I, options?: ExecuteOptions): Promise<Result<Output<FieldsOf<S>>, StepError>> {
    const validated = this.validate(this.context);
    if (validated.isErr()) return err(validated.error);
    return this.execute(this.context, input, options);
  }

  private resolveConfig(context: Context): Result<ResolvedConfig<R>, ConfigResolutionError> {
    const raw: Record<string, unknown> = {};
    for (const [path, type] of Object.entries(this.configSchema.shape)) {
      const found = context.resolve(path);
      if (found.isOk()) {
        raw[path] = found.value;
      } else if (!type.isOptional()) {
        return err(new ConfigResolutionError(this.name, path, "missing", [found.error.message], { cause: found.error }));
      }
    }
    const parsed = this.configSchema.safeParse(raw);
    if (parsed.success) return ok(parsed.data);
    const first = parsed.error.issues[0];
    const path = first && typeof first.path[0] === "string" ? first.path[0] : "";
    return err(new ConfigResolutionError(this.name, path, "type", formatZodIssues(parsed.error), { cause: parsed.error }));
  }

  private checkConfig(config: ResolvedConfig<R>): Result<ResolvedConfig<R>, ValidationError> {
    const issues = this.definition.check?.(config) ?? [];
    return issues.length ? err(new ValidationError(this.name, issues)) : ok(config);
  }

  private parseInput(input: I): Result<I, ValidationError> {
    const schema = this.definition.input;
    if (!schema) return ok(input);
    const parsed = schema.safeParse(input);
    if (parsed.success) return ok(parsed.data);
    return err(new ValidationError(this.name, formatZodIssues(parsed.error).map(i => `input ${i}`), { cause: parsed.error }));
  }

  private fail<E extends StepError>(error: E): Result<never, E> {
    this._state = "failed";
    if (error instanceof CancelledError) this.logger.warn(error.message);
    else this.logger.error(error.message);
    return err(error);
  }
}

export function defineStep<R extends ConfigShape, I = unknown, S extends z.ZodRawShape = z.ZodRawShape>(
  definition: StepDefinition<R, I, S>,
  options?: StepOptions
): Step<R, I, S> {
  return new Step(definition, options);
}
