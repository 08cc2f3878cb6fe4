export { Context, isNamespace, type ContextSource, type Namespace, type SourceMapping } from "./context/index.js";
export { fromDotenvFile, fromEnv, fromJsonFile, type EnvSourceOptions } from "./context/sources.js";
export { defaultContext } from "./context/defaults.js";
export { loadSettings, type Settings } from "./config/settings.js";
export {
  CancelledError,
  CompositionError,
  ConfigResolutionError,
  ContextKeyNotFoundError,
  ExecutionError,
  ValidationError,
  describeError,
  errorChain,
  failurePath,
  isCancellation,
  isStepError,
  originOf,
  type CompletedChild,
  type LeafError,
  type StepError,
  type StepPhase,
} from "./errors/index.js";
export {
  COLOR,
  configureLogging,
  consoleSink,
  getLogger,
  memorySink,
  type LogFields,
  type LogLevel,
  type LogRecord,
  type LogSink,
  type Logger,
} from "./logging/index.js";
export { createOutput, describeOutput, type FieldsOf, type Output, type OutputFieldSpec, type OutputFields } from "./output/index.js";
export {
  Step,
  defineStep,
  type ConfigShape,
  type ResolvedConfig,
  type StepDefinition,
  type StepOptions,
  type StepRunContext,
} from "./step/step.js";
export { DatasetInput, Records, defineReader, defineTransformation, defineWriter, type Row } from "./step/variants.js";
export {
  Task,
  sequence,
  type Aggregation,
  type ChainFn,
  type HistoryEntry,
  type TaskDefinition,
  type TaskOptions,
  type TaskOutput,
} from "./orchestrator/task.js";
export { budgetSignal, type Budget } from "./orchestrator/budget.js";
export { entriesFor, type Trace, type TraceEntry } from "./orchestrator/trace.js";
export { jsonFileReader, jsonFileWriter } from "./steps/io/jsonFile.js";
export { filterRecords, mapRecords } from "./steps/transform/records.js";
export type {
  AnyStep,
  ConfigRequirementSpec,
  ExecuteOptions,
  StepDescription,
  StepKind,
  StepLike,
  StepRequirements,
  StepState,
  ValidateError,
} from "./types/contracts.js";
