import type { CompletedChild } from "../errors/index.js";
import type { Output } from "../output/index.js";
import type { StepKind } from "../types/contracts.js";

export interface TraceEntry {
  position: number;
  step: string;
  kind: StepKind;
  output: Output;
}

/**
 * Per-invocation record of every child that finished, in execution order.
 * No timing data here; durations go to the log.
 */
export type Trace = TraceEntry[];

export function createTrace(): Trace {
  return [];
}

export function append(trace: Trace, entry: TraceEntry): TraceEntry {
  const rec = Object.freeze({ ...entry });
  trace.push(rec);
  return rec;
}

export function latest(trace: readonly TraceEntry[]): TraceEntry | undefined {
  return trace[trace.length - 1];
}

/** Entries of every child named `step`; a name may repeat within one Task. */
export function entriesFor(trace: readonly TraceEntry[], step: string): TraceEntry[] {
  return trace.filter(e => e.step === step);
}

export function completedChildren(trace: readonly TraceEntry[]): CompletedChild[] {
  return trace.map(e => ({ position: e.position, name: e.step, output: e.output }));
}
