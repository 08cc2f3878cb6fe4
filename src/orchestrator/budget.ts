export interface Budget {
  /** Wall-clock limit for one Task execution. */
  wallTimeMs?: number;
}

/**
 * Combines the caller's signal with the budget's deadline. Returns undefined
 * when neither exists.
 */
export function budgetSignal(budget: Budget | undefined, parent?: AbortSignal): AbortSignal | undefined {
  const signals: AbortSignal[] = [];
  if (parent) signals.push(parent);
  if (budget?.wallTimeMs !== undefined) signals.push(AbortSignal.timeout(Math.max(0, budget.wallTimeMs)));
  if (signals.length === 0) return undefined;
  if (signals.length === 1) return signals[0];
  return AbortSignal.any(signals);
}
