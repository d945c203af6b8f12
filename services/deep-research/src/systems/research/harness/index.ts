/**
 * Harness Exports
 */

export { Dispatcher, buildAssignments, type DispatchOptions, type DispatcherOptions } from "./dispatcher.js";
export { runPool, runWithBudget, type BudgetedResult } from "./pool.js";
