/**
 * @blockwise/functional - Sequence utilities and the block invoker
 */

// re-export everything for full access
export * from "./aliases.mjs";
export * from "./callable.mjs";
export * from "./collection.mjs";
export * from "./invoker.mjs";
export * from "./iteration.mjs";
export * from "./mutation.mjs";
export * from "./outcome.mjs";
export * from "./predicates.mjs";
export * from "./runtime.mjs";
export * from "./scope.mjs";
export * from "./sequence.mjs";
export * from "./sets.mjs";
export * from "./strings.mjs";

export { truthy } from "./loop.mjs";
export type { LoopExit } from "./loop.mjs";
