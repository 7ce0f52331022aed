/**
 * @module loop
 * @description Shared driver for every operation that invokes a callable
 * once per element. It consumes the loop signals and lets the rest through:
 *
 * - `continue` skips the element;
 * - `break` stops the pass, keeping the value it carries;
 * - `return` and `failure` stop the pass and propagate to the caller.
 *
 * @category Internal
 */

import { Outcome } from "./outcome.mjs";

/**
 * How a pass ended when it ended normally.
 */
export type LoopExit<B> =
  | { readonly broken: false }
  | { readonly broken: true; readonly value: B };

const completed: LoopExit<never> = { broken: false };

/**
 * Runs `step` for each item in order and hands every normal value to
 * `onValue`. Returning `false` from `onValue` ends the pass early, as if the
 * items had run out.
 */
export const loop = <T, R, B, E>(
  items: readonly T[],
  step: (item: T, index: number) => Outcome<R, B, E>,
  onValue: (value: R, item: T, index: number) => boolean | void,
): Outcome<LoopExit<B>, never, E> => {
  for (const [index, item] of items.entries()) {
    const outcome = step(item, index);
    switch (outcome.tag) {
      case "normal":
        if (onValue(outcome.value, item, index) === false) {
          return Outcome.normal(completed);
        }
        break;
      case "continue":
        break;
      case "break": {
        const exit: LoopExit<B> = { broken: true, value: outcome.value };
        return Outcome.normal(exit);
      }
      case "return":
      case "failure":
        return outcome;
    }
  }
  return Outcome.normal(completed);
};

/**
 * `loop` for passes that only care about side effects of `onValue`.
 */
export const ignore = (): void => undefined;

/**
 * JavaScript truthiness, used by every predicate operation.
 */
export const truthy = (value: unknown): boolean => Boolean(value);
