/**
 * @module runtime
 * @description Process-wide collaborators of the library: the random source
 * used by `shuffle` and the logger the invoker reports to. The default
 * logger is built on first use from the `BLOCKWISE_LOG_*` environment.
 *
 * @category Core
 * @since 2025-07-03
 */

import {
  isBaseLogger,
  loggerFactory,
  resolveLoggerConfig,
} from "@blockwise/logger";

import type { BaseLogger } from "@blockwise/logger";

export interface Runtime {
  /** Returns a number in [0, 1). */
  readonly random: () => number;
  readonly logger: BaseLogger;
}

const createDefaultRuntime = (): Runtime => ({
  random: Math.random,
  logger: loggerFactory(resolveLoggerConfig()).logger,
});

let current: Runtime | undefined;

export const getRuntime = (): Runtime => (current ??= createDefaultRuntime());

/**
 * Replaces parts of the runtime. Throws `TypeError` for collaborators of the
 * wrong shape.
 *
 * @example
 * configureRuntime({ random: () => 0 });
 * shuffle([1, 2, 3, 4]); // => [4, 1, 2, 3]
 */
export const configureRuntime = (overrides: Partial<Runtime>): Runtime => {
  if (overrides.random !== undefined && typeof overrides.random !== "function") {
    throw new TypeError(
      `[runtime] random must be a function, got ${typeof overrides.random}`,
    );
  }
  if (overrides.logger !== undefined && !isBaseLogger(overrides.logger)) {
    throw new TypeError(
      "[runtime] logger must provide trace, debug, info, warn, error and fatal",
    );
  }
  current = { ...getRuntime(), ...overrides };
  return current;
};

/** Drops every override; the defaults are rebuilt on next use. */
export const resetRuntime = (): void => {
  current = undefined;
};
