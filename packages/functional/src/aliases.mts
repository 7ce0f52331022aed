/**
 * @module aliases
 * @description Alternative names for operations, under the names other
 * collection libraries use for them.
 *
 * @category Aliases
 * @since 2025-07-03
 */

import { map, reduce, reduceRight } from "./collection.mjs";
import { all, any, detect, select } from "./predicates.mjs";
import { first, includes, rest } from "./sequence.mjs";
import { uniq } from "./sets.mjs";

export {
  map as collect,
  all as every,
  select as filter,
  detect as find,
  reduce as foldl,
  reduceRight as foldr,
  reduce as inject,
  first as head,
  includes as include,
  any as some,
  rest as tail,
  uniq as unique,
};
