/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @lookswitch/pr-tags - PR-tag boolean expressions
 *
 * - ';' separates alternative clauses (OR)
 * - '+' joins required terms (AND)
 * - '/' separates alternative codes within a term (OR)
 */

export {
  compilePrTags,
  matchPrTags,
  prTagAtoms,
  hasPrTags,
  describePrTagAmbiguity,
  clearPrTagCache,
  prTagCacheSize,
} from './matcher.js';
export type { MatchOptions, PrTagPattern, PrTagClause, PrTagTerm } from './matcher.js';
