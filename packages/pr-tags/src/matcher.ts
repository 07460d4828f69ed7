/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * PR-tag expression matching
 *
 * Expression = Clause (';' Clause)*   clauses are OR'd
 * Clause     = Term ('+' Term)*       terms are AND'd
 * Term       = Atom ('/' Atom)*       atoms are OR'd
 *
 * An atom matches when it occurs in the configuration string as a whole
 * word, case-insensitively unless `caseSensitive` is set. Example: `+ABC/DEF/A11+K11;` matches any
 * configuration containing K11 and at least one of ABC, DEF or A11.
 */

/** One '/'-separated alternative list */
export type PrTagTerm = readonly string[];
/** '+'-separated terms, all required */
export type PrTagClause = readonly PrTagTerm[];

export interface MatchOptions {
  /** Compare atoms with exact case. Default false */
  caseSensitive?: boolean;
}

export interface PrTagPattern {
  /** Source expression */
  readonly expression: string;
  /** Disjunction of conjunctions of alternatives */
  readonly clauses: readonly PrTagClause[];
  /** True if the expression produced no clause; such a pattern never matches */
  readonly isEmpty: boolean;
  /** Test a full configuration string */
  matches(config: string, options?: MatchOptions): boolean;
}

const CLAUSE_SEPARATOR = ';';
const TERM_SEPARATOR = '+';
const ATOM_SEPARATOR = '/';

/** Characters that count as part of a word on either side of an atom */
const WORD_CHAR = 'A-Za-z0-9_';

const patternCache = new Map<string, PrTagPattern>();
const atomCache = new Map<string, RegExp>();
const exactAtomCache = new Map<string, RegExp>();

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&');
}

function atomRegExp(atom: string, caseSensitive: boolean): RegExp {
  const cache = caseSensitive ? exactAtomCache : atomCache;
  const key = caseSensitive ? atom : atom.toUpperCase();
  let regex = cache.get(key);
  if (!regex) {
    regex = new RegExp(`(?<![${WORD_CHAR}])${escapeRegExp(atom)}(?![${WORD_CHAR}])`, caseSensitive ? '' : 'i');
    cache.set(key, regex);
  }
  return regex;
}

function parseClauses(expression: string): PrTagClause[] {
  const clauses: PrTagClause[] = [];

  for (const rawClause of expression.split(CLAUSE_SEPARATOR)) {
    const terms: PrTagTerm[] = [];

    for (const rawTerm of rawClause.split(TERM_SEPARATOR)) {
      const atoms = rawTerm
        .split(ATOM_SEPARATOR)
        .map((atom) => atom.trim())
        .filter((atom) => atom.length > 0);

      if (atoms.length > 0) {
        terms.push(atoms);
      }
    }

    if (terms.length > 0) {
      clauses.push(terms);
    }
  }

  return clauses;
}

function matchClause(clause: PrTagClause, config: string, caseSensitive: boolean): boolean {
  return clause.every((term) => term.some((atom) => atomRegExp(atom, caseSensitive).test(config)));
}

function createPattern(expression: string): PrTagPattern {
  const clauses = parseClauses(expression);

  return Object.freeze({
    expression,
    clauses,
    isEmpty: clauses.length === 0,
    matches(config: string, options: MatchOptions = {}): boolean {
      if (!config) return false;
      const caseSensitive = options.caseSensitive ?? false;
      return clauses.some((clause) => matchClause(clause, config, caseSensitive));
    },
  });
}

/**
 * Compile a PR-tag expression. Patterns are memoized per expression string.
 * Never throws; malformed input degrades to literal atoms or an empty pattern.
 */
export function compilePrTags(expression: string | null | undefined): PrTagPattern {
  const key = expression ?? '';
  let pattern = patternCache.get(key);
  if (!pattern) {
    pattern = createPattern(key);
    patternCache.set(key, pattern);
  }
  return pattern;
}

/**
 * Convenience: compile and test in one call
 */
export function matchPrTags(expression: string | null | undefined, config: string): boolean {
  return compilePrTags(expression).matches(config);
}

/**
 * Distinct atoms of an expression, in order of first appearance
 */
export function prTagAtoms(expression: string | null | undefined): string[] {
  const atoms = new Set<string>();
  for (const clause of compilePrTags(expression).clauses) {
    for (const term of clause) {
      for (const atom of term) {
        atoms.add(atom);
      }
    }
  }
  return Array.from(atoms);
}

/** True if the string carries at least one matchable clause */
export function hasPrTags(expression: string | null | undefined): boolean {
  return !compilePrTags(expression).isEmpty;
}

/**
 * Report input that falls outside the three-level grammar.
 * Grouping characters and whitespace inside atoms are taken literally by the
 * matcher, which is rarely what an author intended.
 *
 * @returns a warning message, or null when the expression is plain
 */
export function describePrTagAmbiguity(expression: string | null | undefined): string | null {
  if (!expression) return null;

  if (/[()[\]{}]/.test(expression)) {
    return `PR tags "${expression}" contain grouping characters; only ';', '+' and '/' are operators`;
  }

  for (const clause of compilePrTags(expression).clauses) {
    for (const term of clause) {
      for (const atom of term) {
        if (/\s/.test(atom)) {
          return `PR tags "${expression}" contain whitespace inside the atom "${atom}"`;
        }
      }
    }
  }

  return null;
}

export function clearPrTagCache(): void {
  patternCache.clear();
  atomCache.clear();
  exactAtomCache.clear();
}

export function prTagCacheSize(): number {
  return patternCache.size;
}
