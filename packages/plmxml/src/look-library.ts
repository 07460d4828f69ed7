/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Look library - material targets and their candidate variants
 *
 * Each user value of the LookLibrary instance encodes one target:
 *
 *   E_Seat_Cover~  [SC-031~ ALLE+ABC; ~ Short text] [SC-032~ ALLE+DEF; ~ Long text]
 *
 * The target name is the leading identifier, every bracket group is one
 * variant made of name, PR tags and description separated by `~`.
 */

import { createLogger } from '@lookswitch/data';
import { compilePrTags } from '@lookswitch/pr-tags';
import type { MaterialTarget, MaterialVariant } from './types.js';

const log = createLogger('LookLibrary');

const TARGET_NAME = /^[a-zA-Z][a-zA-Z0-9_]*/;
const VARIANT_GROUP = /\[(.*?)\]/g;
const FIELD_SEPARATOR = /\s~\s|~\s/;

export interface LookValueParseResult {
  target: MaterialTarget | null;
  warnings: string[];
}

/**
 * Parse one look library value into a material target.
 * Returns a null target when the value has no target name or no variant group.
 * Groups that do not split into exactly three fields are skipped.
 */
export function parseMaterialTarget(value: string): LookValueParseResult {
  const warnings: string[] = [];

  const nameMatch = TARGET_NAME.exec(value);
  if (!nameMatch) {
    warnings.push(`Look library value without target name skipped: "${value}"`);
    return { target: null, warnings };
  }
  const name = nameMatch[0];

  const groups = Array.from(value.matchAll(VARIANT_GROUP), (match) => match[1]);
  if (groups.length === 0) {
    warnings.push(`Look library target ${name} has no variant groups and was skipped`);
    return { target: null, warnings };
  }

  const variants: MaterialVariant[] = [];
  for (const group of groups) {
    const fields = group.split(FIELD_SEPARATOR);
    if (fields.length !== 3) {
      warnings.push(`Malformed variant "[${group}]" of target ${name} skipped`);
      continue;
    }
    const [variantName, prTags, description] = fields;
    variants.push(Object.freeze({ name: variantName, prTags, description }));
  }

  if (variants.length === 0) {
    warnings.push(`Look library target ${name} has no valid variants`);
  }

  return { target: Object.freeze({ name, variants: Object.freeze(variants) }), warnings };
}

export interface TargetConflicts {
  target: string;
  /** One entry per variant that also matches an earlier variant's tags */
  entries: string[];
}

/**
 * Find variants of a target that match a PR-tag expression seen earlier in
 * the same target. Advisory: matching variants are still resolved in order.
 * Atoms are compared with exact case here, unlike configuration matching.
 */
export function findTargetConflicts(target: MaterialTarget): TargetConflicts {
  const seen: string[] = [];
  const entries: string[] = [];

  for (const variant of target.variants) {
    const pattern = compilePrTags(variant.prTags);
    for (const previous of seen) {
      if (pattern.matches(previous, { caseSensitive: true })) {
        entries.push(`${variant.name} - ${variant.prTags} is also matching ${previous}`);
      }
    }
    if (!seen.includes(variant.prTags)) {
      seen.push(variant.prTags);
    }
  }

  return { target: target.name, entries };
}

export class LookLibrary {
  private readonly targetMap: ReadonlyMap<string, MaterialTarget>;
  readonly conflicts: readonly string[];
  readonly conflictingTargets: readonly string[];

  constructor(targets: ReadonlyMap<string, MaterialTarget>) {
    this.targetMap = targets;

    const conflicts: string[] = [];
    const conflictingTargets: string[] = [];
    for (const target of targets.values()) {
      const { entries } = findTargetConflicts(target);
      if (entries.length > 0) {
        conflicts.push(`${target.name} variants: ${entries.join(' ')}`);
        conflictingTargets.push(target.name);
      }
    }
    this.conflicts = Object.freeze(conflicts);
    this.conflictingTargets = Object.freeze(conflictingTargets);
  }

  static empty(): LookLibrary {
    return new LookLibrary(new Map());
  }

  /** True if at least one target was parsed */
  get isValid(): boolean {
    return this.targetMap.size > 0;
  }

  get size(): number {
    return this.targetMap.size;
  }

  get variantCount(): number {
    let count = 0;
    for (const target of this.targetMap.values()) {
      count += target.variants.length;
    }
    return count;
  }

  get(name: string): MaterialTarget | undefined {
    return this.targetMap.get(name);
  }

  has(name: string): boolean {
    return this.targetMap.has(name);
  }

  targetNames(): string[] {
    return Array.from(this.targetMap.keys());
  }

  /** Targets in library order */
  targets(): IterableIterator<MaterialTarget> {
    return this.targetMap.values();
  }

  /** Every (target, variant) pair in declared order */
  *variants(): Generator<[MaterialTarget, MaterialVariant]> {
    for (const target of this.targetMap.values()) {
      for (const variant of target.variants) {
        yield [target, variant];
      }
    }
  }

  /**
   * Log the conflict report: one error per conflicting target
   */
  reportConflicts(): readonly string[] {
    if (this.conflicts.length === 0) {
      log.debug('No conflicting PR tag / target combinations');
    }
    for (const conflict of this.conflicts) {
      log.error(`Conflict: ${conflict}`);
    }
    return this.conflicts;
  }
}

/**
 * Accumulates look library values. A repeated target name replaces the
 * earlier definition and records a warning.
 */
export class LookLibraryBuilder {
  private readonly targetMap = new Map<string, MaterialTarget>();
  private readonly warnings: string[] = [];

  addValue(value: string): this {
    const { target, warnings } = parseMaterialTarget(value);
    for (const warning of warnings) {
      this.warn(warning);
    }
    if (target) {
      this.addTarget(target);
    }
    return this;
  }

  addTarget(target: MaterialTarget): this {
    if (this.targetMap.has(target.name)) {
      this.warn(`Material target ${target.name} defined more than once, using the last definition`);
    }
    this.targetMap.set(target.name, target);
    return this;
  }

  getWarnings(): readonly string[] {
    return this.warnings;
  }

  build(): LookLibrary {
    return new LookLibrary(new Map(this.targetMap));
  }

  private warn(message: string): void {
    this.warnings.push(message);
    log.warn(message);
  }
}
