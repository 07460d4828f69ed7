/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Configuration resolver
 *
 * Maps (document, configuration string) to node visibility and one active
 * variant per material target. Resolution never touches the document; every
 * call returns a fresh frozen result.
 */

import { createLogger } from '@lookswitch/data';
import type { PlmXmlDocument } from '@lookswitch/plmxml';
import { compilePrTags, hasPrTags } from '@lookswitch/pr-tags';
import type { ConfigurationDiagnostics, ConfigurationResult, DiagnosticsOverlay } from './types.js';

const log = createLogger('Configurator');

function freezeDiagnostics(diagnostics: ConfigurationDiagnostics): ConfigurationDiagnostics {
  return Object.freeze({
    notUpdatedTargets: Object.freeze([...diagnostics.notUpdatedTargets]),
    conflictingTargets: Object.freeze([...diagnostics.conflictingTargets]),
    missingNodes: Object.freeze([...diagnostics.missingNodes]),
    missingTargets: Object.freeze([...diagnostics.missingTargets]),
  });
}

/**
 * Resolve a document against a configuration string.
 *
 * Nodes without PR tags are left out of both visibility sets. When several
 * variants of a target match, the last one in declared order wins.
 */
export function resolveConfiguration(document: PlmXmlDocument, config: string): ConfigurationResult {
  const visibleNodeIds = new Set<string>();
  const invisibleNodeIds = new Set<string>();

  for (const node of document.configurableNodes()) {
    if (compilePrTags(node.prTags).matches(config)) {
      visibleNodeIds.add(node.id);
    } else {
      invisibleNodeIds.add(node.id);
    }
  }

  const activeVariants = new Map<string, string | null>();
  const notUpdatedTargets: string[] = [];

  for (const target of document.lookLibrary.targets()) {
    let active: string | null = null;
    for (const variant of target.variants) {
      if (!hasPrTags(variant.prTags)) continue;
      if (compilePrTags(variant.prTags).matches(config)) {
        active = variant.name;
        log.debug(`Switching material ${target.name} -> ${variant.name}`);
      }
    }
    activeVariants.set(target.name, active);
    if (active === null) {
      notUpdatedTargets.push(target.name);
    }
  }

  return Object.freeze({
    config,
    visibleNodeIds,
    invisibleNodeIds,
    activeVariants,
    diagnostics: freezeDiagnostics({
      notUpdatedTargets,
      conflictingTargets: document.lookLibrary.conflictingTargets,
      missingNodes: [],
      missingTargets: [],
    }),
  });
}

/**
 * Copy of a result with remote scene findings merged into its diagnostics
 */
export function withDiagnostics(result: ConfigurationResult, overlay: DiagnosticsOverlay): ConfigurationResult {
  const merge = (current: readonly string[], extra: readonly string[] | undefined): string[] =>
    Array.from(new Set([...current, ...(extra ?? [])]));

  return Object.freeze({
    ...result,
    diagnostics: freezeDiagnostics({
      ...result.diagnostics,
      missingNodes: merge(result.diagnostics.missingNodes, overlay.missingNodes),
      missingTargets: merge(result.diagnostics.missingTargets, overlay.missingTargets),
    }),
  });
}

/** Targets with an active variant, as [target, variant] pairs in library order */
export function* activeTargets(result: ConfigurationResult): Generator<[string, string]> {
  for (const [target, variant] of result.activeVariants) {
    if (variant !== null) {
      yield [target, variant];
    }
  }
}

/**
 * Build a configuration string from option codes: ['A', 'B'] -> '+A+B'
 */
export function createConfigString(codes: Iterable<string>): string {
  let config = '';
  for (const code of codes) {
    const trimmed = code.trim();
    if (trimmed) {
      config += `+${trimmed}`;
    }
  }
  return config;
}

/**
 * One-paragraph summary of a resolution for status output
 */
export function statusMessage(result: ConfigurationResult): string {
  const materials = Array.from(activeTargets(result)).length;
  const objects = result.visibleNodeIds.size + result.invisibleNodeIds.size;
  const notUpdated = result.diagnostics.notUpdatedTargets;

  return (
    `Updating configuration. Found ${materials} materials to update and ${objects} objects to update their visibility.\n` +
    `The following ${notUpdated.length} materials did not match the configuration and will not be updated:\n` +
    notUpdated.join('; ')
  );
}

/**
 * Holds a document and the result of the latest configuration
 */
export class ConfigurationResolver {
  private result: ConfigurationResult | null = null;

  constructor(readonly document: PlmXmlDocument) {}

  /** Result of the last update(), or null before the first one */
  get current(): ConfigurationResult | null {
    return this.result;
  }

  resolve(config: string): ConfigurationResult {
    return resolveConfiguration(this.document, config);
  }

  update(config: string): ConfigurationResult {
    this.result = this.resolve(config);
    log.info(statusMessage(this.result), { operation: 'update' });
    return this.result;
  }
}
