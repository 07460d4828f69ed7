/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Plain-text and JSON renderings of documents, results and outcomes
 */

import type { ApplyOutcome, SceneValidation, StepStatus } from '@lookswitch/authoring-client';
import type { ConfigurationResult } from '@lookswitch/configurator';
import type { PlmXmlDocument } from '@lookswitch/plmxml';

export interface ConfigurationResultJson {
  config: string;
  visibleNodeIds: string[];
  invisibleNodeIds: string[];
  activeVariants: Record<string, string | null>;
  diagnostics: {
    notUpdatedTargets: string[];
    conflictingTargets: string[];
    missingNodes: string[];
    missingTargets: string[];
  };
}

export function resultToJson(result: ConfigurationResult): ConfigurationResultJson {
  const { diagnostics } = result;
  return {
    config: result.config,
    visibleNodeIds: Array.from(result.visibleNodeIds),
    invisibleNodeIds: Array.from(result.invisibleNodeIds),
    activeVariants: Object.fromEntries(result.activeVariants),
    diagnostics: {
      notUpdatedTargets: [...diagnostics.notUpdatedTargets],
      conflictingTargets: [...diagnostics.conflictingTargets],
      missingNodes: [...diagnostics.missingNodes],
      missingTargets: [...diagnostics.missingTargets],
    },
  };
}

export function formatDocument(document: PlmXmlDocument): string[] {
  const name = document.sourceName ?? 'PLM-XML';
  if (document.error !== undefined) {
    return [`${name}: ${document.error}`];
  }

  const summary = document.summary();
  const lines = [
    `${name}: ${summary.nodes} product instances, ${summary.configurableNodes} with PR tags`,
    `Look library: ${summary.targets} material targets, ${summary.variants} variants`,
  ];
  for (const warning of document.warnings) {
    lines.push(`Warning: ${warning}`);
  }
  for (const conflict of document.conflicts) {
    lines.push(`Conflict: ${conflict}`);
  }
  if (!document.isValid) {
    lines.push('The document holds no product instances or no material targets');
  }
  return lines;
}

function step(label: string, status: StepStatus): string {
  return `${label.padEnd(12)}${status}`;
}

export function formatApplyOutcome(outcome: ApplyOutcome): string[] {
  const lines = [outcome.connected ? `Authoring service ${outcome.version ?? 'unknown'}` : 'Not connected'];

  if (outcome.connected) {
    lines.push(
      step('Visible', outcome.visibility.visible),
      step('Invisible', outcome.visibility.invisible),
      step('Dummy', outcome.dummy),
      step('Materials', outcome.materials)
    );
    if (outcome.connectedTargets.length > 0) {
      lines.push(`Connected targets: ${outcome.connectedTargets.join('; ')}`);
    }
    if (outcome.missingTargets.length > 0) {
      lines.push(`Missing targets: ${outcome.missingTargets.join('; ')}`);
    }
  }

  for (const error of outcome.errors) {
    lines.push(`Error: ${error}`);
  }
  lines.push(outcome.success ? 'Configuration applied' : 'Configuration applied with errors');
  return lines;
}

export function formatValidation(validation: SceneValidation): string[] {
  if (!validation.success) {
    return validation.errors.map((error) => `Error: ${error}`);
  }

  const lines = [
    `Missing nodes: ${validation.missingNodes.length}`,
    ...validation.missingNodes.map((id) => `  ${id}`),
    `Missing material targets: ${validation.missingTargets.length}`,
    ...validation.missingTargets.map((name) => `  ${name}`),
  ];
  if (validation.materialDummy) {
    lines.push(`Material dummy: ${validation.materialDummy.name}`);
  }
  return lines;
}
