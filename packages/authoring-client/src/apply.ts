/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Apply a resolved configuration to the authoring service scene and check
 * the scene against the document.
 */

import { basename } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { createLogger, formatError, NodeType } from '@lookswitch/data';
import type { PlmXmlDocument } from '@lookswitch/plmxml';
import { activeTargets, withDiagnostics, type ConfigurationResult } from '@lookswitch/configurator';
import type { AuthoringClient } from './client.js';
import { nodeDescriptorFromProductNode } from './requests.js';
import type { MaterialAssignment, NodeDescriptor } from './types.js';

const log = createLogger('AuthoringApply');

export type StepStatus = 'ok' | 'failed' | 'skipped';

export interface ApplyOptions {
  /** Assign this material to every target before the configured looks */
  materialDummy?: string;
  /** LINC id -> service node id, as returned by validateSceneVsPlmXml */
  sceneIds?: ReadonlyMap<string, string>;
  /** PLM-XML file used to re-seed the service when the dummy pass fails */
  scenePath?: string;
  useCopyMethod?: boolean;
  replaceTargetName?: boolean;
}

export interface ApplyOutcome {
  /** True when no step failed */
  success: boolean;
  connected: boolean;
  version: string | null;
  visibility: { visible: StepStatus; invisible: StepStatus };
  dummy: StepStatus;
  materials: StepStatus;
  /** Targets sent in the material connect request */
  connectedTargets: string[];
  /** Active targets the scene does not contain; left out of the request */
  missingTargets: string[];
  errors: string[];
  /** The applied result with the missing targets overlaid */
  result: ConfigurationResult;
}

function describeNodes(
  document: PlmXmlDocument,
  ids: Iterable<string>,
  sceneIds: ReadonlyMap<string, string> | undefined
): NodeDescriptor[] {
  const nodes: NodeDescriptor[] = [];
  for (const id of ids) {
    const node = document.graph.get(id);
    if (!node) continue;
    nodes.push(nodeDescriptorFromProductNode(node, node.lincId ? sceneIds?.get(node.lincId) : undefined));
  }
  return nodes;
}

async function runStep(
  name: string,
  errors: string[],
  action: () => Promise<boolean>,
  refusal: string
): Promise<StepStatus> {
  try {
    if (await action()) {
      log.info(`${name} done`, { operation: 'apply' });
      return 'ok';
    }
    errors.push(refusal);
  } catch (error) {
    errors.push(`${name} failed: ${formatError(error)}`);
  }
  log.error(`${name} failed`, undefined, { operation: 'apply' });
  return 'failed';
}

/**
 * Re-seed the service's scene ids: load the PLM-XML as a scene, then close it
 */
export async function reinitializeScene(
  client: AuthoringClient,
  path: string,
  options: { settleMs?: number } = {}
): Promise<boolean> {
  const settleMs = options.settleMs ?? 300;

  if (!(await client.loadScene(path, { native: false }))) {
    return false;
  }
  await sleep(settleMs);
  const closed = await client.closeScene(basename(path));
  await sleep(settleMs);
  return closed;
}

async function assignDummy(
  client: AuthoringClient,
  document: PlmXmlDocument,
  dummy: string,
  scenePath: string | undefined
): Promise<boolean> {
  const assignments = document.lookLibrary.targetNames().map((target) => ({ target, material: dummy }));
  log.info(`Assigning material dummy ${dummy} to ${assignments.length} targets`, { operation: 'apply' });

  const connect = async (): Promise<boolean> => {
    try {
      return await client.connectMaterials(assignments);
    } catch (error) {
      log.caught('Dummy assignment failed', error, { operation: 'apply' });
      return false;
    }
  };

  if (await connect()) return true;
  if (!scenePath) return false;

  log.debug('Dummy assignment failed, re-initializing the service scene');
  try {
    if (!(await reinitializeScene(client, scenePath))) return false;
  } catch (error) {
    log.caught('Scene re-initialization failed', error, { operation: 'apply' });
    return false;
  }
  return connect();
}

/**
 * Send a resolved configuration to the service.
 *
 * Steps run in a fixed order: version probe, visible nodes, invisible nodes,
 * optional material dummy, target discovery, material connect. Only the
 * version probe stops the sequence; later failures are collected in
 * `errors` and nothing is rolled back.
 */
export async function applyConfiguration(
  client: AuthoringClient,
  document: PlmXmlDocument,
  result: ConfigurationResult,
  options: ApplyOptions = {}
): Promise<ApplyOutcome> {
  const errors: string[] = [];
  const outcome: ApplyOutcome = {
    success: false,
    connected: false,
    version: null,
    visibility: { visible: 'skipped', invisible: 'skipped' },
    dummy: 'skipped',
    materials: 'skipped',
    connectedTargets: [],
    missingTargets: [],
    errors,
    result,
  };

  try {
    outcome.version = await client.getVersionInfo();
    outcome.connected = true;
  } catch (error) {
    errors.push(`Could not connect to the authoring service: ${formatError(error)}`);
    log.error('Version probe failed', error, { operation: 'apply' });
    return outcome;
  }

  const visible = describeNodes(document, result.visibleNodeIds, options.sceneIds);
  if (visible.length > 0) {
    outcome.visibility.visible = await runStep(
      'Setting nodes visible',
      errors,
      () => client.setVisible(visible, true),
      'The service did not confirm every visible node'
    );
  }

  const invisible = describeNodes(document, result.invisibleNodeIds, options.sceneIds);
  if (invisible.length > 0) {
    outcome.visibility.invisible = await runStep(
      'Setting nodes invisible',
      errors,
      () => client.setVisible(invisible, false),
      'The service did not confirm every invisible node'
    );
  }

  const dummy = options.materialDummy ?? client.config.materialDummy;
  if (dummy) {
    if (await assignDummy(client, document, dummy, options.scenePath)) {
      outcome.dummy = 'ok';
    } else {
      outcome.dummy = 'failed';
      errors.push(`Could not apply the material dummy ${dummy}`);
    }
  }

  let sceneTargets: Set<string>;
  try {
    sceneTargets = new Set(await client.getAllTargetNames());
  } catch (error) {
    errors.push(`Target discovery failed: ${formatError(error)}`);
    outcome.materials = 'failed';
    return outcome;
  }

  const assignments: MaterialAssignment[] = [];
  for (const [target, material] of activeTargets(result)) {
    if (sceneTargets.has(target)) {
      assignments.push({ target, material });
    } else {
      outcome.missingTargets.push(target);
    }
  }
  if (outcome.missingTargets.length > 0) {
    log.warn(`Scene is missing ${outcome.missingTargets.length} material targets: ${outcome.missingTargets.join('; ')}`);
    outcome.result = withDiagnostics(result, { missingTargets: outcome.missingTargets });
  }

  if (assignments.length > 0) {
    outcome.materials = await runStep(
      'Connecting materials',
      errors,
      () =>
        client.connectMaterials(assignments, {
          useCopyMethod: options.useCopyMethod,
          replaceTargetName: options.replaceTargetName,
          useLookUpTable: client.supportsLookUpTable() ? false : undefined,
        }),
      'The service did not confirm every material assignment'
    );
    outcome.connectedTargets = assignments.map((a) => a.target);
  }

  outcome.success = errors.length === 0;
  return outcome;
}

export interface SceneValidation {
  /** True when both scene queries succeeded */
  success: boolean;
  /** Configurable node ids whose LINC id is not in the scene */
  missingNodes: string[];
  /** Look library targets not loaded in the scene */
  missingTargets: string[];
  /** Group node named like the material dummy, if present */
  materialDummy: NodeDescriptor | null;
  /** LINC id -> service node id for every matched node */
  sceneIds: Map<string, string>;
  errors: string[];
}

/**
 * Compare the scene loaded in the service with the document. Slow on large
 * scenes, so callers opt in.
 */
export async function validateSceneVsPlmXml(
  client: AuthoringClient,
  document: PlmXmlDocument,
  options: { materialDummy?: string } = {}
): Promise<SceneValidation> {
  const validation: SceneValidation = {
    success: false,
    missingNodes: [],
    missingTargets: [],
    materialDummy: null,
    sceneIds: new Map(),
    errors: [],
  };

  let scene: NodeDescriptor[];
  let sceneTargets: Set<string>;
  try {
    scene = await client.getSceneStructure();
    sceneTargets = new Set(await client.getAllTargetNames());
  } catch (error) {
    validation.errors.push(`Scene query failed: ${formatError(error)}`);
    log.error('Scene query failed', error, { operation: 'validate' });
    return validation;
  }

  const byLincId = new Map<string, NodeDescriptor>();
  for (const node of scene) {
    if (node.lincId && !byLincId.has(node.lincId)) {
      byLincId.set(node.lincId, node);
    }
  }

  const dummy = options.materialDummy ?? client.config.materialDummy;
  if (dummy) {
    validation.materialDummy =
      scene.find((node) => node.name === dummy && node.nodeType === NodeType.GROUP) ?? null;
  }

  for (const node of document.configurableNodes()) {
    const match = node.lincId ? byLincId.get(node.lincId) : undefined;
    if (!match) {
      validation.missingNodes.push(node.id);
    } else if (node.lincId && match.asId) {
      validation.sceneIds.set(node.lincId, match.asId);
    }
  }

  validation.missingTargets = document.lookLibrary.targetNames().filter((name) => !sceneTargets.has(name));
  validation.success = true;

  log.info(
    `${validation.missingNodes.length} nodes are missing, ` +
      `${validation.missingTargets.length} material targets are missing or unloaded`,
    { operation: 'validate' }
  );
  return validation;
}
