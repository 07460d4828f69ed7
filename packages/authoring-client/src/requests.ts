/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Request document builders
 *
 *   <?xml version="1.0" encoding="utf-8"?>
 *   <NodeSetVisibleRequest xmlns:xsd="..." xmlns:xsi="..." xmlns="urn:authoringsystem_v2">
 *     <nodes><NodeInfo>...</NodeInfo></nodes>
 *     <visible>true</visible>
 *   </NodeSetVisibleRequest>
 */

import { NodeType } from '@lookswitch/data';
import type { ProductNode } from '@lookswitch/plmxml';
import {
  AUTHORING_NAMESPACE,
  AuthoringMethod,
  requestRootName,
  XSD_NAMESPACE,
  XSI_NAMESPACE,
  type AuthoringRequest,
  type ConnectOptions,
  type MaterialAssignment,
  type MethodDescriptor,
  type NodeDescriptor,
  type SceneLoadOptions,
} from './types.js';

const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>';

export function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/** Element with escaped text content */
function text(name: string, value: string): string {
  return value ? `<${name}>${escapeXml(value)}</${name}>` : `<${name}/>`;
}

function bool(name: string, value: boolean): string {
  return `<${name}>${value ? 'true' : 'false'}</${name}>`;
}

/** Element wrapping already serialized children */
function wrap(name: string, children: readonly string[]): string {
  return children.length > 0 ? `<${name}>${children.join('')}</${name}>` : `<${name}/>`;
}

function stringList(name: string, values: readonly string[]): string {
  return wrap(name, values.map((value) => text('string', value)));
}

export function buildRequest(method: MethodDescriptor, children: readonly string[] = []): AuthoringRequest {
  const root = requestRootName(method);
  const attributes = `xmlns:xsd="${XSD_NAMESPACE}" xmlns:xsi="${XSI_NAMESPACE}" xmlns="${AUTHORING_NAMESPACE}"`;
  const element =
    children.length > 0 ? `<${root} ${attributes}>${children.join('')}</${root}>` : `<${root} ${attributes}/>`;

  return { method, body: `${XML_DECLARATION}\n${element}` };
}

/**
 * Describe a product node for the service. The node's user data travels as
 * user attributes so the service can correlate by LINC id.
 */
export function nodeDescriptorFromProductNode(node: ProductNode, asId?: string): NodeDescriptor {
  return {
    asId,
    lincId: node.lincId,
    name: node.name,
    nodeType: node.nodeType,
    userAttributes: node.userData,
  };
}

export function nodeInfoXml(node: NodeDescriptor): string {
  const children: string[] = [];
  if (node.asId) {
    children.push(text('AsId', node.asId));
  }
  children.push(text('LincId', node.lincId ?? ''));
  children.push(text('Name', node.name));
  if (node.parentNodeId) {
    children.push(text('ParentNodeId', node.parentNodeId));
  }
  children.push(text('NodeInfoType', node.nodeType));

  const attributes: string[] = [];
  for (const [key, value] of node.userAttributes) {
    attributes.push(`<UserAttribute>${text('Key', key)}${text('Value', value)}</UserAttribute>`);
  }
  children.push(wrap('UserAttributes', attributes));

  return wrap('NodeInfo', children);
}

/** Start descriptor for a query over the whole scene */
export const SCENE_ROOT: NodeDescriptor = Object.freeze({
  asId: 'root',
  name: '',
  nodeType: NodeType.UNKNOWN,
  parentNodeId: 'root',
  userAttributes: new Map<string, string>(),
});

export function getVersionInfoRequest(): AuthoringRequest {
  return buildRequest(AuthoringMethod.GetVersionInfo);
}

export function nodeSetVisibleRequest(nodes: readonly NodeDescriptor[], visible: boolean): AuthoringRequest {
  return buildRequest(AuthoringMethod.NodeSetVisible, [
    wrap('nodes', nodes.map(nodeInfoXml)),
    bool('visible', visible),
  ]);
}

export function materialConnectToTargetsRequest(
  assignments: readonly MaterialAssignment[],
  options: ConnectOptions = {}
): AuthoringRequest {
  const children = [
    stringList('materialNames', assignments.map((a) => a.material)),
    stringList('targetNames', assignments.map((a) => a.target)),
    bool('useCopyMethod', options.useCopyMethod ?? false),
    bool('replaceTargetName', options.replaceTargetName ?? false),
  ];
  if (options.useLookUpTable !== undefined) {
    children.push(bool('useLookUpTable', options.useLookUpTable));
  }
  return buildRequest(AuthoringMethod.MaterialConnectToTargets, children);
}

export function targetGetAllNamesRequest(): AuthoringRequest {
  return buildRequest(AuthoringMethod.TargetGetAllNames);
}

/**
 * Children of `start` matching `types`; an empty list asks for every type
 */
export function sceneGetStructureRequest(
  start: NodeDescriptor = SCENE_ROOT,
  types: readonly NodeType[] = []
): AuthoringRequest {
  return buildRequest(AuthoringMethod.SceneGetStructure, [
    wrap('node', [nodeInfoXml(start)]),
    wrap('types', types.map((type) => text('NodeInfoType', type))),
  ]);
}

export function sceneGetAllRequest(): AuthoringRequest {
  return buildRequest(AuthoringMethod.SceneGetAll);
}

export function sceneGetActiveRequest(): AuthoringRequest {
  return buildRequest(AuthoringMethod.SceneGetActive);
}

export function sceneSetActiveRequest(name: string): AuthoringRequest {
  return buildRequest(AuthoringMethod.SceneSetActive, [wrap('name', [text('string', name)])]);
}

export function sceneLoadRequest(path: string, options: SceneLoadOptions = {}): AuthoringRequest {
  const children = [
    text('path', path),
    bool('closeActiveSessions', options.closeActiveSessions ?? false),
    bool('loadAssemblies', options.loadAssemblies ?? false),
  ];
  if (options.native !== undefined) {
    children.push(bool('native', options.native));
  }
  return buildRequest(AuthoringMethod.SceneLoad, children);
}

export function sceneCloseRequest(name: string): AuthoringRequest {
  return buildRequest(AuthoringMethod.SceneClose, [wrap('name', [text('string', name)])]);
}
