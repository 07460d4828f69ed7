/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Authoring service protocol types
 */

import type { NodeType } from '@lookswitch/data';

/** Default namespace of every request and response document */
export const AUTHORING_NAMESPACE = 'urn:authoringsystem_v2';
export const XSD_NAMESPACE = 'http://www.w3.org/2001/XMLSchema';
export const XSI_NAMESPACE = 'http://www.w3.org/2001/XMLSchema-instance';

/** First service version that understands useLookUpTable */
export const LOOKUP_TABLE_MIN_VERSION = '2.15';

export interface MethodDescriptor {
  /** Request root element prefix, e.g. 'Node' */
  readonly type: string;
  /** Request root element name part, e.g. 'SetVisible' */
  readonly name: string;
  /** URL path below the API root */
  readonly path: string;
}

/**
 * Supported service methods. The request root element is
 * `<type><name>Request`.
 */
export const AuthoringMethod = {
  GetVersionInfo: { type: 'GetVersionInfo', name: '', path: 'getversioninfo' },
  NodeSetVisible: { type: 'Node', name: 'SetVisible', path: 'node/set/visible' },
  MaterialConnectToTargets: { type: 'Material', name: 'ConnectToTargets', path: 'material/connecttotargets' },
  TargetGetAllNames: { type: 'Target', name: 'GetAllNames', path: 'material/getallnames' },
  SceneGetStructure: { type: 'Scene', name: 'GetStructure', path: 'scene/get/structure' },
  SceneGetAll: { type: 'Scene', name: 'GetAll', path: 'scene/get/all' },
  SceneGetActive: { type: 'Scene', name: 'GetActive', path: 'scene/get/active' },
  SceneSetActive: { type: 'Scene', name: 'SetActive', path: 'scene/set/active' },
  SceneLoad: { type: 'Scene', name: 'Load', path: 'scene/load' },
  SceneClose: { type: 'Scene', name: 'Close', path: 'scene/close' },
} as const satisfies Record<string, MethodDescriptor>;

export type AuthoringMethodName = keyof typeof AuthoringMethod;

export function requestRootName(method: MethodDescriptor): string {
  return `${method.type}${method.name}Request`;
}

/**
 * A scene node as the service describes it (NodeInfo)
 */
export interface NodeDescriptor {
  /** Service-side id, known after a structure query */
  asId?: string;
  lincId?: string;
  name: string;
  nodeType: NodeType;
  parentNodeId?: string;
  materialName?: string;
  userAttributes: ReadonlyMap<string, string>;
}

/** A ready-to-send request document */
export interface AuthoringRequest {
  readonly method: MethodDescriptor;
  readonly body: string;
}

export interface AuthoringConfig {
  host: string;
  port: number;
  /** Path segment of the API, e.g. 'v2' */
  apiVersion: string;
  /** Per-request timeout in milliseconds */
  timeout: number;
  /** Extra attempts after a transport failure */
  retries: number;
  /** Material assigned to every target before the configured looks, if set */
  materialDummy?: string;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface MaterialAssignment {
  target: string;
  material: string;
}

export interface ConnectOptions {
  useCopyMethod?: boolean;
  replaceTargetName?: boolean;
  /** Only sent when defined; services before 2.15 reject it */
  useLookUpTable?: boolean;
}

export interface SceneLoadOptions {
  closeActiveSessions?: boolean;
  loadAssemblies?: boolean;
  /** Let the service use its own PLM-XML reader */
  native?: boolean;
}
