/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Node kinds known to the authoring service scene graph
 */

import { createLogger } from './logger.js';

const log = createLogger('NodeType');

export enum NodeType {
  SHAPE = 'SHAPE',
  GROUP = 'GROUP',
  LIGHT = 'LIGHT',
  LIGHT_POINT = 'LIGHT_POINT',
  LIGHT_SPOT = 'LIGHT_SPOT',
  LIGHT_DIRECTIONAL = 'LIGHT_DIRECTIONAL',
  LIGHT_AMBIENT = 'LIGHT_AMBIENT',
  CAMERA = 'CAMERA',
  BODY = 'BODY',
  SHELL = 'SHELL',
  FILE = 'FILE',
  LOCATOR = 'LOCATOR',
  SWITCH = 'SWITCH',
  LOD = 'LOD',
  SOUND = 'SOUND',
  FX = 'FX',
  UNKNOWN = 'UNKNOWN',
}

const NODE_TYPES: ReadonlyMap<string, NodeType> = new Map(
  Object.values(NodeType).map((type) => [type, type])
);

export function isNodeType(value: string): value is NodeType {
  return NODE_TYPES.has(value);
}

/**
 * Map a node type string to the enum.
 * Unknown values fall back to UNKNOWN; non-empty unknown values are logged.
 */
export function nodeTypeFromString(value: string | null | undefined): NodeType {
  if (!value) return NodeType.UNKNOWN;

  const type = NODE_TYPES.get(value.trim().toUpperCase());
  if (type === undefined) {
    log.warn(`Invalid node type "${value}", using ${NodeType.UNKNOWN}`);
    return NodeType.UNKNOWN;
  }
  return type;
}
