/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * PLM-XML document types
 */

import type { NodeType } from '@lookswitch/data';

export const PLMXML_NAMESPACE = 'http://www.plmxml.org/Schemas/PLMXMLSchema';

/** Root element local name */
export const PLMXML_ROOT = 'PLMXML';

/** Path from the root element to every product instance */
export const PRODUCT_INSTANCE_PATH = ['ProductDef', 'InstanceGraph', 'ProductInstance'] as const;

/** Path from the root element to every product revision view */
export const PRODUCT_REVISION_VIEW_PATH = ['ProductDef', 'InstanceGraph', 'ProductRevisionView'] as const;

/** Path from a product instance to its user values */
export const USER_VALUE_PATH = ['UserData', 'UserValue'] as const;

/** Name of the product instance that carries the material definitions */
export const LOOK_LIBRARY_INSTANCE_NAME = 'LookLibrary';

/** User data keys with a meaning to the resolver */
export const UserDataKey = {
  PR_TAGS: 'PR_TAGS',
  LINC_ID: 'LINC_ID',
  NODE_TYPE: 'NODE_TYPE',
} as const;

/**
 * One product instance of the structure tree
 */
export interface ProductNode {
  /** Document-scoped unique id (ProductInstance@id) */
  readonly id: string;
  /** Display name (ProductInstance@name) */
  readonly name: string;
  /** Referenced part or revision view, without the leading '#' */
  readonly partRef?: string;
  /** External correlation id shared with the authoring service scene */
  readonly lincId?: string;
  /** PR-tag expression; undefined when the node is unconditional */
  readonly prTags?: string;
  readonly nodeType: NodeType;
  /** UserData/UserValue title -> value */
  readonly userData: ReadonlyMap<string, string>;
}

/**
 * One candidate look for a material target
 */
export interface MaterialVariant {
  readonly name: string;
  readonly prTags: string;
  readonly description: string;
}

/**
 * A material slot in the scene and its candidate variants in declared order
 */
export interface MaterialTarget {
  readonly name: string;
  readonly variants: readonly MaterialVariant[];
}

export interface ParseOptions {
  /** Throw PlmXmlParseError instead of returning an invalid document */
  strict?: boolean;
  /** File name used in log messages */
  sourceName?: string;
}

export interface DocumentSummary {
  nodes: number;
  configurableNodes: number;
  targets: number;
  variants: number;
  conflicts: number;
}
