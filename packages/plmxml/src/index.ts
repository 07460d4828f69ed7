/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @lookswitch/plmxml - PLM-XML product structure and look library reader
 */

export {
  PlmXmlDocument,
  PlmXmlParseError,
  parsePlmXml,
  loadPlmXml,
  parsePlmXmlInBackground,
} from './document.js';

export { ProductGraph, ProductGraphBuilder, createProductNode } from './product-graph.js';
export type { ProductNodeInit } from './product-graph.js';

export { LookLibrary, LookLibraryBuilder, parseMaterialTarget, findTargetConflicts } from './look-library.js';
export type { LookValueParseResult, TargetConflicts } from './look-library.js';

export {
  PLMXML_NAMESPACE,
  LOOK_LIBRARY_INSTANCE_NAME,
  UserDataKey,
} from './types.js';
export type {
  ProductNode,
  MaterialVariant,
  MaterialTarget,
  ParseOptions,
  DocumentSummary,
} from './types.js';

export {
  parseXml,
  isElement,
  childElements,
  getChildElement,
  getChildElements,
  getChildText,
  getAttribute,
} from './parser/dom.js';
export type { XmlDocument, XmlElement, XmlParseResult } from './parser/dom.js';
