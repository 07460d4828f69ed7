/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Response readers
 *
 * Every response carries its payload in `returnVal` children of the root:
 *
 *   <NodeSetVisibleResponse xmlns="urn:authoringsystem_v2">
 *     <returnVal>true</returnVal>
 *   </NodeSetVisibleResponse>
 */

import { nodeTypeFromString } from '@lookswitch/data';
import {
  childElements,
  getChildElement,
  getChildElements,
  getChildText,
  parseXml,
  type XmlElement,
} from '@lookswitch/plmxml';
import { AUTHORING_NAMESPACE, type NodeDescriptor } from './types.js';

const NS = AUTHORING_NAMESPACE;

/**
 * Parse a response body. Anything before the first '<' is dropped.
 * Returns null when the body holds no well-formed XML document.
 */
export function parseResponseDocument(body: string): XmlElement | null {
  const start = body.indexOf('<');
  if (start < 0) return null;

  const { document, errors } = parseXml(body.slice(start));
  if (!document || errors.length > 0) return null;
  return document.documentElement ?? null;
}

export function returnValues(root: XmlElement): XmlElement[] {
  return getChildElements(root, 'returnVal', NS);
}

function textOf(el: XmlElement): string {
  return el.textContent?.trim() ?? '';
}

/** Version string of a GetVersionInfo response; null unless it starts with a digit */
export function readVersion(root: XmlElement): string | null {
  for (const value of returnValues(root)) {
    const version = textOf(value);
    if (/^\d/.test(version)) {
      return version;
    }
  }
  return null;
}

/** True if every echoed value equals `expected` */
export function readEchoes(root: XmlElement, expected: boolean): boolean {
  const wanted = expected ? 'true' : 'false';
  return returnValues(root).every((value) => textOf(value) === wanted);
}

/** True if at least one echoed value is `true` */
export function readConfirmation(root: XmlElement): boolean {
  return returnValues(root).some((value) => textOf(value) === 'true');
}

/** First non-empty return value */
export function readText(root: XmlElement): string | null {
  for (const value of returnValues(root)) {
    const text = textOf(value);
    if (text) return text;
  }
  return null;
}

/** Non-empty texts of the children of every return value */
export function readStringList(root: XmlElement): string[] {
  const names: string[] = [];
  for (const value of returnValues(root)) {
    for (const child of childElements(value)) {
      const text = textOf(child);
      if (text) names.push(text);
    }
  }
  return names;
}

/** Scene names of a SceneGetAll response (returnVal/Scene/Name) */
export function readSceneNames(root: XmlElement): string[] {
  const names: string[] = [];
  for (const value of returnValues(root)) {
    for (const scene of getChildElements(value, 'Scene', NS)) {
      const name = getChildText(scene, 'Name', NS);
      if (name) names.push(name);
    }
  }
  return names;
}

function readUserAttributes(nodeInfo: XmlElement): Map<string, string> {
  const attributes = new Map<string, string>();
  const container = getChildElement(nodeInfo, 'UserAttributes', NS);
  if (!container) return attributes;

  for (const attribute of childElements(container)) {
    const key = getChildElement(attribute, 'Key', NS);
    const value = getChildElement(attribute, 'Value', NS);
    if (key && value) {
      attributes.set(textOf(key), textOf(value));
    }
  }
  return attributes;
}

export function readNodeDescriptor(nodeInfo: XmlElement): NodeDescriptor {
  return {
    asId: getChildText(nodeInfo, 'AsId', NS),
    lincId: getChildText(nodeInfo, 'LincId', NS),
    name: getChildText(nodeInfo, 'Name', NS) ?? '',
    nodeType: nodeTypeFromString(getChildText(nodeInfo, 'NodeInfoType', NS)),
    parentNodeId: getChildText(nodeInfo, 'ParentNodeId', NS),
    materialName: getChildText(nodeInfo, 'MaterialName', NS),
    userAttributes: readUserAttributes(nodeInfo),
  };
}

/** Node descriptors of a SceneGetStructure response */
export function readNodeDescriptors(root: XmlElement): NodeDescriptor[] {
  return returnValues(root).flatMap((value) => childElements(value).map(readNodeDescriptor));
}
