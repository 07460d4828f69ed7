/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * DOM helpers shared by the PLM-XML reader.
 *
 * Elements are matched by local name. When a namespace is given, elements in
 * that namespace and elements without a namespace are both accepted, since
 * exporters disagree about declaring the PLM-XML default namespace.
 */

import { DOMParser, type Document, type Element, type Node } from '@xmldom/xmldom';

export type XmlDocument = Document;
export type XmlElement = Element;

const ELEMENT_NODE = 1;

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function inNamespace(el: Element, namespace: string | undefined): boolean {
  return namespace === undefined || !el.namespaceURI || el.namespaceURI === namespace;
}

export function childElements(parent: Element): Element[] {
  const elements: Element[] = [];
  const nodes = parent.childNodes;
  for (let i = 0; i < nodes.length; i++) {
    const node = nodes.item(i);
    if (node && isElement(node)) {
      elements.push(node);
    }
  }
  return elements;
}

export function getChildElement(parent: Element, localName: string, namespace?: string): Element | null {
  for (const child of childElements(parent)) {
    if (child.localName === localName && inNamespace(child, namespace)) {
      return child;
    }
  }
  return null;
}

export function getChildElements(parent: Element, localName: string, namespace?: string): Element[] {
  return childElements(parent).filter(
    (child) => child.localName === localName && inNamespace(child, namespace)
  );
}

/**
 * Follow a path of local names, collecting every element at the last step
 */
export function getElementsByPath(root: Element, path: readonly string[], namespace?: string): Element[] {
  let current: Element[] = [root];
  for (const step of path) {
    current = current.flatMap((el) => getChildElements(el, step, namespace));
  }
  return current;
}

/**
 * Read an attribute. Empty attributes read as undefined.
 */
export function getAttribute(el: Element, name: string): string | undefined {
  return el.getAttribute(name) || undefined;
}

export function getChildText(parent: Element, localName: string, namespace?: string): string | undefined {
  const child = getChildElement(parent, localName, namespace);
  return child?.textContent?.trim() || undefined;
}

export interface XmlParseResult {
  document: Document | null;
  errors: string[];
}

/**
 * Parse an XML string, collecting parser errors instead of printing them.
 * Mismatched and unclosed tags are fatal: the document is null.
 */
export function parseXml(xml: string): XmlParseResult {
  const errors: string[] = [];
  const parser = new DOMParser({
    onError: (level: string, message: string) => {
      if (level !== 'warning') {
        errors.push(String(message));
      }
    },
  });

  try {
    const document = parser.parseFromString(xml, 'text/xml');
    return { document, errors };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (!errors.includes(message)) {
      errors.push(message);
    }
    return { document: null, errors };
  }
}
