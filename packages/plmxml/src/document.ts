/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * PLM-XML reader
 * Builds the product graph and the look library from a PLM-XML export
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { setImmediate } from 'node:timers/promises';
import { createLogger } from '@lookswitch/data';
import { describePrTagAmbiguity } from '@lookswitch/pr-tags';
import { getAttribute, getElementsByPath, parseXml, type XmlElement } from './parser/dom.js';
import { createProductNode, ProductGraph, ProductGraphBuilder } from './product-graph.js';
import { LookLibrary, LookLibraryBuilder } from './look-library.js';
import {
  LOOK_LIBRARY_INSTANCE_NAME,
  PLMXML_NAMESPACE,
  PLMXML_ROOT,
  PRODUCT_INSTANCE_PATH,
  PRODUCT_REVISION_VIEW_PATH,
  USER_VALUE_PATH,
  type DocumentSummary,
  type ParseOptions,
  type ProductNode,
} from './types.js';

const log = createLogger('PlmXml');

/** Error thrown for unreadable PLM-XML in strict mode */
export class PlmXmlParseError extends Error {
  constructor(
    message: string,
    public details?: string
  ) {
    super(message);
    this.name = 'PlmXmlParseError';
  }
}

export class PlmXmlDocument {
  readonly graph: ProductGraph;
  readonly lookLibrary: LookLibrary;
  readonly warnings: readonly string[];
  /** Set when the document could not be read at all */
  readonly error: string | undefined;
  readonly sourceName: string | undefined;

  constructor(init: {
    graph: ProductGraph;
    lookLibrary: LookLibrary;
    warnings?: readonly string[];
    error?: string;
    sourceName?: string;
  }) {
    this.graph = init.graph;
    this.lookLibrary = init.lookLibrary;
    this.warnings = Object.freeze([...(init.warnings ?? [])]);
    this.error = init.error;
    this.sourceName = init.sourceName;
    Object.freeze(this);
  }

  static invalid(error: string, sourceName?: string): PlmXmlDocument {
    return new PlmXmlDocument({
      graph: new ProductGraphBuilder().build(),
      lookLibrary: LookLibrary.empty(),
      error,
      sourceName,
    });
  }

  /** At least one product node and at least one material target */
  get isValid(): boolean {
    return this.error === undefined && this.graph.size > 0 && this.lookLibrary.isValid;
  }

  get conflicts(): readonly string[] {
    return this.lookLibrary.conflicts;
  }

  configurableNodes(): Generator<ProductNode> {
    return this.graph.configurableNodes();
  }

  summary(): DocumentSummary {
    return {
      nodes: this.graph.size,
      configurableNodes: Array.from(this.graph.configurableNodes()).length,
      targets: this.lookLibrary.size,
      variants: this.lookLibrary.variantCount,
      conflicts: this.lookLibrary.conflicts.length,
    };
  }
}

function readUserData(instance: XmlElement): Map<string, string> {
  const userData = new Map<string, string>();
  for (const userValue of getElementsByPath(instance, USER_VALUE_PATH, PLMXML_NAMESPACE)) {
    const title = getAttribute(userValue, 'title');
    if (title === undefined) continue;
    userData.set(title, userValue.getAttribute('value') ?? '');
  }
  return userData;
}

function readLookLibrary(instance: XmlElement, builder: LookLibraryBuilder): void {
  for (const userValue of getElementsByPath(instance, USER_VALUE_PATH, PLMXML_NAMESPACE)) {
    builder.addValue(userValue.getAttribute('value') ?? '');
  }
}

/** PR-tag expressions outside the three-level grammar, one warning each */
function ambiguityWarnings(graph: ProductGraph, lookLibrary: LookLibrary): string[] {
  const warnings: string[] = [];
  for (const node of graph.configurableNodes()) {
    const warning = describePrTagAmbiguity(node.prTags);
    if (warning) warnings.push(`ProductInstance ${node.id}: ${warning}`);
  }
  for (const [target, variant] of lookLibrary.variants()) {
    const warning = describePrTagAmbiguity(variant.prTags);
    if (warning) warnings.push(`Variant ${target.name}/${variant.name}: ${warning}`);
  }
  return warnings;
}

function fail(message: string, details: string | undefined, options: ParseOptions): PlmXmlDocument {
  log.error(details ? `${message}: ${details}` : message, undefined, {
    operation: 'parse',
    subject: options.sourceName,
  });
  if (options.strict) {
    throw new PlmXmlParseError(message, details);
  }
  return PlmXmlDocument.invalid(details ? `${message}: ${details}` : message, options.sourceName);
}

/**
 * Parse PLM-XML text.
 *
 * Malformed XML or a foreign root element yield an invalid document carrying
 * `error`; with `strict` a PlmXmlParseError is thrown instead.
 */
export function parsePlmXml(xml: string, options: ParseOptions = {}): PlmXmlDocument {
  const start = performance.now();
  const { document, errors } = parseXml(xml);

  if (!document || errors.length > 0) {
    return fail('Invalid XML format', errors.join('; ') || undefined, options);
  }

  const root = document.documentElement;
  if (!root || root.localName !== PLMXML_ROOT) {
    return fail(`Invalid root element: expected "${PLMXML_ROOT}", got "${root?.localName ?? ''}"`, undefined, options);
  }

  const graphBuilder = new ProductGraphBuilder();
  const lookBuilder = new LookLibraryBuilder();
  const warnings: string[] = [];

  for (const view of getElementsByPath(root, PRODUCT_REVISION_VIEW_PATH, PLMXML_NAMESPACE)) {
    const viewId = getAttribute(view, 'id');
    if (!viewId) continue;
    const refs = (view.getAttribute('instanceRefs') ?? '').split(/\s+/).filter((ref) => ref.length > 0);
    graphBuilder.addView(viewId, refs);
  }

  for (const instance of getElementsByPath(root, PRODUCT_INSTANCE_PATH, PLMXML_NAMESPACE)) {
    const name = getAttribute(instance, 'name');

    if (name === LOOK_LIBRARY_INSTANCE_NAME) {
      readLookLibrary(instance, lookBuilder);
      continue;
    }

    const id = getAttribute(instance, 'id');
    if (!id) {
      const message = `ProductInstance "${name ?? ''}" without id skipped`;
      warnings.push(message);
      log.warn(message, { operation: 'parse' });
      continue;
    }

    graphBuilder.addNode(
      createProductNode({
        id,
        name,
        partRef: getAttribute(instance, 'partRef'),
        userData: readUserData(instance),
      })
    );
  }

  const graph = graphBuilder.build();
  const lookLibrary = lookBuilder.build();
  lookLibrary.reportConflicts();

  for (const warning of ambiguityWarnings(graph, lookLibrary)) {
    warnings.push(warning);
    log.warn(warning, { operation: 'parse' });
  }

  const doc = new PlmXmlDocument({
    graph,
    lookLibrary,
    warnings: [...graphBuilder.getWarnings(), ...lookBuilder.getWarnings(), ...warnings],
    sourceName: options.sourceName,
  });

  const summary = doc.summary();
  log.info(
    `Indexed ${summary.nodes} ProductInstances, ${summary.configurableNodes} with PR tags, ` +
      `in ${(performance.now() - start).toFixed(1)}ms`,
    { operation: 'parse', subject: options.sourceName }
  );
  log.info(`Found LookLibrary with ${summary.targets} materials and ${summary.variants} variants`, {
    operation: 'parse',
    subject: options.sourceName,
  });

  return doc;
}

/**
 * Read and parse a PLM-XML file. A missing or unreadable file yields an
 * invalid document (or throws in strict mode).
 */
export async function loadPlmXml(path: string, options: ParseOptions = {}): Promise<PlmXmlDocument> {
  const sourceName = options.sourceName ?? basename(path);

  let xml: string;
  try {
    xml = await readFile(path, 'utf8');
  } catch (error) {
    log.caught('Could not read PLM-XML file', error, { operation: 'load', subject: path });
    return fail('PLM-XML file could not be read', error instanceof Error ? error.message : String(error), {
      ...options,
      sourceName,
    });
  }

  return parsePlmXml(xml, { ...options, sourceName });
}

/**
 * Read and parse a PLM-XML file off the calling tick. The promise resolves
 * exactly once with the finished document.
 */
export async function parsePlmXmlInBackground(path: string, options: ParseOptions = {}): Promise<PlmXmlDocument> {
  await setImmediate();
  return loadPlmXml(path, options);
}
