/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Product graph - flat node index plus the ownership tree
 *
 * Nodes are stored by id. The tree is derived from ProductRevisionView
 * elements: an instance whose partRef names a view owns every instance listed
 * in that view's instanceRefs.
 */

import { createLogger, nodeTypeFromString } from '@lookswitch/data';
import { hasPrTags } from '@lookswitch/pr-tags';
import { UserDataKey, type ProductNode } from './types.js';

const log = createLogger('ProductGraph');

export interface ProductNodeInit {
  id: string;
  name?: string;
  partRef?: string;
  userData?: ReadonlyMap<string, string> | Record<string, string>;
}

function isStringMap(value: unknown): value is ReadonlyMap<string, string> {
  return value instanceof Map;
}

/**
 * Create an immutable product node. PR tags, LINC id and node type are read
 * from the user data.
 */
export function createProductNode(init: ProductNodeInit): ProductNode {
  const userData = new Map<string, string>(
    isStringMap(init.userData) ? init.userData.entries() : Object.entries(init.userData ?? {})
  );

  const prTags = userData.get(UserDataKey.PR_TAGS);
  const nodeTypeValue = userData.get(UserDataKey.NODE_TYPE);

  return Object.freeze({
    id: init.id,
    name: init.name ?? '',
    partRef: init.partRef ? init.partRef.replace(/^#/, '') : undefined,
    lincId: userData.get(UserDataKey.LINC_ID) || undefined,
    prTags: prTags && hasPrTags(prTags) ? prTags : undefined,
    nodeType: nodeTypeFromString(nodeTypeValue),
    userData,
  });
}

export class ProductGraph {
  private readonly byId: ReadonlyMap<string, ProductNode>;
  private readonly childIds: ReadonlyMap<string, readonly string[]>;
  private readonly parentIds: ReadonlyMap<string, string>;
  private readonly byLincId: ReadonlyMap<string, ProductNode>;

  constructor(
    nodes: ReadonlyMap<string, ProductNode>,
    childIds: ReadonlyMap<string, readonly string[]>,
    parentIds: ReadonlyMap<string, string>
  ) {
    this.byId = nodes;
    this.childIds = childIds;
    this.parentIds = parentIds;

    const byLincId = new Map<string, ProductNode>();
    for (const node of nodes.values()) {
      if (node.lincId && !byLincId.has(node.lincId)) {
        byLincId.set(node.lincId, node);
      }
    }
    this.byLincId = byLincId;
  }

  get size(): number {
    return this.byId.size;
  }

  get(id: string): ProductNode | undefined {
    return this.byId.get(id);
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  findByLincId(lincId: string): ProductNode | undefined {
    return this.byLincId.get(lincId);
  }

  /** All nodes in document order */
  nodes(): IterableIterator<ProductNode> {
    return this.byId.values();
  }

  /** Nodes that carry PR tags and therefore take part in configuration */
  *configurableNodes(): Generator<ProductNode> {
    for (const node of this.byId.values()) {
      if (node.prTags) {
        yield node;
      }
    }
  }

  children(id: string): ProductNode[] {
    const ids = this.childIds.get(id) ?? [];
    const children: ProductNode[] = [];
    for (const childId of ids) {
      const child = this.byId.get(childId);
      if (child) children.push(child);
    }
    return children;
  }

  parent(id: string): ProductNode | undefined {
    const parentId = this.parentIds.get(id);
    return parentId !== undefined ? this.byId.get(parentId) : undefined;
  }

  /** Nodes without a recorded parent, in document order */
  roots(): ProductNode[] {
    const roots: ProductNode[] = [];
    for (const node of this.byId.values()) {
      if (!this.parentIds.has(node.id)) {
        roots.push(node);
      }
    }
    return roots;
  }

  /**
   * Depth-first pre-order traversal from the roots
   */
  *walk(): Generator<{ node: ProductNode; depth: number }> {
    const visited = new Set<string>();
    const stack: Array<{ node: ProductNode; depth: number }> = this.roots()
      .reverse()
      .map((node) => ({ node, depth: 0 }));

    while (stack.length > 0) {
      const entry = stack.pop();
      if (!entry || visited.has(entry.node.id)) continue;
      visited.add(entry.node.id);
      yield entry;

      const children = this.children(entry.node.id);
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push({ node: children[i], depth: entry.depth + 1 });
      }
    }
  }
}

/**
 * Collects nodes and revision views while a document is read, then derives
 * the tree.
 */
export class ProductGraphBuilder {
  private readonly nodes = new Map<string, ProductNode>();
  private readonly views = new Map<string, string[]>();
  private readonly warnings: string[] = [];

  /**
   * Add a node. A duplicate id replaces the earlier node and records a warning.
   */
  addNode(node: ProductNode): this {
    if (this.nodes.has(node.id)) {
      this.warn(`ProductInstance with id "${node.id}" already exists and will be overwritten`);
    }
    this.nodes.set(node.id, node);
    return this;
  }

  /**
   * Register a revision view and the instances it contains
   */
  addView(viewId: string, instanceRefs: readonly string[]): this {
    this.views.set(viewId, instanceRefs.map((ref) => ref.replace(/^#/, '')));
    return this;
  }

  getWarnings(): readonly string[] {
    return this.warnings;
  }

  build(): ProductGraph {
    const childIds = new Map<string, readonly string[]>();
    const parentIds = new Map<string, string>();

    for (const node of this.nodes.values()) {
      if (!node.partRef) continue;
      const refs = this.views.get(node.partRef);
      if (!refs) continue;

      const children: string[] = [];
      for (const childId of refs) {
        if (!this.nodes.has(childId) || childId === node.id) continue;

        const existing = parentIds.get(childId);
        if (existing !== undefined) {
          log.debug(`Instance ${childId} already owned by ${existing}, ignoring ${node.id}`);
          continue;
        }
        parentIds.set(childId, node.id);
        children.push(childId);
      }
      childIds.set(node.id, children);
    }

    return new ProductGraph(new Map(this.nodes), childIds, parentIds);
  }

  private warn(message: string): void {
    this.warnings.push(message);
    log.warn(message);
  }
}
