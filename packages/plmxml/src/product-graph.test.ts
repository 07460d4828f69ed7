/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { NodeType } from '@lookswitch/data';
import { createProductNode, ProductGraphBuilder } from './product-graph.js';

describe('createProductNode', () => {
  it('reads PR tags, LINC id and node type from user data', () => {
    const node = createProductNode({
      id: 'n1',
      name: 'Wheel',
      partRef: '#v1',
      userData: { PR_TAGS: 'AB+CD', LINC_ID: 'L1', NODE_TYPE: 'shape' },
    });

    expect(node.partRef).toBe('v1');
    expect(node.prTags).toBe('AB+CD');
    expect(node.lincId).toBe('L1');
    expect(node.nodeType).toBe(NodeType.SHAPE);
    expect(node.userData.get('PR_TAGS')).toBe('AB+CD');
    expect(Object.isFrozen(node)).toBe(true);
  });

  it('treats empty PR tags as unconditional', () => {
    expect(createProductNode({ id: 'n1', userData: { PR_TAGS: '' } }).prTags).toBeUndefined();
    expect(createProductNode({ id: 'n2', userData: { PR_TAGS: ';' } }).prTags).toBeUndefined();
    expect(createProductNode({ id: 'n3' }).prTags).toBeUndefined();
  });

  it('accepts a map of user data', () => {
    const node = createProductNode({ id: 'n1', userData: new Map([['LINC_ID', 'L9']]) });

    expect(node.lincId).toBe('L9');
    expect(node.nodeType).toBe(NodeType.UNKNOWN);
    expect(node.name).toBe('');
  });
});

describe('ProductGraph', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function buildSample() {
    return new ProductGraphBuilder()
      .addView('v_root', ['#a', '#b'])
      .addView('v_b', ['c'])
      .addNode(createProductNode({ id: 'root', partRef: '#v_root' }))
      .addNode(createProductNode({ id: 'a', userData: { PR_TAGS: 'X1', LINC_ID: 'LA' } }))
      .addNode(createProductNode({ id: 'b', partRef: 'v_b' }))
      .addNode(createProductNode({ id: 'c', userData: { PR_TAGS: 'Y1' } }))
      .addNode(createProductNode({ id: 'loose' }))
      .build();
  }

  it('derives the tree from revision views', () => {
    const graph = buildSample();

    expect(graph.size).toBe(5);
    expect(graph.roots().map((n) => n.id)).toEqual(['root', 'loose']);
    expect(graph.children('root').map((n) => n.id)).toEqual(['a', 'b']);
    expect(graph.children('b').map((n) => n.id)).toEqual(['c']);
    expect(graph.parent('c')?.id).toBe('b');
    expect(graph.parent('root')).toBeUndefined();
  });

  it('walks depth first in pre-order', () => {
    const walked = Array.from(buildSample().walk(), ({ node, depth }) => `${node.id}@${depth}`);

    expect(walked).toEqual(['root@0', 'a@1', 'b@1', 'c@2', 'loose@0']);
  });

  it('lists configurable nodes in document order', () => {
    expect(Array.from(buildSample().configurableNodes(), (n) => n.id)).toEqual(['a', 'c']);
  });

  it('looks up nodes by LINC id', () => {
    const graph = buildSample();

    expect(graph.findByLincId('LA')?.id).toBe('a');
    expect(graph.findByLincId('missing')).toBeUndefined();
  });

  it('keeps the last node for a duplicate id and records a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const builder = new ProductGraphBuilder()
      .addNode(createProductNode({ id: 'dup', name: 'First' }))
      .addNode(createProductNode({ id: 'other' }))
      .addNode(createProductNode({ id: 'dup', name: 'Second' }));
    const graph = builder.build();

    expect(graph.size).toBe(2);
    expect(graph.get('dup')?.name).toBe('Second');
    expect(Array.from(graph.nodes(), (n) => n.id)).toEqual(['dup', 'other']);
    expect(builder.getWarnings()).toEqual(['ProductInstance with id "dup" already exists and will be overwritten']);
    expect(warn).toHaveBeenCalledWith(
      '[ProductGraph] ProductInstance with id "dup" already exists and will be overwritten'
    );
  });

  it('ignores view references to unknown instances', () => {
    const graph = new ProductGraphBuilder()
      .addView('v', ['ghost', 'child'])
      .addNode(createProductNode({ id: 'parent', partRef: '#v' }))
      .addNode(createProductNode({ id: 'child' }))
      .build();

    expect(graph.children('parent').map((n) => n.id)).toEqual(['child']);
    expect(graph.has('ghost')).toBe(false);
  });
});
