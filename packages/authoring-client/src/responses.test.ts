/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { NodeType } from '@lookswitch/data';
import type { XmlElement } from '@lookswitch/plmxml';
import {
  parseResponseDocument,
  readConfirmation,
  readEchoes,
  readNodeDescriptors,
  readSceneNames,
  readStringList,
  readText,
  readVersion,
} from './responses.js';

function response(root: string, inner: string): XmlElement {
  const element = parseResponseDocument(`<${root} xmlns="urn:authoringsystem_v2">${inner}</${root}>`);
  if (!element) throw new Error(`unreadable test response ${root}`);
  return element;
}

describe('parseResponseDocument', () => {
  it('drops anything before the first tag', () => {
    const root = parseResponseDocument('\uFEFFHTTP/1.1 200 OK\r\n\r\n<GetVersionInfoResponse/>');
    expect(root?.localName).toBe('GetVersionInfoResponse');
  });

  it('returns null for bodies without markup', () => {
    expect(parseResponseDocument('')).toBeNull();
    expect(parseResponseDocument('Service unavailable')).toBeNull();
  });

  it('returns null for malformed documents', () => {
    expect(parseResponseDocument('<Response><returnVal>true</returnval></Response>')).toBeNull();
  });
});

describe('readVersion', () => {
  it('takes the first value starting with a digit', () => {
    const root = response('GetVersionInfoResponse', '<returnVal>build</returnVal><returnVal> 2.16.1 </returnVal>');
    expect(readVersion(root)).toBe('2.16.1');
  });

  it('returns null without a version number', () => {
    expect(readVersion(response('GetVersionInfoResponse', '<returnVal>unknown</returnVal>'))).toBeNull();
  });
});

describe('readEchoes', () => {
  it('requires every value to echo the request', () => {
    const mixed = response('NodeSetVisibleResponse', '<returnVal>true</returnVal><returnVal>false</returnVal>');
    const all = response('NodeSetVisibleResponse', '<returnVal>false</returnVal><returnVal>false</returnVal>');

    expect(readEchoes(mixed, true)).toBe(false);
    expect(readEchoes(all, false)).toBe(true);
    expect(readEchoes(all, true)).toBe(false);
  });

  it('accepts responses without values', () => {
    expect(readEchoes(response('MaterialConnectToTargetsResponse', ''), true)).toBe(true);
  });
});

describe('readConfirmation', () => {
  it('needs one true value', () => {
    expect(readConfirmation(response('SceneLoadResponse', '<returnVal>false</returnVal><returnVal>true</returnVal>'))).toBe(
      true
    );
    expect(readConfirmation(response('SceneLoadResponse', ''))).toBe(false);
  });
});

describe('readText', () => {
  it('returns the first non-empty value', () => {
    expect(readText(response('SceneGetActiveResponse', '<returnVal/><returnVal>Main</returnVal>'))).toBe('Main');
    expect(readText(response('SceneGetActiveResponse', '<returnVal/>'))).toBeNull();
  });
});

describe('readStringList', () => {
  it('collects the children of every value', () => {
    const root = response(
      'TargetGetAllNamesResponse',
      '<returnVal><string>Seat_Cover</string><string/><string>Paint_Body</string></returnVal>'
    );
    expect(readStringList(root)).toEqual(['Seat_Cover', 'Paint_Body']);
  });
});

describe('readSceneNames', () => {
  it('reads the name of every scene', () => {
    const root = response(
      'SceneGetAllResponse',
      '<returnVal><Scene><Name>Main</Name></Scene><Scene><Name>Interior</Name></Scene><Scene/></returnVal>'
    );
    expect(readSceneNames(root)).toEqual(['Main', 'Interior']);
  });
});

describe('readNodeDescriptors', () => {
  it('reads node infos with their user attributes', () => {
    const root = response(
      'SceneGetStructureResponse',
      '<returnVal>' +
        '<NodeInfo><AsId>10</AsId><LincId>L1</LincId><Name>Body</Name><ParentNodeId>root</ParentNodeId>' +
        '<NodeInfoType>SHAPE</NodeInfoType><MaterialName>PB-01</MaterialName>' +
        '<UserAttributes><UserAttribute><Key>PR_TAGS</Key><Value>L0A;</Value></UserAttribute></UserAttributes>' +
        '</NodeInfo>' +
        '<NodeInfo><AsId>11</AsId><Name>Looks</Name><NodeInfoType>GROUP</NodeInfoType></NodeInfo>' +
        '</returnVal>'
    );

    const nodes = readNodeDescriptors(root);

    expect(nodes).toHaveLength(2);
    expect(nodes[0]).toEqual({
      asId: '10',
      lincId: 'L1',
      name: 'Body',
      nodeType: NodeType.SHAPE,
      parentNodeId: 'root',
      materialName: 'PB-01',
      userAttributes: new Map([['PR_TAGS', 'L0A;']]),
    });
    expect(nodes[1].lincId).toBeUndefined();
    expect(nodes[1].nodeType).toBe(NodeType.GROUP);
    expect(nodes[1].userAttributes.size).toBe(0);
  });
});
