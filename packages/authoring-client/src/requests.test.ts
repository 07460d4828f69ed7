/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { NodeType } from '@lookswitch/data';
import { createProductNode } from '@lookswitch/plmxml';
import {
  escapeXml,
  getVersionInfoRequest,
  materialConnectToTargetsRequest,
  nodeDescriptorFromProductNode,
  nodeInfoXml,
  nodeSetVisibleRequest,
  sceneCloseRequest,
  sceneGetStructureRequest,
  sceneLoadRequest,
  sceneSetActiveRequest,
} from './requests.js';
import { AuthoringMethod, requestRootName } from './types.js';

const HEADER =
  '<?xml version="1.0" encoding="utf-8"?>\n' +
  '<GetVersionInfoRequest xmlns:xsd="http://www.w3.org/2001/XMLSchema" ' +
  'xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance" xmlns="urn:authoringsystem_v2"';

/** Everything between the root start tag and the root end tag */
function payload(body: string): string {
  const start = body.indexOf('>', body.indexOf('<', body.indexOf('?>') + 2)) + 1;
  const end = body.lastIndexOf('</');
  return body.slice(start, end);
}

describe('requestRootName', () => {
  it('joins type and name', () => {
    expect(requestRootName(AuthoringMethod.NodeSetVisible)).toBe('NodeSetVisibleRequest');
    expect(requestRootName(AuthoringMethod.TargetGetAllNames)).toBe('TargetGetAllNamesRequest');
    expect(requestRootName(AuthoringMethod.GetVersionInfo)).toBe('GetVersionInfoRequest');
  });
});

describe('escapeXml', () => {
  it('escapes markup characters', () => {
    expect(escapeXml(`a<b>&"c'`)).toBe('a&lt;b&gt;&amp;&quot;c&apos;');
  });
});

describe('request bodies', () => {
  it('writes an empty root for requests without arguments', () => {
    expect(getVersionInfoRequest().body).toBe(`${HEADER}/>`);
  });

  it('describes nodes with their user attributes', () => {
    const node = createProductNode({
      id: 'i_door',
      name: 'Door & Frame',
      userData: { LINC_ID: 'L7', NODE_TYPE: 'SHAPE' },
    });

    expect(nodeInfoXml(nodeDescriptorFromProductNode(node))).toBe(
      '<NodeInfo><LincId>L7</LincId><Name>Door &amp; Frame</Name><NodeInfoType>SHAPE</NodeInfoType>' +
        '<UserAttributes>' +
        '<UserAttribute><Key>LINC_ID</Key><Value>L7</Value></UserAttribute>' +
        '<UserAttribute><Key>NODE_TYPE</Key><Value>SHAPE</Value></UserAttribute>' +
        '</UserAttributes></NodeInfo>'
    );
  });

  it('puts the scene id first when known', () => {
    const node = createProductNode({ id: 'i_door', name: 'Door', userData: { LINC_ID: 'L7' } });
    const xml = nodeInfoXml(nodeDescriptorFromProductNode(node, '42'));
    expect(xml.startsWith('<NodeInfo><AsId>42</AsId><LincId>L7</LincId>')).toBe(true);
  });

  it('builds a visibility request', () => {
    const request = nodeSetVisibleRequest(
      [{ lincId: 'L1', name: 'Body', nodeType: NodeType.SHAPE, userAttributes: new Map() }],
      false
    );

    expect(request.method.path).toBe('node/set/visible');
    expect(payload(request.body)).toBe(
      '<nodes><NodeInfo><LincId>L1</LincId><Name>Body</Name><NodeInfoType>SHAPE</NodeInfoType>' +
        '<UserAttributes/></NodeInfo></nodes><visible>false</visible>'
    );
  });

  it('lists materials and targets in the same order', () => {
    const request = materialConnectToTargetsRequest([
      { target: 'Seat_Cover', material: 'SC-02' },
      { target: 'Paint_Body', material: 'PB-01' },
    ]);

    expect(payload(request.body)).toBe(
      '<materialNames><string>SC-02</string><string>PB-01</string></materialNames>' +
        '<targetNames><string>Seat_Cover</string><string>Paint_Body</string></targetNames>' +
        '<useCopyMethod>false</useCopyMethod><replaceTargetName>false</replaceTargetName>'
    );
  });

  it('sends useLookUpTable only when set', () => {
    const request = materialConnectToTargetsRequest([{ target: 'T', material: 'M' }], { useLookUpTable: false });
    expect(payload(request.body).endsWith('<useLookUpTable>false</useLookUpTable>')).toBe(true);
  });

  it('queries the structure from the scene root', () => {
    expect(payload(sceneGetStructureRequest().body)).toBe(
      '<node><NodeInfo><AsId>root</AsId><LincId/><Name/><ParentNodeId>root</ParentNodeId>' +
        '<NodeInfoType>UNKNOWN</NodeInfoType><UserAttributes/></NodeInfo></node><types/>'
    );
  });

  it('filters the structure by node type', () => {
    const body = sceneGetStructureRequest(undefined, [NodeType.GROUP, NodeType.SHAPE]).body;
    expect(payload(body).endsWith('<types><NodeInfoType>GROUP</NodeInfoType><NodeInfoType>SHAPE</NodeInfoType></types>')).toBe(
      true
    );
  });

  it('wraps scene names in a string list', () => {
    expect(payload(sceneSetActiveRequest('Main').body)).toBe('<name><string>Main</string></name>');
    expect(payload(sceneCloseRequest('car.plmxml').body)).toBe('<name><string>car.plmxml</string></name>');
  });

  it('builds a scene load request', () => {
    expect(payload(sceneLoadRequest('/data/car.plmxml', { native: false }).body)).toBe(
      '<path>/data/car.plmxml</path><closeActiveSessions>false</closeActiveSessions>' +
        '<loadAssemblies>false</loadAssemblies><native>false</native>'
    );
  });
});
