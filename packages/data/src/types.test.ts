/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { NodeType, isNodeType, nodeTypeFromString } from './types.js';

describe('nodeTypeFromString', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('maps known values regardless of case and padding', () => {
    expect(nodeTypeFromString('GROUP')).toBe(NodeType.GROUP);
    expect(nodeTypeFromString('shape')).toBe(NodeType.SHAPE);
    expect(nodeTypeFromString(' light_spot ')).toBe(NodeType.LIGHT_SPOT);
  });

  it('falls back to UNKNOWN for empty input without warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(nodeTypeFromString('')).toBe(NodeType.UNKNOWN);
    expect(nodeTypeFromString(null)).toBe(NodeType.UNKNOWN);
    expect(nodeTypeFromString(undefined)).toBe(NodeType.UNKNOWN);
    expect(warn).not.toHaveBeenCalled();
  });

  it('falls back to UNKNOWN with a warning for invalid values', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(nodeTypeFromString('MESH')).toBe(NodeType.UNKNOWN);
    expect(warn).toHaveBeenCalledWith('[NodeType] Invalid node type "MESH", using UNKNOWN');
  });
});

describe('isNodeType', () => {
  it('only accepts exact enum values', () => {
    expect(isNodeType('FILE')).toBe(true);
    expect(isNodeType('file')).toBe(false);
    expect(isNodeType('NODE')).toBe(false);
  });
});
