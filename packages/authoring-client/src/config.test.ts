/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { DEFAULT_AUTHORING_CONFIG, resolveAuthoringConfig } from './config.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('resolveAuthoringConfig', () => {
  it('falls back to the defaults', () => {
    expect(resolveAuthoringConfig({}, {})).toEqual({ ...DEFAULT_AUTHORING_CONFIG, materialDummy: undefined });
  });

  it('reads the environment', () => {
    const config = resolveAuthoringConfig(
      {},
      {
        LOOKSWITCH_HOST: 'render-01',
        LOOKSWITCH_PORT: '8080',
        LOOKSWITCH_API_VERSION: 'v3',
        LOOKSWITCH_TIMEOUT_MS: '2500',
        LOOKSWITCH_RETRIES: '2',
        LOOKSWITCH_MATERIAL_DUMMY: ' DUMMY ',
      }
    );

    expect(config).toEqual({
      host: 'render-01',
      port: 8080,
      apiVersion: 'v3',
      timeout: 2500,
      retries: 2,
      materialDummy: 'DUMMY',
    });
  });

  it('prefers explicit overrides', () => {
    const config = resolveAuthoringConfig({ port: 9000, retries: 0 }, { LOOKSWITCH_PORT: '8080', LOOKSWITCH_RETRIES: '3' });
    expect(config.port).toBe(9000);
    expect(config.retries).toBe(0);
  });

  it('ignores values that are not usable integers', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const config = resolveAuthoringConfig({}, { LOOKSWITCH_PORT: 'abc', LOOKSWITCH_TIMEOUT_MS: '0', LOOKSWITCH_RETRIES: '-1' });

    expect(config.port).toBe(1234);
    expect(config.timeout).toBe(10_000);
    expect(config.retries).toBe(0);
    expect(warnSpy.mock.calls.map((call) => call[0])).toEqual([
      '[AuthoringConfig] Ignoring LOOKSWITCH_PORT="abc", using 1234',
      '[AuthoringConfig] Ignoring LOOKSWITCH_TIMEOUT_MS="0", using 10000',
      '[AuthoringConfig] Ignoring LOOKSWITCH_RETRIES="-1", using 0',
    ]);
  });
});
