/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Connection settings: explicit overrides, then LOOKSWITCH_* environment
 * variables, then defaults.
 */

import { createLogger } from '@lookswitch/data';
import type { AuthoringConfig } from './types.js';

const log = createLogger('AuthoringConfig');

export const DEFAULT_AUTHORING_CONFIG: Readonly<AuthoringConfig> = Object.freeze({
  host: '127.0.0.1',
  port: 1234,
  apiVersion: 'v2',
  timeout: 10_000,
  retries: 0,
});

export const AUTHORING_ENV = {
  host: 'LOOKSWITCH_HOST',
  port: 'LOOKSWITCH_PORT',
  apiVersion: 'LOOKSWITCH_API_VERSION',
  timeout: 'LOOKSWITCH_TIMEOUT_MS',
  retries: 'LOOKSWITCH_RETRIES',
  materialDummy: 'LOOKSWITCH_MATERIAL_DUMMY',
} as const;

type Env = Readonly<Record<string, string | undefined>>;

function readInteger(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    log.warn(`Ignoring ${name}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

function readString(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

export function resolveAuthoringConfig(
  overrides: Partial<AuthoringConfig> = {},
  env: Env = process.env
): AuthoringConfig {
  const defaults = DEFAULT_AUTHORING_CONFIG;

  return {
    host: overrides.host ?? readString(env, AUTHORING_ENV.host) ?? defaults.host,
    port: overrides.port ?? readInteger(env, AUTHORING_ENV.port, defaults.port, 1),
    apiVersion: overrides.apiVersion ?? readString(env, AUTHORING_ENV.apiVersion) ?? defaults.apiVersion,
    timeout: overrides.timeout ?? readInteger(env, AUTHORING_ENV.timeout, defaults.timeout, 1),
    retries: overrides.retries ?? readInteger(env, AUTHORING_ENV.retries, defaults.retries, 0),
    materialDummy: overrides.materialDummy ?? readString(env, AUTHORING_ENV.materialDummy),
  };
}
