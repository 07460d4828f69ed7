/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @lookswitch/configurator - resolve PLM-XML documents against configuration strings
 */

export {
  resolveConfiguration,
  withDiagnostics,
  activeTargets,
  createConfigString,
  statusMessage,
  ConfigurationResolver,
} from './resolver.js';

export type { ConfigurationResult, ConfigurationDiagnostics, DiagnosticsOverlay } from './types.js';
