/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @lookswitch/cli - command line front end
 */

export { createProgram, configFromArguments } from './program.js';
export type { CliIo, ProgramDeps } from './program.js';

export { resultToJson, formatDocument, formatApplyOutcome, formatValidation } from './format.js';
export type { ConfigurationResultJson } from './format.js';
