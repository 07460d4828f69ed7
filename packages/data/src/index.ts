/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @lookswitch/data - Shared enums and logging
 */

export { NodeType, isNodeType, nodeTypeFromString } from './types.js';
export { createLogger, formatError, isDebugEnabled } from './logger.js';
export type { Logger, LogContext, LogLevel } from './logger.js';
