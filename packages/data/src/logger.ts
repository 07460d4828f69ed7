/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * lookswitch logger - consistent console logging across packages
 *
 * Log levels:
 * - error: Always logged - failures that affect a parse or an apply operation
 * - warn: Always logged - recoverable issues (duplicate ids, malformed look groups)
 * - info: Logged when LOOKSWITCH_DEBUG=true - general operational info
 * - debug: Logged when LOOKSWITCH_DEBUG=true - request/response traces
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LogContext {
  /** Component/module name (e.g., 'PlmXml', 'LookLibrary', 'AuthoringClient') */
  component: string;
  /** Operation being performed (e.g., 'parse', 'connectMaterials') */
  operation?: string;
  /** Node id or target name if applicable */
  subject?: string;
  /** Additional context data */
  data?: Record<string, unknown>;
}

export interface Logger {
  error(message: string, error?: unknown, ctx?: Partial<LogContext>): void;
  warn(message: string, ctx?: Partial<LogContext>): void;
  info(message: string, ctx?: Partial<LogContext>): void;
  debug(message: string, data?: unknown, ctx?: Partial<LogContext>): void;
  caught(message: string, error: unknown, ctx?: Partial<LogContext>): void;
}

export function isDebugEnabled(): boolean {
  return process.env.LOOKSWITCH_DEBUG === 'true';
}

function formatContext(ctx: LogContext): string {
  let prefix = `[${ctx.component}]`;
  if (ctx.operation) {
    prefix += ` ${ctx.operation}`;
  }
  if (ctx.subject !== undefined) {
    prefix += ` (${ctx.subject})`;
  }
  return prefix;
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

/**
 * Create a logger instance for a specific component
 */
export function createLogger(component: string): Logger {
  return {
    error(message, error, ctx) {
      const prefix = formatContext({ component, ...ctx });
      const text = error !== undefined ? `${prefix} ${message}: ${formatError(error)}` : `${prefix} ${message}`;
      if (ctx?.data !== undefined) {
        console.error(text, ctx.data);
      } else {
        console.error(text);
      }
    },

    warn(message, ctx) {
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.warn(`${prefix} ${message}`, ctx.data);
      } else {
        console.warn(`${prefix} ${message}`);
      }
    },

    info(message, ctx) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.log(`${prefix} ${message}`, ctx.data);
      } else {
        console.log(`${prefix} ${message}`);
      }
    },

    debug(message, data, ctx) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (data !== undefined) {
        console.debug(`${prefix} ${message}`, data);
      } else {
        console.debug(`${prefix} ${message}`);
      }
    },

    /**
     * Log a caught error with context - visible when LOOKSWITCH_DEBUG=true
     * Use in catch blocks where the error is handled/recovered
     */
    caught(message, error, ctx) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      console.debug(`${prefix} ${message} (recovered): ${formatError(error)}`);
    },
  };
}
