/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * objkit logger - consistent console logging across packages
 *
 * Log levels:
 * - warn: Always logged - recoverable issues (e.g. a skipped texture)
 * - info: Logged when OBJKIT_DEBUG=true - operational summaries
 * - debug: Logged when OBJKIT_DEBUG=true - per-record details and handled errors
 *
 * Failures that end an operation are thrown, not logged.
 */

export interface LogContext {
  /** Component name (e.g., 'Parser', 'Writer', 'BinaryDump') */
  component: string;
  /** Operation being performed (e.g., 'flush', 'scanMaterialLibrary') */
  operation?: string;
  /** File the record came from */
  source?: string;
  /** 1-based line number in `source` */
  lineNumber?: number;
  /** Additional context data */
  data?: Record<string, unknown>;
}

export function isDebugEnabled(): boolean {
  return process.env.OBJKIT_DEBUG === 'true';
}

function formatContext(ctx: LogContext): string {
  let prefix = `[${ctx.component}]`;
  if (ctx.operation) {
    prefix += ` ${ctx.operation}`;
  }
  if (ctx.source) {
    prefix += ctx.lineNumber !== undefined ? ` ${ctx.source}:${ctx.lineNumber}` : ` ${ctx.source}`;
  } else if (ctx.lineNumber !== undefined) {
    prefix += ` line ${ctx.lineNumber}`;
  }
  return prefix;
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

export type Logger = ReturnType<typeof createLogger>;

/**
 * Create a logger instance for a specific component
 */
export function createLogger(component: string) {
  return {
    warn(message: string, ctx?: Partial<LogContext>) {
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.warn(`${prefix} ${message}`, ctx.data);
      } else {
        console.warn(`${prefix} ${message}`);
      }
    },

    /**
     * Log info - only visible when OBJKIT_DEBUG=true
     */
    info(message: string, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.log(`${prefix} ${message}`, ctx.data);
      } else {
        console.log(`${prefix} ${message}`);
      }
    },

    /**
     * Log debug - only visible when OBJKIT_DEBUG=true
     */
    debug(message: string, data?: unknown, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (data !== undefined) {
        console.debug(`${prefix} ${message}`, data);
      } else {
        console.debug(`${prefix} ${message}`);
      }
    },

    /**
     * Log a handled error - visible when OBJKIT_DEBUG=true
     */
    caught(message: string, error: unknown, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      console.debug(`${prefix} ${message} (recovered):`, formatError(error));
    },
  };
}
