/**
 * Console diagnostics, silent unless the active configuration sets `debug`
 */

import type { StatsConfig } from './config';

type DebugFlag = Pick<StatsConfig, 'debug'>;

export function debugLog(config: DebugFlag, message: string, details?: Record<string, unknown>): void {
  if (!config.debug) return;
  if (details) {
    console.log(`[mtstat] ${message}`, details);
  } else {
    console.log(`[mtstat] ${message}`);
  }
}

export function debugWarn(config: DebugFlag, message: string, details?: Record<string, unknown>): void {
  if (!config.debug) return;
  if (details) {
    console.warn(`[mtstat] ${message}`, details);
  } else {
    console.warn(`[mtstat] ${message}`);
  }
}
