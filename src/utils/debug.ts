import type { HuffOptions } from '../types.ts';

const envLevel = Number.parseInt(process.env.HUFF_DEBUG ?? '', 10);

/**
 * Effective debug level: the explicit option, else HUFF_DEBUG, else 0
 */
export function resolveDebugLevel(options?: HuffOptions): number {
  if (options?.debug !== undefined) return options.debug;
  return Number.isNaN(envLevel) ? 0 : envLevel;
}

export function debugLog(level: number, threshold: number, message: string): void {
  if (level >= threshold) console.log(`[huff] ${message}`);
}
