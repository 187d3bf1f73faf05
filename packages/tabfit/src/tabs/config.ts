import type { LayoutConfig } from './types';
import { DEFAULT_LAYOUT_CONFIG } from '../constants/layout';

const CONFIG_KEYS = ['minWidth', 'maxWidth', 'fixedOverhead', 'perTabOverhead'] as const;

/**
 * Apply a partial set of width settings on top of a base config.
 *
 * Values are truncated to integers. Non-finite values keep the base value.
 * Ranges are not checked: allocateWidth copes with any combination.
 */
export function updateLayoutConfig(base: LayoutConfig, patch: Partial<LayoutConfig>): LayoutConfig {
  const next: LayoutConfig = { ...base };
  for (const key of CONFIG_KEYS) {
    const value = patch[key];
    if (value === undefined) continue;
    if (!Number.isFinite(value)) {
      console.warn(`[tabfit] Ignoring ${key}=${value}, keeping ${base[key]}`);
      continue;
    }
    next[key] = Math.trunc(value);
  }
  return next;
}

/** Build a config from the defaults and optional overrides */
export function createLayoutConfig(overrides: Partial<LayoutConfig> = {}): LayoutConfig {
  return updateLayoutConfig(DEFAULT_LAYOUT_CONFIG, overrides);
}
