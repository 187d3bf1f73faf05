/**
 * Recompute every tab name for the current frame width.
 *
 * Labels are resolved for all tabs before any name is overwritten, then each
 * tab is padded to the same target width. Tabs are updated in place.
 */

import type { DisplayName, LayoutConfig, RecomputeResult, Tab } from './types';
import { allocateWidth, padLabel } from '../utils/layout';
import { trueLabel } from './registry';

/** Entry standing in for the current tab when the host lists none */
export function syntheticCurrentTab(): Tab {
  return { kind: 'current', explicitName: null, name: null };
}

export function recompute<T extends Tab>(
  tabs: T[],
  width: number,
  config: LayoutConfig,
  currentBufferName: () => string,
): RecomputeResult<T | Tab> {
  const entries: Array<T | Tab> = tabs.length > 0 ? tabs : [syntheticCurrentTab()];

  const labels = entries.map((tab) => trueLabel(tab, currentBufferName));
  const targetWidth = allocateWidth(width, entries.length, config);

  let current: DisplayName | null = null;
  for (let i = 0; i < entries.length; i++) {
    const tab = entries[i];
    const name = padLabel(labels[i], targetWidth);
    tab.name = name;
    if (tab.kind === 'current' && current === null) {
      current = name;
    }
  }

  return { tabs: entries, current, targetWidth };
}
