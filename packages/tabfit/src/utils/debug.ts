/**
 * Debug utilities - render a tab row as plain text for comparison with
 * what the host shows
 */

import type { Tab } from '../tabs/types';
import { displayText } from '../tabs/registry';
import { columnWidth } from './layout';

/**
 * Join the display text of each tab into one row. With the default empty
 * separator the row width equals the sum of the tab widths.
 */
export function snapshotTabBar(tabs: Tab[], separator = ''): string {
  return tabs.map((t) => displayText(t.name)).join(separator);
}

/** Columns the snapshot occupies */
export function snapshotWidth(tabs: Tab[], separator = ''): number {
  return columnWidth(snapshotTabBar(tabs, separator));
}
