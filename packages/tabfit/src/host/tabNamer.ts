/**
 * Tab Namer - entry points a host wires into its naming and rename hooks
 *
 * recomputeAll():   re-pads every tab and writes the names back to the host
 * currentTabName(): the name for the current tab, recomputing only when
 *                   nothing has been computed since the last invalidate()
 */

import type { DisplayName, LayoutConfig, RecomputeResult, Tab } from '../tabs/types';
import type { TabHost } from './types';
import { recompute } from '../tabs/recompute';

/**
 * Compute new names from the host's live state without writing anything back.
 * Width, tabs and config are all read fresh; the tabs are padded as copies.
 */
export function computeHostNames(host: TabHost, config: LayoutConfig): RecomputeResult {
  const tabs: Tab[] = host.listTabs().map((t) => ({ ...t }));
  return recompute(tabs, host.getWidth(), config, () => host.currentBufferName());
}

/** Write padded names back to the host */
export function writeHostNames(host: TabHost, tabs: Tab[]): void {
  for (const tab of tabs) {
    if (tab.name != null && typeof tab.name !== 'string') {
      host.setTabName(tab, tab.name);
    }
  }
}

/** Run one recompute against the host and write the names back */
export function recomputeHost(host: TabHost, config: LayoutConfig): DisplayName | null {
  const { tabs, current } = computeHostNames(host, config);
  writeHostNames(host, tabs);
  return current;
}

export interface TabNamer {
  recomputeAll(): DisplayName | null;
  currentTabName(): DisplayName | null;
  invalidate(): void;
}

export function createTabNamer(host: TabHost, getConfig: () => LayoutConfig): TabNamer {
  let cached: DisplayName | null = null;
  let hasCache = false;

  const recomputeAll = (): DisplayName | null => {
    cached = recomputeHost(host, getConfig());
    hasCache = true;
    return cached;
  };

  return {
    recomputeAll,
    currentTabName: () => (hasCache ? cached : recomputeAll()),
    invalidate: () => {
      cached = null;
      hasCache = false;
    },
  };
}
