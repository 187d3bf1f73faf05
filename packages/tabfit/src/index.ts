/**
 * tabfit - Public API
 *
 * Fit a row of tab names to a fixed column width, and keep each tab's
 * original label across repeated recomputation.
 */

// Layout engine
export { allocateWidth, padLabel, columnWidth } from './utils/layout';
export { snapshotTabBar, snapshotWidth } from './utils/debug';

// Labels and recompute
export { trueLabel, labelMarker, displayText } from './tabs/registry';
export { recompute, syntheticCurrentTab } from './tabs/recompute';
export { createLayoutConfig, updateLayoutConfig } from './tabs/config';
export { DEFAULT_LAYOUT_CONFIG } from './constants/layout';

// Host integration
export { createTabNamer, recomputeHost } from './host/tabNamer';
export { DemoTabHost } from './host/demo/DemoTabHost';
export { tabStripMachine, hostChangeToEvent } from './machines/tabStripMachine';

// Types
export type {
  LayoutConfig,
  DisplayName,
  DisplaySegment,
  TabName,
  TabKind,
  Tab,
  RecomputeResult,
} from './tabs/types';
export type { TabHost, HostTab, HostChange, HostChangeListener } from './host/types';
export type { TabNamer } from './host/tabNamer';
export type { DemoTabHostOptions } from './host/demo/DemoTabHost';
export type { TabStripContext, TabStripEvent, TabStripInput } from './machines/types';
