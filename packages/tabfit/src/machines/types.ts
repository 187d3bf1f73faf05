/**
 * Machine Types
 *
 * Context, input and event definitions for the tab strip machine.
 */

import type { DisplayName, LayoutConfig, Tab } from '../tabs/types';
import type { TabHost } from '../host/types';

// ============================================
// Tab Strip Machine Types
// ============================================

export interface TabStripInput {
  host: TabHost;
  config?: Partial<LayoutConfig>;
}

export interface TabStripContext {
  host: TabHost;
  config: LayoutConfig;
  /** Padded copies of the host's tabs from the last recompute */
  tabs: Tab[];
  /** Name computed for the current tab by the last recompute */
  currentName: DisplayName | null;
  /** Frame width seen by the last recompute */
  lastWidth: number | null;
  recomputeCount: number;
  /** Type of the event that caused the last recompute ('xstate.init' at start) */
  lastTrigger: string | null;
}

// ============================================
// Events
// ============================================

export type TabStripEvent =
  | { type: 'RESIZE'; width: number }
  | { type: 'TAB_OPENED'; tabId: string }
  | { type: 'TAB_CLOSED'; tabId: string }
  | { type: 'TAB_SELECTED'; tabId: string }
  | { type: 'TAB_RENAMED'; tabId: string }
  | { type: 'BUFFER_CHANGED' }
  | { type: 'SET_CONFIG'; patch: Partial<LayoutConfig> }
  | { type: 'RECOMPUTE' }
  | { type: 'SUSPEND' }
  | { type: 'RESUME' };
