// ============================================
// Host Interface
// ============================================

import type { DisplayName, Tab } from '../tabs/types';

export interface HostTab extends Tab {
  id: string;
}

/**
 * What the layout core needs from the environment showing the tabs.
 * Every method is called synchronously during a recompute.
 */
export interface TabHost {
  /** Frame width in character columns */
  getWidth(): number;
  /** Open tabs in display order. Empty means only an untracked current tab. */
  listTabs(): HostTab[];
  /** Name of the buffer focused in the current tab */
  currentBufferName(): string;
  /** Overwrite a tab's name. `tab.id` is absent for the synthesized current tab. */
  setTabName(tab: Tab, name: DisplayName): void;
  /** Subscribe to host changes; returns an unsubscribe function */
  onChange?(listener: HostChangeListener): () => void;
}

// ============================================
// Host Changes
// ============================================

export type HostChange =
  | { type: 'resize'; width: number }
  | { type: 'open'; tabId: string }
  | { type: 'close'; tabId: string }
  | { type: 'select'; tabId: string }
  | { type: 'rename'; tabId: string }
  | { type: 'buffer' };

export type HostChangeListener = (change: HostChange) => void;
