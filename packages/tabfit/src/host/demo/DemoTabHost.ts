import type { DisplayName, Tab, TabName } from '../../tabs/types';
import type { HostChange, HostChangeListener, HostTab, TabHost } from '../types';

// ============================================
// Internal Types
// ============================================

interface DemoTab {
  id: string;
  /** Buffer focused in this tab */
  buffer: string;
  name: TabName;
  explicitName: string | null;
}

export interface DemoTabHostOptions {
  width?: number;
  buffer?: string;
  /** When false the host lists no tabs, as if the tab bar were hidden */
  tabBarEnabled?: boolean;
}

const DEFAULT_WIDTH = 80;
const DEFAULT_BUFFER = 'scratch';

// ============================================
// DemoTabHost
// ============================================

/**
 * In-memory host: a frame of fixed column width holding a row of tabs,
 * each showing one buffer. Auto-named tabs start out named after their
 * buffer; renamed tabs keep the typed name.
 */
export class DemoTabHost implements TabHost {
  private tabs: DemoTab[] = [];
  private activeTabId = 't0';
  private nextTabNum = 0;
  private width: number;
  private readonly tabBarEnabled: boolean;
  private listeners = new Set<HostChangeListener>();

  /** Name written for the current tab while no tabs are listed */
  untrackedName: DisplayName | null = null;

  constructor(options: DemoTabHostOptions = {}) {
    this.width = options.width ?? DEFAULT_WIDTH;
    this.tabBarEnabled = options.tabBarEnabled ?? true;
    const tab = this.createTab(options.buffer ?? DEFAULT_BUFFER);
    this.tabs.push(tab);
    this.activeTabId = tab.id;
  }

  // ============================================
  // TabHost
  // ============================================

  getWidth(): number {
    return this.width;
  }

  listTabs(): HostTab[] {
    if (!this.tabBarEnabled) return [];
    return this.tabs.map((t): HostTab => ({
      id: t.id,
      kind: t.id === this.activeTabId ? 'current' : 'other',
      explicitName: t.explicitName,
      name: t.name,
    }));
  }

  currentBufferName(): string {
    return this.getActiveTab()?.buffer ?? '';
  }

  setTabName(tab: Tab, name: DisplayName): void {
    if (tab.id === undefined) {
      this.untrackedName = name;
      return;
    }
    const target = this.tabs.find((t) => t.id === tab.id);
    if (target) target.name = name;
  }

  // ============================================
  // Commands
  // ============================================

  setWidth(cols: number): void {
    this.width = cols;
    this.emit({ type: 'resize', width: cols });
  }

  /** Open a tab showing `buffer` and make it current */
  newTab(buffer: string = DEFAULT_BUFFER): string {
    const tab = this.createTab(buffer);
    const activeIdx = this.tabs.findIndex((t) => t.id === this.activeTabId);
    this.tabs.splice(activeIdx + 1, 0, tab);
    this.activeTabId = tab.id;
    this.emit({ type: 'open', tabId: tab.id });
    return tab.id;
  }

  selectTab(tabId: string): boolean {
    if (!this.tabs.some((t) => t.id === tabId)) return false;
    this.activeTabId = tabId;
    this.emit({ type: 'select', tabId });
    return true;
  }

  /** Close a tab (the current one by default). The last tab cannot be closed. */
  closeTab(tabId?: string): boolean {
    const targetId = tabId ?? this.activeTabId;
    const idx = this.tabs.findIndex((t) => t.id === targetId);
    if (idx === -1 || this.tabs.length <= 1) return false;

    this.tabs.splice(idx, 1);

    if (this.activeTabId === targetId) {
      const newIdx = Math.min(idx, this.tabs.length - 1);
      this.activeTabId = this.tabs[newIdx].id;
    }

    this.emit({ type: 'close', tabId: targetId });
    return true;
  }

  /** Rename a tab. An empty name drops the manual name and reverts to the buffer name. */
  renameTab(tabId: string, name: string): boolean {
    const tab = this.tabs.find((t) => t.id === tabId);
    if (!tab) return false;
    if (name === '') {
      tab.explicitName = null;
      tab.name = tab.buffer;
    } else {
      tab.explicitName = name;
      tab.name = name;
    }
    this.emit({ type: 'rename', tabId });
    return true;
  }

  /** Switch the current tab to another buffer */
  setBuffer(buffer: string): void {
    const tab = this.getActiveTab();
    if (!tab) return;
    tab.buffer = buffer;
    this.emit({ type: 'buffer' });
  }

  /**
   * Run a command line such as `rename-tab t1 notes` or `resize 120`.
   * Returns false when the command is unknown or fails.
   */
  runCommand(line: string): boolean {
    const [cmd, ...args] = line.trim().split(/\s+/);
    switch (cmd) {
      case 'new-tab':
        this.newTab(args[0]);
        return true;
      case 'select-tab':
        return args[0] !== undefined && this.selectTab(args[0]);
      case 'close-tab':
        return this.closeTab(args[0]);
      case 'rename-tab':
        return args[0] !== undefined && this.renameTab(args[0], args.slice(1).join(' '));
      case 'set-buffer':
        if (args.length === 0) return false;
        this.setBuffer(args.join(' '));
        return true;
      case 'resize': {
        const cols = parseInt(args[0] ?? '', 10);
        if (Number.isNaN(cols)) return false;
        this.setWidth(cols);
        return true;
      }
      default:
        console.warn(`[DemoTabHost] Unhandled command: ${cmd}`);
        return false;
    }
  }

  onChange(listener: HostChangeListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  // ============================================
  // Inspection
  // ============================================

  get activeId(): string {
    return this.activeTabId;
  }

  /** Names as currently stored, in display order */
  getNames(): TabName[] {
    return this.tabs.map((t) => t.name);
  }

  getTabName(tabId: string): TabName | undefined {
    return this.tabs.find((t) => t.id === tabId)?.name;
  }

  // ============================================
  // Helpers
  // ============================================

  private getActiveTab(): DemoTab | undefined {
    return this.tabs.find((t) => t.id === this.activeTabId);
  }

  private createTab(buffer: string): DemoTab {
    return {
      id: `t${this.nextTabNum++}`,
      buffer,
      name: buffer,
      explicitName: null,
    };
  }

  private emit(change: HostChange): void {
    this.listeners.forEach((l) => l(change));
  }
}
