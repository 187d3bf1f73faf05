import { describe, it, expect } from 'vitest';
import { recompute } from '../recompute';
import { createLayoutConfig } from '../config';
import { displayText } from '../registry';
import { snapshotTabBar, snapshotWidth } from '../../utils/debug';
import type { Tab } from '../types';

const config = createLayoutConfig();

function makeTabs(): Tab[] {
  return [
    { id: 'a', kind: 'other', name: 'main.rs' },
    { id: 'b', kind: 'current', name: 'x' },
    { id: 'c', kind: 'other', explicitName: 'notes', name: 'notes' },
  ];
}

describe('recompute', () => {
  it('synthesizes the current tab when the host lists none', () => {
    const result = recompute([], 80, config, () => 'main.rs');
    expect(result.tabs).toHaveLength(1);
    expect(result.tabs[0].kind).toBe('current');
    expect(result.tabs[0].id).toBeUndefined();
    // available 79, one tab, minus per-tab overhead
    expect(result.targetWidth).toBe(78);
    expect(result.current?.text).toBe(' '.repeat(35) + 'main.rs' + ' '.repeat(36));
  });

  it('pads every tab to the same width', () => {
    const tabs = makeTabs();
    const result = recompute(tabs, 80, config, () => 'lib.rs');

    expect(result.targetWidth).toBe(25);
    expect(displayText(tabs[0].name)).toBe(' '.repeat(9) + 'main.rs' + ' '.repeat(9));
    expect(displayText(tabs[1].name)).toBe(' '.repeat(9) + 'lib.rs' + ' '.repeat(10));
    expect(displayText(tabs[2].name)).toBe(' '.repeat(10) + 'notes' + ' '.repeat(10));
    expect(result.current?.text).toBe(displayText(tabs[1].name));
    expect(snapshotWidth(tabs)).toBe(75);
  });

  it('updates the tabs in place', () => {
    const tabs = makeTabs();
    const result = recompute(tabs, 80, config, () => 'lib.rs');
    expect(result.tabs).toBe(tabs);
  });

  it('yields identical text when called twice with the same inputs', () => {
    const tabs = makeTabs();
    const first = snapshotTabBar(recompute(tabs, 80, config, () => 'lib.rs').tabs, '|');
    const second = snapshotTabBar(recompute(tabs, 80, config, () => 'lib.rs').tabs, '|');
    expect(second).toBe(first);
  });

  it('recovers labels after shrinking and growing', () => {
    const tabs = makeTabs();
    recompute(tabs, 80, config, () => 'lib.rs');
    // 3 columns per tab: every name collapses to a pad and an ellipsis
    recompute(tabs, 10, createLayoutConfig({ minWidth: 1 }), () => 'lib.rs');
    expect(displayText(tabs[0].name)).toBe(' …');
    const result = recompute(tabs, 80, config, () => 'lib.rs');
    expect(displayText(tabs[0].name)).toBe(' '.repeat(9) + 'main.rs' + ' '.repeat(9));
    expect(result.current?.label).toBe('lib.rs');
  });

  it('reads the config it is handed', () => {
    const tabs = makeTabs();
    const result = recompute(tabs, 80, createLayoutConfig({ minWidth: 30 }), () => 'lib.rs');
    expect(result.targetWidth).toBe(29);
  });

  it('returns null when no tab is current', () => {
    const result = recompute([{ kind: 'other', name: 'a' }], 80, config, () => 'lib.rs');
    expect(result.current).toBeNull();
  });

  it('treats a tab without a name as an empty label', () => {
    const tabs: Tab[] = [
      { kind: 'other' },
      { kind: 'current', name: 'x' },
      { kind: 'other', name: 'y' },
    ];
    recompute(tabs, 80, config, () => 'lib.rs');
    expect(displayText(tabs[0].name)).toBe(' '.repeat(25));
  });
});
