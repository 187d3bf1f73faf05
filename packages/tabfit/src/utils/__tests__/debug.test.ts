import { describe, it, expect } from 'vitest';
import { snapshotTabBar, snapshotWidth } from '../debug';
import { padLabel } from '../layout';
import type { Tab } from '../../tabs/types';

describe('snapshotTabBar', () => {
  const tabs: Tab[] = [
    { kind: 'other', name: padLabel('a', 5) },
    { kind: 'current', name: 'plain' },
    { kind: 'other' },
  ];

  it('joins the display text of each tab', () => {
    expect(snapshotTabBar(tabs)).toBe('  a  plain');
    expect(snapshotTabBar(tabs, '|')).toBe('  a  |plain|');
  });

  it('measures the row in columns', () => {
    expect(snapshotWidth(tabs)).toBe(10);
    expect(snapshotWidth(tabs, '|')).toBe(12);
  });
});
