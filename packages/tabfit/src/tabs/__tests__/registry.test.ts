import { describe, it, expect, vi } from 'vitest';
import { displayText, labelMarker, trueLabel } from '../registry';
import { padLabel } from '../../utils/layout';
import type { TabName } from '../types';

describe('displayText', () => {
  it('reads plain strings and padded names', () => {
    expect(displayText('notes')).toBe('notes');
    expect(displayText(padLabel('x', 5))).toBe('  x  ');
  });

  it('reads a missing name as empty', () => {
    expect(displayText(null)).toBe('');
    expect(displayText(undefined)).toBe('');
  });
});

describe('labelMarker', () => {
  it('is null for plain strings', () => {
    expect(labelMarker('notes')).toBeNull();
    expect(labelMarker(null)).toBeNull();
  });

  it('returns the label a padded name was built from', () => {
    expect(labelMarker(padLabel('notes', 3))).toBe('notes');
  });
});

describe('trueLabel', () => {
  const buffer = () => 'main.ts';

  describe('renamed tabs', () => {
    it('prefer the marker over the stored explicit name', () => {
      const tab = { kind: 'other' as const, explicitName: 'old', name: padLabel('new', 10) };
      expect(trueLabel(tab, buffer)).toBe('new');
    });

    it('use the displayed text before the first padding', () => {
      const tab = { kind: 'other' as const, explicitName: 'renamed', name: 'renamed' };
      expect(trueLabel(tab, buffer)).toBe('renamed');
    });

    it('do not consult the focused buffer when current', () => {
      const currentBuffer = vi.fn(() => 'main.ts');
      const tab = { kind: 'current' as const, explicitName: 'notes', name: padLabel('notes', 12) };
      expect(trueLabel(tab, currentBuffer)).toBe('notes');
      expect(currentBuffer).not.toHaveBeenCalled();
    });
  });

  it('follows the focused buffer for the current tab', () => {
    const tab = { kind: 'current' as const, name: padLabel('old', 10) };
    expect(trueLabel(tab, buffer)).toBe('main.ts');
  });

  it('recovers the full label of a truncated tab', () => {
    const tab = { kind: 'other' as const, name: padLabel('a-very-long-buffer-name.txt', 10) };
    expect(trueLabel(tab, buffer)).toBe('a-very-long-buffer-name.txt');
  });

  it('falls back to the displayed text, or empty', () => {
    expect(trueLabel({ kind: 'other', name: 'README.md' }, buffer)).toBe('README.md');
    expect(trueLabel({ kind: 'other', name: null }, buffer)).toBe('');
    expect(trueLabel({ kind: 'other' }, buffer)).toBe('');
  });

  it('never drifts across repeated padding at different widths', () => {
    let name: TabName = 'server.ts';
    for (const width of [30, 8, 3, 0, 50]) {
      name = padLabel(trueLabel({ kind: 'other', name }, buffer), width);
      expect(trueLabel({ kind: 'other', name }, buffer)).toBe('server.ts');
    }
    expect(displayText(name)).toBe(' '.repeat(20) + 'server.ts' + ' '.repeat(21));
  });
});
