/**
 * Layout utility functions
 * Pure functions for tab width calculations
 */

import type { DisplayName, DisplaySegment, LayoutConfig } from '../tabs/types';
import { ELLIPSIS, MIN_LABEL_PADDING, PAD_CHAR } from '../constants/layout';

/**
 * Number of columns a string occupies. Every code point counts as one column.
 */
export function columnWidth(text: string): number {
  return Array.from(text).length;
}

/**
 * Calculate the width each tab's name should be padded to.
 *
 * The frame width, less the fixed overhead, is divided evenly between tabs and
 * clamped to [minWidth, maxWidth]; the per-tab overhead is then taken off.
 * The result may be zero or negative when the overheads exceed the bounds.
 */
export function allocateWidth(totalWidth: number, tabCount: number, config: LayoutConfig): number {
  const { minWidth, maxWidth, fixedOverhead, perTabOverhead } = config;
  const available = Math.max(totalWidth - fixedOverhead, 1);
  const computed = Math.floor(available / Math.max(tabCount, 1));

  let clamped = computed;
  if (computed < minWidth) {
    clamped = minWidth;
  } else if (computed > maxWidth) {
    clamped = maxWidth;
  }

  return clamped - perTabOverhead;
}

/**
 * Pad or truncate a label to a target width.
 *
 * Labels that fit with at least one space on each side are centered, the
 * right side taking the odd column. Longer labels become one space, the
 * first (targetWidth - 2) characters and an ellipsis. The result carries
 * the original label either way.
 */
export function padLabel(label: string, targetWidth: number): DisplayName {
  const chars = Array.from(label);
  let segments: DisplaySegment[];

  if (chars.length + MIN_LABEL_PADDING > targetWidth) {
    const kept = chars.slice(0, Math.max(targetWidth - MIN_LABEL_PADDING, 0));
    segments = [
      { text: PAD_CHAR, columns: 1 },
      { text: kept.join(''), columns: kept.length },
      { text: ELLIPSIS, columns: 1 },
    ];
  } else {
    const paddingTotal = (targetWidth - chars.length) / 2;
    const left = Math.floor(paddingTotal);
    const right = Math.ceil(paddingTotal);
    segments = [
      { text: PAD_CHAR.repeat(left), columns: left },
      { text: label, columns: chars.length },
      { text: PAD_CHAR.repeat(right), columns: right },
    ];
  }

  return {
    text: segments.map((s) => s.text).join(''),
    label,
    segments,
  };
}
