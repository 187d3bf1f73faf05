/**
 * Layout Constants
 *
 * Defaults for the tab width settings and the characters used to build
 * padded tab names.
 *
 * Key invariant for a padded name:
 *   leftPad + label + rightPad = targetWidth   (padding path)
 *   1 + truncatedLabel + 1     = targetWidth   (truncation path, target >= 2)
 */

import type { LayoutConfig } from '../tabs/types';

/** Narrowest a tab may get before the column budget is exceeded */
export const DEFAULT_MIN_WIDTH = 20;

/** Widest a tab may get, however few tabs are open */
export const DEFAULT_MAX_WIDTH = 300;

// Columns taken once per tab bar (e.g. the new-tab button)
export const DEFAULT_FIXED_OVERHEAD = 1;

// Columns taken by every tab besides its name (e.g. the close button)
export const DEFAULT_PER_TAB_OVERHEAD = 1;

export const DEFAULT_LAYOUT_CONFIG: Readonly<LayoutConfig> = Object.freeze({
  minWidth: DEFAULT_MIN_WIDTH,
  maxWidth: DEFAULT_MAX_WIDTH,
  fixedOverhead: DEFAULT_FIXED_OVERHEAD,
  perTabOverhead: DEFAULT_PER_TAB_OVERHEAD,
});

export const PAD_CHAR = ' ';
export const ELLIPSIS = '…';

/** Columns reserved around a label: one pad on each side */
export const MIN_LABEL_PADDING = 2;
