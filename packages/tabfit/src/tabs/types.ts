// ============================================
// Layout Types
// ============================================

export interface LayoutConfig {
  /** Lower bound on a tab's width, overhead included */
  minWidth: number;
  /** Upper bound on a tab's width, overhead included */
  maxWidth: number;
  /** Columns consumed once by the tab bar chrome */
  fixedOverhead: number;
  /** Columns consumed by each tab besides its name */
  perTabOverhead: number;
}

// ============================================
// Display Names
// ============================================

/**
 * One run of a padded name. `columns` is a rendering hint only; the
 * character count of `text` is what the host compares.
 */
export interface DisplaySegment {
  text: string;
  columns: number;
}

export interface DisplayName {
  /** Padded or truncated text, exactly as displayed */
  text: string;
  /** Label the text was built from; recovered on the next recompute */
  label: string;
  segments: DisplaySegment[];
}

/** A plain string before the first padding, a DisplayName afterwards */
export type TabName = string | DisplayName;

// ============================================
// Tabs
// ============================================

/**
 * 'current' marks the focused tab, including the entry synthesized
 * when the host reports no tabs at all.
 */
export type TabKind = 'current' | 'other';

export interface Tab {
  kind: TabKind;
  /** Host identifier (absent on the synthesized entry) */
  id?: string;
  /** Set when the tab was renamed by hand */
  explicitName?: string | null;
  name?: TabName | null;
}

export interface RecomputeResult<T extends Tab = Tab> {
  tabs: T[];
  /** Display name of the current tab, or null if no entry is current */
  current: DisplayName | null;
  /** Width every tab was padded to */
  targetWidth: number;
}
