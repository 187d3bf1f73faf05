import type { Tab, TabName } from './types';

/** Visible text of a tab name; an absent name reads as empty */
export function displayText(name: TabName | null | undefined): string {
  if (name == null) return '';
  return typeof name === 'string' ? name : name.text;
}

/** Original label carried by a padded name, or null for a plain string */
export function labelMarker(name: TabName | null | undefined): string | null {
  if (name == null || typeof name === 'string') return null;
  return name.label;
}

/**
 * Resolve the label a tab should be padded from.
 *
 * Order matters:
 * 1. Renamed tabs keep the name as last typed: the marker if the name was
 *    already padded, otherwise the displayed text.
 * 2. The current tab follows whatever buffer is focused, so its label is
 *    fetched from the host every time.
 * 3. Any other tab uses its marker, falling back to the displayed text.
 */
export function trueLabel(tab: Tab, currentBufferName: () => string): string {
  if (tab.explicitName) {
    return labelMarker(tab.name) ?? displayText(tab.name);
  }
  if (tab.kind === 'current') {
    return currentBufferName();
  }
  return labelMarker(tab.name) ?? displayText(tab.name);
}
