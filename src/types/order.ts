import type { MenuCategory, MenuItem } from './menu';

// One slot per course
export type Slot = MenuCategory;

export const SLOTS: readonly Slot[] = ['entree', 'side', 'accompaniment'];

export type SlotSelection =
  | { kind: 'selected'; item: MenuItem }
  | { kind: 'none' };

export const NO_SELECTION: SlotSelection = { kind: 'none' };

export interface OrderTotals {
  subtotal: number;
  tax: number;
  total: number;
}

export type FormattedTotals = Record<keyof OrderTotals, string>;

export interface OrderReceipt extends OrderTotals {
  items: MenuItem[];  // slot order: entree, side, accompaniment
}
