import type { MenuItem } from '@/types/menu';
import { NO_SELECTION, type OrderTotals, type SlotSelection } from '@/types/order';

export const toSelection = (item: MenuItem | undefined): SlotSelection =>
  item ? { kind: 'selected', item } : NO_SELECTION;

export const selectionPrice = (selection: SlotSelection): number => {
  switch (selection.kind) {
    case 'selected':
      return selection.item.price;
    case 'none':
      return 0;
  }
};

export const selectedItem = (selection: SlotSelection): MenuItem | null =>
  selection.kind === 'selected' ? selection.item : null;

// Snaps accumulated float error to whole cents; never below zero (or -0)
export const roundToCents = (amount: number): number =>
  Math.max(0, Math.round(amount * 100) / 100);

/**
 * Tax and total for a subtotal. Amounts stay unrounded; rounding to cents is
 * left to `formatPrice`.
 */
export const computeTaxAndTotal = (
  subtotal: number,
  taxRate: number
): Pick<OrderTotals, 'tax' | 'total'> => {
  const tax = subtotal * taxRate;
  return { tax, total: subtotal + tax };
};
