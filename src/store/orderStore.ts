import { useStore } from 'zustand';
import { useShallow } from 'zustand/react/shallow';
import { createStore, type StoreApi } from 'zustand/vanilla';
import { TAX_RATE } from '@/config/order';
import { menuLookup } from '@/data/menu';
import { computeTaxAndTotal, roundToCents, selectedItem, selectionPrice, toSelection } from '@/lib/order/selection';
import { formatPrice } from '@/lib/utils/currency';
import type { MenuItem, MenuLookup } from '@/types/menu';
import {
  NO_SELECTION,
  SLOTS,
  type FormattedTotals,
  type OrderReceipt,
  type OrderTotals,
  type Slot,
  type SlotSelection,
} from '@/types/order';

export interface OrderStore extends OrderTotals {
  entree: SlotSelection;
  side: SlotSelection;
  accompaniment: SlotSelection;
  readonly taxRate: number;
  readonly menu: MenuLookup;

  // Actions
  setEntree: (name: string) => void;
  setSide: (name: string) => void;
  setAccompaniment: (name: string) => void;
  calculateTaxAndTotal: () => void;
  resetOrder: () => void;
}

export interface OrderStoreOptions {
  menu?: MenuLookup;
  taxRate?: number;
}

const initialOrder: Pick<OrderStore, Slot | keyof OrderTotals> = {
  entree: NO_SELECTION,
  side: NO_SELECTION,
  accompaniment: NO_SELECTION,
  subtotal: 0,
  tax: 0,
  total: 0,
};

export const createOrderStore = ({
  menu = menuLookup,
  taxRate = TAX_RATE,
}: OrderStoreOptions = {}): StoreApi<OrderStore> => {
  // Price each slot held before its latest change
  const previousPrices: Record<Slot, number> = { entree: 0, side: 0, accompaniment: 0 };

  return createStore<OrderStore>()((set, get) => {
    const selectItem = (slot: Slot, name: string) => {
      const state = get();
      previousPrices[slot] = selectionPrice(state[slot]);

      const item = state.menu.get(name);
      if (!item) {
        // Unknown names deselect the slot
        console.warn(`[Order] Unknown menu item for ${slot}:`, name);
      }

      const selections: Pick<OrderStore, Slot> = {
        entree: state.entree,
        side: state.side,
        accompaniment: state.accompaniment,
      };
      selections[slot] = toSelection(item);

      const subtotal = roundToCents(state.subtotal - previousPrices[slot] + (item?.price ?? 0));

      // Single set so subscribers never see a subtotal with stale tax/total
      set({ ...selections, subtotal, ...computeTaxAndTotal(subtotal, state.taxRate) });
    };

    return {
      ...initialOrder,
      taxRate,
      menu,

      setEntree: (name) => selectItem('entree', name),
      setSide: (name) => selectItem('side', name),
      setAccompaniment: (name) => selectItem('accompaniment', name),

      calculateTaxAndTotal: () => {
        const { subtotal, taxRate: rate } = get();
        set(computeTaxAndTotal(subtotal, rate));
      },

      resetOrder: () => {
        previousPrices.entree = 0;
        previousPrices.side = 0;
        previousPrices.accompaniment = 0;
        set({ ...initialOrder });
      },
    };
  });
};

// Selectors
export const selectTotals = ({ subtotal, tax, total }: OrderStore): OrderTotals => ({
  subtotal,
  tax,
  total,
});

export const selectFormattedTotals = (state: OrderStore): FormattedTotals => ({
  subtotal: formatPrice(state.subtotal),
  tax: formatPrice(state.tax),
  total: formatPrice(state.total),
});

export const selectSelectedItems = (state: OrderStore): MenuItem[] =>
  SLOTS.map((slot) => selectedItem(state[slot])).filter((item): item is MenuItem => item !== null);

export const selectHasSelection = (state: OrderStore): boolean =>
  SLOTS.some((slot) => state[slot].kind === 'selected');

export const selectOrderReceipt = (state: OrderStore): OrderReceipt => ({
  items: selectSelectedItems(state),
  ...selectTotals(state),
});

export const orderStore = createOrderStore();

export function useOrderStore<T>(selector: (state: OrderStore) => T): T {
  return useStore(orderStore, selector);
}

// Formatted amounts for the checkout screen; shallow-compared so the
// fresh object from the selector doesn't re-render on every store change
export function useFormattedTotals(store: StoreApi<OrderStore> = orderStore): FormattedTotals {
  return useStore(store, useShallow(selectFormattedTotals));
}
