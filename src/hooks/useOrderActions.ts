import { useCallback } from 'react';
import { useStore } from 'zustand';
import type { StoreApi } from 'zustand/vanilla';
import { formatPrice } from '@/lib/utils/currency';
import {
  orderStore,
  selectHasSelection,
  selectOrderReceipt,
  type OrderStore,
} from '@/store/orderStore';
import { CATEGORY_LABELS, type MenuItem } from '@/types/menu';
import type { OrderReceipt, Slot } from '@/types/order';

export interface OrderActionResult {
  success: boolean;
  message: string;
}

export interface OrderActions {
  handleSelectItem: (slot: Slot, name: string) => OrderActionResult;
  handleSubmitOrder: () => OrderActionResult;
  handleCancelOrder: () => OrderActionResult;
  getMenuItem: (name: string) => MenuItem | undefined;
}

interface UseOrderActionsOptions {
  store?: StoreApi<OrderStore>;
  onOrderSubmitted?: (receipt: OrderReceipt) => void;
  onOrderCancelled?: () => void;
}

export function useOrderActions({
  store = orderStore,
  onOrderSubmitted,
  onOrderCancelled,
}: UseOrderActionsOptions = {}): OrderActions {
  const setEntree = useStore(store, (state) => state.setEntree);
  const setSide = useStore(store, (state) => state.setSide);
  const setAccompaniment = useStore(store, (state) => state.setAccompaniment);
  const resetOrder = useStore(store, (state) => state.resetOrder);
  // Same menu the store prices against
  const menu = useStore(store, (state) => state.menu);

  const getMenuItem = useCallback((name: string): MenuItem | undefined => {
    return menu.get(name);
  }, [menu]);

  // Entree/side/accompaniment screens
  const handleSelectItem = useCallback((slot: Slot, name: string): OrderActionResult => {
    const label = CATEGORY_LABELS[slot].toLowerCase();
    const menuItem = getMenuItem(name);

    if (menuItem && menuItem.category !== slot) {
      return { success: false, message: `${menuItem.name} can't be chosen as the ${label}.` };
    }

    // Unknown names still go to the store, which clears the slot
    switch (slot) {
      case 'entree':
        setEntree(name);
        break;
      case 'side':
        setSide(name);
        break;
      case 'accompaniment':
        setAccompaniment(name);
        break;
    }

    if (!menuItem) {
      return { success: false, message: `"${name}" is not on the menu.` };
    }
    return { success: true, message: `${menuItem.name} selected as the ${label}.` };
  }, [getMenuItem, setEntree, setSide, setAccompaniment]);

  // Checkout: submit
  const handleSubmitOrder = useCallback((): OrderActionResult => {
    const state = store.getState();
    if (!selectHasSelection(state)) {
      return { success: false, message: 'Nothing selected yet. Pick an entree to get started.' };
    }

    const receipt = selectOrderReceipt(state);
    const itemNames = receipt.items.map((item) => item.name).join(', ');
    console.log(`[Order] Submitted: ${itemNames} (${formatPrice(receipt.total)})`);

    resetOrder();
    if (onOrderSubmitted) {
      onOrderSubmitted(receipt);
    }

    return { success: true, message: `Order submitted! Total: ${formatPrice(receipt.total)}` };
  }, [store, resetOrder, onOrderSubmitted]);

  // Checkout or any menu screen: cancel
  const handleCancelOrder = useCallback((): OrderActionResult => {
    resetOrder();
    console.log('[Order] Cancelled');

    if (onOrderCancelled) {
      onOrderCancelled();
    }

    return { success: true, message: 'Order cancelled.' };
  }, [resetOrder, onOrderCancelled]);

  return {
    handleSelectItem,
    handleSubmitOrder,
    handleCancelOrder,
    getMenuItem,
  };
}
