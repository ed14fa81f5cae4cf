// @vitest-environment jsdom
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { act, renderHook } from '@testing-library/react';
import type { StoreApi } from 'zustand/vanilla';
import { useOrderActions } from '../useOrderActions';
import {
  createOrderStore,
  orderStore,
  useFormattedTotals,
  useOrderStore,
  type OrderStore,
} from '@/store/orderStore';
import type { MenuItem, MenuLookup } from '@/types/menu';
import type { OrderReceipt } from '@/types/order';

const burrito: MenuItem = { name: 'Burrito', category: 'entree', price: 4.0, description: 'Bean and rice burrito' };
const fries: MenuItem = { name: 'Fries', category: 'side', price: 2.0, description: 'Shoestring fries' };

const testMenu: MenuLookup = new Map([
  ['Burrito', burrito],
  ['Fries', fries],
]);

describe('useOrderActions', () => {
  let store: StoreApi<OrderStore>;

  beforeEach(() => {
    store = createOrderStore({ menu: testMenu });
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const renderActions = (options: Parameters<typeof useOrderActions>[0] = {}) =>
    renderHook(() => useOrderActions({ store, ...options }));

  describe('handleSelectItem', () => {
    it('selects a menu item for its own course', () => {
      const { result } = renderActions();

      let outcome = { success: false, message: '' };
      act(() => {
        outcome = result.current.handleSelectItem('entree', 'Burrito');
      });

      expect(outcome).toEqual({ success: true, message: 'Burrito selected as the entree.' });
      expect(store.getState().entree).toEqual({ kind: 'selected', item: burrito });
      expect(store.getState().subtotal).toBe(4);
    });

    it('checks names against the menu the store was created with', () => {
      const { result } = renderHook(() => useOrderActions({ store }));

      let outcome = { success: false, message: '' };
      act(() => {
        outcome = result.current.handleSelectItem('entree', 'Burrito');
      });

      expect(outcome).toEqual({ success: true, message: 'Burrito selected as the entree.' });
      expect(result.current.getMenuItem('Burrito')).toBe(burrito);
      expect(result.current.getMenuItem('pasta')).toBeUndefined();
      expect(store.getState().subtotal).toBe(4);
    });

    it('rejects an item from another course without changing the order', () => {
      const { result } = renderActions();

      let outcome = { success: true, message: '' };
      act(() => {
        result.current.handleSelectItem('entree', 'Burrito');
        outcome = result.current.handleSelectItem('entree', 'Fries');
      });

      expect(outcome).toEqual({ success: false, message: "Fries can't be chosen as the entree." });
      expect(store.getState().entree).toEqual({ kind: 'selected', item: burrito });
      expect(store.getState().subtotal).toBe(4);
    });

    it('clears the slot when the name is not on the menu', () => {
      const { result } = renderActions();

      let outcome = { success: true, message: '' };
      act(() => {
        result.current.handleSelectItem('entree', 'Burrito');
        outcome = result.current.handleSelectItem('entree', 'Pizza');
      });

      expect(outcome).toEqual({ success: false, message: '"Pizza" is not on the menu.' });
      expect(store.getState().entree).toEqual({ kind: 'none' });
      expect(store.getState().subtotal).toBe(0);
    });
  });

  describe('handleSubmitOrder', () => {
    it('refuses to submit an empty order', () => {
      const onOrderSubmitted = vi.fn();
      const { result } = renderActions({ onOrderSubmitted });

      let outcome = { success: true, message: '' };
      act(() => {
        outcome = result.current.handleSubmitOrder();
      });

      expect(outcome).toEqual({
        success: false,
        message: 'Nothing selected yet. Pick an entree to get started.',
      });
      expect(onOrderSubmitted).not.toHaveBeenCalled();
    });

    it('hands over the receipt and resets the order', () => {
      const onOrderSubmitted = vi.fn<(receipt: OrderReceipt) => void>();
      const { result } = renderActions({ onOrderSubmitted });

      let outcome = { success: false, message: '' };
      act(() => {
        result.current.handleSelectItem('entree', 'Burrito');
        result.current.handleSelectItem('side', 'Fries');
      });
      act(() => {
        outcome = result.current.handleSubmitOrder();
      });

      expect(outcome).toEqual({ success: true, message: 'Order submitted! Total: $6.48' });
      expect(onOrderSubmitted).toHaveBeenCalledTimes(1);

      const receipt = onOrderSubmitted.mock.calls[0][0];
      expect(receipt.items).toEqual([burrito, fries]);
      expect(receipt.subtotal).toBe(6);
      expect(receipt.total).toBeCloseTo(6.48, 10);

      expect(store.getState().entree).toEqual({ kind: 'none' });
      expect(store.getState().subtotal).toBe(0);
      expect(console.log).toHaveBeenCalledWith('[Order] Submitted: Burrito, Fries ($6.48)');
    });
  });

  describe('handleCancelOrder', () => {
    it('resets the order and notifies the caller', () => {
      const onOrderCancelled = vi.fn();
      const { result } = renderActions({ onOrderCancelled });

      let outcome = { success: false, message: '' };
      act(() => {
        result.current.handleSelectItem('side', 'Fries');
      });
      act(() => {
        outcome = result.current.handleCancelOrder();
      });

      expect(outcome).toEqual({ success: true, message: 'Order cancelled.' });
      expect(onOrderCancelled).toHaveBeenCalledTimes(1);
      expect(store.getState().side).toEqual({ kind: 'none' });
      expect(store.getState().total).toBe(0);
    });
  });

  it('looks up menu items by key', () => {
    const { result } = renderActions();

    expect(result.current.getMenuItem('Fries')).toBe(fries);
    expect(result.current.getMenuItem('Pizza')).toBeUndefined();
  });
});

describe('useFormattedTotals', () => {
  it('re-renders with formatted amounts as the order changes', () => {
    const store = createOrderStore({ menu: testMenu });
    const { result } = renderHook(() => useFormattedTotals(store));

    expect(result.current).toEqual({ subtotal: '$0.00', tax: '$0.00', total: '$0.00' });

    act(() => {
      store.getState().setEntree('Burrito');
    });

    expect(result.current).toEqual({ subtotal: '$4.00', tax: '$0.32', total: '$4.32' });
  });
});

describe('useOrderStore', () => {
  afterEach(() => {
    act(() => {
      orderStore.getState().resetOrder();
    });
  });

  it('reads the app-wide order store', () => {
    const { result } = renderHook(() => useOrderStore((state) => state.subtotal));

    expect(result.current).toBe(0);

    act(() => {
      orderStore.getState().setEntree('chili');
      orderStore.getState().setSide('rice');
    });

    expect(result.current).toBe(5.5);
  });
});
