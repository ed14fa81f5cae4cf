export * from './types';
export { TAX_RATE, CURRENCY_CODE, CURRENCY_LOCALE } from './config/order';
export { menuItems, menuLookup, getMenuItemsByCategory } from './data/menu';
export { computeTaxAndTotal, roundToCents, selectedItem, selectionPrice, toSelection } from './lib/order/selection';
export { formatPrice } from './lib/utils/currency';
export {
  createOrderStore,
  orderStore,
  useOrderStore,
  useFormattedTotals,
  selectTotals,
  selectFormattedTotals,
  selectSelectedItems,
  selectHasSelection,
  selectOrderReceipt,
  type OrderStore,
  type OrderStoreOptions,
} from './store/orderStore';
export { useOrderActions, type OrderActions, type OrderActionResult } from './hooks/useOrderActions';
