import { CURRENCY_CODE, CURRENCY_LOCALE } from '@/config/order';

const currencyFormatter = new Intl.NumberFormat(CURRENCY_LOCALE, {
  style: 'currency',
  currency: CURRENCY_CODE,
});

// 6.48 -> "$6.48"
export const formatPrice = (amount: number): string => currencyFormatter.format(amount);
