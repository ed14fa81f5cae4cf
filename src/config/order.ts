// Flat sales tax applied to the subtotal
export const TAX_RATE = 0.08;

export const CURRENCY_LOCALE = 'en-US';
export const CURRENCY_CODE = 'USD';
