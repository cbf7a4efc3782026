import { Cart, CartItem } from './models.js';

// amounts closer than this are the same amount; absorbs float noise like 0.7 + 0.1
export const MONEY_EPSILON = 1e-9;

// rounding to 2 decimals for display only; eligibility and ranking use exact amounts
export function roundMoney(amount: number): number {
  return Math.round(amount * 100) / 100;
}

// never rounds up, so a reported discount stays within its cap and the subtotal
export function floorMoney(amount: number): number {
  return Math.floor(amount * 100 + 1e-6) / 100;
}

export function buildCart(items: CartItem[]): Cart {
  const subtotal = items.reduce((sum, item) => sum + item.price * item.quantity, 0);
  const itemsCount = items.reduce((sum, item) => sum + item.quantity, 0);

  return {
    items: items.map(item => ({ ...item })),
    subtotal,
    itemsCount,
  };
}
