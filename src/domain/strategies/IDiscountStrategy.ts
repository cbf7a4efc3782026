import { Coupon, DiscountType } from '../models.js';

export interface IDiscountStrategy {
  readonly type: DiscountType;
  // capped but not yet clamped to the subtotal
  calculateDiscount(coupon: Coupon, subtotal: number): number;
}

export interface DiscountPolicy {
  // whether maxDiscountCap also limits FLAT coupons
  capFlatDiscounts: boolean;
}

export const DEFAULT_DISCOUNT_POLICY: DiscountPolicy = {
  capFlatDiscounts: false,
};

function applyCap(amount: number, cap: number | undefined): number {
  return cap === undefined ? amount : Math.min(amount, cap);
}

export class PercentageDiscountStrategy implements IDiscountStrategy {
  readonly type = 'PERCENTAGE' as const;

  calculateDiscount(coupon: Coupon, subtotal: number): number {
    const raw = (subtotal * coupon.discountValue) / 100;
    return applyCap(raw, coupon.maxDiscountCap);
  }
}

export class FlatDiscountStrategy implements IDiscountStrategy {
  readonly type = 'FLAT' as const;

  constructor(private readonly capFlatDiscounts: boolean = false) {}

  calculateDiscount(coupon: Coupon, _subtotal: number): number {
    return this.capFlatDiscounts
      ? applyCap(coupon.discountValue, coupon.maxDiscountCap)
      : coupon.discountValue;
  }
}

// one strategy per discount type; the Record forces every type to be covered
export function createDiscountStrategies(
  policy: DiscountPolicy = DEFAULT_DISCOUNT_POLICY
): Record<DiscountType, IDiscountStrategy> {
  return {
    PERCENTAGE: new PercentageDiscountStrategy(),
    FLAT: new FlatDiscountStrategy(policy.capFlatDiscounts),
  };
}
