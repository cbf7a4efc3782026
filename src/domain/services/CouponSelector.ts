import { Cart, Coupon, DiscountType, EvaluationResult, User } from '../models.js';
import { compareCalendarDates } from '../calendar.js';
import { MONEY_EPSILON, floorMoney } from '../cart.js';
import {
  DEFAULT_DISCOUNT_POLICY,
  DiscountPolicy,
  IDiscountStrategy,
  createDiscountStrategies,
} from '../strategies/IDiscountStrategy.js';
import { EligibilityEvaluator } from './EligibilityEvaluator.js';

export interface RankedCoupon {
  coupon: Coupon;
  effectiveDiscount: number;
}

// highest discount, then later expiry, then smaller (older) id
export function compareRankedCoupons(a: RankedCoupon, b: RankedCoupon): number {
  const byDiscount = b.effectiveDiscount - a.effectiveDiscount;
  if (Math.abs(byDiscount) > MONEY_EPSILON) return byDiscount;
  const byExpiry = compareCalendarDates(b.coupon.expiryDate, a.coupon.expiryDate);
  if (byExpiry !== 0) return byExpiry;
  return a.coupon.id - b.coupon.id;
}

export class CouponSelector {
  private readonly strategies: Record<DiscountType, IDiscountStrategy>;

  constructor(
    private readonly evaluator: EligibilityEvaluator = new EligibilityEvaluator(),
    policy: DiscountPolicy = DEFAULT_DISCOUNT_POLICY
  ) {
    this.strategies = createDiscountStrategies(policy);
  }

  // capped by the strategy, then clamped so the payable amount never goes negative;
  // left unrounded, selectBest floors it to cents when reporting
  computeDiscount(coupon: Coupon, cart: Cart): number {
    const capped = this.strategies[coupon.discountType].calculateDiscount(coupon, cart.subtotal);
    return Math.min(capped, cart.subtotal);
  }

  // every eligible coupon, best first; the input array is left untouched
  rank(user: User, cart: Cart, coupons: readonly Coupon[], evaluationDate: Date): RankedCoupon[] {
    return coupons
      .filter(coupon => this.evaluator.isEligible(coupon, user, cart, evaluationDate))
      .map(coupon => ({ coupon, effectiveDiscount: this.computeDiscount(coupon, cart) }))
      .sort(compareRankedCoupons);
  }

  selectBest(
    user: User,
    cart: Cart,
    coupons: readonly Coupon[],
    evaluationDate: Date
  ): EvaluationResult {
    const [best] = this.rank(user, cart, coupons, evaluationDate);
    if (!best) return { selectedCoupon: null };

    return { selectedCoupon: best.coupon, computedDiscount: floorMoney(best.effectiveDiscount) };
  }
}
