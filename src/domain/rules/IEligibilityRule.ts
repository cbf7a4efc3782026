import { CalendarDate, Cart, Coupon, User } from '../models.js';
import { compareCalendarDates } from '../calendar.js';
import { MONEY_EPSILON } from '../cart.js';

export type EligibilityRuleName =
  | 'NOT_EXPIRED'
  | 'STARTED'
  | 'MIN_CART_VALUE'
  | 'MIN_ITEMS_COUNT'
  | 'USER_SEGMENT'
  | 'APPLICABLE_CATEGORY'
  | 'EXCLUDED_CATEGORY'
  | 'ALLOWED_COUNTRY'
  | 'MIN_LIFETIME_SPEND'
  | 'MIN_ORDERS_PLACED'
  | 'FIRST_ORDER_ONLY';

export interface EligibilityContext {
  coupon: Coupon;
  user: User;
  cart: Cart;
  evaluationDate: CalendarDate;
}

export interface IEligibilityRule {
  readonly name: EligibilityRuleName;
  isSatisfied(context: EligibilityContext): boolean;
}

// a coupon expiring today is still usable today
export class NotExpiredRule implements IEligibilityRule {
  readonly name = 'NOT_EXPIRED' as const;

  isSatisfied({ coupon, evaluationDate }: EligibilityContext): boolean {
    return compareCalendarDates(evaluationDate, coupon.expiryDate) <= 0;
  }
}

export class StartedRule implements IEligibilityRule {
  readonly name = 'STARTED' as const;

  isSatisfied({ coupon, evaluationDate }: EligibilityContext): boolean {
    if (coupon.startDate === undefined) return true;
    return compareCalendarDates(coupon.startDate, evaluationDate) <= 0;
  }
}

export class MinCartValueRule implements IEligibilityRule {
  readonly name = 'MIN_CART_VALUE' as const;

  isSatisfied({ coupon, cart }: EligibilityContext): boolean {
    return cart.subtotal + MONEY_EPSILON >= coupon.minCartValue;
  }
}

export class MinItemsCountRule implements IEligibilityRule {
  readonly name = 'MIN_ITEMS_COUNT' as const;

  isSatisfied({ coupon, cart }: EligibilityContext): boolean {
    if (coupon.minItemsCount === undefined) return true;
    return cart.itemsCount >= coupon.minItemsCount;
  }
}

// empty segment list on the coupon is a wildcard, not a failure
export class UserSegmentRule implements IEligibilityRule {
  readonly name = 'USER_SEGMENT' as const;

  isSatisfied({ coupon, user }: EligibilityContext): boolean {
    if (coupon.eligibleUserSegments.length === 0) return true;
    return coupon.eligibleUserSegments.some(segment => user.segments.includes(segment));
  }
}

// at least one item from the listed categories
export class ApplicableCategoryRule implements IEligibilityRule {
  readonly name = 'APPLICABLE_CATEGORY' as const;

  isSatisfied({ coupon, cart }: EligibilityContext): boolean {
    const categories = coupon.applicableCategories ?? [];
    if (categories.length === 0) return true;
    return cart.items.some(
      item => item.category !== undefined && categories.includes(item.category)
    );
  }
}

export class ExcludedCategoryRule implements IEligibilityRule {
  readonly name = 'EXCLUDED_CATEGORY' as const;

  isSatisfied({ coupon, cart }: EligibilityContext): boolean {
    const categories = coupon.excludedCategories ?? [];
    if (categories.length === 0) return true;
    return !cart.items.some(
      item => item.category !== undefined && categories.includes(item.category)
    );
  }
}

// a user with no country never matches a country-restricted coupon
export class AllowedCountryRule implements IEligibilityRule {
  readonly name = 'ALLOWED_COUNTRY' as const;

  isSatisfied({ coupon, user }: EligibilityContext): boolean {
    const countries = coupon.allowedCountries ?? [];
    if (countries.length === 0) return true;
    return user.country !== undefined && countries.includes(user.country);
  }
}

export class MinLifetimeSpendRule implements IEligibilityRule {
  readonly name = 'MIN_LIFETIME_SPEND' as const;

  isSatisfied({ coupon, user }: EligibilityContext): boolean {
    if (coupon.minLifetimeSpend === undefined) return true;
    return (user.lifetimeSpend ?? 0) + MONEY_EPSILON >= coupon.minLifetimeSpend;
  }
}

export class MinOrdersPlacedRule implements IEligibilityRule {
  readonly name = 'MIN_ORDERS_PLACED' as const;

  isSatisfied({ coupon, user }: EligibilityContext): boolean {
    if (coupon.minOrdersPlaced === undefined) return true;
    return (user.ordersPlaced ?? 0) >= coupon.minOrdersPlaced;
  }
}

// first order = no orders placed yet
export class FirstOrderOnlyRule implements IEligibilityRule {
  readonly name = 'FIRST_ORDER_ONLY' as const;

  isSatisfied({ coupon, user }: EligibilityContext): boolean {
    if (!coupon.firstOrderOnly) return true;
    return (user.ordersPlaced ?? 0) === 0;
  }
}

export const DEFAULT_ELIGIBILITY_RULES: readonly IEligibilityRule[] = [
  new NotExpiredRule(),
  new StartedRule(),
  new MinCartValueRule(),
  new MinItemsCountRule(),
  new UserSegmentRule(),
  new ApplicableCategoryRule(),
  new ExcludedCategoryRule(),
  new AllowedCountryRule(),
  new MinLifetimeSpendRule(),
  new MinOrdersPlacedRule(),
  new FirstOrderOnlyRule(),
];
