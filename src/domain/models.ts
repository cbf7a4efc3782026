// ISO calendar date, 'YYYY-MM-DD'
export type CalendarDate = string;

export type DiscountType = 'PERCENTAGE' | 'FLAT';

export const DISCOUNT_TYPES: readonly DiscountType[] = ['PERCENTAGE', 'FLAT'];

export interface Coupon {
  readonly id: number;
  readonly code: string;
  readonly description?: string;
  readonly discountType: DiscountType;
  readonly discountValue: number; // 0-100 for PERCENTAGE
  readonly minCartValue: number;
  readonly maxDiscountCap?: number;
  readonly startDate?: CalendarDate;
  readonly expiryDate: CalendarDate; // inclusive
  readonly eligibleUserSegments: readonly string[]; // empty = everyone
  readonly minItemsCount?: number;
  readonly applicableCategories?: readonly string[];
  readonly excludedCategories?: readonly string[];
  readonly allowedCountries?: readonly string[]; // ISO codes, upper case
  readonly minLifetimeSpend?: number;
  readonly minOrdersPlaced?: number;
  readonly firstOrderOnly?: boolean;
  readonly createdAt: Date;
}

// what the repository receives; id and createdAt are assigned on insert
export type NewCoupon = Omit<Coupon, 'id' | 'createdAt'>;

export interface CartItem {
  productId?: string;
  category?: string;
  price: number;
  quantity: number;
}

export interface Cart {
  items: CartItem[];
  subtotal: number;
  itemsCount: number;
}

export interface User {
  id: string;
  segments: string[];
  country?: string;
  lifetimeSpend?: number; // missing means 0
  ordersPlaced?: number; // missing means 0, i.e. a first order
}

export type EvaluationResult =
  | { selectedCoupon: Coupon; computedDiscount: number }
  | { selectedCoupon: null };

export interface CreateCouponRequest {
  code: string;
  description?: string;
  discountType: DiscountType;
  discountValue: number;
  minCartValue?: number;
  maxDiscountCap?: number;
  startDate?: CalendarDate;
  expiryDate: CalendarDate;
  eligibleUserSegments?: string[];
  minItemsCount?: number;
  applicableCategories?: string[];
  excludedCategories?: string[];
  allowedCountries?: string[];
  minLifetimeSpend?: number;
  minOrdersPlaced?: number;
  firstOrderOnly?: boolean;
}

export interface BestCouponRequest {
  user: User;
  cart: { items: CartItem[] };
  evaluationDate?: CalendarDate;
}

export interface BestCouponResponse {
  applicable: boolean;
  selectedCoupon: Coupon | null;
  computedDiscount?: number;
  subtotal: number;
  payableAmount: number;
  evaluationDate: CalendarDate;
}
