import {
  BestCouponRequest,
  BestCouponResponse,
  CartItem,
  Coupon,
  CreateCouponRequest,
  DISCOUNT_TYPES,
  NewCoupon,
  User,
} from '../models.js';
import { buildCart, roundMoney } from '../cart.js';
import {
  compareCalendarDates,
  fromCalendarDate,
  isCalendarDate,
  toCalendarDate,
} from '../calendar.js';
import { ICouponRepository } from '../../infrastructure/repositories/ICouponRepository.js';
import { CouponSelector } from './CouponSelector.js';
import {
  InvalidCartOrUserError,
  InvalidCouponDefinitionError,
  ResourceNotFoundError,
  ValidationError,
} from '../errors/index.js';

function isNonNegativeNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

// trims, drops blanks and duplicates, keeps first-seen order
function normalizeTags(tags: string[] | undefined): string[] {
  const seen = new Set<string>();
  for (const tag of tags ?? []) {
    const trimmed = tag.trim();
    if (trimmed) seen.add(trimmed);
  }
  return [...seen];
}

function normalizeCountry(country: string): string {
  return country.trim().toUpperCase();
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

// validates coupon definitions and best-coupon payloads before they reach the selector
export class CouponService {
  private readonly clock: () => Date;
  private readonly maxCartItems: number;

  constructor(
    private readonly repository: ICouponRepository,
    private readonly selector: CouponSelector,
    config?: {
      clock?: () => Date;
      maxCartItems?: number;
    }
  ) {
    this.clock = config?.clock ?? (() => new Date());
    this.maxCartItems = config?.maxCartItems ?? 500;
  }

  async createCoupon(request: CreateCouponRequest): Promise<Coupon> {
    const coupon = this.toNewCoupon(request);
    return this.repository.create(coupon);
  }

  async listCoupons(): Promise<Coupon[]> {
    const coupons = await this.repository.findAll();
    return [...coupons].sort((a, b) => a.id - b.id);
  }

  async getCoupon(id: number): Promise<Coupon> {
    if (!Number.isInteger(id) || id < 1) {
      throw new ValidationError('Coupon ID must be a positive integer.');
    }
    const coupon = await this.repository.findById(id);
    if (!coupon) throw new ResourceNotFoundError('Coupon', String(id));
    return coupon;
  }

  async findBestCoupon(request: BestCouponRequest): Promise<BestCouponResponse> {
    const user = this.validateUser(request.user);
    const items = this.validateCartItems(request.cart?.items);
    const evaluationDate = this.resolveEvaluationDate(request.evaluationDate);

    const cart = buildCart(items);
    const coupons = await this.repository.findAll();
    const result = this.selector.selectBest(user, cart, coupons, evaluationDate);
    const evaluationDay = toCalendarDate(evaluationDate);

    if (result.selectedCoupon === null) {
      return {
        applicable: false,
        selectedCoupon: null,
        subtotal: roundMoney(cart.subtotal),
        payableAmount: roundMoney(cart.subtotal),
        evaluationDate: evaluationDay,
      };
    }

    return {
      applicable: true,
      selectedCoupon: result.selectedCoupon,
      computedDiscount: result.computedDiscount,
      subtotal: roundMoney(cart.subtotal),
      payableAmount: roundMoney(cart.subtotal - result.computedDiscount),
      evaluationDate: evaluationDay,
    };
  }

  private toNewCoupon(request: CreateCouponRequest): NewCoupon {
    const code = typeof request.code === 'string' ? request.code.trim() : '';
    if (!code) {
      throw new InvalidCouponDefinitionError('Coupon code is required.');
    }
    if (!DISCOUNT_TYPES.includes(request.discountType)) {
      throw new InvalidCouponDefinitionError(
        `Invalid discount type: ${String(request.discountType)}`
      );
    }
    if (!isNonNegativeNumber(request.discountValue)) {
      throw new InvalidCouponDefinitionError('Discount value must be a non-negative number.');
    }
    if (request.discountType === 'PERCENTAGE' && request.discountValue > 100) {
      throw new InvalidCouponDefinitionError('Percentage discount cannot exceed 100.');
    }

    const minCartValue = request.minCartValue ?? 0;
    if (!isNonNegativeNumber(minCartValue)) {
      throw new InvalidCouponDefinitionError('Minimum cart value must be a non-negative number.');
    }
    if (request.maxDiscountCap !== undefined && !isNonNegativeNumber(request.maxDiscountCap)) {
      throw new InvalidCouponDefinitionError('Maximum discount cap must be a non-negative number.');
    }
    if (request.minItemsCount !== undefined && !isNonNegativeInteger(request.minItemsCount)) {
      throw new InvalidCouponDefinitionError('Minimum items count must be a non-negative integer.');
    }
    if (request.minLifetimeSpend !== undefined && !isNonNegativeNumber(request.minLifetimeSpend)) {
      throw new InvalidCouponDefinitionError('Minimum lifetime spend must be a non-negative number.');
    }
    if (request.minOrdersPlaced !== undefined && !isNonNegativeInteger(request.minOrdersPlaced)) {
      throw new InvalidCouponDefinitionError('Minimum orders placed must be a non-negative integer.');
    }
    if (request.firstOrderOnly !== undefined && typeof request.firstOrderOnly !== 'boolean') {
      throw new InvalidCouponDefinitionError('First-order-only flag must be a boolean.');
    }

    if (!isCalendarDate(request.expiryDate)) {
      throw new InvalidCouponDefinitionError('Expiry date must be a valid YYYY-MM-DD date.');
    }
    if (request.startDate !== undefined) {
      if (!isCalendarDate(request.startDate)) {
        throw new InvalidCouponDefinitionError('Start date must be a valid YYYY-MM-DD date.');
      }
      if (compareCalendarDates(request.startDate, request.expiryDate) > 0) {
        throw new InvalidCouponDefinitionError('Start date cannot be after expiry date.');
      }
    }

    const applicableCategories = normalizeTags(request.applicableCategories);
    const excludedCategories = normalizeTags(request.excludedCategories);
    const allowedCountries = normalizeTags(request.allowedCountries?.map(normalizeCountry));

    return {
      code,
      description: request.description,
      discountType: request.discountType,
      discountValue: request.discountValue,
      minCartValue,
      maxDiscountCap: request.maxDiscountCap,
      startDate: request.startDate,
      expiryDate: request.expiryDate,
      eligibleUserSegments: normalizeTags(request.eligibleUserSegments),
      minItemsCount: request.minItemsCount,
      applicableCategories: applicableCategories.length > 0 ? applicableCategories : undefined,
      excludedCategories: excludedCategories.length > 0 ? excludedCategories : undefined,
      allowedCountries: allowedCountries.length > 0 ? allowedCountries : undefined,
      minLifetimeSpend: request.minLifetimeSpend,
      minOrdersPlaced: request.minOrdersPlaced,
      firstOrderOnly: request.firstOrderOnly,
    };
  }

  private validateUser(user: User | undefined): User {
    if (!user || typeof user.id !== 'string' || !user.id.trim()) {
      throw new InvalidCartOrUserError('User ID is required.');
    }
    if (!Array.isArray(user.segments) || user.segments.some(s => typeof s !== 'string')) {
      throw new InvalidCartOrUserError('User segments must be a list of strings.');
    }
    if (user.country !== undefined && (typeof user.country !== 'string' || !user.country.trim())) {
      throw new InvalidCartOrUserError('User country must be a non-empty string.');
    }
    if (user.lifetimeSpend !== undefined && !isNonNegativeNumber(user.lifetimeSpend)) {
      throw new InvalidCartOrUserError('User lifetime spend must be a non-negative number.');
    }
    if (user.ordersPlaced !== undefined && !isNonNegativeInteger(user.ordersPlaced)) {
      throw new InvalidCartOrUserError('User orders placed must be a non-negative integer.');
    }

    return {
      id: user.id,
      segments: normalizeTags(user.segments),
      country: user.country === undefined ? undefined : normalizeCountry(user.country),
      lifetimeSpend: user.lifetimeSpend,
      ordersPlaced: user.ordersPlaced,
    };
  }

  private validateCartItems(items: CartItem[] | undefined): CartItem[] {
    if (!Array.isArray(items)) {
      throw new InvalidCartOrUserError('Cart items are required.');
    }
    if (items.length > this.maxCartItems) {
      throw new InvalidCartOrUserError(`Cart cannot contain more than ${this.maxCartItems} items.`);
    }
    items.forEach((item: CartItem | null, idx) => {
      if (!item || typeof item !== 'object') {
        throw new InvalidCartOrUserError(`Item ${idx}: must be an object.`);
      }
      if (!isNonNegativeNumber(item.price)) {
        throw new InvalidCartOrUserError(`Item ${idx}: price must be a non-negative number.`);
      }
      if (!Number.isInteger(item.quantity) || item.quantity < 1) {
        throw new InvalidCartOrUserError(`Item ${idx}: quantity must be a positive integer.`);
      }
    });
    return items;
  }

  private resolveEvaluationDate(evaluationDate: string | undefined): Date {
    if (evaluationDate === undefined) return this.clock();
    if (!isCalendarDate(evaluationDate)) {
      throw new InvalidCartOrUserError('Evaluation date must be a valid YYYY-MM-DD date.');
    }
    return fromCalendarDate(evaluationDate);
  }
}
