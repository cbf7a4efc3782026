import { Coupon, NewCoupon } from '../../domain/models.js';
import { ICouponRepository } from './ICouponRepository.js';

function freezeCoupon(coupon: Coupon): Coupon {
  return Object.freeze({
    ...coupon,
    eligibleUserSegments: Object.freeze([...coupon.eligibleUserSegments]),
    applicableCategories: coupon.applicableCategories
      ? Object.freeze([...coupon.applicableCategories])
      : undefined,
    excludedCategories: coupon.excludedCategories
      ? Object.freeze([...coupon.excludedCategories])
      : undefined,
    allowedCountries: coupon.allowedCountries
      ? Object.freeze([...coupon.allowedCountries])
      : undefined,
  });
}

// process-lifetime store; coupons are frozen on insert and ids never reused
export class InMemoryCouponRepository implements ICouponRepository {
  private coupons: Map<number, Coupon> = new Map();
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(coupon: NewCoupon): Promise<Coupon> {
    const stored = freezeCoupon({
      ...coupon,
      id: this.nextId++,
      createdAt: this.now(),
    });

    this.coupons.set(stored.id, stored);
    return stored;
  }

  async findById(id: number): Promise<Coupon | null> {
    return this.coupons.get(id) ?? null;
  }

  // Map keeps insertion order, which is id order
  async findAll(): Promise<Coupon[]> {
    return [...this.coupons.values()];
  }

  // Utility methods for testing
  getCouponCount(): number {
    return this.coupons.size;
  }

  clearAllCoupons(): void {
    this.coupons.clear();
  }
}
