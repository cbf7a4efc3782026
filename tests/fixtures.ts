import { Coupon, User } from '../src/domain/models.js';

export const makeCoupon = (overrides: Partial<Coupon> & { id: number }): Coupon => ({
  code: `COUPON-${overrides.id}`,
  discountType: 'PERCENTAGE',
  discountValue: 10,
  minCartValue: 0,
  expiryDate: '2030-01-01',
  eligibleUserSegments: [],
  createdAt: new Date('2024-01-01T00:00:00.000Z'),
  ...overrides,
});

export const makeUser = (segments: string[] = []): User => ({
  id: 'user-1',
  segments,
});

export const TODAY = new Date('2026-06-15T12:00:00.000Z');
