import { Coupon, NewCoupon } from '../../domain/models.js';

export interface ICouponRepository {
  create(coupon: NewCoupon): Promise<Coupon>;
  findById(id: number): Promise<Coupon | null>;
  findAll(): Promise<Coupon[]>;
}
