import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FastifyInstance } from 'fastify';
import { buildApp } from '../src/index.js';
import { TODAY } from './fixtures.js';

describe('HTTP API', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    app = await buildApp({ logger: false, clock: () => TODAY });
  });

  afterEach(async () => {
    await app.close();
  });

  const createCoupon = (payload: Record<string, unknown>) =>
    app.inject({ method: 'POST', url: '/v1/coupons', payload });

  it('answers the health check', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json().status).toBe('ok');
  });

  it('creates and lists coupons', async () => {
    const created = await createCoupon({
      code: 'WELCOME10',
      discountType: 'PERCENTAGE',
      discountValue: 10,
      expiryDate: '2030-01-01',
    });

    expect(created.statusCode).toBe(201);
    expect(created.json().data.id).toBe(1);

    const list = await app.inject({ method: 'GET', url: '/v1/coupons' });
    expect(list.json().data.map((c: { code: string }) => c.code)).toEqual(['WELCOME10']);
  });

  it('fetches a coupon by id and 404s on unknown ids', async () => {
    await createCoupon({ code: 'A', discountType: 'FLAT', discountValue: 5, expiryDate: '2030-01-01' });

    const found = await app.inject({ method: 'GET', url: '/v1/coupons/1' });
    const missing = await app.inject({ method: 'GET', url: '/v1/coupons/9' });

    expect(found.json().data.code).toBe('A');
    expect(missing.statusCode).toBe(404);
    expect(missing.json().error.code).toBe('RESOURCE_NOT_FOUND');
  });

  it('rejects a percentage over 100 as an invalid definition', async () => {
    const res = await createCoupon({
      code: 'TOO-MUCH',
      discountType: 'PERCENTAGE',
      discountValue: 150,
      expiryDate: '2030-01-01',
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toEqual({
      code: 'INVALID_COUPON_DEFINITION',
      message: 'Percentage discount cannot exceed 100.',
      statusCode: 400,
    });
  });

  it('rejects a payload missing required fields', async () => {
    const res = await createCoupon({ code: 'X' });

    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('VALIDATION_ERROR');
  });

  it('selects the best coupon for a user and cart', async () => {
    await createCoupon({ code: 'A', discountType: 'PERCENTAGE', discountValue: 10, expiryDate: '2030-01-01' });
    await createCoupon({ code: 'D', discountType: 'FLAT', discountValue: 20, expiryDate: '2031-01-01' });
    await createCoupon({
      code: 'E',
      discountType: 'PERCENTAGE',
      discountValue: 90,
      expiryDate: '2030-01-01',
      eligibleUserSegments: ['premium'],
    });

    const res = await app.inject({
      method: 'POST',
      url: '/v1/coupons/best',
      payload: {
        user: { id: 'user-1', segments: ['new_user'] },
        cart: { items: [{ productId: 'p1', price: 50, quantity: 4 }] },
      },
    });

    expect(res.statusCode).toBe(200);
    const { data } = res.json();
    expect(data.applicable).toBe(true);
    expect(data.selectedCoupon.code).toBe('D');
    expect(data.computedDiscount).toBe(20);
    expect(data.payableAmount).toBe(180);
    expect(data.evaluationDate).toBe('2026-06-15');
  });

  it('applies profile rules from the user payload', async () => {
    await createCoupon({
      code: 'LOYAL',
      discountType: 'FLAT',
      discountValue: 40,
      expiryDate: '2030-01-01',
      allowedCountries: ['IN'],
      minOrdersPlaced: 5,
    });

    const best = (user: Record<string, unknown>) =>
      app.inject({
        method: 'POST',
        url: '/v1/coupons/best',
        payload: { user, cart: { items: [{ price: 100, quantity: 1 }] } },
      });

    const loyal = await best({ id: 'user-1', country: 'IN', ordersPlaced: 5 });
    const newcomer = await best({ id: 'user-2', country: 'IN', ordersPlaced: 0 });

    expect(loyal.json().data.computedDiscount).toBe(40);
    expect(newcomer.json().data.applicable).toBe(false);
  });

  it('reports when no coupon applies', async () => {
    await createCoupon({
      code: 'B',
      discountType: 'FLAT',
      discountValue: 50,
      minCartValue: 100,
      expiryDate: '2030-01-01',
    });

    const res = await app.inject({
      method: 'POST',
      url: '/v1/coupons/best',
      payload: { user: { id: 'user-1' }, cart: { items: [{ price: 80, quantity: 1 }] } },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json().data).toEqual({
      applicable: false,
      selectedCoupon: null,
      subtotal: 80,
      payableAmount: 80,
      evaluationDate: '2026-06-15',
    });
  });

  it('rejects a cart item with a negative price', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/v1/coupons/best',
      payload: { user: { id: 'user-1' }, cart: { items: [{ price: -10, quantity: 1 }] } },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('VALIDATION_ERROR');
  });
});
