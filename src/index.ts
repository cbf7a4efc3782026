import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { v4 as uuidv4 } from 'uuid';
import { CouponService } from './domain/services/CouponService.js';
import { CouponSelector } from './domain/services/CouponSelector.js';
import { EligibilityEvaluator } from './domain/services/EligibilityEvaluator.js';
import { InMemoryCouponRepository } from './infrastructure/repositories/InMemoryCouponRepository.js';
import { DiscountPolicy } from './domain/strategies/IDiscountStrategy.js';
import { DomainError } from './domain/errors/index.js';
import { BestCouponRequest, CreateCouponRequest } from './domain/models.js';

const PORT = parseInt(process.env.PORT || '3000', 10);
const HOST = process.env.HOST || '0.0.0.0';
const NODE_ENV = process.env.NODE_ENV || 'development';
const MAX_CART_ITEMS = parseInt(process.env.MAX_CART_ITEMS || '500', 10);
const CAP_FLAT_DISCOUNTS = process.env.CAP_FLAT_DISCOUNTS === 'true';
const API_TITLE = process.env.API_TITLE || 'Coupon Selection API';
const API_VERSION = process.env.API_VERSION || '1.0.0';
const API_DESCRIPTION = process.env.API_DESCRIPTION || 'Stores discount coupons and picks the best one for a user and cart';

export interface BuildAppOptions {
  logger?: boolean;
  clock?: () => Date;
  discountPolicy?: DiscountPolicy;
}

const dateString: { type: 'string'; format: string } = { type: 'string', format: 'date' };
const tagList: { type: 'array'; items: { type: 'string' } } = { type: 'array', items: { type: 'string' } };

const cartItemSchema = {
  type: 'object',
  required: ['price', 'quantity'],
  properties: {
    productId: { type: 'string' },
    category: { type: 'string' },
    price: { type: 'number', minimum: 0 },
    quantity: { type: 'integer', minimum: 1 },
  },
};

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger === false ? false : {
      level: process.env.LOG_LEVEL || 'info',
    },
    genReqId: () => uuidv4(),
  });

  await app.register(swagger, {
    openapi: {
      openapi: '3.0.0',
      info: {
        title: API_TITLE,
        description: API_DESCRIPTION,
        version: API_VERSION,
      },
      servers: [
        {
          url: process.env.API_BASE_URL || `http://${HOST}:${PORT}`,
          description: NODE_ENV === 'production' ? 'Production server' : 'Development server',
        },
      ],
      tags: [
        { name: 'health', description: 'Health check endpoints' },
        { name: 'coupons', description: 'Coupon management and selection' },
      ],
      components: {
        schemas: {
          Coupon: {
            type: 'object',
            properties: {
              id: { type: 'integer', example: 1 },
              code: { type: 'string', example: 'WELCOME10' },
              description: { type: 'string' },
              discountType: { type: 'string', enum: ['PERCENTAGE', 'FLAT'] },
              discountValue: { type: 'number', example: 10 },
              minCartValue: { type: 'number', example: 0 },
              maxDiscountCap: { type: 'number', example: 50 },
              startDate: dateString,
              expiryDate: dateString,
              eligibleUserSegments: tagList,
              minItemsCount: { type: 'integer' },
              applicableCategories: tagList,
              excludedCategories: tagList,
              allowedCountries: tagList,
              minLifetimeSpend: { type: 'number' },
              minOrdersPlaced: { type: 'integer' },
              firstOrderOnly: { type: 'boolean' },
              createdAt: { type: 'string', format: 'date-time' },
            },
          },
          BestCouponResult: {
            type: 'object',
            properties: {
              applicable: { type: 'boolean' },
              selectedCoupon: { $ref: '#/components/schemas/Coupon' },
              computedDiscount: { type: 'number' },
              subtotal: { type: 'number' },
              payableAmount: { type: 'number' },
              evaluationDate: dateString,
            },
          },
          Error: {
            type: 'object',
            properties: {
              error: {
                type: 'object',
                properties: {
                  code: { type: 'string' },
                  message: { type: 'string' },
                  statusCode: { type: 'integer' },
                },
              },
              timestamp: { type: 'string', format: 'date-time' },
            },
          },
        },
      },
    },
  });

  await app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
    },
  });

  await app.register(cors, {
    origin: process.env.CORS_ORIGIN ? process.env.CORS_ORIGIN.split(',') : true,
  });

  // dependency injection
  const repository = new InMemoryCouponRepository();
  const selector = new CouponSelector(
    new EligibilityEvaluator(),
    options.discountPolicy ?? { capFlatDiscounts: CAP_FLAT_DISCOUNTS }
  );
  const couponService = new CouponService(repository, selector, {
    clock: options.clock,
    maxCartItems: MAX_CART_ITEMS,
  });

  app.get('/health', {
    schema: {
      tags: ['health'],
      description: 'Health check endpoint for load balancers and monitoring',
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string', example: 'ok' },
            timestamp: { type: 'string', format: 'date-time' },
          },
        },
      },
    },
  }, async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // === Coupon Routes ===

  app.post<{
    Body: CreateCouponRequest;
  }>('/v1/coupons', {
    schema: {
      tags: ['coupons'],
      description: 'Create a coupon; the server assigns its id',
      body: {
        type: 'object',
        required: ['code', 'discountType', 'discountValue', 'expiryDate'],
        properties: {
          code: { type: 'string', minLength: 1 },
          description: { type: 'string' },
          discountType: { type: 'string', enum: ['PERCENTAGE', 'FLAT'] },
          discountValue: { type: 'number', minimum: 0 },
          minCartValue: { type: 'number', minimum: 0 },
          maxDiscountCap: { type: 'number', minimum: 0 },
          startDate: dateString,
          expiryDate: dateString,
          eligibleUserSegments: tagList,
          minItemsCount: { type: 'integer', minimum: 0 },
          applicableCategories: tagList,
          excludedCategories: tagList,
          allowedCountries: tagList,
          minLifetimeSpend: { type: 'number', minimum: 0 },
          minOrdersPlaced: { type: 'integer', minimum: 0 },
          firstOrderOnly: { type: 'boolean' },
        },
      },
    },
  }, async (request, reply) => {
    const coupon = await couponService.createCoupon(request.body);
    request.log.info({ couponId: coupon.id, code: coupon.code }, 'coupon created');

    return reply.code(201).send({
      data: coupon,
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/v1/coupons', {
    schema: {
      tags: ['coupons'],
      description: 'List every stored coupon in creation order',
    },
  }, async (_request, reply) => {
    const coupons = await couponService.listCoupons();

    return reply.code(200).send({
      data: coupons,
      timestamp: new Date().toISOString(),
    });
  });

  app.get<{
    Params: { couponId: number };
  }>('/v1/coupons/:couponId', {
    schema: {
      tags: ['coupons'],
      description: 'Retrieve a coupon by ID',
      params: {
        type: 'object',
        required: ['couponId'],
        properties: {
          couponId: { type: 'integer', minimum: 1 },
        },
      },
    },
  }, async (request, reply) => {
    const coupon = await couponService.getCoupon(request.params.couponId);

    return reply.code(200).send({
      data: coupon,
      timestamp: new Date().toISOString(),
    });
  });

  app.post<{
    Body: BestCouponRequest;
  }>('/v1/coupons/best', {
    schema: {
      tags: ['coupons'],
      description: 'Pick the best applicable coupon for a user and cart',
      body: {
        type: 'object',
        required: ['user', 'cart'],
        properties: {
          user: {
            type: 'object',
            required: ['id'],
            properties: {
              id: { type: 'string', minLength: 1 },
              segments: { ...tagList, default: [] },
              country: { type: 'string', minLength: 1 },
              lifetimeSpend: { type: 'number', minimum: 0 },
              ordersPlaced: { type: 'integer', minimum: 0 },
            },
          },
          cart: {
            type: 'object',
            required: ['items'],
            properties: {
              items: { type: 'array', items: cartItemSchema },
            },
          },
          evaluationDate: dateString,
        },
      },
    },
  }, async (request, reply) => {
    const result = await couponService.findBestCoupon(request.body);
    request.log.info(
      {
        userId: request.body.user.id,
        couponId: result.selectedCoupon?.id ?? null,
        discount: result.computedDiscount ?? 0,
      },
      result.applicable ? 'best coupon selected' : 'no coupon applicable'
    );

    return reply.code(200).send({
      data: result,
      timestamp: new Date().toISOString(),
    });
  });

  // ============================================================================
  // Error Handler
  // ============================================================================

  app.setErrorHandler((error, request, reply) => {
    // Domain errors already have status codes
    if (error instanceof DomainError) {
      return reply.code(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          statusCode: error.statusCode,
        },
        timestamp: new Date().toISOString(),
      });
    }

    // Fastify validation errors
    if (error.validation) {
      return reply.code(400).send({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Request validation failed',
          details: error.validation,
          statusCode: 400,
        },
        timestamp: new Date().toISOString(),
      });
    }

    // Log unexpected stuff
    request.log.error(error);

    // Catch-all for other errors
    return reply.code(500).send({
      error: {
        code: 'INTERNAL_SERVER_ERROR',
        message: 'An unexpected error occurred',
        statusCode: 500,
      },
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}

async function start() {
  const app = await buildApp();

  try {
    await app.listen({ port: PORT, host: HOST });
    app.log.info(`Health check: http://${HOST}:${PORT}/health`);
    app.log.info(`API docs: http://${HOST}:${PORT}/docs`);

    // Handle shutdown gracefully
    const signals = ['SIGINT', 'SIGTERM'];
    signals.forEach((signal) => {
      process.on(signal, async () => {
        app.log.info(`${signal} received, shutting down...`);
        try {
          await app.close();
          process.exit(0);
        } catch (err) {
          app.log.error(err, 'Error during shutdown');
          process.exit(1);
        }
      });
    });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
}

// Start if run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  void start();
}
