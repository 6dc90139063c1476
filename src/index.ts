import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { AppConfig, loadConfig } from './config.js';
import { createDefaultCatalog } from './domain/catalog/Catalog.js';
import { CartService } from './domain/services/CartService.js';
import { SessionService } from './domain/services/SessionService.js';
import { InMemorySessionStore } from './infrastructure/stores/InMemorySessionStore.js';
import { DomainError } from './domain/errors/index.js';
import { AddToCartRequest, RemoveFromCartQuery } from './domain/models.js';
import {
  EMPTY_CART_CHECKOUT_MESSAGE,
  EMPTY_CART_MESSAGE,
  addedMessage,
  checkoutMessage,
  removedMessage,
} from './domain/messages.js';

const sessionParams = {
  type: 'object',
  required: ['sessionId'],
  properties: {
    sessionId: { type: 'string', format: 'uuid' },
  },
} as const;

export async function buildApp(overrides: Partial<AppConfig> = {}): Promise<FastifyInstance> {
  const config: AppConfig = { ...loadConfig(), ...overrides };

  const app = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  await app.register(swagger, {
    openapi: {
      openapi: '3.0.0',
      info: {
        title: config.apiTitle,
        description: config.apiDescription,
        version: config.apiVersion,
      },
      servers: [
        {
          url: config.apiBaseUrl || `http://${config.host}:${config.port}`,
          description: config.nodeEnv === 'production' ? 'Production server' : 'Development server',
        },
      ],
      tags: [
        { name: 'health', description: 'Health check endpoints' },
        { name: 'products', description: 'Product catalog' },
        { name: 'session', description: 'Shop session lifecycle' },
        { name: 'cart', description: 'Cart operations within a session' },
        { name: 'debug', description: 'Diagnostics, disabled in production' },
      ],
      components: {
        schemas: {
          Product: {
            type: 'object',
            required: ['id', 'name', 'price'],
            properties: {
              id: { type: 'integer', example: 1 },
              name: { type: 'string', example: 'Laptop' },
              price: { type: 'integer', example: 120000 },
            },
          },
          LineDetail: {
            type: 'object',
            properties: {
              productId: { type: 'integer' },
              name: { type: 'string' },
              price: { type: 'integer' },
              quantity: { type: 'integer', minimum: 1 },
              subtotal: { type: 'integer' },
            },
          },
          Bill: {
            type: 'object',
            properties: {
              lines: {
                type: 'array',
                items: { $ref: '#/components/schemas/LineDetail' },
              },
              total: { type: 'integer' },
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
    origin: config.corsOrigin ?? true,
  });

  // dependency injection
  const sessionStore = new InMemorySessionStore({
    ttlMinutes: config.sessionTtlMinutes,
    logger: app.log,
  });
  const cartService = new CartService(createDefaultCatalog(), {
    maxQuantity: config.maxQuantity,
  });
  const sessionService = new SessionService(sessionStore, cartService, {
    sessionTtlMinutes: config.sessionTtlMinutes,
  });

  app.addHook('onClose', async () => {
    sessionStore.destroy();
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

  // === Catalog ===

  app.get('/v1/products', {
    schema: {
      tags: ['products'],
      description: 'List all available products, ordered by ID',
    },
  }, async (_request, reply) => {
    return reply.code(200).send({
      data: sessionService.listProducts(),
      timestamp: new Date().toISOString(),
    });
  });

  // === Sessions ===

  app.post('/v1/sessions', {
    schema: {
      tags: ['session'],
      description: 'Start a shop session with an empty cart',
    },
  }, async (request, reply) => {
    const session = await sessionService.createSession();
    request.log.info({ sessionId: session.sessionId }, 'shop session created');

    return reply.code(201).send({
      data: session,
      timestamp: new Date().toISOString(),
    });
  });

  app.delete<{
    Params: { sessionId: string };
  }>('/v1/sessions/:sessionId', {
    schema: {
      tags: ['session'],
      description: 'End a shop session and discard its cart',
      params: sessionParams,
    },
  }, async (request, reply) => {
    await sessionService.deleteSession(request.params.sessionId);
    return reply.code(204).send();
  });

  // === Cart ===

  app.get<{
    Params: { sessionId: string };
  }>('/v1/sessions/:sessionId/cart', {
    schema: {
      tags: ['cart'],
      description: 'View cart lines with subtotals and the grand total',
      params: sessionParams,
    },
  }, async (request, reply) => {
    const bill = await sessionService.viewCart(request.params.sessionId);

    return reply.code(200).send({
      data: bill,
      message: bill.lines.length === 0 ? EMPTY_CART_MESSAGE : undefined,
      timestamp: new Date().toISOString(),
    });
  });

  app.post<{
    Params: { sessionId: string };
    Body: AddToCartRequest;
  }>('/v1/sessions/:sessionId/cart/items', {
    schema: {
      tags: ['cart'],
      description: 'Add a product to the cart (or increase its quantity)',
      params: sessionParams,
      body: {
        type: 'object',
        required: ['productId'],
        properties: {
          productId: { type: 'integer' },
          quantity: { type: 'integer', default: 1 },
        },
      },
    },
  }, async (request, reply) => {
    const { sessionId } = request.params;
    const { productId, quantity = 1 } = request.body;

    const bill = await sessionService.addToCart(sessionId, productId, quantity);
    request.log.info({ sessionId, productId, quantity }, 'added to cart');

    return reply.code(200).send({
      data: bill,
      message: addedMessage(productId, quantity),
      timestamp: new Date().toISOString(),
    });
  });

  app.delete<{
    Params: { sessionId: string; productId: number };
    Querystring: RemoveFromCartQuery;
  }>('/v1/sessions/:sessionId/cart/items/:productId', {
    schema: {
      tags: ['cart'],
      description: 'Remove a quantity of a product; removing all of it drops the line',
      params: {
        type: 'object',
        required: ['sessionId', 'productId'],
        properties: {
          sessionId: { type: 'string', format: 'uuid' },
          productId: { type: 'integer' },
        },
      },
      querystring: {
        type: 'object',
        properties: {
          quantity: { type: 'integer', default: 1 },
        },
      },
    },
  }, async (request, reply) => {
    const { sessionId, productId } = request.params;
    const { quantity = 1 } = request.query;

    const bill = await sessionService.removeFromCart(sessionId, productId, quantity);
    request.log.info({ sessionId, productId, quantity }, 'removed from cart');

    return reply.code(200).send({
      data: bill,
      message: removedMessage(productId, quantity),
      timestamp: new Date().toISOString(),
    });
  });

  // === Checkout ===

  app.get<{
    Params: { sessionId: string };
  }>('/v1/sessions/:sessionId/checkout', {
    schema: {
      tags: ['cart'],
      description: 'Cart summary before confirming checkout (cart is left untouched)',
      params: sessionParams,
    },
  }, async (request, reply) => {
    const bill = await sessionService.computeBill(request.params.sessionId);

    return reply.code(200).send({
      data: bill,
      message: bill.lines.length === 0 ? EMPTY_CART_CHECKOUT_MESSAGE : undefined,
      timestamp: new Date().toISOString(),
    });
  });

  app.post<{
    Params: { sessionId: string };
  }>('/v1/sessions/:sessionId/checkout', {
    schema: {
      tags: ['cart'],
      description: 'Confirm checkout: returns the final bill and empties the cart',
      params: sessionParams,
    },
  }, async (request, reply) => {
    const { sessionId } = request.params;
    const total = await sessionService.checkout(sessionId);
    request.log.info({ sessionId, total }, 'checkout completed');

    return reply.code(200).send({
      data: { total },
      message: checkoutMessage(total, config.currency),
      timestamp: new Date().toISOString(),
    });
  });

  if (config.enableDebugRoutes) {
    app.get<{
      Params: { sessionId: string };
    }>('/v1/sessions/:sessionId/cart/raw', {
      schema: {
        tags: ['debug'],
        description: 'Raw cart lines as stored for the session',
        params: sessionParams,
      },
    }, async (request, reply) => {
      return reply.code(200).send({
        data: await sessionService.getRawCart(request.params.sessionId),
        timestamp: new Date().toISOString(),
      });
    });
  }

  // ============================================================================
  // Error Handler
  // ============================================================================

  app.setErrorHandler((error, _request, reply) => {
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
    app.log.error(error);

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
  const config = loadConfig();
  const app = await buildApp(config);

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Health check: http://${config.host}:${config.port}/health`);
    app.log.info(`API docs: http://${config.host}:${config.port}/docs`);

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
  start().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
