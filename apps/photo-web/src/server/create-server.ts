import fastifyCookie from '@fastify/cookie';
import helmet from '@fastify/helmet';
import fastifyRateLimit from '@fastify/rate-limit';
import Fastify, { type FastifyError } from 'fastify';

import type { AppConfig } from '../config';
import { isAppError } from '../errors';
import { registerApiRoutes } from '../routes/api';
import { registerAuthRoutes } from '../routes/auth';
import { registerHealthRoutes } from '../routes/health';
import { registerPageRoutes } from '../routes/pages';
import type { PhotoService } from '../services/photos';
import type { SessionManager } from '../services/session';
import type { AppLogger } from '../telemetry/logger';
import type { AppMetrics } from '../telemetry/metrics';
import { ErrorPage, renderPage } from '../views';

import type { PhotoWebFastifyInstance } from './fastify';

export interface ServerOptions {
  config: AppConfig;
  logger: AppLogger;
  metrics: AppMetrics;
  sessions: SessionManager;
  photoService: PhotoService;
  /** Clock used when rendering relative timestamps. */
  now?: () => Date;
}

interface ErrorDescription {
  statusCode: number;
  code: string;
  message: string;
}

const HTML = 'text/html; charset=utf-8';

/**
 * Build and configure the Fastify HTTP server: pages, OAuth routes, JSON
 * fragments, health checks and metrics, plus the operational middleware
 * (helmet, cookies, rate limiting, correlation IDs).
 */
export async function createServer(options: ServerOptions): Promise<PhotoWebFastifyInstance> {
  const { config, metrics } = options;
  const app = Fastify({
    logger: options.logger,
    disableRequestLogging: config.env === 'production',
  });

  await app.register(helmet, {
    global: true,
    contentSecurityPolicy: {
      directives: {
        imgSrc: ["'self'", 'data:', 'https://*.staticflickr.com', 'https://www.flickr.com'],
      },
    },
  });

  await app.register(fastifyCookie);

  await app.register(fastifyRateLimit, {
    global: false,
    max: config.rateLimit.max,
    timeWindow: config.rateLimit.timeWindow,
  });

  app.addHook('onRequest', (request, reply, done) => {
    const header = request.headers['x-request-id'] ?? request.headers['x-correlation-id'];
    const correlationId = typeof header === 'string' && header.length > 0 ? header : request.id;

    void reply.header('x-request-id', correlationId);
    done();
  });

  app.addHook('onResponse', (request, reply, done) => {
    const labels = { route: request.routeOptions.url || 'unmatched', status: String(reply.statusCode) };
    metrics.requestCounter.inc(labels);
    metrics.requestDuration.observe(labels, reply.elapsedTime / 1000);

    request.log.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        requestId: reply.getHeader('x-request-id'),
      },
      'Request completed',
    );
    done();
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    const surface = request.routeOptions.config.surface ?? 'page';
    const described = describeError(error);

    if (described.statusCode >= 500) {
      request.log.error({ err: error }, 'Request failed');
    } else {
      request.log.warn({ code: described.code, message: described.message }, 'Request rejected');
    }

    if (surface === 'api') {
      return reply.code(described.statusCode).send({ error: described.code, message: described.message });
    }

    if (described.code === 'auth_required') {
      return reply.redirect('/login');
    }

    return reply
      .code(described.statusCode)
      .type(HTML)
      .send(renderPage(ErrorPage, { statusCode: described.statusCode, message: described.message }));
  });

  app.setNotFoundHandler((request, reply) => {
    return reply
      .code(404)
      .type(HTML)
      .send(renderPage(ErrorPage, { statusCode: 404, message: `No page at ${request.url}` }));
  });

  const cookie = { secure: config.cookie.secure };

  await registerHealthRoutes(app);
  await registerAuthRoutes(app, { service: options.photoService, sessions: options.sessions, cookie });
  await registerPageRoutes(app, {
    service: options.photoService,
    sessions: options.sessions,
    cookie,
    now: options.now,
  });
  await registerApiRoutes(app, {
    service: options.photoService,
    sessions: options.sessions,
    cookie,
    rateLimit: config.rateLimit,
  });

  app.get('/metrics', { config: { surface: 'api' } }, async (_, reply) => {
    const payload = await metrics.registry.metrics();
    return reply.type(metrics.registry.contentType).send(payload);
  });

  return app;
}

/**
 * Known application errors keep their status and code; framework 4xx errors
 * (malformed JSON, rate limiting) keep their status; anything else is a 500
 * whose details stay in the log.
 */
function describeError(error: FastifyError): ErrorDescription {
  if (isAppError(error)) {
    return { statusCode: error.statusCode, code: error.code, message: error.message };
  }

  const status = error.statusCode;
  if (typeof status === 'number' && status >= 400 && status < 500) {
    return {
      statusCode: status,
      code: status === 429 ? 'rate_limited' : 'bad_request',
      message: error.message,
    };
  }

  return { statusCode: 500, code: 'internal_error', message: 'Internal server error' };
}
