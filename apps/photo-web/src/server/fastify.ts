import type {
  FastifyInstance,
  FastifyTypeProviderDefault,
  RawReplyDefaultExpression,
  RawRequestDefaultExpression,
  RawServerDefault,
} from 'fastify';

import type { AppLogger } from '../telemetry/logger';

/** Whether failures on a route render an HTML page or a JSON body. */
export type RouteSurface = 'page' | 'api';

declare module 'fastify' {
  interface FastifyContextConfig {
    surface?: RouteSurface;
  }
}

export type PhotoWebFastifyInstance = FastifyInstance<
  RawServerDefault,
  RawRequestDefaultExpression<RawServerDefault>,
  RawReplyDefaultExpression<RawServerDefault>,
  AppLogger,
  FastifyTypeProviderDefault
>;
